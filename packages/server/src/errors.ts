/**
 * Error types raised inside the relay.
 *
 * None of these reach a browser client as-is: the aggregator turns them into
 * an apology string or a terminal delivery, and the conversation handler
 * into an `error` envelope.
 */

export type UpstreamErrorCode = "AUTH_FAILED" | "CONNECT_FAILED";

/** Base class so callers can tell relay failures from programming errors */
export class UpstreamError extends Error {
  constructor(
    message: string,
    public readonly code: UpstreamErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "UpstreamError";
  }
}

/** Token endpoint answered with an unexpected status */
export class UpstreamAuthError extends UpstreamError {
  readonly status: number;

  constructor(status: number, body: string) {
    super(
      `Token endpoint returned ${status}${body ? `: ${body.slice(0, 200)}` : ""}`,
      "AUTH_FAILED",
    );
    this.name = "UpstreamAuthError";
    this.status = status;
  }
}

/** The upstream WebSocket could not be opened. Terminal for the attempt. */
export class UpstreamConnectError extends UpstreamError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "CONNECT_FAILED", options);
    this.name = "UpstreamConnectError";
  }
}

/** Required configuration is missing or invalid */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
