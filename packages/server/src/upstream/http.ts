/** User-Agent sent on every platform request */
export const USER_AGENT = "agent-bridge/0.1";

/**
 * Headers for authenticated JSON requests to the agent platform.
 */
export function platformHeaders(token: string): Record<string, string> {
  return {
    Authorization: `Bearer ${token}`,
    "Content-Type": "application/json",
    "User-Agent": USER_AGENT,
  };
}

/**
 * Whether an error came from an aborted or timed-out fetch.
 */
export function isAbortError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "TimeoutError" || error.name === "AbortError")
  );
}
