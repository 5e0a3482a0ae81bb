/**
 * Exchanges the long-lived platform API key for a short-lived streaming
 * token.
 *
 * Platforms without the token endpoint answer 404; for those the API key
 * itself is accepted on the WebSocket, so the provider hands it back. Any
 * other failure also falls back to the API key so a relay attempt can still
 * proceed, but the reason is reported so outages stay visible in the logs.
 */

import { UpstreamAuthError, errorMessage } from "../errors.js";
import {
  type Logger,
  createSilentLogger,
  redactToken,
} from "../logging/logger.js";
import { isAbortError, platformHeaders } from "./http.js";

/** Requested token lifetime in seconds */
export const TOKEN_EXPIRES_IN_SECONDS = 3600;

export type TokenFallbackReason =
  | "endpoint_missing"
  | "status"
  | "timeout"
  | "transport"
  | "malformed";

export type TokenResolution =
  | { source: "issued"; token: string }
  | { source: "fallback"; token: string; reason: TokenFallbackReason };

/** Anything that can supply a streaming token for an agent */
export interface TokenSource {
  getToken(agentId: string): Promise<string>;
}

export interface TokenProviderOptions {
  baseUrl: string;
  apiKey: string;
  /** Request timeout (default: 10000) */
  timeoutMs?: number;
  logger?: Logger;
}

export class TokenProvider implements TokenSource {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: TokenProviderOptions) {
    this.baseUrl = options.baseUrl;
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.logger = (options.logger ?? createSilentLogger()).child({
      component: "token-provider",
    });
  }

  /**
   * Get a token for the agent's streaming endpoint. Never rejects.
   */
  async getToken(agentId: string): Promise<string> {
    const resolution = await this.resolveToken(agentId);
    return resolution.token;
  }

  /**
   * Like {@link getToken}, but also says whether the token was issued or is
   * the API key fallback, and why.
   */
  async resolveToken(agentId: string): Promise<TokenResolution> {
    const url = `${this.baseUrl}/agents/auth/websocket`;

    let response: Response;
    try {
      response = await fetch(url, {
        method: "POST",
        headers: platformHeaders(this.apiKey),
        body: JSON.stringify({
          agentId,
          expiresIn: TOKEN_EXPIRES_IN_SECONDS,
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const reason = isAbortError(error) ? "timeout" : "transport";
      this.logger.warn(
        { agentId, reason, err: errorMessage(error) },
        "Token request failed, falling back to API key",
      );
      return this.fallback(reason);
    }

    if (response.status === 404) {
      this.logger.info(
        { agentId },
        "Token endpoint not available, using API key",
      );
      return this.fallback("endpoint_missing");
    }

    if (response.status !== 200) {
      const body = await response.text().catch(() => "");
      const error = new UpstreamAuthError(response.status, body);
      this.logger.warn(
        { agentId, status: response.status, err: error.message },
        "Token endpoint rejected request, falling back to API key",
      );
      return this.fallback("status");
    }

    let token: unknown;
    try {
      const data: unknown = await response.json();
      token =
        typeof data === "object" && data !== null && "token" in data
          ? data.token
          : undefined;
    } catch (error) {
      const reason = isAbortError(error) ? "timeout" : "malformed";
      this.logger.warn(
        { agentId, reason, err: errorMessage(error) },
        "Could not read token response, falling back to API key",
      );
      return this.fallback(reason);
    }

    if (typeof token !== "string" || token.length === 0) {
      this.logger.warn(
        { agentId },
        "Token response has no token, falling back to API key",
      );
      return this.fallback("malformed");
    }

    this.logger.debug(
      { agentId, token: redactToken(token) },
      "Issued streaming token",
    );
    return { source: "issued", token };
  }

  private fallback(reason: TokenFallbackReason): TokenResolution {
    return { source: "fallback", token: this.apiKey, reason };
  }
}
