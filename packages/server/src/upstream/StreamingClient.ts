/**
 * StreamingClient talks to the agent platform's WebSocket endpoint.
 *
 * One {@link StreamingClient.stream} call is one relay attempt:
 * - fetches a streaming token
 * - opens wss://<host>/agents/<agent>/ws with a fresh session and tab id
 * - sends the auth frame, then the message frame
 * - yields decoded events until complete, error, close or the read deadline
 *
 * The client itself is long-lived and shared by every relay. It keeps track
 * of the sockets it has open so {@link StreamingClient.close} can end them
 * at shutdown.
 */

import { randomUUID } from "node:crypto";
import {
  type UpstreamAuthFrame,
  type UpstreamEvent,
  type UpstreamMessageFrame,
  decodeUpstreamFrame,
  formatUpstreamTimestamp,
  isTerminalUpstreamEvent,
} from "@agent-bridge/shared";
import { type RawData, WebSocket } from "ws";
import { UpstreamConnectError, errorMessage } from "../errors.js";
import { type Logger, createSilentLogger } from "../logging/logger.js";
import { FrameQueue } from "./FrameQueue.js";
import type { TokenSource } from "./TokenProvider.js";
import { USER_AGENT } from "./http.js";

/** Message shown when the socket fails after the handshake */
export const CONNECTION_ERROR_MESSAGE = "Connection error occurred.";

/** Identifiers for one upstream conversation turn */
export interface UpstreamSession {
  sessionId: string;
  tabId: string;
}

/** Chat message in the context handed to the platform */
export interface ContextMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

/**
 * Model options for a relay attempt. The WebSocket protocol does not carry
 * them (the agent is configured on the platform); they are kept for logging
 * and for platforms that read them from the HTTP chat endpoint.
 */
export interface StreamOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  messages?: ContextMessage[];
}

/** What a relay needs from an upstream stream */
export interface UpstreamStreamer {
  stream(
    instanceName: string,
    message: string,
    options?: StreamOptions,
    threadId?: string,
  ): AsyncIterable<UpstreamEvent>;
}

export interface StreamingClientOptions {
  baseUrl: string;
  tokens: TokenSource;
  /** WebSocket handshake timeout (default: 15000) */
  connectTimeoutMs?: number;
  /** Upper bound on one read loop (default: 30000) */
  readTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Generate the ids the platform expects on the socket URL.
 */
export function createUpstreamSession(
  now: number = Date.now(),
): UpstreamSession {
  const hex = () => randomUUID().replaceAll("-", "");
  return {
    sessionId: `session-${now}-${hex().slice(0, 9)}`,
    tabId: hex().slice(0, 26),
  };
}

/**
 * Turn the platform's HTTP base URL into the agent's socket URL.
 */
export function buildStreamUrl(
  baseUrl: string,
  instanceName: string,
  session: UpstreamSession,
): string {
  const wsBase = baseUrl
    .replace(/^https:\/\//i, "wss://")
    .replace(/^http:\/\//i, "ws://");
  const query = new URLSearchParams({
    session_id: session.sessionId,
    tab_id: session.tabId,
    auth: "true",
  });
  return `${wsBase}/agents/${encodeURIComponent(instanceName)}/ws?${query}`;
}

export class StreamingClient implements UpstreamStreamer {
  private readonly baseUrl: string;
  private readonly tokens: TokenSource;
  private readonly connectTimeoutMs: number;
  private readonly readTimeoutMs: number;
  private readonly logger: Logger;
  /** Sockets of relays currently in flight */
  private readonly sockets = new Set<WebSocket>();
  private closed = false;

  constructor(options: StreamingClientOptions) {
    this.baseUrl = options.baseUrl;
    this.tokens = options.tokens;
    this.connectTimeoutMs = options.connectTimeoutMs ?? 15_000;
    this.readTimeoutMs = options.readTimeoutMs ?? 30_000;
    this.logger = (options.logger ?? createSilentLogger()).child({
      component: "streaming-client",
    });
  }

  /**
   * Relay one message to an agent and yield what it sends back.
   *
   * Ends after a `complete` or `error` event, when the platform closes the
   * socket, or silently when the read deadline passes. Failures after the
   * handshake surface as an `error` event with origin "transport".
   *
   * @throws UpstreamConnectError if the socket cannot be opened
   */
  async *stream(
    instanceName: string,
    message: string,
    options: StreamOptions = {},
    threadId?: string,
  ): AsyncGenerator<UpstreamEvent, void, undefined> {
    if (this.closed) {
      throw new UpstreamConnectError("Streaming client is closed");
    }

    const session = createUpstreamSession();
    const url = buildStreamUrl(this.baseUrl, instanceName, session);
    const log = this.logger.child({
      agent: instanceName,
      upstreamSession: session.sessionId,
    });

    const token = await this.tokens.getToken(instanceName);
    // close() may have run while the token was being fetched
    if (this.closed) {
      throw new UpstreamConnectError("Streaming client is closed");
    }
    log.debug(
      {
        model: options.model,
        contextMessages: options.messages?.length ?? 0,
        threadId,
      },
      "Opening upstream stream",
    );

    const { ws, frames } = await this.connect(url, token);
    if (this.closed) {
      ws.terminate();
      throw new UpstreamConnectError("Streaming client is closed");
    }
    this.sockets.add(ws);
    log.info("Upstream connection established");

    try {
      const timestamp = formatUpstreamTimestamp();
      const auth: UpstreamAuthFrame = {
        type: "auth",
        sessionId: session.sessionId,
        agentId: instanceName,
        timestamp,
      };
      const payload: UpstreamMessageFrame = {
        type: "message",
        content: message,
        userId: "1",
        sessionId: session.sessionId,
        agentId: instanceName,
        timestamp,
        tabId: session.tabId,
        ...(threadId ? { threadId } : {}),
      };

      try {
        ws.send(JSON.stringify(auth));
        ws.send(JSON.stringify(payload));
      } catch (error) {
        log.error({ err: errorMessage(error) }, "Failed to send handshake");
        yield {
          kind: "error",
          message: CONNECTION_ERROR_MESSAGE,
          origin: "transport",
        };
        return;
      }

      const deadline = Date.now() + this.readTimeoutMs;
      while (true) {
        const item = await frames.next(deadline - Date.now());

        if (item.kind === "timeout") {
          log.warn(
            { timeoutMs: this.readTimeoutMs },
            "Upstream read deadline reached, ending stream",
          );
          return;
        }

        if (item.kind === "closed") {
          log.info({ code: item.code }, "Upstream closed the connection");
          return;
        }

        if (item.kind === "error") {
          log.error({ err: item.error.message }, "Upstream socket error");
          yield {
            kind: "error",
            message: CONNECTION_ERROR_MESSAGE,
            origin: "transport",
          };
          return;
        }

        const event = decodeUpstreamFrame(item.data);
        if (event.kind === "raw") {
          log.debug("Upstream frame is not JSON, treating as text");
        } else if (event.kind === "ignored") {
          log.trace({ type: event.type }, "Ignoring upstream frame");
        }

        yield event;
        if (isTerminalUpstreamEvent(event)) {
          return;
        }
      }
    } finally {
      this.sockets.delete(ws);
      if (ws.readyState === WebSocket.OPEN) {
        ws.close(1000, "Done");
      } else if (ws.readyState === WebSocket.CONNECTING) {
        ws.terminate();
      }
    }
  }

  /**
   * Close every open upstream socket and refuse new streams.
   * Safe to call more than once.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const ws of this.sockets) {
      try {
        ws.close(1001, "Relay shutting down");
      } catch {
        ws.terminate();
      }
    }
    this.logger.info(
      { openSockets: this.sockets.size },
      "Streaming client closed",
    );
  }

  /** Number of upstream sockets currently open */
  get openCount(): number {
    return this.sockets.size;
  }

  private connect(
    url: string,
    token: string,
  ): Promise<{ ws: WebSocket; frames: FrameQueue }> {
    return new Promise((resolve, reject) => {
      let ws: WebSocket;
      try {
        ws = new WebSocket(url, {
          headers: {
            Authorization: `Bearer ${token}`,
            "User-Agent": USER_AGENT,
          },
          handshakeTimeout: this.connectTimeoutMs,
        });
      } catch (error) {
        reject(
          new UpstreamConnectError(
            `Unable to connect to agent: ${errorMessage(error)}`,
            { cause: error },
          ),
        );
        return;
      }

      // Permanent listeners feed the read loop; they also keep an unhandled
      // 'error' event from crashing the process.
      const frames = new FrameQueue();
      ws.on("message", (data: RawData, isBinary: boolean) => {
        if (isBinary) {
          this.logger.debug("Ignoring binary upstream frame");
          return;
        }
        frames.push({ kind: "frame", data: rawDataToString(data) });
      });
      ws.on("close", (code: number, reason: Buffer) => {
        frames.push({ kind: "closed", code, reason: reason.toString("utf8") });
      });
      ws.on("error", (error: Error) => {
        frames.push({ kind: "error", error });
      });

      const onOpen = () => {
        cleanup();
        resolve({ ws, frames });
      };
      const onError = (error: Error) => {
        cleanup();
        ws.terminate();
        reject(
          new UpstreamConnectError(
            `Unable to connect to agent: ${error.message}`,
            { cause: error },
          ),
        );
      };
      const onClose = (code: number) => {
        onError(new Error(`connection closed during handshake (${code})`));
      };
      const cleanup = () => {
        ws.off("open", onOpen);
        ws.off("error", onError);
        ws.off("close", onClose);
      };

      ws.once("open", onOpen);
      ws.once("error", onError);
      ws.once("close", onClose);
    });
  }
}

function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(new Uint8Array(data)).toString("utf8");
}
