import {
  type ChatSession,
  type ServerEnvelopeType,
  type ServerPayload,
  createEnvelope,
  encodeEnvelope,
  parseClientRequest,
} from "@agent-bridge/shared";
import type { Context } from "hono";
import { Hono } from "hono";
import type { WSContext, WSEvents } from "hono/ws";
import type { ConnectionRegistry } from "../conversations/ConnectionRegistry.js";
import type { ConversationHandler } from "../conversations/ConversationHandler.js";
import { errorMessage } from "../errors.js";
import { type Logger, createSilentLogger } from "../logging/logger.js";
import type { ChatStore } from "../storage/ChatStore.js";

/** Close code sent when the requested session does not exist */
export const SESSION_NOT_FOUND_CODE = 4004;

/** Messages sent to a client when it connects */
export const HISTORY_LIMIT = 50;

// biome-ignore lint/suspicious/noExplicitAny: Complex third-party type from @hono/node-ws
type UpgradeWebSocketFn = (createEvents: (c: Context) => WSEvents) => any;

export interface ChatSocketDeps {
  upgradeWebSocket: UpgradeWebSocketFn;
  store: ChatStore;
  connections: ConnectionRegistry;
  conversations: ConversationHandler;
  /** Longest accepted user message, in characters */
  maxMessageLength: number;
  logger?: Logger;
}

/**
 * Decode a frame payload as UTF-8 text.
 */
async function frameText(data: unknown): Promise<string> {
  if (typeof data === "string") return data;
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  if (data instanceof Blob) return data.text();
  return String(data);
}

export function createChatSocketRoutes(deps: ChatSocketDeps): Hono {
  const routes = new Hono();
  const logger = (deps.logger ?? createSilentLogger()).child({
    component: "chat-ws",
  });

  const sendTo = <T extends ServerEnvelopeType>(
    ws: WSContext,
    type: T,
    payload: ServerPayload<T>,
  ) => {
    try {
      ws.send(encodeEnvelope(createEnvelope(type, payload)));
    } catch (error) {
      logger.debug({ err: errorMessage(error) }, "Send to client failed");
    }
  };

  // WebSocket endpoint: /ws/:sessionId
  routes.get(
    "/ws/:sessionId",
    deps.upgradeWebSocket((c) => {
      // Unknown or missing ids close on open with SESSION_NOT_FOUND_CODE
      const sessionId = c.req.param("sessionId");
      const session = sessionId ? deps.store.getSession(sessionId) : null;
      const log = logger.child({ sessionId: sessionId ?? null });

      // The context registered on open; unregistered on close or error
      let connection: WSContext | null = null;

      // Messages from one socket are handled one at a time
      let messageQueue: Promise<void> = Promise.resolve();

      const release = () => {
        if (connection && session) {
          deps.connections.unregister(connection, session.id);
          connection = null;
        }
      };

      const processMessage = async (
        data: unknown,
        ws: WSContext,
        target: ChatSession,
      ): Promise<void> => {
        const parsed = parseClientRequest(await frameText(data));
        if (!parsed.ok) {
          sendTo(ws, "error", { error: parsed.error });
          return;
        }

        const { request } = parsed;
        if (request.type === "ping") {
          sendTo(ws, "pong", {});
          return;
        }

        const { content, threadId } = request.payload;
        if (!content.trim()) {
          sendTo(ws, "error", { error: "Message content must not be empty" });
          return;
        }
        if (content.length > deps.maxMessageLength) {
          sendTo(ws, "error", {
            error: `Message exceeds ${deps.maxMessageLength} characters`,
          });
          return;
        }

        await deps.conversations.handleUserMessage(
          target.id,
          target.agent_id,
          { content, threadId },
        );
      };

      return {
        onOpen(_evt, ws) {
          if (!session) {
            log.warn("Connection for unknown session");
            ws.close(SESSION_NOT_FOUND_CODE, "Session not found");
            return;
          }

          connection = ws;
          deps.connections.register(ws, session.id);
          log.info(
            { connections: deps.connections.connectionCount(session.id) },
            "Client connected",
          );

          sendTo(ws, "history", {
            messages: deps.store.getMessages(session.id, HISTORY_LIMIT),
          });
        },

        onMessage(evt, ws) {
          if (!session) return;
          messageQueue = messageQueue.then(() =>
            processMessage(evt.data, ws, session).catch((error) => {
              log.error(
                { err: errorMessage(error) },
                "Error processing client message",
              );
              sendTo(ws, "error", { error: errorMessage(error) });
            }),
          );
        },

        onClose() {
          if (connection) {
            log.info("Client disconnected");
          }
          release();
        },

        onError(evt) {
          log.warn({ event: evt.type }, "Client socket error");
          release();
        },
      };
    }),
  );

  return routes;
}
