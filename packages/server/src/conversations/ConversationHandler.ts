/**
 * Handles one user message on a conversation, from storage to the relayed
 * reply.
 *
 * Every socket on the conversation sees, in order:
 *   user_message, typing(true), thread_info*, ai_chunk*, typing(false),
 *   ai_complete
 * or a single `error` envelope if something throws on the way. The client
 * socket is never closed from here.
 */

import {
  type ServerEnvelopeType,
  type ServerPayload,
  createEnvelope,
} from "@agent-bridge/shared";
import { errorMessage } from "../errors.js";
import { type Logger, createSilentLogger } from "../logging/logger.js";
import { type RelayAggregator, outcomeText } from "../relay/RelayAggregator.js";
import { CONTEXT_WINDOW } from "../relay/context.js";
import type { ChatStore } from "../storage/ChatStore.js";
import type { AgentLookup } from "../upstream/AgentDirectory.js";
import type { ConnectionRegistry } from "./ConnectionRegistry.js";

export interface IncomingUserMessage {
  content: string;
  threadId?: string;
}

/** The assistant reply being built up for one relay */
interface StreamingAccumulator {
  /** Stored assistant message, created on the first chunk */
  messageId: string | null;
  content: string;
}

export interface ConversationHandlerOptions {
  store: ChatStore;
  agents: AgentLookup;
  relay: RelayAggregator;
  connections: ConnectionRegistry;
  logger?: Logger;
}

export class ConversationHandler {
  private readonly store: ChatStore;
  private readonly agents: AgentLookup;
  private readonly relay: RelayAggregator;
  private readonly connections: ConnectionRegistry;
  private readonly logger: Logger;

  constructor(options: ConversationHandlerOptions) {
    this.store = options.store;
    this.agents = options.agents;
    this.relay = options.relay;
    this.connections = options.connections;
    this.logger = (options.logger ?? createSilentLogger()).child({
      component: "conversation",
    });
  }

  /**
   * Store the message, relay it to the session's agent and stream the reply
   * to every socket on the session. Never rejects.
   */
  async handleUserMessage(
    sessionId: string,
    agentId: string,
    incoming: IncomingUserMessage,
  ): Promise<void> {
    const log = this.logger.child({ sessionId, agentId });
    const send = <T extends ServerEnvelopeType>(
      type: T,
      payload: ServerPayload<T>,
    ) => {
      this.connections.broadcast(createEnvelope(type, payload), sessionId);
    };

    try {
      log.info(
        { threadId: incoming.threadId ?? null },
        incoming.threadId
          ? "Received message for existing thread"
          : "Received message, a new thread will be created",
      );

      const userMessage = this.store.addMessage(
        sessionId,
        "user",
        incoming.content,
      );
      send("user_message", userMessage);

      const agent = await this.agents.getAgent(agentId);
      if (!agent) {
        log.error("Agent not found, dropping message");
        return;
      }

      send("typing", { typing: true });

      const history = this.store
        .getMessages(sessionId, CONTEXT_WINDOW + 1)
        .filter((message) => message.id !== userMessage.id)
        .slice(-CONTEXT_WINDOW);

      const reply: StreamingAccumulator = { messageId: null, content: "" };
      const appendChunk = (text: string) => {
        reply.content += text;
        if (reply.messageId === null) {
          const created = this.store.addMessage(sessionId, "assistant", "");
          reply.messageId = created.id;
        }
        send("ai_chunk", { chunk: text, message_id: reply.messageId });
      };

      const deliveries = this.relay.streamDeliveries({
        message: incoming.content,
        history,
        agent,
        threadId: incoming.threadId,
      });

      for await (const delivery of deliveries) {
        switch (delivery.kind) {
          case "thread_info":
            log.info({ threadId: delivery.threadId }, "Forwarding thread id");
            send("thread_info", { threadId: delivery.threadId });
            break;
          case "chunk":
            appendChunk(delivery.text);
            break;
          case "final": {
            // Error text is delivered and stored as part of the reply
            const text = outcomeText(delivery.outcome);
            if (text) {
              appendChunk(text);
            }
            if (reply.messageId !== null) {
              this.store.updateMessageContent(reply.messageId, reply.content);
            }
            send("typing", { typing: false });
            send("ai_complete", {
              message_id: reply.messageId,
              content: reply.content,
            });
            log.debug(
              {
                outcome: delivery.outcome.status,
                length: reply.content.length,
              },
              "Reply complete",
            );
            break;
          }
        }
      }
    } catch (error) {
      log.error({ err: errorMessage(error) }, "Error handling message");
      send("error", { error: errorMessage(error) });
    }
  }
}
