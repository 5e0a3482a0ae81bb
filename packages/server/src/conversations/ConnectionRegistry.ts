import { type ClientEnvelope, encodeEnvelope } from "@agent-bridge/shared";
import { errorMessage } from "../errors.js";
import { type Logger, createSilentLogger } from "../logging/logger.js";

/**
 * The part of a client socket the registry uses. Hono's WSContext and ws's
 * WebSocket both fit.
 */
export interface ClientConnection {
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

/**
 * Tracks which client sockets are open on which conversation.
 *
 * Responsibilities:
 * - Register and unregister sockets per conversation id
 * - Fan an envelope out to every socket on a conversation
 * - Close everything at shutdown
 *
 * A conversation id is present only while it has at least one socket.
 */
export class ConnectionRegistry {
  /** Open sockets by conversation id */
  private connections = new Map<string, Set<ClientConnection>>();
  private logger: Logger;

  constructor(logger?: Logger) {
    this.logger = (logger ?? createSilentLogger()).child({
      component: "connections",
    });
  }

  register(connection: ClientConnection, conversationId: string): void {
    let set = this.connections.get(conversationId);
    if (!set) {
      set = new Set();
      this.connections.set(conversationId, set);
    }
    set.add(connection);
    this.logger.debug(
      { conversationId, count: set.size },
      "Client connection registered",
    );
  }

  /**
   * Remove a socket. Unknown sockets and repeated calls are no-ops.
   */
  unregister(connection: ClientConnection, conversationId: string): void {
    const set = this.connections.get(conversationId);
    if (!set?.delete(connection)) {
      return;
    }
    if (set.size === 0) {
      this.connections.delete(conversationId);
    }
    this.logger.debug(
      { conversationId, count: set.size },
      "Client connection unregistered",
    );
  }

  /**
   * Send an envelope to every socket on a conversation.
   *
   * Serializes once and iterates a snapshot, so sockets registering or
   * leaving mid-broadcast don't affect this send. A socket whose send
   * throws is skipped; the others still receive the envelope.
   */
  broadcast(
    envelope: ClientEnvelope<string, object>,
    conversationId: string,
  ): void {
    const set = this.connections.get(conversationId);
    if (!set || set.size === 0) {
      return;
    }

    const data = encodeEnvelope(envelope);
    for (const connection of [...set]) {
      try {
        connection.send(data);
      } catch (error) {
        this.logger.debug(
          { conversationId, type: envelope.type, err: errorMessage(error) },
          "Broadcast to client failed",
        );
      }
    }
  }

  /**
   * Number of sockets on a conversation, or across all of them.
   */
  connectionCount(conversationId?: string): number {
    if (conversationId !== undefined) {
      return this.connections.get(conversationId)?.size ?? 0;
    }
    let total = 0;
    for (const set of this.connections.values()) {
      total += set.size;
    }
    return total;
  }

  /** Conversations with at least one open socket */
  conversationIds(): string[] {
    return [...this.connections.keys()];
  }

  /**
   * Close and forget every socket.
   */
  closeAll(code = 1001, reason = "Server shutting down"): void {
    for (const [conversationId, set] of this.connections) {
      for (const connection of set) {
        try {
          connection.close(code, reason);
        } catch (error) {
          this.logger.debug(
            { conversationId, err: errorMessage(error) },
            "Closing client connection failed",
          );
        }
      }
    }
    this.connections.clear();
  }
}
