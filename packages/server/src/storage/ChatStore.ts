import type {
  ChatMessage,
  ChatSession,
  MessageRole,
} from "@agent-bridge/shared";

/**
 * Persistence for chat sessions and their messages.
 */
export interface ChatStore {
  createSession(agentId: string): ChatSession;
  getSession(sessionId: string): ChatSession | null;
  /** All sessions, most recently updated first */
  getAllSessions(): ChatSession[];
  /** Store a message and bump the session's `updated_at` */
  addMessage(
    sessionId: string,
    role: MessageRole,
    content: string,
  ): ChatMessage;
  /** The most recent `limit` messages, oldest first */
  getMessages(sessionId: string, limit?: number): ChatMessage[];
  updateMessageContent(messageId: string, content: string): void;
  /** @returns whether the session existed */
  deleteSession(sessionId: string): boolean;
  /** Delete sessions not updated for `days` days. @returns count deleted */
  cleanupOldSessions(days?: number): number;
  close(): void;
}
