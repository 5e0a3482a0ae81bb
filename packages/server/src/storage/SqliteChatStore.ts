import { randomUUID } from "node:crypto";
import type {
  ChatMessage,
  ChatSession,
  MessageRole,
} from "@agent-bridge/shared";
import type Database from "better-sqlite3";
import type { ChatStore } from "./ChatStore.js";

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * ChatStore on better-sqlite3. Columns are named like the wire types, so
 * rows are returned as they are. Timestamps are ISO-8601 strings, so string
 * order is time order; rowid breaks ties between equal timestamps.
 */
export class SqliteChatStore implements ChatStore {
  private db: Database.Database;
  private now: () => Date;

  constructor(db: Database.Database, now: () => Date = () => new Date()) {
    this.db = db;
    this.now = now;
  }

  createSession(agentId: string): ChatSession {
    const timestamp = this.now().toISOString();
    const session: ChatSession = {
      id: randomUUID(),
      agent_id: agentId,
      created_at: timestamp,
      updated_at: timestamp,
    };
    this.db
      .prepare(
        "INSERT INTO chat_sessions (id, agent_id, created_at, updated_at) VALUES (?, ?, ?, ?)",
      )
      .run(session.id, agentId, timestamp, timestamp);
    return session;
  }

  getSession(sessionId: string): ChatSession | null {
    const row = this.db
      .prepare<[string], ChatSession>(
        "SELECT id, agent_id, created_at, updated_at FROM chat_sessions WHERE id = ?",
      )
      .get(sessionId);
    return row ?? null;
  }

  getAllSessions(): ChatSession[] {
    return this.db
      .prepare<[], ChatSession>(
        "SELECT id, agent_id, created_at, updated_at FROM chat_sessions ORDER BY updated_at DESC, rowid DESC",
      )
      .all();
  }

  addMessage(
    sessionId: string,
    role: MessageRole,
    content: string,
  ): ChatMessage {
    const timestamp = this.now().toISOString();
    const message: ChatMessage = {
      id: randomUUID(),
      session_id: sessionId,
      role,
      content,
      created_at: timestamp,
    };

    const insert = this.db.transaction(() => {
      this.db
        .prepare(
          "INSERT INTO chat_messages (id, session_id, role, content, created_at) VALUES (?, ?, ?, ?, ?)",
        )
        .run(message.id, sessionId, role, content, timestamp);
      this.db
        .prepare("UPDATE chat_sessions SET updated_at = ? WHERE id = ?")
        .run(timestamp, sessionId);
    });
    insert();

    return message;
  }

  getMessages(sessionId: string, limit = 50): ChatMessage[] {
    const rows = this.db
      .prepare<[string, number], ChatMessage>(
        `SELECT id, session_id, role, content, created_at
         FROM chat_messages
         WHERE session_id = ?
         ORDER BY created_at DESC, rowid DESC
         LIMIT ?`,
      )
      .all(sessionId, limit);
    return rows.reverse();
  }

  updateMessageContent(messageId: string, content: string): void {
    this.db
      .prepare("UPDATE chat_messages SET content = ? WHERE id = ?")
      .run(content, messageId);
  }

  deleteSession(sessionId: string): boolean {
    const remove = this.db.transaction((id: string) => {
      this.db.prepare("DELETE FROM chat_messages WHERE session_id = ?").run(id);
      const result = this.db
        .prepare("DELETE FROM chat_sessions WHERE id = ?")
        .run(id);
      return result.changes;
    });
    return remove(sessionId) > 0;
  }

  cleanupOldSessions(days = 30): number {
    const cutoff = new Date(
      this.now().getTime() - days * DAY_MS,
    ).toISOString();
    const remove = this.db.transaction((before: string) => {
      const ids = this.db
        .prepare<[string], { id: string }>(
          "SELECT id FROM chat_sessions WHERE updated_at < ?",
        )
        .all(before);
      for (const { id } of ids) {
        this.db
          .prepare("DELETE FROM chat_messages WHERE session_id = ?")
          .run(id);
        this.db.prepare("DELETE FROM chat_sessions WHERE id = ?").run(id);
      }
      return ids.length;
    });
    return remove(cutoff);
  }

  close(): void {
    this.db.close();
  }
}
