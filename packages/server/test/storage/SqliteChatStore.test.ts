import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SqliteChatStore } from "../../src/storage/SqliteChatStore.js";
import { createTestDb } from "../../src/storage/db.js";

describe("SqliteChatStore", () => {
  let clock: Date;
  let store: SqliteChatStore;

  const advance = (ms: number) => {
    clock = new Date(clock.getTime() + ms);
  };

  beforeEach(() => {
    clock = new Date("2024-05-01T12:00:00.000Z");
    store = new SqliteChatStore(createTestDb(), () => clock);
  });

  afterEach(() => {
    store.close();
  });

  it("creates and reads back a session", () => {
    const session = store.createSession("agent-1");

    expect(session).toMatchObject({
      agent_id: "agent-1",
      created_at: "2024-05-01T12:00:00.000Z",
      updated_at: "2024-05-01T12:00:00.000Z",
    });
    expect(store.getSession(session.id)).toEqual(session);
    expect(store.getSession("missing")).toBeNull();
  });

  it("stores messages and bumps the session's updated_at", () => {
    const session = store.createSession("agent-1");
    advance(5_000);

    const message = store.addMessage(session.id, "user", "hello");

    expect(message).toMatchObject({
      session_id: session.id,
      role: "user",
      content: "hello",
      created_at: "2024-05-01T12:00:05.000Z",
    });
    expect(store.getSession(session.id)?.updated_at).toBe(
      "2024-05-01T12:00:05.000Z",
    );
  });

  it("returns the most recent messages oldest first", () => {
    const session = store.createSession("agent-1");
    for (const content of ["one", "two", "three", "four"]) {
      store.addMessage(session.id, "user", content);
    }

    expect(store.getMessages(session.id).map((m) => m.content)).toEqual([
      "one",
      "two",
      "three",
      "four",
    ]);
    expect(store.getMessages(session.id, 2).map((m) => m.content)).toEqual([
      "three",
      "four",
    ]);
  });

  it("updates message content", () => {
    const session = store.createSession("agent-1");
    const message = store.addMessage(session.id, "assistant", "");

    store.updateMessageContent(message.id, "Hello");

    expect(store.getMessages(session.id)[0]?.content).toBe("Hello");
  });

  it("lists sessions most recently updated first", () => {
    const older = store.createSession("agent-1");
    advance(1_000);
    const newer = store.createSession("agent-2");
    advance(1_000);
    store.addMessage(older.id, "user", "bump");

    expect(store.getAllSessions().map((s) => s.id)).toEqual([
      older.id,
      newer.id,
    ]);
  });

  it("deletes a session with its messages", () => {
    const session = store.createSession("agent-1");
    store.addMessage(session.id, "user", "hello");

    expect(store.deleteSession(session.id)).toBe(true);
    expect(store.getSession(session.id)).toBeNull();
    expect(store.getMessages(session.id)).toEqual([]);
    expect(store.deleteSession(session.id)).toBe(false);
  });

  it("cleans up sessions idle for longer than the cutoff", () => {
    const stale = store.createSession("agent-1");
    store.addMessage(stale.id, "user", "old");
    advance(31 * 24 * 60 * 60 * 1000);
    const fresh = store.createSession("agent-1");

    expect(store.cleanupOldSessions(30)).toBe(1);
    expect(store.getSession(stale.id)).toBeNull();
    expect(store.getMessages(stale.id)).toEqual([]);
    expect(store.getSession(fresh.id)).not.toBeNull();
  });
});
