import { serve } from "@hono/node-server";
import { createNodeWebSocket } from "@hono/node-ws";
import { Hono } from "hono";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import WebSocket from "ws";
import { type TestAppSetup, createTestApp } from "../fixtures/app.js";

/**
 * E2E tests for the client WebSocket endpoint.
 *
 * A real HTTP server on a random port, real `ws` clients, and a scripted
 * upstream agent in place of the platform.
 */

interface ReceivedEnvelope {
  type: string;
  payload: Record<string, unknown>;
  timestamp: string;
}

interface TestClient {
  ws: WebSocket;
  received: ReceivedEnvelope[];
  types(): string[];
}

describe("Chat WebSocket E2E", () => {
  let server: ReturnType<typeof serve>;
  let serverPort: number;
  let setup: TestAppSetup;
  let clients: WebSocket[];

  beforeEach(async () => {
    clients = [];
    const root = new Hono();
    const { upgradeWebSocket, injectWebSocket } = createNodeWebSocket({
      app: root,
    });
    setup = createTestApp({
      upgradeWebSocket,
      maxMessageLength: 20,
      events: [
        { kind: "thread_info", threadId: "thread-1" },
        { kind: "chunk", text: "He" },
        { kind: "chunk", text: "llo" },
        { kind: "complete" },
      ],
    });
    root.route("/", setup.app);

    await new Promise<void>((resolve) => {
      server = serve({ fetch: root.fetch, port: 0 }, (info) => {
        serverPort = info.port;
        resolve();
      });
    });
    injectWebSocket(server);
  });

  afterEach(() => {
    for (const ws of clients) {
      ws.terminate();
    }
    server.close();
    setup.store.close();
  });

  /**
   * Open a client socket, collecting every envelope from the first frame.
   */
  function connect(sessionId: string): Promise<TestClient> {
    return new Promise((resolve, reject) => {
      const ws = new WebSocket(`ws://localhost:${serverPort}/ws/${sessionId}`);
      clients.push(ws);
      const received: ReceivedEnvelope[] = [];
      ws.on("message", (data) => {
        received.push(JSON.parse(data.toString()) as ReceivedEnvelope);
      });
      ws.on("open", () =>
        resolve({
          ws,
          received,
          types: () => received.map((envelope) => envelope.type),
        }),
      );
      ws.on("error", reject);
    });
  }

  it("closes with 4004 for an unknown session", async () => {
    const ws = new WebSocket(`ws://localhost:${serverPort}/ws/missing`);
    clients.push(ws);

    const [code, reason] = await new Promise<[number, string]>((resolve) => {
      ws.on("close", (closeCode, closeReason) =>
        resolve([closeCode, closeReason.toString()]),
      );
    });

    expect(code).toBe(4004);
    expect(reason).toBe("Session not found");
  });

  it("sends the stored history on connect", async () => {
    const session = setup.store.createSession("agent-1");
    setup.store.addMessage(session.id, "user", "earlier");
    setup.store.addMessage(session.id, "assistant", "reply");

    const client = await connect(session.id);

    await vi.waitFor(() => expect(client.received).toHaveLength(1));
    const [history] = client.received;
    expect(history?.type).toBe("history");
    expect(history?.payload.messages).toEqual(
      setup.store.getMessages(session.id),
    );
  });

  it("answers ping with pong", async () => {
    const session = setup.store.createSession("agent-1");
    const client = await connect(session.id);

    client.ws.send(JSON.stringify({ type: "ping" }));

    await vi.waitFor(() => expect(client.types()).toContain("pong"));
    expect(client.received.at(-1)?.payload).toEqual({});
  });

  it("reports malformed input to the sender only", async () => {
    const session = setup.store.createSession("agent-1");
    const sender = await connect(session.id);
    const other = await connect(session.id);

    sender.ws.send("not json");
    sender.ws.send(JSON.stringify({ type: "bogus", payload: {} }));
    sender.ws.send(
      JSON.stringify({
        type: "user_message",
        payload: { content: "x".repeat(21) },
      }),
    );
    sender.ws.send(
      JSON.stringify({ type: "user_message", payload: { content: "   " } }),
    );

    await vi.waitFor(() => expect(sender.received).toHaveLength(5));
    expect(sender.received.slice(1).map((e) => e.payload.error)).toEqual([
      "Message is not valid JSON",
      'Unsupported or malformed message of type "bogus"',
      "Message exceeds 20 characters",
      "Message content must not be empty",
    ]);
    await vi.waitFor(() => expect(other.types()).toEqual(["history"]));
    expect(setup.upstream.calls).toEqual([]);
  });

  it("relays a user message to every socket on the session", async () => {
    const session = setup.store.createSession("agent-1");
    const sender = await connect(session.id);
    const watcher = await connect(session.id);

    sender.ws.send(
      JSON.stringify({ type: "user_message", payload: { content: "hi" } }),
    );

    const expected = [
      "history",
      "user_message",
      "typing",
      "thread_info",
      "ai_chunk",
      "ai_chunk",
      "typing",
      "ai_complete",
    ];
    await vi.waitFor(() => expect(watcher.types()).toEqual(expected));
    await vi.waitFor(() => expect(sender.types()).toEqual(expected));

    expect(sender.received.at(-1)?.payload.content).toBe("Hello");
    expect(setup.upstream.calls[0]?.message).toBe("hi");
    expect(
      setup.store.getMessages(session.id).map((m) => [m.role, m.content]),
    ).toEqual([
      ["user", "hi"],
      ["assistant", "Hello"],
    ]);
  });

  it("unregisters sockets when they close", async () => {
    const session = setup.store.createSession("agent-1");
    const client = await connect(session.id);
    await vi.waitFor(() =>
      expect(setup.connections.connectionCount(session.id)).toBe(1),
    );

    client.ws.close();

    await vi.waitFor(() =>
      expect(setup.connections.connectionCount(session.id)).toBe(0),
    );
  });
});
