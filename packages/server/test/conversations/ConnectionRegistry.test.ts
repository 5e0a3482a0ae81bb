import { createEnvelope } from "@agent-bridge/shared";
import { type Mock, beforeEach, describe, expect, it, vi } from "vitest";
import {
  type ClientConnection,
  ConnectionRegistry,
} from "../../src/conversations/ConnectionRegistry.js";

/** Create a mock client connection that records what it was sent */
function createMockConnection(): ClientConnection & {
  sent: string[];
  send: Mock<(data: string) => void>;
  close: Mock<(code?: number, reason?: string) => void>;
} {
  const sent: string[] = [];
  return {
    sent,
    send: vi.fn((data: string) => {
      sent.push(data);
    }),
    close: vi.fn<(code?: number, reason?: string) => void>(),
  };
}

const NOW = new Date("2024-05-01T12:00:00.000Z");

describe("ConnectionRegistry", () => {
  let registry: ConnectionRegistry;

  beforeEach(() => {
    registry = new ConnectionRegistry();
  });

  it("broadcasts only to connections still registered", () => {
    const a = createMockConnection();
    const b = createMockConnection();
    registry.register(a, "conv-1");
    registry.register(b, "conv-1");

    registry.unregister(a, "conv-1");
    registry.broadcast(
      createEnvelope("typing", { typing: true }, NOW),
      "conv-1",
    );

    expect(a.sent).toEqual([]);
    expect(b.sent).toEqual([
      '{"type":"typing","payload":{"typing":true},"timestamp":"2024-05-01T12:00:00.000Z"}',
    ]);

    registry.unregister(b, "conv-1");
    expect(registry.conversationIds()).toEqual([]);
    expect(registry.connectionCount("conv-1")).toBe(0);
  });

  it("keeps conversations separate", () => {
    const a = createMockConnection();
    const b = createMockConnection();
    registry.register(a, "conv-1");
    registry.register(b, "conv-2");

    registry.broadcast(createEnvelope("pong", {}, NOW), "conv-2");

    expect(a.send).not.toHaveBeenCalled();
    expect(b.send).toHaveBeenCalledTimes(1);
  });

  it("treats repeated unregister as a no-op", () => {
    const a = createMockConnection();
    const b = createMockConnection();
    registry.register(a, "conv-1");
    registry.register(b, "conv-1");

    registry.unregister(a, "conv-1");
    registry.unregister(a, "conv-1");
    registry.unregister(a, "unknown");

    expect(registry.connectionCount("conv-1")).toBe(1);
    expect(registry.conversationIds()).toEqual(["conv-1"]);
  });

  it("keeps broadcasting when one connection fails", () => {
    const broken = createMockConnection();
    broken.send.mockImplementation(() => {
      throw new Error("socket closed");
    });
    const healthy = createMockConnection();
    registry.register(broken, "conv-1");
    registry.register(healthy, "conv-1");

    expect(() =>
      registry.broadcast(
        createEnvelope("error", { error: "x" }, NOW),
        "conv-1",
      ),
    ).not.toThrow();
    expect(healthy.sent).toHaveLength(1);
  });

  it("does nothing for a conversation without connections", () => {
    expect(() =>
      registry.broadcast(createEnvelope("pong", {}, NOW), "nobody"),
    ).not.toThrow();
    expect(registry.conversationIds()).toEqual([]);
  });

  it("counts connections per conversation and in total", () => {
    registry.register(createMockConnection(), "conv-1");
    registry.register(createMockConnection(), "conv-1");
    registry.register(createMockConnection(), "conv-2");

    expect(registry.connectionCount("conv-1")).toBe(2);
    expect(registry.connectionCount()).toBe(3);
    expect(registry.conversationIds().sort()).toEqual(["conv-1", "conv-2"]);
  });

  it("closes every connection on closeAll", () => {
    const a = createMockConnection();
    const b = createMockConnection();
    b.close.mockImplementation(() => {
      throw new Error("already closed");
    });
    registry.register(a, "conv-1");
    registry.register(b, "conv-2");

    registry.closeAll(1001, "Server shutting down");

    expect(a.close).toHaveBeenCalledWith(1001, "Server shutting down");
    expect(b.close).toHaveBeenCalledWith(1001, "Server shutting down");
    expect(registry.connectionCount()).toBe(0);
  });
});
