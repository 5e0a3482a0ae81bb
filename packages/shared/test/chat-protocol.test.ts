import { describe, expect, it } from "vitest";
import {
  createEnvelope,
  encodeEnvelope,
  isUserMessageRequest,
  parseClientRequest,
} from "../src/chat-protocol.js";

describe("chat-protocol", () => {
  describe("createEnvelope", () => {
    it("stamps the envelope with an ISO timestamp", () => {
      const now = new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 600));
      expect(createEnvelope("typing", { typing: true }, now)).toEqual({
        type: "typing",
        payload: { typing: true },
        timestamp: "2024-01-02T03:04:05.600Z",
      });
    });
  });

  describe("encodeEnvelope", () => {
    it("produces independently decodable JSON", () => {
      const envelope = createEnvelope("ai_chunk", {
        chunk: 'say "hi"\n',
        message_id: "m1",
      });
      expect(JSON.parse(encodeEnvelope(envelope))).toEqual(envelope);
    });

    it("rejects an empty type", () => {
      expect(() =>
        encodeEnvelope({ type: "", payload: {}, timestamp: "t" }),
      ).toThrow("Envelope type must not be empty");
    });
  });

  describe("parseClientRequest", () => {
    it("parses a user message with a thread id", () => {
      const result = parseClientRequest(
        JSON.stringify({
          type: "user_message",
          payload: { content: "hi", threadId: "thread-1" },
        }),
      );
      expect(result).toEqual({
        ok: true,
        request: {
          type: "user_message",
          payload: { content: "hi", threadId: "thread-1" },
        },
      });
      expect(result.ok && isUserMessageRequest(result.request)).toBe(true);
    });

    it("parses a ping without payload", () => {
      expect(parseClientRequest('{"type":"ping"}')).toEqual({
        ok: true,
        request: { type: "ping" },
      });
    });

    it("reports invalid JSON", () => {
      expect(parseClientRequest("{nope")).toEqual({
        ok: false,
        error: "Message is not valid JSON",
      });
    });

    it("reports unknown types", () => {
      expect(parseClientRequest('{"type":"subscribe"}')).toEqual({
        ok: false,
        error: 'Unsupported or malformed message of type "subscribe"',
      });
    });

    it("reports a user message without content", () => {
      expect(
        parseClientRequest('{"type":"user_message","payload":{}}'),
      ).toEqual({
        ok: false,
        error: 'Unsupported or malformed message of type "user_message"',
      });
    });

    it("reports messages with no type", () => {
      expect(parseClientRequest("[1,2]")).toEqual({
        ok: false,
        error: "Message has no type",
      });
    });
  });
});
