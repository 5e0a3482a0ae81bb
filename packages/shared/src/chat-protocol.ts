/**
 * Envelope protocol between the relay server and browser chat clients.
 *
 * Every frame on the client-facing WebSocket is one JSON object of the form
 * `{ type, payload, timestamp }`. Clients send `user_message` and `ping`;
 * the server sends everything in {@link ServerEnvelopeType}.
 *
 * Flow for one user message:
 * 1. Client sends user_message
 * 2. Server echoes user_message (stored copy) to every socket on the session
 * 3. typing {typing: true}
 * 4. zero or more thread_info / ai_chunk
 * 5. typing {typing: false}, then ai_complete with the full content
 */

import { z } from "zod";
import type { ChatMessage } from "./chat-types.js";

// ============================================================================
// Envelope
// ============================================================================

/** Envelope types the server emits */
export type ServerEnvelopeType =
  | "history"
  | "user_message"
  | "typing"
  | "ai_chunk"
  | "ai_complete"
  | "thread_info"
  | "error"
  | "pong";

/** Envelope types a client may send */
export type ClientEnvelopeType = "user_message" | "ping";

/** Typed envelope exchanged over the client WebSocket */
export interface ClientEnvelope<
  TType extends string = string,
  TPayload extends object = Record<string, unknown>,
> {
  type: TType;
  payload: TPayload;
  /** ISO-8601 creation time */
  timestamp: string;
}

// ============================================================================
// Server -> Client payloads
// ============================================================================

export type HistoryEnvelope = ClientEnvelope<
  "history",
  { messages: ChatMessage[] }
>;

export type UserMessageEnvelope = ClientEnvelope<"user_message", ChatMessage>;

export type TypingEnvelope = ClientEnvelope<"typing", { typing: boolean }>;

export type AiChunkEnvelope = ClientEnvelope<
  "ai_chunk",
  { chunk: string; message_id: string | null }
>;

export type AiCompleteEnvelope = ClientEnvelope<
  "ai_complete",
  { message_id: string | null; content: string }
>;

export type ThreadInfoEnvelope = ClientEnvelope<
  "thread_info",
  { threadId: string }
>;

export type ErrorEnvelope = ClientEnvelope<"error", { error: string }>;

export type PongEnvelope = ClientEnvelope<"pong", Record<string, never>>;

/** Every envelope the server can emit */
export type ServerEnvelope =
  | HistoryEnvelope
  | UserMessageEnvelope
  | TypingEnvelope
  | AiChunkEnvelope
  | AiCompleteEnvelope
  | ThreadInfoEnvelope
  | ErrorEnvelope
  | PongEnvelope;

/** Payload type for a given server envelope type */
export type ServerPayload<T extends ServerEnvelopeType> = Extract<
  ServerEnvelope,
  { type: T }
>["payload"];

/**
 * Build a server envelope stamped with the current time.
 */
export function createEnvelope<T extends ServerEnvelopeType>(
  type: T,
  payload: ServerPayload<T>,
  now: Date = new Date(),
): { type: T; payload: ServerPayload<T>; timestamp: string } {
  return { type, payload, timestamp: now.toISOString() };
}

/**
 * Serialize an envelope for a text frame.
 * @throws if the envelope has an empty type
 */
export function encodeEnvelope(
  envelope: ClientEnvelope<string, object>,
): string {
  if (!envelope.type) {
    throw new Error("Envelope type must not be empty");
  }
  return JSON.stringify(envelope);
}

// ============================================================================
// Client -> Server messages
// ============================================================================

const UserMessageRequestSchema = z.object({
  type: z.literal("user_message"),
  payload: z.object({
    content: z.string(),
    threadId: z.string().min(1).optional(),
  }),
});

const PingRequestSchema = z.object({
  type: z.literal("ping"),
  payload: z.record(z.unknown()).optional(),
});

export const ClientRequestSchema = z.discriminatedUnion("type", [
  UserMessageRequestSchema,
  PingRequestSchema,
]);

export type UserMessageRequest = z.infer<typeof UserMessageRequestSchema>;
export type PingRequest = z.infer<typeof PingRequestSchema>;
export type ClientRequest = z.infer<typeof ClientRequestSchema>;

export type ClientRequestParseResult =
  | { ok: true; request: ClientRequest }
  | { ok: false; error: string };

/**
 * Parse a text frame received from a browser client.
 */
export function parseClientRequest(raw: string): ClientRequestParseResult {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { ok: false, error: "Message is not valid JSON" };
  }

  const result = ClientRequestSchema.safeParse(json);
  if (!result.success) {
    const type =
      typeof json === "object" && json !== null && "type" in json
        ? String(json.type)
        : undefined;
    return {
      ok: false,
      error: type
        ? `Unsupported or malformed message of type "${type}"`
        : "Message has no type",
    };
  }
  return { ok: true, request: result.data };
}

/** Type guard for user_message requests */
export function isUserMessageRequest(
  msg: ClientRequest,
): msg is UserMessageRequest {
  return msg.type === "user_message";
}
