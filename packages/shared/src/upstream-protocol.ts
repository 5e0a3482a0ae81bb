/**
 * Wire protocol spoken with the agent platform's streaming endpoint.
 *
 * Flow:
 * 1. Relay opens wss://<host>/agents/<agent>/ws?session_id=…&tab_id=…&auth=true
 * 2. Relay sends an auth frame, then a message frame
 * 3. Platform streams connected / typing / thread_info / chunk frames
 * 4. Platform ends the turn with complete, or reports { error }
 *
 * Frames from the platform are decoded by {@link decodeUpstreamFrame}, which
 * never throws: anything that is not a recognized JSON frame becomes a
 * `raw` or `ignored` event.
 */

import { z } from "zod";

// ============================================================================
// Relay -> Platform
// ============================================================================

/** First frame after connecting */
export interface UpstreamAuthFrame {
  type: "auth";
  sessionId: string;
  agentId: string;
  timestamp: string;
}

/** Second frame: the user's message */
export interface UpstreamMessageFrame {
  type: "message";
  content: string;
  /** The protocol expects a user id; the relay always sends "1" */
  userId: string;
  sessionId: string;
  agentId: string;
  timestamp: string;
  tabId: string;
  /** Continue an existing platform thread */
  threadId?: string;
}

export type UpstreamClientFrame = UpstreamAuthFrame | UpstreamMessageFrame;

// ============================================================================
// Platform -> Relay
// ============================================================================

export interface UpstreamChunkEvent {
  kind: "chunk";
  text: string;
}

export interface UpstreamCompleteEvent {
  kind: "complete";
}

export interface UpstreamConnectedEvent {
  kind: "connected";
}

export interface UpstreamTypingEvent {
  kind: "typing";
  isTyping: boolean;
}

export interface UpstreamThreadInfoEvent {
  kind: "thread_info";
  threadId: string;
}

/**
 * "agent" errors were reported by the platform; "transport" errors mean the
 * socket itself failed mid-stream.
 */
export type UpstreamErrorOrigin = "agent" | "transport";

export interface UpstreamErrorEvent {
  kind: "error";
  message: string;
  origin: UpstreamErrorOrigin;
}

/** Frame that was not a JSON object; the text is treated as content */
export interface UpstreamRawEvent {
  kind: "raw";
  text: string;
}

/** JSON frame with a type the relay does not know (e.g. cf_agent_state) */
export interface UpstreamIgnoredEvent {
  kind: "ignored";
  type: string | null;
}

export type UpstreamEvent =
  | UpstreamChunkEvent
  | UpstreamCompleteEvent
  | UpstreamConnectedEvent
  | UpstreamTypingEvent
  | UpstreamThreadInfoEvent
  | UpstreamErrorEvent
  | UpstreamRawEvent
  | UpstreamIgnoredEvent;

export type UpstreamEventKind = UpstreamEvent["kind"];

const KnownFrameSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("chunk"),
    content: z.string().nullish(),
  }),
  z.object({ type: z.literal("complete") }),
  z.object({ type: z.literal("connected") }),
  z.object({
    type: z.literal("typing"),
    isTyping: z.boolean().optional(),
  }),
  z.object({
    type: z.literal("thread_info"),
    threadId: z.string().nullish(),
  }),
  z.object({
    type: z.literal("error"),
    message: z.string().optional(),
  }),
]);

/** The platform reports failures as a truthy `error` field */
function readErrorField(frame: object): string | null {
  if (!("error" in frame) || !frame.error) return null;
  return typeof frame.error === "string"
    ? frame.error
    : JSON.stringify(frame.error);
}

/**
 * Decode one text frame from the platform.
 *
 * - a truthy `error` field wins, whatever the type
 * - recognized `type` values map to their event
 * - thread_info without an id is ignored
 * - non-JSON text becomes a `raw` event
 * - a bare JSON string becomes a `raw` event with the decoded text; other
 *   non-object JSON passes through as written
 */
export function decodeUpstreamFrame(data: string): UpstreamEvent {
  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch {
    return { kind: "raw", text: data };
  }

  if (typeof json === "string") {
    return { kind: "raw", text: json };
  }
  if (typeof json !== "object" || json === null || Array.isArray(json)) {
    // Valid JSON but not an envelope, e.g. a number or array
    return { kind: "raw", text: data };
  }

  const reportedError = readErrorField(json);
  if (reportedError !== null) {
    return { kind: "error", message: reportedError, origin: "agent" };
  }

  const known = KnownFrameSchema.safeParse(json);
  if (!known.success) {
    const type =
      "type" in json && typeof json.type === "string" ? json.type : null;
    return { kind: "ignored", type };
  }

  const frame = known.data;
  switch (frame.type) {
    case "chunk":
      return { kind: "chunk", text: frame.content ?? "" };
    case "complete":
      return { kind: "complete" };
    case "connected":
      return { kind: "connected" };
    case "typing":
      return { kind: "typing", isTyping: frame.isTyping ?? false };
    case "thread_info":
      return frame.threadId
        ? { kind: "thread_info", threadId: frame.threadId }
        : { kind: "ignored", type: "thread_info" };
    case "error":
      return {
        kind: "error",
        message: frame.message ?? "Unknown agent error",
        origin: "agent",
      };
  }
}

/** Events that end the read loop */
export function isTerminalUpstreamEvent(event: UpstreamEvent): boolean {
  return event.kind === "complete" || event.kind === "error";
}

/**
 * Format a time as the platform expects: UTC with millisecond precision,
 * e.g. 2024-05-01T12:30:45.123Z.
 */
export function formatUpstreamTimestamp(date: Date = new Date()): string {
  return date.toISOString();
}
