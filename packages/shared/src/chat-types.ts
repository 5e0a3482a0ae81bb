/**
 * Chat domain types shared between the relay server and browser clients.
 *
 * Field names are snake_case on the wire, like the `message_id` payloads of
 * the envelope protocol.
 */

/** Who authored a stored message */
export type MessageRole = "user" | "assistant";

/** A conversation bound to one upstream agent */
export interface ChatSession {
  id: string;
  agent_id: string;
  created_at: string;
  updated_at: string;
}

/** A session as listed by the sessions endpoint */
export interface ChatSessionSummary extends ChatSession {
  /** Most recent message content (up to 100 chars), or "New chat" */
  preview: string;
}

/** A single stored message */
export interface ChatMessage {
  id: string;
  session_id: string;
  role: MessageRole;
  content: string;
  created_at: string;
}

/**
 * Agent record as returned by the agent platform.
 *
 * The platform owns this shape; only the fields the relay reads are typed,
 * everything else passes through to clients untouched.
 */
export interface AgentRecord {
  id: string;
  username?: string;
  name?: string;
  instructions?: string;
  persona_instructions?: string;
  /** JSON-encoded model settings, e.g. {"model":"gpt-4o","temperature":0.2} */
  model_settings?: string;
  [key: string]: unknown;
}

/** Standard envelope for HTTP responses */
export interface ApiResponse<T = Record<string, unknown>> {
  success: boolean;
  data?: T;
  error?: string;
}
