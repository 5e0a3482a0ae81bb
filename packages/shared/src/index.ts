export type {
  AgentRecord,
  ApiResponse,
  ChatMessage,
  ChatSession,
  ChatSessionSummary,
  MessageRole,
} from "./chat-types.js";

export type {
  AiChunkEnvelope,
  AiCompleteEnvelope,
  ClientEnvelope,
  ClientEnvelopeType,
  ClientRequest,
  ClientRequestParseResult,
  ErrorEnvelope,
  HistoryEnvelope,
  PingRequest,
  PongEnvelope,
  ServerEnvelope,
  ServerEnvelopeType,
  ServerPayload,
  ThreadInfoEnvelope,
  TypingEnvelope,
  UserMessageEnvelope,
  UserMessageRequest,
} from "./chat-protocol.js";
export {
  ClientRequestSchema,
  createEnvelope,
  encodeEnvelope,
  isUserMessageRequest,
  parseClientRequest,
} from "./chat-protocol.js";

export type {
  UpstreamAuthFrame,
  UpstreamChunkEvent,
  UpstreamClientFrame,
  UpstreamCompleteEvent,
  UpstreamConnectedEvent,
  UpstreamErrorEvent,
  UpstreamErrorOrigin,
  UpstreamEvent,
  UpstreamEventKind,
  UpstreamIgnoredEvent,
  UpstreamMessageFrame,
  UpstreamRawEvent,
  UpstreamThreadInfoEvent,
  UpstreamTypingEvent,
} from "./upstream-protocol.js";
export {
  decodeUpstreamFrame,
  formatUpstreamTimestamp,
  isTerminalUpstreamEvent,
} from "./upstream-protocol.js";
