import type { AgentRecord, ChatMessage } from "@agent-bridge/shared";
import { z } from "zod";
import type { ContextMessage } from "../upstream/StreamingClient.js";

export const DEFAULT_SYSTEM_PROMPT = "You are a helpful AI assistant.";

/** How many prior messages are passed along with the new one */
export const CONTEXT_WINDOW = 10;

export interface ModelSettings {
  model: string;
  temperature: number;
  maxTokens: number;
}

export const DEFAULT_MODEL_SETTINGS: Readonly<ModelSettings> = {
  model: "gpt-4o-mini",
  temperature: 0.7,
  maxTokens: 2000,
};

// Fields with the wrong type are dropped rather than failing the whole object
const ModelSettingsSchema = z.object({
  model: z.string().optional().catch(undefined),
  temperature: z.number().optional().catch(undefined),
  max_tokens: z.number().int().positive().optional().catch(undefined),
});

/**
 * Overlay an agent's JSON model settings on the defaults.
 * Missing, malformed or non-object JSON gives the defaults.
 */
export function parseModelSettings(
  raw: string | null | undefined,
): ModelSettings {
  const defaults = { ...DEFAULT_MODEL_SETTINGS };
  if (!raw) return defaults;

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return defaults;
  }

  const parsed = ModelSettingsSchema.safeParse(json);
  if (!parsed.success) return defaults;

  return {
    model: parsed.data.model ?? defaults.model,
    temperature: parsed.data.temperature ?? defaults.temperature,
    maxTokens: parsed.data.max_tokens ?? defaults.maxTokens,
  };
}

/** Instance name for buffered replies: the username, then the id */
export function resolveInstanceName(agent: AgentRecord): string {
  return agent.username || agent.id || "default";
}

/** Instance name for streamed replies, which are routed by agent id */
export function resolveStreamingInstanceName(agent: AgentRecord): string {
  return agent.id || "default";
}

export function resolveSystemPrompt(agent: AgentRecord): string {
  return (
    agent.persona_instructions || agent.instructions || DEFAULT_SYSTEM_PROMPT
  );
}

/**
 * System prompt, the most recent {@link CONTEXT_WINDOW} messages of
 * history, then the new user message.
 */
export function buildConversation(
  agent: AgentRecord,
  history: readonly ChatMessage[],
  message: string,
): ContextMessage[] {
  return [
    { role: "system", content: resolveSystemPrompt(agent) },
    ...history.slice(-CONTEXT_WINDOW).map(
      (entry): ContextMessage => ({
        role: entry.role,
        content: entry.content,
      }),
    ),
    { role: "user", content: message },
  ];
}
