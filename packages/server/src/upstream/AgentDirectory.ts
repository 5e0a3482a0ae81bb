import type { AgentRecord } from "@agent-bridge/shared";
import { errorMessage } from "../errors.js";
import { type Logger, createSilentLogger } from "../logging/logger.js";
import { platformHeaders } from "./http.js";

/** Keys under which platforms have been seen to nest the agent list */
const LIST_KEYS = ["agents", "data", "results"] as const;

/** Where the relay looks agents up */
export interface AgentLookup {
  listAgents(): Promise<AgentRecord[]>;
  getAgent(agentId: string): Promise<AgentRecord | null>;
}

export interface AgentDirectoryOptions {
  baseUrl: string;
  apiKey: string;
  /** Timeout for list requests (default: 10000) */
  timeoutMs?: number;
  /** Timeout for the startup connectivity check (default: 5000) */
  validateTimeoutMs?: number;
  logger?: Logger;
}

function isAgentRecord(value: unknown): value is AgentRecord {
  return (
    typeof value === "object" &&
    value !== null &&
    "id" in value &&
    typeof value.id === "string"
  );
}

/**
 * Pull the agent array out of a list response. Accepts a bare array or an
 * object with the array under one of {@link LIST_KEYS}.
 */
export function extractAgentList(body: unknown): AgentRecord[] {
  let list: unknown = body;
  if (!Array.isArray(body) && typeof body === "object" && body !== null) {
    const record: Record<string, unknown> = { ...body };
    const key = LIST_KEYS.find((k) => k in record);
    list = key ? record[key] : undefined;
  }
  return Array.isArray(list) ? list.filter(isAgentRecord) : [];
}

/**
 * Read-only view of the agents configured on the platform.
 */
export class AgentDirectory implements AgentLookup {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly validateTimeoutMs: number;
  private readonly logger: Logger;

  constructor(options: AgentDirectoryOptions) {
    this.baseUrl = options.baseUrl;
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.validateTimeoutMs = options.validateTimeoutMs ?? 5_000;
    this.logger = (options.logger ?? createSilentLogger()).child({
      component: "agent-directory",
    });
  }

  /**
   * All agents, or an empty list when the platform can't be reached.
   */
  async listAgents(): Promise<AgentRecord[]> {
    try {
      const response = await fetch(`${this.baseUrl}/agents`, {
        headers: platformHeaders(this.apiKey),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        this.logger.error(
          { status: response.status },
          "Failed to list agents",
        );
        return [];
      }
      const agents = extractAgentList(await response.json());
      this.logger.debug({ count: agents.length }, "Listed agents");
      return agents;
    } catch (error) {
      this.logger.error({ err: errorMessage(error) }, "Failed to list agents");
      return [];
    }
  }

  async getAgent(agentId: string): Promise<AgentRecord | null> {
    const agents = await this.listAgents();
    return agents.find((agent) => agent.id === agentId) ?? null;
  }

  /**
   * Whether the platform answers an authenticated list request.
   */
  async validateConnection(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/agents`, {
        headers: platformHeaders(this.apiKey),
        signal: AbortSignal.timeout(this.validateTimeoutMs),
      });
      return response.status === 200;
    } catch (error) {
      this.logger.warn(
        { err: errorMessage(error) },
        "Platform connectivity check failed",
      );
      return false;
    }
  }
}
