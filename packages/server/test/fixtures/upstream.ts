/**
 * In-process stand-ins for the agent platform.
 */

import type { AgentRecord, UpstreamEvent } from "@agent-bridge/shared";
import type { AgentLookup } from "../../src/upstream/AgentDirectory.js";
import type {
  StreamOptions,
  UpstreamStreamer,
} from "../../src/upstream/StreamingClient.js";

export interface StreamCall {
  instanceName: string;
  message: string;
  options?: StreamOptions;
  threadId?: string;
}

/** Upstream that replays a fixed script of events for every stream */
export class ScriptedUpstream implements UpstreamStreamer {
  calls: StreamCall[] = [];
  finished = false;

  constructor(
    private readonly events: UpstreamEvent[],
    private readonly failWith?: Error,
  ) {}

  async *stream(
    instanceName: string,
    message: string,
    options?: StreamOptions,
    threadId?: string,
  ): AsyncGenerator<UpstreamEvent> {
    this.calls.push({ instanceName, message, options, threadId });
    try {
      if (this.failWith) throw this.failWith;
      for (const event of this.events) {
        yield event;
      }
    } finally {
      this.finished = true;
    }
  }
}

/** Agent lookup over a fixed list */
export class StaticAgents implements AgentLookup {
  constructor(private readonly agents: AgentRecord[]) {}

  async listAgents(): Promise<AgentRecord[]> {
    return this.agents;
  }

  async getAgent(agentId: string): Promise<AgentRecord | null> {
    return this.agents.find((agent) => agent.id === agentId) ?? null;
  }
}
