import type { AgentRecord, ApiResponse } from "@agent-bridge/shared";
import { Hono } from "hono";
import type { AgentLookup } from "../upstream/AgentDirectory.js";

export function createAgentsRoutes(agents: AgentLookup): Hono {
  const routes = new Hono();

  // GET /agents - Agents available on the platform
  routes.get("/", async (c) => {
    const response: ApiResponse<{ agents: AgentRecord[] }> = {
      success: true,
      data: { agents: await agents.listAgents() },
    };
    return c.json(response);
  });

  return routes;
}
