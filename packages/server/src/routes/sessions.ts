import type {
  ApiResponse,
  ChatMessage,
  ChatSessionSummary,
} from "@agent-bridge/shared";
import { Hono } from "hono";
import { z } from "zod";
import type { ChatStore } from "../storage/ChatStore.js";
import type { AgentLookup } from "../upstream/AgentDirectory.js";

/** Characters of the latest message shown in a session listing */
export const PREVIEW_LENGTH = 100;

export const DEFAULT_MESSAGE_LIMIT = 50;

const CreateSessionBodySchema = z.object({
  agent_id: z.string().min(1),
});

export interface SessionsDeps {
  store: ChatStore;
  agents: AgentLookup;
}

function parseLimit(value: string | undefined): number {
  const parsed = value ? Number.parseInt(value, 10) : Number.NaN;
  return Number.isNaN(parsed) || parsed < 1 ? DEFAULT_MESSAGE_LIMIT : parsed;
}

export function createSessionsRoutes(deps: SessionsDeps): Hono {
  const routes = new Hono();

  // POST /sessions - Start a conversation with an agent
  routes.post("/", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ success: false, error: "Invalid JSON body" }, 400);
    }

    const parsed = CreateSessionBodySchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ success: false, error: "agent_id is required" }, 400);
    }

    const agent = await deps.agents.getAgent(parsed.data.agent_id);
    if (!agent) {
      return c.json({ success: false, error: "Agent not found" }, 404);
    }

    const session = deps.store.createSession(agent.id);
    return c.json({
      success: true,
      data: { session, agent, websocket_url: `/ws/${session.id}` },
    });
  });

  // GET /sessions - All sessions, most recently active first
  routes.get("/", (c) => {
    const sessions: ChatSessionSummary[] = deps.store
      .getAllSessions()
      .map((session) => {
        const [latest] = deps.store.getMessages(session.id, 1);
        return {
          ...session,
          preview: latest
            ? latest.content.slice(0, PREVIEW_LENGTH)
            : "New chat",
        };
      });
    const response: ApiResponse<{ sessions: ChatSessionSummary[] }> = {
      success: true,
      data: { sessions },
    };
    return c.json(response);
  });

  // GET /sessions/:sessionId/messages - Recent messages, oldest first
  routes.get("/:sessionId/messages", (c) => {
    const sessionId = c.req.param("sessionId");
    const limit = parseLimit(c.req.query("limit"));
    const messages = deps.store.getMessages(sessionId, limit);
    const response: ApiResponse<{ messages: ChatMessage[] }> = {
      success: true,
      data: { messages },
    };
    return c.json(response);
  });

  // DELETE /sessions/:sessionId - Remove a session and its messages
  routes.delete("/:sessionId", (c) => {
    const sessionId = c.req.param("sessionId");
    if (!deps.store.deleteSession(sessionId)) {
      return c.json({ success: false, error: "Session not found" }, 404);
    }
    return c.json({ success: true });
  });

  return routes;
}
