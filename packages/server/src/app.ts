import { Hono } from "hono";
import type { ConnectionRegistry } from "./conversations/ConnectionRegistry.js";
import type { ConversationHandler } from "./conversations/ConversationHandler.js";
import type { Logger } from "./logging/logger.js";
import { createCorsMiddleware } from "./middleware/cors.js";
import { createAgentsRoutes } from "./routes/agents.js";
import {
  type ChatSocketDeps,
  createChatSocketRoutes,
} from "./routes/chat-ws.js";
import { createHealthRoutes } from "./routes/health.js";
import { createSessionsRoutes } from "./routes/sessions.js";
import type { ChatStore } from "./storage/ChatStore.js";
import type { AgentLookup } from "./upstream/AgentDirectory.js";

export interface AppOptions {
  store: ChatStore;
  agents: AgentLookup;
  connections: ConnectionRegistry;
  conversations: ConversationHandler;
  /** Allowed CORS origins ("*" for any) */
  corsOrigins: string[];
  maxMessageLength: number;
  /** WebSocket upgrader from @hono/node-ws (optional) */
  upgradeWebSocket?: ChatSocketDeps["upgradeWebSocket"];
  logger?: Logger;
}

export function createApp(options: AppOptions): Hono {
  const app = new Hono();

  app.use("*", createCorsMiddleware(options.corsOrigins));

  app.route("/health", createHealthRoutes(options.connections));
  app.route("/agents", createAgentsRoutes(options.agents));
  app.route(
    "/sessions",
    createSessionsRoutes({ store: options.store, agents: options.agents }),
  );

  // Client WebSocket (one per browser tab per conversation)
  if (options.upgradeWebSocket) {
    app.route(
      "/",
      createChatSocketRoutes({
        upgradeWebSocket: options.upgradeWebSocket,
        store: options.store,
        connections: options.connections,
        conversations: options.conversations,
        maxMessageLength: options.maxMessageLength,
        logger: options.logger,
      }),
    );
  }

  return app;
}
