import { serve } from "@hono/node-server";
import { createNodeWebSocket } from "@hono/node-ws";
import { Hono } from "hono";
import { createApp } from "./app.js";
import { type Config, loadConfig } from "./config.js";
import { ConnectionRegistry } from "./conversations/ConnectionRegistry.js";
import { ConversationHandler } from "./conversations/ConversationHandler.js";
import { ConfigError } from "./errors.js";
import { initLogger } from "./logging/logger.js";
import { RelayAggregator } from "./relay/RelayAggregator.js";
import { SqliteChatStore } from "./storage/SqliteChatStore.js";
import { createDb } from "./storage/db.js";
import { AgentDirectory } from "./upstream/AgentDirectory.js";
import { StreamingClient } from "./upstream/StreamingClient.js";
import { TokenProvider } from "./upstream/TokenProvider.js";

let config: Config;
try {
  config = loadConfig();
} catch (error) {
  if (error instanceof ConfigError) {
    console.error(`Configuration error: ${error.message}`);
    process.exit(1);
  }
  throw error;
}

const logger = initLogger(config.logging);

logger.info(
  {
    agentBaseUrl: config.agentBaseUrl,
    port: config.port,
    databasePath: config.databasePath,
  },
  "Starting agent bridge",
);

// Storage
const store = new SqliteChatStore(createDb(config.databasePath));
if (config.sessionRetentionDays > 0) {
  const removed = store.cleanupOldSessions(config.sessionRetentionDays);
  if (removed > 0) {
    logger.info({ count: removed }, "Removed idle sessions");
  }
}

// Agent platform
const tokens = new TokenProvider({
  baseUrl: config.agentBaseUrl,
  apiKey: config.apiKey,
  timeoutMs: config.tokenTimeoutMs,
  logger,
});
const streaming = new StreamingClient({
  baseUrl: config.agentBaseUrl,
  tokens,
  connectTimeoutMs: config.connectTimeoutMs,
  readTimeoutMs: config.readTimeoutMs,
  logger,
});
const agents = new AgentDirectory({
  baseUrl: config.agentBaseUrl,
  apiKey: config.apiKey,
  logger,
});

// Conversations
const connections = new ConnectionRegistry(logger);
const conversations = new ConversationHandler({
  store,
  agents,
  relay: new RelayAggregator({ upstream: streaming, logger }),
  connections,
  logger,
});

// createNodeWebSocket handles upgrades through the app it is given, so the
// API is mounted under that same root app
const root = new Hono();
const { injectWebSocket, upgradeWebSocket } = createNodeWebSocket({
  app: root,
});
root.route(
  "/",
  createApp({
    store,
    agents,
    connections,
    conversations,
    corsOrigins: config.corsOrigins,
    maxMessageLength: config.maxMessageLength,
    upgradeWebSocket,
    logger,
  }),
);

const server = serve(
  { fetch: root.fetch, port: config.port, hostname: config.host },
  (info) => {
    logger.info(
      { port: info.port },
      `Agent bridge listening on http://${config.host}:${info.port}`,
    );
  },
);
injectWebSocket(server);

agents
  .validateConnection()
  .then((ok) => {
    if (ok) {
      logger.info("Agent platform reachable");
    } else {
      logger.warn("Agent platform not reachable, relays will fail until it is");
    }
  })
  .catch((error: unknown) => {
    logger.warn({ err: error }, "Agent platform check failed");
  });

// Graceful shutdown
let shuttingDown = false;
function shutdown() {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info("Shutting down agent bridge...");

  connections.closeAll(1001, "Server shutting down");
  streaming.close();
  store.close();

  // Give connections a moment to close gracefully, then force exit
  const forceExitTimeout = setTimeout(() => {
    logger.warn("Force exiting after timeout");
    process.exit(0);
  }, 2000);

  server.close(() => {
    clearTimeout(forceExitTimeout);
    logger.info("Agent bridge stopped");
    process.exit(0);
  });
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
