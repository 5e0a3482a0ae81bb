import * as path from "node:path";
import { ConfigError } from "./errors.js";
import { type LogConfig, isLogLevel } from "./logging/logger.js";

/**
 * Server configuration loaded from environment variables.
 */
export interface Config {
  /** Base URL of the agent platform, e.g. https://example.agents.dev/v1 */
  agentBaseUrl: string;
  /** Long-lived platform API key */
  apiKey: string;
  /** Interface to bind */
  host: string;
  /** Server port */
  port: number;
  /** SQLite database file */
  databasePath: string;
  /** Sessions idle this many days are deleted at startup (0 keeps all) */
  sessionRetentionDays: number;
  /** Allowed CORS origins ("*" for any) */
  corsOrigins: string[];
  /** Longest accepted user message, in characters */
  maxMessageLength: number;
  /** Token endpoint request timeout */
  tokenTimeoutMs: number;
  /** Upstream WebSocket handshake timeout */
  connectTimeoutMs: number;
  /** Upper bound on one upstream read loop */
  readTimeoutMs: number;
  logging: Partial<LogConfig>;
}

type Env = Record<string, string | undefined>;

/**
 * Load configuration from environment variables with defaults.
 * @throws ConfigError when AGENT_BASE_URL or AGENT_API_KEY is missing
 */
export function loadConfig(env: Env = process.env): Config {
  const missing = ["AGENT_BASE_URL", "AGENT_API_KEY"].filter(
    (name) => !env[name]?.trim(),
  );
  if (missing.length > 0) {
    throw new ConfigError(
      `Missing required environment variables: ${missing.join(", ")}`,
    );
  }

  const logLevel = isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : "info";

  return {
    agentBaseUrl: stripTrailingSlash(env.AGENT_BASE_URL ?? ""),
    apiKey: env.AGENT_API_KEY ?? "",
    host: env.HOST ?? "0.0.0.0",
    port: parseIntOrDefault(env.PORT, 8000),
    databasePath: env.DATABASE_PATH ?? "./agent_bridge.db",
    sessionRetentionDays: parseIntOrDefault(env.SESSION_RETENTION_DAYS, 30),
    corsOrigins: parseList(env.CORS_ORIGINS, ["*"]),
    maxMessageLength: parseIntOrDefault(env.MAX_MESSAGE_LENGTH, 4000),
    tokenTimeoutMs: parseIntOrDefault(env.TOKEN_TIMEOUT_MS, 10_000),
    connectTimeoutMs: parseIntOrDefault(env.CONNECT_TIMEOUT_MS, 15_000),
    readTimeoutMs: parseIntOrDefault(env.READ_TIMEOUT_MS, 30_000),
    logging: {
      logDir: env.LOG_DIR ?? path.resolve("logs"),
      consoleLevel: logLevel,
      fileLevel: isLogLevel(env.LOG_FILE_LEVEL) ? env.LOG_FILE_LEVEL : logLevel,
      logToFile: env.LOG_TO_FILE === "true",
      prettyPrint: env.NODE_ENV !== "production",
    },
  };
}

/**
 * Parse an integer from string or return default value.
 */
function parseIntOrDefault(
  value: string | undefined,
  defaultValue: number,
): number {
  if (!value) return defaultValue;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

function parseList(value: string | undefined, defaultValue: string[]) {
  if (!value) return defaultValue;
  const items = value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
  return items.length > 0 ? items : defaultValue;
}

function stripTrailingSlash(url: string): string {
  return url.trim().replace(/\/+$/, "");
}
