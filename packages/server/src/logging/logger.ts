import * as fs from "node:fs";
import * as path from "node:path";
import pino from "pino";

/**
 * Valid log levels.
 */
export const LOG_LEVELS = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type Logger = pino.Logger;

export interface LogConfig {
  /** Directory for log files. Default: ./logs */
  logDir: string;
  /** Log filename. Default: agent-bridge.log */
  logFile: string;
  /** Minimum log level for console. Default: info */
  consoleLevel: LogLevel;
  /** Minimum log level for file. Default: same as console */
  fileLevel: LogLevel;
  /** Also log to console. Default: true */
  logToConsole: boolean;
  /** Log to file. Default: false */
  logToFile: boolean;
  /** Use pretty printing for console. Default: true in dev */
  prettyPrint: boolean;
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value ?? "");
}

const envLevel = isLogLevel(process.env.LOG_LEVEL)
  ? process.env.LOG_LEVEL
  : "info";

const defaultConfig: LogConfig = {
  logDir: path.resolve("logs"),
  logFile: "agent-bridge.log",
  consoleLevel: envLevel,
  fileLevel: isLogLevel(process.env.LOG_FILE_LEVEL)
    ? process.env.LOG_FILE_LEVEL
    : envLevel,
  logToConsole: true,
  logToFile: false,
  prettyPrint: process.env.NODE_ENV !== "production",
};

/**
 * Initialize the logger with the given configuration.
 * This should be called once at server startup.
 */
export function initLogger(config: Partial<LogConfig> = {}): pino.Logger {
  const finalConfig = { ...defaultConfig, ...config };

  // Ensure log directory exists
  if (finalConfig.logToFile) {
    fs.mkdirSync(finalConfig.logDir, { recursive: true });
  }

  const streams: pino.StreamEntry[] = [];
  const { consoleLevel, fileLevel } = finalConfig;

  // Console stream
  if (finalConfig.logToConsole && consoleLevel !== "silent") {
    if (finalConfig.prettyPrint) {
      const pretty = pino.transport({
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss",
          ignore: "pid,hostname",
        },
      });
      streams.push({ stream: pretty, level: consoleLevel });
    } else {
      streams.push({ stream: process.stdout, level: consoleLevel });
    }
  }

  // File stream
  if (finalConfig.logToFile && fileLevel !== "silent") {
    const logPath = path.join(finalConfig.logDir, finalConfig.logFile);
    const fileStream = fs.createWriteStream(logPath, { flags: "a" });
    streams.push({ stream: fileStream, level: fileLevel });
  }

  // pino needs base level <= stream levels
  const minLevel = getMinLevel(consoleLevel, fileLevel);

  if (streams.length === 0) {
    return pino({ level: "silent" });
  }
  if (streams.length === 1 && streams[0]) {
    return pino({ level: streams[0].level }, streams[0].stream);
  }
  return pino({ level: minLevel }, pino.multistream(streams));
}

/**
 * Get the minimum (most verbose) of two log levels.
 */
function getMinLevel(a: LogLevel, b: LogLevel): LogLevel {
  const order: Record<LogLevel, number> = {
    trace: 0,
    debug: 1,
    info: 2,
    warn: 3,
    error: 4,
    fatal: 5,
    silent: 6,
  };
  return order[a] <= order[b] ? a : b;
}

/**
 * A logger that drops everything. Used as the default in tests and for
 * components constructed without an explicit logger.
 */
export function createSilentLogger(): pino.Logger {
  return pino({ level: "silent" });
}

/**
 * Shorten a credential for log output.
 */
export function redactToken(token: string): string {
  return token.length <= 8 ? "***" : `${token.slice(0, 8)}…`;
}
