import { getLogLevel, type LogLevel } from "./config.js";

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  context?: string;
  data?: Record<string, unknown>;
  error?: Error;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: Error, data?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  context?: string;
  handler?: (entry: LogEntry) => void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// stdout belongs to command output and the MCP stdio transport
function defaultLogHandler(entry: LogEntry): void {
  const prefix = entry.context ? `[${entry.context}]` : "";
  const timestamp = new Date(entry.timestamp).toISOString();
  const data = entry.data ? ` ${JSON.stringify(entry.data)}` : "";
  const error = entry.error ? ` ${entry.error.message}` : "";
  console.error(`${timestamp} ${entry.level.toUpperCase()}${prefix} ${entry.message}${data}${error}`);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = getLogLevel(), context, handler = defaultLogHandler } = options;
  const minPriority = LOG_LEVEL_PRIORITY[level];

  function log(logLevel: LogLevel, message: string, data?: Record<string, unknown>, error?: Error): void {
    if (LOG_LEVEL_PRIORITY[logLevel] < minPriority) return;
    handler({ level: logLevel, message, timestamp: Date.now(), context, data, error });
  }

  return {
    debug: (message, data) => log("debug", message, data),
    info: (message, data) => log("info", message, data),
    warn: (message, data) => log("warn", message, data),
    error: (message, error, data) => log("error", message, data, error),
  };
}

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
