import { type WriteStream, createWriteStream, existsSync, mkdirSync } from "node:fs";
import { join } from "node:path";

import { config } from "../config";

import { type LogLevel, isLevelEnabled } from "./schema";

export interface LoggerConfig {
  level: LogLevel;
  /** Extra sink that receives every emitted line, e.g. a log file */
  stream?: NodeJS.WritableStream;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

const createLogEntry = (
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>,
  error?: Error,
): LogEntry => {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...(context && { context }),
    ...(error && {
      error: {
        name: error.name,
        message: error.message,
        ...(error.stack && { stack: error.stack }),
      },
    }),
  };
  return entry;
};

const formatLog = (entry: LogEntry): string => {
  if (config.server.nodeEnv === "development") {
    return `${entry.timestamp} [${entry.level.toUpperCase()}] ${entry.message}${
      entry.context ? ` ${JSON.stringify(entry.context)}` : ""
    }${entry.error ? ` ${entry.error.name}: ${entry.error.message}` : ""}`;
  }
  return JSON.stringify(entry);
};

export interface Logger {
  debug: (message: string, context?: Record<string, unknown>) => void;
  info: (message: string, context?: Record<string, unknown>) => void;
  warn: (message: string, context?: Record<string, unknown>) => void;
  error: (message: string, error?: Error, context?: Record<string, unknown>) => void;
}

export const createLogger = (
  loggerConfig: LoggerConfig = { level: config.logging.level },
): Logger => {
  const emit = (line: string, write: (line: string) => void): void => {
    write(line);
    loggerConfig.stream?.write(`${line}\n`);
  };

  return {
    debug: (message: string, context?: Record<string, unknown>): void => {
      if (isLevelEnabled("debug", loggerConfig.level)) {
        emit(formatLog(createLogEntry("debug", message, context)), console.log);
      }
    },

    info: (message: string, context?: Record<string, unknown>): void => {
      if (isLevelEnabled("info", loggerConfig.level)) {
        emit(formatLog(createLogEntry("info", message, context)), console.log);
      }
    },

    warn: (message: string, context?: Record<string, unknown>): void => {
      if (isLevelEnabled("warn", loggerConfig.level)) {
        emit(formatLog(createLogEntry("warn", message, context)), console.warn);
      }
    },

    error: (message: string, error?: Error, context?: Record<string, unknown>): void => {
      if (isLevelEnabled("error", loggerConfig.level)) {
        emit(formatLog(createLogEntry("error", message, context, error)), console.error);
      }
    },
  };
};

const LOG_DIR = "logs";

/**
 * Opens an append-mode log file named `<prefix>-<epoch ms>.log` under `logs/`.
 */
export const createLogFileStream = (prefix = "app"): WriteStream => {
  if (!existsSync(LOG_DIR)) {
    mkdirSync(LOG_DIR, { recursive: true });
  }

  const logFile = join(LOG_DIR, `${prefix}-${Date.now()}.log`);
  return createWriteStream(logFile, { flags: "a" });
};
