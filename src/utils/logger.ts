/**
 * Logger Module
 * Structured logging using pino: pretty console output in development, JSON otherwise
 */

import pino, { type Logger as PinoLogger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

export interface LoggerOptions {
  level?: LogLevel;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isDevelopment(): boolean {
  return process.env.NODE_ENV !== "production";
}

/**
 * Get log level from environment or default
 */
function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return isDevelopment() ? "debug" : "info";
}

/**
 * Create a logger instance for a specific component
 *
 * @param component - The component name (e.g., "dispatcher", "hybrid-search", "codeql-cli")
 *
 * @example
 * ```typescript
 * const logger = createLogger("dispatcher");
 * logger.warn({ businessArea }, "No sources configured");
 * logger.error({ err }, "Retriever failed");
 * ```
 */
export function createLogger(component: string, options: LoggerOptions = {}): PinoLogger {
  const { level = getLogLevel() } = options;

  const baseOptions: pino.LoggerOptions = {
    name: component,
    level,
  };

  if (isDevelopment()) {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
        },
      },
    });
  }

  return pino(baseOptions);
}

export type Logger = PinoLogger;
