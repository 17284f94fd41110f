/**
 * Logger Module
 * Structured logging using pino; output goes to stderr
 */

import pino, { type Logger as PinoLogger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
}

const VALID_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function isDevelopment(): boolean {
  return process.env.NODE_ENV === "development";
}

function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.some((level) => level === value);
}

/**
 * Get log level from environment or default.
 * Test runs stay silent unless LOG_LEVEL asks otherwise.
 */
function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  if (process.env.NODE_ENV === "test") {
    return "silent";
  }
  return isDevelopment() ? "debug" : "warn";
}

/**
 * Create a logger instance for a specific component
 *
 * @param component - The component name (e.g., "graph-builder", "reconciler", "cli")
 *
 * @example
 * ```typescript
 * const logger = createLogger("graph-builder");
 * logger.debug({ path: "Agent.spec" }, "Synthesizing composite");
 * logger.error({ err }, "Analysis failed");
 * ```
 */
export function createLogger(
  component: string,
  options: LoggerOptions = {}
): PinoLogger {
  const { level = getLogLevel() } = options;

  const baseOptions: pino.LoggerOptions = {
    name: component,
    level,
  };

  // Pretty output goes to stderr so that generated output on stdout stays clean
  if (isDevelopment() && level !== "silent") {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    });
  }

  return pino(baseOptions, pino.destination(2));
}

/**
 * Logger type export for use in type annotations
 */
export type Logger = PinoLogger;
