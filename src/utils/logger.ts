/**
 * Logger Module
 * Structured logging using pino, written to stderr so stdout stays free for
 * prompts and command output.
 */

import pino, { type Logger as PinoLogger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
}

const VALID_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

let levelOverride: LogLevel | null = null;

function isTest(): boolean {
  return process.env.NODE_ENV === "test" || process.env.VITEST !== undefined;
}

/**
 * Determine if we're in development mode
 */
function isDevelopment(): boolean {
  return process.env.NODE_ENV === "development";
}

function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.some((level) => level === value);
}

/**
 * Get log level from override, environment or default
 */
function getLogLevel(): LogLevel {
  if (levelOverride) return levelOverride;
  if (isTest()) return "silent";

  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  // the CLI's own output goes to stdout; below warn, logs would interleave with it
  return isDevelopment() ? "debug" : "warn";
}

const loggers = new Set<PinoLogger>();

/**
 * Create a logger instance for a specific component
 *
 * @param component - The component name (e.g., "transport", "uploader")
 *
 * @example
 * ```typescript
 * const logger = createLogger("uploader");
 * logger.info({ kind: "gamepass", id: 42 }, "Updated product");
 * logger.error({ err }, "Failed to create product");
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

  let logger: PinoLogger;
  if (isTest()) {
    logger = pino(baseOptions);
  } else if (isDevelopment()) {
    try {
      logger = pino({
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
    } catch {
      // Fall back to standard pino if pino-pretty not available
      logger = pino(baseOptions, pino.destination(2));
    }
  } else {
    logger = pino(baseOptions, pino.destination(2));
  }

  loggers.add(logger);
  return logger;
}

/**
 * Changes the level of every logger created so far and of those created later.
 */
export function setLogLevel(level: LogLevel): void {
  levelOverride = level;
  for (const logger of loggers) {
    logger.level = level;
  }
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(
  parent: PinoLogger,
  bindings: Record<string, unknown>
): PinoLogger {
  return parent.child(bindings);
}

/**
 * Logger type export for use in type annotations
 */
export type Logger = PinoLogger;
