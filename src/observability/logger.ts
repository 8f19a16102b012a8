// src/observability/logger.ts
// Structured JSON logging
//
// Configures Pino with:
// - Environment-based log levels
// - JSON output by default
// - Pretty printing for local runs
// - Module-scoped child loggers

import pino, { type Logger } from "pino";

/* ---------- Types ---------- */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const VALID_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.some(l => l === value);
}

/* ---------- Configuration ---------- */

/**
 * Get the configured log level from environment.
 * Defaults to 'info'.
 */
export function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();

  if (level && isLogLevel(level)) {
    return level;
  }

  return "info";
}

/**
 * Check if pretty printing is enabled
 */
export function isPrettyEnabled(): boolean {
  return process.env.LOG_PRETTY === "true";
}

/* ---------- Logger Factory ---------- */

// Root logger instance (singleton)
let rootLogger: Logger | null = null;

function getRootLogger(): Logger {
  if (!rootLogger) {
    const options: pino.LoggerOptions = {
      level: getLogLevel(),
      base: {
        service: "seedbed",
        version: process.env.npm_package_version || "unknown",
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    };

    if (isPrettyEnabled()) {
      rootLogger = pino({
        ...options,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        },
      });
    } else {
      rootLogger = pino(options);
    }
  }

  return rootLogger;
}

/**
 * Create a logger instance, optionally scoped to a module
 *
 * @example
 * const log = createLogger('fixtures');
 * log.info({ fixture }, 'Fixture loaded');
 */
export function createLogger(moduleName?: string): Logger {
  const root = getRootLogger();

  if (moduleName) {
    return root.child({ module: moduleName });
  }

  return root;
}

/**
 * Create a child logger with additional context
 *
 * @example
 * const loadLog = createChildLogger(log, { fixture: 'demo-data.yml' });
 */
export function createChildLogger(
  parent: Logger,
  bindings: Record<string, unknown>
): Logger {
  return parent.child(bindings);
}
