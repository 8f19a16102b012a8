// src/observability/index.ts
// Central export point for observability.

export {
  createLogger,
  createChildLogger,
  getLogLevel,
  isPrettyEnabled,
  type LogLevel,
} from "./logger.js";
