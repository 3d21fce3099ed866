/**
 * Core module exports for @bintrace/core
 *
 * This package provides:
 * - Layered configuration (defaults, config file, BINTRACE_* env vars)
 * - A scoped stderr logger
 * - Runtime safety primitives (invariant, unreachable)
 */

// Configuration System
export { config, defineConfig, loadConfigFromEnv, type BintraceConfig } from "./config.js";

// Logging
export {
  createLogger,
  formatLogLine,
  type Logger,
  type LoggerOptions,
  type LogLevel,
} from "./logger.js";

// Runtime Safety Primitives
export { invariant, unreachable } from "./safety.js";
