/**
 * Scoped diagnostic logger.
 *
 * Lines are prefixed with `[bintrace:<scope>]` and go to stderr by default,
 * the same stream reports are printed on. `debug` lines are dropped unless
 * the `debug` config flag is set (`BINTRACE_DEBUG=1`).
 */

import { config } from "./config.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  /** Custom writer function (default: console.error) */
  writer?: (line: string) => void;
  /** Overrides the `debug` config flag for this logger */
  debug?: boolean;
}

export interface Logger {
  readonly scope: string;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function formatLogLine(scope: string, level: LogLevel, message: string): string {
  const tag = level === "info" ? "" : ` ${level}`;
  return `[bintrace:${scope}]${tag} ${message}`;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const writer = options.writer ?? ((line: string) => console.error(line));
  const debugEnabled = (): boolean => options.debug ?? config.has("debug");

  const emit = (level: LogLevel, message: string): void => {
    writer(formatLogLine(scope, level, message));
  };

  return {
    scope,
    debug(message) {
      if (debugEnabled()) emit("debug", message);
    },
    info(message) {
      emit("info", message);
    },
    warn(message) {
      emit("warn", message);
    },
    error(message) {
      emit("error", message);
    },
  };
}
