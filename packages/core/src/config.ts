/**
 * Unified Configuration System
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: BINTRACE_* (highest priority, for CI overrides)
 * 2. Config files: .bintracerc, bintrace.config.js, a "bintrace" key in package.json
 * 3. Programmatic: config.set() calls
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@bintrace/core";
 *
 * config.get<boolean>("verbose")   // → render raw classifier entries?
 * config.set({ debug: true });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { createLogger } from "./logger.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Full bintrace configuration schema.
 */
export interface BintraceConfig {
  /** Emit debug lines from the logger */
  debug?: boolean;
  /** Render raw classifier entries (Tag, Eof, ...) in trace reports */
  verbose?: boolean;
  /** Custom user configuration */
  [key: string]: unknown;
}

// ============================================================================
// Global State
// ============================================================================

let configStore: Record<string, unknown> = {};
let configLoaded = false;

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 * Variables prefixed with BINTRACE_ are parsed into the config object.
 *
 * Examples:
 *   BINTRACE_DEBUG=1            → { debug: true }
 *   BINTRACE_RENDER__WIDTH=16   → { render: { width: 16 } }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};
  const PREFIX = "BINTRACE_";

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    const configPath = key
      .slice(PREFIX.length)
      .toLowerCase()
      .replace(/__/g, ".")
      .replace(/_/g, ".");

    setNestedValue(envConfig, configPath, parseEnvValue(value));
  }

  return envConfig;
}

function parseEnvValue(value: string): unknown {
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false" || value === "") return false;
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  return value;
}

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current: Record<string, unknown> = obj;

  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Get a nested value using dot notation.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;

  for (const part of path.split(".")) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

// ============================================================================
// Config File Loading
// ============================================================================

const MODULE_NAME = "bintrace";

function loadConfigFromFiles(): Record<string, unknown> {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `.${MODULE_NAME}rc.js`,
      `.${MODULE_NAME}rc.cjs`,
      `${MODULE_NAME}.config.js`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });

  try {
    const result = explorer.search();
    if (result === null || result.isEmpty) return {};
    const loaded: unknown = result.config;
    if (!isRecord(loaded)) {
      createLogger("config").warn(`Ignoring ${result.filepath}: expected an object`);
      return {};
    }
    return loaded;
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    createLogger("config").warn(`Failed to load config file: ${reason}`);
    return {};
  }
}

// ============================================================================
// Config Initialization
// ============================================================================

const DEFAULTS: BintraceConfig = {
  debug: false,
  verbose: false,
};

function initializeConfig(): void {
  if (configLoaded) return;

  // Flag first: a failing file load logs, and the logger reads config.
  configLoaded = true;
  configStore = { ...DEFAULTS };

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv();

  // Merge: defaults < fileConfig < envConfig
  configStore = deepMerge(deepMerge(DEFAULTS, fileConfig), envConfig);
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path. The caller names the expected type;
 * values from files and env vars are not checked against it.
 */
function get<T = unknown>(path: string): T | undefined {
  initializeConfig();
  return getNestedValue(configStore, path) as T | undefined;
}

/**
 * Set configuration values programmatically.
 */
function set(values: Partial<BintraceConfig>): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

function getAll(): Readonly<Record<string, unknown>> {
  initializeConfig();
  return configStore;
}

/**
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
}

/**
 * Unified configuration API.
 */
export const config = {
  get,
  set,
  has,
  getAll,
  reset,
} as const;

/**
 * Identity helper for typed config files (`bintrace.config.js`).
 */
export function defineConfig(values: BintraceConfig): BintraceConfig {
  return values;
}

export { loadConfigFromEnv };
