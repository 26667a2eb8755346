/**
 * Unified Configuration System
 *
 * Provides a centralized configuration API for seqlist packages.
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: SEQLIST_* (for CI overrides)
 * 3. Config files: package.json#seqlist, .seqlistrc, seqlist.config.js, etc.
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@seqlist/core";
 *
 * config.get("debug")                    // → boolean
 * config.set({ debug: true });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/**
 * Debug logging options.
 */
export interface LogConfig {
  /** Prefix written before every debug line */
  prefix?: string;
}

/**
 * Full seqlist configuration schema.
 */
export interface SeqlistConfig {
  /** Enable debug logging */
  debug?: boolean;
  /** Debug logging options */
  log?: LogConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

// ============================================================================
// Global State
// ============================================================================

let configStore: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;

const DEFAULTS: SeqlistConfig = {
  debug: false,
  log: {
    prefix: "[seqlist]",
  },
};

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_PREFIX = "SEQLIST_";

/**
 * Load configuration from environment variables.
 * Variables prefixed with SEQLIST_ are parsed into the config object.
 *
 * Examples:
 *   SEQLIST_DEBUG=1                → { debug: true }
 *   SEQLIST_LOG_PREFIX=list        → { log: { prefix: "list" } }
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): SeqlistConfig {
  const envConfig: SeqlistConfig = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    // Double underscore and single underscore both become nested separators
    const configPath = key
      .slice(ENV_PREFIX.length)
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
function setNestedValue(
  obj: Record<string, unknown>,
  path: string,
  value: unknown,
): void {
  const parts = path.split(".");
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
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
 * Copy a record, nested records included.
 */
function cloneRecord(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    result[key] = isRecord(value) ? cloneRecord(value) : value;
  }
  return result;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
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

const MODULE_NAME = "seqlist";

/**
 * Load configuration from the first config file found in the working directory.
 *
 * A file that cannot be read or parsed is reported with `console.warn` and
 * contributes nothing, so reading configuration never throws.
 */
function loadConfigFromFiles(): Record<string, unknown> {
  try {
    return searchConfigFile();
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    console.warn(`${MODULE_NAME}: ignoring unreadable config file: ${reason}`);
    return {};
  }
}

function searchConfigFile(): Record<string, unknown> {
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
  const result = explorer.search();
  if (result && !result.isEmpty && isRecord(result.config)) {
    configFilePath = result.filepath;
    return result.config;
  }
  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

/**
 * Initialize configuration from all sources.
 */
function initializeConfig(): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv();

  // Merge: defaults < fileConfig < envConfig
  configStore = deepMerge(deepMerge(DEFAULTS, fileConfig), envConfig);
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically.
 */
function set(values: Partial<SeqlistConfig>): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

/**
 * Get a snapshot of all configuration values. Writing to it does not change
 * the configuration; use `set` for that.
 */
function getAll(): Record<string, unknown> {
  initializeConfig();
  return cloneRecord(configStore);
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
}

// ============================================================================
// Export: config object
// ============================================================================

/**
 * Unified configuration API.
 */
export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
} as const;

/**
 * Identity helper for typed config files.
 *
 * @example
 * ```typescript
 * // seqlist.config.js
 * export default defineConfig({ debug: true });
 * ```
 */
export function defineConfig(values: SeqlistConfig): SeqlistConfig {
  return values;
}
