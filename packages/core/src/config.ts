/**
 * Unified Configuration System
 *
 * Provides a centralized configuration API for vecta containers.
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: VECTA_* (highest priority, for CI overrides)
 * 2. Config files: vecta.config.js, .vectarc, .vectarc.json, etc.
 * 3. package.json: "vecta" key
 * 4. Programmatic: config.set() calls
 * 5. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@vecta/core";
 *
 * config.get("cache.line")   // → 64
 * config.get("debug")        // → boolean
 *
 * config.set({ sort: { depth: 32 } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { ConfigError } from "./errors.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Supported index widths, in bits. 53 is the widest integer a JS number
 * holds exactly.
 */
export type IndexWidth = 16 | 32 | 53;

export const INDEX_WIDTHS: readonly IndexWidth[] = [16, 32, 53];

/**
 * Full vecta configuration schema.
 */
export interface VectaConfig {
  /** Enable debug logging */
  debug?: boolean;
  /** Check caller contracts (index bounds, pop on empty) and throw on violation */
  checks?: boolean;
  cache?: {
    /** Cache line size in bytes; drives the binary/linear search cutover */
    line?: number;
  };
  sort?: {
    /** Capacity of the quicksort work stack */
    depth?: number;
  };
  index?: {
    /** Index width in bits */
    width?: number;
  };
  /** Custom user configuration */
  [key: string]: unknown;
}

/**
 * Validated defaults handed to vector instantiation.
 */
export interface VectorDefaults {
  readonly cacheLineSize: number;
  readonly sortStackDepth: number;
  readonly indexWidth: IndexWidth;
}

// ============================================================================
// Global State
// ============================================================================

let configStore: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;

const MODULE_NAME = "vecta";

const DEFAULTS: VectaConfig = {
  debug: false,
  checks: false,
  cache: { line: 64 },
  sort: { depth: 64 },
  index: { width: 32 },
};

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Load configuration synchronously from files.
 * Uses cosmiconfig to search for config in standard locations.
 */
function loadConfigFromFiles(): Record<string, unknown> {
  // The sync explorer has no loader for .mjs files.
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

  let result: ReturnType<typeof explorer.search>;
  try {
    result = explorer.search();
  } catch (error) {
    throw new ConfigError(
      "file",
      `failed to load ${MODULE_NAME} config: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  if (!result || result.isEmpty) return {};
  if (!isRecord(result.config)) {
    throw new ConfigError("file", `${result.filepath} must export an object`);
  }

  configFilePath = result.filepath;
  return result.config;
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 * Variables prefixed with VECTA_ are parsed into the config object.
 *
 * Examples:
 *   VECTA_DEBUG=1          → { debug: true }
 *   VECTA_CACHE_LINE=128   → { cache: { line: 128 } }
 *   VECTA_INDEX_WIDTH=16   → { index: { width: 16 } }
 */
function loadConfigFromEnv(): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};
  const PREFIX = "VECTA_";

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    // Double underscore __ becomes nested object separator
    const configPath = key
      .slice(PREFIX.length)
      .toLowerCase()
      .replace(/__/g, ".")
      .replace(/_/g, ".");

    let parsedValue: unknown;
    if (value === "1" || value === "true") {
      parsedValue = true;
    } else if (value === "0" || value === "false" || value === "") {
      parsedValue = false;
    } else if (/^\d+$/.test(value)) {
      parsedValue = parseInt(value, 10);
    } else {
      parsedValue = value;
    }

    setNestedValue(envConfig, configPath, parsedValue);
  }

  return envConfig;
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current: Record<string, unknown> = obj;

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
    if (!isRecord(current)) return undefined;
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
  const result: Record<string, unknown> = { ...target };

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
// Config Initialization
// ============================================================================

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
function set(values: Partial<VectaConfig>): void {
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

function readPositiveInteger(path: string): number {
  const value = get(path);
  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
    throw new ConfigError(path, `${path} must be a positive integer, got ${String(value)}`);
  }
  return value;
}

function isIndexWidth(value: unknown): value is IndexWidth {
  return INDEX_WIDTHS.some((width) => width === value);
}

/**
 * Read and validate the settings new vector modules start from.
 */
export function readVectorDefaults(): VectorDefaults {
  const width = get("index.width");
  if (!isIndexWidth(width)) {
    throw new ConfigError(
      "index.width",
      `index.width must be one of ${INDEX_WIDTHS.join(", ")}, got ${String(width)}`,
    );
  }

  return {
    cacheLineSize: readPositiveInteger("cache.line"),
    sortStackDepth: readPositiveInteger("sort.depth"),
    indexWidth: width,
  };
}

/**
 * Helper for typed config files (`vecta.config.js`).
 */
export function defineConfig(value: VectaConfig): VectaConfig {
  return value;
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
