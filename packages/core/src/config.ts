/**
 * Unified Configuration System
 *
 * Configuration is layered (in priority order):
 *
 * 1. Programmatic: config.set() calls, merged over everything loaded
 * 2. Environment variables: FAULTLINE_* (for CI overrides)
 * 3. Config files found by cosmiconfig: .faultlinerc, faultline.config.json,
 *    a "faultline" key in package.json, etc.
 * 4. Defaults (lowest priority)
 *
 * load() and reset() discard earlier config.set() values.
 *
 * @example
 * ```typescript
 * import { config } from "@faultline/core";
 *
 * config.get<boolean>("verbose");
 * config.get<string>("codegen.outSuffix");   // → ".generated.ts"
 * config.set({ codegen: { header: false } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

export interface CodegenConfig {
  /** Suffix that replaces `.ts` on generated modules */
  outSuffix?: string;
  /** Emit the "generated by" header comment */
  header?: boolean;
}

/**
 * Full faultline configuration schema.
 */
export interface FaultlineConfig {
  /** Log definition and generation steps */
  verbose?: boolean;
  /** Force diagnostic colors on or off, over NO_COLOR; unset means auto-detect */
  colors?: boolean;
  codegen?: CodegenConfig;
  [key: string]: unknown;
}

// ============================================================================
// Global State
// ============================================================================

let configStore: FaultlineConfig = {};
let configLoaded = false;
let configFilePath: string | undefined;

const ENV_PREFIX = "FAULTLINE_";

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 * `__` separates nesting levels; a single `_` camel-cases the next word.
 *
 * Examples:
 *   FAULTLINE_VERBOSE=1                      → { verbose: true }
 *   FAULTLINE_CODEGEN__OUT_SUFFIX=.err.ts    → { codegen: { outSuffix: ".err.ts" } }
 */
function loadConfigFromEnv(): FaultlineConfig {
  const envConfig: FaultlineConfig = {};

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    // Handled by the diagnostics renderer directly
    if (key === "FAULTLINE_NO_COLOR") continue;

    const configPath = key
      .slice(ENV_PREFIX.length)
      .split("__")
      .map((segment) =>
        segment.toLowerCase().replace(/_([a-z0-9])/g, (_match, ch: string) => ch.toUpperCase())
      )
      .join(".");

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

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current: Record<string, unknown> = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const next = current[parts[i]];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[parts[i]] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;

  for (const part of path.split(".")) {
    if (!isPlainObject(current)) {
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

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "faultline";

function loadConfigFromFiles(searchFrom: string): FaultlineConfig {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `.${MODULE_NAME}rc.cjs`,
      `${MODULE_NAME}.config.json`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });

  const result = explorer.search(searchFrom);
  if (!result || result.isEmpty) {
    return {};
  }

  const loaded: unknown = result.config;
  if (!isPlainObject(loaded)) {
    throw new Error(`Invalid faultline config in ${result.filepath}: expected an object`);
  }

  configFilePath = result.filepath;
  return loaded;
}

// ============================================================================
// Config Initialization
// ============================================================================

function defaults(): FaultlineConfig {
  return {
    verbose: false,
    codegen: {
      outSuffix: ".generated.ts",
      header: true,
    },
  };
}

function initializeConfig(searchFrom: string = process.cwd()): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles(searchFrom);
  const envConfig = loadConfigFromEnv();

  // Merge: defaults < fileConfig < envConfig
  configStore = deepMerge(deepMerge(defaults(), fileConfig), envConfig);
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by dot path.
 */
function get<T = unknown>(path: string): T | undefined {
  initializeConfig();
  // Values come from user files and the environment; callers name the shape they expect.
  return getNestedValue(configStore, path) as T | undefined;
}

/**
 * Set configuration values programmatically.
 */
function set(values: Partial<FaultlineConfig>): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

function has(path: string): boolean {
  return !!get(path);
}

function getAll(): Readonly<FaultlineConfig> {
  initializeConfig();
  return configStore;
}

function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Discard the current configuration and load again, searching for config
 * files upward from `searchFrom`.
 */
function load(searchFrom: string): Readonly<FaultlineConfig> {
  reset();
  initializeConfig(searchFrom);
  return configStore;
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

export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  load,
  reset,
} as const;

/**
 * Helper for typed `.faultlinerc.cjs` / `faultline.config.cjs` files.
 */
export function defineConfig(cfg: FaultlineConfig): FaultlineConfig {
  return cfg;
}
