/**
 * Unified Configuration System
 *
 * Configuration is resolved from (highest priority first):
 *
 * 1. Programmatic: `config.set()` calls
 * 2. Environment variables: OUTCOME_KIT_*
 * 3. Defaults
 *
 * @example
 * ```typescript
 * import { config } from "@outcome-kit/core";
 *
 * config.get("generation.weights")     // → "strict" | "permissive"
 * config.get("testing.seed")           // → number
 *
 * config.set({ testing: { iterations: 500 } });
 * ```
 */

import { ConfigError } from "./errors.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Minimum severity that reaches the diagnostics sink.
 */
export type DiagnosticLevel = "error" | "warn" | "info" | "off";

/**
 * How weighted generation treats negative, non-finite or all-zero weights:
 * "strict" throws, "permissive" reports a warning and carries on.
 */
export type WeightPolicy = "strict" | "permissive";

/**
 * Full configuration schema. Every key is optional so that partial objects
 * can be passed to `config.set()`.
 */
export type OutcomeKitConfig = {
  debug?: boolean;
  diagnostics?: {
    level?: DiagnosticLevel;
  };
  generation?: {
    weights?: WeightPolicy;
  };
  testing?: {
    /** Starting seed for `forAll` */
    seed?: number;
    /** Default number of generated cases per property */
    iterations?: number;
  };
};

/**
 * Value type of each dotted path `config.get()` accepts.
 */
export interface ConfigValues {
  debug: boolean;
  "diagnostics.level": DiagnosticLevel;
  "generation.weights": WeightPolicy;
  "testing.seed": number;
  "testing.iterations": number;
}

export type ConfigPath = keyof ConfigValues;

// ============================================================================
// Global State
// ============================================================================

const DEFAULTS = {
  debug: false,
  diagnostics: {
    level: "warn",
  },
  generation: {
    weights: "strict",
  },
  testing: {
    seed: 42,
    iterations: 100,
  },
} satisfies OutcomeKitConfig;

let configStore: Record<string, unknown> = {};
let configLoaded = false;

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_PREFIX = "OUTCOME_KIT_";

/**
 * Load configuration from environment variables.
 *
 * The variable name maps to a dotted path and the value is parsed according
 * to the type of that path's default:
 *
 *   OUTCOME_KIT_DEBUG=1        → { debug: true }
 *   OUTCOME_KIT_TESTING_SEED=7 → { testing: { seed: 7 } }
 *   OUTCOME_KIT_GENERATION_WEIGHTS=permissive
 *     → { generation: { weights: "permissive" } }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const configPath = key
      .slice(ENV_PREFIX.length)
      .toLowerCase()
      .replace(/_/g, ".");
    const defaultValue = getNestedValue(DEFAULTS, configPath);
    setNestedValue(envConfig, configPath, parseEnvValue(value, defaultValue));
  }

  return envConfig;
}

function parseEnvValue(value: string, defaultValue: unknown): unknown {
  if (typeof defaultValue === "boolean") {
    if (value === "1" || value === "true") return true;
    if (value === "0" || value === "false" || value === "") return false;
  }
  if (typeof defaultValue === "number" && /^-?\d+$/.test(value)) {
    return parseInt(value, 10);
  }
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
  let current = obj;

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
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];
    result[key] =
      isRecord(sourceValue) && isRecord(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue;
  }

  return result;
}

function isConfigValue<P extends ConfigPath>(
  path: P,
  value: unknown,
): value is ConfigValues[P] {
  switch (path) {
    case "debug":
      return typeof value === "boolean";
    case "diagnostics.level":
      return (
        value === "error" ||
        value === "warn" ||
        value === "info" ||
        value === "off"
      );
    case "generation.weights":
      return value === "strict" || value === "permissive";
    case "testing.seed":
      return Number.isInteger(value);
    case "testing.iterations":
      return Number.isInteger(value) && typeof value === "number" && value > 0;
  }
  return false;
}

// ============================================================================
// Config Initialization
// ============================================================================

function initializeConfig(): void {
  if (configLoaded) return;

  // Merge: defaults < envConfig
  configStore = deepMerge(DEFAULTS, loadConfigFromEnv(process.env));
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 *
 * @throws ConfigError if the stored value does not fit the path's type
 */
function get<P extends ConfigPath>(path: P): ConfigValues[P] {
  initializeConfig();
  const value = getNestedValue(configStore, path);
  if (isConfigValue(path, value)) return value;
  throw new ConfigError(path, value);
}

/**
 * Set configuration values programmatically.
 */
function set(values: OutcomeKitConfig): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

/**
 * Check if a configuration path holds a value, whatever its validity.
 */
function has(path: string): boolean {
  initializeConfig();
  return getNestedValue(configStore, path) !== undefined;
}

/**
 * Get all configuration values.
 */
function getAll(): Readonly<Record<string, unknown>> {
  initializeConfig();
  return configStore;
}

/**
 * Reset configuration so the next read reloads defaults and environment
 * (mainly for testing).
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
}

export const config = {
  get,
  set,
  has,
  getAll,
  reset,
};
