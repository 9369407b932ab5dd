/**
 * Runtime configuration for @strand/parser.
 *
 * Values are loaded from (in priority order):
 *
 * 1. Programmatic: `config.set()` calls (highest priority)
 * 2. Environment variables: STRAND_* (for CI overrides)
 * 3. Config files: package.json "strand" key, .strandrc, .strandrc.json,
 *    strand.config.js, etc.
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@strand/parser";
 *
 * config.get("maxInitialCapacityBytes");   // → 65536
 * config.set({ debug: true });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import {
  DEFAULT_ELEMENT_SIZE,
  MAX_INITIAL_CAPACITY_BYTES,
  type CapacityOptions,
} from "./capacity.js";

// ============================================================================
// Types
// ============================================================================

export interface StrandConfig {
  /** Log combinator diagnostics (zero-progress trips, capacity clamps). */
  debug: boolean;
  /** Upper bound, in bytes, on speculative pre-allocation from untrusted counts. */
  maxInitialCapacityBytes: number;
  /** Assumed size of one collected element when no per-call size is given. */
  elementSize: number;
}

type ConfigKey = keyof StrandConfig;

// ============================================================================
// Global State
// ============================================================================

const DEFAULTS: StrandConfig = {
  debug: false,
  maxInitialCapacityBytes: MAX_INITIAL_CAPACITY_BYTES,
  elementSize: DEFAULT_ELEMENT_SIZE,
};

let configStore: StrandConfig = { ...DEFAULTS };
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Validation
// ============================================================================

/** Check a single value; returns an error message or undefined when valid. */
function checkValue(key: ConfigKey, value: unknown): string | undefined {
  switch (key) {
    case "debug":
      return typeof value === "boolean" ? undefined : `"debug" must be a boolean`;
    case "maxInitialCapacityBytes":
    case "elementSize":
      return typeof value === "number" && Number.isSafeInteger(value) && value > 0
        ? undefined
        : `"${key}" must be a positive integer`;
  }
}

function isConfigKey(key: string): key is ConfigKey {
  return Object.prototype.hasOwnProperty.call(DEFAULTS, key);
}

/**
 * Keep the recognised, valid entries of an untrusted object.
 * Invalid entries are reported through `warn`.
 */
function sanitize(raw: unknown, source: string): Partial<StrandConfig> {
  const result: Partial<StrandConfig> = {};
  if (typeof raw !== "object" || raw === null) return result;

  for (const [key, value] of Object.entries(raw)) {
    if (!isConfigKey(key)) continue;
    const problem = checkValue(key, value);
    if (problem) {
      console.warn(`[strand/parser:config] ignoring ${source}: ${problem}`);
      continue;
    }
    assign(result, key, value);
  }
  return result;
}

function assign(target: Partial<StrandConfig>, key: ConfigKey, value: unknown): void {
  if (key === "debug" && typeof value === "boolean") {
    target.debug = value;
  } else if (key !== "debug" && typeof value === "number") {
    target[key] = value;
  }
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_KEYS: Record<string, ConfigKey> = {
  STRAND_DEBUG: "debug",
  STRAND_MAX_INITIAL_CAPACITY_BYTES: "maxInitialCapacityBytes",
  STRAND_ELEMENT_SIZE: "elementSize",
};

/** Read an env string as the type its key expects; anything else is passed on for validation to reject. */
function coerceEnv(key: ConfigKey, value: string): unknown {
  if (key === "debug") {
    if (value === "1" || value === "true") return true;
    if (value === "0" || value === "false" || value === "") return false;
    return value;
  }
  return /^\d+$/.test(value) ? parseInt(value, 10) : value;
}

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   STRAND_DEBUG=1                              → { debug: true }
 *   STRAND_MAX_INITIAL_CAPACITY_BYTES=4096      → { maxInitialCapacityBytes: 4096 }
 */
function loadConfigFromEnv(): Partial<StrandConfig> {
  const raw: Record<string, unknown> = {};

  for (const [name, key] of Object.entries(ENV_KEYS)) {
    const value = process.env[name];
    if (value === undefined) continue;
    raw[key] = coerceEnv(key, value);
  }

  return sanitize(raw, "environment");
}

// ============================================================================
// Config File Loading
// ============================================================================

const MODULE_NAME = "strand";

function loadConfigFromFiles(): Partial<StrandConfig> {
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
  } catch (e) {
    // Loaded lazily from inside parse(); a bad file must not escape from there.
    console.warn(`[strand/parser:config] ignoring config file: ${e instanceof Error ? e.message : String(e)}`);
    return {};
  }
  if (!result || result.isEmpty) return {};

  configFilePath = result.filepath;
  const loaded: unknown = result.config;
  return sanitize(loaded, result.filepath);
}

// ============================================================================
// Config Initialization
// ============================================================================

function initializeConfig(): void {
  if (configLoaded) return;

  // Merge: defaults < fileConfig < envConfig
  configStore = { ...DEFAULTS, ...loadConfigFromFiles(), ...loadConfigFromEnv() };
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

function get<K extends ConfigKey>(key: K): StrandConfig[K] {
  initializeConfig();
  return configStore[key];
}

/**
 * Set configuration values programmatically.
 * Throws `TypeError` on an invalid value; nothing is applied in that case.
 */
function set(values: Partial<StrandConfig>): void {
  initializeConfig();
  for (const [key, value] of Object.entries(values)) {
    if (!isConfigKey(key)) {
      throw new TypeError(`Unknown configuration key "${key}"`);
    }
    const problem = checkValue(key, value);
    if (problem) throw new TypeError(problem);
  }
  configStore = { ...configStore, ...values };
}

function getAll(): Readonly<StrandConfig> {
  initializeConfig();
  return configStore;
}

/** Path of the config file that was loaded, if any. */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/** Forget loaded and programmatic values; the next read reloads all sources. */
function reset(): void {
  configStore = { ...DEFAULTS };
  configLoaded = false;
  configFilePath = undefined;
}

/** Resolve the capacity clamp for one call: explicit options win over configuration. */
export function capacityLimits(options: CapacityOptions = {}): { elementSize: number; maxBytes: number } {
  return {
    elementSize: options.elementSize ?? get("elementSize"),
    maxBytes: options.maxInitialCapacityBytes ?? get("maxInitialCapacityBytes"),
  };
}

export const config = {
  get,
  set,
  getAll,
  getConfigFilePath,
  reset,
};
