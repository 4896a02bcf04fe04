/**
 * Runtime configuration for @alternate/core
 *
 * Configuration lives in memory only and is changed programmatically.
 *
 * @example
 * ```typescript
 * import { config } from "@alternate/core";
 *
 * config.get("debug");          // → false
 * config.set({ debug: true });  // trace exhaustion transitions
 * ```
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Full configuration schema.
 */
export interface AlternateConfig {
  /** Log cursor transitions caused by exhausted sources */
  debug?: boolean;
}

// ============================================================================
// Global State
// ============================================================================

const DEFAULTS: Readonly<AlternateConfig> = { debug: false };

let configStore: AlternateConfig = { ...DEFAULTS };

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Get a nested value using dot notation.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;

  for (const part of path.split(".")) {
    if (typeof current !== "object" || current === null) {
      return undefined;
    }
    current = Reflect.get(current, part);
  }

  return current;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 */
function get(path: string): unknown {
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically.
 */
function set(values: Partial<AlternateConfig>): void {
  configStore = { ...configStore, ...values };
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

/**
 * Get all configuration values.
 */
function getAll(): Readonly<AlternateConfig> {
  return configStore;
}

/**
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  configStore = { ...DEFAULTS };
}

export const config = {
  get,
  set,
  has,
  getAll,
  reset,
};
