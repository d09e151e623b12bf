/**
 * Runtime Config Registry
 *
 * Stores the active AnalyzerConfigSchema for the current process.
 * Call setRuntimeConfig() before running an analysis to apply overrides.
 *
 * @module config/runtime
 */

import type { AnalyzerConfigOverrides, AnalyzerConfigSchema } from './schema/index.js';
import { createAnalyzerConfig } from './schema/index.js';

let runtimeConfig: AnalyzerConfigSchema = createAnalyzerConfig();

/**
 * Get the active runtime config (merged with defaults).
 */
export function getRuntimeConfig(): AnalyzerConfigSchema {
  return runtimeConfig;
}

/**
 * Set the active runtime config.
 * Accepts partial overrides and merges with defaults.
 */
export function setRuntimeConfig(overrides?: AnalyzerConfigOverrides): AnalyzerConfigSchema {
  runtimeConfig = createAnalyzerConfig(overrides);
  return runtimeConfig;
}

/**
 * Reset runtime config to defaults.
 */
export function resetRuntimeConfig(): AnalyzerConfigSchema {
  runtimeConfig = createAnalyzerConfig();
  return runtimeConfig;
}
