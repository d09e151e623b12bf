/**
 * CLI Config Module
 *
 * Config loading, resolution, and composition for the analyzer CLI.
 *
 * @module cli/config
 */

export { ConfigResolver, PROJECT_PRESETS_DIRNAME } from './config-resolver.js';
export type { ResolvedConfig, ResolverOptions, PresetInfo } from './config-resolver.js';

export { ConfigComposer } from './config-composer.js';
export type { ComposedConfig } from './config-composer.js';

export { ConfigLoader, loadConfig, listPresets, dumpConfig } from './config-loader.js';
export type { LoadedConfig, LoadOptions } from './config-loader.js';
