/**
 * Config Module Index
 *
 * @module config
 */

export * from './schema/index.js';

export { getRuntimeConfig, setRuntimeConfig, resetRuntimeConfig } from './runtime.js';

export { deepMerge, isPlainObject, type RawConfigObject } from './merge.js';
