/**
 * Config Composer
 *
 * Handles config inheritance via the "extends" field.
 * Deep-merges parent configs with cycle detection.
 *
 * @module cli/config/config-composer
 */

import { deepMerge, isPlainObject, type RawConfigObject } from '../../src/config/merge.js';
import { ConfigError, describeError } from '../../src/errors/analyzer-error.js';
import { ConfigResolver, type ResolvedConfig } from './config-resolver.js';

// =============================================================================
// Types
// =============================================================================

export interface ComposedConfig {
  /** Merged config object (extends resolved, "extends" key removed) */
  config: RawConfigObject;
  /** Chain of configs that were merged (root first) */
  chain: string[];
}

// =============================================================================
// Config Composer
// =============================================================================

export class ConfigComposer {
  private resolver: ConfigResolver;
  private maxDepth: number;

  constructor(resolver?: ConfigResolver, maxDepth = 10) {
    this.resolver = resolver ?? new ConfigResolver();
    this.maxDepth = maxDepth;
  }

  /**
   * Compose a config by resolving its extends chain.
   *
   * @param ref - Config reference (name, path, or inline JSON)
   */
  async compose(ref: string): Promise<ComposedConfig> {
    return this.composeRecursive(ref, new Set<string>(), [], 0);
  }

  private async composeRecursive(
    ref: string,
    visited: Set<string>,
    stack: string[],
    depth: number
  ): Promise<ComposedConfig> {
    const normalizedRef = this.normalizeRef(ref);
    if (visited.has(normalizedRef)) {
      throw new ConfigError(`Circular extends detected: ${[...stack, normalizedRef].join(' -> ')}`);
    }

    if (depth > this.maxDepth) {
      throw new ConfigError(`Extends chain too deep (max ${this.maxDepth}): ${stack.join(' -> ')}`);
    }

    visited.add(normalizedRef);
    stack.push(normalizedRef);

    const resolved = await this.resolver.resolve(ref);
    const { extends: parentRef, ...own } = this.parseConfig(resolved);

    if (parentRef === undefined) {
      stack.pop();
      return { config: own, chain: [normalizedRef] };
    }
    if (typeof parentRef !== 'string') {
      throw new ConfigError(`"extends" in config "${this.describeSource(resolved)}" must be a string`);
    }

    const parent = await this.composeRecursive(parentRef, visited, stack, depth + 1);

    stack.pop();
    return {
      config: deepMerge(parent.config, own),
      chain: [...parent.chain, normalizedRef],
    };
  }

  private parseConfig(resolved: ResolvedConfig): RawConfigObject {
    let parsed: unknown;
    try {
      parsed = JSON.parse(resolved.content);
    } catch (err) {
      throw new ConfigError(`Invalid JSON in config "${this.describeSource(resolved)}": ${describeError(err)}`);
    }
    if (!isPlainObject(parsed)) {
      throw new ConfigError(`Config "${this.describeSource(resolved)}" must be a JSON object`);
    }
    return parsed;
  }

  private describeSource(resolved: ResolvedConfig): string {
    return resolved.name ?? resolved.path ?? 'inline';
  }

  /**
   * Normalize a ref for cycle detection.
   */
  private normalizeRef(ref: string): string {
    if (ref.trim().startsWith('{')) {
      return `inline:${ref.length}:${ref.slice(0, 50)}`;
    }
    return ref.toLowerCase();
  }
}
