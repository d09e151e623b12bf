/**
 * Config Resolver
 *
 * Resolves config references to their sources:
 * - Inline JSON
 * - File paths (absolute or relative)
 * - Named presets (project, then built-in)
 *
 * @module cli/config/config-resolver
 */

import { access, readFile, readdir } from 'fs/promises';
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';

import { log } from '../../src/debug/index.js';
import { ConfigError } from '../../src/errors/analyzer-error.js';

// =============================================================================
// Types
// =============================================================================

export interface ResolvedConfig {
  source: 'builtin' | 'project' | 'file' | 'inline';
  path: string | null;
  content: string;
  name: string | null;
}

export interface ResolverOptions {
  /** Project root directory (default: cwd) */
  projectRoot?: string;
  /** Built-in preset directory (default: src/config/presets) */
  builtinDir?: string;
}

export interface PresetInfo {
  name: string;
  source: string;
  path: string;
}

// =============================================================================
// Constants
// =============================================================================

const BUILTIN_PRESETS_DIR = resolve(dirname(fileURLToPath(import.meta.url)), '../../src/config/presets');

/** Project presets live in <projectRoot>/.attention-bench/<name>.json */
export const PROJECT_PRESETS_DIRNAME = '.attention-bench';

// =============================================================================
// Config Resolver
// =============================================================================

export class ConfigResolver {
  private projectRoot: string;
  private builtinDir: string;

  constructor(options: ResolverOptions = {}) {
    this.projectRoot = options.projectRoot ?? process.cwd();
    this.builtinDir = options.builtinDir ?? BUILTIN_PRESETS_DIR;
  }

  /**
   * Resolve a config reference to its content.
   *
   * @param ref - Config reference (name, path, or inline JSON)
   */
  async resolve(ref: string): Promise<ResolvedConfig> {
    if (ref.trim().startsWith('{')) {
      return { source: 'inline', path: null, content: ref, name: null };
    }

    if (ref.includes('/') || ref.includes('\\') || ref.endsWith('.json')) {
      return this.resolveFile(ref);
    }

    return this.resolvePreset(ref);
  }

  private searchPaths(): Array<{ source: 'project' | 'builtin'; dir: string }> {
    return [
      { source: 'project', dir: join(this.projectRoot, PROJECT_PRESETS_DIRNAME) },
      { source: 'builtin', dir: this.builtinDir },
    ];
  }

  /**
   * Resolve a named preset. Project presets shadow built-ins.
   */
  private async resolvePreset(name: string): Promise<ResolvedConfig> {
    const filename = `${name}.json`;

    for (const { source, dir } of this.searchPaths()) {
      const path = join(dir, filename);
      if (!(await exists(path))) continue;

      const content = await readFile(path, 'utf-8');
      if (source === 'project' && (await exists(join(this.builtinDir, filename)))) {
        log.warn('Config', `project preset "${name}" shadows built-in preset`);
      }
      return { source, path, content, name };
    }

    throw new ConfigError(
      `Config preset "${name}" not found. Searched:\n` +
      this.searchPaths().map((p) => `  - ${join(p.dir, filename)}`).join('\n')
    );
  }

  private async resolveFile(ref: string): Promise<ResolvedConfig> {
    const path = resolve(this.projectRoot, ref);
    try {
      const content = await readFile(path, 'utf-8');
      return { source: 'file', path, content, name: null };
    } catch (err) {
      throw new ConfigError(`Config file not found: ${path}`, { cause: err });
    }
  }

  /**
   * List available presets from all sources; a project preset hides the
   * built-in of the same name.
   */
  async listPresets(): Promise<PresetInfo[]> {
    const presets: PresetInfo[] = [];
    const seen = new Set<string>();

    for (const { source, dir } of this.searchPaths()) {
      let files: string[];
      try {
        files = await readdir(dir);
      } catch {
        // Directory doesn't exist
        continue;
      }
      for (const file of [...files].sort()) {
        if (!file.endsWith('.json')) continue;
        const name = file.slice(0, -'.json'.length);
        if (seen.has(name)) continue;
        seen.add(name);
        presets.push({ name, source, path: join(dir, file) });
      }
    }

    return presets;
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}
