/**
 * Artifact Writer
 *
 * Each artifact is written to a temporary sibling and renamed into place,
 * so a reader never sees a half-written file. Artifacts already written
 * stay on disk if a later one fails.
 *
 * @module report/artifacts
 */

import { rename, rm, writeFile } from 'fs/promises';
import { join } from 'path';

import { log } from '../debug/index.js';
import { ArtifactWriteError, describeError } from '../errors/analyzer-error.js';

export interface Artifact {
  /** File name inside the output directory */
  name: string;
  content: string;
}

export const ARTIFACT_NAMES = {
  scaling: 'scaling_analysis.svg',
  speedup: 'speedup_comparison.svg',
  memory: 'memory_scaling.svg',
  summary: 'summary.json',
  report: 'REPORT.md',
} as const;

export async function writeArtifact(outputDir: string, artifact: Artifact): Promise<string> {
  const path = join(outputDir, artifact.name);
  const tmpPath = `${path}.${process.pid}.tmp`;
  try {
    await writeFile(tmpPath, artifact.content, 'utf-8');
    await rename(tmpPath, path);
  } catch (err) {
    await rm(tmpPath, { force: true }).catch((cleanupErr: unknown) => {
      log.warn('Artifacts', `Could not remove ${tmpPath}: ${describeError(cleanupErr)}`);
    });
    throw new ArtifactWriteError(path, err);
  }
  log.verbose('Artifacts', `Wrote ${path} (${Buffer.byteLength(artifact.content)} bytes)`);
  return path;
}

/**
 * Write artifacts in order; stops at the first failure.
 */
export async function writeArtifacts(outputDir: string, artifacts: readonly Artifact[]): Promise<string[]> {
  const paths: string[] = [];
  for (const artifact of artifacts) {
    paths.push(await writeArtifact(outputDir, artifact));
  }
  return paths;
}
