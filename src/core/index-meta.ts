/**
 * The active-build pointer, `index-meta.json`, and the build directories it points into.
 *
 * Readers resolve the active build through the meta only. Writers stage a new build
 * directory, then swap the meta atomically, so readers see either the old or the new build.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';

import {
  BUILDS_DIRNAME,
  INDEX_FORMAT_VERSION,
  INDEX_META_FILENAME,
  INDEX_META_VERSION,
  MANIFEST_FILENAME,
  RECORDS_FILENAME
} from '../constants/index-layout.js';
import { IndexCorruptedError, errorMessage } from '../errors/index.js';
import { writeJsonAtomic } from '../utils/atomic-write.js';
import { debugLog } from '../utils/debug.js';

export const IndexMetaSchema = z.object({
  metaVersion: z.number().int().positive(),
  formatVersion: z.number().int().nonnegative(),
  buildId: z.string().min(1),
  generatedAt: z.string().datetime(),
  metric: z.enum(['cosine', 'l2']),
  modelId: z.string().min(1),
  dimension: z.number().int().positive().nullable(),
  backend: z.enum(['flat', 'lancedb']),
  recordCount: z.number().int().nonnegative()
});

export type IndexMeta = z.infer<typeof IndexMetaSchema>;

export function buildsDir(indexRoot: string): string {
  return path.join(indexRoot, BUILDS_DIRNAME);
}

export function buildDir(indexRoot: string, buildId: string): string {
  return path.join(buildsDir(indexRoot), buildId);
}

export function manifestPath(indexRoot: string, buildId: string): string {
  return path.join(buildDir(indexRoot, buildId), MANIFEST_FILENAME);
}

/**
 * Reads the meta. Null means no index has been built; anything unreadable, invalid or from
 * another format version is an IndexCorruptedError.
 */
export async function readIndexMeta(indexRoot: string): Promise<IndexMeta | null> {
  const metaPath = path.join(indexRoot, INDEX_META_FILENAME);

  let raw: string;
  try {
    raw = await fs.readFile(metaPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw new IndexCorruptedError(`Index meta unreadable (rebuild required): ${errorMessage(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new IndexCorruptedError(`Index meta is not JSON (rebuild required): ${errorMessage(error)}`);
  }

  const result = IndexMetaSchema.safeParse(parsed);
  if (!result.success) {
    throw new IndexCorruptedError(
      `Index meta schema mismatch (rebuild required): ${result.error.message}`
    );
  }

  const meta = result.data;
  if (meta.metaVersion !== INDEX_META_VERSION) {
    throw new IndexCorruptedError(
      `Index meta version mismatch (rebuild required): expected metaVersion=${INDEX_META_VERSION}, found metaVersion=${meta.metaVersion}`
    );
  }
  if (meta.formatVersion !== INDEX_FORMAT_VERSION) {
    throw new IndexCorruptedError(
      `Index format version mismatch (rebuild required): expected formatVersion=${INDEX_FORMAT_VERSION}, found formatVersion=${meta.formatVersion}`
    );
  }

  return meta;
}

/** Checks the build the meta points at exists. */
export async function validateActiveBuild(indexRoot: string, meta: IndexMeta): Promise<void> {
  const recordsPath = path.join(buildDir(indexRoot, meta.buildId), RECORDS_FILENAME);
  try {
    await fs.access(recordsPath);
  } catch {
    throw new IndexCorruptedError(`Active build records missing (rebuild required): ${recordsPath}`);
  }
}

export async function writeIndexMeta(indexRoot: string, meta: IndexMeta): Promise<void> {
  await writeJsonAtomic(path.join(indexRoot, INDEX_META_FILENAME), meta);
}

/** Deletes build directories not listed in `keep`. */
export async function pruneBuilds(indexRoot: string, keep: string[]): Promise<string[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(buildsDir(indexRoot));
  } catch {
    return [];
  }

  const removed: string[] = [];
  for (const entry of entries) {
    if (keep.includes(entry)) continue;
    try {
      await fs.rm(path.join(buildsDir(indexRoot), entry), { recursive: true, force: true });
      removed.push(entry);
    } catch (error) {
      console.warn(`Could not remove old build ${entry}: ${errorMessage(error)}`);
    }
  }
  if (removed.length > 0) {
    debugLog(`Pruned ${removed.length} old build(s)`);
  }
  return removed;
}
