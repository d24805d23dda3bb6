/**
 * File hash manifest for incremental indexing.
 * Stored per build; maps each indexed file to the hash of the content its records came from.
 */

import { promises as fs } from 'fs';
import { z } from 'zod';

import { writeJsonAtomic } from '../utils/atomic-write.js';
import { debugLog } from '../utils/debug.js';
import { sha256 } from '../utils/hashing.js';
import { toRelativePath } from '../utils/paths.js';

const FileManifestSchema = z.object({
  version: z.literal(1),
  generatedAt: z.string(),
  files: z.record(z.string(), z.string())
});

export type FileManifest = z.infer<typeof FileManifestSchema>;

/** First 16 hex chars of the content's SHA-256. */
export function hashFileContent(content: string): string {
  return sha256(content).slice(0, 16);
}

export function createManifest(files: Record<string, string> = {}): FileManifest {
  return { version: 1, generatedAt: new Date().toISOString(), files };
}

/** Returns null when the manifest is missing or unreadable; callers then re-index everything. */
export async function readManifest(manifestPath: string): Promise<FileManifest | null> {
  let raw: string;
  try {
    raw = await fs.readFile(manifestPath, 'utf-8');
  } catch {
    return null;
  }

  try {
    const parsed = FileManifestSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    debugLog(`Ignoring unparseable manifest at ${manifestPath}`);
    return null;
  }
}

export async function writeManifest(manifestPath: string, manifest: FileManifest): Promise<void> {
  await writeJsonAtomic(manifestPath, manifest);
}

/**
 * Hashes `files` (absolute paths) keyed by project-relative path.
 * Unreadable files are left out.
 */
export async function computeFileHashes(
  files: string[],
  rootPath: string,
  readFile: (p: string) => Promise<string> = (p) => fs.readFile(p, 'utf-8')
): Promise<Record<string, string>> {
  const hashes: Record<string, string> = {};
  for (const file of files) {
    try {
      hashes[toRelativePath(rootPath, file)] = hashFileContent(await readFile(file));
    } catch (error) {
      debugLog(`Cannot hash ${file}:`, error instanceof Error ? error.message : String(error));
    }
  }
  return hashes;
}
