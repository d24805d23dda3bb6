/**
 * Single-writer lock for an index directory.
 * The lock file holds `{ pid, acquiredAt }`; a lock left by a dead process is taken over.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';

import { INDEX_LOCK_FILENAME } from '../constants/index-layout.js';
import { IndexLockedError } from '../errors/index.js';
import { debugLog } from '../utils/debug.js';

const LockFileSchema = z.object({
  pid: z.number().int(),
  acquiredAt: z.string()
});

export interface IndexLock {
  readonly lockPath: string;
  release(): Promise<void>;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else.
    return error instanceof Error && 'code' in error && error.code === 'EPERM';
  }
}

async function readLockOwner(lockPath: string): Promise<number | null> {
  try {
    const parsed = LockFileSchema.safeParse(JSON.parse(await fs.readFile(lockPath, 'utf-8')));
    return parsed.success ? parsed.data.pid : null;
  } catch {
    return null;
  }
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

export async function acquireIndexLock(indexRoot: string): Promise<IndexLock> {
  await fs.mkdir(indexRoot, { recursive: true });
  const lockPath = path.join(indexRoot, INDEX_LOCK_FILENAME);
  const body = JSON.stringify({ pid: process.pid, acquiredAt: new Date().toISOString() });

  for (let attempt = 0; attempt < 2; attempt++) {
    try {
      await fs.writeFile(lockPath, body, { flag: 'wx' });
      return {
        lockPath,
        release: async () => {
          await fs.rm(lockPath, { force: true });
        }
      };
    } catch (error) {
      if (!isAlreadyExists(error)) throw error;

      const owner = await readLockOwner(lockPath);
      if (owner !== null && owner !== process.pid && isProcessAlive(owner)) {
        throw new IndexLockedError(
          `Index is being written by process ${owner} (lock: ${lockPath})`,
          lockPath
        );
      }
      if (owner === process.pid) {
        throw new IndexLockedError(`Index is already being written by this process`, lockPath);
      }

      debugLog(`Taking over stale index lock ${lockPath} (pid ${owner ?? 'unknown'})`);
      await fs.rm(lockPath, { force: true });
    }
  }

  throw new IndexLockedError(`Could not acquire index lock at ${lockPath}`, lockPath);
}
