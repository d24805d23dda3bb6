import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';

import { acquireIndexLock } from '../src/core/index-lock.js';
import {
  buildDir,
  pruneBuilds,
  readIndexMeta,
  validateActiveBuild,
  writeIndexMeta,
  type IndexMeta
} from '../src/core/index-meta.js';
import { IndexCorruptedError, IndexLockedError } from '../src/errors/index.js';
import { makeTempDir, rmWithRetries } from './test-helpers.js';

const META: IndexMeta = {
  metaVersion: 1,
  formatVersion: 1,
  buildId: 'build-1',
  generatedAt: '2026-01-01T00:00:00.000Z',
  metric: 'cosine',
  modelId: 'hash/8',
  dimension: 8,
  backend: 'flat',
  recordCount: 3
};

describe('index meta', () => {
  let indexRoot: string;

  beforeEach(async () => {
    indexRoot = await makeTempDir('ccr-meta-');
  });

  afterEach(async () => {
    await rmWithRetries(indexRoot);
  });

  it('returns null when no index was built', async () => {
    expect(await readIndexMeta(indexRoot)).toBeNull();
  });

  it('reads back a written meta', async () => {
    await writeIndexMeta(indexRoot, META);
    expect(await readIndexMeta(indexRoot)).toEqual(META);
  });

  it('treats invalid JSON, bad fields and other versions as corruption', async () => {
    const metaPath = path.join(indexRoot, 'index-meta.json');

    await fs.writeFile(metaPath, '{not json');
    await expect(readIndexMeta(indexRoot)).rejects.toBeInstanceOf(IndexCorruptedError);

    await fs.writeFile(metaPath, JSON.stringify({ ...META, metric: 'dot' }));
    await expect(readIndexMeta(indexRoot)).rejects.toThrow(/schema mismatch/);

    await fs.writeFile(metaPath, JSON.stringify({ ...META, formatVersion: 2 }));
    await expect(readIndexMeta(indexRoot)).rejects.toThrow(
      'Index format version mismatch (rebuild required): expected formatVersion=1, found formatVersion=2'
    );
  });

  it('requires the active build records to exist', async () => {
    await expect(validateActiveBuild(indexRoot, META)).rejects.toBeInstanceOf(IndexCorruptedError);

    await fs.mkdir(buildDir(indexRoot, 'build-1'), { recursive: true });
    await fs.writeFile(path.join(buildDir(indexRoot, 'build-1'), 'records.json'), '{}');
    await expect(validateActiveBuild(indexRoot, META)).resolves.toBeUndefined();
  });

  it('prunes builds that are not kept', async () => {
    for (const id of ['old', 'previous', 'current']) {
      await fs.mkdir(buildDir(indexRoot, id), { recursive: true });
    }

    expect(await pruneBuilds(indexRoot, ['current', 'previous'])).toEqual(['old']);
    expect((await fs.readdir(path.join(indexRoot, 'builds'))).sort()).toEqual([
      'current',
      'previous'
    ]);
  });
});

describe('acquireIndexLock', () => {
  let indexRoot: string;

  beforeEach(async () => {
    indexRoot = await makeTempDir('ccr-lock-');
  });

  afterEach(async () => {
    await rmWithRetries(indexRoot);
  });

  it('allows one writer at a time and frees the lock on release', async () => {
    const lock = await acquireIndexLock(indexRoot);
    await expect(acquireIndexLock(indexRoot)).rejects.toBeInstanceOf(IndexLockedError);

    await lock.release();
    const again = await acquireIndexLock(indexRoot);
    await again.release();
  });

  it('takes over a lock left by a process that no longer exists', async () => {
    const lockPath = path.join(indexRoot, 'index.lock');
    // Above the kernel's pid_max, so never a live process.
    await fs.writeFile(lockPath, JSON.stringify({ pid: 2 ** 22 + 1, acquiredAt: 'earlier' }));

    const lock = await acquireIndexLock(indexRoot);
    const owner = JSON.parse(await fs.readFile(lockPath, 'utf-8'));
    expect(owner.pid).toBe(process.pid);
    await lock.release();
  });

  it('refuses a lock held by another live process', async () => {
    await fs.writeFile(
      path.join(indexRoot, 'index.lock'),
      JSON.stringify({ pid: process.ppid, acquiredAt: 'now' })
    );

    await expect(acquireIndexLock(indexRoot)).rejects.toThrow(
      `Index is being written by process ${process.ppid}`
    );
  });
});
