import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';

vi.mock('../src/utils/tree-sitter.js', () => ({
  visitSyntaxTree: vi.fn(async () => null)
}));

import { createProjectContext, type ProjectContext } from '../src/core/context.js';
import { acquireIndexLock } from '../src/core/index-lock.js';
import { readIndexMeta } from '../src/core/index-meta.js';
import { readIndexingStats } from '../src/core/indexer.js';
import { MemoryEmbeddingCache } from '../src/embeddings/cache.js';
import { ConfigurationError, IndexCorruptedError, IndexLockedError } from '../src/errors/index.js';
import type { IndexingPhase } from '../src/types/index.js';
import { KeywordEmbeddingProvider, makeTempDir, rmWithRetries, writeTree } from './test-helpers.js';

const KEYWORDS = ['login', 'parse', 'render'];

const PROJECT_FILES: Record<string, string> = {
  '.gitignore': 'build/\n',
  'app/auth.py': 'def login(user):\n    return check(user)\n',
  'app/parser.py': 'def parse(text):\n    return text.split()\n',
  'docs/guide.md': '# Render\n\nHow we render pages.\n',
  'build/generated.py': 'def login_generated():\n    pass\n',
  'node_modules/lib/index.js': 'export function parse() {}\n',
  'notes.txt': 'login parse render\n'
};

describe('IndexingPipeline', () => {
  let root: string;
  let provider: KeywordEmbeddingProvider;
  let errorSpy: ReturnType<typeof vi.spyOn>;
  let warnSpy: ReturnType<typeof vi.spyOn>;
  const contexts: ProjectContext[] = [];

  async function open(env: NodeJS.ProcessEnv = {}): Promise<ProjectContext> {
    const ctx = await createProjectContext(
      { name: 'demo', codebaseRoot: root, indexName: 'demo' },
      {
        env: {
          CCR_EMBEDDER__MODEL: 'keyword',
          CCR_EMBEDDER__MAX_RETRIES: '0',
          CCR_INDEXING__MAX_WORKERS: '2',
          ...env
        },
        provider,
        cache: new MemoryEmbeddingCache()
      }
    );
    contexts.push(ctx);
    return ctx;
  }

  async function queryFiles(ctx: ProjectContext, text: string, threshold = 0) {
    const results = await ctx.queryEngine.query({ text, threshold });
    return results.map((result) => [result.chunk.filePath, result.score]);
  }

  beforeEach(async () => {
    root = await makeTempDir('ccr-pipeline-');
    await writeTree(root, PROJECT_FILES);
    provider = new KeywordEmbeddingProvider(KEYWORDS);
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    for (const ctx of contexts.splice(0)) {
      await ctx.close();
    }
    errorSpy.mockRestore();
    warnSpy.mockRestore();
    await rmWithRetries(root);
  });

  it('indexes eligible files and answers queries from the new build', async () => {
    const ctx = await open();
    const phases: IndexingPhase[] = [];

    const stats = await ctx.pipeline.run({ onProgress: (progress) => phases.push(progress.phase) });

    expect(stats).toMatchObject({
      totalFiles: 3,
      indexedFiles: 3,
      unchangedFiles: 0,
      skippedFiles: 0,
      deletedFiles: 0,
      totalChunks: 3,
      recordCount: 3,
      fullRebuild: true,
      cancelled: false
    });
    expect(phases[phases.length - 1]).toBe('persisted');
    expect(phases.indexOf('extracting')).toBeLessThan(phases.indexOf('embedding'));

    const meta = await readIndexMeta(ctx.indexRoot);
    expect(meta).toMatchObject({
      buildId: stats.buildId,
      modelId: 'keyword',
      metric: 'cosine',
      backend: 'flat',
      dimension: 4,
      recordCount: 3
    });
    expect(await readIndexingStats(ctx.indexRoot)).toMatchObject({ buildId: stats.buildId });

    expect(await queryFiles(ctx, 'how does login work', 0.35)).toEqual([['app/auth.py', 1]]);
    expect(await queryFiles(ctx, 'how does login work')).toEqual([
      ['app/auth.py', 1],
      ['app/parser.py', 0],
      ['docs/guide.md', 0]
    ]);
  });

  it('skips unchanged files on the next run', async () => {
    const ctx = await open();
    await ctx.pipeline.run();
    const callsAfterFirstRun = provider.calls.length;

    const stats = await ctx.pipeline.run();

    expect(stats).toMatchObject({
      indexedFiles: 0,
      unchangedFiles: 3,
      recordCount: 3,
      fullRebuild: false
    });
    expect(provider.calls).toHaveLength(callsAfterFirstRun);
    expect(await fs.readdir(path.join(ctx.indexRoot, 'builds'))).toHaveLength(2);
  });

  it('re-indexes changed files and drops deleted ones', async () => {
    const ctx = await open();
    await ctx.pipeline.run();

    await fs.rm(path.join(root, 'app/parser.py'));
    await fs.writeFile(
      path.join(root, 'app/auth.py'),
      'def login(user):\n    return render(check(user))\n'
    );
    const stats = await ctx.pipeline.run();

    expect(stats).toMatchObject({
      indexedFiles: 1,
      unchangedFiles: 1,
      deletedFiles: 1,
      recordCount: 2
    });
    expect(await queryFiles(ctx, 'parse')).toEqual([
      ['app/auth.py', 0],
      ['docs/guide.md', 0]
    ]);
    const [hit] = await ctx.queryEngine.query({ text: 'login', threshold: 0 });
    expect(hit.chunk.text).toBe('def login(user):\n    return render(check(user))');
  });

  it('keeps records outside a partial target and outside the extension filter', async () => {
    const ctx = await open();
    await ctx.pipeline.run();

    await fs.rm(path.join(root, 'docs/guide.md'));
    const partial = await ctx.pipeline.run({ target: 'app' });
    expect(partial).toMatchObject({ totalFiles: 2, deletedFiles: 0, recordCount: 3 });

    const filtered = await ctx.pipeline.run({ extensions: ['md'] });
    expect(filtered).toMatchObject({ totalFiles: 0, deletedFiles: 1, recordCount: 2 });

    await fs.writeFile(path.join(root, 'app/parser.py'), 'def parse(text, sep):\n    return text.split(sep)\n');
    const mdOnly = await ctx.pipeline.run({ extensions: ['.md'] });
    expect(mdOnly).toMatchObject({ indexedFiles: 0, deletedFiles: 0, recordCount: 2 });
  });

  it('leaves the previous records in place when a file fails to embed', async () => {
    const ctx = await open();
    await ctx.pipeline.run();

    await fs.writeFile(path.join(root, 'app/auth.py'), 'def login(name):\n    return name\n');
    provider.failOn = (text) => text.includes('login(name)');
    const failed = await ctx.pipeline.run();

    expect(failed).toMatchObject({ indexedFiles: 0, skippedFiles: 1, skippedChunks: 1, recordCount: 3 });
    expect(failed.errors).toEqual([
      expect.objectContaining({ filePath: 'app/auth.py', phase: 'embedding' })
    ]);
    const [stale] = await ctx.queryEngine.query({ text: 'login', threshold: 0.5 });
    expect(stale.chunk.text).toBe('def login(user):\n    return check(user)');

    provider.failOn = null;
    const retried = await ctx.pipeline.run();
    expect(retried).toMatchObject({ indexedFiles: 1, unchangedFiles: 2 });
  });

  it('drops the records of a file that grows past max_file_size', async () => {
    const ctx = await open({ CCR_EXTRACTORS__MAX_FILE_SIZE: '200' });
    await ctx.pipeline.run();

    await fs.writeFile(
      path.join(root, 'app/auth.py'),
      `def login(user):\n${'    # audit trail entry\n'.repeat(20)}    return user\n`
    );
    const oversized = await ctx.pipeline.run();

    expect(oversized).toMatchObject({ indexedFiles: 0, skippedFiles: 1, recordCount: 2 });
    expect(oversized.errors).toEqual([
      expect.objectContaining({ filePath: 'app/auth.py', phase: 'extracting' })
    ]);
    expect(await queryFiles(ctx, 'login')).toEqual([
      ['app/parser.py', 0],
      ['docs/guide.md', 0]
    ]);

    const again = await ctx.pipeline.run();
    expect(again).toMatchObject({ skippedFiles: 1, unchangedFiles: 2, recordCount: 2 });
  });

  it('counts empty files as skipped without records', async () => {
    await writeTree(root, { 'app/empty.py': '\n\n' });
    const ctx = await open();

    const stats = await ctx.pipeline.run();

    expect(stats).toMatchObject({ totalFiles: 4, indexedFiles: 3, skippedFiles: 1, recordCount: 3 });
    expect(stats.errors).toEqual([]);
  });

  it('persists what finished before cancellation', async () => {
    const ctx = await open();
    const controller = new AbortController();
    controller.abort();

    const stats = await ctx.pipeline.run({ signal: controller.signal });

    expect(stats).toMatchObject({ cancelled: true, indexedFiles: 0, recordCount: 0 });
    expect(await readIndexMeta(ctx.indexRoot)).toMatchObject({ recordCount: 0 });
    expect(await ctx.queryEngine.query({ text: 'login' })).toEqual([]);
  });

  it('refuses to run while another writer holds the lock', async () => {
    const ctx = await open();
    const lock = await acquireIndexLock(ctx.indexRoot);

    await expect(ctx.pipeline.run()).rejects.toBeInstanceOf(IndexLockedError);
    await lock.release();
    expect(await readIndexMeta(ctx.indexRoot)).toBeNull();
  });

  it('rebuilds a corrupt index on a full run but not on a partial one', async () => {
    const ctx = await open();
    await ctx.pipeline.run();
    await fs.writeFile(path.join(ctx.indexRoot, 'index-meta.json'), '{broken');

    await expect(ctx.pipeline.run({ target: 'app' })).rejects.toBeInstanceOf(IndexCorruptedError);
    await expect(ctx.queryEngine.query({ text: 'login' })).rejects.toBeInstanceOf(
      IndexCorruptedError
    );

    const rebuilt = await ctx.pipeline.run();
    expect(rebuilt).toMatchObject({ fullRebuild: true, indexedFiles: 3, recordCount: 3 });
  });

  it('rebuilds when the metric changes and rejects partial runs that would mix settings', async () => {
    await (await open()).pipeline.run();
    const l2 = await open({ CCR_VECTOR_INDEX__METRIC: 'l2' });

    await expect(l2.pipeline.run({ target: 'docs' })).rejects.toThrow(/metric: cosine -> l2/);

    const stats = await l2.pipeline.run();
    expect(stats).toMatchObject({ fullRebuild: true, unchangedFiles: 0, indexedFiles: 3 });
    expect(await readIndexMeta(l2.indexRoot)).toMatchObject({ metric: 'l2' });
  });

  it('rejects targets outside the project', async () => {
    const ctx = await open();
    await expect(ctx.pipeline.run({ target: '../elsewhere' })).rejects.toBeInstanceOf(
      ConfigurationError
    );
    await expect(ctx.pipeline.run({ target: 'missing' })).rejects.toThrow(/does not exist/);
  });
});
