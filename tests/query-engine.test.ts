import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';

vi.mock('../src/utils/tree-sitter.js', () => ({
  visitSyntaxTree: vi.fn(async () => null)
}));

import { createProjectContext, type ProjectContext } from '../src/core/context.js';
import { formatResults, renderResult, type QueryResult } from '../src/core/search.js';
import { MemoryEmbeddingCache } from '../src/embeddings/cache.js';
import { ConfigurationError, IndexCorruptedError } from '../src/errors/index.js';
import type { ScoredRecord } from '../src/types/index.js';
import { contentHash } from '../src/utils/hashing.js';
import { KeywordEmbeddingProvider, makeTempDir, rmWithRetries, writeTree } from './test-helpers.js';

const SEPARATOR = '-'.repeat(40);

const AUTH_SOURCE =
  'def login(user, pwd):\n    """Authenticate a user against the credential store."""\n    return check(user, pwd)';
const REBUILT_AUTH_SOURCE =
  'def login(user, pwd, otp):\n    """Authenticate with a one-time code."""\n    return check(user, pwd, otp)';

function scored(text: string, score: number): ScoredRecord {
  return {
    id: 'r1',
    score,
    chunk: {
      filePath: 'src/auth.py',
      chunkType: 'function',
      name: 'login',
      text,
      startLine: 3,
      endLine: 4,
      contentHash: contentHash(text),
      language: 'python'
    }
  };
}

describe('renderResult', () => {
  it('fills known placeholders and formats scores with fixed decimals', () => {
    const rendered = renderResult(
      '{file}:{start_line}-{end_line} {type} {name} {score:.2f} {score}|{separator}|{full_text}',
      scored('def login(): pass', 0.876),
      '--'
    );
    expect(rendered).toBe('src/auth.py:3-4 function login 0.88 0.876|--|def login(): pass');
  });

  it('leaves unknown placeholders as written', () => {
    expect(renderResult('{file} {language} {name:.2f}', scored('x', 1), '-')).toBe(
      'src/auth.py {language} {name:.2f}'
    );
  });
});

describe('formatResults', () => {
  it('numbers each rendered result under the query header', () => {
    const results: QueryResult[] = [
      { ...scored('a', 0.9), rendered: 'first' },
      { ...scored('b', 0.5), rendered: 'second' }
    ];
    expect(formatResults('where is login', results)).toBe(
      'Results for query: where is login\n==========\n\nResult 1:\nfirst\n\nResult 2:\nsecond\n\n'
    );
  });

  it('says so when nothing matched', () => {
    expect(formatResults('nothing', [])).toBe(
      'Results for query: nothing\n==========\n\nNo results found.\n'
    );
  });
});

describe('QueryEngine', () => {
  let root: string;
  let provider: KeywordEmbeddingProvider;
  let errorSpy: ReturnType<typeof vi.spyOn>;
  const contexts: ProjectContext[] = [];

  async function open(env: NodeJS.ProcessEnv = {}): Promise<ProjectContext> {
    const ctx = await createProjectContext(
      { name: 'demo', codebaseRoot: root, indexName: 'demo' },
      {
        env: { CCR_EMBEDDER__MODEL: 'keyword', ...env },
        provider,
        cache: new MemoryEmbeddingCache()
      }
    );
    contexts.push(ctx);
    return ctx;
  }

  beforeEach(async () => {
    root = await makeTempDir('ccr-query-');
    await writeTree(root, {
      'auth.py': `${AUTH_SOURCE}\n`,
      'session.py':
        'def login_again(user):\n    """Authenticate again, then parse the session."""\n    return parse(user)\n',
      'misc.py': 'def other():\n    return 1\n'
    });
    provider = new KeywordEmbeddingProvider(['authenticat', 'parse', 'render']);
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    for (const ctx of contexts.splice(0)) {
      await ctx.close();
    }
    errorSpy.mockRestore();
    await rmWithRetries(root);
  });

  it('returns nothing before the project is indexed', async () => {
    const ctx = await open();
    expect(await ctx.queryEngine.query({ text: 'authentication' })).toEqual([]);
  });

  it('finds the documented function for a natural-language question with the default settings', async () => {
    const ctx = await open();
    await ctx.pipeline.run();

    const results = await ctx.queryEngine.query({ text: 'How is authentication implemented?' });

    expect(results.map((result) => result.chunk.filePath)).toEqual(['auth.py', 'session.py']);
    expect(results[0].chunk).toMatchObject({
      chunkType: 'function',
      name: 'login',
      startLine: 1,
      endLine: 3,
      text: AUTH_SOURCE
    });
    expect(results[0].score).toBe(1);
    expect(results[1].score).toBeCloseTo(Math.SQRT1_2, 10);
    expect(results[0].rendered).toBe(
      `File: auth.py | Type: function | Name: login\nScore: 1.0000\n${SEPARATOR}\n` +
        `${AUTH_SOURCE}\n${SEPARATOR}\n`
    );
  });

  it('honours top_k and the threshold bounds', async () => {
    const ctx = await open();
    await ctx.pipeline.run();

    const top = await ctx.queryEngine.query({ text: 'authentication', topK: 1 });
    expect(top.map((result) => result.chunk.filePath)).toEqual(['auth.py']);

    const exact = await ctx.queryEngine.query({ text: 'authentication', threshold: 1 });
    expect(exact.map((result) => result.chunk.filePath)).toEqual(['auth.py']);

    const everything = await ctx.queryEngine.query({ text: 'authentication', threshold: 0 });
    expect(everything.map((result) => [result.chunk.filePath, result.score])).toEqual([
      ['auth.py', 1],
      ['session.py', expect.closeTo(Math.SQRT1_2, 10)],
      ['misc.py', 0]
    ]);
  });

  it('rejects invalid requests before touching the index', async () => {
    const ctx = await open();

    await expect(ctx.queryEngine.query({ text: '   ' })).rejects.toThrow(
      'Query text must not be empty'
    );
    await expect(ctx.queryEngine.query({ text: 'authentication', topK: 0 })).rejects.toBeInstanceOf(
      ConfigurationError
    );
    await expect(ctx.queryEngine.query({ text: 'authentication', threshold: 1.5 })).rejects.toThrow(
      'threshold must be between 0 and 1, got 1.5'
    );
    expect(provider.calls).toEqual([]);
  });

  it('refuses to query an index built with another model', async () => {
    await (await open()).pipeline.run();
    const other = await open({ CCR_EMBEDDER__MODEL: 'keyword-v2' });

    await expect(other.queryEngine.query({ text: 'authentication' })).rejects.toThrow(
      IndexCorruptedError
    );
    await expect(other.queryEngine.query({ text: 'authentication' })).rejects.toThrow(
      /built with model 'keyword'/
    );
  });

  it('answers a query that started before a rebuild from the build it started on', async () => {
    const ctx = await open();
    await ctx.pipeline.run();

    let release: () => void = () => undefined;
    provider.gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const inFlight = ctx.queryEngine.query({ text: 'authentication in flight', topK: 1 });
    await vi.waitFor(() => {
      expect(provider.calls).toContainEqual(['authentication in flight']);
    });
    provider.gate = null;

    await fs.writeFile(path.join(root, 'auth.py'), `${REBUILT_AUTH_SOURCE}\n`);
    await ctx.pipeline.run();
    const fresh = await ctx.queryEngine.query({ text: 'authentication', topK: 1 });
    expect(fresh.map((result) => result.chunk.text)).toEqual([REBUILT_AUTH_SOURCE]);

    release();
    const started = await inFlight;
    expect(started.map((result) => result.chunk.text)).toEqual([AUTH_SOURCE]);

    const after = await ctx.queryEngine.query({ text: 'authentication', topK: 1 });
    expect(after.map((result) => result.chunk.text)).toEqual([REBUILT_AUTH_SOURCE]);
  });
});
