import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { MemoryEmbeddingCache } from '../src/embeddings/cache.js';
import { Embedder, type EmbedderOptions } from '../src/embeddings/embedder.js';
import { HashEmbeddingProvider } from '../src/embeddings/hash.js';
import { createEmbeddingProvider } from '../src/embeddings/index.js';
import { OpenAIEmbeddingProvider } from '../src/embeddings/openai.js';
import type { EmbeddingProvider } from '../src/embeddings/types.js';
import { ConfigurationError, EmbeddingBackendError } from '../src/errors/index.js';
import { contentHash } from '../src/utils/hashing.js';
import { KeywordEmbeddingProvider } from './test-helpers.js';

const OPTIONS: EmbedderOptions = {
  batchSize: 2,
  maxWorkers: 2,
  timeoutMs: 1000,
  maxRetries: 2,
  retryDelayMs: 0
};

function scriptedProvider(
  embed: (texts: string[]) => Promise<number[][]>,
  dimensions: number | null = 2
) {
  return {
    name: 'scripted',
    modelName: 'scripted',
    dimensions,
    initialize: async () => {},
    isReady: () => true,
    embedBatch: vi.fn(embed)
  } satisfies EmbeddingProvider;
}

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), {
    headers: { 'Content-Type': 'application/json' }
  });
}

describe('Embedder', () => {
  let warnSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  it('keeps input order and embeds each distinct text once', async () => {
    const provider = new KeywordEmbeddingProvider(['alpha', 'beta']);
    const embedder = new Embedder(provider, new MemoryEmbeddingCache(), 'keyword', OPTIONS);

    const vectors = await embedder.embedBatch(['beta', 'alpha', 'beta', 'nothing']);

    expect(vectors).toEqual([
      [0, 1, 0],
      [1, 0, 0],
      [0, 1, 0],
      [0, 0, 1]
    ]);
    expect(provider.calls.flat().sort()).toEqual(['alpha', 'beta', 'nothing']);
    expect(provider.calls.every((batch) => batch.length <= OPTIONS.batchSize)).toBe(true);
    expect(embedder.stats).toEqual({ cacheHits: 1, cacheMisses: 3, backendCalls: 2 });
  });

  it('serves repeated texts from the cache without calling the backend', async () => {
    const provider = new KeywordEmbeddingProvider(['alpha']);
    const cache = new MemoryEmbeddingCache();
    const embedder = new Embedder(provider, cache, 'keyword', OPTIONS);

    const first = await embedder.embedBatch(['alpha one']);
    const callsAfterFirst = provider.calls.length;
    const second = await embedder.embedBatch(['alpha one']);

    expect(second).toEqual(first);
    expect(provider.calls).toHaveLength(callsAfterFirst);
    expect(cache.get(contentHash('alpha one'), 'keyword')).toEqual([1, 0]);
  });

  it('partitions the cache by model id', async () => {
    const cache = new MemoryEmbeddingCache();
    cache.put(contentHash('alpha'), 'other-model', [9, 9]);
    const provider = new KeywordEmbeddingProvider(['alpha']);
    const embedder = new Embedder(provider, cache, 'keyword', OPTIONS);

    expect(await embedder.embedQuery('alpha')).toEqual([1, 0]);
    expect(provider.calls).toEqual([['alpha']]);
  });

  it('returns an empty list without touching the backend', async () => {
    const provider = scriptedProvider(async () => []);
    const embedder = new Embedder(provider, new MemoryEmbeddingCache(), 'scripted', OPTIONS);

    expect(await embedder.embedBatch([])).toEqual([]);
    expect(provider.embedBatch).not.toHaveBeenCalled();
  });

  it('retries retryable failures and then succeeds', async () => {
    let attempts = 0;
    const provider = scriptedProvider(async (texts) => {
      attempts++;
      if (attempts < 3) {
        throw new EmbeddingBackendError('busy', 'http', { status: 503 });
      }
      return texts.map(() => [1, 0]);
    });
    const embedder = new Embedder(provider, new MemoryEmbeddingCache(), 'scripted', OPTIONS);

    expect(await embedder.embedQuery('q')).toEqual([1, 0]);
    expect(attempts).toBe(3);
    expect(warnSpy).toHaveBeenCalledTimes(2);
  });

  it('gives up after max_retries and caches nothing', async () => {
    const provider = scriptedProvider(async () => {
      throw new EmbeddingBackendError('busy', 'http', { status: 503 });
    });
    const cache = new MemoryEmbeddingCache();
    const embedder = new Embedder(provider, cache, 'scripted', OPTIONS);

    await expect(embedder.embedBatch(['a'])).rejects.toBeInstanceOf(EmbeddingBackendError);
    expect(provider.embedBatch).toHaveBeenCalledTimes(OPTIONS.maxRetries + 1);
    expect(cache.count()).toBe(0);
  });

  it('does not retry client errors', async () => {
    const provider = scriptedProvider(async () => {
      throw new EmbeddingBackendError('bad request', 'http', { status: 400 });
    });
    const embedder = new Embedder(provider, new MemoryEmbeddingCache(), 'scripted', OPTIONS);

    await expect(embedder.embedBatch(['a'])).rejects.toThrow('bad request');
    expect(provider.embedBatch).toHaveBeenCalledTimes(1);
  });

  it('times out slow requests', async () => {
    const provider = scriptedProvider(() => new Promise<number[][]>(() => {}));
    const embedder = new Embedder(provider, new MemoryEmbeddingCache(), 'scripted', {
      ...OPTIONS,
      timeoutMs: 10,
      maxRetries: 0
    });

    const error = await embedder.embedBatch(['a']).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(EmbeddingBackendError);
    expect(error).toHaveProperty('kind', 'timeout');
  });

  it('rejects responses of the wrong length or dimension', async () => {
    const short = scriptedProvider(async () => [[1, 0]]);
    const embedder = new Embedder(short, new MemoryEmbeddingCache(), 'scripted', {
      ...OPTIONS,
      batchSize: 10
    });
    await expect(embedder.embedBatch(['a', 'b'])).rejects.toThrow(
      'Embedding backend returned 1 vectors for 2 texts'
    );

    const wide = scriptedProvider(async (texts) => texts.map(() => [1, 0, 0]));
    const mismatched = new Embedder(wide, new MemoryEmbeddingCache(), 'scripted', OPTIONS);
    await expect(mismatched.embedBatch(['a'])).rejects.toThrow(
      'Embedding dimension mismatch: expected 2, got 3'
    );
  });

  it('learns the dimension from the first response when the provider does not declare it', async () => {
    const provider = scriptedProvider(async (texts) => texts.map(() => [0.5, 0.5, 0.5]), null);
    const embedder = new Embedder(provider, new MemoryEmbeddingCache(), 'scripted', OPTIONS);

    expect(embedder.dimensions).toBeNull();
    await embedder.embedQuery('x');
    expect(embedder.dimensions).toBe(3);
  });
});

describe('HashEmbeddingProvider', () => {
  it('is deterministic and unit length', async () => {
    const provider = new HashEmbeddingProvider(16);
    const [a, b] = await provider.embedBatch(['Parse the config', 'parse THE config']);

    expect(a).toEqual(b);
    expect(a).toHaveLength(16);
    const norm = Math.sqrt(a.reduce((sum, value) => sum + value * value, 0));
    expect(norm).toBeCloseTo(1, 10);
  });
});

describe('createEmbeddingProvider', () => {
  const base = {
    model: 'hash/8',
    cache_dir: '.cache/embeddings',
    use_cache: false,
    batch_size: 8,
    max_workers: 1,
    timeout_ms: 1000,
    max_retries: 0,
    api_endpoint: 'https://embeddings.example.test/v1'
  };

  it('selects the provider family from the model id', () => {
    expect(createEmbeddingProvider(base, {})).toBeInstanceOf(HashEmbeddingProvider);
    expect(
      createEmbeddingProvider({ ...base, model: 'openai/text-embedding-3-small' }, {})
    ).toBeInstanceOf(OpenAIEmbeddingProvider);
  });

  it('rejects malformed model ids', () => {
    expect(() => createEmbeddingProvider({ ...base, model: 'hash/zero' }, {})).toThrow(
      ConfigurationError
    );
    expect(() => createEmbeddingProvider({ ...base, model: 'openai/' }, {})).toThrow(
      ConfigurationError
    );
  });
});

describe('OpenAIEmbeddingProvider', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('requires an API key', async () => {
    const provider = new OpenAIEmbeddingProvider('text-embedding-3-small', undefined);
    await expect(provider.initialize()).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('orders embeddings by the returned index', async () => {
    const fetchMock = vi.fn(async () =>
      jsonResponse({
        data: [
          { index: 1, embedding: [0, 1] },
          { index: 0, embedding: [1, 0] }
        ]
      })
    );
    vi.stubGlobal('fetch', fetchMock);

    const provider = new OpenAIEmbeddingProvider(
      'text-embedding-3-small',
      'test-secret',
      'https://embeddings.example.test/v1/'
    );
    const vectors = await provider.embedBatch(['first', 'second']);

    expect(vectors).toEqual([
      [1, 0],
      [0, 1]
    ]);
    expect(fetchMock).toHaveBeenCalledWith(
      'https://embeddings.example.test/v1/embeddings',
      expect.objectContaining({ method: 'POST' })
    );
  });

  it('maps HTTP failures to retryable or permanent errors', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response('slow down', { status: 429 }))
    );
    const provider = new OpenAIEmbeddingProvider('text-embedding-3-small', 'test-secret');

    const error = await provider.embedBatch(['a']).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(EmbeddingBackendError);
    expect(error).toHaveProperty('retryable', true);
    expect(error).toHaveProperty('message', 'OpenAI API Error 429: slow down');
  });

  it('flags malformed payloads', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => jsonResponse({ embeddings: [] }))
    );
    const provider = new OpenAIEmbeddingProvider('text-embedding-3-small', 'test-secret');

    const error = await provider.embedBatch(['a']).catch((e: unknown) => e);
    expect(error).toHaveProperty('kind', 'malformed');
  });
});
