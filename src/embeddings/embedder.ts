/**
 * Embedder - batches texts through an embedding provider behind a content-addressed cache.
 *
 * Only cache misses reach the provider, de-duplicated and split into `batchSize`
 * sub-batches that run through a bounded worker pool. A sub-batch that fails after its
 * retries fails the whole call; callers never see a partial result.
 */

import pLimit from 'p-limit';

import { EmbeddingBackendError, errorMessage } from '../errors/index.js';
import { contentHash } from '../utils/hashing.js';
import { debugLog } from '../utils/debug.js';
import type { EmbeddingCache } from './cache.js';
import type { EmbeddingProvider } from './types.js';

export interface EmbedderOptions {
  batchSize: number;
  maxWorkers: number;
  timeoutMs: number;
  maxRetries: number;
  /** Base delay between retries; grows linearly with the attempt number */
  retryDelayMs?: number;
}

export interface EmbedderStats {
  cacheHits: number;
  cacheMisses: number;
  backendCalls: number;
}

const DEFAULT_RETRY_DELAY_MS = 250;

export class Embedder {
  private dimension: number | null;
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly retryDelayMs: number;
  private ready: Promise<void> | null = null;
  readonly stats: EmbedderStats = { cacheHits: 0, cacheMisses: 0, backendCalls: 0 };

  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly cache: EmbeddingCache,
    /** Partition key of the cache; distinguishes embedding spaces */
    readonly modelId: string,
    private readonly options: EmbedderOptions
  ) {
    this.dimension = provider.dimensions;
    this.limit = pLimit(options.maxWorkers);
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  }

  /** Output dimensionality; null until the provider has reported it */
  get dimensions(): number | null {
    return this.dimension;
  }

  async embedQuery(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }

  /**
   * Embeds `texts`, preserving order and length. Throws EmbeddingBackendError when any
   * sub-batch fails for good.
   */
  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const hashes = texts.map((text) => contentHash(text));
    const resolved = new Map<string, number[]>();

    for (const [hash, vector] of this.cache.getMany(hashes, this.modelId)) {
      if (this.dimension === null || vector.length === this.dimension) {
        resolved.set(hash, vector);
      }
    }

    const misses = new Map<string, string>();
    hashes.forEach((hash, index) => {
      if (!resolved.has(hash) && !misses.has(hash)) {
        misses.set(hash, texts[index]);
      }
    });

    this.stats.cacheHits += texts.length - misses.size;
    this.stats.cacheMisses += misses.size;

    if (misses.size > 0) {
      await this.ensureReady();
      const pending = [...misses.entries()];
      const batches: Array<Array<[string, string]>> = [];
      for (let i = 0; i < pending.length; i += this.options.batchSize) {
        batches.push(pending.slice(i, i + this.options.batchSize));
      }

      await Promise.all(
        batches.map((batch) =>
          this.limit(async () => {
            const vectors = await this.embedWithRetry(batch.map(([, text]) => text));
            const entries = batch.map(([hash], index): [string, number[]] => [
              hash,
              vectors[index]
            ]);
            this.cache.putMany(entries, this.modelId);
            for (const [hash, vector] of entries) {
              resolved.set(hash, vector);
            }
          })
        )
      );
    }

    return hashes.map((hash) => {
      const vector = resolved.get(hash);
      if (!vector) {
        throw new EmbeddingBackendError(`No embedding produced for ${hash}`, 'malformed');
      }
      return vector;
    });
  }

  /** Initializes the provider once, on the first cache miss. */
  private async ensureReady(): Promise<void> {
    if (!this.ready) {
      this.ready = this.provider.initialize().catch((error: unknown) => {
        this.ready = null;
        throw error;
      });
    }
    await this.ready;
    this.dimension ??= this.provider.dimensions;
  }

  private async embedWithRetry(texts: string[]): Promise<number[][]> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.embedOnce(texts);
      } catch (error) {
        const failure =
          error instanceof EmbeddingBackendError
            ? error
            : new EmbeddingBackendError(
                `Embedding backend failed: ${errorMessage(error)}`,
                'unavailable',
                { retryable: false, cause: error }
              );

        if (!failure.retryable || attempt >= this.options.maxRetries) {
          throw failure;
        }

        console.warn(
          `Embedding batch of ${texts.length} failed (${failure.kind}), retry ${attempt + 1}/${this.options.maxRetries}: ${failure.message}`
        );
        await delay(this.retryDelayMs * (attempt + 1));
      }
    }
  }

  private async embedOnce(texts: string[]): Promise<number[][]> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(
          new EmbeddingBackendError(
            `Embedding request timed out after ${this.options.timeoutMs}ms`,
            'timeout'
          )
        );
      }, this.options.timeoutMs);
    });

    this.stats.backendCalls++;
    debugLog(`Embedding ${texts.length} texts with ${this.modelId}`);

    try {
      const vectors = await Promise.race([
        this.provider.embedBatch(texts, { signal: controller.signal }),
        timeout
      ]);
      this.validate(texts.length, vectors);
      return vectors;
    } finally {
      clearTimeout(timer);
    }
  }

  private validate(expected: number, vectors: number[][]): void {
    if (vectors.length !== expected) {
      throw new EmbeddingBackendError(
        `Embedding backend returned ${vectors.length} vectors for ${expected} texts`,
        'malformed'
      );
    }

    for (const vector of vectors) {
      if (vector.length === 0 || !vector.every(Number.isFinite)) {
        throw new EmbeddingBackendError(
          'Embedding backend returned an empty or non-finite vector',
          'malformed'
        );
      }
      if (this.dimension === null) {
        this.dimension = vector.length;
      } else if (vector.length !== this.dimension) {
        throw new EmbeddingBackendError(
          `Embedding dimension mismatch: expected ${this.dimension}, got ${vector.length}`,
          'malformed'
        );
      }
    }
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
