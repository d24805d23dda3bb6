export * from './types.js';
export * from './cache.js';
export * from './embedder.js';
export { HashEmbeddingProvider } from './hash.js';
export { OpenAIEmbeddingProvider } from './openai.js';
export { TransformersEmbeddingProvider } from './transformers.js';

import path from 'path';

import type { EmbedderConfig } from '../config/index.js';
import { EMBEDDING_CACHE_FILENAME } from '../constants/index-layout.js';
import { ConfigurationError } from '../errors/index.js';
import { MemoryEmbeddingCache, SqliteEmbeddingCache, type EmbeddingCache } from './cache.js';
import { Embedder } from './embedder.js';
import { HashEmbeddingProvider } from './hash.js';
import { OpenAIEmbeddingProvider } from './openai.js';
import { TransformersEmbeddingProvider } from './transformers.js';
import type { EmbeddingProvider } from './types.js';

/**
 * Selects the provider family from `embedder.model`:
 * `hash/<dimensions>`, `openai/<model>`, or a transformers.js model id.
 */
export function createEmbeddingProvider(
  config: EmbedderConfig,
  env: NodeJS.ProcessEnv = process.env
): EmbeddingProvider {
  const model = config.model.trim();

  if (model.startsWith('hash/')) {
    const dimensions = Number(model.slice('hash/'.length));
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new ConfigurationError(`Invalid hash embedding dimensions in '${model}'`);
    }
    return new HashEmbeddingProvider(dimensions);
  }

  if (model.startsWith('openai/')) {
    const openaiModel = model.slice('openai/'.length);
    if (!openaiModel) {
      throw new ConfigurationError(`Missing OpenAI model name in '${model}'`);
    }
    return new OpenAIEmbeddingProvider(openaiModel, env.OPENAI_API_KEY, config.api_endpoint);
  }

  return new TransformersEmbeddingProvider(model);
}

export function createEmbeddingCache(config: EmbedderConfig, cacheDir: string): EmbeddingCache {
  return config.use_cache
    ? new SqliteEmbeddingCache(path.join(cacheDir, EMBEDDING_CACHE_FILENAME))
    : new MemoryEmbeddingCache();
}

export function createEmbedder(
  config: EmbedderConfig,
  cache: EmbeddingCache,
  provider: EmbeddingProvider = createEmbeddingProvider(config)
): Embedder {
  return new Embedder(provider, cache, config.model, {
    batchSize: config.batch_size,
    maxWorkers: config.max_workers,
    timeoutMs: config.timeout_ms,
    maxRetries: config.max_retries
  });
}
