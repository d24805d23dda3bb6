import { z } from 'zod';

import { EmbeddingBackendError, errorMessage } from '../errors/index.js';
import { DEFAULT_MODEL, type EmbeddingProvider } from './types.js';

const MODEL_CONFIGS: Record<string, { dimensions: number }> = {
  'Xenova/all-MiniLM-L6-v2': { dimensions: 384 },
  'Xenova/bge-small-en-v1.5': { dimensions: 384 },
  'Xenova/bge-base-en-v1.5': { dimensions: 768 },
  'sentence-transformers/all-MiniLM-L6-v2': { dimensions: 384 }
};

// Optional dependency: resolved at run time so the package builds without it.
const TRANSFORMERS_MODULE: string = '@huggingface/transformers';

const EmbeddingListSchema = z.array(z.array(z.number()));

type FeatureExtractor = (texts: string[]) => Promise<unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Local embeddings through the transformers.js feature-extraction pipeline
 * (mean pooling, normalized). The model is downloaded on first use.
 */
export class TransformersEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'transformers';
  readonly modelName: string;
  readonly dimensions: number | null;

  private extractor: FeatureExtractor | null = null;
  private initPromise: Promise<void> | null = null;

  constructor(modelName: string = DEFAULT_MODEL) {
    this.modelName = modelName;
    this.dimensions = MODEL_CONFIGS[modelName]?.dimensions ?? null;
  }

  async initialize(): Promise<void> {
    if (this.extractor) return;
    if (this.initPromise) return this.initPromise;

    this.initPromise = this._initialize().catch((error: unknown) => {
      this.initPromise = null;
      throw error;
    });
    return this.initPromise;
  }

  private async _initialize(): Promise<void> {
    console.error(`Loading embedding model: ${this.modelName}`);
    console.error('(First run downloads the model)');

    let transformers: unknown;
    try {
      transformers = await import(TRANSFORMERS_MODULE);
    } catch (error) {
      throw new EmbeddingBackendError(
        `${TRANSFORMERS_MODULE} is not installed; install it or set embedder.model to "openai/<model>" or "hash/<dimensions>" (${errorMessage(error)})`,
        'unavailable',
        { retryable: false, cause: error }
      );
    }

    const pipeline = isRecord(transformers) ? transformers.pipeline : undefined;
    if (typeof pipeline !== 'function') {
      throw new EmbeddingBackendError(
        `${TRANSFORMERS_MODULE} does not export a pipeline factory`,
        'unavailable',
        { retryable: false }
      );
    }

    const extractor: unknown = await pipeline('feature-extraction', this.modelName);
    if (typeof extractor !== 'function') {
      throw new EmbeddingBackendError(
        `Model ${this.modelName} did not load as a feature-extraction pipeline`,
        'unavailable',
        { retryable: false }
      );
    }

    this.extractor = async (texts) => extractor(texts, { pooling: 'mean', normalize: true });
    console.error(`Model loaded successfully: ${this.modelName}`);
  }

  isReady(): boolean {
    return this.extractor !== null;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (!texts.length) return [];
    await this.initialize();
    if (!this.extractor) {
      throw new EmbeddingBackendError('Embedding model is not loaded', 'unavailable');
    }

    const output = await this.extractor(texts);
    const list: unknown =
      isRecord(output) && typeof output.tolist === 'function' ? output.tolist() : output;
    const parsed = EmbeddingListSchema.safeParse(list);
    if (!parsed.success) {
      throw new EmbeddingBackendError(
        `Unexpected feature-extraction output: ${parsed.error.message}`,
        'malformed'
      );
    }
    return parsed.data;
  }
}
