import { z } from 'zod';

import { ConfigurationError, EmbeddingBackendError, errorMessage } from '../errors/index.js';
import type { EmbedRequestOptions, EmbeddingProvider } from './types.js';

const OpenAIEmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int().nonnegative().optional()
    })
  )
});

const MODEL_DIMENSIONS: Record<string, number> = {
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536
};

/**
 * OpenAI-compatible embedding provider.
 * Uses native fetch to avoid adding the heavy openai npm package dependency.
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'openai';
  readonly dimensions: number | null;

  constructor(
    readonly modelName: string = 'text-embedding-3-small',
    private apiKey?: string,
    private apiEndpoint: string = 'https://api.openai.com/v1'
  ) {
    this.dimensions = MODEL_DIMENSIONS[modelName] ?? null;
  }

  async initialize(): Promise<void> {
    if (!this.apiKey) {
      throw new ConfigurationError(
        'OpenAI API key is missing. Set the OPENAI_API_KEY environment variable.'
      );
    }
  }

  isReady(): boolean {
    return !!this.apiKey;
  }

  async embedBatch(texts: string[], options: EmbedRequestOptions = {}): Promise<number[][]> {
    if (!texts.length) return [];

    let response: Response;
    try {
      response = await fetch(`${this.apiEndpoint.replace(/\/+$/, '')}/embeddings`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`
        },
        body: JSON.stringify({
          model: this.modelName,
          input: texts,
          encoding_format: 'float'
        }),
        signal: options.signal
      });
    } catch (error) {
      // Network-level failures (DNS, reset connections) are worth another attempt.
      throw new EmbeddingBackendError(
        `OpenAI request failed: ${errorMessage(error)}`,
        'unavailable',
        { retryable: true, cause: error }
      );
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      throw new EmbeddingBackendError(
        `OpenAI API Error ${response.status}: ${body.slice(0, 500)}`,
        'http',
        { status: response.status }
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new EmbeddingBackendError('OpenAI response is not JSON', 'malformed', {
        cause: error
      });
    }

    const parsed = OpenAIEmbeddingResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new EmbeddingBackendError(
        `OpenAI response has an unexpected shape: ${parsed.error.message}`,
        'malformed'
      );
    }

    // Order by the returned index when present; otherwise the API keeps input order.
    return [...parsed.data.data]
      .map((item, position) => ({ position: item.index ?? position, embedding: item.embedding }))
      .sort((a, b) => a.position - b.position)
      .map((item) => item.embedding);
  }
}
