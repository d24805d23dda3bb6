/**
 * Types for embedding providers
 */

export interface EmbedRequestOptions {
  /** Aborted when the embedder gives up on the request (timeout) */
  signal?: AbortSignal;
}

export interface EmbeddingProvider {
  readonly name: string;
  readonly modelName: string;
  /** Output dimensionality, or null when only known after the first response */
  readonly dimensions: number | null;

  /**
   * Initialize the provider (load model, check credentials, etc.)
   */
  initialize(): Promise<void>;

  /**
   * Generate embeddings for multiple texts, in input order
   */
  embedBatch(texts: string[], options?: EmbedRequestOptions): Promise<number[][]>;

  /**
   * Check if provider is ready
   */
  isReady(): boolean;
}

export const DEFAULT_MODEL = 'Xenova/all-MiniLM-L6-v2';
