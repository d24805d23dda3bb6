import type { EmbeddingProvider } from './types.js';

const TOKEN_PATTERN = /[\p{L}\p{N}_]+/gu;

/**
 * Deterministic, offline provider: signed feature hashing of lowercase word tokens
 * (FNV-1a), L2-normalized. Texts sharing vocabulary score closer together. Selected with
 * `embedder.model: hash/<dimensions>`.
 */
export class HashEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'hash';
  readonly modelName: string;

  constructor(readonly dimensions: number = 384) {
    this.modelName = `hash/${dimensions}`;
  }

  async initialize(): Promise<void> {
    // Nothing to load.
  }

  isReady(): boolean {
    return true;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.embedOne(text));
  }

  private embedOne(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of text.toLowerCase().match(TOKEN_PATTERN) ?? []) {
      const hash = hashString(token);
      const sign = hash & 1 ? -1 : 1;
      vector[(hash >>> 1) % this.dimensions] += sign;
    }
    return normalizeVector(vector);
  }
}

function hashString(input: string): number {
  let hash = 2166136261;
  for (let i = 0; i < input.length; i += 1) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 16777619);
  }
  return hash >>> 0;
}

export function normalizeVector(vector: number[]): number[] {
  let sumSquares = 0;
  for (const value of vector) {
    sumSquares += value * value;
  }
  const norm = Math.sqrt(sumSquares) || 1;
  return vector.map((value) => value / norm);
}
