import { createHash } from 'crypto';

export function sha256(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

/** Stable identity of a chunk's text; the embedding cache key. */
export function contentHash(text: string): string {
  return sha256(text);
}
