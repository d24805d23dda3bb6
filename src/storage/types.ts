/**
 * Types for approximate nearest-neighbor backends.
 *
 * The vector index keeps exact vectors itself and asks a backend only for candidate ids,
 * which it rescores, so backends may be approximate.
 */

import type { Metric } from '../types/index.js';

export type AnnBackendKind = 'flat' | 'lancedb';

export interface AnnEntry {
  id: string;
  vector: number[];
}

export interface AnnCandidate {
  id: string;
  distance: number;
}

export interface AnnOpenOptions {
  /** Throw IndexCorruptedError when no stored vectors are found */
  expectExisting?: boolean;
}

export interface AnnBackend {
  readonly name: AnnBackendKind;
  /** `search` considers every stored vector */
  readonly exhaustive: boolean;
  /** Stored vectors survive in the directory given to `open` */
  readonly persistent: boolean;

  open(dir: string, metric: Metric, options?: AnnOpenOptions): Promise<void>;
  add(entries: AnnEntry[]): Promise<void>;
  remove(ids: string[]): Promise<void>;
  search(vector: number[], limit: number): Promise<AnnCandidate[]>;
  count(): Promise<number>;
  persist(): Promise<void>;
  close(): Promise<void>;
}
