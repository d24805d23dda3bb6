import type { Metric } from '../types/index.js';
import { similarity } from './scoring.js';
import type { AnnBackend, AnnCandidate, AnnEntry } from './types.js';

/**
 * Exhaustive in-memory backend. Vectors are fed from the index records on load, so nothing
 * is written to disk here.
 */
export class FlatAnnBackend implements AnnBackend {
  readonly name = 'flat';
  readonly exhaustive = true;
  readonly persistent = false;

  private vectors = new Map<string, number[]>();
  private metric: Metric = 'cosine';

  async open(_dir: string, metric: Metric): Promise<void> {
    this.metric = metric;
    this.vectors.clear();
  }

  async add(entries: AnnEntry[]): Promise<void> {
    for (const entry of entries) {
      this.vectors.set(entry.id, entry.vector);
    }
  }

  async remove(ids: string[]): Promise<void> {
    for (const id of ids) {
      this.vectors.delete(id);
    }
  }

  async search(vector: number[], limit: number): Promise<AnnCandidate[]> {
    const candidates: AnnCandidate[] = [];
    for (const [id, stored] of this.vectors) {
      candidates.push({ id, distance: 1 - similarity(this.metric, vector, stored) });
    }
    candidates.sort((a, b) => a.distance - b.distance || (a.id < b.id ? -1 : 1));
    return candidates.slice(0, limit);
  }

  async count(): Promise<number> {
    return this.vectors.size;
  }

  async persist(): Promise<void> {
    // Records carry the vectors.
  }

  async close(): Promise<void> {
    this.vectors.clear();
  }
}
