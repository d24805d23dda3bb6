/**
 * Content-addressed embedding cache keyed by (model id, content hash).
 * Entries are never mutated; the same key always maps to the same vector, so concurrent
 * writers are last-writer-wins without conflict.
 */

import { mkdirSync } from 'fs';
import path from 'path';
import Database from 'better-sqlite3';

export interface EmbeddingCache {
  get(contentHash: string, modelId: string): number[] | undefined;
  getMany(contentHashes: string[], modelId: string): Map<string, number[]>;
  put(contentHash: string, modelId: string, vector: number[]): void;
  putMany(entries: Iterable<[string, number[]]>, modelId: string): void;
  /** Removes every entry, or only those of one model */
  clear(modelId?: string): number;
  count(modelId?: string): number;
  close(): void;
}

/** In-process cache, used when `use_cache` is off. */
export class MemoryEmbeddingCache implements EmbeddingCache {
  private entries = new Map<string, Map<string, number[]>>();

  get(contentHash: string, modelId: string): number[] | undefined {
    return this.entries.get(modelId)?.get(contentHash);
  }

  getMany(contentHashes: string[], modelId: string): Map<string, number[]> {
    const hits = new Map<string, number[]>();
    for (const hash of contentHashes) {
      const vector = this.get(hash, modelId);
      if (vector) hits.set(hash, vector);
    }
    return hits;
  }

  put(contentHash: string, modelId: string, vector: number[]): void {
    let model = this.entries.get(modelId);
    if (!model) {
      model = new Map();
      this.entries.set(modelId, model);
    }
    model.set(contentHash, [...vector]);
  }

  putMany(entries: Iterable<[string, number[]]>, modelId: string): void {
    for (const [hash, vector] of entries) {
      this.put(hash, modelId, vector);
    }
  }

  clear(modelId?: string): number {
    const removed = this.count(modelId);
    if (modelId === undefined) this.entries.clear();
    else this.entries.delete(modelId);
    return removed;
  }

  count(modelId?: string): number {
    if (modelId !== undefined) return this.entries.get(modelId)?.size ?? 0;
    let total = 0;
    for (const model of this.entries.values()) total += model.size;
    return total;
  }

  close(): void {
    this.entries.clear();
  }
}

const SQLITE_PARAM_CHUNK = 500;

interface VectorRow {
  content_hash: string;
  vector: Buffer;
}

interface CountRow {
  total: number;
}

/** Vectors are stored as little-endian float64 so reads return exactly what was written. */
export function serializeVector(vector: number[]): Buffer {
  const buffer = Buffer.alloc(vector.length * 8);
  vector.forEach((value, index) => buffer.writeDoubleLE(value, index * 8));
  return buffer;
}

export function deserializeVector(buffer: Buffer): number[] {
  const vector = new Array<number>(Math.floor(buffer.length / 8));
  for (let i = 0; i < vector.length; i++) {
    vector[i] = buffer.readDoubleLE(i * 8);
  }
  return vector;
}

/**
 * SQLite-backed cache (better-sqlite3). WAL mode lets several processes read while one writes.
 */
export class SqliteEmbeddingCache implements EmbeddingCache {
  private readonly db: Database.Database;

  constructor(readonly filePath: string) {
    mkdirSync(path.dirname(filePath), { recursive: true });
    this.db = new Database(filePath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('busy_timeout = 5000');
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS embeddings (
        model_id TEXT NOT NULL,
        content_hash TEXT NOT NULL,
        dimension INTEGER NOT NULL,
        vector BLOB NOT NULL,
        created_at INTEGER NOT NULL,
        PRIMARY KEY (model_id, content_hash)
      )
    `);
  }

  get(contentHash: string, modelId: string): number[] | undefined {
    const row = this.db
      .prepare<[string, string], VectorRow>(
        'SELECT content_hash, vector FROM embeddings WHERE model_id = ? AND content_hash = ?'
      )
      .get(modelId, contentHash);
    return row ? deserializeVector(row.vector) : undefined;
  }

  getMany(contentHashes: string[], modelId: string): Map<string, number[]> {
    const hits = new Map<string, number[]>();
    const unique = [...new Set(contentHashes)];

    for (let i = 0; i < unique.length; i += SQLITE_PARAM_CHUNK) {
      const slice = unique.slice(i, i + SQLITE_PARAM_CHUNK);
      const placeholders = slice.map(() => '?').join(', ');
      const rows = this.db
        .prepare<string[], VectorRow>(
          `SELECT content_hash, vector FROM embeddings
           WHERE model_id = ? AND content_hash IN (${placeholders})`
        )
        .all(modelId, ...slice);
      for (const row of rows) {
        hits.set(row.content_hash, deserializeVector(row.vector));
      }
    }

    return hits;
  }

  put(contentHash: string, modelId: string, vector: number[]): void {
    this.putMany([[contentHash, vector]], modelId);
  }

  putMany(entries: Iterable<[string, number[]]>, modelId: string): void {
    const insert = this.db.prepare<[string, string, number, Buffer, number]>(
      `INSERT INTO embeddings (model_id, content_hash, dimension, vector, created_at)
       VALUES (?, ?, ?, ?, ?)
       ON CONFLICT(model_id, content_hash) DO UPDATE SET
         dimension = excluded.dimension,
         vector = excluded.vector`
    );
    const now = Date.now();
    const writeAll = this.db.transaction((rows: Array<[string, number[]]>) => {
      for (const [hash, vector] of rows) {
        insert.run(modelId, hash, vector.length, serializeVector(vector), now);
      }
    });
    writeAll([...entries]);
  }

  clear(modelId?: string): number {
    const result =
      modelId === undefined
        ? this.db.prepare('DELETE FROM embeddings').run()
        : this.db.prepare<[string]>('DELETE FROM embeddings WHERE model_id = ?').run(modelId);
    return result.changes;
  }

  count(modelId?: string): number {
    const row =
      modelId === undefined
        ? this.db.prepare<[], CountRow>('SELECT COUNT(*) AS total FROM embeddings').get()
        : this.db
            .prepare<[string], CountRow>(
              'SELECT COUNT(*) AS total FROM embeddings WHERE model_id = ?'
            )
            .get(modelId);
    return row?.total ?? 0;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
