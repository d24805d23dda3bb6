/**
 * LanceDB ANN backend
 * Embedded vector table of (id, vector) rows stored beside the build's records.
 */

import { promises as fs } from 'fs';
import type { Connection, Table } from '@lancedb/lancedb';
import { z } from 'zod';

import { LANCEDB_TABLE_NAME } from '../constants/index-layout.js';
import { IndexCorruptedError, errorMessage } from '../errors/index.js';
import type { Metric } from '../types/index.js';
import type { AnnBackend, AnnCandidate, AnnEntry, AnnOpenOptions } from './types.js';

const SearchRowSchema = z.object({
  id: z.string(),
  _distance: z.number().optional()
});

const CORRUPTION_MARKERS = ['no vector column', 'not found', 'does not exist', 'corrupted', 'schema'];

function escapeLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export class LanceDBAnnBackend implements AnnBackend {
  readonly name = 'lancedb';
  readonly exhaustive = false;
  readonly persistent = true;

  private db: Connection | null = null;
  private table: Table | null = null;
  private metric: Metric = 'cosine';
  private storagePath = '';

  /**
   * Opens (or prepares) the table under `dir`.
   * With `expectExisting`, a missing table is an IndexCorruptedError.
   */
  async open(dir: string, metric: Metric, options: AnnOpenOptions = {}): Promise<void> {
    this.metric = metric;
    this.storagePath = dir;

    try {
      await fs.mkdir(dir, { recursive: true });

      const lancedb = await import('@lancedb/lancedb');
      this.db = await lancedb.connect(dir);

      const tableNames = await this.db.tableNames();
      if (tableNames.includes(LANCEDB_TABLE_NAME)) {
        this.table = await this.db.openTable(LANCEDB_TABLE_NAME);

        const schema = await this.table.schema();
        const hasVectorColumn = schema.fields.some((field) => field.name === 'vector');
        if (!hasVectorColumn) {
          throw new IndexCorruptedError('LanceDB index corrupted: missing vector column');
        }
      } else if (options.expectExisting) {
        throw new IndexCorruptedError(
          `LanceDB index missing: no ${LANCEDB_TABLE_NAME} table found at ${dir}`
        );
      } else {
        this.table = null;
      }
    } catch (error) {
      if (error instanceof IndexCorruptedError) {
        throw error;
      }
      throw new IndexCorruptedError(`LanceDB initialization failed: ${errorMessage(error)}`);
    }
  }

  async add(entries: AnnEntry[]): Promise<void> {
    if (entries.length === 0) return;
    const db = this.requireConnection();

    const rows = entries.map((entry) => ({ id: entry.id, vector: entry.vector }));
    if (this.table) {
      await this.table.add(rows);
    } else {
      this.table = await db.createTable(LANCEDB_TABLE_NAME, rows, { mode: 'overwrite' });
    }
  }

  async remove(ids: string[]): Promise<void> {
    if (!this.table || ids.length === 0) return;
    await this.table.delete(`id IN (${ids.map(escapeLiteral).join(', ')})`);
  }

  /**
   * Errors that look like a damaged table raise IndexCorruptedError.
   * Other failures are logged and yield no candidates.
   */
  async search(vector: number[], limit: number): Promise<AnnCandidate[]> {
    if (!this.table) {
      return [];
    }

    try {
      const rows: unknown[] = await this.table
        .vectorSearch(vector)
        .distanceType(this.metric === 'cosine' ? 'cosine' : 'l2')
        .select(['id'])
        .limit(limit)
        .toArray();

      return rows.map((row) => {
        const parsed = SearchRowSchema.safeParse(row);
        if (!parsed.success) {
          throw new IndexCorruptedError(`LanceDB row schema mismatch: ${parsed.error.message}`);
        }
        return { id: parsed.data.id, distance: parsed.data._distance ?? 0 };
      });
    } catch (error) {
      if (error instanceof IndexCorruptedError) throw error;

      const message = errorMessage(error);
      if (CORRUPTION_MARKERS.some((marker) => message.toLowerCase().includes(marker))) {
        throw new IndexCorruptedError(`LanceDB query failed (rebuild required): ${message}`);
      }

      console.error('[LanceDB] Search error:', message);
      return [];
    }
  }

  async count(): Promise<number> {
    if (!this.table) return 0;
    try {
      return await this.table.countRows();
    } catch (error) {
      throw new IndexCorruptedError(
        `LanceDB table at ${this.storagePath} is unreadable: ${errorMessage(error)}`
      );
    }
  }

  async persist(): Promise<void> {
    // Writes are durable once add/delete resolve.
  }

  async close(): Promise<void> {
    this.table?.close();
    this.db?.close();
    this.table = null;
    this.db = null;
  }

  private requireConnection(): Connection {
    if (!this.db) {
      throw new IndexCorruptedError('LanceDB backend used before open()');
    }
    return this.db;
  }
}
