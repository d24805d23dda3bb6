/**
 * VectorIndex - chunk records with their exact vectors, searchable by similarity.
 *
 * Records live in memory and persist as `records.json` in the build directory. The ANN
 * backend only proposes candidates; every candidate is rescored exactly, so scores and
 * ordering do not depend on the backend.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';

import { LANCEDB_DIRNAME, RECORDS_FILENAME } from '../constants/index-layout.js';
import { IndexCorruptedError, errorMessage } from '../errors/index.js';
import type { Chunk, IndexRecord, Metric, ScoredRecord } from '../types/index.js';
import { writeJsonAtomic } from '../utils/atomic-write.js';
import { sha256 } from '../utils/hashing.js';
import { pathExists } from '../utils/paths.js';
import { compareScored, similarity } from './scoring.js';
import type { AnnBackend } from './types.js';

/** Over-fetch factor for approximate backends before exact rescoring */
const CANDIDATE_MULTIPLIER = 4;

const ChunkSchema = z.object({
  filePath: z.string(),
  chunkType: z.enum([
    'function',
    'method',
    'class',
    'interface',
    'type',
    'enum',
    'module_doc',
    'heading_section',
    'other'
  ]),
  name: z.string(),
  text: z.string(),
  startLine: z.number().int().positive(),
  endLine: z.number().int().positive(),
  contentHash: z.string(),
  language: z.string(),
  parent: z.string().optional()
});

const ArtifactHeaderSchema = z.object({
  buildId: z.string().min(1),
  formatVersion: z.number().int().nonnegative()
});

const RecordsFileSchema = z.object({
  header: ArtifactHeaderSchema,
  metric: z.enum(['cosine', 'l2']),
  modelId: z.string(),
  dimension: z.number().int().positive().nullable(),
  records: z.array(
    z.object({
      id: z.string().min(1),
      chunk: ChunkSchema,
      vector: z.array(z.number())
    })
  )
});

export type ArtifactHeader = z.infer<typeof ArtifactHeaderSchema>;

export interface VectorIndexOptions {
  metric: Metric;
  modelId: string;
  dimension?: number | null;
}

export interface LoadOptions {
  /** Directory the loaded index persists to; defaults to the source directory */
  targetDir?: string;
  /** Header the records file must carry */
  expectedHeader?: ArtifactHeader;
}

export class VectorIndex {
  private readonly records = new Map<string, IndexRecord>();
  private readonly idsByPath = new Map<string, Set<string>>();

  private constructor(
    readonly dir: string,
    readonly metric: Metric,
    readonly modelId: string,
    private dimensionValue: number | null,
    private readonly backend: AnnBackend
  ) {}

  static async create(
    dir: string,
    backend: AnnBackend,
    options: VectorIndexOptions
  ): Promise<VectorIndex> {
    await fs.mkdir(dir, { recursive: true });
    await backend.open(path.join(dir, LANCEDB_DIRNAME), options.metric);
    return new VectorIndex(dir, options.metric, options.modelId, options.dimension ?? null, backend);
  }

  /**
   * Loads `records.json` from `sourceDir`. With a `targetDir`, persistent backend files are
   * copied there first so the copy can be modified without touching the source build.
   */
  static async load(
    sourceDir: string,
    backend: AnnBackend,
    options: LoadOptions = {}
  ): Promise<VectorIndex> {
    const recordsPath = path.join(sourceDir, RECORDS_FILENAME);

    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(recordsPath, 'utf-8'));
    } catch (error) {
      throw new IndexCorruptedError(
        `Index records missing or unreadable (rebuild required): ${errorMessage(error)}`
      );
    }

    const parsed = RecordsFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new IndexCorruptedError(
        `Index records schema mismatch (rebuild required): ${parsed.error.message}`
      );
    }
    const file = parsed.data;

    const expected = options.expectedHeader;
    if (expected) {
      if (file.header.buildId !== expected.buildId) {
        throw new IndexCorruptedError(
          `Index records buildId mismatch (rebuild required): meta=${expected.buildId}, records.json=${file.header.buildId}`
        );
      }
      if (file.header.formatVersion !== expected.formatVersion) {
        throw new IndexCorruptedError(
          `Index records formatVersion mismatch (rebuild required): meta=${expected.formatVersion}, records.json=${file.header.formatVersion}`
        );
      }
    }

    const targetDir = options.targetDir ?? sourceDir;
    await fs.mkdir(targetDir, { recursive: true });

    const sourceAnnDir = path.join(sourceDir, LANCEDB_DIRNAME);
    const targetAnnDir = path.join(targetDir, LANCEDB_DIRNAME);
    if (backend.persistent && targetDir !== sourceDir && (await pathExists(sourceAnnDir))) {
      await fs.cp(sourceAnnDir, targetAnnDir, { recursive: true });
    }

    const index = new VectorIndex(targetDir, file.metric, file.modelId, file.dimension, backend);
    for (const record of file.records) {
      index.insert(record);
    }

    await backend.open(targetAnnDir, file.metric, {
      expectExisting: backend.persistent && file.records.length > 0
    });
    if (backend.persistent) {
      const stored = await backend.count();
      if (stored !== index.size) {
        throw new IndexCorruptedError(
          `Vector store holds ${stored} vectors but records.json lists ${index.size} (rebuild required)`
        );
      }
    } else {
      await backend.add(file.records.map((record) => ({ id: record.id, vector: record.vector })));
    }

    return index;
  }

  get size(): number {
    return this.records.size;
  }

  get dimension(): number | null {
    return this.dimensionValue;
  }

  get backendName(): string {
    return this.backend.name;
  }

  has(id: string): boolean {
    return this.records.has(id);
  }

  /** File paths that currently have records, sorted. */
  paths(): string[] {
    return [...this.idsByPath.keys()].sort();
  }

  recordsForPath(filePath: string): IndexRecord[] {
    const ids = this.idsByPath.get(filePath);
    if (!ids) return [];
    return [...ids].flatMap((id) => {
      const record = this.records.get(id);
      return record ? [record] : [];
    });
  }

  /**
   * Adds records. Duplicate ids (within the batch or against the index) are rejected with
   * nothing added; a vector of the wrong dimension is an IndexCorruptedError.
   */
  async add(records: IndexRecord[]): Promise<void> {
    if (records.length === 0) return;

    const seen = new Set<string>();
    for (const record of records) {
      if (this.records.has(record.id) || seen.has(record.id)) {
        throw new IndexCorruptedError(`Duplicate record id: ${record.id}`);
      }
      seen.add(record.id);

      const expected = this.dimensionValue ?? records[0].vector.length;
      if (record.vector.length !== expected) {
        throw new IndexCorruptedError(
          `Vector dimension mismatch for ${record.chunk.filePath}: expected ${expected}, got ${record.vector.length}`
        );
      }
    }

    this.dimensionValue ??= records[0].vector.length;
    for (const record of records) {
      this.insert(record);
    }
    await this.backend.add(records.map((record) => ({ id: record.id, vector: record.vector })));
  }

  /** Removes every record of `filePath`; returns how many were removed. */
  async removeByPath(filePath: string): Promise<number> {
    const ids = this.idsByPath.get(filePath);
    if (!ids || ids.size === 0) return 0;

    const removed = [...ids];
    for (const id of removed) {
      this.records.delete(id);
    }
    this.idsByPath.delete(filePath);
    await this.backend.remove(removed);
    return removed.length;
  }

  /**
   * Top `topK` records by similarity to `vector`, best first.
   * Ties order by file path, start line, then id.
   */
  async search(vector: number[], topK: number): Promise<ScoredRecord[]> {
    if (this.records.size === 0 || topK <= 0) return [];

    if (this.dimensionValue !== null && vector.length !== this.dimensionValue) {
      throw new IndexCorruptedError(
        `Query vector has dimension ${vector.length} but the index holds ${this.dimensionValue} (was it built with another model?)`
      );
    }

    const limit = this.backend.exhaustive
      ? this.records.size
      : Math.min(this.records.size, topK * CANDIDATE_MULTIPLIER);
    const candidates = await this.backend.search(vector, limit);

    const ids =
      candidates.length === 0 && !this.backend.exhaustive
        ? [...this.records.keys()]
        : candidates.map((candidate) => candidate.id);

    const scored: ScoredRecord[] = [];
    for (const id of new Set(ids)) {
      const record = this.records.get(id);
      if (!record) continue;
      scored.push({
        id,
        score: similarity(this.metric, vector, record.vector),
        chunk: record.chunk
      });
    }

    return scored.sort(compareScored).slice(0, topK);
  }

  async persist(header: ArtifactHeader): Promise<void> {
    const records = [...this.records.values()].sort(
      (a, b) =>
        (a.chunk.filePath < b.chunk.filePath ? -1 : a.chunk.filePath > b.chunk.filePath ? 1 : 0) ||
        a.chunk.startLine - b.chunk.startLine ||
        (a.id < b.id ? -1 : 1)
    );

    await writeJsonAtomic(path.join(this.dir, RECORDS_FILENAME), {
      header,
      metric: this.metric,
      modelId: this.modelId,
      dimension: this.dimensionValue,
      records
    });
    await this.backend.persist();
  }

  async close(): Promise<void> {
    await this.backend.close();
  }

  private insert(record: IndexRecord): void {
    this.records.set(record.id, record);
    let ids = this.idsByPath.get(record.chunk.filePath);
    if (!ids) {
      ids = new Set();
      this.idsByPath.set(record.chunk.filePath, ids);
    }
    ids.add(record.id);
  }
}

/** Stable record id: the same chunk content at the same place always maps to the same id. */
export function recordIdFor(chunk: Chunk): string {
  return sha256(
    `${chunk.filePath}:${chunk.startLine}:${chunk.endLine}:${chunk.chunkType}:${chunk.name}:${chunk.contentHash}`
  ).slice(0, 20);
}
