/**
 * Indexing Pipeline - scans a project, extracts chunks, embeds them and persists a new build.
 *
 * Every run stages a fresh build directory seeded from the active build, then swaps
 * `index-meta.json` to it. Readers never observe a half-written index.
 */

import { promises as fs } from 'fs';
import path from 'path';
import pLimit from 'p-limit';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';

import type { AppConfig } from '../config/index.js';
import {
  INDEX_FORMAT_VERSION,
  INDEX_META_VERSION,
  INDEXING_STATS_FILENAME
} from '../constants/index-layout.js';
import type { Embedder } from '../embeddings/embedder.js';
import {
  ConfigurationError,
  EmbeddingBackendError,
  ExtractionError,
  IndexCorruptedError,
  errorMessage
} from '../errors/index.js';
import { normalizeExtension, type ExtractorRegistry } from '../extractors/registry.js';
import { createAnnBackend } from '../storage/index.js';
import type { AnnBackend } from '../storage/types.js';
import { VectorIndex, recordIdFor } from '../storage/vector-index.js';
import type {
  Chunk,
  IndexingPhase,
  IndexingProgress,
  IndexingStats,
  IndexRecord
} from '../types/index.js';
import { writeJsonAtomic } from '../utils/atomic-write.js';
import { debugLog } from '../utils/debug.js';
import { isInside, isUnderPath, pathExists, toRelativePath } from '../utils/paths.js';
import { acquireIndexLock } from './index-lock.js';
import {
  buildDir,
  pruneBuilds,
  readIndexMeta,
  validateActiveBuild,
  writeIndexMeta,
  manifestPath,
  type IndexMeta
} from './index-meta.js';
import {
  computeFileHashes,
  createManifest,
  readManifest,
  writeManifest,
  type FileManifest
} from './manifest.js';
import { scanFiles } from './scanner.js';

export interface IndexingPipelineOptions {
  rootPath: string;
  /** `<index_dir>/<indexName>` */
  indexRoot: string;
  config: AppConfig;
  extractors: ExtractorRegistry;
  embedder: Embedder;
  /** Directories never scanned, such as the embedding cache */
  excludedPaths?: string[];
  createBackend?: () => AnnBackend;
}

export interface IndexingRunOptions {
  /** File or directory to index; defaults to the project root */
  target?: string;
  /** Only (re)index files with these extensions */
  extensions?: string[];
  /** Re-extract files even when their content is unchanged */
  force?: boolean;
  signal?: AbortSignal;
  onProgress?: (progress: IndexingProgress) => void;
}

interface StagedIndex {
  index: VectorIndex;
  manifest: FileManifest;
  previous: IndexMeta | null;
  fullRebuild: boolean;
}

const PROGRESS_LOG_STEP = 10;
const SETTINGS_KEYS = ['metric', 'modelId', 'backend'] as const;

const PersistedStatsSchema = z
  .object({
    buildId: z.string(),
    totalFiles: z.number(),
    indexedFiles: z.number(),
    unchangedFiles: z.number(),
    skippedFiles: z.number(),
    skippedChunks: z.number(),
    deletedFiles: z.number(),
    totalChunks: z.number(),
    recordCount: z.number(),
    fullRebuild: z.boolean(),
    cancelled: z.boolean(),
    duration: z.number(),
    errors: z.array(
      z.object({ filePath: z.string(), error: z.string(), phase: z.string(), timestamp: z.string() })
    ),
    startedAt: z.string(),
    completedAt: z.string().optional()
  })
  .passthrough();

export type PersistedIndexingStats = z.infer<typeof PersistedStatsSchema>;

/** Stats of the last successful run, or null when none were saved. */
export async function readIndexingStats(indexRoot: string): Promise<PersistedIndexingStats | null> {
  try {
    const raw = await fs.readFile(path.join(indexRoot, INDEXING_STATS_FILENAME), 'utf-8');
    const parsed = PersistedStatsSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

/** Waits for every task, then rethrows the first failure. */
async function settleAll(tasks: Array<Promise<void>>): Promise<void> {
  const results = await Promise.allSettled(tasks);
  for (const result of results) {
    if (result.status === 'rejected') throw result.reason;
  }
}

export class IndexingPipeline {
  private readonly rootPath: string;
  private readonly createBackend: () => AnnBackend;
  private progress: IndexingProgress;
  private onProgressCallback?: (progress: IndexingProgress) => void;
  private lastLoggedPhase: IndexingPhase | null = null;
  private lastLoggedPercentage = -PROGRESS_LOG_STEP;
  private halted = false;

  constructor(private readonly options: IndexingPipelineOptions) {
    this.rootPath = path.resolve(options.rootPath);
    this.createBackend =
      options.createBackend ?? (() => createAnnBackend(options.config.vector_index.backend));
    this.progress = this.initialProgress();
  }

  getProgress(): IndexingProgress {
    return { ...this.progress };
  }

  async run(runOptions: IndexingRunOptions = {}): Promise<IndexingStats> {
    const startedAt = new Date();
    this.progress = { ...this.initialProgress(), startedAt };
    this.onProgressCallback = runOptions.onProgress;
    this.lastLoggedPhase = null;
    this.lastLoggedPercentage = -PROGRESS_LOG_STEP;
    this.halted = false;

    const stats: IndexingStats = {
      buildId: uuidv4(),
      totalFiles: 0,
      indexedFiles: 0,
      unchangedFiles: 0,
      skippedFiles: 0,
      skippedChunks: 0,
      deletedFiles: 0,
      totalChunks: 0,
      recordCount: 0,
      fullRebuild: false,
      cancelled: false,
      duration: 0,
      errors: [],
      startedAt
    };

    const targetPath = await this.resolveTarget(runOptions.target);
    const targetRel = toRelativePath(this.rootPath, targetPath);
    const extensionFilter = runOptions.extensions?.length
      ? new Set(runOptions.extensions.map(normalizeExtension))
      : null;

    const lock = await acquireIndexLock(this.options.indexRoot);
    let staged: StagedIndex | null = null;
    let committed = false;

    try {
      this.updateProgress('initializing', 0);
      staged = await this.stage(stats.buildId, targetRel === '');
      stats.fullRebuild = staged.fullRebuild;
      const { index, manifest } = staged;

      // Scanning
      this.updateProgress('scanning', 0);
      const eligible = await scanFiles({
        rootPath: this.rootPath,
        targetPath,
        supportedExtensions: new Set(this.options.extractors.supportedExtensions()),
        config: this.options.config.indexing,
        excludedPaths: this.options.excludedPaths
      });
      const eligibleRel = new Set(eligible.map((file) => toRelativePath(this.rootPath, file)));
      const candidates = eligible.filter(
        (file) => !extensionFilter || extensionFilter.has(path.extname(file).toLowerCase())
      );
      stats.totalFiles = candidates.length;

      // Deletion detection
      const indexedPaths = new Set([...index.paths(), ...Object.keys(manifest.files)]);
      for (const filePath of [...indexedPaths].sort()) {
        if (isUnderPath(filePath, targetRel) && !eligibleRel.has(filePath)) {
          await index.removeByPath(filePath);
          delete manifest.files[filePath];
          stats.deletedFiles++;
          debugLog(`Removed records of deleted file ${filePath}`);
        }
      }

      // Change detection
      const hashes = await computeFileHashes(candidates, this.rootPath);
      const pending: string[] = [];
      for (const file of candidates) {
        const relativePath = toRelativePath(this.rootPath, file);
        const hash = hashes[relativePath];
        if (hash === undefined) {
          this.recordSkip(stats, relativePath, 'scanning', 'File could not be read');
          continue;
        }
        const unchanged =
          !runOptions.force &&
          manifest.files[relativePath] === hash &&
          index.recordsForPath(relativePath).length > 0;
        if (unchanged) {
          stats.unchangedFiles++;
        } else {
          pending.push(file);
        }
      }

      // Extract
      const workers = pLimit(this.options.config.indexing.max_workers);
      const extracted = new Map<string, Chunk[]>();
      const refused: string[] = [];
      this.startPhase('extracting', pending.length);
      await settleAll(
        pending.map((file) =>
          workers(async () => {
            if (this.shouldStop(runOptions.signal, stats)) return;
            const chunks = await this.halting(this.extractFile(file, stats));
            if (chunks === 'refused') refused.push(file);
            else if (chunks) extracted.set(file, chunks);
            this.fileDone(file);
          })
        )
      );

      // Embed
      const embedded = new Map<string, IndexRecord[]>();
      const empty: string[] = [];
      this.startPhase('embedding', extracted.size);
      await settleAll(
        [...extracted].map(([file, chunks]) =>
          workers(async () => {
            if (this.shouldStop(runOptions.signal, stats)) return;
            if (chunks.length === 0) {
              empty.push(file);
            } else {
              const records = await this.halting(this.embedFile(file, chunks, stats));
              if (records) embedded.set(file, records);
            }
            this.fileDone(file);
          })
        )
      );

      // Upsert: one writer, in path order
      this.startPhase('upserting', embedded.size + empty.length + refused.length);
      for (const file of refused.sort()) {
        const relativePath = toRelativePath(this.rootPath, file);
        await index.removeByPath(relativePath);
        delete manifest.files[relativePath];
        this.fileDone(file);
      }
      for (const file of [...embedded.keys(), ...empty].sort()) {
        const relativePath = toRelativePath(this.rootPath, file);
        const records = embedded.get(file) ?? [];
        await index.removeByPath(relativePath);
        await index.add(records);
        manifest.files[relativePath] = hashes[relativePath];
        if (records.length > 0) {
          stats.indexedFiles++;
          stats.totalChunks += records.length;
          this.progress.chunksCreated += records.length;
        }
        this.fileDone(file);
      }

      if (stats.cancelled) {
        console.warn(
          `Indexing cancelled: ${stats.indexedFiles} files indexed before cancellation, persisting partial results`
        );
      }

      // Persist
      stats.recordCount = index.size;
      await index.persist({ buildId: stats.buildId, formatVersion: INDEX_FORMAT_VERSION });
      await writeManifest(
        manifestPath(this.options.indexRoot, stats.buildId),
        { ...manifest, generatedAt: new Date().toISOString() }
      );
      await writeIndexMeta(this.options.indexRoot, {
        metaVersion: INDEX_META_VERSION,
        formatVersion: INDEX_FORMAT_VERSION,
        buildId: stats.buildId,
        generatedAt: new Date().toISOString(),
        metric: this.options.config.vector_index.metric,
        modelId: this.options.embedder.modelId,
        dimension: index.dimension,
        backend: this.options.config.vector_index.backend,
        recordCount: index.size
      });
      committed = true;

      await pruneBuilds(
        this.options.indexRoot,
        staged.previous ? [stats.buildId, staged.previous.buildId] : [stats.buildId]
      );

      stats.completedAt = new Date();
      stats.duration = stats.completedAt.getTime() - startedAt.getTime();
      await writeJsonAtomic(path.join(this.options.indexRoot, INDEXING_STATS_FILENAME), stats);

      this.updateProgress('persisted', 100);
      console.error(
        `Indexing complete in ${stats.duration}ms: ${stats.indexedFiles} files indexed, ${stats.unchangedFiles} unchanged, ${stats.skippedFiles} skipped, ${stats.deletedFiles} deleted (${stats.recordCount} records)`
      );
      return stats;
    } catch (error) {
      stats.errors.push({
        filePath: targetRel || '.',
        error: errorMessage(error),
        phase: this.progress.phase,
        timestamp: new Date()
      });
      this.updateProgress('failed', this.progress.percentage);

      if (staged && !committed) {
        await fs
          .rm(buildDir(this.options.indexRoot, stats.buildId), { recursive: true, force: true })
          .catch((cleanupError: unknown) => {
            console.warn(`Could not remove staging build: ${errorMessage(cleanupError)}`);
          });
      }
      throw error;
    } finally {
      if (staged) {
        await staged.index.close();
      }
      await lock.release();
    }
  }

  /**
   * Chunks of `file`, or null when it was skipped and its old records stay. `'refused'`
   * means the file can never be indexed as it is, so its old records must go.
   * Empty files yield no chunks.
   */
  private async extractFile(
    file: string,
    stats: IndexingStats
  ): Promise<Chunk[] | 'refused' | null> {
    const relativePath = toRelativePath(this.rootPath, file);
    const extractor = this.options.extractors.forPath(file);
    if (!extractor) {
      this.recordSkip(stats, relativePath, 'extracting', 'No extractor for this extension');
      return null;
    }

    const chunks: Chunk[] = [];
    try {
      for await (const chunk of extractor.extractChunks({ absolutePath: file, relativePath })) {
        chunks.push(chunk);
      }
    } catch (error) {
      if (!(error instanceof ExtractionError)) throw error;
      this.recordSkip(stats, relativePath, 'extracting', error.message);
      return error.permanent ? 'refused' : null;
    }

    if (chunks.length === 0) {
      stats.skippedFiles++;
      debugLog(`Skipping ${relativePath}: empty`);
    }
    return chunks;
  }

  /** Records for `chunks`, or null when embedding failed and the old records stay. */
  private async embedFile(
    file: string,
    chunks: Chunk[],
    stats: IndexingStats
  ): Promise<IndexRecord[] | null> {
    let vectors: number[][];
    try {
      vectors = await this.options.embedder.embedBatch(chunks.map((chunk) => chunk.text));
    } catch (error) {
      if (!(error instanceof EmbeddingBackendError)) throw error;
      stats.skippedChunks += chunks.length;
      this.recordSkip(stats, toRelativePath(this.rootPath, file), 'embedding', error.message);
      return null;
    }

    const records = new Map<string, IndexRecord>();
    chunks.forEach((chunk, i) => {
      const id = recordIdFor(chunk);
      if (!records.has(id)) records.set(id, { id, chunk, vector: vectors[i] });
    });
    return [...records.values()];
  }

  /** Stops scheduling further files once one has failed fatally. */
  private async halting<T>(work: Promise<T>): Promise<T> {
    try {
      return await work;
    } catch (error) {
      this.halted = true;
      throw error;
    }
  }

  private shouldStop(signal: AbortSignal | undefined, stats: IndexingStats): boolean {
    if (this.halted) return true;
    if (signal?.aborted) {
      stats.cancelled = true;
      return true;
    }
    return false;
  }

  /**
   * Seeds the staging build from the active one. A full run rebuilds from scratch when the
   * active build is missing, corrupt, or was built with different settings; a partial run
   * refuses to mix settings.
   */
  private async stage(buildId: string, fullRun: boolean): Promise<StagedIndex> {
    const { indexRoot, config, embedder } = this.options;
    const stagingDir = buildDir(indexRoot, buildId);
    const wanted = {
      metric: config.vector_index.metric,
      modelId: embedder.modelId,
      backend: config.vector_index.backend
    };

    let previous: IndexMeta | null = null;
    let reason: string | null = null;
    try {
      previous = await readIndexMeta(indexRoot);
      if (previous) {
        await validateActiveBuild(indexRoot, previous);
      }
    } catch (error) {
      if (!(error instanceof IndexCorruptedError) || !fullRun) throw error;
      reason = error.message;
      previous = null;
    }

    if (previous) {
      const active = previous;
      const changed = SETTINGS_KEYS.filter((key) => active[key] !== wanted[key]);
      if (changed.length > 0) {
        const detail = changed.map((key) => `${key}: ${active[key]} -> ${wanted[key]}`).join(', ');
        if (!fullRun) {
          throw new IndexCorruptedError(
            `Index settings changed (${detail}); run a full index of the project to rebuild`
          );
        }
        reason = `settings changed (${detail})`;
      } else {
        const backend = this.createBackend();
        try {
          const index = await VectorIndex.load(buildDir(indexRoot, active.buildId), backend, {
            targetDir: stagingDir,
            expectedHeader: { buildId: active.buildId, formatVersion: active.formatVersion }
          });
          const manifest =
            (await readManifest(manifestPath(indexRoot, active.buildId))) ?? createManifest();
          return { index, manifest, previous: active, fullRebuild: false };
        } catch (error) {
          await backend.close();
          if (!(error instanceof IndexCorruptedError) || !fullRun) throw error;
          await fs.rm(stagingDir, { recursive: true, force: true });
          reason = error.message;
        }
      }
    }

    if (reason) {
      console.warn(`Rebuilding index from scratch: ${reason}`);
    }

    const index = await VectorIndex.create(stagingDir, this.createBackend(), {
      metric: wanted.metric,
      modelId: wanted.modelId
    });
    return { index, manifest: createManifest(), previous, fullRebuild: true };
  }

  private async resolveTarget(target?: string): Promise<string> {
    const targetPath = target ? path.resolve(this.rootPath, target) : this.rootPath;
    if (!isInside(this.rootPath, targetPath)) {
      throw new ConfigurationError(
        `Target ${targetPath} is outside the project root ${this.rootPath}`
      );
    }
    if (!(await pathExists(targetPath))) {
      throw new ConfigurationError(`Target does not exist: ${targetPath}`);
    }
    return targetPath;
  }

  private recordSkip(
    stats: IndexingStats,
    filePath: string,
    phase: IndexingPhase,
    reason: string
  ): void {
    stats.skippedFiles++;
    stats.errors.push({ filePath, error: reason, phase, timestamp: new Date() });
    console.error(`Skipping ${filePath}: ${reason}`);
  }

  private startPhase(phase: IndexingPhase, totalFiles: number): void {
    this.progress.filesProcessed = 0;
    this.progress.totalFiles = totalFiles;
    this.progress.currentFile = undefined;
    this.updateProgress(phase, totalFiles === 0 ? 100 : 0);
  }

  private fileDone(file: string): void {
    this.progress.filesProcessed++;
    this.progress.currentFile = toRelativePath(this.rootPath, file);
    const { filesProcessed, totalFiles } = this.progress;
    const percentage = totalFiles > 0 ? Math.round((filesProcessed / totalFiles) * 100) : 100;
    this.updateProgress(this.progress.phase, percentage);
  }

  private updateProgress(phase: IndexingPhase, percentage: number): void {
    const phaseChanged = phase !== this.lastLoggedPhase;
    this.progress.phase = phase;
    this.progress.percentage = percentage;

    if (phaseChanged || percentage >= this.lastLoggedPercentage + PROGRESS_LOG_STEP) {
      console.error(
        `[${phase}] ${percentage}% (${this.progress.filesProcessed}/${this.progress.totalFiles} files)`
      );
      this.lastLoggedPhase = phase;
      this.lastLoggedPercentage = percentage;
    }

    this.onProgressCallback?.({ ...this.progress });
  }

  private initialProgress(): IndexingProgress {
    return {
      phase: 'initializing',
      percentage: 0,
      filesProcessed: 0,
      totalFiles: 0,
      chunksCreated: 0,
      startedAt: new Date()
    };
  }
}
