/**
 * Query Engine - embeds a query, searches the active build and renders the hits.
 */

import path from 'path';

import type { RetrieverConfig } from '../config/index.js';
import type { Embedder } from '../embeddings/embedder.js';
import { ConfigurationError, IndexCorruptedError } from '../errors/index.js';
import { createAnnBackend } from '../storage/index.js';
import type { AnnBackend } from '../storage/types.js';
import { VectorIndex } from '../storage/vector-index.js';
import type { ScoredRecord } from '../types/index.js';
import { debugLog } from '../utils/debug.js';
import { buildDir, readIndexMeta, type IndexMeta } from './index-meta.js';

export interface QueryRequest {
  text: string;
  topK?: number;
  threshold?: number;
}

export interface QueryResult extends ScoredRecord {
  rendered: string;
}

export interface QueryEngineOptions {
  indexRoot: string;
  retriever: RetrieverConfig;
  embedder: Embedder;
  createBackend?: (kind: IndexMeta['backend']) => AnnBackend;
}

const PLACEHOLDER = /\{(\w+)(?::\.(\d+)f)?\}/g;

/**
 * Fills `{file}`, `{type}`, `{name}`, `{start_line}`, `{end_line}`, `{score}`, `{full_text}`
 * and `{separator}`. `{score:.Nf}` prints N decimals. Anything else is left as written.
 */
export function renderResult(template: string, result: ScoredRecord, separator: string): string {
  const values: Record<string, string | number> = {
    file: result.chunk.filePath,
    type: result.chunk.chunkType,
    name: result.chunk.name,
    start_line: result.chunk.startLine,
    end_line: result.chunk.endLine,
    score: result.score,
    full_text: result.chunk.text,
    separator
  };

  return template.replace(PLACEHOLDER, (match: string, key: string, digits?: string) => {
    if (!Object.prototype.hasOwnProperty.call(values, key)) return match;
    const value = values[key];
    if (digits === undefined) return String(value);
    return typeof value === 'number' ? value.toFixed(Number(digits)) : match;
  });
}

/** The context document written by `ccr query` and returned over REST and MCP. */
export function formatResults(query: string, results: QueryResult[]): string {
  const header = `Results for query: ${query}\n==========\n\n`;
  if (results.length === 0) {
    return `${header}No results found.\n`;
  }
  return header + results.map((result, i) => `Result ${i + 1}:\n${result.rendered}\n\n`).join('');
}

export function validateQuery(text: string, topK: number, threshold: number): void {
  if (!text.trim()) {
    throw new ConfigurationError('Query text must not be empty');
  }
  if (!Number.isInteger(topK) || topK <= 0) {
    throw new ConfigurationError(`top_k must be a positive integer, got ${topK}`);
  }
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw new ConfigurationError(`threshold must be between 0 and 1, got ${threshold}`);
  }
}

interface LoadedBuild {
  buildId: string;
  index: Promise<VectorIndex>;
  /** Queries currently holding this build */
  readers: number;
  /** Replaced by a newer build; closed once the last reader lets go */
  retired: boolean;
}

export class QueryEngine {
  private current: LoadedBuild | null = null;
  private readonly createBackend: (kind: IndexMeta['backend']) => AnnBackend;

  constructor(private readonly options: QueryEngineOptions) {
    this.createBackend = options.createBackend ?? createAnnBackend;
  }

  /**
   * Best matches for `request.text`, at most `topK`, each scoring at least `threshold`
   * (a threshold of 0 keeps everything). A project without an index yields no results.
   *
   * A query answers from the build that was active when it started, even if a rebuild
   * swaps in while it is running.
   */
  async query(request: QueryRequest): Promise<QueryResult[]> {
    const { retriever } = this.options;
    const topK = request.topK ?? retriever.top_k;
    const threshold = request.threshold ?? retriever.threshold;
    validateQuery(request.text, topK, threshold);

    const meta = await readIndexMeta(this.options.indexRoot);
    if (!meta) {
      debugLog(`No index at ${this.options.indexRoot}`);
      return [];
    }
    if (meta.modelId !== this.options.embedder.modelId) {
      throw new IndexCorruptedError(
        `Index was built with model '${meta.modelId}' but queries use '${this.options.embedder.modelId}'; re-index the project`
      );
    }
    if (meta.recordCount === 0) {
      return [];
    }

    const { build, superseded } = this.acquire(meta);
    let hits: ScoredRecord[];
    try {
      let index: VectorIndex;
      try {
        index = await build.index;
      } catch (error) {
        if (this.current === build) this.current = null;
        throw error;
      }
      const vector = await this.options.embedder.embedQuery(request.text);
      hits = await index.search(vector, topK);
    } finally {
      if (superseded) await this.retire(superseded);
      await this.release(build);
    }

    return hits
      .filter((hit) => threshold === 0 || hit.score >= threshold)
      .map((hit) => ({
        ...hit,
        rendered: renderResult(retriever.format_template, hit, retriever.separator)
      }));
  }

  async close(): Promise<void> {
    const current = this.current;
    this.current = null;
    if (current) {
      await this.retire(current);
    }
  }

  /** The loaded build for `meta`, loading it once. A new build id supersedes the previous one. */
  private acquire(meta: IndexMeta): { build: LoadedBuild; superseded: LoadedBuild | null } {
    const cached = this.current;
    if (cached && cached.buildId === meta.buildId) {
      cached.readers++;
      return { build: cached, superseded: null };
    }

    const build: LoadedBuild = {
      buildId: meta.buildId,
      index: VectorIndex.load(
        buildDir(this.options.indexRoot, meta.buildId),
        this.createBackend(meta.backend),
        { expectedHeader: { buildId: meta.buildId, formatVersion: meta.formatVersion } }
      ),
      readers: 1,
      retired: false
    };
    this.current = build;
    debugLog(`Loading index build ${meta.buildId} from ${path.basename(this.options.indexRoot)}`);
    return { build, superseded: cached };
  }

  private async release(build: LoadedBuild): Promise<void> {
    build.readers--;
    if (build.retired && build.readers === 0) {
      await closeBuild(build);
    }
  }

  private async retire(build: LoadedBuild): Promise<void> {
    if (build.retired) return;
    build.retired = true;
    if (build.readers === 0) {
      await closeBuild(build);
    }
  }
}

async function closeBuild(build: LoadedBuild): Promise<void> {
  await build.index.then(
    (index) => index.close(),
    () => undefined
  );
}
