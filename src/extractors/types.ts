import type { Chunk } from '../types/index.js';

/** A file handed to an extractor: where to read it and how to name it on chunks. */
export interface SourceRef {
  absolutePath: string;
  /** Project-relative POSIX path */
  relativePath: string;
}

export interface SourceFile extends SourceRef {
  content: string;
  lines: string[];
}

/**
 * Per-language chunking capability.
 *
 * `extractChunks` returns a lazy sequence: nothing is read until iteration starts, and
 * every new iteration re-reads the file, so the sequence can be consumed more than once.
 */
export interface ChunkExtractor {
  readonly language: string;
  getSupportedExtensions(): ReadonlySet<string>;
  extractChunks(file: SourceRef): AsyncIterable<Chunk>;
}
