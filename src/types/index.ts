/**
 * Core types shared by extraction, embedding, indexing and querying.
 */

// ============================================================================
// CHUNKS
// ============================================================================

export type ChunkType =
  | 'function'
  | 'method'
  | 'class'
  | 'interface'
  | 'type'
  | 'enum'
  | 'module_doc'
  | 'heading_section'
  | 'other';

export interface Chunk {
  /** Project-relative POSIX path */
  filePath: string;
  chunkType: ChunkType;
  /** Symbol or heading name; empty for untitled prose */
  name: string;
  /** Fragment body plus surrounding context, used for embedding and display */
  text: string;
  startLine: number;
  endLine: number;
  /** sha256 of `text` */
  contentHash: string;
  language: string;
  /** Enclosing class for methods */
  parent?: string;
}

// ============================================================================
// INDEX
// ============================================================================

export type Metric = 'cosine' | 'l2';

export interface IndexRecord {
  id: string;
  chunk: Chunk;
  vector: number[];
}

export interface ScoredRecord {
  id: string;
  score: number;
  chunk: Chunk;
}

// ============================================================================
// INDEXING
// ============================================================================

export type IndexingPhase =
  | 'initializing'
  | 'scanning'
  | 'extracting'
  | 'embedding'
  | 'upserting'
  | 'persisted'
  | 'failed';

export interface IndexingProgress {
  phase: IndexingPhase;
  percentage: number;
  currentFile?: string;
  filesProcessed: number;
  totalFiles: number;
  chunksCreated: number;
  startedAt: Date;
}

export interface IndexingError {
  filePath: string;
  error: string;
  phase: IndexingPhase;
  timestamp: Date;
}

export interface IndexingStats {
  buildId: string;
  /** Eligible files found under the target */
  totalFiles: number;
  /** Files (re)extracted and upserted this run */
  indexedFiles: number;
  /** Files skipped because their content hash did not change */
  unchangedFiles: number;
  /** Files skipped after an extraction or embedding failure, or because they are empty */
  skippedFiles: number;
  /** Chunks extracted but not indexed because their file failed to embed */
  skippedChunks: number;
  deletedFiles: number;
  /** Chunks written this run */
  totalChunks: number;
  /** Records in the index after the run */
  recordCount: number;
  fullRebuild: boolean;
  cancelled: boolean;
  duration: number; // milliseconds
  errors: IndexingError[];
  startedAt: Date;
  completedAt?: Date;
}

// ============================================================================
// PROJECTS
// ============================================================================

export interface Project {
  name: string;
  codebaseRoot: string;
  configPath?: string;
  indexName: string;
}
