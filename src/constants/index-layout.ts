// Centralized constants for on-disk index artifacts.
// Keep this module dependency-free to avoid import cycles.

/**
 * Format version for persisted builds under `<index_dir>/<indexName>/builds/`.
 *
 * Bump when:
 * - Chunk boundaries or chunk text composition change
 * - Record id derivation changes
 * - Required persisted fields change
 */
export const INDEX_FORMAT_VERSION = 1 as const;

/** Schema version for `index-meta.json` itself. */
export const INDEX_META_VERSION = 1 as const;

export const INDEX_META_FILENAME = 'index-meta.json' as const;
export const INDEX_LOCK_FILENAME = 'index.lock' as const;
export const INDEXING_STATS_FILENAME = 'indexing-stats.json' as const;
export const BUILDS_DIRNAME = 'builds' as const;
export const RECORDS_FILENAME = 'records.json' as const;
export const MANIFEST_FILENAME = 'manifest.json' as const;
export const LANCEDB_DIRNAME = 'lancedb' as const;
export const LANCEDB_TABLE_NAME = 'chunk_vectors' as const;

export const EMBEDDING_CACHE_FILENAME = 'embeddings.sqlite' as const;

export const REGISTRY_FILENAME = 'projects.json' as const;
export const REGISTRY_HOME_DIRNAME = '.code-context-retriever' as const;

export const DEFAULT_CONTEXT_OUTPUT = 'context.txt' as const;
