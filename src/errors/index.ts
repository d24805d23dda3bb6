/**
 * Thrown when a single source file cannot be read or parsed into chunks.
 * Indexing skips the file and keeps going. A `permanent` refusal (the file is over the
 * size limit) also drops whatever the index held for it.
 */
export class ExtractionError extends Error {
  readonly permanent: boolean;

  constructor(
    message: string,
    readonly filePath: string,
    options?: { cause?: unknown; permanent?: boolean }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ExtractionError';
    this.permanent = options?.permanent ?? false;
  }
}

export type EmbeddingFailureKind = 'timeout' | 'http' | 'malformed' | 'unavailable';

/**
 * Thrown when the embedding backend fails a batch. `retryable` failures are
 * retried a bounded number of times before the affected file is skipped.
 */
export class EmbeddingBackendError extends Error {
  readonly retryable: boolean;
  readonly status: number | undefined;

  constructor(
    message: string,
    readonly kind: EmbeddingFailureKind,
    options?: { status?: number; retryable?: boolean; cause?: unknown }
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'EmbeddingBackendError';
    this.status = options?.status;
    this.retryable = options?.retryable ?? isRetryableFailure(kind, options?.status);
  }
}

function isRetryableFailure(kind: EmbeddingFailureKind, status?: number): boolean {
  if (kind === 'timeout') return true;
  if (kind === 'http' && status !== undefined) {
    return status === 429 || status >= 500;
  }
  return false;
}

/**
 * Thrown when the persisted vector index is corrupted or has a schema mismatch.
 * This error signals that re-indexing is required before queries can run.
 */
export class IndexCorruptedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IndexCorruptedError';
  }
}

/** Another indexing run holds the advisory lock for this index. */
export class IndexLockedError extends Error {
  constructor(
    message: string,
    readonly lockPath: string
  ) {
    super(message);
    this.name = 'IndexLockedError';
  }
}

export class ProjectNotFoundError extends Error {
  constructor(readonly projectName: string) {
    super(`Project not found: ${projectName}`);
    this.name = 'ProjectNotFoundError';
  }
}

export class ProjectAlreadyExistsError extends Error {
  constructor(
    readonly projectName: string,
    existingRoot: string
  ) {
    super(
      `Project '${projectName}' already exists with root ${existingRoot} (use --force to rebind it)`
    );
    this.name = 'ProjectAlreadyExistsError';
  }
}

/** Invalid configuration or query parameters. Raised before any work begins. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
