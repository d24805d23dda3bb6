import { IndexCorruptedError } from '../errors/index.js';
import type { ProjectContext } from './context.js';
import { readIndexMeta, type IndexMeta } from './index-meta.js';
import { readIndexingStats, type PersistedIndexingStats } from './indexer.js';

export interface IndexStatus {
  project: string;
  codebaseRoot: string;
  indexRoot: string;
  state: 'missing' | 'ready' | 'corrupted';
  meta: IndexMeta | null;
  lastRun: PersistedIndexingStats | null;
  error?: string;
}

/** The active build and the last run's stats; a damaged index is reported, not thrown. */
export async function getIndexStatus(ctx: ProjectContext): Promise<IndexStatus> {
  const base = {
    project: ctx.project.name,
    codebaseRoot: ctx.project.codebaseRoot,
    indexRoot: ctx.indexRoot,
    lastRun: await readIndexingStats(ctx.indexRoot)
  };

  try {
    const meta = await readIndexMeta(ctx.indexRoot);
    return { ...base, state: meta ? 'ready' : 'missing', meta };
  } catch (error) {
    if (!(error instanceof IndexCorruptedError)) throw error;
    return { ...base, state: 'corrupted', meta: null, error: error.message };
  }
}
