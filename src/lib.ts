/**
 * Library entry point for code-context-retriever.
 *
 * @example
 * ```typescript
 * import { ProjectRegistry, openProjectContext, formatResults } from 'code-context-retriever';
 *
 * const registry = new ProjectRegistry();
 * await registry.set('api', '/path/to/project');
 * const ctx = await openProjectContext(registry);
 * await ctx.pipeline.run();
 * const results = await ctx.queryEngine.query({ text: 'how are tokens refreshed?' });
 * console.log(formatResults('how are tokens refreshed?', results));
 * await ctx.close();
 * ```
 */

export { loadConfig, AppConfigSchema, type AppConfig, type LoadConfigOptions } from './config/index.js';
export * from './errors/index.js';
export type * from './types/index.js';

export * from './extractors/index.js';
export * from './embeddings/index.js';
export * from './storage/index.js';

export {
  IndexingPipeline,
  readIndexingStats,
  type IndexingPipelineOptions,
  type IndexingRunOptions,
  type PersistedIndexingStats
} from './core/indexer.js';
export {
  QueryEngine,
  formatResults,
  renderResult,
  type QueryEngineOptions,
  type QueryRequest,
  type QueryResult
} from './core/search.js';
export { ProjectRegistry, defaultRegistryHome, type SetProjectOptions } from './core/projects.js';
export {
  createContextPool,
  createProjectContext,
  openProjectContext,
  type ContextOverrides,
  type ContextPool,
  type ProjectContext
} from './core/context.js';
export { getIndexStatus, type IndexStatus } from './core/status.js';
export { readIndexMeta, type IndexMeta } from './core/index-meta.js';

export { createApp, startHttpServer } from './server/http.js';
export { createMcpServer, startMcpServer } from './server/mcp.js';
