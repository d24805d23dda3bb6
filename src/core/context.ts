/**
 * Wires a project's configuration into the components that act on it.
 */

import path from 'path';

import { loadConfig, type AppConfig } from '../config/index.js';
import {
  createEmbedder,
  createEmbeddingCache,
  createEmbeddingProvider,
  type Embedder,
  type EmbeddingCache,
  type EmbeddingProvider
} from '../embeddings/index.js';
import { createDefaultExtractorRegistry, type ExtractorRegistry } from '../extractors/index.js';
import type { Project } from '../types/index.js';
import { IndexingPipeline } from './indexer.js';
import type { ProjectRegistry } from './projects.js';
import { QueryEngine } from './search.js';

export interface ProjectContext {
  project: Project;
  config: AppConfig;
  /** `<index_dir>/<indexName>` */
  indexRoot: string;
  /** `<cache_dir>/<indexName>` */
  cacheDir: string;
  extractors: ExtractorRegistry;
  cache: EmbeddingCache;
  embedder: Embedder;
  pipeline: IndexingPipeline;
  queryEngine: QueryEngine;
  close(): Promise<void>;
}

export interface ContextOverrides {
  /** Replaces the project's own config file */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  provider?: EmbeddingProvider;
  cache?: EmbeddingCache;
}

export async function createProjectContext(
  project: Project,
  overrides: ContextOverrides = {}
): Promise<ProjectContext> {
  const env = overrides.env ?? process.env;
  const config = await loadConfig({
    configPath: overrides.configPath ?? project.configPath,
    env
  });

  const root = project.codebaseRoot;
  const indexDir = path.resolve(root, config.vector_index.index_dir);
  const cacheBaseDir = path.resolve(root, config.embedder.cache_dir);
  const indexRoot = path.join(indexDir, project.indexName);
  const cacheDir = path.join(cacheBaseDir, project.indexName);

  const extractors = createDefaultExtractorRegistry(config.extractors);
  const cache = overrides.cache ?? createEmbeddingCache(config.embedder, cacheDir);
  const embedder = createEmbedder(
    config.embedder,
    cache,
    overrides.provider ?? createEmbeddingProvider(config.embedder, env)
  );

  const pipeline = new IndexingPipeline({
    rootPath: root,
    indexRoot,
    config,
    extractors,
    embedder,
    excludedPaths: [indexDir, cacheBaseDir]
  });
  const queryEngine = new QueryEngine({ indexRoot, retriever: config.retriever, embedder });

  return {
    project,
    config,
    indexRoot,
    cacheDir,
    extractors,
    cache,
    embedder,
    pipeline,
    queryEngine,
    close: async () => {
      await queryEngine.close();
      cache.close();
    }
  };
}

/** Resolves `name` (or the current project) and opens its context. */
export async function openProjectContext(
  registry: ProjectRegistry,
  name?: string,
  overrides: ContextOverrides = {}
): Promise<ProjectContext> {
  const project = await registry.resolve(name);
  return createProjectContext(project, overrides);
}

export interface ContextPool {
  open(name?: string): Promise<ProjectContext>;
  closeAll(): Promise<void>;
}

/** Keeps one context per project for long-running servers. */
export function createContextPool(
  registry: ProjectRegistry,
  overrides: ContextOverrides = {}
): ContextPool {
  const contexts = new Map<string, Promise<ProjectContext>>();

  return {
    async open(name?: string) {
      const project = await registry.resolve(name);
      const cached = contexts.get(project.name);
      if (cached) return cached;

      const created = createProjectContext(project, overrides);
      contexts.set(project.name, created);
      try {
        return await created;
      } catch (error) {
        contexts.delete(project.name);
        throw error;
      }
    },
    async closeAll() {
      const pending = [...contexts.values()];
      contexts.clear();
      for (const ctx of pending) {
        await ctx.then(
          (opened) => opened.close(),
          () => undefined
        );
      }
    }
  };
}
