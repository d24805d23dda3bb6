#!/usr/bin/env node
/**
 * ccr - command line for indexing codebases and retrieving context.
 * project/index/query/status/cache manage the index; serve and mcp expose it.
 */

import { promises as fs } from 'fs';
import path from 'path';

import { loadConfig } from './config/index.js';
import {
  createContextPool,
  createProjectContext,
  openProjectContext,
  type ContextOverrides,
  type ProjectContext
} from './core/context.js';
import { defaultRegistryHome, ProjectRegistry } from './core/projects.js';
import { formatResults, type QueryResult } from './core/search.js';
import { getIndexStatus } from './core/status.js';
import { DEFAULT_CONTEXT_OUTPUT } from './constants/index-layout.js';
import { ConfigurationError, errorMessage } from './errors/index.js';
import { startHttpServer } from './server/http.js';
import { startMcpServer } from './server/mcp.js';
import type { IndexingStats } from './types/index.js';
import { readPackageVersion } from './utils/package-root.js';

const CLI_COMMANDS = ['project', 'index', 'query', 'status', 'cache', 'serve', 'mcp'] as const;

type CliCommand = (typeof CLI_COMMANDS)[number];

/** Flags that never take a value, so `--force src` keeps `src` positional. */
const BOOLEAN_FLAGS = new Set(['force', 'purge', 'terminal', 'json', 'help']);

export type CliFlags = Record<string, string | boolean>;

export interface ParsedArgs {
  positionals: string[];
  flags: CliFlags;
}

export interface CliDeps {
  registry?: ProjectRegistry;
  env?: NodeJS.ProcessEnv;
  contextOverrides?: ContextOverrides;
}

function isCliCommand(value: string): value is CliCommand {
  return CLI_COMMANDS.some((command) => command === value);
}

function printUsage(): void {
  console.log('ccr <command> [options]');
  console.log('');
  console.log('Commands:');
  console.log('  project set <name> [path] [--config <file>] [--index-name <n>] [--force]');
  console.log('  project current | list | remove <name> [--purge]');
  console.log('  index [path] [--extensions .py,.ts] [--force]    Index the project (or a part)');
  console.log('  query <text> [--top-k <n>] [--threshold <x>]     Retrieve context');
  console.log('        [--output <file>] [--terminal] [--json]');
  console.log('  status                                            Index state and last run');
  console.log('  cache <stats|clear> [--model <id>]                Embedding cache');
  console.log('  serve [--host <h>] [--port <p>]                   REST API');
  console.log('  mcp                                               MCP server on stdio');
  console.log('');
  console.log('Global flags:');
  console.log('  --project <name>  Use this project instead of the current one');
  console.log('  --config <file>   Configuration file overriding the project one');
  console.log('  --help            Show this help');
  console.log('');
  console.log('Environment:');
  console.log('  CCR_HOME          Registry directory (default: ~/.code-context-retriever)');
  console.log('  CCR_<SECTION>__<KEY>  Configuration overrides, e.g. CCR_RETRIEVER__TOP_K=10');
  console.log('  CCR_API_KEY       Key required by the REST API (X-API-Key header)');
  console.log('  OPENAI_API_KEY    Key for "openai/<model>" embedders');
  console.log('  CCR_DEBUG         Verbose diagnostics on stderr');
}

export function parseArgs(argv: string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags: CliFlags = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    if (eq > 2) {
      flags[arg.slice(2, eq)] = arg.slice(eq + 1);
      continue;
    }

    const key = arg.slice(2);
    const next = argv[i + 1];
    if (!BOOLEAN_FLAGS.has(key) && next !== undefined && !next.startsWith('--')) {
      flags[key] = next;
      i++;
    } else {
      flags[key] = true;
    }
  }

  return { positionals, flags };
}

function flagString(flags: CliFlags, name: string): string | undefined {
  const value = flags[name];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigurationError(`--${name} requires a value`);
  }
  return value;
}

function flagNumber(flags: CliFlags, name: string): number | undefined {
  const value = flagString(flags, name);
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new ConfigurationError(`--${name} must be a number, got '${value}'`);
  }
  return parsed;
}

async function withContext<T>(
  registry: ProjectRegistry,
  flags: CliFlags,
  overrides: ContextOverrides,
  action: (ctx: ProjectContext) => Promise<T>
): Promise<T> {
  const ctx = await openProjectContext(registry, flagString(flags, 'project'), overrides);
  try {
    return await action(ctx);
  } finally {
    await ctx.close();
  }
}

export async function handleCliCommand(argv: string[], deps: CliDeps = {}): Promise<void> {
  const { positionals, flags } = parseArgs(argv);
  const [command, ...args] = positionals;

  if (!command || flags.help === true) {
    printUsage();
    return;
  }

  if (!isCliCommand(command)) {
    console.error(`Unknown command: ${command}`);
    printUsage();
    process.exit(1);
  }

  const env = deps.env ?? process.env;
  const registry = deps.registry ?? new ProjectRegistry(defaultRegistryHome(env));

  let failure: unknown = null;
  try {
    const overrides: ContextOverrides = {
      env,
      configPath: flagString(flags, 'config'),
      ...deps.contextOverrides
    };

    switch (command) {
      case 'project':
        await handleProjectCli(args, flags, registry, overrides);
        break;
      case 'index':
        await handleIndexCli(args, flags, registry, overrides);
        break;
      case 'query':
        await handleQueryCli(args, flags, registry, overrides);
        break;
      case 'status':
        await withContext(registry, flags, overrides, async (ctx) => {
          const status = await getIndexStatus(ctx);
          if (flags.json === true) {
            console.log(JSON.stringify(status, null, 2));
            return;
          }
          console.log(`Project: ${status.project} (${status.codebaseRoot})`);
          console.log(`Index:   ${status.state}${status.error ? ` - ${status.error}` : ''}`);
          if (status.meta) {
            const meta = status.meta;
            console.log(
              `Build:   ${meta.buildId} (${meta.recordCount} records, ${meta.modelId}, ${meta.metric}, ${meta.backend})`
            );
            console.log(`Built:   ${meta.generatedAt}`);
          }
          if (status.lastRun) {
            const run = status.lastRun;
            console.log(
              `Last run: ${run.indexedFiles} indexed, ${run.unchangedFiles} unchanged, ${run.skippedFiles} skipped, ${run.deletedFiles} deleted in ${(run.duration / 1000).toFixed(2)}s`
            );
          }
        });
        break;
      case 'cache':
        await handleCacheCli(args, flags, registry, overrides);
        break;
      case 'serve':
        await handleServeCli(flags, registry, overrides, env);
        break;
      case 'mcp': {
        const pool = createContextPool(registry, overrides);
        await startMcpServer({
          openContext: (project) => pool.open(project),
          defaultProject: flagString(flags, 'project'),
          version: await readPackageVersion(import.meta.url)
        });
        break;
      }
    }
  } catch (error) {
    failure = error;
  }

  if (failure !== null) {
    console.error(`Error: ${errorMessage(failure)}`);
    process.exit(1);
  }
}

export async function handleProjectCli(
  args: string[],
  flags: CliFlags,
  registry: ProjectRegistry,
  overrides: ContextOverrides
): Promise<void> {
  const [subcommand, name, codebaseRoot] = args;

  switch (subcommand) {
    case 'set': {
      if (!name) throw new ConfigurationError('Usage: ccr project set <name> [path]');
      const project = await registry.set(name, codebaseRoot, {
        configPath: flagString(flags, 'config'),
        indexName: flagString(flags, 'index-name'),
        force: flags.force === true
      });
      console.log(`Current project: ${project.name} (${project.codebaseRoot})`);
      return;
    }
    case 'current': {
      const project = await registry.current();
      console.log(project ? `${project.name} (${project.codebaseRoot})` : 'No current project');
      return;
    }
    case 'list': {
      const projects = await registry.list();
      if (flags.json === true) {
        console.log(JSON.stringify(projects, null, 2));
        return;
      }
      if (projects.length === 0) {
        console.log('No projects registered.');
        return;
      }
      const current = await registry.current();
      for (const project of projects) {
        const marker = project.name === current?.name ? '*' : ' ';
        console.log(`${marker} ${project.name}  ${project.codebaseRoot}`);
      }
      return;
    }
    case 'remove': {
      if (!name) throw new ConfigurationError('Usage: ccr project remove <name> [--purge]');
      const project = await registry.get(name);
      if (flags.purge === true) {
        const ctx = await createProjectContext(project, { ...overrides, configPath: project.configPath });
        await ctx.close();
        await fs.rm(ctx.indexRoot, { recursive: true, force: true });
        await fs.rm(ctx.cacheDir, { recursive: true, force: true });
        console.log(`Deleted index ${ctx.indexRoot}`);
      }
      await registry.remove(name);
      console.log(`Removed project ${name}`);
      return;
    }
    default:
      throw new ConfigurationError('Usage: ccr project <set|current|list|remove>');
  }
}

function printStats(stats: IndexingStats): void {
  console.log(
    `Indexed ${stats.indexedFiles} of ${stats.totalFiles} files (${stats.totalChunks} chunks) in ${(stats.duration / 1000).toFixed(2)}s`
  );
  console.log(
    `Unchanged: ${stats.unchangedFiles}  Skipped: ${stats.skippedFiles}  Deleted: ${stats.deletedFiles}  Records: ${stats.recordCount}`
  );
  if (stats.cancelled) {
    console.log('Run was cancelled; partial results were saved.');
  }
  for (const error of stats.errors) {
    console.log(`  ${error.filePath}: ${error.error}`);
  }
}

async function handleIndexCli(
  args: string[],
  flags: CliFlags,
  registry: ProjectRegistry,
  overrides: ContextOverrides
): Promise<void> {
  const extensions = flagString(flags, 'extensions')
    ?.split(',')
    .map((ext) => ext.trim())
    .filter(Boolean);

  await withContext(registry, flags, overrides, async (ctx) => {
    const controller = new AbortController();
    const onSigint = () => {
      console.error('Cancelling after in-flight files finish...');
      controller.abort();
    };
    process.once('SIGINT', onSigint);

    try {
      const stats = await ctx.pipeline.run({
        target: args[0] ? path.resolve(args[0]) : undefined,
        extensions,
        force: flags.force === true,
        signal: controller.signal
      });
      printStats(stats);
    } finally {
      process.off('SIGINT', onSigint);
    }
  });
}

function toJsonResult(result: QueryResult) {
  return {
    file: result.chunk.filePath,
    type: result.chunk.chunkType,
    name: result.chunk.name,
    start_line: result.chunk.startLine,
    end_line: result.chunk.endLine,
    score: result.score,
    text: result.chunk.text
  };
}

async function handleQueryCli(
  args: string[],
  flags: CliFlags,
  registry: ProjectRegistry,
  overrides: ContextOverrides
): Promise<void> {
  const text = args.join(' ').trim();
  if (!text) throw new ConfigurationError('Usage: ccr query <text>');

  await withContext(registry, flags, overrides, async (ctx) => {
    const results = await ctx.queryEngine.query({
      text,
      topK: flagNumber(flags, 'top-k'),
      threshold: flagNumber(flags, 'threshold')
    });

    if (flags.json === true) {
      console.log(JSON.stringify(results.map(toJsonResult), null, 2));
      return;
    }

    const document = formatResults(text, results);
    if (flags.terminal === true) {
      console.log(document);
      return;
    }

    const output = path.resolve(flagString(flags, 'output') ?? DEFAULT_CONTEXT_OUTPUT);
    await fs.writeFile(output, document);
    console.log(`Found ${results.length} results. Context written to ${output}`);
  });
}

async function handleCacheCli(
  args: string[],
  flags: CliFlags,
  registry: ProjectRegistry,
  overrides: ContextOverrides
): Promise<void> {
  const [subcommand] = args;
  const model = flagString(flags, 'model');
  const scope = model ? ` for ${model}` : '';

  if (subcommand !== 'stats' && subcommand !== 'clear') {
    throw new ConfigurationError('Usage: ccr cache <stats|clear> [--model <id>]');
  }

  await withContext(registry, flags, overrides, async (ctx) => {
    if (subcommand === 'stats') {
      console.log(`Cached embeddings${scope}: ${ctx.cache.count(model)}`);
      console.log(`Cache: ${ctx.config.embedder.use_cache ? ctx.cacheDir : 'disabled (in memory)'}`);
    } else {
      console.log(`Removed ${ctx.cache.clear(model)} cached embeddings${scope}`);
    }
  });
}

async function handleServeCli(
  flags: CliFlags,
  registry: ProjectRegistry,
  overrides: ContextOverrides,
  env: NodeJS.ProcessEnv
): Promise<void> {
  const current = await registry.current();
  const config = await loadConfig({
    configPath: overrides.configPath ?? current?.configPath,
    env
  });

  const port = flagNumber(flags, 'port') ?? config.api.port;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigurationError(`--port must be an integer between 0 and 65535, got ${port}`);
  }

  const pool = createContextPool(registry, overrides);
  const server = startHttpServer({
    host: flagString(flags, 'host') ?? config.api.host,
    port,
    corsOrigins: config.api.cors_origins,
    apiKey: env.CCR_API_KEY || undefined,
    openContext: (project) => pool.open(project ?? flagString(flags, 'project'))
  });

  process.once('SIGINT', () => {
    server.close();
    pool.closeAll().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error(`Shutdown failed: ${errorMessage(error)}`);
        process.exit(1);
      }
    );
  });
}

// Only run when executed directly, not when imported
const entry = process.argv[1]?.replace(/\\/g, '/') ?? '';
const isDirectRun = entry.endsWith('/cli.js') || entry.endsWith('/cli.ts') || entry.endsWith('/ccr');

if (isDirectRun) {
  handleCliCommand(process.argv.slice(2)).catch((error: unknown) => {
    console.error('Fatal:', error);
    process.exit(1);
  });
}
