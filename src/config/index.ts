/**
 * Configuration loading.
 *
 * Layers, lowest first: the packaged `config/default_config.yaml`, an optional user
 * YAML file, then `CCR_<SECTION>__<KEY>` environment variables. The merged result is
 * validated once; invalid values fail with ConfigurationError before any work starts.
 */

import { promises as fs } from 'fs';
import path from 'path';
import YAML from 'yaml';
import { z } from 'zod';

import { ConfigurationError, errorMessage } from '../errors/index.js';
import { resolvePackageRoot } from '../utils/package-root.js';

const ENV_PREFIX = 'CCR_';
const ENV_PATH_SEPARATOR = '__';

const ExtractorsConfigSchema = z.object({
  max_file_size: z.number().int().positive(),
  python: z.object({ include_comments: z.boolean() }),
  typescript: z.object({ include_comments: z.boolean() }),
  markdown: z.object({ split_by_headings: z.boolean() })
});

const EmbedderConfigSchema = z.object({
  model: z.string().min(1),
  cache_dir: z.string().min(1),
  use_cache: z.boolean(),
  batch_size: z.number().int().positive(),
  max_workers: z.number().int().positive(),
  timeout_ms: z.number().int().positive(),
  max_retries: z.number().int().nonnegative(),
  api_endpoint: z.string().url()
});

const VectorIndexConfigSchema = z.object({
  index_dir: z.string().min(1),
  metric: z.enum(['cosine', 'l2']),
  backend: z.enum(['flat', 'lancedb'])
});

const RetrieverConfigSchema = z.object({
  top_k: z.number().int().positive(),
  threshold: z.number().min(0).max(1),
  format_template: z.string(),
  separator: z.string()
});

const IndexingConfigSchema = z.object({
  max_workers: z.number().int().positive(),
  respect_gitignore: z.boolean(),
  exclude_dirs: z.array(z.string()),
  exclude_files: z.array(z.string())
});

const ApiConfigSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(0).max(65535),
  cors_origins: z.array(z.string())
});

export const AppConfigSchema = z.object({
  extractors: ExtractorsConfigSchema,
  embedder: EmbedderConfigSchema,
  vector_index: VectorIndexConfigSchema,
  retriever: RetrieverConfigSchema,
  indexing: IndexingConfigSchema,
  api: ApiConfigSchema
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type ExtractorsConfig = AppConfig['extractors'];
export type EmbedderConfig = AppConfig['embedder'];
export type VectorIndexConfig = AppConfig['vector_index'];
export type RetrieverConfig = AppConfig['retriever'];
export type IndexingConfig = AppConfig['indexing'];
export type ApiConfig = AppConfig['api'];

export interface LoadConfigOptions {
  /** User YAML file merged over the defaults */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  /** Override for the packaged defaults file */
  defaultsPath?: string;
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Recursively merges `override` into `base`. Arrays and scalars replace. */
export function deepMerge(base: PlainObject, override: PlainObject): PlainObject {
  const merged: PlainObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = merged[key];
    merged[key] =
      isPlainObject(current) && isPlainObject(value) ? deepMerge(current, value) : value;
  }
  return merged;
}

export function defaultConfigPath(): string {
  return path.join(resolvePackageRoot(import.meta.url), 'config', 'default_config.yaml');
}

async function readYamlObject(filePath: string, label: string): Promise<PlainObject> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`${label} unreadable at ${filePath}: ${errorMessage(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`${label} is not valid YAML (${filePath}): ${errorMessage(error)}`);
  }

  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(`${label} must be a mapping at the top level: ${filePath}`);
  }
  return parsed;
}

function parseEnvValue(raw: string): unknown {
  try {
    return YAML.parse(raw);
  } catch {
    return raw;
  }
}

/**
 * Collects `CCR_SECTION__KEY=value` overrides, e.g. `CCR_RETRIEVER__TOP_K=10`.
 * Values are parsed as YAML scalars so numbers, booleans and flow lists work.
 */
export function envOverrides(env: NodeJS.ProcessEnv): PlainObject {
  const overrides: PlainObject = {};

  for (const [name, value] of Object.entries(env)) {
    if (value === undefined || !name.startsWith(ENV_PREFIX)) continue;
    const segments = name
      .slice(ENV_PREFIX.length)
      .split(ENV_PATH_SEPARATOR)
      .map((segment) => segment.toLowerCase());
    if (segments.length < 2 || segments.some((segment) => !segment)) continue;

    let cursor = overrides;
    for (const segment of segments.slice(0, -1)) {
      const next = cursor[segment];
      if (isPlainObject(next)) {
        cursor = next;
      } else {
        const created: PlainObject = {};
        cursor[segment] = created;
        cursor = created;
      }
    }
    cursor[segments[segments.length - 1]] = parseEnvValue(value);
  }

  return overrides;
}

export function validateConfig(candidate: unknown): AppConfig {
  const result = AppConfigSchema.safeParse(candidate);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }
  return result.data;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const defaults = await readYamlObject(
    options.defaultsPath ?? defaultConfigPath(),
    'Default configuration'
  );

  let merged = defaults;
  if (options.configPath) {
    const user = await readYamlObject(path.resolve(options.configPath), 'Configuration file');
    merged = deepMerge(merged, user);
  }

  merged = deepMerge(merged, envOverrides(options.env ?? process.env));
  return validateConfig(merged);
}
