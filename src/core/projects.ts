/**
 * Project Registry - named codebase roots with a current selection, kept in
 * `<home>/projects.json`.
 */

import { promises as fs, type Stats } from 'fs';
import os from 'os';
import path from 'path';
import { z } from 'zod';

import { REGISTRY_FILENAME, REGISTRY_HOME_DIRNAME } from '../constants/index-layout.js';
import {
  ConfigurationError,
  ProjectAlreadyExistsError,
  ProjectNotFoundError,
  errorMessage
} from '../errors/index.js';
import type { Project } from '../types/index.js';
import { writeJsonAtomic } from '../utils/atomic-write.js';

const PROJECT_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

const RegistryFileSchema = z.object({
  version: z.literal(1),
  current: z.string().nullable(),
  projects: z.record(
    z.string(),
    z.object({
      codebaseRoot: z.string().min(1),
      configPath: z.string().optional(),
      indexName: z.string().min(1)
    })
  )
});

type RegistryFile = z.infer<typeof RegistryFileSchema>;

export interface SetProjectOptions {
  configPath?: string;
  indexName?: string;
  /** Re-point an existing name at a different root */
  force?: boolean;
}

export function defaultRegistryHome(env: NodeJS.ProcessEnv = process.env): string {
  return env.CCR_HOME ? path.resolve(env.CCR_HOME) : path.join(os.homedir(), REGISTRY_HOME_DIRNAME);
}

export function validateProjectName(name: string): void {
  if (!PROJECT_NAME_PATTERN.test(name)) {
    throw new ConfigurationError(
      `Invalid project name '${name}': use letters, digits, '.', '_' or '-', starting with a letter or digit`
    );
  }
}

export class ProjectRegistry {
  readonly filePath: string;

  constructor(home: string = defaultRegistryHome()) {
    this.filePath = path.join(home, REGISTRY_FILENAME);
  }

  /**
   * Registers or switches to a project.
   * - without `codebaseRoot`, switches to an existing project
   * - with it, creates the project, or updates one registered at the same root
   */
  async set(name: string, codebaseRoot?: string, options: SetProjectOptions = {}): Promise<Project> {
    validateProjectName(name);
    const file = await this.read();
    const existing = file.projects[name];

    if (codebaseRoot === undefined) {
      if (!existing) {
        throw new ProjectNotFoundError(name);
      }
      file.current = name;
      await this.write(file);
      return toProject(name, existing);
    }

    const root = path.resolve(codebaseRoot);
    let stat: Stats;
    try {
      stat = await fs.stat(root);
    } catch (error) {
      throw new ConfigurationError(`Codebase root does not exist: ${root} (${errorMessage(error)})`);
    }
    if (!stat.isDirectory()) {
      throw new ConfigurationError(`Codebase root is not a directory: ${root}`);
    }

    if (existing && existing.codebaseRoot !== root && !options.force) {
      throw new ProjectAlreadyExistsError(name, existing.codebaseRoot);
    }

    const entry = {
      codebaseRoot: root,
      configPath: options.configPath ? path.resolve(options.configPath) : existing?.configPath,
      indexName: options.indexName ?? existing?.indexName ?? name
    };
    validateProjectName(entry.indexName);

    file.projects[name] = entry;
    file.current = name;
    await this.write(file);
    return toProject(name, entry);
  }

  async current(): Promise<Project | null> {
    const file = await this.read();
    if (!file.current) return null;
    const entry = file.projects[file.current];
    return entry ? toProject(file.current, entry) : null;
  }

  async get(name: string): Promise<Project> {
    const file = await this.read();
    const entry = file.projects[name];
    if (!entry) {
      throw new ProjectNotFoundError(name);
    }
    return toProject(name, entry);
  }

  /** All projects, sorted by name. */
  async list(): Promise<Project[]> {
    const file = await this.read();
    return Object.keys(file.projects)
      .sort()
      .map((name) => toProject(name, file.projects[name]));
  }

  /** Forgets a project; clears the current selection when it pointed at it. */
  async remove(name: string): Promise<Project> {
    const file = await this.read();
    const entry = file.projects[name];
    if (!entry) {
      throw new ProjectNotFoundError(name);
    }
    delete file.projects[name];
    if (file.current === name) {
      file.current = null;
    }
    await this.write(file);
    return toProject(name, entry);
  }

  /** The explicitly named project, else the current one. */
  async resolve(explicit?: string): Promise<Project> {
    if (explicit) {
      return this.get(explicit);
    }
    const current = await this.current();
    if (!current) {
      throw new ProjectNotFoundError('(none selected; run `ccr project set <name> <path>`)');
    }
    return current;
  }

  private async read(): Promise<RegistryFile> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return { version: 1, current: null, projects: {} };
      }
      throw new ConfigurationError(
        `Project registry unreadable at ${this.filePath}: ${errorMessage(error)}`
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new ConfigurationError(
        `Project registry is not valid JSON (${this.filePath}): ${errorMessage(error)}`
      );
    }

    const parsed = RegistryFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Project registry is corrupt (${this.filePath}): ${parsed.error.message}`
      );
    }
    return parsed.data;
  }

  private async write(file: RegistryFile): Promise<void> {
    await writeJsonAtomic(this.filePath, file);
  }
}

function toProject(name: string, entry: RegistryFile['projects'][string]): Project {
  return {
    name,
    codebaseRoot: entry.codebaseRoot,
    ...(entry.configPath ? { configPath: entry.configPath } : {}),
    indexName: entry.indexName
  };
}
