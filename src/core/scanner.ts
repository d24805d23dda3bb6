/**
 * Finds the files an indexing run may touch.
 *
 * A file is eligible when a registered extractor claims its extension and no exclusion
 * applies: `exclude_dirs` (any path segment), `exclude_files` (basename globs), the root
 * `.gitignore`, and the index and cache directories.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { glob } from 'glob';
import ignore from 'ignore';

import type { IndexingConfig } from '../config/index.js';
import { debugLog } from '../utils/debug.js';
import { isInside, toRelativePath } from '../utils/paths.js';

export interface ScanOptions {
  rootPath: string;
  /** Absolute file or directory inside `rootPath` */
  targetPath: string;
  supportedExtensions: ReadonlySet<string>;
  config: IndexingConfig;
  /** Absolute directories never scanned (index and cache storage) */
  excludedPaths?: string[];
}

type Matcher = ReturnType<typeof ignore.default>;

async function buildMatcher(options: ScanOptions): Promise<Matcher> {
  const ig = ignore.default();
  ig.add(options.config.exclude_dirs.map((dir) => `${dir.replace(/\/+$/, '')}/`));
  ig.add(options.config.exclude_files);

  for (const excluded of options.excludedPaths ?? []) {
    if (isInside(options.rootPath, excluded) && excluded !== options.rootPath) {
      ig.add(`/${toRelativePath(options.rootPath, excluded)}/`);
    }
  }

  if (options.config.respect_gitignore) {
    try {
      ig.add(await fs.readFile(path.join(options.rootPath, '.gitignore'), 'utf-8'));
    } catch {
      // No .gitignore
    }
  }

  return ig;
}

/** Eligible absolute paths under the target, sorted. */
export async function scanFiles(options: ScanOptions): Promise<string[]> {
  const matcher = await buildMatcher(options);
  const { rootPath, targetPath, supportedExtensions } = options;

  const isEligible = (absolutePath: string): boolean => {
    const relativePath = toRelativePath(rootPath, absolutePath);
    if (!relativePath || relativePath.startsWith('..')) return false;
    if (matcher.ignores(relativePath)) return false;
    return supportedExtensions.has(path.extname(absolutePath).toLowerCase());
  };

  const stat = await fs.stat(targetPath);
  if (stat.isFile()) {
    return isEligible(targetPath) ? [targetPath] : [];
  }

  const matches = await glob('**/*', {
    cwd: targetPath,
    absolute: true,
    nodir: true,
    ignore: options.config.exclude_dirs.map((dir) => `**/${dir}/**`)
  });

  const files = matches.filter(isEligible).sort();
  debugLog(`Scanned ${matches.length} files under ${targetPath}, ${files.length} eligible`);
  return files;
}
