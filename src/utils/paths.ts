import { promises as fs } from 'fs';
import path from 'path';

export function toPosixPath(filePath: string): string {
  return filePath.replace(/\\/g, '/');
}

/** Project-relative POSIX path, as stored on chunks and in the manifest. */
export function toRelativePath(rootPath: string, absolutePath: string): string {
  return toPosixPath(path.relative(rootPath, absolutePath));
}

/** True when `candidate` equals `parent` or lies beneath it (both relative POSIX paths). */
export function isUnderPath(candidate: string, parent: string): boolean {
  if (parent === '' || parent === '.') return true;
  return candidate === parent || candidate.startsWith(`${parent}/`);
}

export function isInside(rootPath: string, absolutePath: string): boolean {
  const relative = path.relative(rootPath, absolutePath);
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

export async function pathExists(targetPath: string): Promise<boolean> {
  try {
    await fs.access(targetPath);
    return true;
  } catch {
    return false;
  }
}
