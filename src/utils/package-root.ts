import { promises as fs } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

/**
 * Resolves the package root from a module inside it.
 *
 * `moduleUrl` is expected to be somewhere inside `{packageRoot}/dist/` or `{packageRoot}/src/`.
 */
export function resolvePackageRoot(moduleUrl: string): string {
  const thisFile = fileURLToPath(moduleUrl);
  let dir = path.dirname(thisFile);
  while (dir !== path.dirname(dir)) {
    const base = path.basename(dir);
    if (base === 'src' || base === 'dist') {
      return path.dirname(dir);
    }
    dir = path.dirname(dir);
  }

  return path.join(path.dirname(thisFile), '..', '..');
}

/** The `version` field of the package's own package.json, or '0.0.0' when unreadable. */
export async function readPackageVersion(moduleUrl: string): Promise<string> {
  try {
    const raw = await fs.readFile(path.join(resolvePackageRoot(moduleUrl), 'package.json'), 'utf-8');
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed) {
      return typeof parsed.version === 'string' ? parsed.version : '0.0.0';
    }
  } catch {
    // fall through
  }
  return '0.0.0';
}
