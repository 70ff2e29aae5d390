/**
 * File system utility functions
 */

import * as fs from 'fs';
import * as path from 'path';

export function fileExists(filePath: string): boolean {
  try {
    return fs.existsSync(filePath);
  } catch {
    return false;
  }
}

/**
 * Join a relative path onto a root directory.
 * Returns null when the joined path leaves the root.
 */
export function resolveWithin(root: string, relativePath: string): string | null {
  const resolved = path.join(root, relativePath);
  const relative = path.relative(root, resolved);

  if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    return null;
  }
  return resolved;
}

/**
 * Read a file as strict UTF-8; invalid byte sequences throw instead of being replaced.
 * A leading byte order mark is kept as U+FEFF.
 */
export function readUtf8File(filePath: string): string {
  const bytes = fs.readFileSync(filePath);
  return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes);
}
