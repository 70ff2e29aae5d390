/**
 * Read-only queries over the files tracked by the dotfiles repository
 */

import { GitExecutor } from './git-executor';
import { log } from '../utils/logger';
import { fileExists, resolveWithin, readUtf8File } from '../utils/file-utils';
import { errorMessage } from '../utils/error-utils';
import type { DotfilesConfig, FileReadResult, TrackedFilesListing } from '../types';

export class DotfileQueries {
  constructor(
    private readonly config: DotfilesConfig,
    private readonly gitExecutor: GitExecutor
  ) {}

  /**
   * List tracked files, keeping track of whether git could read the repository.
   * `-z` keeps paths verbatim (no C-quoting of non-ASCII or special characters).
   * GitExecutionError propagates.
   */
  queryTrackedFiles(): TrackedFilesListing {
    const result = this.gitExecutor.run(['ls-files', '-z']);

    if (result.exitStatus !== 0) {
      return {
        status: 'unavailable',
        exitStatus: result.exitStatus,
        stderr: result.stderr.trim()
      };
    }

    const files = result.stdout
      .split('\0')
      .map(entry => entry.trim())
      .filter(entry => entry.length > 0);

    return { status: 'listed', files };
  }

  listTrackedFiles(): string[] {
    const listing = this.queryTrackedFiles();
    return listing.status === 'listed' ? listing.files : [];
  }

  /**
   * Read a file from the work tree as it is on disk, which may differ from the committed revision
   */
  tryReadTrackedFile(filepath: string): FileReadResult {
    const { workTree } = this.config.location;
    const fullPath = resolveWithin(workTree, filepath);

    if (fullPath === null) {
      log('warn', `Refusing to read ${filepath}: outside ${workTree}`);
      return {
        ok: false,
        kind: 'read_failed',
        message: `Error reading file: ${filepath} is outside the work tree`
      };
    }

    if (!fileExists(fullPath)) {
      return { ok: false, kind: 'not_found', message: `File not found: ${filepath}` };
    }

    try {
      return { ok: true, content: readUtf8File(fullPath) };
    } catch (error) {
      log('debug', `Failed to read ${fullPath}: ${errorMessage(error)}`);
      return {
        ok: false,
        kind: 'read_failed',
        message: `Error reading file: ${errorMessage(error)}`
      };
    }
  }

  readTrackedFile(filepath: string): string {
    const result = this.tryReadTrackedFile(filepath);
    return result.ok ? result.content : result.message;
  }
}
