/**
 * Git command execution against the dotfiles bare repository
 */

import { spawnSync } from 'child_process';
import { log } from '../utils/logger';
import type { CommandResult, DotfilesConfig } from '../types';

export type GitExecutionFailure = 'not_started' | 'timeout' | 'failed';

/**
 * Raised when git could not be run to completion at all.
 * A non-zero exit status is not an error; it is reported through CommandResult.
 */
export class GitExecutionError extends Error {
  constructor(
    message: string,
    public readonly reason: GitExecutionFailure,
    public readonly args: readonly string[]
  ) {
    super(message);
    this.name = 'GitExecutionError';
  }
}

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

export class GitExecutor {
  constructor(private readonly config: DotfilesConfig) {}

  /**
   * Run `git --git-dir=<gitDir> --work-tree=<workTree> ...args`
   */
  run(args: readonly string[]): CommandResult {
    const { gitDir, workTree } = this.config.location;
    const gitArgs = [`--git-dir=${gitDir}`, `--work-tree=${workTree}`, ...args];

    log('debug', `Executing git ${args.join(' ')}`);

    const result = spawnSync('git', gitArgs, {
      cwd: workTree,
      encoding: 'utf-8',
      timeout: this.config.timeoutMs,
      maxBuffer: this.config.maxBufferBytes,
      env: {
        ...process.env,
        GIT_TERMINAL_PROMPT: '0', // Disable interactive prompts
        GIT_PAGER: 'cat', // Disable pager
        PAGER: 'cat'
      }
    });

    if (result.error) {
      const code = errorCode(result.error);

      if (code === 'ENOENT' || code === 'EACCES') {
        throw new GitExecutionError(
          `git executable could not be started: ${result.error.message}`,
          'not_started',
          args
        );
      }
      if (code === 'ETIMEDOUT') {
        throw new GitExecutionError(
          `git ${args.join(' ')} timed out after ${this.config.timeoutMs}ms`,
          'timeout',
          args
        );
      }
      throw new GitExecutionError(
        `git ${args.join(' ')} failed: ${result.error.message}`,
        'failed',
        args
      );
    }

    return {
      exitStatus: result.status ?? -1,
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? ''
    };
  }
}
