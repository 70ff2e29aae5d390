/**
 * Handler for list_dotfiles tool
 */

import { DotfileQueries } from '../core/dotfile-queries';
import { log } from '../utils/logger';
import { NO_DOTFILES_MESSAGE } from '../utils/constants';
import { errorResult, okResult } from '../utils/response-utils';
import type { ToolResult } from '../types';

export class ListDotfilesHandler {
  constructor(private dotfileQueries: DotfileQueries) {}

  async handle(): Promise<ToolResult> {
    const listing = this.dotfileQueries.queryTrackedFiles();

    if (listing.status === 'unavailable') {
      log('warn', `git ls-files exited with status ${listing.exitStatus}: ${listing.stderr || '(no error output)'}`);
      return errorResult('repository_unavailable', NO_DOTFILES_MESSAGE);
    }

    if (listing.files.length === 0) {
      return okResult(NO_DOTFILES_MESSAGE);
    }

    return okResult(`Found ${listing.files.length} dotfiles:\n\n${listing.files.join('\n')}`);
  }
}
