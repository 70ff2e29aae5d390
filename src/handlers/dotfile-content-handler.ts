/**
 * Handler for get_dotfile_content tool
 */

import { DotfileQueries } from '../core/dotfile-queries';
import { errorResult, okResult } from '../utils/response-utils';
import type { DotfileContentArgs, ToolResult } from '../types';

export class DotfileContentHandler {
  constructor(private dotfileQueries: DotfileQueries) {}

  private isDotfileContentArgs(args: unknown): args is DotfileContentArgs {
    return (
      typeof args === 'object' &&
      args !== null &&
      'filepath' in args &&
      typeof args.filepath === 'string' &&
      args.filepath.length > 0
    );
  }

  async handle(args: unknown): Promise<ToolResult> {
    if (!this.isDotfileContentArgs(args)) {
      return errorResult('invalid_arguments', 'Error: filepath is required');
    }

    const { filepath } = args;
    const result = this.dotfileQueries.tryReadTrackedFile(filepath);
    const header = `Content of ${filepath}:\n\n`;

    if (!result.ok) {
      return errorResult(result.kind === 'not_found' ? 'file_not_found' : 'read_failed', header + result.message);
    }
    return okResult(header + result.content);
  }
}
