/**
 * Routes tool calls to their handlers
 */

import { DotfileQueries } from '../core/dotfile-queries';
import { GitExecutionError } from '../core/git-executor';
import { ListDotfilesHandler } from './list-dotfiles-handler';
import { DotfileContentHandler } from './dotfile-content-handler';
import { LIST_DOTFILES, GET_DOTFILE_CONTENT } from './tool-registry';
import { log } from '../utils/logger';
import { errorMessage } from '../utils/error-utils';
import { errorResult, renderToolResult } from '../utils/response-utils';
import type { MCPToolResponse, ToolResult } from '../types';

export class ToolDispatcher {
  private listDotfilesHandler: ListDotfilesHandler;
  private dotfileContentHandler: DotfileContentHandler;

  constructor(dotfileQueries: DotfileQueries) {
    this.listDotfilesHandler = new ListDotfilesHandler(dotfileQueries);
    this.dotfileContentHandler = new DotfileContentHandler(dotfileQueries);
  }

  /**
   * Execute a tool and return its tagged result.
   * Only unexpected errors escape; git failures become results.
   */
  async dispatch(name: string, args: unknown): Promise<ToolResult> {
    try {
      switch (name) {
        case LIST_DOTFILES:
          return await this.listDotfilesHandler.handle();

        case GET_DOTFILE_CONTENT:
          return await this.dotfileContentHandler.handle(args);

        default:
          return errorResult('unknown_tool', `Unknown tool: ${name}`);
      }
    } catch (error) {
      if (error instanceof GitExecutionError) {
        log('error', `git ${error.reason} while running ${name}: ${error.message}`);
        return errorResult('git_failed', `Error: ${error.message}`);
      }
      throw error;
    }
  }

  /**
   * Execute a tool and render it for the transport. Never rejects.
   */
  async invoke(name: string, args: unknown): Promise<MCPToolResponse> {
    log('info', `Tool called: ${name}`);

    try {
      return renderToolResult(await this.dispatch(name, args));
    } catch (error) {
      log('error', `Tool execution error: ${errorMessage(error)}`);
      return renderToolResult(errorResult('internal_error', `Error executing ${name}: ${errorMessage(error)}`));
    }
  }
}
