#!/usr/bin/env node
/**
 * Dotfiles MCP Server - Main Entry Point
 * Provides read-only access to the files tracked by a bare dotfiles repository (~/.cfg)
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema
} from '@modelcontextprotocol/sdk/types.js';

import { log } from './utils/logger';
import { SERVER_NAME, VERSION } from './utils/constants';
import { errorMessage } from './utils/error-utils';
import { resolveDotfilesConfig } from './core/dotfiles-config';
import { GitExecutor } from './core/git-executor';
import { DotfileQueries } from './core/dotfile-queries';
import { listTools } from './handlers/tool-registry';
import { ToolDispatcher } from './handlers/tool-dispatcher';
import type { DotfilesConfig } from './types';

export class DotfilesMCPServer {
  private server: Server;
  private gitExecutor: GitExecutor;
  private dotfileQueries: DotfileQueries;
  private toolDispatcher: ToolDispatcher;

  constructor(private readonly config: DotfilesConfig = resolveDotfilesConfig()) {
    this.gitExecutor = new GitExecutor(config);
    this.dotfileQueries = new DotfileQueries(config, this.gitExecutor);
    this.toolDispatcher = new ToolDispatcher(this.dotfileQueries);

    this.server = new Server(
      {
        name: SERVER_NAME,
        version: VERSION,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.setupHandlers();
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: listTools(),
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      return this.toolDispatcher.invoke(name, args);
    });
  }

  async start(): Promise<void> {
    const { gitDir, workTree } = this.config.location;
    log('info', `Starting Dotfiles MCP Server v${VERSION}`);
    log('info', `Using git dir ${gitDir} with work tree ${workTree}`);

    const transport = new StdioServerTransport();
    await this.server.connect(transport);

    log('info', 'Dotfiles MCP Server is running');
  }

  shutdown(signal: string): void {
    log('info', `Received ${signal}, shutting down gracefully...`);
    process.exit(0);
  }
}

async function main(): Promise<void> {
  if (process.argv.includes('--version')) {
    console.log(VERSION);
    process.exit(0);
  }

  try {
    const server = new DotfilesMCPServer();

    process.on('SIGINT', () => server.shutdown('SIGINT'));
    process.on('SIGTERM', () => server.shutdown('SIGTERM'));

    await server.start();
  } catch (error) {
    log('error', `Failed to start server: ${errorMessage(error)}`);
    process.exit(1);
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    log('error', `Unhandled error: ${errorMessage(error)}`);
    process.exit(1);
  });
}
