/**
 * Type definitions for the Dotfiles MCP Server
 */

export interface RepositoryLocation {
  readonly gitDir: string;
  readonly workTree: string;
}

export interface DotfilesConfig {
  readonly location: RepositoryLocation;
  readonly timeoutMs: number;
  readonly maxBufferBytes: number;
}

export interface CommandResult {
  readonly exitStatus: number;
  readonly stdout: string;
  readonly stderr: string;
}

export type TrackedFilesListing =
  | { status: 'listed'; files: string[] }
  | { status: 'unavailable'; exitStatus: number; stderr: string };

export type FileReadResult =
  | { ok: true; content: string }
  | { ok: false; kind: 'not_found' | 'read_failed'; message: string };

export interface DotfileContentArgs {
  filepath: string;
}

// Type aliases rather than interfaces so they stay assignable to the SDK's open-ended schemas
export type ToolDescriptor = {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, { type: 'string'; description: string }>;
    required?: string[];
  };
};

export type ToolErrorKind =
  | 'invalid_arguments'
  | 'unknown_tool'
  | 'repository_unavailable'
  | 'file_not_found'
  | 'read_failed'
  | 'git_failed'
  | 'internal_error';

export type ToolResult =
  | { ok: true; text: string }
  | { ok: false; kind: ToolErrorKind; text: string };

// MCP Tool Response format
export type MCPToolResponse = {
  content: Array<{
    type: 'text';
    text: string;
  }>;
  success: boolean;
  isError?: boolean;
};
