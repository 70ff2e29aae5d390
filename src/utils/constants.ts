/**
 * Shared constants for the Dotfiles MCP Server
 */

export const SERVER_NAME = 'dotfiles-server';
export const VERSION = '1.0.0';

export const GIT_DIR_NAME = '.cfg'; // Bare repository, relative to the home directory
export const DEFAULT_TIMEOUT_MS = 10000; // Default 10 seconds
export const TIMEOUT_MS = parsePositiveInt(process.env.DOTFILES_TIMEOUT, DEFAULT_TIMEOUT_MS);
export const MAX_BUFFER_SIZE = 10 * 1024 * 1024; // 10MB

export const NO_DOTFILES_MESSAGE = 'No dotfiles found or git repository not accessible.';

export function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}
