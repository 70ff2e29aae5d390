/**
 * Simple logging utility for the Dotfiles MCP Server.
 * Writes to stderr; stdout carries the MCP stdio transport.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

const configuredLevel = process.env.DOTFILES_LOG_LEVEL;
const CURRENT_LOG_LEVEL = isLogLevel(configuredLevel) ? LOG_LEVELS[configuredLevel] : LOG_LEVELS.info;

export const log = (level: LogLevel, message: string): void => {
  if (LOG_LEVELS[level] >= CURRENT_LOG_LEVEL) {
    const timestamp = new Date().toISOString();
    process.stderr.write(`[${timestamp}] [dotfiles-mcp] [${level.toUpperCase()}] ${message}\n`);
  }
};
