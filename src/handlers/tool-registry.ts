/**
 * Catalog of the tools this server exposes
 */

import type { ToolDescriptor } from '../types';

export const LIST_DOTFILES = 'list_dotfiles';
export const GET_DOTFILE_CONTENT = 'get_dotfile_content';

export function listTools(): ToolDescriptor[] {
  return [
    {
      name: LIST_DOTFILES,
      description: 'List all dotfiles managed by the repository',
      inputSchema: {
        type: 'object',
        properties: {},
      },
    },
    {
      name: GET_DOTFILE_CONTENT,
      description: 'Get the content of a specific dotfile',
      inputSchema: {
        type: 'object',
        properties: {
          filepath: {
            type: 'string',
            description: 'Path to the dotfile, relative to the home directory (e.g. ".bashrc")',
          },
        },
        required: ['filepath'],
      },
    },
  ];
}
