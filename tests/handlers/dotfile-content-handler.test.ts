import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { DotfileContentHandler } from '../../src/handlers/dotfile-content-handler';
import { DotfileQueries } from '../../src/core/dotfile-queries';
import { GitExecutor } from '../../src/core/git-executor';
import type { DotfilesConfig } from '../../src/types';

jest.mock('../../src/core/dotfile-queries');
jest.mock('../../src/utils/logger', () => ({
  log: jest.fn(),
}));

const config: DotfilesConfig = {
  location: { gitDir: '/home/tester/.cfg', workTree: '/home/tester' },
  timeoutMs: 5000,
  maxBufferBytes: 1024,
};

describe('DotfileContentHandler', () => {
  let handler: DotfileContentHandler;
  let mockDotfileQueries: jest.Mocked<DotfileQueries>;

  beforeEach(() => {
    jest.clearAllMocks();

    mockDotfileQueries = jest.mocked(new DotfileQueries(config, new GitExecutor(config)));
    handler = new DotfileContentHandler(mockDotfileQueries);
  });

  describe('Validation', () => {
    it('should require the filepath argument', async () => {
      const missing = [undefined, null, {}, { filepath: '' }, { filepath: 42 }, { path: '.bashrc' }];

      for (const args of missing) {
        const result = await handler.handle(args);
        expect(result).toEqual({
          ok: false,
          kind: 'invalid_arguments',
          text: 'Error: filepath is required',
        });
      }
      expect(mockDotfileQueries.tryReadTrackedFile).not.toHaveBeenCalled();
    });
  });

  describe('handle', () => {
    it('should prefix the content with a header and a blank line', async () => {
      mockDotfileQueries.tryReadTrackedFile.mockReturnValue({ ok: true, content: 'export X=1\n' });

      const result = await handler.handle({ filepath: '.bashrc' });

      expect(result).toEqual({ ok: true, text: 'Content of .bashrc:\n\nexport X=1\n' });
      expect(mockDotfileQueries.tryReadTrackedFile).toHaveBeenCalledWith('.bashrc');
    });

    it('should keep an empty file as an empty body', async () => {
      mockDotfileQueries.tryReadTrackedFile.mockReturnValue({ ok: true, content: '' });

      const result = await handler.handle({ filepath: '.hushlogin' });

      expect(result).toEqual({ ok: true, text: 'Content of .hushlogin:\n\n' });
    });

    it('should embed the not-found message under the header', async () => {
      mockDotfileQueries.tryReadTrackedFile.mockReturnValue({
        ok: false,
        kind: 'not_found',
        message: 'File not found: nope.txt',
      });

      const result = await handler.handle({ filepath: 'nope.txt' });

      expect(result).toEqual({
        ok: false,
        kind: 'file_not_found',
        text: 'Content of nope.txt:\n\nFile not found: nope.txt',
      });
    });

    it('should embed read errors under the header', async () => {
      mockDotfileQueries.tryReadTrackedFile.mockReturnValue({
        ok: false,
        kind: 'read_failed',
        message: "Error reading file: EISDIR: illegal operation on a directory, read",
      });

      const result = await handler.handle({ filepath: '.config' });

      expect(result).toEqual({
        ok: false,
        kind: 'read_failed',
        text: 'Content of .config:\n\nError reading file: EISDIR: illegal operation on a directory, read',
      });
    });
  });
});
