/**
 * Repository location and runtime limits, resolved once at startup
 */

import * as os from 'os';
import * as path from 'path';
import { GIT_DIR_NAME, TIMEOUT_MS, MAX_BUFFER_SIZE } from '../utils/constants';
import type { DotfilesConfig } from '../types';

export function resolveDotfilesConfig(homeDir: string = os.homedir()): DotfilesConfig {
  return Object.freeze({
    location: Object.freeze({
      gitDir: path.join(homeDir, GIT_DIR_NAME),
      workTree: homeDir,
    }),
    timeoutMs: TIMEOUT_MS,
    maxBufferBytes: MAX_BUFFER_SIZE,
  });
}
