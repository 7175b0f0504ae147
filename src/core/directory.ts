import * as os from 'os';
import * as path from 'path';
import type { LintflowDirectories } from '../types/index.js';
import { DIR_PATTERNS } from '../constants/index.js';

/**
 * Get lintflow directories using the dotfile convention (~/.lintflow).
 * Nothing is created here; the tool keeps no state between runs.
 */
export function getLintflowDirectories(homeDir: string = os.homedir()): LintflowDirectories {
  return {
    config: path.join(homeDir, DIR_PATTERNS.LINTFLOW)
  };
}
