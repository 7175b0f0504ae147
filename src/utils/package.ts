import { readFileSync } from 'fs';
import { join } from 'path';
import { getProjectRoot } from './jsonc.js';
import { logger } from './logger.js';

/**
 * Version of the installed CLI, read from its own package.json.
 */
export function getVersion(): string {
  const packageJsonPath = join(getProjectRoot(), 'package.json');
  try {
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    const version: unknown = parsed !== null && typeof parsed === 'object' ? Reflect.get(parsed, 'version') : undefined;
    if (typeof version === 'string') return version;
  } catch (error) {
    logger.debug('Could not read package version', { error, packageJsonPath });
  }
  return '0.0.0';
}
