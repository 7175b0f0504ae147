/**
 * JSONC (JSON with Comments) file utilities
 * Handles reading and parsing JSONC files with comment support
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { parse, printParseErrorCode, type ParseError } from 'jsonc-parser';
import { logger } from './logger.js';
import { ConfigError } from './errors.js';

/**
 * Get the project root directory
 * Works in both development (src/) and production (dist/) environments
 */
export function getProjectRoot(): string {
  const __filename = fileURLToPath(import.meta.url);
  const __dirname = dirname(__filename);

  // Both src/utils and dist/utils are 2 levels deep from root
  return join(__dirname, '..', '..');
}

/**
 * Parse JSONC text, failing on any syntax error rather than returning a
 * partially recovered value.
 */
export function parseJsonc(content: string, source: string): unknown {
  const errors: ParseError[] = [];
  const parsed: unknown = parse(content, errors, { allowTrailingComma: true });

  if (errors.length > 0) {
    const first = errors[0];
    throw new ConfigError(
      `Failed to parse ${source}: ${printParseErrorCode(first.error)} at offset ${first.offset}`
    );
  }

  return parsed;
}

/**
 * Read and parse a JSONC file from the project root
 * @param relativePath - Path relative to project root (e.g., 'bundles.jsonc')
 */
export function readJsoncFileSync(relativePath: string): unknown {
  const fullPath = join(getProjectRoot(), relativePath);

  try {
    return parseJsonc(readFileSync(fullPath, 'utf-8'), relativePath);
  } catch (error) {
    logger.error(`Failed to read JSONC file: ${relativePath}`, { error, fullPath });
    if (error instanceof ConfigError) throw error;
    throw new ConfigError(`Failed to read JSONC file ${relativePath}: ${error}`);
  }
}
