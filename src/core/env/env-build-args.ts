/**
 * Environment file to build arguments.
 * Converts `.dev.env`-style files into `--dart-define` arguments or the JSON
 * file consumed by `--dart-define-from-file`.
 */

import { dirname } from 'path';
import { ensureDir, exists, readTextFile, writeTextFile } from '../../utils/fs.js';
import { FileNotFoundError } from '../../utils/errors.js';

export type BuildArgs = Map<string, string>;

/**
 * Strip exactly one layer of matching single or double quotes.
 */
export function stripMatchingQuotes(value: string): string {
  if (value.length < 2) return value;
  const first = value[0];
  const last = value[value.length - 1];
  if ((first === '"' || first === "'") && first === last) {
    return value.slice(1, -1);
  }
  return value;
}

export function parseEnvContent(content: string): BuildArgs {
  const args: BuildArgs = new Map();

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === '' || line.startsWith('#')) continue;

    const separator = line.indexOf('=');
    if (separator === -1) continue;

    const key = line.slice(0, separator).trim();
    if (key === '') continue;

    args.set(key, stripMatchingQuotes(line.slice(separator + 1).trim()));
  }

  return args;
}

export async function toBuildArgs(envFilePath: string): Promise<BuildArgs> {
  if (!(await exists(envFilePath))) {
    throw new FileNotFoundError(envFilePath);
  }
  return parseEnvContent(await readTextFile(envFilePath));
}

export function formatDartDefines(args: BuildArgs): string[] {
  return [...args].map(([key, value]) => `--dart-define=${key}=${value}`);
}

export function buildArgsToJson(args: BuildArgs): string {
  const record: Record<string, string> = {};
  for (const [key, value] of args) {
    record[key] = value;
  }
  return JSON.stringify(record, null, 2);
}

export async function writeBuildArgsJson(args: BuildArgs, outPath: string): Promise<void> {
  await ensureDir(dirname(outPath));
  await writeTextFile(outPath, buildArgsToJson(args));
}
