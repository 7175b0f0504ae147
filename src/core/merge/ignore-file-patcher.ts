/**
 * Ignore File Patcher
 * Appends bundle ignore patterns the project does not have yet.
 * Matching is exact string equality, not glob equivalence: `build/` and
 * `build` are different entries.
 */

import { IGNORE_MERGE_MARKER } from '../../constants/index.js';
import { readTextFile, writeTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { createLine, parseLines, serializeLines, type ClassifiedLine } from './line-model.js';

export interface IgnoreMergeResult {
  content: string;
  appended: string[];
}

function isPattern(line: ClassifiedLine): boolean {
  return !line.isBlank && !line.isComment;
}

/**
 * Pure merge: existing content followed by the marker comment and every
 * missing bundle pattern, in bundle order. Unchanged when nothing is missing.
 */
export function mergeIgnoreContent(existing: string, incoming: string): IgnoreMergeResult {
  const doc = parseLines(existing);
  const present = new Set(doc.lines.filter(isPattern).map(line => line.text));
  const appended: string[] = [];

  for (const line of parseLines(incoming).lines) {
    if (!isPattern(line) || present.has(line.text)) continue;
    present.add(line.text);
    appended.push(line.text);
  }

  if (appended.length === 0) {
    return { content: existing, appended };
  }

  const last = doc.lines[doc.lines.length - 1];
  if (last && !last.isBlank) {
    doc.lines.push(createLine(doc, ''));
  }
  doc.lines.push(createLine(doc, IGNORE_MERGE_MARKER));
  doc.lines.push(...appended.map(pattern => createLine(doc, pattern)));
  doc.trailingNewline = true;

  return { content: serializeLines(doc), appended };
}

/**
 * Merge `incoming` ignore content into the existing file at `existingPath`.
 * The file is written only when at least one pattern is appended.
 */
export async function applyIgnoreMerge(existingPath: string, incoming: string): Promise<IgnoreMergeResult> {
  const existing = await readTextFile(existingPath);
  const result = mergeIgnoreContent(existing, incoming);

  if (result.appended.length > 0) {
    await writeTextFile(existingPath, result.content);
    logger.debug(`Appended ${result.appended.length} pattern(s) to ${existingPath}`);
  }

  return result;
}

export async function mergeIgnoreFile(existingPath: string, bundlePath: string): Promise<IgnoreMergeResult> {
  return await applyIgnoreMerge(existingPath, await readTextFile(bundlePath));
}
