/**
 * Dependency Manifest Patcher
 * Injects a single dependency line into a YAML-like manifest (pubspec.yaml)
 * without parsing it, so comments and formatting of every other line survive.
 */

import { DEFAULTS } from '../../constants/index.js';
import { ManifestPatchError, describeError } from '../../utils/errors.js';
import { exists, readTextFile, writeTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import {
  createLine,
  leadingWhitespace,
  parseLines,
  serializeLines,
  type ClassifiedLine,
  type LineDocument
} from './line-model.js';

export interface DependencyPatch {
  // Top-level header line, e.g. 'dev_dependencies:'
  section: string;
  key: string;
  // Text written after 'key: ', e.g. '^10.0.0'
  value: string;
  // Headers the new section is placed before when the section is missing
  anchors?: readonly string[];
}

export type PatchResult =
  | { status: 'already-present' }
  | { status: 'added'; sectionCreated: boolean; lineNumber: number };

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whole-key match: `key:` (optionally quoted) as the first token of a line
 * at any indentation. A commented-out entry counts, so a manifest that
 * mentions the key is never touched.
 */
export function containsKey(doc: LineDocument, key: string): boolean {
  const pattern = new RegExp(`^(["']?)${escapeRegExp(key)}\\1\\s*:`);
  return doc.lines.some(line => pattern.test(line.text.trimStart().replace(/^#+\s*/, '')));
}

/**
 * True when a column-0 line is exactly `header`, optionally followed by
 * whitespace or a trailing comment.
 */
export function isHeaderLine(line: ClassifiedLine, header: string): boolean {
  if (line.indent !== 0 || !line.text.startsWith(header)) return false;
  const rest = line.text.slice(header.length).trim();
  return rest === '' || rest.startsWith('#');
}

// The section ends at the first unindented non-blank line, or at EOF
function insertIntoSection(doc: LineDocument, headerIndex: number, entry: string): number {
  let insertAt = doc.lines.length;
  let siblingIndent: string | undefined;
  let siblingDepth = Number.POSITIVE_INFINITY;

  for (let i = headerIndex + 1; i < doc.lines.length; i++) {
    const line = doc.lines[i];
    if (line.isBlank) continue;
    if (line.indent === 0) {
      insertAt = i;
      break;
    }
    if (!line.isComment && line.indent < siblingDepth) {
      siblingDepth = line.indent;
      siblingIndent = leadingWhitespace(line);
    }
  }

  doc.lines.splice(insertAt, 0, createLine(doc, `${siblingIndent ?? DEFAULTS.INDENT}${entry}`));
  return insertAt;
}

function findAnchorInsertionPoint(doc: LineDocument, anchors: readonly string[]): number | undefined {
  const anchorIndex = doc.lines.findIndex(line => anchors.some(anchor => isHeaderLine(line, anchor)));
  if (anchorIndex === -1) return undefined;

  // Keep a comment block that introduces the anchor attached to it
  let insertAt = anchorIndex;
  while (insertAt > 0) {
    const previous = doc.lines[insertAt - 1];
    if (!previous.isComment || previous.indent !== 0) break;
    insertAt--;
  }
  return insertAt;
}

function createSection(doc: LineDocument, patch: DependencyPatch, entry: string): number {
  const header = createLine(doc, patch.section);
  const line = createLine(doc, `${DEFAULTS.INDENT}${entry}`);
  const blank = createLine(doc, '');
  const insertAt = findAnchorInsertionPoint(doc, patch.anchors ?? []);
  const block = [header, line];

  if (insertAt === undefined) {
    const last = doc.lines[doc.lines.length - 1];
    if (last && !last.isBlank) block.unshift(blank);
    doc.lines.push(...block);
    doc.trailingNewline = true;
    return doc.lines.length - 1;
  }

  const before = insertAt > 0 ? doc.lines[insertAt - 1] : undefined;
  if (before && !before.isBlank) block.unshift(blank);
  doc.lines.splice(insertAt, 0, ...block);
  return insertAt + block.indexOf(line);
}

/**
 * Pure form of the patch: returns the new content and what happened.
 * Content is returned unchanged when the key already exists anywhere.
 */
export function patchDependencyContent(
  content: string,
  patch: DependencyPatch
): { content: string; result: PatchResult } {
  const doc = parseLines(content);

  if (containsKey(doc, patch.key)) {
    return { content, result: { status: 'already-present' } };
  }

  const entry = `${patch.key}: ${patch.value}`;
  const headerIndex = doc.lines.findIndex(line => isHeaderLine(line, patch.section));

  if (headerIndex !== -1) {
    const index = insertIntoSection(doc, headerIndex, entry);
    return {
      content: serializeLines(doc),
      result: { status: 'added', sectionCreated: false, lineNumber: index + 1 }
    };
  }

  const index = createSection(doc, patch, entry);
  return {
    content: serializeLines(doc),
    result: { status: 'added', sectionCreated: true, lineNumber: index + 1 }
  };
}

/**
 * Inject `key: valueLine` into `sectionHeader` of the manifest at `filePath`.
 * The manifest belongs to the project, so a missing file is an error.
 */
export async function injectDependency(
  filePath: string,
  sectionHeader: string,
  key: string,
  valueLine: string,
  anchors: readonly string[] = []
): Promise<PatchResult> {
  if (!(await exists(filePath))) {
    throw new ManifestPatchError(`Manifest not found: ${filePath}`, filePath);
  }

  let original: string;
  try {
    original = await readTextFile(filePath);
  } catch (error) {
    throw new ManifestPatchError(`Cannot read ${filePath}: ${describeError(error)}`, filePath);
  }

  const { content, result } = patchDependencyContent(original, {
    section: sectionHeader,
    key,
    value: valueLine,
    anchors
  });

  if (result.status === 'already-present') {
    logger.debug(`${key} already present in ${filePath}`);
    return result;
  }

  try {
    await writeTextFile(filePath, content);
  } catch (error) {
    throw new ManifestPatchError(`Cannot write ${filePath}: ${describeError(error)}`, filePath);
  }

  logger.debug(`Added ${key} to ${sectionHeader} in ${filePath}`, result);
  return result;
}
