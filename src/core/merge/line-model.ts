/**
 * Line-oriented view of a text file used by the structural patchers.
 *
 * Lines are split on '\n' only; a trailing '\r' stays in `raw`, so joining
 * the raw lines back reproduces the original bytes exactly.
 */

export interface ClassifiedLine {
  raw: string;
  // raw without a trailing '\r'
  text: string;
  indent: number;
  isBlank: boolean;
  isComment: boolean;
}

export interface LineDocument {
  lines: ClassifiedLine[];
  crlf: boolean;
  trailingNewline: boolean;
}

export function classifyLine(raw: string): ClassifiedLine {
  const text = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
  const trimmed = text.trim();
  const indent = text.length - text.trimStart().length;
  return {
    raw,
    text,
    indent,
    isBlank: trimmed === '',
    isComment: trimmed.startsWith('#')
  };
}

export function parseLines(content: string): LineDocument {
  if (content === '') {
    return { lines: [], crlf: false, trailingNewline: false };
  }

  const rawLines = content.split('\n');
  const trailingNewline = rawLines[rawLines.length - 1] === '';
  if (trailingNewline) rawLines.pop();

  const lines = rawLines.map(classifyLine);
  return {
    lines,
    crlf: lines.length > 0 && lines[0].raw.endsWith('\r'),
    trailingNewline
  };
}

/**
 * Build a new line using the document's line ending convention.
 */
export function createLine(doc: LineDocument, text: string): ClassifiedLine {
  return classifyLine(doc.crlf ? `${text}\r` : text);
}

export function serializeLines(doc: LineDocument): string {
  if (doc.lines.length === 0) return '';
  return doc.lines.map(line => line.raw).join('\n') + (doc.trailingNewline ? '\n' : '');
}

/**
 * Leading whitespace of a line, as written.
 */
export function leadingWhitespace(line: ClassifiedLine): string {
  return line.text.slice(0, line.indent);
}
