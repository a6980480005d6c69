import { EdfParseError } from '../common/errors';
import { computeLineOffsets, lineOfOffset } from './lines';
import { DotenvParserOptions, EdfEntry, EdfParser, ParsedDocument, QuoteKind } from './types';

const KEY_PATTERN = /[A-Za-z_][A-Za-z0-9_.-]*/y;

const DOUBLE_QUOTE_ESCAPES: Record<string, string> = {
  n: '\n',
  r: '\r',
  t: '\t',
  '"': '"',
  '\\': '\\',
  $: '$',
};

interface ValueRead {
  value: string;
  valueStart: number;
  valueEnd: number;
  quote: QuoteKind;
}

interface LineCursor {
  line: number;
  lineStart: number;
  lineEnd: number;
  isComment: boolean;
}

function isInlineWhitespace(char: string | undefined): boolean {
  return char === ' ' || char === '\t';
}

function skipInlineWhitespace(content: string, position: number, limit: number): number {
  let cursor = position;
  while (cursor < limit && isInlineWhitespace(content[cursor])) {
    cursor += 1;
  }
  return cursor;
}

function lineEndOf(content: string, lineOffsets: number[], line: number): number {
  const lineStart = lineOffsets[line - 1];
  let end = line < lineOffsets.length ? lineOffsets[line] - 1 : content.length;
  if (end > lineStart && content[end - 1] === '\r') {
    end -= 1;
  }
  return end;
}

/**
 * Parser for dotenv-style documents: `export` prefixes, single and double quoted
 * values spanning lines, escapes in double quotes, inline comments after unquoted
 * values, and assignments inside `#` comments.
 */
export class DotenvParser implements EdfParser {
  private readonly includeComments: boolean;
  private readonly strict: boolean;

  constructor(options: DotenvParserOptions = {}) {
    this.includeComments = options.includeComments ?? true;
    this.strict = options.strict ?? false;
  }

  parse(content: string): ParsedDocument {
    const lineOffsets = computeLineOffsets(content);
    const entries: EdfEntry[] = [];

    let line = 1;
    while (line <= lineOffsets.length) {
      const lastLine = this.parseLine(content, lineOffsets, line, entries);
      line = lastLine + 1;
    }

    return { entries, lineOffsets };
  }

  /** Returns the last line consumed, which is past `line` for multi-line values. */
  private parseLine(content: string, lineOffsets: number[], line: number, entries: EdfEntry[]): number {
    const lineStart = lineOffsets[line - 1];
    const lineEnd = lineEndOf(content, lineOffsets, line);
    let position = skipInlineWhitespace(content, lineStart, lineEnd);
    if (position === lineEnd) {
      return line;
    }

    let isComment = false;
    if (content[position] === '#') {
      if (!this.includeComments) {
        return line;
      }
      isComment = true;
      position = skipInlineWhitespace(content, position + 1, lineEnd);
    }

    const cursor: LineCursor = { line, lineStart, lineEnd, isComment };
    const entry = this.parseAssignment(content, lineOffsets, cursor, position);
    if (!entry) {
      if (this.strict && !isComment) {
        throw new EdfParseError('Expected KEY=value assignment', line, position - lineStart + 1);
      }
      return line;
    }

    entries.push(entry);
    return entry.endLine;
  }

  private parseAssignment(
    content: string,
    lineOffsets: number[],
    cursor: LineCursor,
    start: number,
  ): EdfEntry | undefined {
    let position = start;
    let exported = false;
    if (content.startsWith('export', position) && isInlineWhitespace(content[position + 6])) {
      exported = true;
      position = skipInlineWhitespace(content, position + 6, cursor.lineEnd);
    }

    KEY_PATTERN.lastIndex = position;
    const match = KEY_PATTERN.exec(content);
    if (!match) {
      return undefined;
    }
    const keyStart = position;
    const keyEnd = position + match[0].length;

    position = skipInlineWhitespace(content, keyEnd, cursor.lineEnd);
    if (content[position] !== '=') {
      return undefined;
    }
    position = skipInlineWhitespace(content, position + 1, cursor.lineEnd);

    const read = this.readValue(content, cursor, position);
    if (!read) {
      return undefined;
    }

    const endLine =
      read.valueEnd > read.valueStart ? lineOfOffset(lineOffsets, read.valueEnd - 1) : cursor.line;

    return {
      key: match[0],
      value: read.value,
      keyStart,
      keyEnd,
      valueStart: read.valueStart,
      valueEnd: read.valueEnd,
      startLine: cursor.line,
      endLine,
      quote: read.quote,
      exported,
      isComment: cursor.isComment,
    };
  }

  private readValue(content: string, cursor: LineCursor, position: number): ValueRead | undefined {
    const opening = content[position];
    if (position < cursor.lineEnd && opening === '"') {
      return this.readDoubleQuoted(content, cursor, position);
    }
    if (position < cursor.lineEnd && opening === "'") {
      return this.readSingleQuoted(content, cursor, position);
    }
    return this.readUnquoted(content, cursor, position);
  }

  private readDoubleQuoted(content: string, cursor: LineCursor, position: number): ValueRead | undefined {
    const limit = cursor.isComment ? cursor.lineEnd : content.length;
    let value = '';
    let index = position + 1;
    while (index < limit) {
      const char = content[index];
      if (char === '\\' && index + 1 < limit) {
        const next = content[index + 1];
        value += DOUBLE_QUOTE_ESCAPES[next] ?? `\\${next}`;
        index += 2;
        continue;
      }
      if (char === '"') {
        return { value, valueStart: position, valueEnd: index + 1, quote: 'double' };
      }
      value += char;
      index += 1;
    }
    return this.unterminated('double', cursor, position);
  }

  private readSingleQuoted(content: string, cursor: LineCursor, position: number): ValueRead | undefined {
    const close = content.indexOf("'", position + 1);
    const limit = cursor.isComment ? cursor.lineEnd : content.length;
    if (close === -1 || close >= limit) {
      return this.unterminated('single', cursor, position);
    }
    return {
      value: content.slice(position + 1, close),
      valueStart: position,
      valueEnd: close + 1,
      quote: 'single',
    };
  }

  private readUnquoted(content: string, cursor: LineCursor, position: number): ValueRead {
    let end = position;
    while (end < cursor.lineEnd) {
      if (content[end] === '#' && isInlineWhitespace(content[end - 1])) {
        break;
      }
      end += 1;
    }
    while (end > position && isInlineWhitespace(content[end - 1])) {
      end -= 1;
    }
    return { value: content.slice(position, end), valueStart: position, valueEnd: end, quote: 'none' };
  }

  private unterminated(quote: QuoteKind, cursor: LineCursor, position: number): undefined {
    // A commented-out assignment never blocks the rest of the document.
    if (cursor.isComment) {
      return undefined;
    }
    throw new EdfParseError(`Unterminated ${quote}-quoted value`, cursor.line, position - cursor.lineStart + 1);
  }
}
