export type QuoteKind = 'none' | 'single' | 'double';

/**
 * One key/value record. Offsets are string indices into the parsed content,
 * `valueStart`/`valueEnd` form a half-open range that includes surrounding quotes.
 */
export interface EdfEntry {
  key: string;
  value: string;
  keyStart: number;
  keyEnd: number;
  valueStart: number;
  valueEnd: number;
  /** 1-based line holding the key. */
  startLine: number;
  /** 1-based line holding the last character of the value. */
  endLine: number;
  quote: QuoteKind;
  exported: boolean;
  isComment: boolean;
}

export interface ParsedDocument {
  entries: EdfEntry[];
  /** `lineOffsets[n - 1]` is the offset where line `n` begins. */
  lineOffsets: number[];
}

export interface EdfParser {
  /** Must not mutate shared state; throws `EdfParseError` on unrecoverable input. */
  parse(content: string): ParsedDocument;
}

export interface DotenvParserOptions {
  /** Produce entries for `# KEY=value` lines. */
  includeComments?: boolean;
  /** Throw on lines that are neither blank, comments nor assignments. */
  strict?: boolean;
}
