import type { QuoteKind } from '../parser/types';

/** What the renderer needs to overlay one masked entry. */
export interface MaskedLineDescriptor {
  key: string;
  strategy: string;
  startLine: number;
  endLine: number;
  /** Masked replacement for the value, quotes excluded. */
  mask: string;
  valueStart: number;
  valueEnd: number;
  quote: QuoteKind;
  isComment: boolean;
}

export interface MaskResult {
  maskedLines: MaskedLineDescriptor[];
  lineOffsets: number[];
  /** The parse result came from the document cache. */
  fromCache: boolean;
}

export interface MaskEngineSettings {
  skipComments: boolean;
}

export interface MaskEngineStats {
  hits: number;
  misses: number;
  size: number;
}
