import type { QuoteKind } from '../parser/types';
import type { OverlaySpan } from '../render/types';
import { LineIndex } from './lineIndex';

/** The parts of an entry (or mask descriptor) that decide where its overlays go. */
export interface OverlaySource {
  startLine: number;
  endLine: number;
  valueStart: number;
  valueEnd: number;
  quote: QuoteKind;
}

export interface MaskedOverlaySource extends OverlaySource {
  mask: string;
}

function isRevealed(entry: OverlaySource, revealedLines: ReadonlySet<number>): boolean {
  if (revealedLines.size === 0) {
    return false;
  }
  for (let line = entry.startLine; line <= entry.endLine; line += 1) {
    if (revealedLines.has(line)) {
      return true;
    }
  }
  return false;
}

/** Exactly `width` units of the mask from `cursor`; line breaks never reach the display. */
function sliceMask(maskedText: string, cursor: number, width: number, maskChar: string): string {
  return maskedText.slice(cursor, cursor + width).padEnd(width, maskChar).replace(/[\r\n]/g, maskChar);
}

/**
 * Turn an entry's value range into overlay spans, one per physical line.
 *
 * Quote characters stay visible: a quoted value's first span starts one column
 * after the opening quote and its last span ends one column before the closing
 * quote. Nothing is produced when any covered line is revealed, and zero-width
 * spans are dropped.
 */
export function mapEntryToOverlays(
  entry: OverlaySource,
  lines: LineIndex,
  maskedText: string,
  revealedLines: ReadonlySet<number> = new Set(),
  maskChar = '*',
): OverlaySpan[] {
  if (isRevealed(entry, revealedLines)) {
    return [];
  }
  const startOffset = lines.start(entry.startLine);
  if (startOffset === undefined) {
    return [];
  }

  const trim = entry.quote === 'none' ? 0 : 1;

  if (entry.endLine <= entry.startLine) {
    const startColumn = Math.max(0, entry.valueStart - startOffset + trim);
    const endColumn = Math.max(
      startColumn,
      Math.min(entry.valueEnd - startOffset - trim, lines.length(entry.startLine)),
    );
    if (endColumn === startColumn) {
      return [];
    }
    return [
      {
        line: entry.startLine,
        startColumn,
        endColumn,
        displayText: sliceMask(maskedText, 0, endColumn - startColumn, maskChar),
      },
    ];
  }

  const spans: OverlaySpan[] = [];
  // Position in `maskedText` of the first character shown on the current line.
  let cursor = 0;
  for (let line = entry.startLine; line <= entry.endLine && line <= lines.count; line += 1) {
    const lineLength = lines.length(line);
    let startColumn = 0;
    let endColumn = lineLength;
    if (line === entry.startLine) {
      startColumn = entry.valueStart - startOffset + trim;
    } else if (line === entry.endLine) {
      endColumn = Math.max(0, entry.valueEnd - (lines.start(line) ?? 0)) - trim;
    }

    startColumn = Math.max(0, startColumn);
    endColumn = Math.max(startColumn, Math.min(endColumn, lineLength));
    const width = endColumn - startColumn;
    if (width > 0) {
      spans.push({ line, startColumn, endColumn, displayText: sliceMask(maskedText, cursor, width, maskChar) });
    }
    // The line break (`\n` or `\r\n`) between two physical lines is part of the value.
    const lineEnd = (lines.start(line) ?? 0) + lineLength;
    cursor += width + ((lines.start(line + 1) ?? lineEnd) - lineEnd);
  }
  return spans;
}

export function mapMasksToOverlays(
  masks: readonly MaskedOverlaySource[],
  lines: LineIndex,
  revealedLines: ReadonlySet<number> = new Set(),
  maskChar = '*',
): OverlaySpan[] {
  return masks.flatMap((mask) => mapEntryToOverlays(mask, lines, mask.mask, revealedLines, maskChar));
}
