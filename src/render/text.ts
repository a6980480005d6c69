import { LineIndex } from '../masking/lineIndex';
import { OverlaySpan } from './types';

/**
 * Produce the text a reader would see with `spans` installed over `content`.
 * Each span's column range is replaced by its display text; line breaks are kept.
 */
export function renderMaskedText(content: string, lines: LineIndex, spans: readonly OverlaySpan[]): string {
  const byLine = new Map<number, OverlaySpan[]>();
  for (const span of spans) {
    const list = byLine.get(span.line) ?? [];
    list.push(span);
    byLine.set(span.line, list);
  }

  let output = '';
  for (let line = 1; line <= lines.count; line += 1) {
    const start = lines.start(line) ?? content.length;
    const visibleEnd = start + lines.length(line);
    const nextStart = lines.start(line + 1) ?? content.length;
    let text = content.slice(start, visibleEnd);

    const lineSpans = (byLine.get(line) ?? []).slice().sort((a, b) => b.startColumn - a.startColumn);
    for (const span of lineSpans) {
      text = text.slice(0, span.startColumn) + span.displayText + text.slice(span.endColumn);
    }

    output += text + content.slice(visibleEnd, nextStart);
  }
  return output;
}
