import { computeLineOffsets } from '../parser/lines';

/** Line starts and visible line lengths (line break excluded) for 1-based lines. */
export class LineIndex {
  private constructor(
    readonly offsets: readonly number[],
    private readonly lengths: readonly number[],
  ) {}

  static fromContent(content: string): LineIndex {
    const offsets = computeLineOffsets(content);
    const lengths = offsets.map((start, index) => {
      let end = index + 1 < offsets.length ? offsets[index + 1] - 1 : content.length;
      if (end > start && content[end - 1] === '\r') {
        end -= 1;
      }
      return end - start;
    });
    return new LineIndex(offsets, lengths);
  }

  get count(): number {
    return this.offsets.length;
  }

  start(line: number): number | undefined {
    return line >= 1 && line <= this.offsets.length ? this.offsets[line - 1] : undefined;
  }

  length(line: number): number {
    return line >= 1 && line <= this.lengths.length ? this.lengths[line - 1] : 0;
  }
}
