import { TaskScheduler } from '../common/scheduler';

export const DEFAULT_PEEK_DURATION_MS = 3000;
const PEEK_TASK = 'peek';

/** Lines temporarily exempt from masking. One peek runs at a time. */
export class RevealState {
  private readonly revealed = new Set<number>();
  private peeked?: number;

  constructor(private readonly scheduler: TaskScheduler = new TaskScheduler()) {}

  reveal(line: number): void {
    this.revealed.add(line);
  }

  hide(line: number): void {
    this.revealed.delete(line);
  }

  toggle(line: number): boolean {
    if (this.revealed.has(line)) {
      this.revealed.delete(line);
      return false;
    }
    this.revealed.add(line);
    return true;
  }

  isRevealed(line: number): boolean {
    return this.revealed.has(line);
  }

  lines(): number[] {
    return [...this.revealed].sort((a, b) => a - b);
  }

  asSet(): ReadonlySet<number> {
    return this.revealed;
  }

  /**
   * Reveal `line` now and hide it again after `durationMs`. Starting another peek
   * ends the current one first. `onChange` runs after each visibility change.
   */
  peek(line: number, onChange: () => void, durationMs = DEFAULT_PEEK_DURATION_MS): void {
    if (this.peeked !== undefined && this.scheduler.cancel(PEEK_TASK)) {
      this.revealed.delete(this.peeked);
    }
    this.peeked = line;
    this.revealed.add(line);
    onChange();

    this.scheduler.debounce(PEEK_TASK, durationMs, () => {
      this.peeked = undefined;
      this.revealed.delete(line);
      onChange();
    });
  }

  reset(): void {
    this.scheduler.cancel(PEEK_TASK);
    this.peeked = undefined;
    this.revealed.clear();
  }
}
