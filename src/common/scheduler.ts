import { errorMessage } from './errors';
import { getLogger, Logger } from './logger';

export type ScheduledTask = () => void;

type TaskHandle =
  | { kind: 'timeout'; handle: NodeJS.Timeout }
  | { kind: 'immediate'; handle: NodeJS.Immediate };

function release(entry: TaskHandle): void {
  if (entry.kind === 'timeout') {
    clearTimeout(entry.handle);
  } else {
    clearImmediate(entry.handle);
  }
}

/**
 * Keyed, cancellable timers. Scheduling under a key that already has a pending
 * task cancels that task first, so each key has at most one task outstanding.
 */
export class TaskScheduler {
  private readonly pending = new Map<string, TaskHandle>();

  constructor(private readonly logger: Logger = getLogger('scheduler')) {}

  /** Run `task` after `delayMs`, replacing any task pending under `key`. */
  debounce(key: string, delayMs: number, task: ScheduledTask): void {
    this.cancel(key);
    const handle = setTimeout(() => this.run(key, task), Math.max(0, delayMs));
    this.pending.set(key, { kind: 'timeout', handle });
  }

  /** Run `task` on the next turn of the event loop, replacing any task pending under `key`. */
  defer(key: string, task: ScheduledTask): void {
    this.cancel(key);
    const handle = setImmediate(() => this.run(key, task));
    this.pending.set(key, { kind: 'immediate', handle });
  }

  cancel(key: string): boolean {
    const entry = this.pending.get(key);
    if (!entry) {
      return false;
    }
    release(entry);
    this.pending.delete(key);
    return true;
  }

  cancelAll(): void {
    for (const entry of this.pending.values()) {
      release(entry);
    }
    this.pending.clear();
  }

  has(key: string): boolean {
    return this.pending.has(key);
  }

  activeCount(): number {
    return this.pending.size;
  }

  private run(key: string, task: ScheduledTask): void {
    this.pending.delete(key);
    try {
      task();
    } catch (error) {
      this.logger.error(`Scheduled task "${key}" failed: ${errorMessage(error)}`);
    }
  }
}
