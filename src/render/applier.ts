import { TaskScheduler } from '../common/scheduler';
import { OverlayRenderer, OverlaySpan } from './types';

export interface ApplyOverlaysOptions {
  /** Install before returning instead of on the next tick. */
  sync?: boolean;
}

function taskKey(target: string): string {
  return `overlays:${target}`;
}

/**
 * Installs overlays on a renderer either immediately or on the next tick.
 * Every installation clears the target first. A deferred application only ever
 * installs the most recent spans handed in for its target, and a synchronous one
 * cancels whatever deferred work is still pending, so older spans never land on
 * top of newer ones.
 */
export class OverlayApplier {
  private readonly pending = new Map<string, readonly OverlaySpan[]>();

  constructor(
    private readonly renderer: OverlayRenderer,
    private readonly scheduler: TaskScheduler = new TaskScheduler(),
  ) {}

  apply(target: string, spans: readonly OverlaySpan[], options: ApplyOverlaysOptions = {}): void {
    if (options.sync) {
      this.cancel(target);
      this.install(target, spans);
      return;
    }

    this.pending.set(target, spans);
    this.scheduler.defer(taskKey(target), () => {
      const latest = this.pending.get(target);
      this.pending.delete(target);
      if (latest) {
        this.install(target, latest);
      }
    });
  }

  clear(target: string): void {
    this.cancel(target);
    this.renderer.clear(target);
  }

  hasPending(target: string): boolean {
    return this.pending.has(target);
  }

  /** Resolves after the deferred applications queued so far have run. */
  flush(): Promise<void> {
    return new Promise((resolve) => setImmediate(resolve));
  }

  private cancel(target: string): void {
    this.scheduler.cancel(taskKey(target));
    this.pending.delete(target);
  }

  private install(target: string, spans: readonly OverlaySpan[]): void {
    this.renderer.clear(target);
    this.renderer.install(target, spans);
  }
}
