import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Writable } from 'node:stream';
import { Logger } from '../../src/common/logger';
import { TaskScheduler } from '../../src/common/scheduler';
import { OverlayApplier } from '../../src/render/applier';
import { MemoryRenderer } from '../../src/render/memory';
import type { OverlaySpan } from '../../src/render/types';
import { RevealState } from '../../src/state/reveal';

class MemoryWritable extends Writable {
  chunks: string[] = [];

  _write(chunk: Buffer | string, _encoding: string, callback: (error?: Error | null) => void) {
    this.chunks.push(chunk.toString());
    callback();
  }
}

const silent = new Logger({ level: 'silent' });

function span(line: number, displayText: string): OverlaySpan {
  return { line, startColumn: 2, endColumn: 2 + displayText.length, displayText };
}

describe('TaskScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('debounces tasks per key', () => {
    const scheduler = new TaskScheduler(silent);
    const task = vi.fn();
    scheduler.debounce('save', 100, task);
    vi.advanceTimersByTime(60);
    scheduler.debounce('save', 100, task);
    vi.advanceTimersByTime(60);
    expect(task).not.toHaveBeenCalled();
    expect(scheduler.has('save')).toBe(true);

    vi.advanceTimersByTime(40);
    expect(task).toHaveBeenCalledTimes(1);
    expect(scheduler.activeCount()).toBe(0);
  });

  it('cancels single keys and everything at once', () => {
    const scheduler = new TaskScheduler(silent);
    const first = vi.fn();
    const second = vi.fn();
    scheduler.debounce('a', 10, first);
    scheduler.defer('b', second);

    expect(scheduler.cancel('a')).toBe(true);
    expect(scheduler.cancel('a')).toBe(false);
    scheduler.cancelAll();
    vi.runAllTimers();

    expect(first).not.toHaveBeenCalled();
    expect(second).not.toHaveBeenCalled();
    expect(scheduler.activeCount()).toBe(0);
  });

  it('logs a failing task instead of throwing from the timer', () => {
    const destination = new MemoryWritable();
    const scheduler = new TaskScheduler(new Logger({ destination, level: 'error' }));
    scheduler.defer('boom', () => {
      throw new Error('task failed');
    });
    vi.runAllTimers();
    expect(destination.chunks).toHaveLength(1);
    expect(destination.chunks[0]).toContain('task failed');
  });
});

describe('OverlayApplier', () => {
  it('installs synchronously after clearing the target', () => {
    const renderer = new MemoryRenderer();
    const applier = new OverlayApplier(renderer, new TaskScheduler(silent));
    applier.apply('doc', [span(1, '***'), span(2, '**')], { sync: true });
    applier.apply('doc', [span(3, '*')], { sync: true });
    expect(renderer.spansFor('doc')).toEqual([span(3, '*')]);
  });

  it('coalesces deferred applications to the latest spans', async () => {
    const renderer = new MemoryRenderer();
    const applier = new OverlayApplier(renderer, new TaskScheduler(silent));
    applier.apply('doc', [span(1, 'old')]);
    applier.apply('doc', [span(1, 'new')]);
    expect(applier.hasPending('doc')).toBe(true);
    expect(renderer.spansFor('doc')).toEqual([]);

    await applier.flush();
    expect(renderer.spansFor('doc')).toEqual([span(1, 'new')]);
    expect(renderer.installCount()).toBe(1);
    expect(applier.hasPending('doc')).toBe(false);
  });

  it('lets a synchronous application win over a pending deferred one', async () => {
    const renderer = new MemoryRenderer();
    const applier = new OverlayApplier(renderer, new TaskScheduler(silent));
    applier.apply('doc', [span(1, 'stale')]);
    applier.apply('doc', [span(2, 'fresh')], { sync: true });

    await applier.flush();
    expect(renderer.spansFor('doc')).toEqual([span(2, 'fresh')]);
    expect(renderer.installCount()).toBe(1);
  });

  it('clears a target and drops its pending work', async () => {
    const renderer = new MemoryRenderer();
    const applier = new OverlayApplier(renderer, new TaskScheduler(silent));
    applier.apply('doc', [span(1, 'x')], { sync: true });
    applier.apply('doc', [span(2, 'y')]);
    applier.clear('doc');

    await applier.flush();
    expect(renderer.spansFor('doc')).toEqual([]);
  });
});

describe('RevealState', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('reveals, hides and toggles lines', () => {
    const state = new RevealState(new TaskScheduler(silent));
    state.reveal(4);
    expect(state.toggle(2)).toBe(true);
    expect(state.lines()).toEqual([2, 4]);
    expect(state.toggle(4)).toBe(false);
    state.hide(2);
    expect(state.isRevealed(2)).toBe(false);
    expect(state.asSet().size).toBe(0);
  });

  it('peeks at a line for the given duration', () => {
    const state = new RevealState(new TaskScheduler(silent));
    const onChange = vi.fn();
    state.peek(3, onChange, 3000);
    expect(state.isRevealed(3)).toBe(true);
    expect(onChange).toHaveBeenCalledTimes(1);

    vi.advanceTimersByTime(2999);
    expect(state.isRevealed(3)).toBe(true);
    vi.advanceTimersByTime(1);
    expect(state.isRevealed(3)).toBe(false);
    expect(onChange).toHaveBeenCalledTimes(2);
  });

  it('ends the running peek when another starts', () => {
    const state = new RevealState(new TaskScheduler(silent));
    const onChange = vi.fn();
    state.peek(1, onChange, 1000);
    vi.advanceTimersByTime(500);
    state.peek(2, onChange, 1000);
    expect(state.lines()).toEqual([2]);

    vi.advanceTimersByTime(999);
    expect(state.isRevealed(2)).toBe(true);
    vi.advanceTimersByTime(1);
    expect(state.lines()).toEqual([]);
    expect(onChange).toHaveBeenCalledTimes(3);
  });

  it('cancels a pending peek on reset', () => {
    const state = new RevealState(new TaskScheduler(silent));
    const onChange = vi.fn();
    state.peek(5, onChange);
    state.reset();
    vi.runAllTimers();
    expect(state.lines()).toEqual([]);
    expect(onChange).toHaveBeenCalledTimes(1);
  });
});
