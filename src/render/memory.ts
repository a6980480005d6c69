import { OverlayRenderer, OverlaySpan } from './types';

function spanKey(span: OverlaySpan): string {
  return `${span.line}:${span.startColumn}:${span.endColumn}`;
}

/** Keeps installed overlays per target in memory; a span at the same range replaces the previous one. */
export class MemoryRenderer implements OverlayRenderer {
  private readonly targets = new Map<string, Map<string, OverlaySpan>>();
  private installs = 0;

  install(target: string, spans: readonly OverlaySpan[]): void {
    let installed = this.targets.get(target);
    if (!installed) {
      installed = new Map();
      this.targets.set(target, installed);
    }
    for (const span of spans) {
      installed.set(spanKey(span), { ...span });
    }
    this.installs += 1;
  }

  clear(target: string): void {
    this.targets.delete(target);
  }

  spansFor(target: string): OverlaySpan[] {
    const installed = this.targets.get(target);
    if (!installed) {
      return [];
    }
    return [...installed.values()].sort((a, b) => a.line - b.line || a.startColumn - b.startColumn);
  }

  installCount(): number {
    return this.installs;
  }
}
