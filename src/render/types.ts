/** A column range of one line whose display is replaced by `displayText`. */
export interface OverlaySpan {
  line: number;
  startColumn: number;
  endColumn: number;
  displayText: string;
}

/**
 * Host-side overlay primitives. Installs must not touch the underlying text and
 * installing the same spans twice must look the same as installing them once.
 */
export interface OverlayRenderer {
  install(target: string, spans: readonly OverlaySpan[]): void;
  clear(target: string): void;
}
