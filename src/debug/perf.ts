/**
 * Cadence Debug Module - Timing
 *
 * Named spans reported through the `perf` trace category.
 *
 * @module debug/perf
 */

import { trace } from './trace.js';

const spans = new Map<string, number>();

export const perf = {
  /**
   * Start (or restart) a named span.
   */
  mark(label: string): void {
    spans.set(label, performance.now());
  },

  /**
   * End a span and return its duration in ms; 0 when it was never started.
   */
  measure(label: string): number {
    const start = spans.get(label);
    if (start === undefined) {
      trace.perf(`${label}: no span`);
      return 0;
    }
    spans.delete(label);
    const durationMs = performance.now() - start;
    trace.perf(`${label}: ${durationMs.toFixed(2)}ms`);
    return durationMs;
  },

  /** Drop a span without reporting it. */
  discard(label: string): void {
    spans.delete(label);
  },

  /** Number of spans still open */
  get openSpans(): number {
    return spans.size;
  },
};
