/**
 * Cadence Debug Module - Trace Logging Interface
 *
 * Category-based tracing for detailed subsystem debugging.
 *
 * @module debug/trace
 */

import { type TraceCategory, enabledTraceCategories } from './config.js';
import { storeLog } from './log.js';

function formatTraceMessage(category: TraceCategory, message: string): string {
  const timestamp = performance.now().toFixed(1);
  return `[${timestamp}ms][TRACE:${category}] ${message}`;
}

function emitTrace(category: TraceCategory, module: string, message: string, data?: unknown): void {
  if (!enabledTraceCategories.has(category)) return;
  storeLog(`TRACE:${category}`, module, message, data);
  const formatted = formatTraceMessage(category, message);
  if (data !== undefined) {
    console.log(formatted, data);
  } else {
    console.log(formatted);
  }
}

/**
 * Trace logging interface - only logs if category is enabled.
 */
export const trace = {
  /** Prompt assembly. */
  template(message: string, data?: unknown): void {
    emitTrace('template', 'Template', message, data);
  },

  /** Stop-filter emit/hold/match decisions. */
  filter(message: string, data?: unknown): void {
    emitTrace('filter', 'StopFilter', message, data);
  },

  session(message: string, data?: unknown): void {
    emitTrace('session', 'Session', message, data);
  },

  lock(message: string, data?: unknown): void {
    emitTrace('lock', 'Serializer', message, data);
  },

  engine(message: string, data?: unknown): void {
    emitTrace('engine', 'Engine', message, data);
  },

  perf(message: string, data?: unknown): void {
    emitTrace('perf', 'Perf', message, data);
  },
};
