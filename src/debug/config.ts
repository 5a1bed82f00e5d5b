/**
 * Cadence Debug Module - Configuration and State Management
 *
 * Manages log levels, trace categories, and module filters.
 *
 * @module debug/config
 */

import type { DebugConfigSchema } from '../config/schema/debug.schema.js';

// ============================================================================
// Types and Constants
// ============================================================================

/**
 * Log level values (higher = less verbose)
 */
export const LOG_LEVELS = {
  DEBUG: 0,
  VERBOSE: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
  SILENT: 5,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;
export type LogLevelValue = (typeof LOG_LEVELS)[LogLevel];

/**
 * Trace categories
 */
export const TRACE_CATEGORIES = [
  'template', // Prompt assembly
  'filter',   // Stop-sequence filter decisions
  'session',  // Session memory writes
  'lock',     // Access serializer
  'engine',   // Engine calls and fragment pulls
  'perf',     // Timing
] as const;

export type TraceCategory = (typeof TRACE_CATEGORIES)[number];

/**
 * Log entry for history
 */
export interface LogEntry {
  time: number;
  perfTime: number;
  level: string;
  module: string;
  message: string;
  data?: unknown;
}

// ============================================================================
// Global State
// ============================================================================

export let currentLogLevel: LogLevelValue = LOG_LEVELS.INFO;
export let enabledModules = new Set<string>();
export let disabledModules = new Set<string>();
export let logHistory: LogEntry[] = [];
export let enabledTraceCategories = new Set<TraceCategory>();

const LEVEL_BY_NAME: Record<string, LogLevelValue> = {
  debug: LOG_LEVELS.DEBUG,
  verbose: LOG_LEVELS.VERBOSE,
  info: LOG_LEVELS.INFO,
  warn: LOG_LEVELS.WARN,
  error: LOG_LEVELS.ERROR,
  silent: LOG_LEVELS.SILENT,
};

function isTraceCategory(value: string): value is TraceCategory {
  return TRACE_CATEGORIES.some((category) => category === value);
}

// ============================================================================
// Configuration Functions
// ============================================================================

/**
 * Set the global log level. Unknown names fall back to info.
 */
export function setLogLevel(level: string): void {
  currentLogLevel = LEVEL_BY_NAME[level.toLowerCase()] ?? LOG_LEVELS.INFO;
}

/**
 * Get current log level name.
 */
export function getLogLevel(): string {
  for (const [name, value] of Object.entries(LOG_LEVELS)) {
    if (value === currentLogLevel) return name.toLowerCase();
  }
  return 'info';
}

/**
 * Set trace categories.
 *
 * @param categories - Comma-separated categories, 'all', false to disable, or array
 *   Examples:
 *   - 'filter,lock' - enable filter and lock
 *   - 'all' - enable all categories
 *   - 'all,-perf' - all except perf
 *   - false - disable all tracing
 */
export function setTrace(categories: string | readonly string[] | false): void {
  enabledTraceCategories.clear();
  if (categories === false) return;

  const catArray = typeof categories === 'string'
    ? categories.split(',').map((s) => s.trim())
    : categories;

  if (catArray.includes('all')) {
    for (const cat of TRACE_CATEGORIES) {
      enabledTraceCategories.add(cat);
    }
  }

  for (const cat of catArray) {
    if (cat === 'all') continue;

    if (cat.startsWith('-')) {
      const exclude = cat.slice(1);
      if (isTraceCategory(exclude)) enabledTraceCategories.delete(exclude);
    } else if (isTraceCategory(cat)) {
      enabledTraceCategories.add(cat);
    }
  }
}

/**
 * Get enabled trace categories.
 */
export function getTrace(): TraceCategory[] {
  return [...enabledTraceCategories];
}

/**
 * Check if a trace category is enabled.
 */
export function isTraceEnabled(category: TraceCategory): boolean {
  return enabledTraceCategories.has(category);
}

/**
 * Apply debug config defaults.
 */
export function applyDebugConfig(config: DebugConfigSchema): void {
  setLogLevel(config.logLevel.defaultLogLevel);

  if (config.trace.enabled) {
    const categories = config.trace.categories.length
      ? config.trace.categories.join(',')
      : 'all';
    setTrace(categories);
  } else {
    setTrace(false);
  }
}

/**
 * Enable logging for specific modules only.
 */
export function enableModules(...modules: string[]): void {
  enabledModules = new Set(modules.map((m) => m.toLowerCase()));
}

/**
 * Disable logging for specific modules.
 */
export function disableModules(...modules: string[]): void {
  for (const m of modules) {
    disabledModules.add(m.toLowerCase());
  }
}

/**
 * Reset module filters.
 */
export function resetModuleFilters(): void {
  enabledModules.clear();
  disabledModules.clear();
}

// ============================================================================
// Environment Auto-Detection
// ============================================================================

/**
 * Initialize logging and tracing from environment variables.
 *
 * Supported variables:
 *   CADENCE_LOG_LEVEL=verbose     - Set log level
 *   CADENCE_TRACE=filter,lock     - Enable specific trace categories
 *   CADENCE_TRACE=all,-perf       - All categories except perf
 */
export function initFromEnv(env: NodeJS.ProcessEnv = process.env): void {
  const logLevel = env['CADENCE_LOG_LEVEL'];
  if (logLevel) {
    setLogLevel(logLevel);
  }

  const traceParam = env['CADENCE_TRACE'];
  if (traceParam) {
    setTrace(traceParam);
  }
}
