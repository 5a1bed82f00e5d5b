/**
 * Debug Config Schema
 *
 * Configuration for the Cadence debug module: log history limits, default
 * log level and trace categories.
 *
 * @module config/schema/debug
 */

// =============================================================================
// Log History Config
// =============================================================================

/**
 * Configuration for log history retention.
 *
 * Controls how many log entries are kept in memory for diagnostics.
 */
export interface LogHistoryConfigSchema {
  /** Maximum number of log entries to retain in memory */
  maxLogHistoryEntries: number;
}

/** Default log history configuration */
export const DEFAULT_LOG_HISTORY_CONFIG: LogHistoryConfigSchema = {
  maxLogHistoryEntries: 1000,
};

// =============================================================================
// Log Level Config
// =============================================================================

export interface LogLevelConfigSchema {
  /** Default log level (debug, verbose, info, warn, error, silent) */
  defaultLogLevel: string;
}

/** Default log level configuration */
export const DEFAULT_LOG_LEVEL_CONFIG: LogLevelConfigSchema = {
  defaultLogLevel: 'info',
};

// =============================================================================
// Trace Config
// =============================================================================

/** Available trace categories */
export type TraceCategory =
  | 'template'
  | 'filter'
  | 'session'
  | 'lock'
  | 'engine'
  | 'perf'
  | 'all';

/**
 * Configuration for trace output.
 */
export interface TraceConfigSchema {
  /** Enable tracing (default: false) */
  enabled: boolean;
  /** Trace categories to enable (default: all) */
  categories: TraceCategory[];
}

/** Default trace configuration */
export const DEFAULT_TRACE_CONFIG: TraceConfigSchema = {
  enabled: false,
  categories: ['all'],
};

// =============================================================================
// Complete Debug Config
// =============================================================================

export interface DebugConfigSchema {
  logHistory: LogHistoryConfigSchema;
  logLevel: LogLevelConfigSchema;
  trace: TraceConfigSchema;
}

/** Default debug configuration */
export const DEFAULT_DEBUG_CONFIG: DebugConfigSchema = {
  logHistory: DEFAULT_LOG_HISTORY_CONFIG,
  logLevel: DEFAULT_LOG_LEVEL_CONFIG,
  trace: DEFAULT_TRACE_CONFIG,
};
