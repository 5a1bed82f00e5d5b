/**
 * Cadence Debug Module - Unified Logging and Tracing
 *
 * ## Log Levels (verbosity - how much to show)
 *   silent  - nothing
 *   error   - errors only
 *   warn    - errors + warnings
 *   info    - normal operation (default)
 *   verbose - detailed info
 *   debug   - everything
 *
 * ## Trace Categories (what to show when tracing)
 *   template - prompt assembly
 *   filter   - stop-sequence filter decisions
 *   session  - session memory writes
 *   lock     - access serializer queueing
 *   engine   - engine calls and fragment pulls
 *   perf     - timing info
 *   all      - everything
 *
 * ## Usage
 *   import { log, trace, setLogLevel, setTrace } from '../debug/index.js';
 *
 *   log.info('Pipeline', 'Generation complete');
 *   trace.filter('held 4 chars');
 *
 *   setLogLevel('verbose');
 *   setTrace('filter,lock');
 *   setTrace('all,-perf');
 *
 * ## Environment
 *   CADENCE_LOG_LEVEL=debug
 *   CADENCE_TRACE=all
 *
 * @module debug
 */

export {
  LOG_LEVELS,
  TRACE_CATEGORIES,
  type LogLevel,
  type LogLevelValue,
  type TraceCategory,
  type LogEntry,
  setLogLevel,
  getLogLevel,
  setTrace,
  getTrace,
  isTraceEnabled,
  applyDebugConfig,
  enableModules,
  disableModules,
  resetModuleFilters,
  initFromEnv,
} from './config.js';

export { log } from './log.js';
export { trace } from './trace.js';
export { perf } from './perf.js';

export {
  getLogHistory,
  clearLogHistory,
  type LogHistoryFilter,
} from './history.js';
