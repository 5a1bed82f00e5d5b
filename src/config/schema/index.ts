/**
 * Schema Index
 *
 * Re-exports all schema definitions.
 *
 * Naming Convention:
 * - *Schema: Type definitions (interface structure)
 * - DEFAULT_*: Default instances
 *
 * @module config/schema
 */

// =============================================================================
// Generation Schema
// =============================================================================
export {
  type BusyPolicy,
  type GenerationDefaultsSchema,
  BUSY_POLICIES,
  DEFAULT_GENERATION_DEFAULTS,
  MAX_DERIVED_THREADS,
  RESERVED_CPUS,
} from './generation.schema.js';

// =============================================================================
// Platform Schema
// =============================================================================
export {
  type PlatformSchema,
  DEFAULT_PLATFORM_CONFIG,
  CONSTRAINED_ENV_VAR,
} from './platform.schema.js';

// =============================================================================
// Debug Schema
// =============================================================================
export {
  type LogHistoryConfigSchema,
  type LogLevelConfigSchema,
  type TraceCategory,
  type TraceConfigSchema,
  type DebugConfigSchema,
  DEFAULT_LOG_HISTORY_CONFIG,
  DEFAULT_LOG_LEVEL_CONFIG,
  DEFAULT_TRACE_CONFIG,
  DEFAULT_DEBUG_CONFIG,
} from './debug.schema.js';

// =============================================================================
// Master Schema
// =============================================================================
export {
  type RuntimeConfigSchema,
  type RuntimeConfigOverrides,
  DEFAULT_RUNTIME_CONFIG,
  createRuntimeConfig,
} from './cadence.schema.js';
