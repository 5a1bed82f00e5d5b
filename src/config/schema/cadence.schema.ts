/**
 * Cadence Config Schema
 *
 * Master runtime configuration composing the generation, platform and debug
 * schemas.
 *
 * @module config/schema/cadence
 */

import type { GenerationDefaultsSchema } from './generation.schema.js';
import type { PlatformSchema } from './platform.schema.js';
import type { DebugConfigSchema } from './debug.schema.js';

import { DEFAULT_GENERATION_DEFAULTS } from './generation.schema.js';
import { DEFAULT_PLATFORM_CONFIG } from './platform.schema.js';
import { DEFAULT_DEBUG_CONFIG } from './debug.schema.js';

// =============================================================================
// Runtime Config
// =============================================================================

/**
 * Runtime configuration schema.
 *
 * Process-wide defaults every pipeline instance starts from.
 */
export interface RuntimeConfigSchema {
  /** Context, sampling pass-through, cap, stops, history window */
  generation: GenerationDefaultsSchema;

  /** CPU count and constrained-environment detection */
  platform: PlatformSchema;

  /** Logging and tracing */
  debug: DebugConfigSchema;
}

/** Default runtime configuration */
export const DEFAULT_RUNTIME_CONFIG: RuntimeConfigSchema = {
  generation: DEFAULT_GENERATION_DEFAULTS,
  platform: DEFAULT_PLATFORM_CONFIG,
  debug: DEFAULT_DEBUG_CONFIG,
};

/** Partial runtime overrides, one level deep per section */
export interface RuntimeConfigOverrides {
  generation?: Partial<GenerationDefaultsSchema>;
  platform?: Partial<PlatformSchema>;
  debug?: {
    logHistory?: Partial<DebugConfigSchema['logHistory']>;
    logLevel?: Partial<DebugConfigSchema['logLevel']>;
    trace?: Partial<DebugConfigSchema['trace']>;
  };
}

/**
 * Create a runtime config from defaults and optional overrides.
 *
 * Always returns fresh objects; defaults are never mutated.
 */
export function createRuntimeConfig(overrides: RuntimeConfigOverrides = {}): RuntimeConfigSchema {
  const debug = overrides.debug ?? {};
  return {
    generation: {
      ...DEFAULT_GENERATION_DEFAULTS,
      ...overrides.generation,
      stopSequences: [
        ...(overrides.generation?.stopSequences ?? DEFAULT_GENERATION_DEFAULTS.stopSequences),
      ],
    },
    platform: { ...DEFAULT_PLATFORM_CONFIG, ...overrides.platform },
    debug: {
      logHistory: { ...DEFAULT_DEBUG_CONFIG.logHistory, ...debug.logHistory },
      logLevel: { ...DEFAULT_DEBUG_CONFIG.logLevel, ...debug.logLevel },
      trace: {
        ...DEFAULT_DEBUG_CONFIG.trace,
        ...debug.trace,
        categories: [...(debug.trace?.categories ?? DEFAULT_DEBUG_CONFIG.trace.categories)],
      },
    },
  };
}
