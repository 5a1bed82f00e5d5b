/**
 * Pipeline Config Resolution
 *
 * Resolves the immutable config of one pipeline instance from the runtime
 * defaults, caller overrides and the host platform, and records where each
 * value came from. This enables tracing where any config value came from
 * during debugging.
 *
 * Derived values:
 *   - threads: max(1, min(8, cpuCount - 2)) unless set explicitly
 *   - gpuLayers: forced to 0 on constrained platforms
 *
 * @module config/pipeline-config
 */

import { availableParallelism } from 'os';

import {
  BUSY_POLICIES,
  CONSTRAINED_ENV_VAR,
  MAX_DERIVED_THREADS,
  RESERVED_CPUS,
  type BusyPolicy,
  type GenerationDefaultsSchema,
  type PlatformSchema,
  type RuntimeConfigSchema,
} from './schema/index.js';
import { getRuntimeConfig } from './runtime.js';
import { configurationError } from '../errors/cadence-error.js';
import { resolveTemplateFamily } from '../inference/templates/chat-format.js';
import type { TemplateFamily } from '../inference/templates/types.js';
import { log } from '../debug/log.js';

// =============================================================================
// Types
// =============================================================================

/** Where a resolved value came from */
export type ConfigSource = 'default' | 'override' | 'derived';

export type PipelineConfigField = keyof GenerationDefaultsSchema | 'constrained';

/**
 * Caller overrides for one pipeline. `family` accepts any casing of a
 * family name ('chatML').
 */
export interface PipelineConfigOverrides extends Partial<Omit<GenerationDefaultsSchema, 'family'>> {
  family?: string | null;
  platform?: Partial<PlatformSchema>;
}

/**
 * Fully resolved, frozen pipeline configuration.
 */
export interface PipelineConfig {
  readonly contextLength: number;
  readonly temperature: number;
  readonly maxTokens: number;
  readonly batchSize: number;
  readonly stopSequences: readonly string[];
  readonly historySize: number;
  readonly family: TemplateFamily | null;
  readonly busyPolicy: BusyPolicy;
  readonly threads: number;
  readonly gpuLayers: number;
  readonly constrained: boolean;
  readonly sources: ReadonlyMap<PipelineConfigField, ConfigSource>;
}

// =============================================================================
// Platform Detection
// =============================================================================

/**
 * True when the environment marks the host as GPU-less.
 */
export function detectConstrainedEnvironment(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env[CONSTRAINED_ENV_VAR]?.trim().toLowerCase();
  return value === '1' || value === 'true';
}

export function deriveThreadCount(cpuCount: number): number {
  return Math.max(1, Math.min(MAX_DERIVED_THREADS, cpuCount - RESERVED_CPUS));
}

// =============================================================================
// Validation
// =============================================================================

function requireInteger(field: string, value: number, min: number): number {
  if (!Number.isInteger(value) || value < min) {
    throw configurationError(
      `${field} must be an integer >= ${min}, got ${String(value)}`,
      { field, value }
    );
  }
  return value;
}

function requireTemperature(value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw configurationError(`temperature must be a finite number >= 0, got ${String(value)}`, {
      field: 'temperature',
      value,
    });
  }
  return value;
}

function requireBusyPolicy(value: string): BusyPolicy {
  const policy = BUSY_POLICIES.find((p) => p === value);
  if (!policy) {
    throw configurationError(`busyPolicy must be one of ${BUSY_POLICIES.join(', ')}, got ${value}`, {
      field: 'busyPolicy',
      value,
    });
  }
  return policy;
}

function requireStopSequences(value: readonly unknown[]): string[] {
  const stops: string[] = [];
  for (const stop of value) {
    if (typeof stop !== 'string') {
      throw configurationError('stopSequences must contain only strings', { field: 'stopSequences' });
    }
    stops.push(stop);
  }
  return stops;
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Overlay an override on a default, tracking source.
 */
function overlay<T>(
  field: PipelineConfigField,
  defaultValue: T,
  overrideValue: T | undefined,
  sources: Map<PipelineConfigField, ConfigSource>
): T {
  if (overrideValue !== undefined) {
    sources.set(field, 'override');
    return overrideValue;
  }
  sources.set(field, 'default');
  return defaultValue;
}

/**
 * Resolve, validate and freeze a pipeline config.
 *
 * @throws CadenceError CONFIG_INVALID for out-of-range values,
 *   CONFIG_TEMPLATE_UNKNOWN for an unknown family
 */
export function resolvePipelineConfig(
  overrides: PipelineConfigOverrides = {},
  runtime: RuntimeConfigSchema = getRuntimeConfig()
): PipelineConfig {
  const defaults = runtime.generation;
  const platform: PlatformSchema = { ...runtime.platform, ...overrides.platform };
  const sources = new Map<PipelineConfigField, ConfigSource>();

  const contextLength = requireInteger(
    'contextLength',
    overlay('contextLength', defaults.contextLength, overrides.contextLength, sources),
    1
  );
  const temperature = requireTemperature(
    overlay('temperature', defaults.temperature, overrides.temperature, sources)
  );
  const maxTokens = requireInteger(
    'maxTokens',
    overlay('maxTokens', defaults.maxTokens, overrides.maxTokens, sources),
    1
  );
  const batchSize = requireInteger(
    'batchSize',
    overlay('batchSize', defaults.batchSize, overrides.batchSize, sources),
    1
  );
  const historySize = requireInteger(
    'historySize',
    overlay('historySize', defaults.historySize, overrides.historySize, sources),
    0
  );
  const stopSequences = requireStopSequences(
    overlay('stopSequences', defaults.stopSequences, overrides.stopSequences, sources)
  );
  const busyPolicy = requireBusyPolicy(
    overlay('busyPolicy', defaults.busyPolicy, overrides.busyPolicy, sources)
  );

  const familyName = overlay<string | null>('family', defaults.family, overrides.family, sources);
  const family = familyName === null ? null : resolveTemplateFamily(familyName);

  const explicitThreads = overlay('threads', defaults.threads, overrides.threads, sources);
  let threads: number;
  if (explicitThreads === null) {
    threads = deriveThreadCount(platform.cpuCount ?? availableParallelism());
    sources.set('threads', 'derived');
  } else {
    threads = requireInteger('threads', explicitThreads, 1);
  }

  const constrained = platform.constrained ?? detectConstrainedEnvironment();
  let constrainedSource: ConfigSource = 'derived';
  if (overrides.platform?.constrained != null) {
    constrainedSource = 'override';
  } else if (runtime.platform.constrained !== null) {
    constrainedSource = 'default';
  }
  sources.set('constrained', constrainedSource);

  let gpuLayers = requireInteger(
    'gpuLayers',
    overlay('gpuLayers', defaults.gpuLayers, overrides.gpuLayers, sources),
    0
  );
  if (constrained && gpuLayers !== 0) {
    log.verbose('Config', `Constrained environment: gpuLayers ${gpuLayers} -> 0`);
    gpuLayers = 0;
    sources.set('gpuLayers', 'derived');
  }

  return Object.freeze({
    contextLength,
    temperature,
    maxTokens,
    batchSize,
    stopSequences: Object.freeze(stopSequences),
    historySize,
    family,
    busyPolicy,
    threads,
    gpuLayers,
    constrained,
    sources,
  });
}

/**
 * Dump a resolved config with sources, for logs and bug reports.
 */
export function describePipelineConfig(config: PipelineConfig): Record<string, string> {
  const summary: Record<string, string> = {};
  for (const [field, source] of config.sources) {
    summary[field] = `${JSON.stringify(config[field])} (${source})`;
  }
  return summary;
}
