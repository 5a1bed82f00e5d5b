/**
 * Generation Defaults Config Schema
 *
 * Default values for the generation pipeline: context and sampling values
 * passed through to the engine, the emission cap and stop sequences enforced
 * by the stop filter, and the prompt history window.
 *
 * @module config/schema/generation
 */

import type { TemplateFamily } from '../../inference/templates/types.js';

/** What a pipeline does when a generation arrives while another is running */
export type BusyPolicy = 'queue' | 'reject';

export const BUSY_POLICIES: readonly BusyPolicy[] = ['queue', 'reject'];

/**
 * Default generation configuration.
 *
 * `threads` and `gpuLayers` are resolved against the platform at pipeline
 * construction; null threads means "derive from CPU count".
 */
export interface GenerationDefaultsSchema {
  /** Prompt + generated tokens the engine context can hold (default: 2048) */
  contextLength: number;

  /** Sampling temperature, passed through to the engine (default: 0.8) */
  temperature: number;

  /** Cap on emitted output, enforced by the stop filter (default: 512) */
  maxTokens: number;

  /** Decode batch size, passed through to the engine (default: 512) */
  batchSize: number;

  /** Literal strings that end generation */
  stopSequences: string[];

  /** Number of recent turns included in prompts (default: 5) */
  historySize: number;

  /** Default template family (null = must be given per request) */
  family: TemplateFamily | null;

  /** Behaviour for concurrent callers (default: 'queue') */
  busyPolicy: BusyPolicy;

  /** Worker threads for the engine (null = derive from CPU count) */
  threads: number | null;

  /** Layers offloaded to the GPU; forced to 0 on constrained platforms */
  gpuLayers: number;
}

/** Default generation configuration */
export const DEFAULT_GENERATION_DEFAULTS: GenerationDefaultsSchema = {
  contextLength: 2048,
  temperature: 0.8,
  maxTokens: 512,
  batchSize: 512,
  stopSequences: [],
  historySize: 5,
  family: null,
  busyPolicy: 'queue',
  threads: null,
  gpuLayers: 99,
};

/** Upper bound on derived thread counts */
export const MAX_DERIVED_THREADS = 8;

/** CPUs left free for the host process when deriving threads */
export const RESERVED_CPUS = 2;
