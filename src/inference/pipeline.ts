/**
 * Generation Pipeline
 *
 * Façade over one engine instance: builds the prompt, runs the engine under
 * the access serializer, filters its fragments for stop sequences and
 * records completed exchanges in session memory.
 *
 * Both consumption styles share one internal lazy sequence:
 *   - generate(): incremental deltas as an async generator
 *   - complete(): the same sequence drained into a GenerationResult
 *
 * @module inference/pipeline
 */

import {
  ERROR_CODES,
  createCadenceError,
  decodeError,
  genericError,
  isCadenceError,
} from '../errors/cadence-error.js';
import { log } from '../debug/log.js';
import { trace } from '../debug/trace.js';
import { perf } from '../debug/perf.js';
import {
  describePipelineConfig,
  resolvePipelineConfig,
  type PipelineConfig,
  type PipelineConfigOverrides,
} from '../config/pipeline-config.js';
import { buildPrompt, getTemplateDefinition, resolveTemplateFamily } from './templates/chat-format.js';
import type { PromptSpec, TemplateFamily, Turn } from './templates/types.js';
import { SessionStore } from './session-store.js';
import { AccessSerializer } from './access-serializer.js';
import { StopSequenceFilter, type FilterStep, type StopReason } from './stop-filter.js';
import type { EngineRequest, GenerationEngine } from './engine.js';

// ============================================================================
// Types
// ============================================================================

export interface GenerateOptions {
  /** Read history from and record the exchange in session memory (default: false) */
  session?: boolean;
  /** Per-call emission cap; defaults to the config value */
  maxTokens?: number;
  /** Extra stop sequences for this call, on top of the configured ones */
  stopSequences?: readonly string[];
  /** Called with each non-empty delta before it is yielded */
  onDelta?: (delta: string) => void;
}

export interface PromptOptions {
  session?: boolean;
}

export interface GenerationResult {
  text: string;
  stopReason: StopReason;
  /** Emitted length in code points */
  emittedLength: number;
  /** Fragments pulled from the engine */
  fragments: number;
  durationMs: number;
}

interface PreparedRequest {
  spec: PromptSpec & { family: TemplateFamily };
  session: boolean;
  maxTokens: number;
  stopSequences: string[];
  onDelta: ((delta: string) => void) | null;
}

function windowTurns(turns: readonly Turn[], size: number): Turn[] {
  if (size <= 0) return [];
  return turns.slice(-size);
}

// ============================================================================
// Generation Pipeline
// ============================================================================

/**
 * GenerationPipeline - one engine, one session, one generation at a time
 *
 * @example
 * ```typescript
 * const pipeline = new GenerationPipeline(engine, { stopSequences: ['\nUser:'] });
 *
 * for await (const delta of pipeline.generate(
 *   { family: 'llama3', userMessage: 'Hello' },
 *   { session: true }
 * )) {
 *   process.stdout.write(delta);
 * }
 *
 * const { text } = await pipeline.complete({ family: 'chatml', userMessage: 'Hi' });
 * ```
 */
export class GenerationPipeline {
  readonly config: PipelineConfig;
  readonly session: SessionStore;
  private readonly engine: GenerationEngine;
  private readonly serializer: AccessSerializer;
  private disposed = false;
  private generations = 0;

  constructor(engine: GenerationEngine, overrides: PipelineConfigOverrides = {}) {
    this.engine = engine;
    this.config = resolvePipelineConfig(overrides);
    this.session = new SessionStore();
    this.serializer = new AccessSerializer(this.config.busyPolicy);
    log.verbose('Pipeline', 'Created', describePipelineConfig(this.config));
  }

  /** True while a generation runs or waits for the engine */
  get busy(): boolean {
    return this.serializer.busy;
  }

  /**
   * Stream deltas for one request.
   *
   * The template family is checked before this returns, so an unknown family
   * throws here without touching the lock or the engine. Everything else
   * happens lazily on the first pull. Break out of the loop (or call
   * `return()`) to abandon; the lock is released and session memory is left
   * unchanged. A stream that is pulled and then dropped without either keeps
   * holding the lock, and every queued caller waits behind it.
   */
  generate(spec: PromptSpec, options: GenerateOptions = {}): AsyncGenerator<string, void, undefined> {
    const request = this.prepare(spec, options);
    return this.deltas(request);
  }

  /**
   * Run one request to completion and return the whole text.
   */
  async complete(spec: PromptSpec, options: GenerateOptions = {}): Promise<GenerationResult> {
    const run = this.run(this.prepare(spec, options));
    let step = await run.next();
    while (!step.done) {
      step = await run.next();
    }
    return step.value;
  }

  /**
   * Render the prompt a request would use, without running the engine.
   */
  buildPrompt(spec: PromptSpec, options: PromptOptions = {}): string {
    const family = resolveTemplateFamily(spec.family);
    return this.renderPrompt({ ...spec, family }, options.session ?? false);
  }

  /**
   * Refuse new generations. Streams already started run to their end.
   */
  dispose(): void {
    this.disposed = true;
    log.debug('Pipeline', 'Disposed');
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private prepare(spec: PromptSpec, options: GenerateOptions): PreparedRequest {
    if (this.disposed) {
      throw createCadenceError(ERROR_CODES.PIPELINE_DISPOSED, 'Pipeline has been disposed');
    }

    const family = resolveTemplateFamily(spec.family);

    const maxTokens = options.maxTokens ?? this.config.maxTokens;
    if (!Number.isInteger(maxTokens) || maxTokens < 1) {
      throw createCadenceError(
        ERROR_CODES.INVALID_ARGUMENT,
        `maxTokens must be a positive integer, got ${String(maxTokens)}`
      );
    }

    return {
      spec: { ...spec, family },
      session: options.session ?? false,
      maxTokens,
      stopSequences: [
        ...this.config.stopSequences,
        ...(options.stopSequences ?? []),
        getTemplateDefinition(family).stopSequence,
      ],
      onDelta: options.onDelta ?? null,
    };
  }

  private renderPrompt(spec: PromptSpec, useSession: boolean): string {
    const { historySize } = this.config;
    let history: Turn[];
    if (spec.history !== undefined) {
      history = windowTurns(spec.history, historySize);
    } else if (useSession) {
      history = this.session.recentWindow(historySize);
    } else {
      history = [];
    }
    return buildPrompt({ ...spec, history });
  }

  private async *deltas(request: PreparedRequest): AsyncGenerator<string, void, undefined> {
    yield* this.run(request);
  }

  /**
   * The single lazy sequence behind both adapters. Yields non-empty deltas
   * and returns the result on natural completion.
   */
  private async *run(request: PreparedRequest): AsyncGenerator<string, GenerationResult, undefined> {
    const release = await this.serializer.acquire();
    const span = `generation#${++this.generations}`;
    perf.mark(span);
    const filter = new StopSequenceFilter({
      stopSequences: request.stopSequences,
      maxEmitted: request.maxTokens,
    });
    let iterator: AsyncIterator<string> | null = null;
    let completed = false;

    try {
      const prompt = this.preparePrompt(request);
      iterator = this.startEngine(prompt, request.maxTokens);

      const emitted: string[] = [];
      let fragments = 0;
      let step: FilterStep;

      for (;;) {
        const next = await this.pull(iterator);
        if (next.done) {
          iterator = null;
          step = filter.finish();
          break;
        }
        fragments++;
        step = filter.push(next.value);
        if (step.done) break;
        if (step.text) {
          emitted.push(step.text);
          request.onDelta?.(step.text);
          yield step.text;
        }
      }

      // Stop pulling as soon as the filter completes
      if (iterator) {
        const open = iterator;
        iterator = null;
        await this.closeEngine(open);
      }

      if (step.text) emitted.push(step.text);
      const text = emitted.join('');
      const stopReason = step.stopReason ?? 'endOfSequence';

      if (request.session) {
        this.session.append({ user: request.spec.userMessage, assistant: text });
      }
      completed = true;

      const durationMs = perf.measure(span);
      log.debug(
        'Pipeline',
        `Generation complete (${stopReason}): ${filter.emittedLength} chars, ${fragments} fragments, ${durationMs.toFixed(1)}ms`
      );

      if (step.text) {
        request.onDelta?.(step.text);
        yield step.text;
      }

      return {
        text,
        stopReason,
        emittedLength: filter.emittedLength,
        fragments,
        durationMs,
      };
    } finally {
      if (!completed) {
        filter.abandon();
        perf.discard(span);
        log.debug('Pipeline', 'Generation ended before completion; session unchanged');
      }
      if (iterator) {
        await this.closeEngine(iterator);
      }
      release();
    }
  }

  private preparePrompt(request: PreparedRequest): string {
    try {
      return this.renderPrompt(request.spec, request.session);
    } catch (error) {
      if (isCadenceError(error)) throw error;
      throw genericError('Prompt assembly failed', error);
    }
  }

  private startEngine(prompt: string, maxTokens: number): AsyncIterator<string> {
    const engineRequest: EngineRequest = {
      maxTokens,
      temperature: this.config.temperature,
      contextLength: this.config.contextLength,
      batchSize: this.config.batchSize,
      threads: this.config.threads,
      gpuLayers: this.config.gpuLayers,
    };
    trace.engine(`generate: ${prompt.length} chars, maxTokens=${maxTokens}`);
    try {
      return this.engine.generate(prompt, engineRequest)[Symbol.asyncIterator]();
    } catch (error) {
      log.error('Pipeline', 'Engine failed to start', error);
      throw genericError('Engine failed to start generation', error);
    }
  }

  private async pull(iterator: AsyncIterator<string>): Promise<IteratorResult<string>> {
    try {
      return await iterator.next();
    } catch (error) {
      if (isCadenceError(error)) throw error;
      log.error('Pipeline', 'Decode failed', error);
      throw decodeError(error);
    }
  }

  /**
   * Tell the engine no more fragments will be requested.
   */
  private async closeEngine(iterator: AsyncIterator<string>): Promise<void> {
    if (!iterator.return) return;
    trace.engine('closing engine stream');
    try {
      await iterator.return();
    } catch (error) {
      log.warn('Pipeline', 'Engine stream failed to close', error);
    }
  }
}

/**
 * Create a generation pipeline bound to one engine.
 */
export function createGenerationPipeline(
  engine: GenerationEngine,
  overrides?: PipelineConfigOverrides
): GenerationPipeline {
  return new GenerationPipeline(engine, overrides);
}
