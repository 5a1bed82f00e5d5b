import type { EngineRequest, GenerationEngine } from '../../src/inference/engine.js';

export interface ScriptedEngineOptions {
  /** Throw from generate() itself, before any fragment */
  failOnStart?: Error;
  /** Throw when this fragment index is pulled */
  failAt?: { index: number; error: Error };
  /** Resolve each pull only after this promise settles */
  gate?: () => Promise<void>;
}

export interface EngineCall {
  prompt: string;
  request: EngineRequest;
}

/**
 * In-process engine that replays a fixed list of fragments and records
 * what the pipeline asked of it.
 */
export class ScriptedEngine implements GenerationEngine {
  readonly calls: EngineCall[] = [];
  /** Fragments handed out, across all calls */
  pulled: string[] = [];
  /** Number of times the pipeline closed a stream early */
  closed = 0;
  private active = 0;
  /** Highest number of streams open at once */
  maxConcurrent = 0;

  constructor(
    private readonly fragments: readonly string[],
    private readonly options: ScriptedEngineOptions = {}
  ) {}

  generate(prompt: string, request: EngineRequest): AsyncIterable<string> {
    if (this.options.failOnStart) throw this.options.failOnStart;
    this.calls.push({ prompt, request });
    return { [Symbol.asyncIterator]: () => this.iterate() };
  }

  private iterate(): AsyncIterator<string> {
    let index = 0;
    let open = true;
    this.active++;
    this.maxConcurrent = Math.max(this.maxConcurrent, this.active);
    const finish = (): void => {
      if (!open) return;
      open = false;
      this.active--;
    };

    return {
      next: async (): Promise<IteratorResult<string>> => {
        if (this.options.gate) await this.options.gate();
        const failAt = this.options.failAt;
        if (failAt && failAt.index === index) {
          finish();
          throw failAt.error;
        }
        const fragment = this.fragments[index];
        if (!open || fragment === undefined) {
          finish();
          return { done: true, value: undefined };
        }
        index++;
        this.pulled.push(fragment);
        return { done: false, value: fragment };
      },
      return: async (): Promise<IteratorResult<string>> => {
        if (open) this.closed++;
        finish();
        return { done: true, value: undefined };
      },
    };
  }
}

export async function collect(stream: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const delta of stream) out.push(delta);
  return out;
}
