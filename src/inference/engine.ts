/**
 * Engine Contract
 *
 * The only view the pipeline has of the text-generation engine. Model
 * loading, tokenization, sampling and the decode loop live behind it.
 *
 * @module inference/engine
 */

/**
 * Values handed to the engine for one generation. Everything except
 * maxTokens is passed through from the pipeline config unmodified.
 */
export interface EngineRequest {
  maxTokens: number;
  temperature: number;
  contextLength: number;
  batchSize: number;
  threads: number;
  gpuLayers: number;
}

/**
 * A local generation engine.
 *
 * `generate` returns a finite, non-restartable lazy sequence of text
 * fragments that ends at the end-of-sequence marker or the token cap. The
 * consumer cancels by no longer pulling; the pipeline then calls `return()`
 * on the iterator. Errors thrown while a fragment is being produced are
 * decode failures.
 *
 * Engines are stateful and not reentrant; a pipeline never runs two
 * generations on one engine at the same time.
 */
export interface GenerationEngine {
  generate(prompt: string, request: EngineRequest): AsyncIterable<string>;
}
