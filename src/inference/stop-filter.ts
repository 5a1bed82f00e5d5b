/**
 * Stop-Sequence Filter
 *
 * Stateful transformer between the engine's raw fragments and the caller.
 * Text that could be the start of a stop sequence is held back until the
 * next fragment proves it either completes a stop sequence (the stream ends
 * before it) or cannot (it is released as ordinary output). Emitted output
 * never contains a complete stop sequence.
 *
 * A filter is single use: one instance per generation.
 *
 * @module inference/stop-filter
 */

import { ERROR_CODES, createCadenceError } from '../errors/cadence-error.js';
import { trace } from '../debug/trace.js';

/** Why a stream finished */
export type StopReason = 'stopSequence' | 'endOfSequence' | 'maxTokens';

export interface StopFilterOptions {
  stopSequences: readonly string[];
  /** Cap on emitted output in code points */
  maxEmitted: number;
}

/**
 * Result of feeding the filter.
 */
export interface FilterStep {
  /** Safe output for this step, possibly empty */
  text: string;
  /** True once the stream is complete; the caller must stop pulling */
  done: boolean;
  stopReason: StopReason | null;
}

/**
 * Code-point length, so the cap never splits a surrogate pair.
 */
export function codePointLength(text: string): number {
  return [...text].length;
}

function sliceCodePoints(text: string, count: number): string {
  let end = 0;
  let seen = 0;
  for (const ch of text) {
    if (seen === count) break;
    end += ch.length;
    seen++;
  }
  return text.slice(0, end);
}

/**
 * Earliest index at which any stop sequence occurs in text, or -1.
 * Which sequence matched does not matter; only the position does.
 */
export function findEarliestStop(text: string, stopSequences: readonly string[]): number {
  let earliest = -1;
  for (const stop of stopSequences) {
    const index = text.indexOf(stop);
    if (index !== -1 && (earliest === -1 || index < earliest)) {
      earliest = index;
    }
  }
  return earliest;
}

/**
 * Length of the longest suffix of text that is a strict prefix of some stop
 * sequence. Bounded by the longest stop sequence length minus one.
 */
export function partialStopSuffixLength(text: string, stopSequences: readonly string[]): number {
  let longest = 0;
  for (const stop of stopSequences) {
    const max = Math.min(stop.length - 1, text.length);
    for (let len = max; len > longest; len--) {
      if (text.endsWith(stop.slice(0, len))) {
        longest = len;
        break;
      }
    }
  }
  return longest;
}

export class StopSequenceFilter {
  private readonly stopSequences: readonly string[];
  private readonly maxEmitted: number;
  private held = '';
  private emitted = 0;
  private _completed = false;
  private _stopReason: StopReason | null = null;

  constructor(options: StopFilterOptions) {
    // An empty stop sequence would match everywhere
    this.stopSequences = [...new Set(options.stopSequences)].filter((s) => s.length > 0);
    this.maxEmitted = options.maxEmitted;
  }

  get emittedLength(): number {
    return this.emitted;
  }

  get heldLength(): number {
    return this.held.length;
  }

  get completed(): boolean {
    return this._completed;
  }

  get stopReason(): StopReason | null {
    return this._stopReason;
  }

  /**
   * Feed one raw fragment from the engine.
   */
  push(fragment: string): FilterStep {
    this.assertOpen();
    const candidate = this.held + fragment;

    const stopAt = findEarliestStop(candidate, this.stopSequences);
    if (stopAt !== -1) {
      this.held = '';
      trace.filter(`stop sequence at ${stopAt}`);
      return this.emit(candidate.slice(0, stopAt), 'stopSequence');
    }

    const holdLength = partialStopSuffixLength(candidate, this.stopSequences);
    const safe = candidate.slice(0, candidate.length - holdLength);
    this.held = candidate.slice(candidate.length - holdLength);
    if (holdLength > 0) {
      trace.filter(`holding ${holdLength} chars`);
    }
    return this.emit(safe, null);
  }

  /**
   * The engine ended on its own (end of sequence or its token cap). Held
   * text was never confirmed as a stop sequence, so it is released.
   */
  finish(): FilterStep {
    this.assertOpen();
    const rest = this.held;
    this.held = '';
    return this.emit(rest, 'endOfSequence');
  }

  /**
   * Drop held text without completing; used when the stream is abandoned
   * or fails.
   */
  abandon(): void {
    this.held = '';
  }

  /**
   * Emit text subject to the cap. A non-null reason marks completion.
   */
  private emit(text: string, reason: StopReason | null): FilterStep {
    const remaining = this.maxEmitted - this.emitted;
    const length = codePointLength(text);

    if (length >= remaining && (length > 0 || remaining <= 0)) {
      const out = sliceCodePoints(text, remaining);
      this.emitted += codePointLength(out);
      // Anything held past the cap is unconfirmed and discarded
      this.held = '';
      const capReason: StopReason = length > remaining || reason === null ? 'maxTokens' : reason;
      return this.complete(out, capReason);
    }

    this.emitted += length;
    if (reason !== null) {
      return this.complete(text, reason);
    }
    return { text, done: false, stopReason: null };
  }

  private complete(text: string, reason: StopReason): FilterStep {
    this._completed = true;
    this._stopReason = reason;
    trace.filter(`complete (${reason}), emitted ${this.emitted}`);
    return { text, done: true, stopReason: reason };
  }

  private assertOpen(): void {
    if (this._completed) {
      throw createCadenceError(
        ERROR_CODES.FILTER_COMPLETED,
        'Stop filter already completed; create a new filter per generation'
      );
    }
  }
}
