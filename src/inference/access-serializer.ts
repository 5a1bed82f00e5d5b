/**
 * Access Serializer
 *
 * At most one holder at a time, waiters served first in, first out. Built
 * as a promise chain: each acquirer waits on the previous holder's release.
 *
 * @module inference/access-serializer
 */

import { ERROR_CODES, createCadenceError } from '../errors/cadence-error.js';
import { trace } from '../debug/trace.js';
import type { BusyPolicy } from '../config/schema/index.js';

/** Releases the lock. Calling it more than once is a no-op. */
export type Release = () => void;

export class AccessSerializer {
  private readonly policy: BusyPolicy;
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;
  private waiting = 0;

  constructor(policy: BusyPolicy = 'queue') {
    this.policy = policy;
  }

  /** True while a holder or a waiter exists */
  get busy(): boolean {
    return this.holders + this.waiting > 0;
  }

  /** Callers queued behind the current holder */
  get pending(): number {
    return this.waiting;
  }

  /**
   * Wait for exclusive access.
   *
   * Under the 'reject' policy this fails immediately with GENERATION_BUSY
   * instead of queueing.
   */
  async acquire(): Promise<Release> {
    if (this.policy === 'reject' && this.busy) {
      throw createCadenceError(ERROR_CODES.GENERATION_BUSY, 'Generation already in progress');
    }

    const previous = this.tail;
    let resolveCurrent: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      resolveCurrent = resolve;
    });
    this.tail = previous.then(() => current);

    this.waiting++;
    trace.lock(`waiting (${this.waiting} queued)`);
    await previous;
    this.waiting--;
    this.holders++;
    trace.lock('acquired');

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.holders--;
      trace.lock('released');
      resolveCurrent();
    };
  }

  /**
   * Run fn while holding the lock.
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
