/**
 * Session Store
 *
 * Append-only, in-memory log of conversation turns owned by one pipeline.
 * Storage is unbounded; only the view handed to the template engine is
 * windowed. Nothing is persisted.
 *
 * @module inference/session-store
 */

import { trace } from '../debug/trace.js';
import type { Turn } from './templates/types.js';

export class SessionStore {
  private readonly log: Turn[] = [];

  get size(): number {
    return this.log.length;
  }

  /** Snapshot of every turn, oldest first */
  get turns(): readonly Turn[] {
    return [...this.log];
  }

  append(turn: Turn): void {
    this.log.push(Object.freeze({ user: turn.user, assistant: turn.assistant }));
    trace.session(`appended turn ${this.log.length}`);
  }

  /**
   * The last n turns in chronological order (fewer if the log is shorter).
   */
  recentWindow(n: number): Turn[] {
    if (n <= 0) return [];
    return this.log.slice(-n);
  }
}
