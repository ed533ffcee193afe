/**
 * Session Registry
 *
 * @module server/registry
 * @license BSD-3-Clause
 */

import { SessionState } from './types.js';

/**
 * What the registry needs to know about a pooled session
 *
 * @export
 * @interface PoolMember
 * @property id - Registry id
 * @property state - Current lifecycle state
 * @property lastActivity - Epoch milliseconds of the last request
 * @property busy - Whether queued, running or pending requests exist
 */
export interface PoolMember {
  readonly id: string;
  readonly state: SessionState;
  readonly lastActivity: number;
  readonly busy: boolean;
}

/**
 * Table of sessions shared by the manager and its monitors
 *
 * @export
 * @interface PoolTable
 */
export interface PoolTable<T extends PoolMember> {
  get(id: string): T | undefined;
  set(entry: T): void;
  delete(id: string): boolean;
  values(): T[];
  liveCount(): number;
  evictionCandidate(exclude?: string): T | undefined;
}

const LIVE_STATES: ReadonlySet<SessionState> = new Set<SessionState>(['Spawning', 'Initializing', 'Ready', 'ShuttingDown']);

/**
 * In-memory session table
 *
 * @export
 * @class SessionRegistry
 */
export class SessionRegistry<T extends PoolMember> implements PoolTable<T> {
  private readonly entries = new Map<string, T>();

  get size(): number {
    return this.entries.size;
  }

  get(id: string): T | undefined {
    return this.entries.get(id);
  }

  set(entry: T): void {
    this.entries.set(entry.id, entry);
  }

  delete(id: string): boolean {
    return this.entries.delete(id);
  }

  values(): T[] {
    return [...this.entries.values()];
  }

  /**
   * Sessions that own or may own a process
   */
  liveCount(): number {
    let count = 0;
    for (const entry of this.entries.values()) {
      if (LIVE_STATES.has(entry.state)) {
        count++;
      }
    }
    return count;
  }

  /**
   * Least recently active Ready session with nothing pending
   *
   * @param exclude - Id of the session asking for a slot
   */
  evictionCandidate(exclude?: string): T | undefined {
    let candidate: T | undefined;
    for (const entry of this.entries.values()) {
      if (entry.id === exclude || entry.state !== 'Ready' || entry.busy) {
        continue;
      }
      if (!candidate || entry.lastActivity < candidate.lastActivity) {
        candidate = entry;
      }
    }
    return candidate;
  }
}
