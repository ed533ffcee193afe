/**
 * Shared session manager types
 *
 * @module server/types
 * @license BSD-3-Clause
 */

/**
 * Identity of a logical session
 *
 * @property root - Canonical project root directory
 * @property language - Language name matching a configured server
 */
export interface ProjectKey {
  root: string;
  language: string;
}

/**
 * Lifecycle states of a session
 */
export type SessionState =
  | 'Unspawned'
  | 'Spawning'
  | 'Initializing'
  | 'Ready'
  | 'ShuttingDown'
  | 'Terminated'
  | 'Errored';

/**
 * Request priority classes, highest first
 */
export type Priority = 'critical' | 'high' | 'normal' | 'low';

export const PRIORITIES: readonly Priority[] = ['critical', 'high', 'normal', 'low'];

/**
 * Why a session left the Ready state on purpose
 */
export type StopReason = 'idle' | 'evicted' | 'resource' | 'restart' | 'forced' | 'shutdown';

/**
 * State change published on the manager's channel
 */
export interface StateChange {
  id: string;
  key: ProjectKey;
  previous?: SessionState;
  state: SessionState;
  reason?: string;
}

/**
 * Server notification published on the manager's channel
 */
export interface SessionNotification {
  id: string;
  key: ProjectKey;
  method: string;
  params: unknown;
}

/**
 * Counters of a project's sessions, kept across restarts
 *
 * @export
 * @interface SessionMetrics
 * @property requests - Requests that reached the session, cache hits excluded
 * @property failures - Requests among them that were rejected
 * @property cacheHits - Requests answered from the response cache
 * @property averageLatencyMs - Mean time from admission to settlement, session start included
 * @property restarts - Process starts after the first one
 * @property peakMemoryBytes - Largest resident set size sampled
 */
export interface SessionMetrics {
  requests: number;
  failures: number;
  cacheHits: number;
  averageLatencyMs: number;
  restarts: number;
  peakMemoryBytes?: number;
}

/**
 * Point-in-time view of one session
 */
export interface SessionStatus {
  id: string;
  key: ProjectKey;
  state: SessionState;
  pid?: number;
  crashCount: number;
  backoffMs: number;
  pending: number;
  openDocuments: number;
  lastActivity?: string;
  uptimeMs: number;
  lastError?: { code: string; message: string };
  metrics: SessionMetrics;
}

/**
 * Builds the registry id of a project key
 *
 * @param key - Project key
 * @returns Stable identifier `language:root`
 */
export function sessionId(key: ProjectKey): string {
  return `${key.language}:${key.root}`;
}
