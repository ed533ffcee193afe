/**
 * Response Cache
 *
 * @module server/cache
 * @license BSD-3-Clause
 */

/**
 * Cached response with the file fingerprints it was computed from
 *
 * @interface CacheEntry
 */
interface CacheEntry {
  project: string;
  method: string;
  value: unknown;
  fingerprints: Record<string, string>;
  expiresAt: number;
}

/**
 * Response to store
 *
 * @export
 * @interface CacheRecord
 * @property key - Key built with `cacheKey`
 * @property project - Session id owning the response
 * @property method - LSP method name
 * @property value - Response payload
 * @property fingerprints - Fingerprint of each file the response depends on, empty for workspace-wide responses
 * @property ttlMs - Time to live
 */
export interface CacheRecord {
  key: string;
  project: string;
  method: string;
  value: unknown;
  fingerprints: Record<string, string>;
  ttlMs: number;
}

/**
 * Cache counters
 */
export interface CacheStats {
  capacity: number;
  evictions: number;
  hits: number;
  misses: number;
  size: number;
}

/**
 * Serializes a value with object keys sorted at every level
 *
 * @param value - JSON compatible value
 */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => item === undefined ? 'null' : stableStringify(item)).join(',')}]`;
  }
  if (typeof value === 'object' && value !== null) {
    const fields = Object.entries(value)
      .filter(([, item]) => item !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([name, item]) => `${JSON.stringify(name)}:${stableStringify(item)}`);
    return `{${fields.join(',')}}`;
  }
  if (value === undefined || typeof value === 'function' || typeof value === 'symbol') {
    return 'null';
  }
  return JSON.stringify(value);
}

/**
 * Builds the cache key of a request
 *
 * @param project - Session id
 * @param method - LSP method name
 * @param params - Request parameters
 */
export function cacheKey(project: string, method: string, params: unknown): string {
  return `${project}\n${method}\n${stableStringify(params)}`;
}

/**
 * Fingerprint-checked response cache with TTL and LRU bounds
 *
 * Every reported write bumps an epoch. A response computed from a snapshot
 * taken before a write to one of its files is never stored.
 *
 * @export
 * @class ResponseCache
 */
export class ResponseCache {
  private readonly capacity: number;
  private readonly entries = new Map<string, CacheEntry>();
  private readonly fileEpochs = new Map<string, number>();
  private readonly now: () => number;
  private readonly projectEpochs = new Map<string, number>();
  private readonly ttlMs: Record<string, number>;
  private readonly workspaceEpochs = new Map<string, number>();
  private counters = { evictions: 0, hits: 0, misses: 0 };
  private epoch = 0;

  /**
   * @param options - Capacity, per-method TTLs and an optional clock
   */
  constructor(options: { capacity: number; ttlMs: Record<string, number>; now?: () => number }) {
    this.capacity = options.capacity;
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  /**
   * Time to live configured for a method
   *
   * @param method - LSP method name
   * @returns TTL in milliseconds, undefined for methods that are not cached
   */
  ttlFor(method: string): number | undefined {
    const ttl = this.ttlMs[method];
    return ttl !== undefined && ttl > 0 ? ttl : undefined;
  }

  /**
   * Current write epoch, taken before the content a request uses is read
   */
  snapshot(): number {
    return this.epoch;
  }

  /**
   * Returns a cached response when still valid
   *
   * @param key - Cache key
   * @param fingerprints - Current fingerprints of the files the request depends on
   */
  lookup(key: string, fingerprints: Record<string, string>): { value: unknown } | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.counters.misses++;
      return undefined;
    }
    const stale = this.now() >= entry.expiresAt
      || Object.entries(entry.fingerprints).some(([file, digest]) => fingerprints[file] !== digest);
    if (stale) {
      this.entries.delete(key);
      this.counters.misses++;
      return undefined;
    }
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.counters.hits++;
    return { value: entry.value };
  }

  /**
   * Stores a response unless a write was reported since the snapshot
   *
   * @param record - Response and its dependencies
   * @param since - Epoch returned by `snapshot` before the content was read
   * @returns Whether the response was stored
   */
  store(record: CacheRecord, since: number): boolean {
    if (record.ttlMs <= 0 || this.capacity <= 0) {
      return false;
    }
    const files = Object.keys(record.fingerprints);
    const invalidated = (this.projectEpochs.get(record.project) ?? 0) > since
      || files.some((file) => (this.fileEpochs.get(file) ?? 0) > since)
      || (files.length === 0 && (this.workspaceEpochs.get(record.project) ?? 0) > since);
    if (invalidated) {
      return false;
    }
    this.entries.delete(record.key);
    this.entries.set(record.key, {
      project: record.project,
      method: record.method,
      value: record.value,
      fingerprints: { ...record.fingerprints },
      expiresAt: this.now() + record.ttlMs
    });
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
      this.counters.evictions++;
    }
    return true;
  }

  /**
   * Drops every response depending on a file
   *
   * @param file - Absolute file path
   * @returns Number of removed entries
   */
  invalidate(file: string): number {
    this.fileEpochs.set(file, ++this.epoch);
    return this.removeWhere((entry) => file in entry.fingerprints);
  }

  /**
   * Drops workspace-wide responses of a session, such as symbol searches
   *
   * @param project - Session id
   * @returns Number of removed entries
   */
  invalidateWorkspace(project: string): number {
    this.workspaceEpochs.set(project, ++this.epoch);
    return this.removeWhere((entry) => entry.project === project && Object.keys(entry.fingerprints).length === 0);
  }

  /**
   * Drops every response of a session
   *
   * @param project - Session id
   * @returns Number of removed entries
   */
  invalidateProject(project: string): number {
    this.projectEpochs.set(project, ++this.epoch);
    return this.removeWhere((entry) => entry.project === project);
  }

  /**
   * Removes expired entries
   *
   * @returns Number of removed entries
   */
  prune(): number {
    const now = this.now();
    return this.removeWhere((entry) => now >= entry.expiresAt);
  }

  stats(): CacheStats {
    return { capacity: this.capacity, size: this.entries.size, ...this.counters };
  }

  private removeWhere(predicate: (entry: CacheEntry) => boolean): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (predicate(entry)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }
}
