/**
 * Session Pool and Lifecycle Manager
 *
 * @module server/manager
 * @license BSD-3-Clause
 */

import { resolve as resolvePath } from 'node:path';
import pLimit from 'p-limit';
import { Emitter, Event } from 'vscode-jsonrpc/node.js';
import {
  Diagnostic,
  LogMessageNotification,
  LogMessageParams,
  PublishDiagnosticsNotification,
  PublishDiagnosticsParams,
  ServerCapabilities
} from 'vscode-languageserver-protocol';
import { CacheStats, ResponseCache, cacheKey } from './cache.js';
import { Config, ServerConfig, Settings } from './config.js';
import { PriorityDispatcher } from './dispatcher.js';
import { DocumentSynchronizer } from './documents.js';
import { LspError, isLspError } from './errors.js';
import { DiskFileProvider, FileProvider, fingerprint, toUri } from './files.js';
import { Logger } from './logger.js';
import { MemorySampler, ProcessMemorySampler } from './monitor.js';
import { ExecutableLocator, ProcessLauncher, ProcessSupervisor } from './process.js';
import { PoolMember, PoolTable, SessionRegistry } from './registry.js';
import { ProtocolSession, ServerNotification } from './session.js';
import {
  Priority,
  ProjectKey,
  SessionMetrics,
  SessionNotification,
  SessionState,
  SessionStatus,
  StateChange,
  StopReason,
  sessionId
} from './types.js';

const TRANSITIONS: Readonly<Record<SessionState, readonly SessionState[]>> = {
  Unspawned: ['Spawning', 'ShuttingDown'],
  Spawning: ['Initializing', 'Errored', 'ShuttingDown'],
  Initializing: ['Ready', 'Errored', 'ShuttingDown'],
  Ready: ['ShuttingDown', 'Errored'],
  Errored: ['Spawning', 'ShuttingDown'],
  ShuttingDown: ['Terminated'],
  Terminated: []
};

const RESOURCE_SAMPLING_CONCURRENCY = 4;

/**
 * Diagnostics last published for a document
 */
interface PublishedDiagnostics {
  diagnostics: Diagnostic[];
  receivedAt: number;
  version?: number;
}

/**
 * Raw counters behind the reported metrics
 */
interface SessionCounters {
  cacheHits: number;
  failures: number;
  latencyMs: number;
  peakMemoryBytes?: number;
  requests: number;
  starts: number;
}

/**
 * Manager construction options
 *
 * @export
 * @interface ManagerOptions
 * @property config - Validated configuration
 * @property logger - Logger instance
 * @property cache - Response cache, built from settings when omitted
 * @property clientInfo - Name and version sent with `initialize`
 * @property files - File content provider, reads from disk by default
 * @property launcher - Process launcher, spawns real processes by default
 * @property locate - Executable lookup, searches PATH by default
 * @property now - Clock, defaults to `Date.now`
 * @property registry - Session table, a fresh in-memory table by default
 * @property sampler - Process memory sampler
 */
export interface ManagerOptions {
  config: Config;
  logger: Logger;
  cache?: ResponseCache;
  clientInfo?: { name: string; version?: string };
  files?: FileProvider;
  launcher?: ProcessLauncher;
  locate?: ExecutableLocator;
  now?: () => number;
  registry?: PoolTable<SessionEntry>;
  sampler?: MemorySampler;
}

/**
 * Per-request options
 *
 * @export
 * @interface SubmitOptions
 * @property file - File the request is about, synchronized before the call
 * @property priority - Dispatch priority, `normal` by default
 * @property signal - Abort signal
 * @property timeoutMs - Deadline covering session start, queueing and round trip
 */
export interface SubmitOptions {
  file?: string;
  priority?: Priority;
  signal?: AbortSignal;
  timeoutMs?: number;
}

/**
 * Pool entry of one logical session
 *
 * @export
 * @class SessionEntry
 */
export class SessionEntry implements PoolMember {
  readonly diagnostics = new Map<string, PublishedDiagnostics>();
  readonly diagnosticWaiters = new Map<string, Set<() => void>>();
  readonly dispatcher: PriorityDispatcher;
  readonly id: string;
  backoffMs = 0;
  crashCount = 0;
  documents?: DocumentSynchronizer;
  erroredAt?: number;
  lastActivity: number;
  lastError?: LspError;
  protocol?: ProtocolSession;
  startedAt?: number;
  starting?: Promise<void>;
  state: SessionState = 'Unspawned';
  stopping?: Promise<void>;
  supervisor?: ProcessSupervisor;

  constructor(readonly key: ProjectKey, readonly server: ServerConfig, maxConcurrent: number, now: () => number) {
    this.id = sessionId(key);
    this.dispatcher = new PriorityDispatcher(maxConcurrent, now);
    this.lastActivity = now();
  }

  get busy(): boolean {
    return this.dispatcher.size > 0 || (this.protocol?.pendingCount ?? 0) > 0;
  }
}

function isPublishDiagnosticsParams(value: unknown): value is PublishDiagnosticsParams {
  return typeof value === 'object' && value !== null
    && 'uri' in value && typeof value.uri === 'string'
    && 'diagnostics' in value && Array.isArray(value.diagnostics);
}

function isLogMessageParams(value: unknown): value is LogMessageParams {
  return typeof value === 'object' && value !== null
    && 'message' in value && typeof value.message === 'string'
    && 'type' in value && typeof value.type === 'number';
}

/**
 * Session Pool and Lifecycle Manager
 *
 * Owns one state machine per project key. Spawns, initializes, feeds,
 * monitors, restarts and retires language server processes, and routes every
 * request through the response cache and the session's priority dispatcher.
 *
 * @export
 * @class SessionManager
 */
export class SessionManager {
  private readonly cache: ResponseCache;
  private readonly capacityWaiters = new Set<() => void>();
  private readonly clientInfo?: { name: string; version?: string };
  private readonly config: Config;
  private readonly counters = new Map<string, SessionCounters>();
  private readonly delays = new Set<() => void>();
  private readonly files: FileProvider;
  private readonly launcher?: ProcessLauncher;
  private readonly locate?: ExecutableLocator;
  private readonly logger: Logger;
  private readonly notificationEmitter = new Emitter<SessionNotification>();
  private readonly now: () => number;
  private readonly registry: PoolTable<SessionEntry>;
  private readonly sampler: MemorySampler;
  private readonly settings: Settings;
  private readonly stateEmitter = new Emitter<StateChange>();
  private readonly timers: NodeJS.Timeout[] = [];
  private stopped = false;

  /**
   * Creates a manager and starts its idle and resource monitors
   *
   * @param options - Configuration, logger and test seams
   */
  constructor(options: ManagerOptions) {
    this.config = options.config;
    this.settings = options.config.getSettings();
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
    this.cache = options.cache ?? new ResponseCache({ ...this.settings.cache, now: this.now });
    this.clientInfo = options.clientInfo;
    this.files = options.files ?? new DiskFileProvider();
    this.launcher = options.launcher;
    this.locate = options.locate;
    this.registry = options.registry ?? new SessionRegistry<SessionEntry>();
    this.sampler = options.sampler ?? new ProcessMemorySampler();
    if (this.settings.idleMonitor) {
      this.schedule(this.settings.idleCheckIntervalMs, () => this.checkIdle(), 'idle');
    }
    if (this.settings.resourceMonitor) {
      this.schedule(this.settings.resourceCheckIntervalMs, () => this.checkResources(), 'resource');
    }
  }

  /**
   * Fires on every session state transition
   */
  get onStateChange(): Event<StateChange> {
    return this.stateEmitter.event;
  }

  /**
   * Fires for every notification a language server sends
   */
  get onNotification(): Event<SessionNotification> {
    return this.notificationEmitter.event;
  }

  /**
   * Sends a request to the session of a project
   *
   * File-scoped requests read the file first. A cached response whose file
   * fingerprints still match is returned without a round trip; otherwise the
   * session is started when needed, the file is synchronized and the request
   * is dispatched by priority.
   *
   * @param key - Project key
   * @param method - LSP method name
   * @param params - Request parameters
   * @param options - File, priority, timeout and abort signal
   * @returns Response payload
   * @throws {LspError} With the code describing the failure
   */
  async submit(key: ProjectKey, method: string, params: unknown, options: SubmitOptions = {}): Promise<unknown> {
    this.assertRunning();
    this.serverConfig(key.language);
    const timeoutMs = options.timeoutMs ?? this.settings.requestTimeoutMs;
    const deadline = this.now() + timeoutMs;
    const id = sessionId(key);
    const since = this.cache.snapshot();
    const file = options.file ? resolvePath(options.file) : undefined;
    let content: string | undefined;
    const fingerprints: Record<string, string> = {};
    if (file) {
      content = await this.files.read(file);
      fingerprints[file] = fingerprint(content);
    }
    const ttlMs = this.cache.ttlFor(method);
    const responseKey = ttlMs !== undefined ? cacheKey(id, method, params) : undefined;
    if (responseKey) {
      const hit = this.cache.lookup(responseKey, fingerprints);
      if (hit) {
        this.countersFor(id).cacheHits++;
        this.logger.log({ scope: id, level: 'debug', message: `Cache hit for '${method}' request.` });
        return hit.value;
      }
    }
    const entry = this.entryFor(key);
    const counters = this.countersFor(id);
    const admittedAt = this.now();
    counters.requests++;
    let result: unknown;
    try {
      result = await this.dispatch(entry, method, params, options, { deadline, timeoutMs, file, content });
    } catch (error) {
      counters.failures++;
      throw error;
    } finally {
      counters.latencyMs += this.now() - admittedAt;
    }
    entry.lastActivity = this.now();
    if (responseKey && ttlMs !== undefined) {
      this.cache.store({ key: responseKey, project: id, method, value: result, fingerprints, ttlMs }, since);
    }
    return result;
  }

  /**
   * Cache counters and occupancy
   */
  cacheStats(): CacheStats {
    return this.cache.stats();
  }

  /**
   * Returns the diagnostics the server published for a file
   *
   * Opens or re-synchronizes the file and waits up to the timeout for a
   * fresh `textDocument/publishDiagnostics` when its content is new to the
   * server. Whatever is known when the wait ends is returned.
   *
   * @param key - Project key
   * @param file - Absolute file path
   * @param timeoutMs - Maximum wait for a fresh push
   */
  async diagnostics(key: ProjectKey, file: string, timeoutMs: number = this.settings.diagnosticsTimeoutMs): Promise<Diagnostic[]> {
    this.assertRunning();
    this.serverConfig(key.language);
    const path = resolvePath(file);
    const uri = toUri(path);
    const content = await this.files.read(path);
    const entry = this.entryFor(key);
    await this.acquire(entry, this.now() + this.settings.requestTimeoutMs);
    const { documents } = entry;
    if (!documents) {
      throw entry.lastError ?? LspError.sessionShuttingDown(entry.id);
    }
    entry.lastActivity = this.now();
    const known = entry.diagnostics.get(uri);
    const synced = documents.ensureOpen(path, content);
    if (synced === 'changed') {
      this.contentChanged(path);
    }
    if (synced === 'unchanged' && known) {
      return known.diagnostics;
    }
    await this.waitForDiagnostics(entry, uri, timeoutMs);
    return entry.diagnostics.get(uri)?.diagnostics ?? [];
  }

  /**
   * Capabilities announced by the server of a project
   *
   * @param key - Project key
   */
  capabilities(key: ProjectKey): ServerCapabilities | undefined {
    return this.registry.get(sessionId(key))?.protocol?.capabilities;
  }

  /**
   * Snapshot of one session, `Unspawned` when unknown
   *
   * @param key - Project key
   */
  status(key: ProjectKey): SessionStatus {
    const entry = this.registry.get(sessionId(key));
    if (!entry) {
      return {
        id: sessionId(key),
        key,
        state: 'Unspawned',
        crashCount: 0,
        backoffMs: 0,
        pending: 0,
        openDocuments: 0,
        uptimeMs: 0,
        metrics: this.metrics(sessionId(key))
      };
    }
    return this.describe(entry);
  }

  /**
   * Snapshots of every known session
   */
  statuses(): SessionStatus[] {
    return this.registry.values().map((entry) => this.describe(entry));
  }

  /**
   * Stops a session gracefully and starts it again
   *
   * @param key - Project key
   * @returns Status of the new session
   */
  async forceRestart(key: ProjectKey): Promise<SessionStatus> {
    this.assertRunning();
    this.serverConfig(key.language);
    const existing = this.registry.get(sessionId(key));
    if (existing) {
      await this.stopEntry(existing, 'restart');
    }
    const entry = this.entryFor(key);
    await this.acquire(entry, this.now() + this.settings.requestTimeoutMs);
    return this.describe(entry);
  }

  /**
   * Stops a session gracefully from any non-terminal state
   *
   * @param key - Project key
   * @returns Whether a session existed
   */
  async forceStop(key: ProjectKey): Promise<boolean> {
    const entry = this.registry.get(sessionId(key));
    if (!entry) {
      return false;
    }
    await this.stopEntry(entry, 'forced');
    return true;
  }

  /**
   * Reports a write to a file made outside the manager
   *
   * Cached responses for the file and workspace-wide responses of the
   * sessions owning it are dropped. With content, documents already open
   * are re-synchronized at once.
   *
   * @param file - Absolute file path
   * @param content - New content, when known
   */
  notifyFileChanged(file: string, content?: string): void {
    const path = resolvePath(file);
    this.contentChanged(path);
    for (const entry of this.owners(path)) {
      if (content !== undefined && entry.state === 'Ready' && entry.documents?.isOpen(path)) {
        entry.documents.ensureOpen(path, content);
      }
    }
  }

  /**
   * Reports a deleted file, closing it in every session holding it
   *
   * @param file - Absolute file path
   */
  notifyFileDeleted(file: string): void {
    const path = resolvePath(file);
    this.cache.invalidate(path);
    for (const entry of this.owners(path)) {
      this.cache.invalidateWorkspace(entry.id);
      entry.documents?.close(path);
      entry.diagnostics.delete(toUri(path));
    }
  }

  /**
   * Stops Ready sessions that stayed idle for the configured timeout
   */
  async checkIdle(): Promise<void> {
    const now = this.now();
    const idle = this.registry.values().filter((entry) =>
      entry.state === 'Ready' && !entry.busy && now - entry.lastActivity >= this.settings.idleTimeoutMs
    );
    await Promise.all(idle.map((entry) => {
      this.logger.log({
        scope: entry.id,
        level: 'info',
        message: `Stopping session idle for ${now - entry.lastActivity}ms.`
      });
      return this.stopEntry(entry, 'idle');
    }));
  }

  /**
   * Stops Ready sessions whose process memory crossed the threshold
   *
   * Busy sessions are skipped and checked again on the next round.
   */
  async checkResources(): Promise<void> {
    const thresholdBytes = this.settings.memoryThresholdMb * 1024 * 1024;
    const limit = pLimit(RESOURCE_SAMPLING_CONCURRENCY);
    const candidates = this.registry.values().filter((entry) => entry.state === 'Ready' && entry.supervisor?.pid !== undefined);
    await Promise.all(candidates.map((entry) => limit(async () => {
      const pid = entry.supervisor?.pid;
      if (pid === undefined) {
        return;
      }
      const rss = await this.sampler.sample(pid);
      if (rss !== undefined) {
        const counters = this.countersFor(entry.id);
        counters.peakMemoryBytes = Math.max(counters.peakMemoryBytes ?? 0, rss);
      }
      if (rss === undefined || rss <= thresholdBytes || entry.state !== 'Ready' || entry.busy) {
        return;
      }
      const exceeded = LspError.resourceExceeded(entry.id, rss, thresholdBytes);
      this.logger.log({ scope: entry.id, level: 'warning', message: exceeded.message });
      await this.stopEntry(entry, 'resource');
    })));
    this.cache.prune();
  }

  /**
   * Stops monitors and every session, later calls reject with ManagerStopped
   */
  async shutdown(): Promise<void> {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    for (const timer of this.timers.splice(0)) {
      clearInterval(timer);
    }
    this.notifyCapacity();
    for (const wake of [...this.delays]) {
      wake();
    }
    await Promise.all(this.registry.values().map((entry) => this.stopEntry(entry, 'shutdown')));
    this.stateEmitter.dispose();
    this.notificationEmitter.dispose();
  }

  private async acquire(entry: SessionEntry, deadline: number): Promise<void> {
    for (;;) {
      this.assertRunning();
      if (entry.state === 'Ready') {
        return;
      }
      if (entry.state === 'ShuttingDown' || entry.state === 'Terminated') {
        throw LspError.sessionShuttingDown(entry.id);
      }
      if (entry.starting) {
        await entry.starting;
        continue;
      }
      if (entry.state === 'Errored') {
        const remaining = (entry.erroredAt ?? 0) + entry.backoffMs - this.now();
        if (remaining > 0) {
          const error = entry.lastError ?? LspError.sessionCrashed(entry.id, null, null);
          if (this.now() + remaining >= deadline) {
            throw error.withData({ retryAfterMs: remaining });
          }
          await this.delay(remaining);
          continue;
        }
      }
      const starting = this.start(entry, deadline);
      entry.starting = starting;
      try {
        await starting;
      } finally {
        if (entry.starting === starting) {
          entry.starting = undefined;
        }
      }
    }
  }

  private async admit(entry: SessionEntry, deadline: number): Promise<void> {
    for (;;) {
      this.assertRunning();
      if (entry.state !== 'Unspawned' && entry.state !== 'Errored') {
        throw LspError.sessionShuttingDown(entry.id);
      }
      if (this.registry.liveCount() < this.settings.maxSessions) {
        this.transition(entry, 'Spawning');
        return;
      }
      const victim = this.registry.evictionCandidate(entry.id);
      if (victim) {
        this.logger.log({ scope: victim.id, level: 'info', message: `Evicting session to admit '${entry.id}' session.` });
        await this.stopEntry(victim, 'evicted');
        continue;
      }
      const remaining = deadline - this.now();
      if (remaining <= 0 || !(await this.waitForCapacity(remaining))) {
        throw LspError.poolAtCapacity(this.settings.maxSessions);
      }
    }
  }

  private assertRunning(): void {
    if (this.stopped) {
      throw LspError.managerStopped();
    }
  }

  private contentChanged(path: string): void {
    this.cache.invalidate(path);
    for (const entry of this.owners(path)) {
      this.cache.invalidateWorkspace(entry.id);
    }
  }

  private countersFor(id: string): SessionCounters {
    let counters = this.counters.get(id);
    if (!counters) {
      counters = { cacheHits: 0, failures: 0, latencyMs: 0, requests: 0, starts: 0 };
      this.counters.set(id, counters);
    }
    return counters;
  }

  /**
   * Resolves after the delay, or at once when the manager shuts down
   */
  private delay(ms: number): Promise<void> {
    return new Promise<void>((resolve) => {
      const wake = () => {
        clearTimeout(timer);
        this.delays.delete(wake);
        resolve();
      };
      const timer = setTimeout(wake, ms);
      timer.unref();
      this.delays.add(wake);
    });
  }

  private describe(entry: SessionEntry): SessionStatus {
    return {
      id: entry.id,
      key: entry.key,
      state: entry.state,
      pid: entry.supervisor?.running ? entry.supervisor.pid : undefined,
      crashCount: entry.crashCount,
      backoffMs: entry.backoffMs,
      pending: entry.dispatcher.size,
      openDocuments: entry.documents?.size ?? 0,
      lastActivity: new Date(entry.lastActivity).toISOString(),
      uptimeMs: entry.state === 'Ready' && entry.startedAt !== undefined ? this.now() - entry.startedAt : 0,
      lastError: entry.lastError ? { code: entry.lastError.code, message: entry.lastError.message } : undefined,
      metrics: this.metrics(entry.id)
    };
  }

  private async dispatch(
    entry: SessionEntry,
    method: string,
    params: unknown,
    options: SubmitOptions,
    request: { deadline: number; timeoutMs: number; file?: string; content?: string }
  ): Promise<unknown> {
    const { deadline, timeoutMs, file, content } = request;
    await this.acquire(entry, deadline);
    entry.lastActivity = this.now();
    return await entry.dispatcher.submit(
      { priority: options.priority ?? 'normal', method, deadline, timeoutMs, signal: options.signal },
      async (remainingMs) => {
        const { documents, protocol } = entry;
        if (entry.state !== 'Ready' || !documents || !protocol) {
          throw entry.lastError ?? LspError.sessionShuttingDown(entry.id);
        }
        let budget = remainingMs;
        if (file && content !== undefined) {
          const synced = documents.ensureOpen(file, content);
          if (synced === 'changed') {
            this.contentChanged(file);
          }
          if (synced === 'opened' && this.settings.settleDelayMs > 0) {
            const settleMs = Math.min(this.settings.settleDelayMs, remainingMs);
            await this.delay(settleMs);
            budget = deadline - this.now();
            if (settleMs === remainingMs || budget <= 0) {
              throw LspError.requestTimeout(method, timeoutMs);
            }
          }
        }
        entry.lastActivity = this.now();
        return await protocol.call(method, params, budget, options.signal);
      }
    );
  }

  private entryFor(key: ProjectKey): SessionEntry {
    const server = this.serverConfig(key.language);
    this.assertRunning();
    const existing = this.registry.get(sessionId(key));
    if (existing?.state === 'ShuttingDown') {
      throw LspError.sessionShuttingDown(existing.id);
    }
    if (existing && existing.state !== 'Terminated') {
      return existing;
    }
    const entry = new SessionEntry(key, server, this.settings.maxConcurrentRequests, this.now);
    entry.dispatcher.onIdle(() => this.notifyCapacity());
    this.registry.set(entry);
    this.stateEmitter.fire({ id: entry.id, key, state: entry.state });
    return entry;
  }

  private handleFailure(entry: SessionEntry, protocol: ProtocolSession, error: LspError): void {
    if (entry.protocol !== protocol) {
      return;
    }
    if (entry.state === 'ShuttingDown' || entry.state === 'Terminated' || entry.state === 'Errored') {
      return;
    }
    this.logger.log({ scope: entry.id, level: 'error', message: error.message });
    this.markErrored(entry, error);
  }

  private handleNotification(entry: SessionEntry, notification: ServerNotification): void {
    const { method, params } = notification;
    if (method === PublishDiagnosticsNotification.method && isPublishDiagnosticsParams(params)) {
      entry.diagnostics.set(params.uri, {
        diagnostics: params.diagnostics,
        receivedAt: this.now(),
        version: params.version
      });
      const waiters = entry.diagnosticWaiters.get(params.uri);
      if (waiters) {
        entry.diagnosticWaiters.delete(params.uri);
        for (const wake of waiters) {
          wake();
        }
      }
    } else if (method === LogMessageNotification.method && isLogMessageParams(params)) {
      this.logger.log({ scope: entry.id, level: 'debug', message: params.message });
    }
    this.notificationEmitter.fire({ id: entry.id, key: entry.key, method, params });
  }

  private markErrored(entry: SessionEntry, error: LspError): void {
    this.transition(entry, 'Errored', error.code);
    entry.crashCount++;
    entry.backoffMs = Math.min(this.settings.backoffCapMs, this.settings.backoffBaseMs * 2 ** (entry.crashCount - 1));
    entry.erroredAt = this.now();
    entry.lastError = error;
    entry.dispatcher.rejectQueued(error);
    entry.protocol?.dispose();
    entry.documents?.clear();
    entry.diagnostics.clear();
    this.cache.invalidateProject(entry.id);
    const supervisor = entry.supervisor;
    if (supervisor) {
      supervisor.terminate(this.settings.shutdownTimeoutMs).catch((failure: unknown) => {
        this.logger.log({ scope: entry.id, level: 'error', message: `Failed to terminate language server: ${failure}` });
      });
    }
    this.logger.log({
      scope: entry.id,
      level: 'warning',
      message: `Session failed ${entry.crashCount} time(s), next start allowed in ${entry.backoffMs}ms.`
    });
    this.notifyCapacity();
  }

  private metrics(id: string): SessionMetrics {
    const counters = this.counters.get(id);
    if (!counters) {
      return { requests: 0, failures: 0, cacheHits: 0, averageLatencyMs: 0, restarts: 0 };
    }
    return {
      requests: counters.requests,
      failures: counters.failures,
      cacheHits: counters.cacheHits,
      averageLatencyMs: counters.requests > 0 ? Math.round(counters.latencyMs / counters.requests) : 0,
      restarts: Math.max(0, counters.starts - 1),
      peakMemoryBytes: counters.peakMemoryBytes
    };
  }

  private notifyCapacity(): void {
    for (const wake of [...this.capacityWaiters]) {
      wake();
    }
  }

  private owners(path: string): SessionEntry[] {
    return this.registry.values().filter((entry) => {
      if (entry.documents?.isOpen(path)) {
        return true;
      }
      const root = entry.key.root.endsWith('/') ? entry.key.root : `${entry.key.root}/`;
      return path.startsWith(root);
    });
  }

  private schedule(intervalMs: number, check: () => Promise<void>, name: string): void {
    const timer = setInterval(() => {
      check().catch((error: unknown) => {
        this.logger.log({ scope: 'manager', level: 'error', message: `The ${name} check failed: ${error}` });
      });
    }, intervalMs);
    timer.unref();
    this.timers.push(timer);
  }

  private serverConfig(language: string): ServerConfig {
    const server = this.config.getServerConfig(language);
    if (!server) {
      throw LspError.noServerConfigured(language);
    }
    return server;
  }

  private async start(entry: SessionEntry, deadline: number): Promise<void> {
    await this.admit(entry, deadline);
    this.countersFor(entry.id).starts++;
    const { server } = entry;
    entry.startedAt = this.now();
    let supervisor: ProcessSupervisor;
    try {
      supervisor = await ProcessSupervisor.spawn(
        { command: server.command, args: server.args, cwd: entry.key.root, env: server.env },
        {
          launcher: this.launcher,
          locate: this.locate,
          onStderr: (line) => this.logger.log({ scope: entry.id, level: 'debug', message: line })
        }
      );
    } catch (error) {
      const failure = isLspError(error)
        ? error
        : LspError.spawnFailed(server.command, error instanceof Error ? error.message : String(error), error);
      if (entry.state === 'Spawning') {
        this.markErrored(entry, failure);
      }
      throw failure;
    }
    if (entry.state !== 'Spawning') {
      await supervisor.terminate(this.settings.shutdownTimeoutMs);
      throw LspError.sessionShuttingDown(entry.id);
    }
    const protocol = new ProtocolSession(supervisor, {
      id: entry.id,
      root: entry.key.root,
      configuration: server.configuration,
      logger: this.logger
    });
    entry.supervisor = supervisor;
    entry.protocol = protocol;
    entry.documents = new DocumentSynchronizer(protocol, entry.key.language, server.languageIds);
    protocol.onFailure((error) => this.handleFailure(entry, protocol, error));
    protocol.onNotification((notification) => this.handleNotification(entry, notification));
    this.transition(entry, 'Initializing');
    try {
      await protocol.initialize({
        capabilities: server.capabilities,
        clientInfo: this.clientInfo,
        initializationOptions: server.initializationOptions ?? server.configuration,
        timeoutMs: this.settings.handshakeTimeoutMs
      });
    } catch (error) {
      const failure = isLspError(error)
        ? error
        : LspError.handshakeFailed(entry.id, error instanceof Error ? error.message : String(error), error);
      if (entry.state === 'Initializing' && entry.protocol === protocol) {
        this.logger.log({ scope: entry.id, level: 'error', message: failure.message });
        this.markErrored(entry, failure);
      }
      throw failure;
    }
    if (entry.state !== 'Initializing' || entry.protocol !== protocol) {
      throw entry.lastError ?? LspError.sessionShuttingDown(entry.id);
    }
    entry.crashCount = 0;
    entry.backoffMs = 0;
    entry.lastError = undefined;
    entry.lastActivity = this.now();
    this.transition(entry, 'Ready');
    this.logger.log({ scope: entry.id, level: 'info', message: `Language server is ready with pid ${supervisor.pid}.` });
  }

  private stopEntry(entry: SessionEntry, reason: StopReason): Promise<void> {
    entry.stopping ??= this.stop(entry, reason);
    return entry.stopping;
  }

  private async stop(entry: SessionEntry, reason: StopReason): Promise<void> {
    if (entry.state === 'Terminated') {
      return;
    }
    this.transition(entry, 'ShuttingDown', reason);
    entry.dispatcher.close(LspError.sessionShuttingDown(entry.id));
    this.notifyCapacity();
    const { protocol, supervisor } = entry;
    if (protocol && !protocol.failed) {
      await protocol.shutdown(this.settings.shutdownTimeoutMs);
    }
    if (supervisor) {
      const exited = await supervisor.waitForExit(this.settings.shutdownTimeoutMs);
      if (!exited) {
        await supervisor.terminate(this.settings.shutdownTimeoutMs);
      }
    }
    protocol?.dispose();
    if (entry.starting) {
      try {
        await entry.starting;
      } catch (error) {
        this.logger.log({
          scope: entry.id,
          level: 'debug',
          message: `Start interrupted by shutdown: ${error instanceof Error ? error.message : error}`
        });
      }
    }
    entry.documents?.clear();
    entry.diagnostics.clear();
    this.cache.invalidateProject(entry.id);
    this.transition(entry, 'Terminated', reason);
    if (this.registry.get(entry.id) === entry) {
      this.registry.delete(entry.id);
    }
    this.logger.log({ scope: entry.id, level: 'info', message: `Session stopped (${reason}).` });
    this.notifyCapacity();
  }

  private transition(entry: SessionEntry, state: SessionState, reason?: string): void {
    const previous = entry.state;
    if (!TRANSITIONS[previous].includes(state)) {
      throw new Error(`Invalid '${entry.id}' session transition from '${previous}' to '${state}'.`);
    }
    entry.state = state;
    if (state === 'Errored' || state === 'ShuttingDown') {
      for (const waiters of entry.diagnosticWaiters.values()) {
        for (const wake of waiters) {
          wake();
        }
      }
      entry.diagnosticWaiters.clear();
    }
    this.logger.log({ scope: entry.id, level: 'debug', message: `Session state changed from '${previous}' to '${state}'.` });
    this.stateEmitter.fire({ id: entry.id, key: entry.key, previous, state, reason });
  }

  private waitForCapacity(timeoutMs: number): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      const wake = () => {
        clearTimeout(timer);
        this.capacityWaiters.delete(wake);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.capacityWaiters.delete(wake);
        resolve(false);
      }, timeoutMs);
      this.capacityWaiters.add(wake);
    });
  }

  private waitForDiagnostics(entry: SessionEntry, uri: string, timeoutMs: number): Promise<void> {
    return new Promise<void>((resolve) => {
      const waiters = entry.diagnosticWaiters.get(uri) ?? new Set<() => void>();
      const wake = () => {
        clearTimeout(timer);
        waiters.delete(wake);
        resolve();
      };
      const timer = setTimeout(wake, timeoutMs);
      waiters.add(wake);
      entry.diagnosticWaiters.set(uri, waiters);
    });
  }
}
