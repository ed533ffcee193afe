/**
 * Session Pool and Lifecycle Manager tests
 *
 * @module server/manager.test
 * @license BSD-3-Clause
 */

import { afterEach, describe, expect, it, vi } from 'vitest';
import { LspError, LspErrorCode } from './errors.js';
import { Logger } from './logger.js';
import { ManagerOptions, SessionManager } from './manager.js';
import { createFakeLauncher, FakeLauncher, fakeLocate, FakeServerOptions, MemoryFileProvider, testConfig } from './test-fixtures.js';
import { ProjectKey, StateChange } from './types.js';

const APP: ProjectKey = { root: '/workspace/app', language: 'rust' };
const FILE = '/workspace/app/src/lib.rs';
const never = () => new Promise<never>(() => undefined);

function errorCode(result: PromiseSettledResult<unknown>): string {
  return result.status === 'rejected' && result.reason instanceof LspError ? result.reason.code : 'ok';
}

describe('SessionManager', () => {
  const managers: SessionManager[] = [];

  afterEach(async () => {
    await Promise.all(managers.splice(0).map((manager) => manager.shutdown()));
  });

  function create(
    server: FakeServerOptions = {},
    settings: Record<string, unknown> = {},
    options: Partial<ManagerOptions> = {}
  ): { fake: FakeLauncher; files: MemoryFileProvider; manager: SessionManager } {
    const fake = createFakeLauncher(server);
    const files = new MemoryFileProvider({ [FILE]: 'fn main() {}' });
    const manager = new SessionManager({
      config: testConfig(settings),
      logger: new Logger('debug'),
      files,
      launcher: fake.launcher,
      locate: fakeLocate,
      ...options
    });
    managers.push(manager);
    return { fake, files, manager };
  }

  it('starts one process for concurrent requests to a new session', async () => {
    const { fake, manager } = create({ handlers: { 'textDocument/hover': () => ({ contents: 'fn main()' }) } });
    const results = await Promise.all([
      manager.submit(APP, 'textDocument/hover', { position: { line: 0, character: 1 } }),
      manager.submit(APP, 'textDocument/hover', { position: { line: 0, character: 2 } }),
      manager.submit(APP, 'textDocument/hover', { position: { line: 0, character: 3 } })
    ]);
    expect(results).toEqual([{ contents: 'fn main()' }, { contents: 'fn main()' }, { contents: 'fn main()' }]);
    expect(fake.launches).toEqual([{ command: '/usr/bin/fake-ls', args: [], cwd: '/workspace/app' }]);
    expect(manager.status(APP)).toMatchObject({ state: 'Ready', pid: 4001, crashCount: 0 });
    expect(manager.capabilities(APP)).toEqual({ hoverProvider: true });
  });

  it('publishes the state transitions of a start', async () => {
    const { manager } = create();
    const changes: StateChange[] = [];
    manager.onStateChange((change) => changes.push(change));
    await manager.submit(APP, 'custom/ping', {}).catch(() => undefined);
    expect(changes.map((change) => change.state)).toEqual(['Unspawned', 'Spawning', 'Initializing', 'Ready']);
    expect(changes[0]?.id).toBe('rust:/workspace/app');
  });

  it('serves repeated requests from the cache', async () => {
    let calls = 0;
    const { fake, manager } = create({ handlers: { 'textDocument/hover': () => ({ contents: `call ${++calls}` }) } });
    const params = { textDocument: { uri: 'file:///workspace/app/src/lib.rs' }, position: { line: 0, character: 3 } };
    await expect(manager.submit(APP, 'textDocument/hover', params, { file: FILE })).resolves.toEqual({ contents: 'call 1' });
    await expect(manager.submit(APP, 'textDocument/hover', params, { file: FILE })).resolves.toEqual({ contents: 'call 1' });
    expect(fake.servers[0]?.received('textDocument/hover')).toHaveLength(1);
  });

  it('does not cache methods without a time to live', async () => {
    const { fake, manager } = create({ handlers: { 'textDocument/rename': () => ({ changes: {} }) } });
    await manager.submit(APP, 'textDocument/rename', { newName: 'run' });
    await manager.submit(APP, 'textDocument/rename', { newName: 'run' });
    expect(fake.servers[0]?.received('textDocument/rename')).toHaveLength(2);
  });

  it('re-synchronizes and re-queries after an external change', async () => {
    const { fake, files, manager } = create({ handlers: { 'textDocument/hover': () => ({ contents: 'fn main()' }) } });
    const params = { position: { line: 0, character: 3 } };
    await manager.submit(APP, 'textDocument/hover', params, { file: FILE });
    files.files.set(FILE, 'fn run() {}');
    manager.notifyFileChanged(FILE, 'fn run() {}');
    await manager.submit(APP, 'textDocument/hover', params, { file: FILE });
    const server = fake.servers[0];
    await vi.waitFor(() => expect(server?.notified('textDocument/didChange')).toHaveLength(1));
    expect(server?.notified('textDocument/didOpen')).toHaveLength(1);
    expect(server?.notified('textDocument/didChange')[0]?.params).toEqual({
      textDocument: { uri: 'file:///workspace/app/src/lib.rs', version: 2 },
      contentChanges: [{ text: 'fn run() {}' }]
    });
    expect(server?.received('textDocument/hover')).toHaveLength(2);
  });

  it('drops cached workspace results when a request finds a changed file', async () => {
    const { fake, files, manager } = create({ handlers: { 'textDocument/hover': () => null, 'workspace/symbol': () => [] } });
    await manager.submit(APP, 'textDocument/hover', {}, { file: FILE });
    await manager.submit(APP, 'workspace/symbol', { query: 'run' });
    await manager.submit(APP, 'workspace/symbol', { query: 'run' });
    const server = fake.servers[0];
    expect(server?.received('workspace/symbol')).toHaveLength(1);
    files.files.set(FILE, 'fn run() {}');
    await manager.submit(APP, 'textDocument/hover', {}, { file: FILE });
    await manager.submit(APP, 'workspace/symbol', { query: 'run' });
    await vi.waitFor(() => expect(server?.notified('textDocument/didChange')).toHaveLength(1));
    expect(server?.received('workspace/symbol')).toHaveLength(2);
  });

  it('waits the settle delay after opening a document only', async () => {
    const { fake, files, manager } = create({ handlers: { 'textDocument/hover': () => null } }, { settleDelayMs: 500 });
    let started = Date.now();
    await manager.submit(APP, 'textDocument/hover', { n: 1 }, { file: FILE });
    expect(Date.now() - started).toBeGreaterThanOrEqual(490);
    files.files.set(FILE, 'fn run() {}');
    started = Date.now();
    await manager.submit(APP, 'textDocument/hover', { n: 2 }, { file: FILE });
    expect(Date.now() - started).toBeLessThan(400);
    expect(fake.servers[0]?.notified('textDocument/didOpen')).toHaveLength(1);
    expect(fake.servers[0]?.received('textDocument/hover')).toHaveLength(2);
  });

  it('times out when the settle delay uses up the deadline', async () => {
    const { fake, manager } = create({ handlers: { 'textDocument/hover': () => null } }, { settleDelayMs: 5000 });
    const started = Date.now();
    await expect(manager.submit(APP, 'textDocument/hover', {}, { file: FILE, timeoutMs: 300 })).rejects.toMatchObject({
      code: LspErrorCode.RequestTimeout,
      data: { method: 'textDocument/hover', timeoutMs: 300 }
    });
    expect(Date.now() - started).toBeLessThan(2000);
    expect(fake.servers[0]?.received('textDocument/hover')).toHaveLength(0);
  });

  it('closes deleted files in the sessions holding them', async () => {
    const { fake, manager } = create({ handlers: { 'textDocument/hover': () => null } });
    await manager.submit(APP, 'textDocument/hover', {}, { file: FILE });
    expect(manager.status(APP).openDocuments).toBe(1);
    manager.notifyFileDeleted(FILE);
    expect(manager.status(APP).openDocuments).toBe(0);
    await vi.waitFor(() => expect(fake.servers[0]?.notified('textDocument/didClose')).toEqual([
      { method: 'textDocument/didClose', params: { textDocument: { uri: 'file:///workspace/app/src/lib.rs' } } }
    ]));
  });

  it('rejects languages without a configured server', async () => {
    const { manager } = create();
    await expect(manager.submit({ root: '/workspace/app', language: 'go' }, 'textDocument/hover', {}))
      .rejects.toMatchObject({ code: LspErrorCode.NoServerConfigured, data: { language: 'go' } });
  });

  it('stops sessions left idle past the timeout', async () => {
    let clock = 1_000_000;
    const { fake, manager } = create({}, { idleTimeoutMs: 1000 }, { now: () => clock });
    const changes: StateChange[] = [];
    manager.onStateChange((change) => changes.push(change));
    await manager.submit(APP, 'custom/ping', {}).catch(() => undefined);
    clock += 999;
    await manager.checkIdle();
    expect(manager.status(APP).state).toBe('Ready');
    clock += 1;
    await manager.checkIdle();
    expect(manager.status(APP).state).toBe('Unspawned');
    expect(manager.statuses()).toEqual([]);
    expect(fake.servers[0]?.process.exited).toBe(true);
    expect(fake.servers[0]?.received('shutdown')).toHaveLength(1);
    expect(changes.slice(-2)).toMatchObject([
      { state: 'ShuttingDown', reason: 'idle' },
      { state: 'Terminated', reason: 'idle' }
    ]);
  });

  it('evicts the least recently active session when the pool is full', async () => {
    let clock = 1;
    const { fake, manager } = create({ handlers: { 'textDocument/hover': () => null } }, { maxSessions: 2 }, { now: () => clock });
    const a: ProjectKey = { root: '/workspace/a', language: 'rust' };
    const b: ProjectKey = { root: '/workspace/b', language: 'rust' };
    const c: ProjectKey = { root: '/workspace/c', language: 'rust' };
    await manager.submit(a, 'textDocument/hover', { n: 1 });
    clock = 2;
    await manager.submit(b, 'textDocument/hover', { n: 2 });
    clock = 3;
    await manager.submit(a, 'textDocument/hover', { n: 3 });
    clock = 4;
    await manager.submit(c, 'textDocument/hover', { n: 4 });
    expect(manager.statuses().map((status) => status.id)).toEqual(['rust:/workspace/a', 'rust:/workspace/c']);
    expect(manager.status(b).state).toBe('Unspawned');
    expect(fake.launches.map((launch) => launch.cwd)).toEqual(['/workspace/a', '/workspace/b', '/workspace/c']);
    expect(fake.servers[1]?.process.exited).toBe(true);
  });

  it('fails with PoolAtCapacity when no session can be evicted', async () => {
    const { fake, manager } = create({ handlers: { 'custom/slow': never } }, { maxSessions: 1 });
    const busy = manager.submit(APP, 'custom/slow', {}).catch((error: unknown) => error);
    await vi.waitFor(() => expect(fake.servers[0]?.received('custom/slow')).toHaveLength(1));
    await expect(manager.submit({ root: '/workspace/other', language: 'rust' }, 'custom/slow', {}, { timeoutMs: 50 }))
      .rejects.toMatchObject({ code: LspErrorCode.PoolAtCapacity, data: { maxSessions: 1 } });
    await manager.shutdown();
    await expect(busy).resolves.toMatchObject({ code: LspErrorCode.SessionShuttingDown });
  });

  it('admits a waiting request once a busy session becomes evictable', async () => {
    const work = () => new Promise((resolve) => setTimeout(() => resolve('done'), 100));
    const { fake, manager } = create({ handlers: { 'custom/work': work } }, { maxSessions: 1 });
    const first = manager.submit(APP, 'custom/work', {});
    await vi.waitFor(() => expect(fake.servers[0]?.received('custom/work')).toHaveLength(1));
    const second = manager.submit({ root: '/workspace/other', language: 'rust' }, 'custom/work', {}, { timeoutMs: 1500 });
    await expect(first).resolves.toBe('done');
    await expect(second).resolves.toBe('done');
    expect(fake.launches.map((launch) => launch.cwd)).toEqual(['/workspace/app', '/workspace/other']);
    expect(manager.status(APP).state).toBe('Unspawned');
  });

  it('rejects every pending request when the process crashes', async () => {
    const { fake, manager } = create({ handlers: { 'custom/slow': never } }, { backoffBaseMs: 10 });
    const calls = [1, 2, 3].map((n) => manager.submit(APP, 'custom/slow', { n }));
    await vi.waitFor(() => expect(fake.servers[0]?.received('custom/slow')).toHaveLength(3));
    fake.servers[0]?.crash();
    const results = await Promise.allSettled(calls);
    expect(results.map(errorCode)).toEqual([LspErrorCode.SessionCrashed, LspErrorCode.SessionCrashed, LspErrorCode.SessionCrashed]);
    expect(manager.status(APP)).toMatchObject({
      state: 'Errored',
      crashCount: 1,
      backoffMs: 10,
      pending: 0,
      lastError: { code: LspErrorCode.SessionCrashed }
    });
  });

  it('backs off exponentially up to the cap across failed starts', async () => {
    const { fake, manager } = create({ crashOnInitialize: true }, { backoffBaseMs: 10, backoffCapMs: 25 });
    const backoffs: number[] = [];
    for (let attempt = 0; attempt < 3; attempt++) {
      await expect(manager.submit(APP, 'textDocument/hover', {})).rejects.toMatchObject({ code: LspErrorCode.HandshakeFailed });
      backoffs.push(manager.status(APP).backoffMs);
    }
    expect(backoffs).toEqual([10, 20, 25]);
    expect(manager.status(APP)).toMatchObject({ state: 'Errored', crashCount: 3 });
    expect(fake.launches).toHaveLength(3);
  });

  it('fails fast while backing off when the deadline is too short', async () => {
    const { manager } = create({ crashOnInitialize: true }, { backoffBaseMs: 60000 });
    await expect(manager.submit(APP, 'textDocument/hover', {})).rejects.toMatchObject({ code: LspErrorCode.HandshakeFailed });
    const retry = manager.submit(APP, 'textDocument/hover', {}, { timeoutMs: 100 });
    await expect(retry).rejects.toSatisfy((error: unknown) => {
      const retryAfterMs = error instanceof LspError ? error.data?.retryAfterMs : undefined;
      return typeof retryAfterMs === 'number' && retryAfterMs > 0;
    });
  });

  it('wakes a request sleeping out the backoff when the manager shuts down', async () => {
    const { manager } = create({ crashOnInitialize: true }, { backoffBaseMs: 60000 });
    await expect(manager.submit(APP, 'textDocument/hover', {})).rejects.toMatchObject({ code: LspErrorCode.HandshakeFailed });
    const retry = manager.submit(APP, 'textDocument/hover', {}, { timeoutMs: 120000 });
    await new Promise((resolve) => setTimeout(resolve, 20));
    await manager.shutdown();
    await expect(retry).rejects.toMatchObject({ code: LspErrorCode.ManagerStopped });
  });

  it('restarts after a framing fault', async () => {
    const { fake, manager } = create({ handlers: { 'custom/slow': never, 'custom/ping': () => 'pong' } }, { backoffBaseMs: 10 });
    const call = manager.submit(APP, 'custom/slow', {});
    await vi.waitFor(() => expect(fake.servers[0]?.received('custom/slow')).toHaveLength(1));
    fake.servers[0]?.sendRaw('Content-Length: x\r\n\r\n');
    await expect(call).rejects.toMatchObject({ code: LspErrorCode.FramingFault });
    expect(manager.status(APP)).toMatchObject({ state: 'Errored', lastError: { code: LspErrorCode.FramingFault } });
    await expect(manager.submit(APP, 'custom/ping', {})).resolves.toBe('pong');
    expect(fake.launches).toHaveLength(2);
    expect(manager.status(APP)).toMatchObject({ state: 'Ready', crashCount: 0, backoffMs: 0, pid: 4002 });
  });

  it('stops a session on request', async () => {
    const { fake, manager } = create();
    await expect(manager.forceStop(APP)).resolves.toBe(false);
    await manager.submit(APP, 'custom/ping', {}).catch(() => undefined);
    await expect(manager.forceStop(APP)).resolves.toBe(true);
    expect(manager.status(APP).state).toBe('Unspawned');
    expect(fake.servers[0]?.notified('exit')).toHaveLength(1);
  });

  it('rejects submissions while a session is shutting down', async () => {
    const { fake, manager } = create({ handlers: { 'custom/ping': () => 'pong', shutdown: never } });
    await expect(manager.submit(APP, 'custom/ping', {})).resolves.toBe('pong');
    const stopping = manager.forceStop(APP);
    expect(manager.status(APP).state).toBe('ShuttingDown');
    await expect(manager.submit(APP, 'custom/ping', {})).rejects.toMatchObject({
      code: LspErrorCode.SessionShuttingDown,
      data: { session: 'rust:/workspace/app' }
    });
    await expect(stopping).resolves.toBe(true);
    expect(fake.launches).toHaveLength(1);
  });

  it('restarts a session on request', async () => {
    const { fake, manager } = create();
    const changes: StateChange[] = [];
    manager.onStateChange((change) => changes.push(change));
    await manager.submit(APP, 'custom/ping', {}).catch(() => undefined);
    await expect(manager.forceRestart(APP)).resolves.toMatchObject({ state: 'Ready', pid: 4002, crashCount: 0 });
    expect(fake.launches).toHaveLength(2);
    expect(changes.filter((change) => change.reason === 'restart').map((change) => change.state)).toEqual(['ShuttingDown', 'Terminated']);
  });

  it('returns the diagnostics the server publishes', async () => {
    const { fake, manager } = create();
    const diagnostic = {
      range: { start: { line: 0, character: 3 }, end: { line: 0, character: 7 } },
      severity: 2,
      message: 'function is never used'
    };
    const pending = manager.diagnostics(APP, FILE, 5000);
    await vi.waitFor(() => expect(fake.servers[0]?.notified('textDocument/didOpen')).toHaveLength(1));
    fake.servers[0]?.notify('textDocument/publishDiagnostics', {
      uri: 'file:///workspace/app/src/lib.rs',
      diagnostics: [diagnostic]
    });
    await expect(pending).resolves.toEqual([diagnostic]);
    await expect(manager.diagnostics(APP, FILE, 10)).resolves.toEqual([diagnostic]);
  });

  it('returns no diagnostics when none arrive in time', async () => {
    const { manager } = create();
    await expect(manager.diagnostics(APP, FILE, 20)).resolves.toEqual([]);
  });

  it('forwards server notifications with their session', async () => {
    const { fake, manager } = create();
    const received: unknown[] = [];
    manager.onNotification((notification) => received.push(notification));
    await manager.submit(APP, 'custom/ping', {}).catch(() => undefined);
    fake.servers[0]?.notify('$/progress', { token: 'index', value: { kind: 'end' } });
    await vi.waitFor(() => expect(received).toEqual([{
      id: 'rust:/workspace/app',
      key: APP,
      method: '$/progress',
      params: { token: 'index', value: { kind: 'end' } }
    }]));
  });

  it('recycles sessions above the memory threshold', async () => {
    const sampler = { sample: async () => 64 * 1024 * 1024 };
    const { fake, manager } = create({}, { memoryThresholdMb: 32 }, { sampler });
    const changes: StateChange[] = [];
    manager.onStateChange((change) => changes.push(change));
    await manager.submit(APP, 'custom/ping', {}).catch(() => undefined);
    await manager.checkResources();
    expect(manager.status(APP).state).toBe('Unspawned');
    expect(fake.servers[0]?.process.exited).toBe(true);
    expect(changes.slice(-2)).toMatchObject([
      { state: 'ShuttingDown', reason: 'resource' },
      { state: 'Terminated', reason: 'resource' }
    ]);
  });

  it('keeps sessions below the memory threshold', async () => {
    const sampler = { sample: async () => 16 * 1024 * 1024 };
    const { manager } = create({}, { memoryThresholdMb: 32 }, { sampler });
    await manager.submit(APP, 'custom/ping', {}).catch(() => undefined);
    await manager.checkResources();
    expect(manager.status(APP).state).toBe('Ready');
  });

  it('keeps request and restart counters across sessions of a project', async () => {
    const sampler = { sample: async () => 16 * 1024 * 1024 };
    const { manager } = create({ handlers: { 'textDocument/hover': () => null } }, { memoryThresholdMb: 32 }, { sampler });
    await manager.submit(APP, 'textDocument/hover', {}, { file: FILE });
    await manager.submit(APP, 'textDocument/hover', {}, { file: FILE });
    await expect(manager.submit(APP, 'custom/missing', {})).rejects.toMatchObject({ code: LspErrorCode.RequestFailed });
    await manager.checkResources();
    await manager.forceRestart(APP);
    const { metrics } = manager.status(APP);
    expect(metrics).toMatchObject({ requests: 2, failures: 1, cacheHits: 1, restarts: 1, peakMemoryBytes: 16 * 1024 * 1024 });
    expect(metrics.averageLatencyMs).toBeGreaterThanOrEqual(0);
    expect(manager.cacheStats()).toEqual({ capacity: 1000, size: 0, evictions: 0, hits: 1, misses: 1 });
  });

  it('rejects everything with ManagerStopped after shutdown', async () => {
    const { fake, manager } = create();
    await manager.submit(APP, 'custom/ping', {}).catch(() => undefined);
    await manager.shutdown();
    expect(fake.servers[0]?.received('shutdown')).toHaveLength(1);
    expect(manager.statuses()).toEqual([]);
    await expect(manager.submit(APP, 'textDocument/hover', {})).rejects.toMatchObject({ code: LspErrorCode.ManagerStopped });
    await expect(manager.forceRestart(APP)).rejects.toMatchObject({ code: LspErrorCode.ManagerStopped });
  });
});
