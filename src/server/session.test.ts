/**
 * Language Server Protocol Session tests
 *
 * @module server/session.test
 * @license BSD-3-Clause
 */

import { afterEach, describe, expect, it, vi } from 'vitest';
import { LspError, LspErrorCode } from './errors.js';
import { Logger } from './logger.js';
import { ProcessSupervisor } from './process.js';
import { clientCapabilities, configurationSection, ProtocolSession, ServerNotification } from './session.js';
import { FakeChildProcess, FakeLanguageServer, fakeLocate, FakeServerOptions } from './test-fixtures.js';

const ID = 'rust:/workspace/app';
const never = () => new Promise<never>(() => undefined);

describe('ProtocolSession', () => {
  const sessions: ProtocolSession[] = [];

  afterEach(() => {
    for (const session of sessions.splice(0)) {
      session.dispose();
    }
  });

  async function open(options: FakeServerOptions = {}, configuration?: Record<string, unknown>) {
    const child = new FakeChildProcess(21);
    const server = new FakeLanguageServer(child, options);
    const supervisor = await ProcessSupervisor.spawn(
      { command: 'fake-ls', args: [], cwd: '/workspace/app' },
      { launcher: () => child, locate: fakeLocate }
    );
    const session = new ProtocolSession(supervisor, { id: ID, root: '/workspace/app', configuration, logger: new Logger('debug') });
    sessions.push(session);
    return { child, server, session, supervisor };
  }

  it('performs the initialize handshake', async () => {
    const { server, session } = await open({ capabilities: { hoverProvider: true, definitionProvider: true } });
    const result = await session.initialize({ clientInfo: { name: 'test-client' }, timeoutMs: 1000 });
    expect(result.capabilities).toEqual({ hoverProvider: true, definitionProvider: true });
    expect(session.capabilities).toEqual({ hoverProvider: true, definitionProvider: true });
    expect(server.received('initialize')[0]?.params).toMatchObject({
      clientInfo: { name: 'test-client' },
      rootUri: 'file:///workspace/app',
      workspaceFolders: [{ name: 'app', uri: 'file:///workspace/app' }],
      capabilities: { workspace: { configuration: true, workspaceFolders: true } }
    });
    await vi.waitFor(() => expect(server.notified('initialized')).toEqual([{ method: 'initialized', params: {} }]));
  });

  it('fails the handshake when the server dies during initialize', async () => {
    const { session } = await open({ crashOnInitialize: true });
    const failures: LspError[] = [];
    session.onFailure((error) => failures.push(error));
    await expect(session.initialize({ timeoutMs: 1000 })).rejects.toMatchObject({ code: LspErrorCode.HandshakeFailed });
    expect(failures.map((failure) => failure.code)).toEqual([LspErrorCode.SessionCrashed]);
  });

  it('fails the handshake on timeout', async () => {
    const { session } = await open({ handlers: { initialize: never } });
    await expect(session.initialize({ timeoutMs: 20 })).rejects.toMatchObject({
      code: LspErrorCode.HandshakeFailed,
      data: { session: ID, reason: "Request 'initialize' timed out after 20ms." }
    });
  });

  it('returns the result of a request', async () => {
    const { session } = await open({ handlers: { 'textDocument/hover': () => ({ contents: 'fn main()' }) } });
    await session.initialize({ timeoutMs: 1000 });
    await expect(session.call('textDocument/hover', { position: { line: 0, character: 3 } }, 1000))
      .resolves.toEqual({ contents: 'fn main()' });
    expect(session.pendingCount).toBe(0);
  });

  it('maps a JSON-RPC error response to RequestFailed', async () => {
    const { session } = await open();
    await session.initialize({ timeoutMs: 1000 });
    await expect(session.call('textDocument/rename', {}, 1000)).rejects.toMatchObject({
      code: LspErrorCode.RequestFailed,
      data: { method: 'textDocument/rename', reason: 'Unhandled method textDocument/rename', errorCode: -32601 }
    });
  });

  it('times out and cancels a request left unanswered', async () => {
    const { server, session } = await open({ handlers: { 'custom/slow': never } });
    await session.initialize({ timeoutMs: 1000 });
    await expect(session.call('custom/slow', {}, 20)).rejects.toMatchObject({
      code: LspErrorCode.RequestTimeout,
      data: { method: 'custom/slow', timeoutMs: 20 }
    });
    expect(session.pendingCount).toBe(0);
    await vi.waitFor(() => expect(server.notified('$/cancelRequest')).toHaveLength(1));
  });

  it('cancels a request on abort', async () => {
    const { session } = await open({ handlers: { 'custom/slow': never } });
    await session.initialize({ timeoutMs: 1000 });
    const controller = new AbortController();
    const call = session.call('custom/slow', {}, 1000, controller.signal);
    controller.abort();
    await expect(call).rejects.toMatchObject({ code: LspErrorCode.RequestCancelled });
  });

  it('rejects every pending request with SessionCrashed when the process dies', async () => {
    const { server, session } = await open({ handlers: { 'custom/slow': never } });
    await session.initialize({ timeoutMs: 1000 });
    const failures: LspError[] = [];
    session.onFailure((error) => failures.push(error));
    const calls = [1, 2, 3].map((n) => session.call('custom/slow', { n }, 5000));
    await vi.waitFor(() => expect(server.received('custom/slow')).toHaveLength(3));
    server.crash();
    const results = await Promise.allSettled(calls);
    expect(results.map((result) => result.status === 'rejected' && result.reason instanceof LspError ? result.reason.code : 'ok'))
      .toEqual([LspErrorCode.SessionCrashed, LspErrorCode.SessionCrashed, LspErrorCode.SessionCrashed]);
    expect(failures).toHaveLength(1);
    expect(failures[0]?.data).toEqual({ session: ID, code: null, signal: 'SIGKILL' });
    expect(session.pendingCount).toBe(0);
    await expect(session.call('custom/slow', {}, 1000)).rejects.toMatchObject({ code: LspErrorCode.SessionCrashed });
  });

  it('fails with FramingFault and kills the process on malformed output', async () => {
    const { child, server, session } = await open({ handlers: { 'custom/slow': never } });
    await session.initialize({ timeoutMs: 1000 });
    const call = session.call('custom/slow', {}, 5000);
    await vi.waitFor(() => expect(server.received('custom/slow')).toHaveLength(1));
    server.sendRaw('Content-Length: x\r\n\r\n');
    await expect(call).rejects.toMatchObject({ code: LspErrorCode.FramingFault, data: { reason: "invalid Content-Length 'x'" } });
    expect(session.failed?.code).toBe(LspErrorCode.FramingFault);
    expect(child.signals).toEqual(['SIGTERM']);
  });

  it('shuts down with shutdown and exit, rejecting what is still pending', async () => {
    const { server, session, supervisor } = await open({ handlers: { 'custom/slow': never } });
    await session.initialize({ timeoutMs: 1000 });
    const failures: LspError[] = [];
    session.onFailure((error) => failures.push(error));
    const call = session.call('custom/slow', {}, 5000);
    await session.shutdown(1000);
    await expect(call).rejects.toMatchObject({ code: LspErrorCode.SessionShuttingDown });
    await expect(supervisor.exitSignal()).resolves.toEqual({ code: 0, signal: null });
    expect(server.received('shutdown')).toHaveLength(1);
    expect(server.notified('exit')).toHaveLength(1);
    expect(failures).toEqual([]);
    await expect(session.call('textDocument/hover', {}, 1000)).rejects.toMatchObject({ code: LspErrorCode.SessionShuttingDown });
  });

  it('answers workspace/configuration from the server configuration', async () => {
    const { server, session } = await open({}, { 'rust-analyzer': { cargo: { features: 'all' } } });
    await session.initialize({ timeoutMs: 1000 });
    const result = await server.request('workspace/configuration', {
      items: [{ section: 'rust-analyzer.cargo' }, { section: 'rust-analyzer.missing' }]
    });
    expect(result).toEqual([{ features: 'all' }, null]);
  });

  it('forwards server notifications', async () => {
    const { server, session } = await open();
    await session.initialize({ timeoutMs: 1000 });
    const received: ServerNotification[] = [];
    session.onNotification((notification) => received.push(notification));
    server.notify('window/logMessage', { type: 3, message: 'indexing' });
    await vi.waitFor(() => expect(received).toEqual([{ method: 'window/logMessage', params: { type: 3, message: 'indexing' } }]));
  });
});

describe('clientCapabilities', () => {
  it('merges overrides into the base capabilities', () => {
    const capabilities = clientCapabilities({ textDocument: { hover: { dynamicRegistration: true } } });
    expect(capabilities.textDocument?.hover).toEqual({ dynamicRegistration: true, contentFormat: ['markdown', 'plaintext'] });
    expect(capabilities.workspace?.configuration).toBe(true);
  });
});

describe('configurationSection', () => {
  const configuration = { 'rust-analyzer.checkOnSave': true, python: { analysis: { typeCheckingMode: 'strict' } } };

  it('resolves whole, literal and dotted sections', () => {
    expect(configurationSection(configuration)).toBe(configuration);
    expect(configurationSection(configuration, 'rust-analyzer.checkOnSave')).toBe(true);
    expect(configurationSection(configuration, 'python.analysis')).toEqual({ typeCheckingMode: 'strict' });
    expect(configurationSection(configuration, 'python.missing.deeper')).toBeNull();
  });
});
