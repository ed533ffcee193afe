/**
 * In-process language server stand-ins for tests
 *
 * @module server/test-fixtures
 * @license BSD-3-Clause
 */

import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import { encode, FrameDecoder } from './codec.js';
import { Config } from './config.js';
import { LspError } from './errors.js';
import { FileProvider } from './files.js';
import { ChildProcessLike, ExecutableLocator, ProcessLauncher } from './process.js';

/**
 * Message received by the fake server
 */
export interface ReceivedMessage {
  method: string;
  params: unknown;
}

/**
 * Answers one request, a returned promise is awaited
 */
export type FakeHandler = (params: unknown, server: FakeLanguageServer) => unknown;

/**
 * Fake server behavior
 *
 * @property capabilities - Capabilities returned from `initialize`
 * @property crashOnInitialize - Exit with code 1 instead of answering `initialize`
 * @property handlers - Request handlers keyed by method
 * @property ignoreSigterm - Keep running after SIGTERM, only SIGKILL stops it
 */
export interface FakeServerOptions {
  capabilities?: Record<string, unknown>;
  crashOnInitialize?: boolean;
  handlers?: Record<string, FakeHandler>;
  ignoreSigterm?: boolean;
}

/**
 * Child process double wired with in-memory pipes
 *
 * @export
 * @class FakeChildProcess
 */
export class FakeChildProcess extends EventEmitter implements ChildProcessLike {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly signals: Array<NodeJS.Signals | number> = [];
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;
  private ended = false;

  constructor(readonly pid: number, private readonly ignoreSigterm: boolean = false) {
    super();
    setImmediate(() => this.emit('spawn'));
  }

  /**
   * Whether the process exited or is about to
   */
  get exited(): boolean {
    return this.ended;
  }

  kill(signal: NodeJS.Signals | number = 'SIGTERM'): boolean {
    this.signals.push(signal);
    if (this.ended) {
      return false;
    }
    if (signal === 'SIGTERM' && this.ignoreSigterm) {
      return true;
    }
    this.exit(null, typeof signal === 'number' ? 'SIGKILL' : signal);
    return true;
  }

  /**
   * Ends the process on the next turn of the event loop
   *
   * @param code - Exit code
   * @param signal - Terminating signal
   */
  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.ended) {
      return;
    }
    this.ended = true;
    setImmediate(() => {
      this.exitCode = code;
      this.signalCode = signal;
      this.emit('exit', code, signal);
      this.stdout.end();
      this.stderr.end();
    });
  }
}

/**
 * Scripted language server speaking the wire protocol over a fake process
 *
 * @export
 * @class FakeLanguageServer
 */
export class FakeLanguageServer {
  readonly decodeErrors: Error[] = [];
  readonly notifications: ReceivedMessage[] = [];
  readonly requests: ReceivedMessage[] = [];
  private readonly decoder = new FrameDecoder();
  private readonly handlers: Map<string, FakeHandler>;
  private readonly replies = new Map<string, (result: unknown) => void>();
  private nextId = 0;

  constructor(readonly process: FakeChildProcess, private readonly options: FakeServerOptions = {}) {
    this.handlers = new Map(Object.entries(options.handlers ?? {}));
    process.stdin.on('data', (chunk: Buffer) => {
      this.decoder.push(chunk);
      try {
        for (const message of this.decoder.messages()) {
          this.receive(message);
        }
      } catch (error) {
        this.decodeErrors.push(error instanceof Error ? error : new Error(String(error)));
      }
    });
  }

  /**
   * Requests received for one method
   *
   * @param method - LSP method name
   */
  received(method: string): ReceivedMessage[] {
    return this.requests.filter((request) => request.method === method);
  }

  /**
   * Notifications received for one method
   *
   * @param method - LSP method name
   */
  notified(method: string): ReceivedMessage[] {
    return this.notifications.filter((notification) => notification.method === method);
  }

  /**
   * Replaces or adds a request handler
   */
  handle(method: string, handler: FakeHandler): void {
    this.handlers.set(method, handler);
  }

  notify(method: string, params: unknown): void {
    this.send({ jsonrpc: '2.0', method, params });
  }

  /**
   * Sends a request to the client and resolves with its result
   */
  request(method: string, params: unknown): Promise<unknown> {
    const id = `server-${++this.nextId}`;
    return new Promise<unknown>((resolve) => {
      this.replies.set(id, resolve);
      this.send({ jsonrpc: '2.0', id, method, params });
    });
  }

  /**
   * Writes bytes that break the framing
   *
   * @param text - Raw text written to stdout
   */
  sendRaw(text: string): void {
    if (!this.process.exited) {
      this.process.stdout.write(text);
    }
  }

  /**
   * Simulates an abrupt process death
   */
  crash(): void {
    this.process.exit(null, 'SIGKILL');
  }

  private receive(message: object): void {
    const method = 'method' in message && typeof message.method === 'string' ? message.method : undefined;
    const params = 'params' in message ? message.params : undefined;
    const id = 'id' in message && (typeof message.id === 'number' || typeof message.id === 'string') ? message.id : undefined;
    if (method === undefined) {
      if (id !== undefined) {
        this.replies.get(String(id))?.('result' in message ? message.result : undefined);
        this.replies.delete(String(id));
      }
      return;
    }
    if (id === undefined) {
      this.notifications.push({ method, params });
      if (method === 'exit') {
        this.process.exit(0);
      }
      return;
    }
    this.requests.push({ method, params });
    this.answer(id, method, params);
  }

  private answer(id: number | string, method: string, params: unknown): void {
    const handler = this.handlers.get(method);
    if (handler) {
      void Promise.resolve()
        .then(() => handler(params, this))
        .then(
          (result: unknown) => this.send({ jsonrpc: '2.0', id, result: result ?? null }),
          (error: unknown) => this.send({
            jsonrpc: '2.0',
            id,
            error: { code: -32603, message: error instanceof Error ? error.message : String(error) }
          })
        );
      return;
    }
    if (method === 'initialize') {
      if (this.options.crashOnInitialize) {
        this.process.exit(1);
        return;
      }
      this.send({
        jsonrpc: '2.0',
        id,
        result: { capabilities: this.options.capabilities ?? { hoverProvider: true }, serverInfo: { name: 'fake-ls' } }
      });
      return;
    }
    if (method === 'shutdown') {
      this.send({ jsonrpc: '2.0', id, result: null });
      return;
    }
    this.send({ jsonrpc: '2.0', id, error: { code: -32601, message: `Unhandled method ${method}` } });
  }

  private send(message: object): void {
    if (!this.process.exited) {
      this.process.stdout.write(encode(message));
    }
  }
}

/**
 * Launcher handing out fake servers, one per spawn
 *
 * @export
 * @interface FakeLauncher
 */
export interface FakeLauncher {
  launcher: ProcessLauncher;
  launches: Array<{ command: string; args: string[]; cwd: string }>;
  servers: FakeLanguageServer[];
}

/**
 * Creates a launcher whose every spawn gets a new fake server
 *
 * @param options - Behavior shared by every spawned server
 */
export function createFakeLauncher(options: FakeServerOptions = {}): FakeLauncher {
  const fake: FakeLauncher = {
    launches: [],
    servers: [],
    launcher: (command, args, launch) => {
      fake.launches.push({ command, args, cwd: launch.cwd });
      const child = new FakeChildProcess(4000 + fake.launches.length, options.ignoreSigterm);
      fake.servers.push(new FakeLanguageServer(child, options));
      return child;
    }
  };
  return fake;
}

/**
 * Locator resolving every command under `/usr/bin`
 */
export const fakeLocate: ExecutableLocator = async (command) => `/usr/bin/${command}`;

/**
 * File provider backed by a map
 *
 * @export
 * @class MemoryFileProvider
 */
export class MemoryFileProvider implements FileProvider {
  readonly files = new Map<string, string>();

  constructor(files: Record<string, string> = {}) {
    for (const [file, content] of Object.entries(files)) {
      this.files.set(file, content);
    }
  }

  async read(file: string): Promise<string> {
    const content = this.files.get(file);
    if (content === undefined) {
      throw LspError.fileReadFailed(file, new Error('ENOENT: no such file or directory'));
    }
    return content;
  }
}

/**
 * Configuration with one `rust` server and monitors turned off
 *
 * @param settings - Settings merged over the test defaults
 * @param server - Server fields merged over the test defaults
 */
export function testConfig(settings: Record<string, unknown> = {}, server: Record<string, unknown> = {}): Config {
  return Config.fromObject({
    root: '/workspace',
    servers: {
      rust: {
        command: 'fake-ls',
        extensions: ['.rs'],
        markers: ['Cargo.toml'],
        ...server
      }
    },
    settings: {
      idleMonitor: false,
      resourceMonitor: false,
      settleDelayMs: 0,
      shutdownTimeoutMs: 200,
      ...settings
    }
  });
}
