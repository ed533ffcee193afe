/**
 * Language Server Protocol Session
 *
 * @module server/session
 * @license BSD-3-Clause
 */

import { deepmerge } from 'deepmerge-ts';
import { basename } from 'node:path';
import {
  CancellationTokenSource,
  ConnectionError,
  createMessageConnection,
  Emitter,
  ErrorCodes,
  Event,
  MessageConnection,
  ResponseError
} from 'vscode-jsonrpc/node.js';
import {
  ClientCapabilities,
  ConfigurationItem,
  ConfigurationParams,
  ConfigurationRequest,
  ExitNotification,
  InitializedNotification,
  InitializeParams,
  InitializeRequest,
  InitializeResult,
  RegistrationRequest,
  ServerCapabilities,
  ShowMessageRequest,
  ShowMessageRequestParams,
  ShutdownRequest,
  UnregistrationRequest,
  WorkDoneProgressCreateRequest,
  WorkspaceFolder,
  WorkspaceFoldersRequest
} from 'vscode-languageserver-protocol';
import { CodecMessageReader, CodecMessageWriter, FramingFault } from './codec.js';
import { LspError } from './errors.js';
import { toUri } from './files.js';
import { Logger } from './logger.js';
import { ExitInfo, ProcessSupervisor } from './process.js';

/**
 * Request awaiting its response
 *
 * @interface PendingRequest
 * @property id - Session-local request number
 * @property method - LSP method name
 * @property submittedAt - Epoch milliseconds when the request was written
 * @property deadline - Epoch milliseconds after which it times out
 * @property reject - Settles the request with an error
 */
interface PendingRequest {
  id: number;
  method: string;
  submittedAt: number;
  deadline: number;
  reject: (error: LspError) => void;
}

/**
 * Notification received from the language server
 */
export interface ServerNotification {
  method: string;
  params: unknown;
}

/**
 * Session construction options
 *
 * @export
 * @interface SessionOptions
 * @property id - Session identifier used in errors and logs
 * @property root - Project root directory
 * @property configuration - Answer to `workspace/configuration` requests
 * @property logger - Logger instance
 */
export interface SessionOptions {
  id: string;
  root: string;
  configuration?: Record<string, unknown>;
  logger: Logger;
}

/**
 * Handshake parameters
 *
 * @export
 * @interface HandshakeOptions
 */
export interface HandshakeOptions {
  capabilities?: Partial<ClientCapabilities>;
  clientInfo?: { name: string; version?: string };
  initializationOptions?: unknown;
  timeoutMs: number;
}

/**
 * Builds client capabilities with per-server overrides merged in
 *
 * @param overrides - Capability overrides from server configuration
 */
export function clientCapabilities(overrides?: Partial<ClientCapabilities>): ClientCapabilities {
  const capabilities: ClientCapabilities = {
    general: { positionEncodings: ['utf-16'] },
    textDocument: {
      completion: {
        dynamicRegistration: false,
        completionItem: {
          deprecatedSupport: true,
          documentationFormat: ['markdown', 'plaintext'],
          snippetSupport: false
        },
        contextSupport: true
      },
      definition: { dynamicRegistration: false, linkSupport: true },
      documentSymbol: { dynamicRegistration: false, hierarchicalDocumentSymbolSupport: true },
      hover: {
        dynamicRegistration: false,
        contentFormat: ['markdown', 'plaintext']
      },
      publishDiagnostics: { relatedInformation: true, versionSupport: true },
      references: { dynamicRegistration: false },
      synchronization: {
        didSave: false,
        dynamicRegistration: false,
        willSave: false,
        willSaveWaitUntil: false
      }
    },
    window: { workDoneProgress: true },
    workspace: {
      configuration: true,
      symbol: { dynamicRegistration: false },
      workspaceFolders: true
    }
  };
  return deepmerge(capabilities, overrides ?? {});
}

/**
 * Resolves a dotted `section` against the server configuration
 *
 * @param configuration - Server configuration object
 * @param section - Section such as `rust-analyzer.cargo`
 */
export function configurationSection(configuration: Record<string, unknown>, section?: string): unknown {
  if (!section) {
    return configuration;
  }
  if (section in configuration) {
    return configuration[section];
  }
  let value: unknown = configuration;
  for (const part of section.split('.')) {
    if (typeof value !== 'object' || value === null || !(part in value)) {
      return null;
    }
    value = Reflect.get(value, part);
  }
  return value;
}

/**
 * JSON-RPC session with one language server process
 *
 * Owns the correlation of requests to responses. Every pending request is
 * settled exactly once, by its response, its deadline or a session failure.
 *
 * @export
 * @class ProtocolSession
 */
export class ProtocolSession {
  private readonly configuration: Record<string, unknown>;
  private readonly connection: MessageConnection;
  private readonly failureEmitter = new Emitter<LspError>();
  private readonly id: string;
  private readonly logger: Logger;
  private readonly notificationEmitter = new Emitter<ServerNotification>();
  private readonly pending = new Map<number, PendingRequest>();
  private readonly root: string;
  private closing = false;
  private failure?: LspError;
  private nextId = 0;
  private serverCapabilities?: ServerCapabilities;

  /**
   * Creates a session over a spawned process and starts listening
   *
   * @param supervisor - Running process supervisor
   * @param options - Session options
   */
  constructor(readonly supervisor: ProcessSupervisor, options: SessionOptions) {
    this.configuration = options.configuration ?? {};
    this.id = options.id;
    this.logger = options.logger;
    this.root = options.root;
    const reader = new CodecMessageReader(supervisor.stdout);
    const writer = new CodecMessageWriter(supervisor.stdin);
    reader.onError((error) => {
      if (error instanceof FramingFault) {
        this.handleFramingFault(error);
      }
    });
    this.connection = createMessageConnection(reader, writer);
    this.connection.onError(([error]) => {
      this.log('debug', `Connection error: ${error.message}`);
    });
    this.connection.onNotification((method: string, params: unknown) => {
      this.notificationEmitter.fire({ method, params });
    });
    this.setRequestHandlers();
    this.connection.listen();
    void supervisor.exitSignal().then((info) => this.handleExit(info));
  }

  /**
   * Fires once when the session fails, by crash or framing fault
   */
  get onFailure(): Event<LspError> {
    return this.failureEmitter.event;
  }

  /**
   * Fires for every notification sent by the server
   */
  get onNotification(): Event<ServerNotification> {
    return this.notificationEmitter.event;
  }

  /**
   * Capabilities announced in the initialize result
   */
  get capabilities(): ServerCapabilities | undefined {
    return this.serverCapabilities;
  }

  /**
   * Error that ended the session, if any
   */
  get failed(): LspError | undefined {
    return this.failure;
  }

  /**
   * Number of requests awaiting a response
   */
  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Performs the initialize handshake
   *
   * @param options - Capabilities, initialization options and deadline
   * @throws {LspError} HandshakeFailed on any failure
   */
  async initialize(options: HandshakeOptions): Promise<InitializeResult> {
    const workspaceFolder: WorkspaceFolder = { name: basename(this.root), uri: toUri(this.root) };
    const params: InitializeParams = {
      capabilities: clientCapabilities(options.capabilities),
      clientInfo: options.clientInfo,
      initializationOptions: options.initializationOptions,
      processId: process.pid,
      rootPath: this.root,
      rootUri: workspaceFolder.uri,
      workspaceFolders: [workspaceFolder]
    };
    let result: unknown;
    try {
      result = await this.request(InitializeRequest.method, params, options.timeoutMs);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw LspError.handshakeFailed(this.id, reason, error);
    }
    if (!ProtocolSession.isInitializeResult(result)) {
      throw LspError.handshakeFailed(this.id, 'initialize result has no capabilities');
    }
    this.serverCapabilities = result.capabilities;
    this.notify(InitializedNotification.method, {});
    return result;
  }

  private static isInitializeResult(value: unknown): value is InitializeResult {
    return typeof value === 'object' && value !== null && 'capabilities' in value
      && typeof value.capabilities === 'object' && value.capabilities !== null;
  }

  /**
   * Sends a request and waits for its response
   *
   * @param method - LSP method name
   * @param params - Request parameters
   * @param timeoutMs - Deadline relative to now
   * @param signal - Optional abort signal, sends `$/cancelRequest` when fired
   * @throws {LspError} RequestTimeout, RequestCancelled, RequestFailed, SessionCrashed, FramingFault or SessionShuttingDown
   */
  call(method: string, params: unknown, timeoutMs: number, signal?: AbortSignal): Promise<unknown> {
    if (this.closing && !this.failure) {
      return Promise.reject(LspError.sessionShuttingDown(this.id));
    }
    return this.request(method, params, timeoutMs, signal);
  }

  /**
   * Sends a notification, delivery is best-effort
   *
   * @param method - LSP method name
   * @param params - Notification parameters
   */
  notify(method: string, params?: unknown): void {
    if (this.failure) {
      return;
    }
    let sent: Promise<void>;
    try {
      sent = params === undefined
        ? this.connection.sendNotification(method)
        : this.connection.sendNotification(method, params);
    } catch (error) {
      this.log('debug', `Failed to send '${method}' notification: ${error}`);
      return;
    }
    sent.catch((error: unknown) => {
      this.log('debug', `Failed to send '${method}' notification: ${error}`);
    });
  }

  /**
   * Sends `shutdown` then `exit`
   *
   * Requests still pending afterwards reject with SessionShuttingDown.
   *
   * @param timeoutMs - Deadline for the shutdown response
   */
  async shutdown(timeoutMs: number): Promise<void> {
    if (this.closing) {
      return;
    }
    this.closing = true;
    if (!this.failure) {
      try {
        await this.request(ShutdownRequest.method, undefined, timeoutMs);
      } catch (error) {
        this.log('debug', `Shutdown request failed: ${error instanceof Error ? error.message : error}`);
      }
      if (!this.failure) {
        try {
          await this.connection.sendNotification(ExitNotification.method);
        } catch (error) {
          this.log('debug', `Exit notification failed: ${error instanceof Error ? error.message : error}`);
        }
      }
    }
    this.rejectAll(LspError.sessionShuttingDown(this.id));
  }

  /**
   * Releases the connection, safe to call more than once
   */
  dispose(): void {
    this.closing = true;
    this.rejectAll(LspError.sessionShuttingDown(this.id));
    this.connection.dispose();
    this.notificationEmitter.dispose();
    this.failureEmitter.dispose();
  }

  private fail(error: LspError): void {
    if (this.failure) {
      return;
    }
    this.failure = error;
    this.rejectAll(error);
    this.failureEmitter.fire(error);
    this.connection.dispose();
  }

  private handleExit(info: ExitInfo): void {
    if (this.closing) {
      this.rejectAll(LspError.sessionShuttingDown(this.id));
      this.connection.dispose();
      return;
    }
    this.log('warning', `Language server exited with code ${info.code} and signal ${info.signal}.`);
    this.fail(LspError.sessionCrashed(this.id, info.code, info.signal));
  }

  private handleFramingFault(fault: FramingFault): void {
    this.log('error', `Framing fault: ${fault.message}`);
    this.fail(LspError.framingFault(fault.message));
    this.supervisor.terminate(0).catch((error: unknown) => {
      this.log('error', `Failed to kill language server after framing fault: ${error}`);
    });
  }

  private log(level: 'debug' | 'info' | 'warning' | 'error', message: string): void {
    this.logger.log({ scope: this.id, level, message });
  }

  private rejectAll(error: LspError): void {
    for (const request of [...this.pending.values()]) {
      request.reject(error);
    }
  }

  private request(method: string, params: unknown, timeoutMs: number, signal?: AbortSignal): Promise<unknown> {
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (signal?.aborted) {
      return Promise.reject(LspError.requestCancelled(method));
    }
    return new Promise<unknown>((resolve, reject) => {
      const id = ++this.nextId;
      const submittedAt = Date.now();
      const source = new CancellationTokenSource();
      let timer: NodeJS.Timeout | undefined;
      const onAbort = () => {
        source.cancel();
        settle(() => reject(LspError.requestCancelled(method)));
      };
      const settle = (action: () => void) => {
        if (!this.pending.has(id)) {
          return;
        }
        this.pending.delete(id);
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        source.dispose();
        action();
      };
      this.pending.set(id, {
        id,
        method,
        submittedAt,
        deadline: submittedAt + timeoutMs,
        reject: (error) => settle(() => reject(error))
      });
      timer = setTimeout(() => {
        source.cancel();
        settle(() => reject(LspError.requestTimeout(method, timeoutMs)));
      }, timeoutMs);
      signal?.addEventListener('abort', onAbort, { once: true });
      let response: Promise<unknown>;
      try {
        response = params === undefined
          ? this.connection.sendRequest(method, source.token)
          : this.connection.sendRequest(method, params, source.token);
      } catch (error) {
        settle(() => reject(this.connectionLoss(error)));
        return;
      }
      response.then(
        (result) => settle(() => resolve(result)),
        (error: unknown) => settle(() => reject(this.toLspError(method, error)))
      );
    });
  }

  private connectionLoss(error: unknown): LspError {
    if (this.failure) {
      return this.failure;
    }
    if (this.closing) {
      return LspError.sessionShuttingDown(this.id);
    }
    this.log('debug', `Connection lost: ${error instanceof Error ? error.message : error}`);
    return LspError.sessionCrashed(this.id, null, null);
  }

  private toLspError(method: string, error: unknown): LspError {
    if (error instanceof ResponseError) {
      if (error.code === ErrorCodes.PendingResponseRejected || error.code === ErrorCodes.MessageWriteError) {
        return this.connectionLoss(error);
      }
      return LspError.requestFailed(method, error.message, error.code, error);
    }
    if (error instanceof ConnectionError) {
      return this.connectionLoss(error);
    }
    return LspError.requestFailed(method, error instanceof Error ? error.message : String(error), undefined, error);
  }

  private setRequestHandlers(): void {
    this.connection.onRequest(ConfigurationRequest.method, (params: ConfigurationParams) => {
      return params.items.map((item: ConfigurationItem) => configurationSection(this.configuration, item.section));
    });
    this.connection.onRequest(WorkspaceFoldersRequest.method, () => {
      return [{ name: basename(this.root), uri: toUri(this.root) }];
    });
    this.connection.onRequest(RegistrationRequest.method, () => null);
    this.connection.onRequest(UnregistrationRequest.method, () => null);
    this.connection.onRequest(WorkDoneProgressCreateRequest.method, () => null);
    this.connection.onRequest(ShowMessageRequest.method, (params: ShowMessageRequestParams) => {
      this.log('info', params.message);
      return null;
    });
  }
}
