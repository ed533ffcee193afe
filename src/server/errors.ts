/**
 * Session Manager Errors
 *
 * @module server/errors
 * @license BSD-3-Clause
 */

/**
 * Error codes surfaced by the session manager
 */
export const LspErrorCode = {
  /** Executable could not be located on PATH */
  BinaryNotFound: 'BinaryNotFound',

  /** Operating system refused to launch the executable */
  SpawnFailed: 'SpawnFailed',

  /** Initialize handshake timed out, was rejected or broke the stream */
  HandshakeFailed: 'HandshakeFailed',

  /** Request deadline elapsed before a response arrived */
  RequestTimeout: 'RequestTimeout',

  /** Request was aborted by the caller */
  RequestCancelled: 'RequestCancelled',

  /** Language server answered with a JSON-RPC error */
  RequestFailed: 'RequestFailed',

  /** Language server process exited while the request was pending */
  SessionCrashed: 'SessionCrashed',

  /** Byte stream from the language server is no longer parseable */
  FramingFault: 'FramingFault',

  /** Process memory crossed the configured threshold */
  ResourceExceeded: 'ResourceExceeded',

  /** Session is being retired and takes no new requests */
  SessionShuttingDown: 'SessionShuttingDown',

  /** Every pool slot is busy */
  PoolAtCapacity: 'PoolAtCapacity',

  /** No server configuration exists for the language */
  NoServerConfigured: 'NoServerConfigured',

  /** File does not belong to any detectable project */
  NoProjectFound: 'NoProjectFound',

  /** File content could not be read */
  FileReadFailed: 'FileReadFailed',

  /** Manager was shut down */
  ManagerStopped: 'ManagerStopped'
} as const;

export type LspErrorCode = (typeof LspErrorCode)[keyof typeof LspErrorCode];

const RETRYABLE: ReadonlySet<LspErrorCode> = new Set<LspErrorCode>([
  LspErrorCode.SpawnFailed,
  LspErrorCode.HandshakeFailed,
  LspErrorCode.RequestTimeout,
  LspErrorCode.SessionCrashed,
  LspErrorCode.FramingFault,
  LspErrorCode.SessionShuttingDown,
  LspErrorCode.PoolAtCapacity
]);

/**
 * Typed error carried through every manager operation
 *
 * The `code` tells the caller whether to retry, `data` carries the context
 * needed to decide when.
 *
 * @export
 * @class LspError
 */
export class LspError extends Error {
  public readonly code: LspErrorCode;
  public readonly data?: Record<string, unknown>;
  public override readonly cause?: unknown;

  constructor(message: string, code: LspErrorCode, options?: { data?: Record<string, unknown>; cause?: unknown }) {
    super(message);
    this.name = 'LspError';
    this.code = code;
    this.data = options?.data;
    this.cause = options?.cause;
  }

  /**
   * Whether the caller may reasonably retry the same call later
   */
  get retryable(): boolean {
    return RETRYABLE.has(this.code);
  }

  /**
   * Copy of this error with extra context merged into `data`
   *
   * @param data - Additional context
   */
  withData(data: Record<string, unknown>): LspError {
    return new LspError(this.message, this.code, { data: { ...this.data, ...data }, cause: this.cause });
  }

  static binaryNotFound(command: string): LspError {
    return new LspError(
      `Language server executable '${command}' was not found in PATH.`,
      LspErrorCode.BinaryNotFound,
      { data: { command } }
    );
  }

  static spawnFailed(command: string, reason: string, cause?: unknown): LspError {
    return new LspError(
      `Failed to spawn '${command}' language server: ${reason}`,
      LspErrorCode.SpawnFailed,
      { data: { command, reason }, cause }
    );
  }

  static handshakeFailed(session: string, reason: string, cause?: unknown): LspError {
    return new LspError(
      `Initialize handshake failed for '${session}' session: ${reason}`,
      LspErrorCode.HandshakeFailed,
      { data: { session, reason }, cause }
    );
  }

  static requestTimeout(method: string, timeoutMs: number): LspError {
    return new LspError(
      `Request '${method}' timed out after ${timeoutMs}ms.`,
      LspErrorCode.RequestTimeout,
      { data: { method, timeoutMs } }
    );
  }

  static requestCancelled(method: string): LspError {
    return new LspError(
      `Request '${method}' was cancelled.`,
      LspErrorCode.RequestCancelled,
      { data: { method } }
    );
  }

  static requestFailed(method: string, reason: string, errorCode?: number, cause?: unknown): LspError {
    return new LspError(
      `Request '${method}' failed: ${reason}`,
      LspErrorCode.RequestFailed,
      { data: { method, reason, errorCode }, cause }
    );
  }

  static sessionCrashed(session: string, code: number | null, signal: string | null): LspError {
    const status = signal ? `signal ${signal}` : `exit code ${code}`;
    return new LspError(
      `Language server for '${session}' session exited with ${status}.`,
      LspErrorCode.SessionCrashed,
      { data: { session, code, signal } }
    );
  }

  static framingFault(reason: string): LspError {
    return new LspError(
      `Framing fault in language server stream: ${reason}`,
      LspErrorCode.FramingFault,
      { data: { reason } }
    );
  }

  static resourceExceeded(session: string, rssBytes: number, thresholdBytes: number): LspError {
    return new LspError(
      `Language server for '${session}' session uses ${rssBytes} bytes, above the ${thresholdBytes} bytes threshold.`,
      LspErrorCode.ResourceExceeded,
      { data: { session, rssBytes, thresholdBytes } }
    );
  }

  static sessionShuttingDown(session: string): LspError {
    return new LspError(
      `Session '${session}' is shutting down.`,
      LspErrorCode.SessionShuttingDown,
      { data: { session } }
    );
  }

  static poolAtCapacity(maxSessions: number): LspError {
    return new LspError(
      `All ${maxSessions} language server slots are busy.`,
      LspErrorCode.PoolAtCapacity,
      { data: { maxSessions } }
    );
  }

  static noServerConfigured(language: string): LspError {
    return new LspError(
      `Language server '${language}' is not configured.`,
      LspErrorCode.NoServerConfigured,
      { data: { language } }
    );
  }

  static noProjectFound(file: string): LspError {
    return new LspError(
      `File '${file}' does not belong to a configured project.`,
      LspErrorCode.NoProjectFound,
      { data: { file } }
    );
  }

  static fileReadFailed(file: string, cause?: unknown): LspError {
    return new LspError(
      `Failed to read '${file}' file: ${cause instanceof Error ? cause.message : String(cause)}`,
      LspErrorCode.FileReadFailed,
      { data: { file }, cause }
    );
  }

  static managerStopped(): LspError {
    return new LspError('Session manager is stopped.', LspErrorCode.ManagerStopped);
  }
}

/**
 * Type guard for manager errors, optionally narrowed to one code
 *
 * @param error - Value caught from a rejected promise
 * @param code - Optional code the error must carry
 */
export function isLspError(error: unknown, code?: LspErrorCode): error is LspError {
  return error instanceof LspError && (code === undefined || error.code === code);
}
