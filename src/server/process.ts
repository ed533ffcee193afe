/**
 * Language Server Process Supervisor
 *
 * @module server/process
 * @license BSD-3-Clause
 */

import { spawn } from 'node:child_process';
import { EventEmitter } from 'node:events';
import type { Readable, Writable } from 'node:stream';
import { LspError } from './errors.js';
import { findExecutable } from './files.js';

/**
 * Child process surface used by the supervisor
 *
 * Matches `ChildProcess` so tests can supply an in-process stand-in.
 *
 * @export
 * @interface ChildProcessLike
 */
export interface ChildProcessLike extends EventEmitter {
  readonly pid?: number;
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

/**
 * Process launch parameters
 *
 * @export
 * @interface LaunchSpec
 */
export interface LaunchSpec {
  command: string;
  args: string[];
  cwd: string;
  env?: Record<string, string>;
}

export type ProcessLauncher = (command: string, args: string[], options: { cwd: string; env: NodeJS.ProcessEnv }) => ChildProcessLike;

export type ExecutableLocator = (command: string, env: NodeJS.ProcessEnv) => Promise<string | undefined>;

/**
 * Exit status of a reaped process
 */
export interface ExitInfo {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export const defaultLauncher: ProcessLauncher = (command, args, options) =>
  spawn(command, args, { cwd: options.cwd, env: options.env, stdio: ['pipe', 'pipe', 'pipe'] });

/**
 * Supervises one language server process
 *
 * @export
 * @class ProcessSupervisor
 */
export class ProcessSupervisor {
  private readonly exited: Promise<ExitInfo>;
  private exitInfo?: ExitInfo;
  private terminating?: Promise<ExitInfo>;

  private constructor(
    readonly child: ChildProcessLike,
    readonly stdin: Writable,
    readonly stdout: Readable,
    readonly command: string
  ) {
    this.exited = new Promise<ExitInfo>((resolve) => {
      const done = (code: number | null, signal: NodeJS.Signals | null) => {
        this.exitInfo ??= { code, signal };
        resolve(this.exitInfo);
      };
      if (child.exitCode !== null || child.signalCode !== null) {
        done(child.exitCode, child.signalCode);
        return;
      }
      child.once('exit', done);
    });
  }

  /**
   * Spawns a language server process
   *
   * @param launch - Command, arguments, working directory and extra environment
   * @param options - Optional launcher and executable locator seams
   * @throws {LspError} BinaryNotFound when the command is not on PATH, SpawnFailed otherwise
   */
  static async spawn(
    launch: LaunchSpec,
    options: { launcher?: ProcessLauncher; locate?: ExecutableLocator; onStderr?: (line: string) => void } = {}
  ): Promise<ProcessSupervisor> {
    const env: NodeJS.ProcessEnv = { ...process.env, ...launch.env };
    const locate = options.locate ?? findExecutable;
    const executable = await locate(launch.command, env);
    if (!executable) {
      throw LspError.binaryNotFound(launch.command);
    }
    const launcher = options.launcher ?? defaultLauncher;
    let child: ChildProcessLike;
    try {
      child = launcher(executable, launch.args, { cwd: launch.cwd, env });
    } catch (error) {
      throw ProcessSupervisor.launchError(launch.command, error);
    }
    await new Promise<void>((resolve, reject) => {
      const onSpawn = () => {
        child.off('error', onError);
        resolve();
      };
      const onError = (error: Error) => {
        child.off('spawn', onSpawn);
        reject(ProcessSupervisor.launchError(launch.command, error));
      };
      child.once('spawn', onSpawn);
      child.once('error', onError);
    });
    if (!child.stdin || !child.stdout) {
      child.kill('SIGKILL');
      throw LspError.spawnFailed(launch.command, 'stdio pipes are not available');
    }
    child.on('error', (error: Error) => options.onStderr?.(`process error: ${error.message}`));
    if (child.stderr && options.onStderr) {
      const onStderr = options.onStderr;
      child.stderr.setEncoding('utf8');
      child.stderr.on('data', (chunk: string) => {
        for (const line of chunk.split(/\r?\n/)) {
          if (line.trim()) {
            onStderr(line);
          }
        }
      });
    }
    return new ProcessSupervisor(child, child.stdin, child.stdout, launch.command);
  }

  private static launchError(command: string, error: unknown): LspError {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return LspError.binaryNotFound(command);
    }
    return LspError.spawnFailed(command, error instanceof Error ? error.message : String(error), error);
  }

  /**
   * Operating system process id
   */
  get pid(): number | undefined {
    return this.child.pid;
  }

  /**
   * Whether the process has not exited yet
   */
  get running(): boolean {
    return this.exitInfo === undefined;
  }

  /**
   * One-shot exit notification
   *
   * @returns Promise resolved with the exit status once the process is reaped
   */
  exitSignal(): Promise<ExitInfo> {
    return this.exited;
  }

  /**
   * Waits a bounded time for the process to exit on its own
   *
   * @param timeoutMs - Maximum wait
   * @returns Exit status, or undefined when still running after the wait
   */
  async waitForExit(timeoutMs: number): Promise<ExitInfo | undefined> {
    if (this.exitInfo) {
      return this.exitInfo;
    }
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<undefined>((resolve) => {
      timer = setTimeout(() => resolve(undefined), timeoutMs);
    });
    try {
      return await Promise.race([this.exited, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Stops the process, SIGTERM first and SIGKILL after the grace period
   *
   * Safe to call repeatedly, every call resolves with the same exit status.
   *
   * @param graceMs - Time allowed between SIGTERM and SIGKILL
   */
  terminate(graceMs: number): Promise<ExitInfo> {
    if (this.exitInfo) {
      return Promise.resolve(this.exitInfo);
    }
    this.terminating ??= (async () => {
      this.child.kill('SIGTERM');
      const exited = await this.waitForExit(graceMs);
      if (exited) {
        return exited;
      }
      this.child.kill('SIGKILL');
      return await this.exited;
    })();
    return this.terminating;
  }
}
