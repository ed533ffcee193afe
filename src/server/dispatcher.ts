/**
 * Priority Request Dispatcher
 *
 * @module server/dispatcher
 * @license BSD-3-Clause
 */

import { Emitter, Event } from 'vscode-jsonrpc/node.js';
import { LspError } from './errors.js';
import { Priority, PRIORITIES } from './types.js';

/**
 * Dispatch options of one request
 *
 * @export
 * @interface DispatchOptions
 * @property priority - Queue tier
 * @property method - LSP method name used in errors
 * @property deadline - Epoch milliseconds covering queue wait and round trip
 * @property timeoutMs - Original timeout reported on expiry
 * @property signal - Optional abort signal
 */
export interface DispatchOptions {
  priority: Priority;
  method: string;
  deadline: number;
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Work run once a slot is free, receives the time left before the deadline
 */
export type DispatchTask<T> = (remainingMs: number) => Promise<T>;

interface QueuedTask {
  start: () => void;
  reject: (error: LspError) => void;
}

/**
 * Per-session priority queue
 *
 * Tiers are served strictly in order `critical`, `high`, `normal`, `low`,
 * first in first out within a tier, with at most `maxConcurrent` tasks running.
 *
 * @export
 * @class PriorityDispatcher
 */
export class PriorityDispatcher {
  private closed?: LspError;
  private readonly idleEmitter = new Emitter<void>();
  private readonly maxConcurrent: number;
  private readonly now: () => number;
  private readonly queues: Record<Priority, QueuedTask[]> = { critical: [], high: [], normal: [], low: [] };
  private running = 0;

  /**
   * @param maxConcurrent - Tasks allowed to run at once
   * @param now - Clock, defaults to `Date.now`
   */
  constructor(maxConcurrent: number, now: () => number = Date.now) {
    this.maxConcurrent = Math.max(1, maxConcurrent);
    this.now = now;
  }

  /**
   * Tasks waiting for a slot
   */
  get queued(): number {
    return PRIORITIES.reduce((total, priority) => total + this.queues[priority].length, 0);
  }

  /**
   * Tasks currently running
   */
  get active(): number {
    return this.running;
  }

  /**
   * Queued and running tasks together
   */
  get size(): number {
    return this.queued + this.running;
  }

  /**
   * Fires when a finished task leaves nothing queued or running
   */
  get onIdle(): Event<void> {
    return this.idleEmitter.event;
  }

  /**
   * Enqueues a task
   *
   * @param options - Priority, deadline and cancellation
   * @param task - Work to run once dispatched
   * @throws {LspError} RequestTimeout when the deadline passes in the queue, RequestCancelled on abort
   */
  submit<T>(options: DispatchOptions, task: DispatchTask<T>): Promise<T> {
    if (this.closed) {
      return Promise.reject(this.closed);
    }
    if (options.signal?.aborted) {
      return Promise.reject(LspError.requestCancelled(options.method));
    }
    if (options.deadline <= this.now()) {
      return Promise.reject(LspError.requestTimeout(options.method, options.timeoutMs));
    }
    return new Promise<T>((resolve, reject) => {
      const queue = this.queues[options.priority];
      let settled = false;
      let timer: NodeJS.Timeout | undefined;
      const finish = (action: () => void) => {
        if (settled) {
          return;
        }
        settled = true;
        action();
      };
      const onAbort = () => {
        dequeue();
        detach();
        finish(() => reject(LspError.requestCancelled(options.method)));
      };
      const detach = () => {
        clearTimeout(timer);
        options.signal?.removeEventListener('abort', onAbort);
      };
      const dequeue = () => {
        const index = queue.indexOf(entry);
        if (index !== -1) {
          queue.splice(index, 1);
        }
      };
      const entry: QueuedTask = {
        start: () => {
          const remaining = options.deadline - this.now();
          if (remaining <= 0) {
            detach();
            finish(() => reject(LspError.requestTimeout(options.method, options.timeoutMs)));
            return;
          }
          clearTimeout(timer);
          this.running++;
          let result: Promise<T>;
          try {
            result = task(remaining);
          } catch (error) {
            result = Promise.reject(error);
          }
          void result.then(
            (value) => finish(() => resolve(value)),
            (error: unknown) => finish(() => reject(error))
          ).finally(() => {
            options.signal?.removeEventListener('abort', onAbort);
            this.running--;
            this.drain();
            if (this.size === 0) {
              this.idleEmitter.fire();
            }
          });
        },
        reject: (error) => {
          detach();
          finish(() => reject(error));
        }
      };
      timer = setTimeout(() => {
        dequeue();
        options.signal?.removeEventListener('abort', onAbort);
        finish(() => reject(LspError.requestTimeout(options.method, options.timeoutMs)));
      }, options.deadline - this.now());
      options.signal?.addEventListener('abort', onAbort, { once: true });
      queue.push(entry);
      this.drain();
    });
  }

  /**
   * Rejects queued tasks and every later submission
   *
   * @param error - Error given to queued and future callers
   */
  close(error: LspError): void {
    this.closed ??= error;
    this.rejectQueued(error);
  }

  /**
   * Rejects queued tasks, running ones are left alone
   *
   * @param error - Error given to queued callers
   */
  rejectQueued(error: LspError): void {
    for (const priority of PRIORITIES) {
      const queue = this.queues[priority].splice(0);
      for (const entry of queue) {
        entry.reject(error);
      }
    }
  }

  private drain(): void {
    while (this.running < this.maxConcurrent) {
      const next = this.next();
      if (!next) {
        return;
      }
      next.start();
    }
  }

  private next(): QueuedTask | undefined {
    for (const priority of PRIORITIES) {
      const entry = this.queues[priority].shift();
      if (entry) {
        return entry;
      }
    }
    return undefined;
  }
}
