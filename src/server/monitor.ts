/**
 * Process memory sampling
 *
 * @module server/monitor
 * @license BSD-3-Clause
 */

import gracefulFs from 'graceful-fs';
import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

/**
 * Reports the resident set size of a process
 *
 * @export
 * @interface MemorySampler
 */
export interface MemorySampler {
  /**
   * @param pid - Operating system process id
   * @returns RSS in bytes, or undefined when the process cannot be sampled
   */
  sample(pid: number): Promise<number | undefined>;
}

const execFileAsync = promisify(execFile);
const readFileAsync = promisify(gracefulFs.readFile);

/**
 * Parses the `VmRSS` line of `/proc/<pid>/status`
 *
 * @param status - File content
 * @returns RSS in bytes, or undefined when the line is missing
 */
export function parseProcStatus(status: string): number | undefined {
  const match = /^VmRSS:\s+(\d+)\s+kB$/m.exec(status);
  return match ? Number.parseInt(match[1], 10) * 1024 : undefined;
}

/**
 * Parses the output of `ps -o rss= -p <pid>`
 *
 * @param output - Command output
 * @returns RSS in bytes, or undefined when empty
 */
export function parsePsOutput(output: string): number | undefined {
  const value = output.trim();
  return /^\d+$/.test(value) ? Number.parseInt(value, 10) * 1024 : undefined;
}

/**
 * Samples memory from `/proc` on Linux and from `ps` elsewhere
 *
 * @export
 * @class ProcessMemorySampler
 */
export class ProcessMemorySampler implements MemorySampler {
  async sample(pid: number): Promise<number | undefined> {
    if (process.platform === 'linux') {
      try {
        return parseProcStatus(await readFileAsync(`/proc/${pid}/status`, 'utf8'));
      } catch {
        return undefined;
      }
    }
    try {
      const { stdout } = await execFileAsync('ps', ['-o', 'rss=', '-p', String(pid)]);
      return parsePsOutput(stdout);
    } catch {
      return undefined;
    }
  }
}
