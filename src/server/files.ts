/**
 * File access helpers
 *
 * @module server/files
 * @license BSD-3-Clause
 */

import gracefulFs from 'graceful-fs';
import { createHash } from 'node:crypto';
import { constants } from 'node:fs';
import { delimiter, isAbsolute, join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { promisify } from 'node:util';
import { LspError } from './errors.js';

/**
 * Source of file content for requests
 *
 * @export
 * @interface FileProvider
 */
export interface FileProvider {
  read(file: string): Promise<string>;
}

/**
 * Reads file content from disk
 *
 * @export
 * @class DiskFileProvider
 */
export class DiskFileProvider implements FileProvider {
  private readonly readFileAsync = promisify(gracefulFs.readFile);

  /**
   * Reads a file as UTF-8 text
   *
   * @param file - Absolute file path
   * @throws {LspError} FileReadFailed when the file cannot be read
   */
  async read(file: string): Promise<string> {
    try {
      return await this.readFileAsync(file, 'utf8');
    } catch (error) {
      throw LspError.fileReadFailed(file, error);
    }
  }
}

/**
 * Content fingerprint used by the cache and the document synchronizer
 *
 * @param content - File text
 * @returns Hex encoded SHA-256 digest
 */
export function fingerprint(content: string): string {
  return createHash('sha256').update(content, 'utf8').digest('hex');
}

/**
 * Converts a file path to a `file://` URI
 *
 * @param file - Absolute or relative file path
 */
export function toUri(file: string): string {
  return pathToFileURL(resolve(file)).toString();
}

const accessAsync = promisify(gracefulFs.access);

async function isExecutable(file: string): Promise<boolean> {
  try {
    await accessAsync(file, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Locates an executable the way a shell would
 *
 * Commands containing a path separator are checked as given, bare names are
 * searched in every `PATH` directory.
 *
 * @param command - Executable name or path
 * @param env - Environment holding `PATH`
 * @returns Absolute path, or undefined when nothing executable matches
 */
export async function findExecutable(command: string, env: NodeJS.ProcessEnv = process.env): Promise<string | undefined> {
  if (isAbsolute(command) || command.includes('/')) {
    const candidate = resolve(command);
    return await isExecutable(candidate) ? candidate : undefined;
  }
  const directories = (env.PATH ?? '').split(delimiter).filter(Boolean);
  const extensions = process.platform === 'win32' ? (env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';') : [''];
  for (const directory of directories) {
    for (const extension of extensions) {
      const candidate = join(directory, command + extension);
      if (await isExecutable(candidate)) {
        return candidate;
      }
    }
  }
  return undefined;
}
