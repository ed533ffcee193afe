/**
 * Project Detector
 *
 * @module server/detector
 * @license BSD-3-Clause
 */

import fg from 'fast-glob';
import gracefulFs from 'graceful-fs';
import { basename, dirname, extname, isAbsolute, join, relative, resolve, sep } from 'node:path';
import { promisify } from 'node:util';
import { Config } from './config.js';
import { LspError } from './errors.js';
import { ProjectKey } from './types.js';

/**
 * Project found under the workspace root
 *
 * @export
 * @interface DetectedProject
 * @property key - Project key
 * @property marker - Marker file name that identified the project
 */
export interface DetectedProject {
  key: ProjectKey;
  marker: string;
}

const EXCLUDES = [
  'bin', 'build', 'cache', 'coverage', 'dist', 'log', 'node_modules', 'obj', 'out', 'target', 'temp', 'tmp', 'venv'
];

const accessAsync = promisify(gracefulFs.access);
const realpathAsync = promisify(gracefulFs.realpath);

/**
 * Resolves a path to its canonical form, keeping it as is when missing
 *
 * @param path - Absolute or relative path
 */
export async function canonicalPath(path: string): Promise<string> {
  const absolute = resolve(path);
  try {
    return await realpathAsync(absolute);
  } catch {
    return absolute;
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await accessAsync(path);
    return true;
  } catch {
    return false;
  }
}

function contains(root: string, file: string): boolean {
  const path = relative(root, file);
  return path === '' || (!path.startsWith('..') && !isAbsolute(path));
}

/**
 * Maps files to project roots using marker files
 *
 * @export
 * @class ProjectDetector
 */
export class ProjectDetector {
  private readonly config: Config;

  /**
   * @param config - Validated configuration
   */
  constructor(config: Config) {
    this.config = config;
  }

  /**
   * Language configured for a file extension
   *
   * @param file - File path
   * @returns Language name, or undefined when no server handles the extension
   */
  languageFor(file: string): string | undefined {
    const extension = extname(file);
    return this.config.getServers().find((language) =>
      this.config.getServerConfig(language)?.extensions.includes(extension)
    );
  }

  /**
   * Finds the project owning a file
   *
   * The nearest ancestor directory holding one of the language's markers
   * wins. Without one, the configured workspace root is used when it contains
   * the file.
   *
   * @param file - Absolute file path
   * @throws {LspError} NoServerConfigured or NoProjectFound
   */
  async detect(file: string): Promise<ProjectKey> {
    const language = this.languageFor(file);
    if (!language) {
      throw LspError.noServerConfigured(extname(file) || basename(file));
    }
    const markers = this.config.getServerConfig(language)?.markers ?? [];
    const path = await canonicalPath(file);
    let directory = dirname(path);
    for (;;) {
      for (const marker of markers) {
        if (await exists(join(directory, marker))) {
          return { root: directory, language };
        }
      }
      const parent = dirname(directory);
      if (parent === directory) {
        break;
      }
      directory = parent;
    }
    const root = this.config.getRoot();
    if (root) {
      const canonicalRoot = await canonicalPath(root);
      if (contains(canonicalRoot, path)) {
        return { root: canonicalRoot, language };
      }
    }
    throw LspError.noProjectFound(file);
  }

  /**
   * Lists every project under a directory
   *
   * @param root - Directory to search, defaults to the configured root
   * @returns Projects sorted by root path
   */
  async findProjects(root?: string): Promise<DetectedProject[]> {
    const directory = root ?? this.config.getRoot();
    if (!directory) {
      return [];
    }
    const cwd = await canonicalPath(directory);
    const languages = new Map<string, string[]>();
    for (const language of this.config.getServers()) {
      for (const marker of this.config.getServerConfig(language)?.markers ?? []) {
        languages.set(marker, [...(languages.get(marker) ?? []), language]);
      }
    }
    if (languages.size === 0) {
      return [];
    }
    const patterns = [...languages.keys()].map((marker) => `**/${marker}`);
    const ignore = ['**/.*', ...EXCLUDES.map((pattern) => `**/${pattern}`)];
    const files = await fg(patterns, { cwd, absolute: true, deep: 10, ignore, onlyFiles: true });
    const projects = new Map<string, DetectedProject>();
    for (const file of files) {
      const marker = basename(file);
      const projectRoot = dirname(file).split('/').join(sep);
      for (const language of languages.get(marker) ?? []) {
        const id = `${language}:${projectRoot}`;
        if (!projects.has(id)) {
          projects.set(id, { key: { root: projectRoot, language }, marker });
        }
      }
    }
    return [...projects.values()].sort((a, b) =>
      a.key.root === b.key.root ? a.key.language.localeCompare(b.key.language) : a.key.root < b.key.root ? -1 : 1
    );
  }
}
