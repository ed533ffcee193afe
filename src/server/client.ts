/**
 * Code Intelligence Client
 *
 * @module server/client
 * @license BSD-3-Clause
 */

import gracefulFs from 'graceful-fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  CompletionParams,
  CompletionRequest,
  DefinitionRequest,
  Diagnostic,
  DocumentSymbolParams,
  DocumentSymbolRequest,
  HoverRequest,
  ReferenceParams,
  ReferencesRequest,
  ServerCapabilities,
  TextDocumentPositionParams,
  WorkspaceSymbolParams,
  WorkspaceSymbolRequest
} from 'vscode-languageserver-protocol';
import { CacheStats } from './cache.js';
import { Config } from './config.js';
import { canonicalPath, DetectedProject, ProjectDetector } from './detector.js';
import { LspError } from './errors.js';
import { toUri } from './files.js';
import { SessionManager } from './manager.js';
import { ProjectKey, SessionStatus } from './types.js';

/**
 * Standardized response format for MCP tool execution
 *
 * @property content - Response content array with text type
 * @property isError - Set when the tool failed
 */
export type Response = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

/**
 * Session status with the capabilities its server announced
 */
export type SessionDetails = SessionStatus & { capabilities?: ServerCapabilities };

/**
 * Every known session with the response cache counters
 */
export interface PoolOverview {
  cache: CacheStats;
  sessions: SessionStatus[];
}

/**
 * Cursor position inside a file, zero based
 *
 * @export
 * @interface Position
 */
export interface Position {
  file: string;
  line: number;
  character: number;
}

/**
 * Code intelligence operations on top of the session manager
 *
 * Resolves the project owning a file, builds LSP parameters and picks the
 * dispatch priority of each operation.
 *
 * @export
 * @class Client
 */
export class Client {
  private readonly config: Config;
  private readonly detector: ProjectDetector;
  private readonly manager: SessionManager;

  /**
   * @param config - Validated configuration
   * @param manager - Session manager
   * @param detector - Project detector, built from config when omitted
   */
  constructor(config: Config, manager: SessionManager, detector?: ProjectDetector) {
    this.config = config;
    this.manager = manager;
    this.detector = detector ?? new ProjectDetector(config);
  }

  /**
   * Reads the package version next to the sources
   *
   * @returns Package version, or `0.0.0` when unreadable
   */
  static version(): string {
    try {
      const packagePath = join(dirname(fileURLToPath(import.meta.url)), '../../package.json');
      const packageJson: unknown = JSON.parse(gracefulFs.readFileSync(packagePath, 'utf8'));
      if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson
        && typeof packageJson.version === 'string') {
        return packageJson.version;
      }
    } catch (error) {
      console.error('Failed to read package.json version:', error);
    }
    return '0.0.0';
  }

  /**
   * Formats a tool response
   *
   * @param message - Text, or any value serialized as JSON
   * @param isError - Whether the response reports a failure
   */
  static response(message: unknown, isError: boolean = false): Response {
    const text = typeof message === 'string' ? message : JSON.stringify(message, null, 2);
    const result: Response = { content: [{ type: 'text', text }] };
    if (isError) {
      result.isError = true;
    }
    return result;
  }

  /**
   * Project key of the session owning a file
   *
   * @param file - Absolute file path
   * @throws {LspError} NoServerConfigured or NoProjectFound
   */
  async resolveKey(file: string): Promise<ProjectKey> {
    return await this.detector.detect(file);
  }

  async completions(position: Position): Promise<unknown> {
    const key = await this.resolveKey(position.file);
    const params: CompletionParams = this.positionParams(position);
    return await this.manager.submit(key, CompletionRequest.method, params, { file: position.file, priority: 'critical' });
  }

  async definitions(position: Position): Promise<unknown> {
    const key = await this.resolveKey(position.file);
    const params: TextDocumentPositionParams = this.positionParams(position);
    return await this.manager.submit(key, DefinitionRequest.method, params, { file: position.file, priority: 'high' });
  }

  /**
   * Latest diagnostics published for a file
   *
   * @param file - Absolute file path
   */
  async diagnostics(file: string): Promise<Diagnostic[]> {
    const key = await this.resolveKey(file);
    return await this.manager.diagnostics(key, file);
  }

  async documentSymbols(file: string): Promise<unknown> {
    const key = await this.resolveKey(file);
    const params: DocumentSymbolParams = { textDocument: { uri: toUri(file) } };
    return await this.manager.submit(key, DocumentSymbolRequest.method, params, { file, priority: 'normal' });
  }

  async hover(position: Position): Promise<unknown> {
    const key = await this.resolveKey(position.file);
    const params: TextDocumentPositionParams = this.positionParams(position);
    return await this.manager.submit(key, HoverRequest.method, params, { file: position.file, priority: 'critical' });
  }

  async references(position: Position, includeDeclaration: boolean): Promise<unknown> {
    const key = await this.resolveKey(position.file);
    const params: ReferenceParams = { ...this.positionParams(position), context: { includeDeclaration } };
    return await this.manager.submit(key, ReferencesRequest.method, params, { file: position.file, priority: 'normal' });
  }

  /**
   * Searches symbols across a project
   *
   * @param language - Configured language name
   * @param query - Symbol name filter
   * @param root - Project root, the first detected project of the language when omitted
   */
  async workspaceSymbols(language: string, query: string, root?: string): Promise<unknown> {
    const key = await this.projectKey(language, root);
    const params: WorkspaceSymbolParams = { query };
    return await this.manager.submit(key, WorkspaceSymbolRequest.method, params, { priority: 'low' });
  }

  /**
   * Lists detected projects, optionally for one language
   *
   * @param language - Optional language filter
   */
  async projects(language?: string): Promise<DetectedProject[]> {
    const projects = await this.detector.findProjects();
    return language ? projects.filter((project) => project.key.language === language) : projects;
  }

  /**
   * Status of one session with its server capabilities, or of every known session with the cache counters
   *
   * @param language - Optional language name
   * @param root - Optional project root
   */
  async status(language?: string, root?: string): Promise<SessionDetails | PoolOverview> {
    if (!language) {
      return { cache: this.manager.cacheStats(), sessions: this.manager.statuses() };
    }
    const key = await this.projectKey(language, root);
    return { ...this.manager.status(key), capabilities: this.manager.capabilities(key) };
  }

  async restart(language: string, root?: string): Promise<SessionStatus> {
    return await this.manager.forceRestart(await this.projectKey(language, root));
  }

  async stop(language: string, root?: string): Promise<boolean> {
    return await this.manager.forceStop(await this.projectKey(language, root));
  }

  /**
   * Reports an external change or deletion of a file
   *
   * @param file - Absolute file path
   * @param deleted - Whether the file was removed
   * @param content - New content, when known
   */
  fileChanged(file: string, deleted: boolean, content?: string): void {
    if (deleted) {
      this.manager.notifyFileDeleted(file);
      return;
    }
    this.manager.notifyFileChanged(file, content);
  }

  private positionParams(position: Position): TextDocumentPositionParams {
    return {
      position: { character: position.character, line: position.line },
      textDocument: { uri: toUri(position.file) }
    };
  }

  private async projectKey(language: string, root?: string): Promise<ProjectKey> {
    if (!this.config.hasServerConfig(language)) {
      throw LspError.noServerConfigured(language);
    }
    if (root) {
      return { root: await canonicalPath(root), language };
    }
    const [project] = await this.projects(language);
    if (project) {
      return project.key;
    }
    const configured = this.config.getRoot();
    if (configured) {
      return { root: await canonicalPath(configured), language };
    }
    throw LspError.noProjectFound(language);
  }
}
