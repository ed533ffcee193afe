/**
 * Document Synchronizer
 *
 * @module server/documents
 * @license BSD-3-Clause
 */

import { extname } from 'node:path';
import {
  DidChangeTextDocumentNotification,
  DidChangeTextDocumentParams,
  DidCloseTextDocumentNotification,
  DidCloseTextDocumentParams,
  DidOpenTextDocumentNotification,
  DidOpenTextDocumentParams
} from 'vscode-languageserver-protocol';
import { fingerprint, toUri } from './files.js';

/**
 * Document the server currently holds open
 *
 * @export
 * @interface OpenDocument
 */
export interface OpenDocument {
  uri: string;
  languageId: string;
  version: number;
  fingerprint: string;
}

/**
 * Notification sink, normally a protocol session
 */
export interface NotificationSink {
  notify(method: string, params?: unknown): void;
}

export type SyncResult = 'opened' | 'changed' | 'unchanged';

/**
 * Keeps the server's view of open files in step with their content
 *
 * @export
 * @class DocumentSynchronizer
 */
export class DocumentSynchronizer {
  private readonly documents = new Map<string, OpenDocument>();

  /**
   * @param sink - Where notifications are sent
   * @param language - Fallback language identifier
   * @param languageIds - Language identifiers keyed by file extension
   */
  constructor(
    private readonly sink: NotificationSink,
    private readonly language: string,
    private readonly languageIds: Record<string, string> = {}
  ) { }

  /**
   * Number of open documents
   */
  get size(): number {
    return this.documents.size;
  }

  /**
   * Makes sure the server sees the given content for a file
   *
   * @param file - Absolute file path
   * @param content - Current file text
   * @returns What was sent: didOpen, didChange or nothing
   */
  ensureOpen(file: string, content: string): SyncResult {
    const digest = fingerprint(content);
    const document = this.documents.get(file);
    if (!document) {
      const opened: OpenDocument = {
        uri: toUri(file),
        languageId: this.languageIds[extname(file)] ?? this.language,
        version: 1,
        fingerprint: digest
      };
      this.documents.set(file, opened);
      const params: DidOpenTextDocumentParams = {
        textDocument: { uri: opened.uri, languageId: opened.languageId, version: opened.version, text: content }
      };
      this.sink.notify(DidOpenTextDocumentNotification.method, params);
      return 'opened';
    }
    if (document.fingerprint === digest) {
      return 'unchanged';
    }
    document.version += 1;
    document.fingerprint = digest;
    const params: DidChangeTextDocumentParams = {
      textDocument: { uri: document.uri, version: document.version },
      contentChanges: [{ text: content }]
    };
    this.sink.notify(DidChangeTextDocumentNotification.method, params);
    return 'changed';
  }

  /**
   * Closes a document if it is open
   *
   * @param file - Absolute file path
   * @returns Whether a didClose was sent
   */
  close(file: string): boolean {
    const document = this.documents.get(file);
    if (!document) {
      return false;
    }
    this.documents.delete(file);
    const params: DidCloseTextDocumentParams = { textDocument: { uri: document.uri } };
    this.sink.notify(DidCloseTextDocumentNotification.method, params);
    return true;
  }

  get(file: string): OpenDocument | undefined {
    return this.documents.get(file);
  }

  isOpen(file: string): boolean {
    return this.documents.has(file);
  }

  /**
   * Forgets every document without notifying, used at teardown
   */
  clear(): void {
    this.documents.clear();
  }
}
