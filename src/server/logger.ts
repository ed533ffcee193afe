/**
 * Logging utility for MCP server
 *
 * @module server/logger
 * @license BSD-3-Clause
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { LOGGING_LEVELS, LoggingLevel } from './config.js';

/**
 * Log message parameters
 *
 * @interface LogMessage
 * @property scope - Component or session the message is about
 * @property level - Log severity level
 * @property message - Log message content
 */
export interface LogMessage {
  scope: string;
  level: LoggingLevel;
  message: string;
}

/**
 * Logger for MCP server with severity-based filtering
 *
 * Messages travel as MCP logging notifications, the `scope` becomes the
 * notification's `logger` field. Without a server the logger only filters.
 *
 * @export
 * @class Logger
 */
export class Logger {
  private readonly level: LoggingLevel;
  private readonly server?: Server;

  /**
   * Creates a new Logger instance
   *
   * @param level - Lowest severity that is emitted
   * @param server - Optional MCP server used to send log messages
   */
  constructor(level: LoggingLevel, server?: Server) {
    this.level = level;
    this.server = server;
  }

  /**
   * Whether a message of this severity passes the configured threshold
   *
   * @param level - Message severity
   */
  enabled(level: LoggingLevel): boolean {
    return LOGGING_LEVELS.indexOf(level) >= LOGGING_LEVELS.indexOf(this.level);
  }

  /**
   * Sends structured logging message via MCP protocol
   *
   * Delivery failures are reported on stderr, never thrown back to the caller.
   *
   * @param args - Log message parameters
   */
  log(args: LogMessage): void {
    if (!this.server || !this.enabled(args.level)) {
      return;
    }
    this.server.sendLoggingMessage({
      level: args.level,
      logger: args.scope,
      data: args.message
    }).catch((error: unknown) => {
      console.error(`Failed to send '${args.level}' log message:`, error);
    });
  }
}
