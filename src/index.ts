#!/usr/bin/env node
/**
 * MCP Server Entry Point
 *
 * @module index
 * @license BSD-3-Clause
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Config } from './server/config.js';
import { McpServer } from './server/mcp.js';

/**
 * Checks if an error is a broken pipe left behind by a disconnected client
 *
 * @param err - Error object to classify
 */
function isEpipeError(err: unknown): boolean {
  if (!(err instanceof Error)) {
    return false;
  }
  return err.message.includes('EPIPE') || ('code' in err && err.code === 'EPIPE');
}

/**
 * Starts the MCP server on stdio
 *
 * Requires `LSP_FILE_PATH` to name the JSON configuration file. Language
 * server sessions are stopped gracefully on SIGINT, SIGTERM and when stdin
 * closes.
 */
async function main(): Promise<void> {
  process.on('uncaughtException', (error) => {
    if (isEpipeError(error)) {
      console.error('EPIPE error caught, continuing operation.');
      return;
    }
    console.error('Fatal error:', error);
    process.exit(1);
  });
  process.on('unhandledRejection', (reason) => {
    if (isEpipeError(reason)) {
      console.error('EPIPE rejection caught, continuing operation.');
      return;
    }
    console.error('Unhandled rejection:', reason);
  });
  const filePath = process.env.LSP_FILE_PATH;
  if (!filePath) {
    console.error('Please set LSP_FILE_PATH environment variable.');
    process.exit(1);
  }
  const mcpServer = new McpServer(Config.validate(filePath));
  let closing: Promise<void> | undefined;
  const shutdown = (): void => {
    closing ??= mcpServer.close()
      .catch((error: unknown) => {
        console.error('Failed to stop language servers:', error);
      })
      .finally(() => process.exit(0));
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
  process.stdin.on('end', shutdown);
  await mcpServer.connect(new StdioServerTransport());
}

main().catch((error: unknown) => {
  console.error('Fatal error in main():', error);
  process.exit(1);
});
