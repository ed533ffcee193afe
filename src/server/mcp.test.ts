/**
 * MCP Server tests
 *
 * @module server/mcp.test
 * @license BSD-3-Clause
 */

import { Client as McpClient } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import gracefulFs from 'graceful-fs';
import { mkdtempSync, realpathSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';
import { Config } from './config.js';
import { McpServer } from './mcp.js';
import { createFakeLauncher, FakeLauncher, fakeLocate } from './test-fixtures.js';

const ToolResult = z.object({
  content: z.array(z.object({ type: z.literal('text'), text: z.string() })),
  isError: z.boolean().optional()
});

/**
 * Text and error flag of a tool result
 */
function parseResult(result: unknown): { text: string; isError: boolean } {
  const parsed = ToolResult.parse(result);
  return { text: parsed.content.map((item) => item.text).join('\n'), isError: parsed.isError ?? false };
}

describe('McpServer', () => {
  let client: McpClient;
  let fake: FakeLauncher;
  let root: string;
  let server: McpServer;

  function write(path: string, content: string): void {
    const file = join(root, path);
    gracefulFs.mkdirSync(dirname(file), { recursive: true });
    gracefulFs.writeFileSync(file, content);
  }

  beforeEach(async () => {
    root = realpathSync(mkdtempSync(join(tmpdir(), 'lsp-mcp-')));
    write('Cargo.toml', '[package]');
    write('src/lib.rs', 'pub fn run() {}');
    write('README.md', '# app');
    fake = createFakeLauncher({ handlers: { 'textDocument/hover': () => ({ contents: 'pub fn run()' }) } });
    const config = Config.fromObject({
      root,
      servers: { rust: { command: 'fake-ls', extensions: ['.rs'], markers: ['Cargo.toml'] } },
      settings: { idleMonitor: false, resourceMonitor: false, settleDelayMs: 0, shutdownTimeoutMs: 200 }
    });
    server = new McpServer(config, { launcher: fake.launcher, locate: fakeLocate });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    client = new McpClient({ name: 'test-client', version: '1.0.0' });
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
    rmSync(root, { recursive: true, force: true });
  });

  it('lists every tool', async () => {
    const { tools } = await client.listTools();
    expect(tools.map((tool) => tool.name)).toEqual([
      'get_completions',
      'get_diagnostics',
      'get_hover',
      'get_project_symbols',
      'get_server_projects',
      'get_server_status',
      'get_symbol_definitions',
      'get_symbol_references',
      'get_symbols',
      'notify_file_changed',
      'restart_server',
      'stop_server'
    ]);
  });

  it('answers hover requests through a language server session', async () => {
    const result = parseResult(await client.callTool({
      name: 'get_hover',
      arguments: { file_path: 'src/lib.rs', line: 0, character: 7 }
    }));
    expect(result.isError).toBe(false);
    expect(JSON.parse(result.text)).toEqual({ contents: 'pub fn run()' });
    expect(fake.servers[0]?.received('textDocument/hover')[0]?.params).toEqual({
      position: { character: 7, line: 0 },
      textDocument: { uri: `file://${root}/src/lib.rs` }
    });
    expect(server.sessions.status({ root, language: 'rust' }).state).toBe('Ready');
  });

  it('rejects invalid arguments', async () => {
    const result = parseResult(await client.callTool({ name: 'get_hover', arguments: { file_path: 'src/lib.rs', line: 0 } }));
    expect(result.isError).toBe(true);
    expect(result.text).toMatch(/^Invalid arguments: character: /);
  });

  it('reports manager failures with their error code', async () => {
    const result = parseResult(await client.callTool({
      name: 'get_hover',
      arguments: { file_path: 'README.md', line: 0, character: 0 }
    }));
    expect(result.isError).toBe(true);
    expect(JSON.parse(result.text)).toEqual({
      code: 'NoServerConfigured',
      message: "Language server '.md' is not configured.",
      retryable: false,
      data: { language: '.md' }
    });
  });

  it('reports unknown tools', async () => {
    const result = parseResult(await client.callTool({ name: 'get_everything', arguments: {} }));
    expect(result).toEqual({ text: 'Unknown tool: get_everything', isError: true });
  });

  it('lists detected projects', async () => {
    const result = parseResult(await client.callTool({ name: 'get_server_projects', arguments: { language: 'rust' } }));
    expect(JSON.parse(result.text)).toEqual([{ key: { root, language: 'rust' }, marker: 'Cargo.toml' }]);
  });

  it('records file changes', async () => {
    const result = parseResult(await client.callTool({
      name: 'notify_file_changed',
      arguments: { file_path: 'src/lib.rs', content: 'pub fn stop() {}' }
    }));
    expect(result).toEqual({ text: `Recorded change of '${root}/src/lib.rs' file.`, isError: false });
  });

  it('reports the status of one session with its capabilities', async () => {
    await client.callTool({ name: 'get_hover', arguments: { file_path: 'src/lib.rs', line: 0, character: 7 } });
    const result = parseResult(await client.callTool({ name: 'get_server_status', arguments: { language: 'rust' } }));
    expect(JSON.parse(result.text)).toMatchObject({
      id: `rust:${root}`,
      state: 'Ready',
      pid: 4001,
      crashCount: 0,
      openDocuments: 1,
      capabilities: { hoverProvider: true },
      metrics: { requests: 1, failures: 0, cacheHits: 0, restarts: 0 }
    });
  });

  it('stops running servers', async () => {
    const idle = parseResult(await client.callTool({ name: 'stop_server', arguments: { language: 'rust' } }));
    expect(idle.text).toBe("Language server 'rust' is not running.");
    await client.callTool({ name: 'get_hover', arguments: { file_path: 'src/lib.rs', line: 0, character: 7 } });
    const stopped = parseResult(await client.callTool({ name: 'stop_server', arguments: { language: 'rust' } }));
    expect(stopped.text).toBe("Successfully stopped 'rust' language server.");
    const status = parseResult(await client.callTool({ name: 'get_server_status', arguments: {} }));
    expect(JSON.parse(status.text)).toEqual({
      cache: { capacity: 1000, size: 0, evictions: 0, hits: 0, misses: 1 },
      sessions: []
    });
  });
});
