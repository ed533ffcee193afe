/**
 * MCP Server implementation
 *
 * @module server/mcp
 * @license BSD-3-Clause
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequest,
  CallToolRequestSchema,
  ListToolsRequestSchema,
  Tool
} from '@modelcontextprotocol/sdk/types.js';
import { isAbsolute, resolve } from 'node:path';
import { z } from 'zod';
import { Client, Response } from './client.js';
import { Config } from './config.js';
import { isLspError } from './errors.js';
import { Logger } from './logger.js';
import { ManagerOptions, SessionManager } from './manager.js';
import { McpTool } from './tool.js';

/**
 * Manager seams the MCP server passes through, mostly used by tests
 */
export type McpServerOptions = Omit<ManagerOptions, 'config' | 'logger'>;

/**
 * Tool handler receiving raw MCP arguments
 */
type ToolHandler = (args: unknown) => Promise<Response>;

const position = z.object({
  character: z.number().int().nonnegative(),
  file_path: z.string().min(1),
  line: z.number().int().nonnegative()
});

const filePath = z.object({ file_path: z.string().min(1) });

const session = z.object({
  language: z.string().min(1),
  root: z.string().min(1).optional()
});

const schemas = {
  fileChanged: z.object({
    content: z.string().optional(),
    deleted: z.boolean().default(false),
    file_path: z.string().min(1)
  }),
  filePath,
  position,
  projectSymbols: session.extend({ query: z.string().default('') }),
  projects: z.object({ language: z.string().min(1).optional() }),
  references: position.extend({ include_declaration: z.boolean().default(true) }),
  session,
  status: z.object({
    language: z.string().min(1).optional(),
    root: z.string().min(1).optional()
  })
};

/**
 * MCP server exposing the session manager as tools
 *
 * @class McpServer
 */
export class McpServer {
  private client: Client;
  private config: Config;
  private logger: Logger;
  private manager: SessionManager;
  private server: Server;
  private tool: McpTool;
  private toolHandler: Map<string, ToolHandler>;

  /**
   * Creates a new McpServer instance with configuration and tool setup
   *
   * @param config - Validated configuration
   * @param options - Optional session manager seams
   */
  constructor(config: Config, options: McpServerOptions = {}) {
    const version = Client.version();
    this.server = new Server(
      { name: 'lsp-session-manager', version },
      { capabilities: { logging: {}, tools: {} } }
    );
    this.config = config;
    this.logger = new Logger(config.getSettings().loggingLevel, this.server);
    this.manager = new SessionManager({
      clientInfo: { name: 'lsp-session-manager', version },
      ...options,
      config,
      logger: this.logger
    });
    this.client = new Client(config, this.manager);
    this.tool = new McpTool();
    this.toolHandler = new Map<string, ToolHandler>();
    this.setupToolHandlers();
    this.setupHandlers();
  }

  /**
   * Session manager behind the tools
   */
  get sessions(): SessionManager {
    return this.manager;
  }

  /**
   * Connects the MCP server to a transport
   *
   * @param transport - Stdio transport, or an in-memory one in tests
   */
  async connect(transport: Transport): Promise<void> {
    this.server.onerror = (error: Error) => {
      console.error('MCP transport error:', error.message);
    };
    await this.server.connect(transport);
  }

  /**
   * Stops every language server session, then closes the transport
   */
  async close(): Promise<void> {
    await this.manager.shutdown();
    await this.server.close();
  }

  /**
   * Routes a tool call to its handler
   *
   * Manager failures become tool errors carrying the error code, so the
   * agent can tell retryable conditions apart.
   */
  private async handleRequest(request: CallToolRequest): Promise<Response> {
    const handler = this.toolHandler.get(request.params.name);
    if (!handler) {
      return Client.response(`Unknown tool: ${request.params.name}`, true);
    }
    try {
      return await handler(request.params.arguments ?? {});
    } catch (error) {
      if (isLspError(error)) {
        this.logger.log({ scope: 'mcp', level: 'debug', message: `Tool '${request.params.name}' failed: ${error.message}` });
        return Client.response({
          code: error.code,
          message: error.message,
          retryable: error.retryable,
          data: error.data ?? {}
        }, true);
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger.log({ scope: 'mcp', level: 'error', message: `Tool '${request.params.name}' failed: ${message}` });
      return Client.response(message, true);
    }
  }

  private async handleTools(): Promise<{ tools: Tool[] }> {
    return { tools: this.tool.getTools() };
  }

  /**
   * Registers a tool with its argument schema
   *
   * @param tool - MCP tool definition
   * @param schema - Zod schema validating the tool arguments
   * @param handler - Executes the tool with validated arguments
   */
  private register<T extends z.ZodType>(tool: Tool, schema: T, handler: (args: z.output<T>) => Promise<unknown>): void {
    this.toolHandler.set(tool.name, async (args: unknown) => {
      const result = schema.safeParse(args);
      if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`);
        return Client.response(`Invalid arguments: ${issues.join(', ')}`, true);
      }
      return Client.response(await handler(result.data));
    });
  }

  /**
   * Resolves a tool file path against the workspace root
   *
   * @param path - Absolute path, or a path relative to the configured root
   */
  private resolvePath(path: string): string {
    return isAbsolute(path) ? path : resolve(this.config.getRoot() ?? process.cwd(), path);
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(CallToolRequestSchema, this.handleRequest.bind(this));
    this.server.setRequestHandler(ListToolsRequestSchema, this.handleTools.bind(this));
  }

  private setupToolHandlers(): void {
    const at = (args: z.output<typeof position>) => ({
      file: this.resolvePath(args.file_path),
      line: args.line,
      character: args.character
    });
    this.register(this.tool.getCompletions(), schemas.position, (args) => this.client.completions(at(args)));
    this.register(this.tool.getDiagnostics(), schemas.filePath, (args) =>
      this.client.diagnostics(this.resolvePath(args.file_path))
    );
    this.register(this.tool.getHover(), schemas.position, (args) => this.client.hover(at(args)));
    this.register(this.tool.getProjectSymbols(), schemas.projectSymbols, (args) =>
      this.client.workspaceSymbols(args.language, args.query, args.root)
    );
    this.register(this.tool.getServerProjects(), schemas.projects, (args) => this.client.projects(args.language));
    this.register(this.tool.getServerStatus(), schemas.status, (args) => this.client.status(args.language, args.root));
    this.register(this.tool.getSymbolDefinitions(), schemas.position, (args) => this.client.definitions(at(args)));
    this.register(this.tool.getSymbolReferences(), schemas.references, (args) =>
      this.client.references(at(args), args.include_declaration)
    );
    this.register(this.tool.getSymbols(), schemas.filePath, (args) =>
      this.client.documentSymbols(this.resolvePath(args.file_path))
    );
    this.register(this.tool.notifyFileChanged(), schemas.fileChanged, async (args) => {
      const file = this.resolvePath(args.file_path);
      this.client.fileChanged(file, args.deleted, args.content);
      return `Recorded ${args.deleted ? 'deletion' : 'change'} of '${file}' file.`;
    });
    this.register(this.tool.restartServer(), schemas.session, (args) => this.client.restart(args.language, args.root));
    this.register(this.tool.stopServer(), schemas.session, async (args) => {
      const stopped = await this.client.stop(args.language, args.root);
      return stopped
        ? `Successfully stopped '${args.language}' language server.`
        : `Language server '${args.language}' is not running.`;
    });
  }
}
