/**
 * MCP Tool Definitions
 *
 * @module server/tool
 * @license BSD-3-Clause
 */

import { Tool } from '@modelcontextprotocol/sdk/types.js';

const POSITION_PROPERTIES = {
  character: { type: 'number', description: 'Character position (zero-based)' },
  file_path: { type: 'string', description: 'Path to the project file' },
  line: { type: 'number', description: 'Line number (zero-based)' }
};

/**
 * MCP tool definitions exposed by the session manager
 *
 * Each definition only describes arguments; execution lives in the MCP
 * server handlers.
 *
 * @class McpTool
 */
export class McpTool {
  private query: string;

  /**
   * @param query - Default workspace symbol query
   */
  constructor(query: string = '') {
    this.query = query;
  }

  getCompletions(): Tool {
    return {
      name: 'get_completions',
      description: 'Get completions and auto-suggestions at cursor position',
      inputSchema: {
        type: 'object',
        properties: { ...POSITION_PROPERTIES },
        required: ['character', 'file_path', 'line']
      }
    };
  }

  /**
   * Creates MCP tool for file diagnostics
   *
   * Opens the file in its project session and returns the latest
   * diagnostics the language server published for it.
   */
  getDiagnostics(): Tool {
    return {
      name: 'get_diagnostics',
      description: 'Get errors and warnings reported for a file',
      inputSchema: {
        type: 'object',
        properties: {
          file_path: { type: 'string', description: 'Path to the project file' }
        },
        required: ['file_path']
      }
    };
  }

  getHover(): Tool {
    return {
      name: 'get_hover',
      description: 'Get symbol type information and documentation at cursor position',
      inputSchema: {
        type: 'object',
        properties: { ...POSITION_PROPERTIES },
        required: ['character', 'file_path', 'line']
      }
    };
  }

  /**
   * Creates MCP tool for workspace symbol search
   *
   * Runs at low priority so interactive requests of the same project are
   * served first.
   */
  getProjectSymbols(): Tool {
    return {
      name: 'get_project_symbols',
      description: 'Search for symbols across entire project workspace',
      inputSchema: {
        type: 'object',
        properties: {
          language: { type: 'string', description: 'Configured language name' },
          query: { type: 'string', description: 'Symbol search query', default: this.query },
          root: { type: 'string', description: 'Optional project root directory' }
        },
        required: ['language']
      }
    };
  }

  getServerProjects(): Tool {
    return {
      name: 'get_server_projects',
      description: 'List projects detected under the workspace root',
      inputSchema: {
        type: 'object',
        properties: {
          language: { type: 'string', description: 'Optional language name' }
        },
        required: []
      }
    };
  }

  /**
   * Creates MCP tool for session status monitoring
   *
   * Without arguments every known session is reported, including state,
   * process id, crash count, pending requests and request counters, next to
   * the response cache counters. With a language the session also reports
   * the capabilities its server announced.
   */
  getServerStatus(): Tool {
    return {
      name: 'get_server_status',
      description: 'Check lifecycle state of language server sessions',
      inputSchema: {
        type: 'object',
        properties: {
          language: { type: 'string', description: 'Optional language name' },
          root: { type: 'string', description: 'Optional project root directory' }
        },
        required: []
      }
    };
  }

  getSymbolDefinitions(): Tool {
    return {
      name: 'get_symbol_definitions',
      description: 'Navigate to where symbol is originally defined',
      inputSchema: {
        type: 'object',
        properties: { ...POSITION_PROPERTIES },
        required: ['character', 'file_path', 'line']
      },
      _meta: {
        usage: [
          'Place cursor on symbol usage or reference, not definition',
          'Works with function calls, variable references, and import statements'
        ]
      }
    };
  }

  getSymbolReferences(): Tool {
    return {
      name: 'get_symbol_references',
      description: 'Find all locations where symbol is used or referenced',
      inputSchema: {
        type: 'object',
        properties: {
          ...POSITION_PROPERTIES,
          include_declaration: { type: 'boolean', description: 'Include symbol declaration', default: true }
        },
        required: ['character', 'file_path', 'line']
      }
    };
  }

  getSymbols(): Tool {
    return {
      name: 'get_symbols',
      description: 'List symbols declared in a file',
      inputSchema: {
        type: 'object',
        properties: {
          file_path: { type: 'string', description: 'Path to the project file' }
        },
        required: ['file_path']
      }
    };
  }

  /**
   * Returns every tool definition in name order
   */
  getTools(): Tool[] {
    return [
      this.getCompletions(),
      this.getDiagnostics(),
      this.getHover(),
      this.getProjectSymbols(),
      this.getServerProjects(),
      this.getServerStatus(),
      this.getSymbolDefinitions(),
      this.getSymbolReferences(),
      this.getSymbols(),
      this.notifyFileChanged(),
      this.restartServer(),
      this.stopServer()
    ];
  }

  /**
   * Creates MCP tool for external file change notification
   *
   * Invalidates cached responses that depend on the file and resynchronizes
   * or closes the open document in every session holding it.
   */
  notifyFileChanged(): Tool {
    return {
      name: 'notify_file_changed',
      description: 'Report a file changed or deleted outside the language server',
      inputSchema: {
        type: 'object',
        properties: {
          content: { type: 'string', description: 'Optional new file content' },
          deleted: { type: 'boolean', description: 'Whether the file was deleted', default: false },
          file_path: { type: 'string', description: 'Path to the project file' }
        },
        required: ['file_path']
      }
    };
  }

  restartServer(): Tool {
    return {
      name: 'restart_server',
      description: 'Restart language server session of a project',
      inputSchema: {
        type: 'object',
        properties: {
          language: { type: 'string', description: 'Configured language name' },
          root: { type: 'string', description: 'Optional project root directory' }
        },
        required: ['language']
      }
    };
  }

  stopServer(): Tool {
    return {
      name: 'stop_server',
      description: 'Stop running language server session of a project',
      inputSchema: {
        type: 'object',
        properties: {
          language: { type: 'string', description: 'Configured language name' },
          root: { type: 'string', description: 'Optional project root directory' }
        },
        required: ['language']
      }
    };
  }
}
