/**
 * Configuration Parser and Validator
 *
 * @module server/config
 * @license BSD-3-Clause
 */

import { readFileSync } from 'node:fs';
import { ClientCapabilities } from 'vscode-languageserver-protocol';
import { z } from 'zod';

/**
 * Syslog severity names accepted for `loggingLevel`
 */
export const LOGGING_LEVELS = ['debug', 'info', 'notice', 'warning', 'error', 'critical', 'alert', 'emergency'] as const;

export type LoggingLevel = (typeof LOGGING_LEVELS)[number];

/**
 * Language server configuration
 *
 * @export
 * @interface ServerConfig
 * @property args - Command line arguments for server process
 * @property capabilities - Optional LSP client capability overrides
 * @property command - Executable name or path
 * @property configuration - Answer to `workspace/configuration` requests
 * @property env - Extra environment variables for the process
 * @property extensions - File extensions handled by this server
 * @property initializationOptions - Sent with `initialize`, defaults to `configuration`
 * @property languageIds - Document language identifiers keyed by extension
 * @property markers - File names that mark a project root
 */
export interface ServerConfig {
  args: string[];
  capabilities?: Partial<ClientCapabilities>;
  command: string;
  configuration?: Record<string, unknown>;
  env?: Record<string, string>;
  extensions: string[];
  initializationOptions?: Record<string, unknown>;
  languageIds: Record<string, string>;
  markers: string[];
}

/**
 * Response cache settings
 *
 * @export
 * @interface CacheSettings
 * @property capacity - Maximum number of cached responses
 * @property ttlMs - Time to live per LSP method, methods absent here are never cached
 */
export interface CacheSettings {
  capacity: number;
  ttlMs: Record<string, number>;
}

/**
 * Runtime settings with every default applied
 *
 * @export
 * @interface Settings
 */
export interface Settings {
  backoffBaseMs: number;
  backoffCapMs: number;
  cache: CacheSettings;
  diagnosticsTimeoutMs: number;
  handshakeTimeoutMs: number;
  idleCheckIntervalMs: number;
  idleMonitor: boolean;
  idleTimeoutMs: number;
  loggingLevel: LoggingLevel;
  maxConcurrentRequests: number;
  maxSessions: number;
  memoryThresholdMb: number;
  requestTimeoutMs: number;
  resourceCheckIntervalMs: number;
  resourceMonitor: boolean;
  settleDelayMs: number;
  shutdownTimeoutMs: number;
}

export const DEFAULT_CACHE_TTL_MS: Readonly<Record<string, number>> = {
  'textDocument/completion': 30000,
  'textDocument/definition': 60000,
  'textDocument/diagnostic': 300000,
  'textDocument/documentSymbol': 600000,
  'textDocument/hover': 60000,
  'textDocument/references': 60000,
  'workspace/symbol': 600000
};

export const DEFAULT_SETTINGS: Readonly<Settings> = {
  backoffBaseMs: 1000,
  backoffCapMs: 60000,
  cache: { capacity: 1000, ttlMs: { ...DEFAULT_CACHE_TTL_MS } },
  diagnosticsTimeoutMs: 3000,
  handshakeTimeoutMs: 30000,
  idleCheckIntervalMs: 60000,
  idleMonitor: true,
  idleTimeoutMs: 600000,
  loggingLevel: 'info',
  maxConcurrentRequests: 4,
  maxSessions: 10,
  memoryThresholdMb: 1024,
  requestTimeoutMs: 60000,
  resourceCheckIntervalMs: 30000,
  resourceMonitor: true,
  settleDelayMs: 2000,
  shutdownTimeoutMs: 5000
};

const isPlainObject = (value: unknown): boolean =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Configuration Parser and Validator
 *
 * Parses and validates the language server configuration file, then hands
 * out server definitions and settings with defaults applied.
 *
 * @export
 * @class Config
 */
export class Config {
  private static readonly ServerConfigSchema = z.object({
    args: z.array(z.string()).default([]),
    capabilities: z.custom<Partial<ClientCapabilities>>(isPlainObject, {
      message: 'Capabilities must be an object.'
    }).optional(),
    command: z.string().min(1),
    configuration: z.record(z.string(), z.unknown()).optional(),
    env: z.record(z.string(), z.string()).optional(),
    extensions: z.array(z.string().startsWith('.')).min(1),
    initializationOptions: z.record(z.string(), z.unknown()).optional(),
    languageIds: z.record(z.string(), z.string()).default({}),
    markers: z.array(z.string().min(1)).default([])
  });
  private static readonly SettingsSchema = z.object({
    backoffBaseMs: z.number().int().positive().optional(),
    backoffCapMs: z.number().int().nonnegative().optional(),
    cache: z.object({
      capacity: z.number().int().positive().optional(),
      ttlMs: z.record(z.string(), z.number().int().nonnegative()).optional()
    }).optional(),
    diagnosticsTimeoutMs: z.number().int().nonnegative().optional(),
    handshakeTimeoutMs: z.number().int().positive().optional(),
    idleCheckIntervalMs: z.number().int().positive().optional(),
    idleMonitor: z.boolean().optional(),
    idleTimeoutMs: z.number().int().positive().optional(),
    loggingLevel: z.enum(LOGGING_LEVELS).optional(),
    maxConcurrentRequests: z.number().int().positive().optional(),
    maxSessions: z.number().int().positive().optional(),
    memoryThresholdMb: z.number().positive().optional(),
    requestTimeoutMs: z.number().int().positive().optional(),
    resourceCheckIntervalMs: z.number().int().positive().optional(),
    resourceMonitor: z.boolean().optional(),
    settleDelayMs: z.number().int().nonnegative().optional(),
    shutdownTimeoutMs: z.number().int().nonnegative().optional()
  });
  private static readonly ConfigSchema = z.object({
    root: z.string().min(1).optional(),
    servers: z.record(z.string(), Config.ServerConfigSchema).refine(
      (servers) => Object.keys(servers).length > 0,
      { message: 'At least one language server configuration is required.' }
    ),
    settings: Config.SettingsSchema.optional()
  });

  private readonly root?: string;
  private readonly servers: Record<string, ServerConfig>;
  private readonly settings: Settings;

  private constructor(config: z.infer<typeof Config.ConfigSchema>) {
    this.root = config.root;
    this.servers = config.servers;
    this.settings = Config.applyDefaults(config.settings ?? {});
  }

  /**
   * Validates configuration from file
   *
   * @param configPath - Absolute path to configuration JSON file
   * @returns Validated Config instance
   * @throws {Error} If file cannot be read or configuration is invalid
   */
  static validate(configPath: string): Config {
    let data: unknown;
    try {
      data = JSON.parse(readFileSync(configPath, 'utf-8'));
    } catch (error) {
      throw new Error(`Failed to load '${configPath}' configuration file: ${error}`);
    }
    try {
      return Config.fromObject(data);
    } catch (error) {
      throw new Error(`Failed to load '${configPath}' configuration file: ${error instanceof Error ? error.message : error}`);
    }
  }

  /**
   * Validates an already parsed configuration object
   *
   * @param data - Parsed JSON value
   * @throws {Error} With every validation issue joined in the message
   */
  static fromObject(data: unknown): Config {
    const result = Config.ConfigSchema.safeParse(data);
    if (!result.success) {
      const errors = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');
      throw new Error(errors);
    }
    return new Config(result.data);
  }

  private static applyDefaults(settings: z.infer<typeof Config.SettingsSchema>): Settings {
    return {
      backoffBaseMs: settings.backoffBaseMs ?? DEFAULT_SETTINGS.backoffBaseMs,
      backoffCapMs: settings.backoffCapMs ?? DEFAULT_SETTINGS.backoffCapMs,
      cache: {
        capacity: settings.cache?.capacity ?? DEFAULT_SETTINGS.cache.capacity,
        ttlMs: { ...DEFAULT_CACHE_TTL_MS, ...settings.cache?.ttlMs }
      },
      diagnosticsTimeoutMs: settings.diagnosticsTimeoutMs ?? DEFAULT_SETTINGS.diagnosticsTimeoutMs,
      handshakeTimeoutMs: settings.handshakeTimeoutMs ?? DEFAULT_SETTINGS.handshakeTimeoutMs,
      idleCheckIntervalMs: settings.idleCheckIntervalMs ?? DEFAULT_SETTINGS.idleCheckIntervalMs,
      idleMonitor: settings.idleMonitor ?? DEFAULT_SETTINGS.idleMonitor,
      idleTimeoutMs: settings.idleTimeoutMs ?? DEFAULT_SETTINGS.idleTimeoutMs,
      loggingLevel: settings.loggingLevel ?? DEFAULT_SETTINGS.loggingLevel,
      maxConcurrentRequests: settings.maxConcurrentRequests ?? DEFAULT_SETTINGS.maxConcurrentRequests,
      maxSessions: settings.maxSessions ?? DEFAULT_SETTINGS.maxSessions,
      memoryThresholdMb: settings.memoryThresholdMb ?? DEFAULT_SETTINGS.memoryThresholdMb,
      requestTimeoutMs: settings.requestTimeoutMs ?? DEFAULT_SETTINGS.requestTimeoutMs,
      resourceCheckIntervalMs: settings.resourceCheckIntervalMs ?? DEFAULT_SETTINGS.resourceCheckIntervalMs,
      resourceMonitor: settings.resourceMonitor ?? DEFAULT_SETTINGS.resourceMonitor,
      settleDelayMs: settings.settleDelayMs ?? DEFAULT_SETTINGS.settleDelayMs,
      shutdownTimeoutMs: settings.shutdownTimeoutMs ?? DEFAULT_SETTINGS.shutdownTimeoutMs
    };
  }

  /**
   * Workspace directory searched for projects, when configured
   */
  getRoot(): string | undefined {
    return this.root;
  }

  /**
   * Gets all configured language names
   *
   * @returns Language names such as `['rust', 'python']`
   */
  getServers(): string[] {
    return Object.keys(this.servers);
  }

  /**
   * Gets the server configuration of a language
   *
   * @param language - Configured language name
   * @returns Server configuration, or undefined when not configured
   */
  getServerConfig(language: string): ServerConfig | undefined {
    return this.hasServerConfig(language) ? this.servers[language] : undefined;
  }

  /**
   * Gets runtime settings with defaults applied
   */
  getSettings(): Settings {
    return this.settings;
  }

  /**
   * Checks if a language server configuration exists
   *
   * @param language - Language name to check
   */
  hasServerConfig(language: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.servers, language);
  }
}
