/**
 * Configuration for the realtime database emulator.
 * Values are passed as parameters through addConfig; loadEnvConfig() builds the
 * same patch from a .env file for the standalone process.
 */

import dotenv from 'dotenv';

/**
 * HTTP server configuration
 */
export interface HttpServerConfig {
  port: number;
  host: string;
  /** Maximum accepted request body, in express/body-parser notation */
  bodyLimit: string;
}

export type StorageDriver = 'memory' | 'mongodb';

/**
 * Backing document store configuration
 */
export interface StorageConfig {
  driver: StorageDriver;
  uri: string;
  databaseName: string;
  /** Run multi-step operations inside MongoDB transactions (needs a replica set) */
  useTransactions: boolean;
  /** Delay before the single retry of a transient store failure */
  retryBackoffMs: number;
}

export interface RulesConfig {
  /** Reject ordered queries on undeclared indexes instead of scanning */
  strictIndexes: boolean;
}

export interface LogsConfig {
  level: 'error' | 'warn' | 'info' | 'debug';
  silent: boolean;
  verboseHttpLogs: boolean;
  verboseStoreLogs: boolean;
}

/**
 * Partial config you can pass to addConfig.
 */
export interface Configuration {
  server?: Partial<HttpServerConfig>;
  storage?: Partial<StorageConfig>;
  rules?: Partial<RulesConfig>;
  logs?: Partial<LogsConfig>;
}

export const DEFAULT_SERVER: HttpServerConfig = {
  port: 9000,
  host: 'localhost',
  bodyLimit: '10mb',
};

export const DEFAULT_STORAGE: StorageConfig = {
  driver: 'memory',
  uri: 'mongodb://localhost:27017',
  databaseName: 'realtime_db',
  useTransactions: false,
  retryBackoffMs: 100,
};

export const DEFAULT_RULES: RulesConfig = {
  strictIndexes: false,
};

export const DEFAULT_LOGS: LogsConfig = {
  level: 'info',
  silent: false,
  verboseHttpLogs: false,
  verboseStoreLogs: false,
};

interface ConfigStorage {
  server: HttpServerConfig;
  storage: StorageConfig;
  rules: RulesConfig;
  logs: LogsConfig;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Singleton configuration. On first creation, storage is initialized with the
 * DEFAULT_* sections.
 */
class Config {
  private static instance: Config | null = null;

  private storage: ConfigStorage;

  private constructor() {
    this.storage = Config.defaults();
  }

  private static defaults(): ConfigStorage {
    return {
      server: { ...DEFAULT_SERVER },
      storage: { ...DEFAULT_STORAGE },
      rules: { ...DEFAULT_RULES },
      logs: { ...DEFAULT_LOGS },
    };
  }

  static getInstance(): Config {
    if (!Config.instance) {
      Config.instance = new Config();
    }
    return Config.instance;
  }

  addConfig(patch?: Configuration): void {
    if (!patch) {
      return;
    }
    if (patch.server !== undefined) {
      this.storage.server = { ...this.storage.server, ...patch.server };
    }
    if (patch.storage !== undefined) {
      this.storage.storage = { ...this.storage.storage, ...patch.storage };
    }
    if (patch.rules !== undefined) {
      this.storage.rules = { ...this.storage.rules, ...patch.rules };
    }
    if (patch.logs !== undefined) {
      this.storage.logs = { ...this.storage.logs, ...patch.logs };
    }
  }

  /**
   * Restore every section to its defaults (tests use this between suites).
   */
  reset(): void {
    this.storage = Config.defaults();
  }

  getServerConfig(): HttpServerConfig {
    return { ...this.storage.server };
  }

  getStorageConfig(): StorageConfig {
    return { ...this.storage.storage };
  }

  /**
   * Get a value by dot-notation path (e.g. "server.port", "logs.verboseHttpLogs").
   * Returns undefined if the path is missing.
   */
  private getByPath(path: string): unknown {
    let current: unknown = this.storage;
    for (const part of path.split('.')) {
      if (!isRecord(current)) {
        return undefined;
      }
      current = current[part];
    }
    return current;
  }

  getString(path: string, defaultValue = ''): string {
    const value = this.getByPath(path);
    return typeof value === 'string' ? value : defaultValue;
  }

  getNumber(path: string, defaultValue = 0): number {
    const value = this.getByPath(path);
    if (typeof value === 'number' && !Number.isNaN(value)) {
      return value;
    }
    if (typeof value === 'string') {
      const parsed = parseInt(value, 10);
      return Number.isNaN(parsed) ? defaultValue : parsed;
    }
    return defaultValue;
  }

  getBoolean(path: string, defaultValue = false): boolean {
    const value = this.getByPath(path);
    if (typeof value === 'boolean') {
      return value;
    }
    if (value === 'true' || value === '1') {
      return true;
    }
    if (value === 'false' || value === '0') {
      return false;
    }
    return defaultValue;
  }
}

/**
 * Single config API. Use config.getBoolean(path), config.getString(path), config.addConfig(patch), etc.
 */
export const config = Config.getInstance();

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  return value === 'true' || value === '1';
}

function parseLevel(value: string | undefined): LogsConfig['level'] | undefined {
  if (
    value === 'error' ||
    value === 'warn' ||
    value === 'info' ||
    value === 'debug'
  ) {
    return value;
  }
  return undefined;
}

/**
 * Build a configuration patch from environment variables, loading `.env` first.
 * @param env - Variables to read (defaults to process.env after dotenv has run)
 */
export function loadEnvConfig(
  env: NodeJS.ProcessEnv = process.env,
): Configuration {
  if (env === process.env) {
    dotenv.config();
  }

  const server: Partial<HttpServerConfig> = {};
  const storage: Partial<StorageConfig> = {};
  const rules: Partial<RulesConfig> = {};
  const logs: Partial<LogsConfig> = {};

  if (env.RTDB_PORT) {
    const port = parseInt(env.RTDB_PORT, 10);
    if (!Number.isNaN(port)) {
      server.port = port;
    }
  }
  if (env.RTDB_HOST) {
    server.host = env.RTDB_HOST;
  }
  if (env.RTDB_STORAGE === 'memory' || env.RTDB_STORAGE === 'mongodb') {
    storage.driver = env.RTDB_STORAGE;
  }
  if (env.MONGODB_URI) {
    storage.uri = env.MONGODB_URI;
  }
  if (env.MONGODB_DATABASE) {
    storage.databaseName = env.MONGODB_DATABASE;
  }
  const useTransactions = parseFlag(env.RTDB_TRANSACTIONS);
  if (useTransactions !== undefined) {
    storage.useTransactions = useTransactions;
  }
  const strictIndexes = parseFlag(env.RTDB_STRICT_INDEXES);
  if (strictIndexes !== undefined) {
    rules.strictIndexes = strictIndexes;
  }
  const level = parseLevel(env.RTDB_LOG_LEVEL);
  if (level !== undefined) {
    logs.level = level;
  }

  return { server, storage, rules, logs };
}
