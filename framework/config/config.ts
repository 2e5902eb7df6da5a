/**
 * Configuration Management
 *
 * Defaults, overridden by an optional JSON file, overridden by
 * environment variables.
 */

import { readFile } from 'node:fs/promises';
import {
  isLogFormat,
  isLogLevel,
  loggerDefaults,
  type LogFormat,
  type LogLevel,
} from '../telemetry/logger.ts';

export interface ConfigOptions {
  port?: number;
  host?: string;
  env?: string;
  logLevel?: LogLevel;
  logFormat?: LogFormat;
  [key: string]: unknown;
}

const DEFAULT_CONFIG: ConfigOptions = {
  port: 8080,
  host: '0.0.0.0',
  env: 'development',
};

export type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Configuration manager
 */
export class Config {
  private config: ConfigRecord;

  constructor(options: ConfigOptions | ConfigRecord = {}) {
    this.config = mergeConfig(DEFAULT_CONFIG, options);
  }

  /**
   * Get a configuration value by dotted key, e.g. 'features.search.enabled'
   */
  get(key: string): unknown {
    return getNestedValue(this.config, key);
  }

  getString(key: string, defaultValue: string): string {
    const value = this.get(key);
    return typeof value === 'string' ? value : defaultValue;
  }

  getNumber(key: string, defaultValue: number): number {
    const value = this.get(key);
    return typeof value === 'number' && Number.isFinite(value) ? value : defaultValue;
  }

  /**
   * Set a configuration value
   */
  set(key: string, value: unknown): void {
    setNestedValue(this.config, key, value);
  }

  /**
   * Check if a configuration key exists
   */
  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  get env(): string {
    return this.getString('env', 'development');
  }

  /**
   * Configured level, else the default for `env`
   */
  get logLevel(): LogLevel {
    const value = this.get('logLevel');
    return isLogLevel(value) ? value : loggerDefaults(this.env).level;
  }

  /**
   * Configured format, else the default for `env`
   */
  get logFormat(): LogFormat {
    const value = this.get('logFormat');
    return isLogFormat(value) ? value : loggerDefaults(this.env).format;
  }

  /**
   * Get all configuration
   */
  all(): ConfigRecord {
    return { ...this.config };
  }
}

/**
 * Merge configurations
 */
function mergeConfig(base: ConfigRecord, override: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;

    const current = base[key];
    result[key] = isRecord(value) ? mergeConfig(isRecord(current) ? current : {}, value) : value;
  }

  return result;
}

/**
 * Get nested value by path
 */
function getNestedValue(obj: ConfigRecord, path: string): unknown {
  let current: unknown = obj;
  for (const key of path.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

/**
 * Set nested value by path
 */
function setNestedValue(obj: ConfigRecord, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (last === undefined) return;

  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: ConfigRecord = {};
      current[part] = created;
      current = created;
    }
  }

  current[last] = value;
}

/**
 * Read configuration overrides from the environment
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOptions {
  const port = env.PORT !== undefined ? Number.parseInt(env.PORT, 10) : undefined;

  return {
    port: port !== undefined && Number.isFinite(port) ? port : undefined,
    host: env.HOST,
    env: env.NODE_ENV,
    logLevel: isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : undefined,
    logFormat: isLogFormat(env.LOG_FORMAT) ? env.LOG_FORMAT : undefined,
  };
}

/**
 * Load configuration from a JSON file (if present) and the environment
 */
export async function loadConfig(
  configPath = './config.json',
  env: NodeJS.ProcessEnv = process.env
): Promise<Config> {
  const config = new Config(await readConfigFile(configPath));

  for (const [key, value] of Object.entries(configFromEnv(env))) {
    if (value !== undefined) config.set(key, value);
  }

  return config;
}

async function readConfigFile(path: string): Promise<ConfigRecord> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) return {};
    throw error;
  }

  const parsed: unknown = JSON.parse(content);
  if (!isRecord(parsed)) {
    throw new Error(`Config file ${path} must contain a JSON object`);
  }
  return parsed;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
