/**
 * Configuration Management
 *
 * Loads and manages application configuration from defaults, an optional
 * JSON file, a .env file and the process environment (highest priority).
 */

import { readFile } from 'node:fs/promises';
import dotenv from 'dotenv';

export type ConfigValue = string | number | boolean | string[] | ConfigTree | undefined;

export interface ConfigTree {
  [key: string]: ConfigValue;
}

const DEFAULT_CONFIG: ConfigTree = {
  name: 'DORO Sticker Collection',
  version: '1.0.0',
  env: 'development',
  debug: false,
  port: 8000,
  host: '0.0.0.0',
  database: {
    url: undefined, // in-memory KV
  },
  cors: {
    origins: ['*'],
    credentials: true,
  },
  storage: {
    picDir: undefined,
  },
  vision: {
    model: 'Pro/Qwen/Qwen2.5-VL-7B-Instruct',
    timeout: 30,
    threshold: 0.6,
  },
  imageHost: {
    uploadUrl: 'https://www.picb.cc/api/1/upload',
    timeout: 30,
  },
};

/**
 * Configuration manager
 */
export class Config {
  private config: ConfigTree;

  constructor(options: ConfigTree = {}) {
    this.config = mergeConfig(DEFAULT_CONFIG, options);
  }

  /**
   * Get a configuration value by dotted path
   */
  get(key: string): ConfigValue {
    let current: ConfigValue = this.config;
    for (const part of key.split('.')) {
      if (!isTree(current)) return undefined;
      current = current[part];
    }
    return current;
  }

  /**
   * Get a string value
   */
  getString(key: string): string | undefined;
  getString(key: string, defaultValue: string): string;
  getString(key: string, defaultValue?: string): string | undefined {
    const value = this.get(key);
    return typeof value === 'string' ? value : defaultValue;
  }

  /**
   * Get a numeric value
   */
  getNumber(key: string): number | undefined;
  getNumber(key: string, defaultValue: number): number;
  getNumber(key: string, defaultValue?: number): number | undefined {
    const value = this.get(key);
    return typeof value === 'number' ? value : defaultValue;
  }

  /**
   * Get a boolean value
   */
  getBoolean(key: string, defaultValue = false): boolean {
    const value = this.get(key);
    return typeof value === 'boolean' ? value : defaultValue;
  }

  /**
   * Get a list of strings
   */
  getList(key: string, defaultValue: string[] = []): string[] {
    const value = this.get(key);
    return Array.isArray(value) ? [...value] : defaultValue;
  }

  /**
   * Set a configuration value by dotted path
   */
  set(key: string, value: ConfigValue): void {
    const parts = key.split('.');
    const last = parts.pop();
    if (last === undefined) return;

    let current = this.config;
    for (const part of parts) {
      const next = current[part];
      if (isTree(next)) {
        current = next;
      } else {
        const created: ConfigTree = {};
        current[part] = created;
        current = created;
      }
    }

    current[last] = value;
  }

  /**
   * Check if a configuration key exists
   */
  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  /**
   * Get all configuration
   */
  all(): ConfigTree {
    return mergeConfig({}, this.config);
  }

  /**
   * Whether the app runs in production
   */
  get isProduction(): boolean {
    return this.getString('env') === 'production';
  }
}

function isTree(value: ConfigValue): value is ConfigTree {
  return typeof value === 'object' && !Array.isArray(value);
}

/**
 * Merge configurations
 */
function mergeConfig(base: ConfigTree, override: ConfigTree): ConfigTree {
  const result: ConfigTree = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = result[key];
    result[key] = isTree(value)
      ? mergeConfig(isTree(current) ? current : {}, value)
      : value;
  }

  return result;
}

/**
 * Convert parsed JSON into a config tree
 */
function toConfigTree(value: unknown, path = 'config'): ConfigTree {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error(`Invalid configuration at ${path}: expected an object`);
  }

  const tree: ConfigTree = {};
  for (const [key, item] of Object.entries(value)) {
    const itemPath = `${path}.${key}`;
    if (typeof item === 'string' || typeof item === 'number' || typeof item === 'boolean') {
      tree[key] = item;
    } else if (Array.isArray(item)) {
      tree[key] = item.map(String);
    } else if (item !== null) {
      tree[key] = toConfigTree(item, itemPath);
    }
  }
  return tree;
}

type EnvType = 'string' | 'number' | 'boolean' | 'list';

/**
 * Environment variables and the config keys they set
 */
const ENV_MAPPING: ReadonlyArray<readonly [env: string, key: string, type: EnvType]> = [
  ['PROJECT_NAME', 'name', 'string'],
  ['PROJECT_VERSION', 'version', 'string'],
  ['NODE_ENV', 'env', 'string'],
  ['DEBUG', 'debug', 'boolean'],
  ['LOG_LEVEL', 'logLevel', 'string'],
  ['LOG_FORMAT', 'logFormat', 'string'],
  ['HOST', 'host', 'string'],
  ['PORT', 'port', 'number'],
  ['SECRET_KEY', 'secretKey', 'string'],
  ['DATABASE_URL', 'database.url', 'string'],
  ['CORS_ORIGINS', 'cors.origins', 'list'],
  ['CORS_CREDENTIALS', 'cors.credentials', 'boolean'],
  ['PIC_DIR', 'storage.picDir', 'string'],
  ['OPENAI_API_KEY', 'vision.apiKey', 'string'],
  ['OPENAI_BASE_URL', 'vision.baseUrl', 'string'],
  ['OPENAI_MODEL', 'vision.model', 'string'],
  ['OPENAI_TIMEOUT', 'vision.timeout', 'number'],
  ['DORO_CONFIDENCE_THRESHOLD', 'vision.threshold', 'number'],
  ['PICB_API_KEY', 'imageHost.apiKey', 'string'],
  ['PICB_ALBUM_ID', 'imageHost.albumId', 'string'],
  ['PICB_UPLOAD_URL', 'imageHost.uploadUrl', 'string'],
  ['PICB_TIMEOUT', 'imageHost.timeout', 'number'],
];

function parseEnvValue(name: string, raw: string, type: EnvType): ConfigValue {
  switch (type) {
    case 'number': {
      const value = Number(raw);
      if (raw.trim() === '' || Number.isNaN(value)) {
        throw new Error(`Invalid number for ${name}: ${raw}`);
      }
      return value;
    }
    case 'boolean':
      return ['true', '1', 'yes'].includes(raw.trim().toLowerCase());
    case 'list':
      return raw.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
    default:
      return raw;
  }
}

export interface LoadConfigOptions {
  /** JSON file merged over the defaults; a missing file is ignored */
  configPath?: string;
  /** Environment to read, defaults to process.env */
  env?: Record<string, string | undefined>;
  /** .env file loaded into process.env first, or false to skip */
  envFile?: string | false;
}

/**
 * Load configuration from environment and config file
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  if (options.envFile !== false) {
    dotenv.config({ path: options.envFile });
  }

  let fileConfig: ConfigTree = {};
  if (options.configPath) {
    try {
      const content = await readFile(options.configPath, 'utf8');
      fileConfig = toConfigTree(JSON.parse(content));
    } catch (error) {
      if (!isMissingFile(error)) throw error;
    }
  }

  const config = new Config(fileConfig);
  const env = options.env ?? process.env;

  for (const [name, key, type] of ENV_MAPPING) {
    const raw = env[name];
    if (raw !== undefined && raw !== '') {
      config.set(key, parseEnvValue(name, raw, type));
    }
  }

  if (!config.has('logLevel')) {
    config.set('logLevel', config.isProduction ? 'info' : 'debug');
  }
  if (!config.has('logFormat')) {
    config.set('logFormat', config.isProduction ? 'json' : 'pretty');
  }

  return config;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
