/**
 * Configuration loader for partlens
 *
 * Loads configuration from file, applies environment variable overrides,
 * and validates the result against the schema.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve, join } from 'node:path';
import { homedir } from 'node:os';
import {
  type PartlensConfig,
  PartlensConfigSchema,
  DEFAULT_CONFIG,
  validateConfig,
} from './schema.js';

/**
 * Configuration file names to search for in project directories (in order of priority)
 */
const CONFIG_FILE_NAMES = ['partlens.config.json', 'partlens.json', '.partlensrc.json'];

/**
 * Global configuration directory and file
 */
const GLOBAL_CONFIG_DIR = join(homedir(), '.partlens');
const GLOBAL_CONFIG_FILE = join(GLOBAL_CONFIG_DIR, 'config.json');

/**
 * Map of environment variable names to configuration paths
 * All environment variables use the PARTLENS_ prefix.
 */
const ENV_MAPPINGS: Record<string, string[]> = {
  // Embedding
  PARTLENS_EMBEDDING_PROVIDER: ['embedding', 'provider'],
  PARTLENS_EMBEDDING_MODEL: ['embedding', 'model'],
  PARTLENS_EMBEDDING_DIMENSIONS: ['embedding', 'dimensions'],
  PARTLENS_EMBEDDING_BATCH_SIZE: ['embedding', 'batchSize'],
  PARTLENS_EMBEDDING_REMOTE_URL: ['embedding', 'remoteUrl'],
  PARTLENS_EMBEDDING_REMOTE_API_KEY: ['embedding', 'remoteApiKey'],
  // Index
  PARTLENS_INDEX_EXACT_THRESHOLD: ['index', 'exactThreshold'],
  PARTLENS_INDEX_EF_SEARCH: ['index', 'hnsw', 'efSearch'],
  PARTLENS_INDEX_EF_CONSTRUCTION: ['index', 'hnsw', 'efConstruction'],
  PARTLENS_INDEX_FRESHNESS_BOUND_MS: ['index', 'freshnessBoundMs'],
  // Cache
  PARTLENS_CACHE_ENABLED: ['cache', 'enabled'],
  PARTLENS_CACHE_MEMORY_BUDGET: ['cache', 'memoryBudgetBytes'],
  PARTLENS_CACHE_TTL_MS: ['cache', 'ttlMs'],
  // Router
  PARTLENS_ROUTER_LOCAL_WORKERS: ['router', 'localWorkers'],
  PARTLENS_ROUTER_CAPACITY: ['router', 'capacity'],
  PARTLENS_ROUTER_QUEUE_LIMIT: ['router', 'queueLimit'],
  // Query
  PARTLENS_QUERY_DEFAULT_TOP_K: ['query', 'defaultTopK'],
  PARTLENS_QUERY_TIMEOUT_MS: ['query', 'defaultTimeoutMs'],
  // Logging
  PARTLENS_LOG_LEVEL: ['logging', 'level'],
  PARTLENS_LOG_FILE: ['logging', 'file'],
  PARTLENS_LOG_PRETTY: ['logging', 'pretty'],
  // Storage
  PARTLENS_DATABASE_PATH: ['storage', 'databasePath'],
};

/**
 * Configuration paths whose environment values are numeric
 */
const NUMERIC_PATHS = new Set([
  'embedding.dimensions',
  'embedding.batchSize',
  'index.exactThreshold',
  'index.hnsw.efSearch',
  'index.hnsw.efConstruction',
  'index.freshnessBoundMs',
  'cache.memoryBudgetBytes',
  'cache.ttlMs',
  'router.localWorkers',
  'router.capacity',
  'router.queueLimit',
  'query.defaultTopK',
  'query.defaultTimeoutMs',
]);

type ConfigObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is ConfigObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two plain objects; arrays and scalars in source replace target
 */
export function deepMerge(target: ConfigObject, source: ConfigObject): ConfigObject {
  const result: ConfigObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Set a nested value in an object using a path array
 */
function setNestedValue(obj: ConfigObject, path: string[], value: unknown): void {
  let current = obj;
  for (let i = 0; i < path.length - 1; i++) {
    const key = path[i];
    if (key === undefined) continue;
    const next = current[key];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: ConfigObject = {};
      current[key] = created;
      current = created;
    }
  }
  const lastKey = path[path.length - 1];
  if (lastKey !== undefined) {
    current[lastKey] = value;
  }
}

/**
 * Parse environment variable value to appropriate type
 */
function parseEnvValue(value: string, path: string[]): unknown {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  if (NUMERIC_PATHS.has(path.join('.'))) {
    const num = Number(value);
    if (!Number.isNaN(num)) return num;
  }

  return value;
}

/**
 * Load configuration from environment variables
 */
function loadEnvConfig(env: NodeJS.ProcessEnv): ConfigObject {
  const config: ConfigObject = {};

  for (const [envKey, path] of Object.entries(ENV_MAPPINGS)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedValue(config, path, parseEnvValue(value, path));
    }
  }

  return config;
}

/**
 * Find configuration file in specified directory or up the directory tree,
 * falling back to global config in ~/.partlens/config.json
 */
function findConfigFile(startDir: string = process.cwd()): string | null {
  let currentDir = resolve(startDir);
  const root = resolve('/');

  while (currentDir !== root) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = resolve(currentDir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    currentDir = resolve(currentDir, '..');
  }

  if (existsSync(GLOBAL_CONFIG_FILE)) {
    return GLOBAL_CONFIG_FILE;
  }

  return null;
}

/**
 * Load configuration from a JSON file
 */
function loadFileConfig(filePath: string): ConfigObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to load configuration from ${filePath}: ${message}`);
  }
  if (!isPlainObject(parsed)) {
    throw new Error(`Configuration in ${filePath} must be a JSON object`);
  }
  return parsed;
}

/**
 * Configuration loader options
 */
export interface LoadConfigOptions {
  /** Explicit path to configuration file */
  configPath?: string;
  /** Directory to start searching for config file */
  searchDir?: string;
  /** Skip loading from file */
  skipFile?: boolean;
  /** Skip environment variable overrides */
  skipEnv?: boolean;
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Additional configuration to merge */
  overrides?: ConfigObject;
}

/**
 * Load and validate partlens configuration
 *
 * Configuration is loaded in the following order (later overrides earlier):
 * 1. Default configuration
 * 2. Configuration file (if found)
 * 3. Environment variables
 * 4. Explicit overrides
 */
export function loadConfig(options: LoadConfigOptions = {}): PartlensConfig {
  let config: ConfigObject = { ...DEFAULT_CONFIG };

  if (options.skipFile !== true) {
    const configPath = options.configPath ?? findConfigFile(options.searchDir);
    if (configPath !== null) {
      config = deepMerge(config, loadFileConfig(configPath));
    }
  }

  if (options.skipEnv !== true) {
    config = deepMerge(config, loadEnvConfig(options.env ?? process.env));
  }

  if (options.overrides !== undefined) {
    config = deepMerge(config, options.overrides);
  }

  return validateConfig(config);
}

/**
 * Create a configuration instance with partial overrides (no file, no env)
 */
export function createConfig(overrides: ConfigObject = {}): PartlensConfig {
  return PartlensConfigSchema.parse(deepMerge({ ...DEFAULT_CONFIG }, overrides));
}

/**
 * Get the path to the global configuration file (~/.partlens/config.json)
 */
export function getGlobalConfigPath(): string {
  return GLOBAL_CONFIG_FILE;
}
