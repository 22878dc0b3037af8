/**
 * Configuration loader for the spectrum-reader server.
 *
 * Loads config from YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values
 * - Validation
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { AppConfig, ImportConfig, ServerSettings } from './types.js';
import { DEFAULT_CONFIG } from './types.js';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.CONFIG_PATH or './config.yaml') */
  configPath?: string;
}

/**
 * Config validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown
  ) {
    super(`Config validation error at '${path}': ${message}`);
    this.name = 'ConfigValidationError';
  }
}

type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends unknown[] ? T[K] : T[K] extends object ? DeepPartial<T[K]> : T[K];
};

export type PartialAppConfig = DeepPartial<AppConfig>;

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

/**
 * Substitute environment variables in a string.
 */
function substituteEnvVars(value: string): string {
  return value.replace(ENV_VAR_PATTERN, (_match, varName: string, defaultValue: string | undefined) => {
    const envValue = process.env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    console.warn(`Environment variable ${varName} is not set and has no default`);
    return '';
  });
}

/**
 * Recursively substitute environment variables in an object.
 */
export function substituteEnvVarsRecursive(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(substituteEnvVarsRecursive);
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value);
    }
    return result;
  }
  return obj;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects (source overrides target).
 */
function deepMerge<T extends object>(target: T, source: DeepPartial<T>): T {
  const base: object = target;
  const result: Record<string, unknown> = { ...base };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result as T;
}

/**
 * Environment values are strings after substitution; accept numeric strings for the port.
 */
function coercePort(value: unknown): unknown {
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  return value;
}

/**
 * Validate server configuration.
 */
function validateServerConfig(config: unknown, path = 'server'): asserts config is DeepPartial<ServerSettings> {
  if (!isPlainObject(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }

  const c = config;
  c.port = coercePort(c.port);

  if (c.port !== undefined && (typeof c.port !== 'number' || c.port < 1 || c.port > 65535)) {
    throw new ConfigValidationError('port must be a number between 1 and 65535', `${path}.port`, c.port);
  }

  if (c.host !== undefined && typeof c.host !== 'string') {
    throw new ConfigValidationError('host must be a string', `${path}.host`, c.host);
  }

  if (c.logLevel !== undefined && !['debug', 'info', 'warn', 'error'].includes(String(c.logLevel))) {
    throw new ConfigValidationError('logLevel must be one of: debug, info, warn, error', `${path}.logLevel`, c.logLevel);
  }

  const cors = c.cors;
  if (cors !== undefined) {
    if (!isPlainObject(cors)) {
      throw new ConfigValidationError('must be an object', `${path}.cors`, cors);
    }
    if (cors.enabled !== undefined && typeof cors.enabled !== 'boolean') {
      throw new ConfigValidationError('enabled must be a boolean', `${path}.cors.enabled`, cors.enabled);
    }
    const origins = cors.origins;
    if (origins !== undefined && (!Array.isArray(origins) || !origins.every((o) => typeof o === 'string'))) {
      throw new ConfigValidationError('origins must be a list of strings', `${path}.cors.origins`, origins);
    }
  }
}

/**
 * Validate import configuration.
 */
function validateImportConfig(config: unknown, path = 'import'): asserts config is DeepPartial<ImportConfig> {
  if (!isPlainObject(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }

  const c = config;

  if (c.directory !== undefined && (typeof c.directory !== 'string' || c.directory.length === 0)) {
    throw new ConfigValidationError('directory must be a non-empty string', `${path}.directory`, c.directory);
  }

  if (c.pattern !== undefined && typeof c.pattern !== 'string') {
    throw new ConfigValidationError('pattern must be a string', `${path}.pattern`, c.pattern);
  }

  if (c.recursive !== undefined && typeof c.recursive !== 'boolean') {
    throw new ConfigValidationError('recursive must be a boolean', `${path}.recursive`, c.recursive);
  }
}

/**
 * Validate the entire configuration.
 */
export function validateConfig(config: unknown): asserts config is PartialAppConfig {
  if (!isPlainObject(config)) {
    throw new ConfigValidationError('must be an object', '', config);
  }

  if (config.server !== undefined) {
    validateServerConfig(config.server);
  }

  if (config.import !== undefined) {
    validateImportConfig(config.import);
  }
}

/**
 * Merge a partial configuration over the defaults.
 */
export function resolveConfig(partial: PartialAppConfig): AppConfig {
  return {
    server: deepMerge(DEFAULT_CONFIG.server, partial.server ?? {}),
    import: deepMerge(DEFAULT_CONFIG.import, partial.import ?? {}),
  };
}

/**
 * Load configuration from a YAML file.
 *
 * @returns Loaded and validated configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const configPath = options.configPath
    ?? process.env.CONFIG_PATH
    ?? './config.yaml';

  const absolutePath = resolve(configPath);

  // If config file doesn't exist, return defaults
  if (!existsSync(absolutePath)) {
    console.warn(`Config file not found at ${absolutePath}, using defaults`);
    return resolveConfig({});
  }

  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new Error(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`);
  }

  // An empty file parses to null
  const substituted = substituteEnvVarsRecursive(parsed ?? {});

  validateConfig(substituted);
  return resolveConfig(substituted);
}
