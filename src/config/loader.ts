/**
 * Configuration loader for odml-core.
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
import type {
  OdmlConfig,
  LoggingConfig,
  MergeConfig,
  NamingConfig,
  TerminologyConfig,
} from './types.js';
import { DEFAULT_CONFIG } from './types.js';
import { createLogger, isLogLevel, LOG_LEVELS } from '../logging/logger.js';
import { isMergePolicy, MERGE_POLICIES } from '../merge/types.js';

const log = createLogger('config');

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.ODML_CONFIG_PATH or './odml.config.yaml') */
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

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

/**
 * Substitute environment variables in a string.
 *
 * Supports:
 * - ${VAR_NAME} - Replace with env var value
 * - ${VAR_NAME:-default} - Replace with env var or default
 */
export function substituteEnvVars(value: string): string {
  return value.replace(ENV_VAR_PATTERN, (_match, varName: string, defaultValue: string | undefined) => {
    const envValue = process.env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    log.warn(`Environment variable ${varName} is not set and has no default`);
    return '';
  });
}

/**
 * Recursively substitute environment variables in an object.
 */
function substituteEnvVarsRecursive(obj: unknown): unknown {
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

function asRecord(config: unknown, path: string): Record<string, unknown> {
  if (!config || typeof config !== 'object' || Array.isArray(config)) {
    throw new ConfigValidationError('must be an object', path, config);
  }
  return { ...config };
}

/**
 * Booleans may arrive as strings after env substitution.
 */
function readBoolean(value: unknown, path: string): boolean | undefined {
  if (value === undefined) return undefined;
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  throw new ConfigValidationError('must be a boolean', path, value);
}

function validateLoggingConfig(config: unknown, path = 'logging'): Partial<LoggingConfig> {
  const level = asRecord(config, path).level;
  if (level === undefined) return {};
  if (!isLogLevel(level)) {
    throw new ConfigValidationError(`level must be one of: ${LOG_LEVELS.join(', ')}`, `${path}.level`, level);
  }
  return { level };
}

function validateMergeConfig(config: unknown, path = 'merge'): Partial<MergeConfig> {
  const defaultPolicy = asRecord(config, path).defaultPolicy;
  if (defaultPolicy === undefined) return {};
  if (!isMergePolicy(defaultPolicy)) {
    throw new ConfigValidationError(
      `defaultPolicy must be one of: ${MERGE_POLICIES.join(', ')}`,
      `${path}.defaultPolicy`,
      defaultPolicy,
    );
  }
  return { defaultPolicy };
}

function validateNamingConfig(config: unknown, path = 'naming'): Partial<NamingConfig> {
  const c = asRecord(config, path);
  const normalizeOnCreate = readBoolean(c.normalizeOnCreate, `${path}.normalizeOnCreate`);
  return normalizeOnCreate !== undefined ? { normalizeOnCreate } : {};
}

function validateTerminologyConfig(config: unknown, path = 'terminology'): Partial<TerminologyConfig> {
  const c = asRecord(config, path);
  const result: Partial<TerminologyConfig> = {};

  const directory = c.directory;
  if (directory !== undefined) {
    if (typeof directory !== 'string' || directory.length === 0) {
      throw new ConfigValidationError('directory must be a non-empty string', `${path}.directory`, directory);
    }
    result.directory = directory;
  }

  const recursive = readBoolean(c.recursive, `${path}.recursive`);
  if (recursive !== undefined) {
    result.recursive = recursive;
  }

  return result;
}

/**
 * Partial configuration as read from a file, section by section.
 */
export interface PartialOdmlConfig {
  logging?: Partial<LoggingConfig>;
  merge?: Partial<MergeConfig>;
  naming?: Partial<NamingConfig>;
  terminology?: Partial<TerminologyConfig>;
}

/**
 * Validate the entire configuration.
 */
export function validateConfig(config: unknown): PartialOdmlConfig {
  if (config === null || config === undefined) {
    return {};
  }
  const c = asRecord(config, '');
  const result: PartialOdmlConfig = {};

  if (c.logging !== undefined) {
    result.logging = validateLoggingConfig(c.logging);
  }
  if (c.merge !== undefined) {
    result.merge = validateMergeConfig(c.merge);
  }
  if (c.naming !== undefined) {
    result.naming = validateNamingConfig(c.naming);
  }
  if (c.terminology !== undefined) {
    result.terminology = validateTerminologyConfig(c.terminology);
  }

  return result;
}

/**
 * Merge a partial configuration over the defaults.
 */
export function resolveConfig(partial: PartialOdmlConfig = {}): OdmlConfig {
  return {
    logging: { ...DEFAULT_CONFIG.logging, ...partial.logging },
    merge: { ...DEFAULT_CONFIG.merge, ...partial.merge },
    naming: { ...DEFAULT_CONFIG.naming, ...partial.naming },
    terminology: { ...DEFAULT_CONFIG.terminology, ...partial.terminology },
  };
}

/**
 * Load configuration from a YAML file.
 *
 * @param options - Loading options
 * @returns Loaded and validated configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<OdmlConfig> {
  const configPath = options.configPath
    ?? process.env.ODML_CONFIG_PATH
    ?? './odml.config.yaml';

  const absolutePath = resolve(configPath);

  if (!existsSync(absolutePath)) {
    log.warn(`Config file not found at ${absolutePath}, using defaults`);
    return resolveConfig();
  }

  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new Error(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`);
  }

  const substituted = substituteEnvVarsRecursive(parsed);

  return resolveConfig(validateConfig(substituted));
}
