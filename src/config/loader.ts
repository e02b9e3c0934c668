/**
 * Configuration loader for the labprep server.
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
import type { AppConfig, ServerSettings, ReagentConfig } from './types.js';
import { DEFAULT_CONFIG } from './types.js';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.CONFIG_PATH or './config.yaml') */
  configPath?: string;
  /** Whether to validate config (default: true) */
  validate?: boolean;
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
    console.warn(`Environment variable ${varName} is not set and has no default`);
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

/**
 * Deep merge two objects (source overrides target).
 */
function deepMerge<T extends object>(target: T, source: Partial<T>): T {
  const result = { ...target };

  for (const key of Object.keys(source) as (keyof T)[]) {
    const sourceValue = source[key];
    const targetValue = target[key];

    if (
      sourceValue !== undefined &&
      sourceValue !== null &&
      typeof sourceValue === 'object' &&
      !Array.isArray(sourceValue) &&
      targetValue !== undefined &&
      targetValue !== null &&
      typeof targetValue === 'object' &&
      !Array.isArray(targetValue)
    ) {
      result[key] = deepMerge(targetValue, sourceValue as Partial<typeof targetValue>);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue as T[keyof T];
    }
  }

  return result;
}

function isPositiveNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

/**
 * Validate server configuration.
 */
function validateServerConfig(config: unknown, path = 'server'): asserts config is Partial<ServerSettings> {
  if (!config || typeof config !== 'object') {
    throw new ConfigValidationError('must be an object', path, config);
  }

  const c = config as Record<string, unknown>;

  if (c.port !== undefined && (typeof c.port !== 'number' || c.port < 1 || c.port > 65535)) {
    throw new ConfigValidationError('port must be a number between 1 and 65535', `${path}.port`, c.port);
  }

  if (c.host !== undefined && typeof c.host !== 'string') {
    throw new ConfigValidationError('host must be a string', `${path}.host`, c.host);
  }

  if (c.logLevel !== undefined && !['debug', 'info', 'warn', 'error'].includes(c.logLevel as string)) {
    throw new ConfigValidationError('logLevel must be one of: debug, info, warn, error', `${path}.logLevel`, c.logLevel);
  }

  if (c.cors !== undefined) {
    if (!c.cors || typeof c.cors !== 'object') {
      throw new ConfigValidationError('must be an object', `${path}.cors`, c.cors);
    }
    const cors = c.cors as Record<string, unknown>;
    if (cors.enabled !== undefined && typeof cors.enabled !== 'boolean') {
      throw new ConfigValidationError('enabled must be a boolean', `${path}.cors.enabled`, cors.enabled);
    }
    if (cors.origins !== undefined && (!Array.isArray(cors.origins) || !cors.origins.every((o) => typeof o === 'string'))) {
      throw new ConfigValidationError('origins must be an array of strings', `${path}.cors.origins`, cors.origins);
    }
  }
}

/**
 * Validate reagent calculator configuration.
 */
function validateReagentConfig(config: unknown, path = 'reagents'): asserts config is Partial<ReagentConfig> {
  if (!config || typeof config !== 'object') {
    throw new ConfigValidationError('must be an object', path, config);
  }

  const c = config as Record<string, unknown>;

  if (c.presetsPath !== undefined && (typeof c.presetsPath !== 'string' || c.presetsPath.length === 0)) {
    throw new ConfigValidationError('presetsPath must be a non-empty string', `${path}.presetsPath`, c.presetsPath);
  }

  if (c.defaultVolumeMl !== undefined && !isPositiveNumber(c.defaultVolumeMl)) {
    throw new ConfigValidationError('defaultVolumeMl must be a positive number', `${path}.defaultVolumeMl`, c.defaultVolumeMl);
  }

  if (c.defaultConcentrationMolar !== undefined && !isPositiveNumber(c.defaultConcentrationMolar)) {
    throw new ConfigValidationError(
      'defaultConcentrationMolar must be a positive number',
      `${path}.defaultConcentrationMolar`,
      c.defaultConcentrationMolar,
    );
  }

  if (
    c.displayPrecision !== undefined &&
    (typeof c.displayPrecision !== 'number' || !Number.isInteger(c.displayPrecision) || c.displayPrecision < 0 || c.displayPrecision > 10)
  ) {
    throw new ConfigValidationError('displayPrecision must be an integer between 0 and 10', `${path}.displayPrecision`, c.displayPrecision);
  }
}

/**
 * Validate the entire configuration.
 */
export function validateConfig(config: unknown): asserts config is Partial<AppConfig> {
  if (!config || typeof config !== 'object') {
    throw new ConfigValidationError('must be an object', '', config);
  }

  const c = config as Record<string, unknown>;

  if (c.server !== undefined) {
    validateServerConfig(c.server);
  }

  if (c.reagents !== undefined) {
    validateReagentConfig(c.reagents);
  }
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
    return structuredClone(DEFAULT_CONFIG);
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

  if (options.validate !== false) {
    validateConfig(substituted);
  }

  const partialConfig = substituted as Partial<AppConfig>;
  return {
    server: deepMerge(DEFAULT_CONFIG.server, partialConfig.server ?? {}),
    reagents: deepMerge(DEFAULT_CONFIG.reagents, partialConfig.reagents ?? {}),
  };
}
