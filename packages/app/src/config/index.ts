/**
 * Configuration loading and management
 */

import { ParameterError } from '@featurekit/contracts';
import type { Logger } from '@featurekit/logger';
import { configSchema, envMapping, listPaths, numericPaths, type Config } from './schema.js';

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Load configuration from environment and defaults
 *
 * @throws {ParameterError} Listing every invalid setting; `parameter` names the first
 */
export function loadConfig(env: Environment = process.env, logger?: Logger): Config {
  const rawConfig: Record<string, unknown> = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedProperty(rawConfig, configPath, parseEnvSetting(configPath, value));
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`);
    const first = result.error.issues[0];
    throw new ParameterError(`Configuration validation failed:\n${errors.join('\n')}`, {
      parameter: first ? first.path.map(String).join('.') : 'config',
      issues: errors,
    });
  }

  if (logger) {
    logger.debug('Configuration loaded', getConfigSummary(result.data));
  }

  return result.data;
}

/**
 * Converts an env value for its config path. Only list and numeric paths are
 * converted, so a ticker such as "7203" or a year such as "2024" stays a string.
 */
export function parseEnvSetting(configPath: string, value: string): unknown {
  if (listPaths.has(configPath)) return parseEnvList(value);
  if (numericPaths.has(configPath)) return parseEnvValue(value);
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set nested property in object, creating intermediate objects
 */
function setNestedProperty(obj: Record<string, unknown>, path: string, value: unknown): void {
  const keys = path.split('.');
  const lastKey = keys.pop();
  if (!lastKey) return;

  let current = obj;
  for (const key of keys) {
    const next = current[key];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }

  current[lastKey] = value;
}

/**
 * Parse environment variable value to appropriate type
 */
export function parseEnvValue(value: string): string | number | boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;

  const num = Number(value);
  if (!Number.isNaN(num) && value.trim() !== '') return num;

  return value;
}

/**
 * Parse a comma-separated environment value, e.g. "10,50,200"
 */
export function parseEnvList(value: string): Array<string | number | boolean> {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
    .map(parseEnvValue);
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    environment: config.app.env,
    provider: config.provider.type,
    fixturePath: config.provider.fixturePath ?? 'bundled',
    defaults: config.defaults,
    featureOverrides: Object.keys(config.features),
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      file: config.logging.filePath ?? null,
    },
  };
}

// Re-export types
export type { Config } from './schema.js';
