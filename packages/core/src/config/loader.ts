/**
 * Configuration Loader for Relayhub
 *
 * Security considerations:
 * - Config files are validated against strict schemas
 * - Environment variables are used for secrets (never stored in config)
 * - Path traversal is prevented in file paths
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { homedir } from 'node:os';
import { parse as parseYaml } from 'yaml';
import { ConfigSchema, PartialConfigSchema, type Config, type PartialConfig } from '@relayhub/shared';
import { ConfigurationError, toErrorMessage } from '../utils/errors.js';

// Default config file locations (checked in order)
const DEFAULT_CONFIG_PATHS = ['./relayhub.yaml', './config/relayhub.yaml', '~/.relayhub/config.yaml'];

/**
 * Expand ~ to home directory
 */
export function expandPath(path: string): string {
  if (path.startsWith('~/')) {
    return resolve(homedir(), path.slice(2));
  }
  return resolve(path);
}

/**
 * Load configuration from a YAML file
 */
function loadConfigFile(path: string): PartialConfig | null {
  const expandedPath = expandPath(path);

  if (!existsSync(expandedPath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(expandedPath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Failed to load config from ${expandedPath}: ${toErrorMessage(error)}`);
  }

  // Validate against partial schema (allows missing fields)
  const result = PartialConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration in ${expandedPath}: ${result.error.message}`);
  }
  return result.data;
}

/**
 * Load configuration from environment variables.
 * Only non-secret values; values are validated with the rest of the config.
 */
function loadEnvConfig(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  if (env.RELAYHUB_ENV) {
    config.core = { environment: env.RELAYHUB_ENV };
  }
  if (env.RELAYHUB_LOG_LEVEL) {
    config.logging = { level: env.RELAYHUB_LOG_LEVEL };
  }
  if (env.RELAYHUB_DB_PATH) {
    config.storage = { dbPath: env.RELAYHUB_DB_PATH };
  }

  return config;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two config objects
 * Later values override earlier ones; arrays are replaced
 */
export function mergeConfigs(
  base: Record<string, unknown>,
  override: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;

    const baseValue = result[key];
    result[key] =
      isPlainObject(value) && isPlainObject(baseValue) ? mergeConfigs(baseValue, value) : value;
  }

  return result;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Override config values */
  overrides?: PartialConfig;
  /** Skip environment variable loading */
  skipEnv?: boolean;
  /** Environment to read (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
}

/**
 * Load and validate configuration
 *
 * Loading order (later overrides earlier):
 * 1. Default values from schema
 * 2. Config file (explicit path or auto-discovered)
 * 3. Environment variables
 * 4. Programmatic overrides
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  let fileConfig: PartialConfig = {};

  if (options.configPath) {
    const loaded = loadConfigFile(options.configPath);
    if (!loaded) {
      throw new ConfigurationError(`Config file not found: ${options.configPath}`);
    }
    fileConfig = loaded;
  } else {
    for (const path of DEFAULT_CONFIG_PATHS) {
      const loaded = loadConfigFile(path);
      if (loaded) {
        fileConfig = loaded;
        break;
      }
    }
  }

  const envConfig = options.skipEnv ? {} : loadEnvConfig(options.env ?? process.env);

  let merged = mergeConfigs(fileConfig, envConfig);
  if (options.overrides) {
    merged = mergeConfigs(merged, options.overrides);
  }

  // Validate and apply defaults
  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const errors = result.error.errors.map((e) => `  ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new ConfigurationError(`Invalid configuration:\n${errors}`);
  }

  return result.data;
}

/**
 * Get a secret value from environment variable
 * This is the only way to access secrets - they are never stored in config objects
 */
export function getSecret(envVarName: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
  return env[envVarName] || undefined;
}

/**
 * Get a required secret value from environment variable
 * Throws if the secret is not set
 */
export function requireSecret(envVarName: string, env: NodeJS.ProcessEnv = process.env): string {
  const value = getSecret(envVarName, env);
  if (!value) {
    throw new ConfigurationError(`Required secret not set: ${envVarName}`);
  }
  return value;
}
