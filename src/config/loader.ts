/**
 * Configuration Loader
 *
 * Loads the YAML configuration, interpolates ${ENV_VAR} references, applies
 * CLI overrides and validates the result.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';
import { createLogger, type Logger } from '../utils/logger.js';
import { ConfigurationError, ValidationError, errorMessage } from '../utils/errors.js';
import { LoadBenchConfigSchema, type ConfigOverrides, type LoadBenchConfig } from './schema.js';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects; arrays and scalars from `source` replace those in `target`
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const output: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = output[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Interpolate environment variables in string
 *
 * Replaces ${VAR_NAME} with process.env.VAR_NAME
 */
export function interpolateEnvVars(
  content: string,
  env: NodeJS.ProcessEnv = process.env,
  logger?: Logger
): string {
  return content.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => {
    const value = env[varName];
    if (value === undefined) {
      logger?.warn({ varName }, 'Environment variable not found');
      return '';
    }
    return value;
  });
}

/**
 * Walk up from this module to the directory holding package.json
 */
function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

export function defaultConfigPath(): string {
  return join(findPackageRoot(), 'config', 'loadbench.yaml');
}

/**
 * Validate a raw configuration object
 *
 * @throws {ValidationError} if configuration is invalid
 */
export function validateConfig(raw: unknown): LoadBenchConfig {
  try {
    return LoadBenchConfigSchema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      const validationErrors = error.errors.map((err) => ({
        path: err.path.join('.'),
        message: err.message,
      }));
      throw new ValidationError('Configuration validation failed', validationErrors, error);
    }
    throw error;
  }
}

async function readConfigDocument(path: string, logger: Logger): Promise<PlainObject> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(
      `Failed to load configuration from ${path}: ${errorMessage(error)}`,
      error instanceof Error ? error : undefined
    );
  }

  let document: unknown;
  try {
    document = parseYaml(interpolateEnvVars(content, process.env, logger));
  } catch (error) {
    throw new ConfigurationError(
      `Invalid YAML in ${path}: ${errorMessage(error)}`,
      error instanceof Error ? error : undefined
    );
  }

  // An empty file parses to null
  if (document === null || document === undefined) {
    return {};
  }
  if (!isPlainObject(document)) {
    throw new ConfigurationError(`Configuration in ${path} must be a mapping`);
  }
  return document;
}

/**
 * Load configuration
 *
 * @param path - YAML file; when omitted, `config/loadbench.yaml` at the package
 *   root is used if present, otherwise the built-in defaults
 * @param overrides - values that take precedence over the file (CLI flags)
 * @param logger - defaults to a ConfigLoader logger at `overrides.logLevel`
 * @throws {ConfigurationError} if the file cannot be read or parsed
 * @throws {ValidationError} if the merged configuration is invalid
 *
 * @example
 * ```typescript
 * const config = await loadConfig('config/loadbench.yaml', { timing: { trialDurationMs: 10_000 } });
 * console.log(config.matrix.workloads);
 * ```
 */
export async function loadConfig(
  path?: string,
  overrides: ConfigOverrides = {},
  logger: Logger = createLogger('ConfigLoader', overrides.logLevel)
): Promise<LoadBenchConfig> {
  let document: PlainObject = {};

  if (path) {
    document = await readConfigDocument(path, logger);
    logger.debug({ path }, 'Configuration file read');
  } else {
    const fallback = defaultConfigPath();
    if (existsSync(fallback)) {
      document = await readConfigDocument(fallback, logger);
      logger.debug({ path: fallback }, 'Default configuration file read');
    }
  }

  const config = validateConfig(deepMerge(document, overrides));
  logger.debug(
    {
      workloads: config.matrix.workloads.length,
      concurrencyLevels: config.matrix.concurrency.length,
      trialDurationMs: config.timing.trialDurationMs,
    },
    'Configuration validated'
  );
  return config;
}
