/**
 * Configuration loading and validation utilities.
 *
 * Provides functions to load, find, and validate precompile config files.
 */

import { access } from 'node:fs/promises';
import { join, dirname, resolve } from 'node:path';
import { atomicReadJson, FsError } from './fs.js';
import { CONFIG_SCHEMA, validateWithSchema } from './schema.js';
import { CONFIG_FILE_NAME } from './branding.js';
import type { PrecompileConfig } from '../types/config.js';

export { CONFIG_FILE_NAME };

/**
 * Error thrown when configuration loading or validation fails.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Searches for a configuration file by walking upward from a directory.
 * Stops at the filesystem root if not found.
 *
 * @param startDir - Directory to start from (defaults to the current directory)
 * @returns Path to the config file if found, null otherwise
 */
export async function findConfigFile(startDir: string = process.cwd()): Promise<string | null> {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    try {
      await access(configPath);
      return configPath;
    } catch {
      // Not here; keep walking up.
    }

    if (currentDir === dirname(currentDir)) {
      return null;
    }
    currentDir = dirname(currentDir);
  }
}

/**
 * Validates a parsed configuration object.
 *
 * @returns The typed configuration
 * @throws {ConfigError} Listing every schema violation
 */
export function validateConfig(config: unknown, configPath?: string): PrecompileConfig {
  const result = validateWithSchema<PrecompileConfig>(config, CONFIG_SCHEMA);
  if (!result.valid || result.data === null) {
    throw new ConfigError(
      `Invalid configuration file: ${result.errors.join('; ')}`,
      configPath
    );
  }
  return result.data;
}

/**
 * Loads and validates a precompile configuration file.
 *
 * Relative `local_checkout_dir` values are resolved against the config
 * file's directory.
 *
 * @param configPath - Optional path to the config file. If not provided,
 *                     searches upward for precompile.config.json.
 * @throws {ConfigError} If the config file cannot be found, read, or is invalid
 *
 * @example
 * ```typescript
 * const config = await loadConfig();
 * const other = await loadConfig('/path/to/precompile.config.json');
 * ```
 */
export async function loadConfig(configPath?: string): Promise<PrecompileConfig> {
  let resolvedPath: string;

  if (configPath) {
    resolvedPath = resolve(configPath);
  } else {
    const found = await findConfigFile();
    if (!found) {
      throw new ConfigError(
        `Configuration file not found. Expected ${CONFIG_FILE_NAME} in current directory or parent directories.`
      );
    }
    resolvedPath = found;
  }

  let rawConfig: unknown;
  try {
    rawConfig = await atomicReadJson<unknown>(resolvedPath);
  } catch (error) {
    if (error instanceof FsError) {
      throw new ConfigError(
        `Failed to read configuration file: ${error.message}`,
        resolvedPath,
        error
      );
    }
    throw error;
  }

  const config = validateConfig(rawConfig, resolvedPath);
  if (config.local_checkout_dir) {
    config.local_checkout_dir = resolve(dirname(resolvedPath), config.local_checkout_dir);
  }
  return config;
}
