/**
 * Configuration Loader
 *
 * Loads YAML configuration files from the filesystem and turns them into a
 * validated, resolved configuration.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import yaml from 'js-yaml';

import { ConfigError } from '../core/errors.js';
import type { ResolvedConfig } from './types.js';
import { validateConfig } from './validator.js';
import { resolveConfig } from './resolver.js';

/**
 * Error thrown when configuration loading fails
 */
export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly reason: 'not-found' | 'unreadable' | 'invalid-yaml',
    public override readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}

/**
 * Load and parse a YAML configuration file.
 *
 * @param filePath - Path to the YAML configuration file
 * @returns Parsed YAML content as unknown (requires validation)
 * @throws ConfigLoadError if the file cannot be read or parsed
 */
export async function loadYamlFile(filePath: string): Promise<unknown> {
  let content: string;

  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') {
      throw new ConfigLoadError(`Configuration file not found: ${filePath}`, filePath, 'not-found', err);
    }
    if (err.code === 'EACCES') {
      throw new ConfigLoadError(
        `Permission denied reading configuration file: ${filePath}`,
        filePath,
        'unreadable',
        err
      );
    }
    throw new ConfigLoadError(`Failed to read configuration file: ${filePath}`, filePath, 'unreadable', err);
  }

  try {
    return yaml.load(content);
  } catch (error) {
    const err = error as yaml.YAMLException;
    throw new ConfigLoadError(`Invalid YAML syntax in ${filePath}: ${err.message}`, filePath, 'invalid-yaml', err);
  }
}

/**
 * Load, validate and resolve a configuration file.
 *
 * @throws ConfigError for a missing file, bad YAML or schema violations
 */
export async function loadConfig(file: string): Promise<ResolvedConfig> {
  const configPath = resolve(file);

  let raw: unknown;
  try {
    raw = await loadYamlFile(configPath);
  } catch (error) {
    if (error instanceof ConfigLoadError) {
      throw new ConfigError(
        error.message,
        error.reason === 'invalid-yaml' ? 'CONFIG_INVALID_YAML' : 'CONFIG_NOT_FOUND',
        error.reason === 'invalid-yaml'
          ? 'Fix the YAML syntax at the reported position.'
          : 'Ensure the configuration file exists and is readable.',
        configPath
      );
    }
    throw error;
  }

  const result = validateConfig(raw);
  if (!result.valid) {
    throw new ConfigError(
      `Configuration ${configPath} is invalid`,
      'CONFIG_VALIDATION_FAILED',
      'Run `vmlease validate` for the full list of problems.',
      configPath,
      result.errors.map(({ path, message }) => ({ path, message }))
    );
  }

  return resolveConfig(result.config, configPath);
}
