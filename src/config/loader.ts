/**
 * Configuration Loader
 *
 * Loads YAML configuration files from the filesystem and validates them.
 */

import { readFile } from 'node:fs/promises';
import yaml from 'js-yaml';

import { ConfigError } from '../core/errors.js';
import type { LabforgeConfig } from './types.js';
import { validateConfig } from './validator.js';

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

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
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
    const cause = error instanceof Error ? error : undefined;
    const code = errnoCode(error);
    if (code === 'ENOENT') {
      throw new ConfigLoadError(`Configuration file not found: ${filePath}`, filePath, 'not-found', cause);
    }
    if (code === 'EACCES') {
      throw new ConfigLoadError(
        `Permission denied reading configuration file: ${filePath}`,
        filePath,
        'unreadable',
        cause
      );
    }
    throw new ConfigLoadError(`Failed to read configuration file: ${filePath}`, filePath, 'unreadable', cause);
  }

  try {
    return yaml.load(content);
  } catch (error) {
    const detail = error instanceof yaml.YAMLException ? error.message : String(error);
    throw new ConfigLoadError(
      `Invalid YAML syntax in ${filePath}: ${detail}`,
      filePath,
      'invalid-yaml',
      error instanceof Error ? error : undefined
    );
  }
}

/**
 * Load, parse and validate a configuration file.
 *
 * @throws ConfigError describing the first failing stage
 */
export async function loadConfig(filePath: string): Promise<LabforgeConfig> {
  let data: unknown;
  try {
    data = await loadYamlFile(filePath);
  } catch (error) {
    if (error instanceof ConfigLoadError) {
      throw new ConfigError(
        error.message,
        error.reason === 'invalid-yaml' ? 'CONFIG_INVALID_YAML' : 'CONFIG_NOT_FOUND',
        error.reason === 'invalid-yaml'
          ? 'Check indentation and quoting in the YAML file.'
          : 'Pass an existing file with --config, or omit it to use built-in defaults.',
        filePath
      );
    }
    throw error;
  }

  const result = validateConfig(data);
  if (!result.valid) {
    throw new ConfigError(
      `Configuration file ${filePath} is invalid`,
      'CONFIG_VALIDATION_FAILED',
      'Fix the fields listed below and run `labforge validate` again.',
      filePath,
      result.errors.map((e) => ({ path: e.path, message: e.message }))
    );
  }
  return result.config;
}
