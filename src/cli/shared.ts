/**
 * Helpers shared by the command handlers.
 */

import { join } from 'node:path';

import { InvalidArgumentError } from 'commander';

import { loadConfig } from '../config/loader.js';
import { resolveConfig } from '../config/resolver.js';
import type { CliOverrides, LabforgeConfig, ResolvedConfig } from '../config/types.js';
import { getExitCode, isLabError } from '../core/errors.js';
import { parseIdentifier } from '../core/identifier.js';
import { pathExists } from '../core/preflight.js';
import { DEFAULT_CONFIG_FILE } from '../lib/paths.js';
import type { OutputFormatter } from './output.js';

/**
 * Flags accepted by every command that describes a VM
 */
export interface VmCommandOptions {
  config?: string;
  vmid?: number;
  name?: string;
  os?: string;
  cores?: number;
  memory?: number;
  disk?: number;
  storage?: string;
  user?: string;
  force?: boolean;
  json?: boolean;
  verbose?: boolean;
}

/**
 * commander parser for --vmid.
 */
export function parseVmidOption(value: string): number {
  try {
    return parseIdentifier(value);
  } catch (error) {
    throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * commander parser for positive integer options.
 */
export function parsePositiveInt(value: string): number {
  if (!/^\d+$/.test(value.trim()) || Number(value) < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return Number(value);
}

/**
 * Pick the config file: --config when given, else ./labforge.yaml if present.
 */
export async function findConfigFile(explicit: string | undefined, cwd: string = process.cwd()): Promise<string | undefined> {
  if (explicit) {
    return explicit;
  }
  const candidate = join(cwd, DEFAULT_CONFIG_FILE);
  return (await pathExists(candidate)) ? candidate : undefined;
}

/**
 * Load the config file (if any) and layer command-line flags over it.
 */
export async function loadResolvedConfig(options: VmCommandOptions): Promise<ResolvedConfig> {
  const configPath = await findConfigFile(options.config);
  const raw: LabforgeConfig = configPath ? await loadConfig(configPath) : {};

  const overrides: CliOverrides = {};
  if (options.vmid !== undefined) overrides.vmid = options.vmid;
  if (options.name !== undefined) overrides.name = options.name;
  if (options.os !== undefined) overrides.os = options.os;
  if (options.cores !== undefined) overrides.cores = options.cores;
  if (options.memory !== undefined) overrides.memory = options.memory;
  if (options.disk !== undefined) overrides.disk = options.disk;
  if (options.storage !== undefined) overrides.storage = options.storage;
  if (options.user !== undefined) overrides.user = options.user;

  return resolveConfig(raw, overrides, configPath);
}

/**
 * Report an error and return the process exit code for it.
 */
export function reportError(output: OutputFormatter, error: unknown): number {
  if (isLabError(error)) {
    output.error(error.message, error);
  } else if (error instanceof Error) {
    output.error(error.message);
  } else {
    output.error(String(error));
  }
  return getExitCode(error);
}
