/**
 * Path Utilities
 *
 * Provides path expansion and the default locations for configuration,
 * state, images and SSH keys.
 */

import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';

/**
 * Name of the configuration file looked up in the working directory.
 */
export const DEFAULT_CONFIG_FILE = 'labforge.yaml';

/**
 * Expand a path, resolving ~ to home directory and making relative paths absolute.
 *
 * @param inputPath - Path that may contain ~, $VAR or be relative
 * @param basePath - Base directory for resolving relative paths
 * @returns Absolute path with ~ and variables expanded
 */
export function expandPath(inputPath: string, basePath: string): string {
  let expanded = inputPath;

  // Expand ~ to home directory
  if (expanded === '~' || expanded.startsWith('~/')) {
    expanded = join(homedir(), expanded.slice(1));
  }

  expanded = expanded.replace(
    /\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g,
    (_, braced: string | undefined, bare: string | undefined) => {
      return process.env[braced ?? bare ?? ''] ?? '';
    }
  );

  // Make relative paths absolute relative to config file directory
  if (!isAbsolute(expanded)) {
    expanded = resolve(basePath, expanded);
  }

  return expanded;
}

/**
 * Get the base directory for labforge data.
 *
 * @returns ~/.labforge
 */
export function getHomeDir(): string {
  return join(homedir(), '.labforge');
}

/**
 * Get the default state directory.
 *
 * @returns ~/.labforge/state
 */
export function getDefaultStateDir(): string {
  return join(getHomeDir(), 'state');
}

/**
 * Get the default OS image directory.
 *
 * @returns ~/.labforge/images
 */
export function getDefaultImageDir(): string {
  return join(getHomeDir(), 'images');
}

/**
 * Get the default SSH private key path.
 *
 * @returns ~/.labforge/id_ed25519
 */
export function getDefaultSshKeyPath(): string {
  return join(getHomeDir(), 'id_ed25519');
}

/**
 * Get the hint file path inside a state directory.
 */
export function getStatePath(stateDir: string): string {
  return join(stateDir, 'labforge.state.json');
}

/**
 * Get the lock file path for a named lock inside a state directory.
 */
export function getLockPath(stateDir: string, lockName: string): string {
  return join(stateDir, `${lockName}.lock`);
}
