/**
 * Preflight Checks for labforge
 *
 * Validates host requirements before a provisioning run:
 * - Proxmox VE tools present
 * - OS image file present
 * - SSH key pair present
 * - A storage pool that accepts disk images
 */

import { access } from 'node:fs/promises';

import type { Logger } from '../lib/logger.js';
import type { VirtualizationHost } from '../proxmox/types.js';
import { PreflightError } from './errors.js';
import { choosePool } from './storage.js';
import type { PreflightCheckResults, PreflightResult } from './types.js';

export interface PreflightDeps {
  host: VirtualizationHost;
  /** Version line of the host tools, or null when they are missing */
  hostVersion: () => Promise<string | null>;
  fileExists?: (path: string) => Promise<boolean>;
  logger?: Logger;
}

export interface PreflightInput {
  imagePath: string;
  imageUrl: string;
  sshKey: string;
  sshPublicKey: string;
  storage?: string;
}

/**
 * Check whether a path exists.
 */
export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Run all preflight checks before a provisioning run.
 *
 * The storage check only runs when the host tools are present.
 */
export async function runPreflightChecks(
  deps: PreflightDeps,
  input: PreflightInput
): Promise<PreflightCheckResults> {
  const exists = deps.fileExists ?? pathExists;

  const [hostTools, image, sshKey] = await Promise.all([
    checkHostTools(deps),
    checkImage(exists, input),
    checkSshKey(exists, input),
  ]);

  const storage: PreflightCheckResults['storage'] = hostTools.passed
    ? await checkStorage(deps, input.storage)
    : { passed: false, message: 'Storage not checked: host tools unavailable' };

  return {
    allPassed: hostTools.passed && image.passed && sshKey.passed && storage.passed,
    hostTools,
    image,
    sshKey,
    storage,
  };
}

export async function checkHostTools(deps: PreflightDeps): Promise<PreflightResult> {
  const version = await deps.hostVersion();
  if (version) {
    return { passed: true, message: version };
  }
  return {
    passed: false,
    message: 'Proxmox VE tools (pveversion, qm) not found',
    suggestion: 'Run labforge as root on a Proxmox VE node.',
  };
}

export async function checkImage(
  exists: (path: string) => Promise<boolean>,
  input: PreflightInput
): Promise<PreflightResult> {
  if (await exists(input.imagePath)) {
    return { passed: true };
  }
  return {
    passed: false,
    message: `OS image not found: ${input.imagePath}`,
    suggestion: `Download it with: wget -O ${input.imagePath} ${input.imageUrl}`,
  };
}

export async function checkSshKey(
  exists: (path: string) => Promise<boolean>,
  input: PreflightInput
): Promise<PreflightResult> {
  const [privateKey, publicKey] = await Promise.all([exists(input.sshKey), exists(input.sshPublicKey)]);
  if (privateKey && publicKey) {
    return { passed: true };
  }
  const missing = [privateKey ? null : input.sshKey, publicKey ? null : input.sshPublicKey].filter(
    (path): path is string => path !== null
  );
  return {
    passed: false,
    message: `SSH key not found: ${missing.join(', ')}`,
    suggestion: `Generate one with: ssh-keygen -t ed25519 -N "" -f ${input.sshKey}`,
  };
}

export async function checkStorage(
  deps: PreflightDeps,
  requested: string | undefined
): Promise<PreflightResult & { pool?: string }> {
  const pool = choosePool(await deps.host.listStoragePools('images'), requested, deps.logger);
  if (pool) {
    return { passed: true, pool };
  }
  return {
    passed: false,
    message: 'No active storage pool accepts VM disk images',
    suggestion: 'Enable the "Disk image" content type on a storage in Datacenter > Storage.',
  };
}

/**
 * Throw a PreflightError if checks failed.
 *
 * @param results - Preflight check results
 * @throws PreflightError for the first failing check
 */
export function assertPreflightPassed(results: PreflightCheckResults): void {
  if (results.allPassed) {
    return;
  }

  if (!results.hostTools.passed) {
    throw new PreflightError(
      results.hostTools.message ?? 'Proxmox VE tools not found',
      'HOST_NOT_AVAILABLE',
      results.hostTools.suggestion
    );
  }

  if (!results.image.passed) {
    throw new PreflightError(results.image.message ?? 'OS image not found', 'IMAGE_NOT_FOUND', results.image.suggestion);
  }

  if (!results.sshKey.passed) {
    throw new PreflightError(
      results.sshKey.message ?? 'SSH key not found',
      'SSH_KEY_NOT_FOUND',
      results.sshKey.suggestion
    );
  }

  if (!results.storage.passed) {
    throw new PreflightError(
      results.storage.message ?? 'No usable storage pool',
      'STORAGE_NOT_FOUND',
      results.storage.suggestion
    );
  }
}
