/**
 * Storage pool selection.
 */

import type { Logger } from '../lib/logger.js';
import type { StoragePool, VirtualizationHost } from '../proxmox/types.js';
import { PreflightError } from './errors.js';

/** Pools tried in order when none is configured */
export const PREFERRED_POOLS = ['local-zfs', 'local-lvm', 'local'] as const;

/**
 * Pick a pool for VM disks from the pools that accept images.
 *
 * A requested pool that the host does not offer is reported and replaced.
 *
 * @returns The pool id, or null when the host offers none
 */
export function choosePool(pools: readonly StoragePool[], requested: string | undefined, logger?: Logger): string | null {
  const usable = pools.filter((pool) => pool.status === 'active');
  const ids = usable.map((pool) => pool.id);

  if (requested) {
    if (ids.includes(requested)) {
      return requested;
    }
    logger?.warning(`Storage "${requested}" is not an active image store on this host`);
  }

  for (const preferred of PREFERRED_POOLS) {
    if (ids.includes(preferred)) {
      return preferred;
    }
  }
  return ids[0] ?? null;
}

/**
 * Resolve the pool for this run.
 *
 * @throws PreflightError when no active pool accepts disk images
 */
export async function resolveStorage(
  host: VirtualizationHost,
  requested: string | undefined,
  logger?: Logger
): Promise<string> {
  const pool = choosePool(await host.listStoragePools('images'), requested, logger);
  if (!pool) {
    throw new PreflightError(
      'No active storage pool accepts VM disk images',
      'STORAGE_NOT_FOUND',
      'Enable the "Disk image" content type on a storage in Datacenter > Storage.'
    );
  }
  return pool;
}
