/**
 * Proxmox Queries
 *
 * Parsers for the text and JSON printed by the Proxmox tools, and the
 * query functions that run them through the executor.
 */

import { HostCommandError, type CommandExecutor } from '../lib/executor.js';
import {
  buildClusterResources,
  buildClusterStatus,
  buildGetConfig,
  buildGetStatus,
  buildGuestNetworkQuery,
  buildListContainers,
  buildListVMs,
  buildStorageStatus,
  buildVersion,
} from './commands.js';
import type { GuestIpAddress, GuestNetworkInterface, PowerState, StoragePool } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse the leading VMID column of `qm list` or `pct list`.
 *
 * Header and malformed rows are skipped.
 */
export function parseIdentifierList(output: string): number[] {
  const ids: number[] = [];
  for (const line of output.split('\n')) {
    const first = line.trim().split(/\s+/)[0] ?? '';
    if (/^\d+$/.test(first)) {
      ids.push(Number(first));
    }
  }
  return ids;
}

/**
 * Extract VM and container identifiers from `pvesh get /cluster/resources`.
 */
export function parseClusterResources(data: unknown): number[] {
  if (!Array.isArray(data)) {
    return [];
  }
  const ids: number[] = [];
  for (const entry of data) {
    if (isRecord(entry) && typeof entry.vmid === 'number' && Number.isInteger(entry.vmid)) {
      ids.push(entry.vmid);
    }
  }
  return ids;
}

/**
 * Parse `qm status` output, e.g. `status: running`.
 */
export function parsePowerState(output: string): PowerState {
  const match = output.match(/^status:\s*(\S+)/m);
  switch (match?.[1]) {
    case 'running':
      return 'running';
    case 'stopped':
      return 'stopped';
    case 'paused':
      return 'paused';
    default:
      return 'unknown';
  }
}

/**
 * Find the volume name created by `qm disk import`.
 *
 * The tool reports e.g. `unused0:local-zfs:vm-101-disk-1`.
 */
export function parseImportedVolume(output: string, id: number): string | null {
  const match = output.match(new RegExp(`vm-${id}-disk-\\d+`));
  return match ? match[0] : null;
}

/**
 * Parse the table printed by `pvesm status`.
 */
export function parseStorageStatus(output: string): StoragePool[] {
  const pools: StoragePool[] = [];
  for (const line of output.split('\n')) {
    const columns = line.trim().split(/\s+/);
    const [id, type, status, , , available] = columns;
    if (!id || !type || !status || id === 'Name') {
      continue;
    }
    const pool: StoragePool = { id, type, status };
    if (available !== undefined && /^\d+$/.test(available)) {
      pool.availableKiB = Number(available);
    }
    pools.push(pool);
  }
  return pools;
}

function parseGuestAddress(value: unknown): GuestIpAddress | null {
  if (!isRecord(value)) {
    return null;
  }
  const type = value['ip-address-type'];
  const address = value['ip-address'];
  if ((type !== 'ipv4' && type !== 'ipv6') || typeof address !== 'string') {
    return null;
  }
  const parsed: GuestIpAddress = { type, address };
  if (typeof value.prefix === 'number') {
    parsed.prefix = value.prefix;
  }
  return parsed;
}

/**
 * Parse the guest agent's `network-get-interfaces` reply.
 *
 * Accepts the bare array or the `{ "result": [...] }` envelope.
 */
export function parseGuestInterfaces(data: unknown): GuestNetworkInterface[] {
  const list = isRecord(data) ? data.result : data;
  if (!Array.isArray(list)) {
    return [];
  }

  const interfaces: GuestNetworkInterface[] = [];
  for (const entry of list) {
    if (!isRecord(entry) || typeof entry.name !== 'string') {
      continue;
    }
    const rawAddresses = Array.isArray(entry['ip-addresses']) ? entry['ip-addresses'] : [];
    const addresses: GuestIpAddress[] = [];
    for (const raw of rawAddresses) {
      const address = parseGuestAddress(raw);
      if (address) {
        addresses.push(address);
      }
    }
    const iface: GuestNetworkInterface = { name: entry.name, addresses };
    const hardwareAddress = entry['hardware-address'];
    if (typeof hardwareAddress === 'string') {
      iface.hardwareAddress = hardwareAddress;
    }
    interfaces.push(iface);
  }
  return interfaces;
}

/**
 * Read the raw configuration of a VM.
 *
 * @throws HostCommandError with code NOT_FOUND when the VM does not exist
 */
export async function getVMConfig(executor: CommandExecutor, id: number): Promise<string> {
  const { command, args } = buildGetConfig(id);
  return executor.execute(command, args);
}

export async function getPowerState(executor: CommandExecutor, id: number): Promise<PowerState> {
  const { command, args } = buildGetStatus(id);
  return parsePowerState(await executor.execute(command, args));
}

/**
 * Check whether this node belongs to a cluster.
 */
export async function isClustered(executor: CommandExecutor): Promise<boolean> {
  const { command, args } = buildClusterStatus();
  const result = await executor.run(command, args);
  return result.exitCode === 0;
}

/**
 * List every identifier taken by a VM or container.
 *
 * On a cluster the whole cluster is consulted, otherwise only this node.
 */
export async function listAllocatedIdentifiers(executor: CommandExecutor): Promise<number[]> {
  if (await isClustered(executor)) {
    const { command, args } = buildClusterResources();
    return parseClusterResources(await executor.executeJson<unknown>(command, args));
  }

  const vms = buildListVMs();
  const containers = buildListContainers();
  const [vmOutput, containerOutput] = await Promise.all([
    executor.execute(vms.command, vms.args),
    executor.execute(containers.command, containers.args),
  ]);
  return [...parseIdentifierList(vmOutput), ...parseIdentifierList(containerOutput)];
}

export async function listStoragePools(
  executor: CommandExecutor,
  contentType: string
): Promise<StoragePool[]> {
  const { command, args } = buildStorageStatus(contentType);
  return parseStorageStatus(await executor.execute(command, args));
}

/**
 * Ask the guest agent for the VM's interfaces.
 *
 * @throws HostCommandError while the agent is not running in the guest
 */
export async function getGuestNetworkInterfaces(
  executor: CommandExecutor,
  id: number
): Promise<GuestNetworkInterface[]> {
  const { command, args } = buildGuestNetworkQuery(id);
  return parseGuestInterfaces(await executor.executeJson<unknown>(command, args, { timeout: 15000 }));
}

/**
 * Get the Proxmox VE version line, or null when the tools are missing.
 */
export async function getHostVersion(executor: CommandExecutor): Promise<string | null> {
  const { command, args } = buildVersion();
  try {
    return await executor.execute(command, args);
  } catch (error) {
    if (error instanceof HostCommandError && error.code === 'TOOL_NOT_AVAILABLE') {
      return null;
    }
    throw error;
  }
}
