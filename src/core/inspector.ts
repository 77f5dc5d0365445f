/**
 * Resource Inspector
 *
 * Reads a VM's live configuration from the host and reduces it to a
 * ResourceState. This is the only place that pattern-matches `qm config`
 * output.
 */

import { HostCommandError } from '../lib/executor.js';
import type { VirtualizationHost } from '../proxmox/types.js';
import type { ResourceFacets, ResourceState } from './types.js';

/**
 * Split `qm config` text into its top-level key/value pairs.
 *
 * Stops at the first `[section]` header (snapshots, pending changes) and
 * skips comment lines. Keys are kept verbatim.
 */
export function parseConfigText(text: string): Map<string, string> {
  const entries = new Map<string, string>();

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();
    if (line.startsWith('[')) {
      break;
    }
    if (line === '' || line.startsWith('#')) {
      continue;
    }
    const separator = line.indexOf(':');
    if (separator <= 0) {
      continue;
    }
    entries.set(line.slice(0, separator).trim(), line.slice(separator + 1).trim());
  }

  return entries;
}

/**
 * Split a stored tag string. Proxmox accepts `;`, `,` and spaces.
 */
export function splitTags(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(/[;,\s]+/)
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);
}

function isAgentEnabled(value: string | undefined): boolean {
  if (!value) {
    return false;
  }
  return /(^|,)enabled=1(,|$)/.test(value) || /^1(,|$)/.test(value);
}

const SIZE_UNITS_PER_GB: Record<string, number> = { K: 1024 * 1024, M: 1024, G: 1, T: 1 / 1024 };

/**
 * Disk size in GB from a `size=` option, rounded to two decimals.
 */
function parseDiskSize(value: string | undefined): number | null {
  const match = value?.match(/(?:^|,)size=(\d+(?:\.\d+)?)([KMGT])(?:,|$)/);
  const amount = match?.[1];
  const perGB = match?.[2] ? SIZE_UNITS_PER_GB[match[2]] : undefined;
  if (!amount || perGB === undefined) {
    return null;
  }
  return Math.round((Number(amount) / perGB) * 100) / 100;
}

function parseNetwork(value: string | undefined): { macAddress: string | null; bridge: string | null } {
  if (!value) {
    return { macAddress: null, bridge: null };
  }
  const mac = value.match(/(?:^|,)[a-z0-9]+=([0-9A-Fa-f]{2}(?::[0-9A-Fa-f]{2}){5})(?:,|$)/);
  const bridge = value.match(/(?:^|,)bridge=([^,]+)/);
  return {
    macAddress: mac?.[1] ? mac[1].toLowerCase() : null,
    bridge: bridge?.[1] ?? null,
  };
}

/**
 * Reduce `qm config` text to a ResourceState.
 */
export function parseResourceConfig(text: string): ResourceState {
  const config = parseConfigText(text);

  const facets: ResourceFacets = {
    firmwareStore: config.has('efidisk0'),
    primaryDisk: config.has('scsi0'),
    initDrive: config.get('ide2')?.includes('cloudinit') ?? false,
    bootOrder: config.get('boot')?.includes('order=scsi0') ?? false,
    guestAgent: isAgentEnabled(config.get('agent')),
  };

  const { macAddress, bridge } = parseNetwork(config.get('net0'));

  return {
    exists: true,
    name: config.get('name') ?? null,
    facets,
    isComplete: Object.values(facets).every(Boolean),
    diskSizeGB: parseDiskSize(config.get('scsi0')),
    ciUser: config.get('ciuser') ?? null,
    hasSshKeys: (config.get('sshkeys') ?? '').length > 0,
    dhcp: /(^|,)ip=dhcp(,|$)/.test(config.get('ipconfig0') ?? ''),
    tags: splitTags(config.get('tags')),
    macAddress,
    bridge,
  };
}

/**
 * Inspect a VM.
 *
 * @returns The live state, or null when the host has no such VM
 * @throws HostCommandError for every failure other than not-found
 */
export async function inspect(host: VirtualizationHost, id: number): Promise<ResourceState | null> {
  let text: string;
  try {
    text = await host.readConfig(id);
  } catch (error) {
    if (error instanceof HostCommandError && error.code === 'NOT_FOUND') {
      return null;
    }
    throw error;
  }
  return parseResourceConfig(text);
}
