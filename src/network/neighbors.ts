/**
 * Neighbor Table
 *
 * Looks up a MAC address in the host's IPv4 neighbor (ARP) table.
 */

import type { CommandRunner } from '../lib/executor.js';
import { HostCommandError, formatErrorMessage } from '../lib/executor.js';

export interface NeighborEntry {
  address: string;
  macAddress: string;
  device: string | null;
  state: string;
}

/**
 * Anything that can map a MAC address to an IPv4 address
 */
export interface NeighborLookup {
  lookup(macAddress: string): Promise<string | null>;
}

/** Entries in these states carry no usable address */
const DEAD_STATES = new Set(['FAILED', 'INCOMPLETE']);

/**
 * Parse `ip -4 neigh show` output, e.g.
 * `192.168.1.50 dev vmbr0 lladdr bc:24:11:aa:bb:cc REACHABLE`.
 */
export function parseNeighborTable(output: string): NeighborEntry[] {
  const entries: NeighborEntry[] = [];
  for (const line of output.split('\n')) {
    const tokens = line.trim().split(/\s+/);
    const address = tokens[0];
    const lladdr = tokens.indexOf('lladdr');
    const mac = lladdr >= 0 ? tokens[lladdr + 1] : undefined;
    if (!address || !mac) {
      continue;
    }
    const dev = tokens.indexOf('dev');
    entries.push({
      address,
      macAddress: mac.toLowerCase(),
      device: dev >= 0 ? (tokens[dev + 1] ?? null) : null,
      state: tokens[tokens.length - 1] ?? '',
    });
  }
  return entries;
}

/**
 * Find the address of a live entry for a MAC address.
 */
export function findByMac(entries: readonly NeighborEntry[], macAddress: string): string | null {
  const wanted = macAddress.toLowerCase();
  const entry = entries.find((e) => e.macAddress === wanted && !DEAD_STATES.has(e.state));
  return entry?.address ?? null;
}

/**
 * NeighborLookup backed by `ip neigh`.
 */
export class NeighborTable implements NeighborLookup {
  constructor(private readonly runner: CommandRunner) {}

  async entries(): Promise<NeighborEntry[]> {
    const args = ['-4', 'neigh', 'show'];
    const result = await this.runner.run('ip', args, { timeout: 10000 });
    if (result.exitCode !== 0) {
      throw new HostCommandError(
        formatErrorMessage('ip', result.stderr, result.exitCode),
        'EXECUTION_FAILED',
        result.exitCode,
        result.stderr,
        'ip',
        args
      );
    }
    return parseNeighborTable(result.stdout);
  }

  async lookup(macAddress: string): Promise<string | null> {
    return findByMac(await this.entries(), macAddress);
  }
}
