/**
 * Address Discovery
 *
 * Strategies that try to learn a guest's IPv4 address. Each returns an
 * address or null; the readiness waiter consults them in order and takes
 * the first hit.
 */

import type { Clock } from '../lib/clock.js';
import { HostCommandError, type CommandRunner } from '../lib/executor.js';
import { LeaseReader, type LeaseLookup } from '../network/leases.js';
import { NeighborTable, type NeighborLookup } from '../network/neighbors.js';
import { SubnetSweeper, type Sweeper } from '../network/sweep.js';
import type { GuestNetworkInterface, VirtualizationHost } from '../proxmox/types.js';

/**
 * What is known about the VM being looked for
 */
export interface DiscoveryTarget {
  id: number;
  macAddress: string | null;
  bridge: string | null;
}

export interface AddressStrategy {
  name: string;
  find(target: DiscoveryTarget): Promise<string | null>;
}

/**
 * An ordered strategy list plus an optional side-effecting last resort
 */
export interface Discovery {
  strategies: AddressStrategy[];
  fallback?: AddressStrategy;
}

/**
 * First usable IPv4 address of a non-loopback guest interface.
 */
export function pickGuestAddress(interfaces: readonly GuestNetworkInterface[]): string | null {
  for (const iface of interfaces) {
    if (iface.name === 'lo') {
      continue;
    }
    for (const addr of iface.addresses) {
      if (addr.type !== 'ipv4') continue;
      if (addr.address.startsWith('127.') || addr.address.startsWith('169.254.')) continue;
      return addr.address;
    }
  }
  return null;
}

/**
 * Ask the guest agent. An agent that is not up yet counts as no answer.
 */
export function guestAgentStrategy(host: VirtualizationHost): AddressStrategy {
  return {
    name: 'guest-agent',
    async find(target) {
      try {
        return pickGuestAddress(await host.queryNetworkInterfaces(target.id));
      } catch (error) {
        if (error instanceof HostCommandError && error.code !== 'TOOL_NOT_AVAILABLE') {
          return null;
        }
        throw error;
      }
    },
  };
}

/**
 * Run a lookup, treating any failure but a missing host tool as no answer.
 */
async function orNoAnswer(lookup: () => Promise<string | null>): Promise<string | null> {
  try {
    return await lookup();
  } catch (error) {
    if (error instanceof HostCommandError && error.code === 'TOOL_NOT_AVAILABLE') {
      throw error;
    }
    return null;
  }
}

export function neighborStrategy(table: NeighborLookup): AddressStrategy {
  return {
    name: 'neighbor-table',
    async find(target) {
      const { macAddress } = target;
      return macAddress ? orNoAnswer(() => table.lookup(macAddress)) : null;
    },
  };
}

export function leaseStrategy(leases: LeaseLookup): AddressStrategy {
  return {
    name: 'dhcp-lease',
    async find(target) {
      const { macAddress } = target;
      return macAddress ? orNoAnswer(() => leases.lookup(macAddress)) : null;
    },
  };
}

/**
 * Ping the bridge subnet, then read the neighbor table again. A failed
 * sweep is no answer.
 */
export function sweepFallback(sweeper: Sweeper, table: NeighborLookup): AddressStrategy {
  return {
    name: 'subnet-sweep',
    async find(target) {
      const { macAddress, bridge } = target;
      if (!macAddress || !bridge) {
        return null;
      }
      return orNoAnswer(async () => {
        await sweeper.sweep(bridge);
        return table.lookup(macAddress);
      });
    },
  };
}

/**
 * The host-backed strategy chain: agent, neighbors, leases, then sweep.
 */
export function createDiscovery(host: VirtualizationHost, runner: CommandRunner, clock: Clock): Discovery {
  const table = new NeighborTable(runner);
  return {
    strategies: [guestAgentStrategy(host), neighborStrategy(table), leaseStrategy(new LeaseReader())],
    fallback: sweepFallback(new SubnetSweeper(runner, clock), table),
  };
}
