/**
 * DHCP Lease Files
 *
 * Finds the address leased to a MAC address in dnsmasq or ISC dhcpd
 * lease files on the host.
 */

import { readFile } from 'node:fs/promises';

export const DEFAULT_LEASE_FILES = [
  '/var/lib/misc/dnsmasq.leases',
  '/var/lib/dhcp/dhcpd.leases',
  '/var/lib/dnsmasq/dnsmasq.leases',
];

export interface Lease {
  macAddress: string;
  address: string;
}

export interface LeaseLookup {
  lookup(macAddress: string): Promise<string | null>;
}

const IPV4 = /^\d{1,3}(\.\d{1,3}){3}$/;
const MAC = /^[0-9a-f]{2}(:[0-9a-f]{2}){5}$/i;

/**
 * Parse dnsmasq leases: `<expiry> <mac> <ip> <hostname> <client-id>`.
 */
export function parseDnsmasqLeases(text: string): Lease[] {
  const leases: Lease[] = [];
  for (const line of text.split('\n')) {
    const [, mac, address] = line.trim().split(/\s+/);
    if (mac && address && MAC.test(mac) && IPV4.test(address)) {
      leases.push({ macAddress: mac.toLowerCase(), address });
    }
  }
  return leases;
}

/**
 * Parse ISC dhcpd `lease <ip> { ... hardware ethernet <mac>; ... }` blocks.
 */
export function parseDhcpdLeases(text: string): Lease[] {
  const leases: Lease[] = [];
  const blocks = text.matchAll(/lease\s+(\d{1,3}(?:\.\d{1,3}){3})\s*\{([^}]*)\}/g);
  for (const [, address, body] of blocks) {
    const mac = body?.match(/hardware\s+ethernet\s+([0-9a-fA-F:]{17})\s*;/);
    if (address && mac?.[1]) {
      leases.push({ macAddress: mac[1].toLowerCase(), address });
    }
  }
  return leases;
}

/**
 * Parse either format; the file content decides.
 */
export function parseLeaseFile(text: string): Lease[] {
  return /\blease\s+\d/.test(text) ? parseDhcpdLeases(text) : parseDnsmasqLeases(text);
}

/**
 * The newest lease for a MAC. Lease files append, so the last match wins.
 */
export function findLease(leases: readonly Lease[], macAddress: string): string | null {
  const wanted = macAddress.toLowerCase();
  let found: string | null = null;
  for (const lease of leases) {
    if (lease.macAddress === wanted) {
      found = lease.address;
    }
  }
  return found;
}

export type FileReader = (path: string) => Promise<string>;

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

/**
 * LeaseLookup over a list of lease files; missing files are skipped.
 */
export class LeaseReader implements LeaseLookup {
  constructor(
    private readonly files: readonly string[] = DEFAULT_LEASE_FILES,
    private readonly read: FileReader = (path) => readFile(path, 'utf-8')
  ) {}

  async lookup(macAddress: string): Promise<string | null> {
    for (const file of this.files) {
      let text: string;
      try {
        text = await this.read(file);
      } catch (error) {
        if (isMissingFile(error)) {
          continue;
        }
        throw error;
      }
      const address = findLease(parseLeaseFile(text), macAddress);
      if (address) {
        return address;
      }
    }
    return null;
  }
}
