/**
 * Subnet Sweep
 *
 * Pings every host address of the bridge's /24 so the guest shows up in
 * the neighbor table. The probe results themselves are not used.
 */

import type { Clock } from '../lib/clock.js';
import { HostCommandError, type CommandRunner } from '../lib/executor.js';

export interface SweepOptions {
  /** Probes in flight at once (default: 32) */
  concurrency?: number;
  /** Wait after the last probe for the table to settle (default: 2000) */
  settleMs?: number;
}

export interface Sweeper {
  /** @returns Number of addresses probed */
  sweep(bridge: string): Promise<number>;
}

/**
 * Parse the first IPv4 address from `ip -4 -o addr show dev <bridge>`.
 */
export function parseInterfaceAddress(output: string): { address: string; prefix: number } | null {
  const match = output.match(/\binet\s+(\d{1,3}(?:\.\d{1,3}){3})\/(\d{1,2})/);
  if (!match?.[1] || !match[2]) {
    return null;
  }
  return { address: match[1], prefix: Number(match[2]) };
}

/**
 * Host addresses .1 to .254 of the /24 holding `address`, minus itself.
 */
export function subnetHosts(address: string): string[] {
  const octets = address.split('.');
  const base = octets.slice(0, 3).join('.');
  const hosts: string[] = [];
  for (let i = 1; i <= 254; i++) {
    const candidate = `${base}.${i}`;
    if (candidate !== address) {
      hosts.push(candidate);
    }
  }
  return hosts;
}

export class SubnetSweeper implements Sweeper {
  private readonly concurrency: number;
  private readonly settleMs: number;

  constructor(
    private readonly runner: CommandRunner,
    private readonly clock: Clock,
    options: SweepOptions = {}
  ) {
    this.concurrency = options.concurrency ?? 32;
    this.settleMs = options.settleMs ?? 2000;
  }

  async sweep(bridge: string): Promise<number> {
    const addr = await this.runner.run('ip', ['-4', '-o', 'addr', 'show', 'dev', bridge], { timeout: 10000 });
    const own = addr.exitCode === 0 ? parseInterfaceAddress(addr.stdout) : null;
    if (!own) {
      return 0;
    }

    const targets = subnetHosts(own.address);
    for (let i = 0; i < targets.length; i += this.concurrency) {
      const batch = targets.slice(i, i + this.concurrency);
      const results = await Promise.allSettled(
        batch.map((target) => this.runner.run('ping', ['-c', '1', '-W', '1', target], { timeout: 5000 }))
      );
      // Unreachable or slow targets are expected; only a missing ping is fatal
      for (const result of results) {
        if (
          result.status === 'rejected' &&
          result.reason instanceof HostCommandError &&
          result.reason.code === 'TOOL_NOT_AVAILABLE'
        ) {
          throw result.reason;
        }
      }
    }

    await this.clock.sleep(this.settleMs);
    return targets.length;
  }
}
