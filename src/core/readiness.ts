/**
 * Readiness Waiter
 *
 * Bounded polls for a guest's network address, its SSH service and the
 * end of cloud-init. Every wait returns a typed outcome; running out of
 * time is a result, not an exception.
 */

import type { Clock } from '../lib/clock.js';
import type { Logger } from '../lib/logger.js';
import type { RemoteShell, ShellTarget } from '../remote/ssh.js';
import type { Discovery, DiscoveryTarget } from './discovery.js';

export interface WaitOptions {
  timeoutMs: number;
  intervalMs: number;
}

export interface NetworkWaitOptions extends WaitOptions {
  /** Elapsed time after which the fallback strategy fires, once */
  sweepAfterMs: number;
}

export interface WaitDeps {
  clock: Clock;
  logger: Logger;
}

export type NetworkOutcome =
  | { status: 'ready'; address: string; strategy: string; elapsedMs: number; attempts: number }
  | { status: 'timeout'; elapsedMs: number; attempts: number };

export type ShellOutcome =
  | { status: 'ready'; elapsedMs: number; attempts: number }
  | { status: 'timeout'; elapsedMs: number; attempts: number; lastError?: string };

export type CloudInitStatus = 'done' | 'disabled' | 'not-installed' | 'error' | 'timeout';

export interface CloudInitOutcome {
  status: CloudInitStatus;
  elapsedMs: number;
}

/**
 * Sleep until the next poll, never past the deadline.
 */
async function pause(deps: WaitDeps, options: WaitOptions, elapsed: number): Promise<void> {
  await deps.clock.sleep(Math.max(0, Math.min(options.intervalMs, options.timeoutMs - elapsed)));
}

/**
 * Wait until some strategy reports an address for the VM.
 */
export async function awaitNetwork(
  target: DiscoveryTarget,
  discovery: Discovery,
  options: NetworkWaitOptions,
  deps: WaitDeps
): Promise<NetworkOutcome> {
  const { clock, logger } = deps;
  const start = clock.now();
  let fallbackUsed = false;
  let attempts = 0;

  for (;;) {
    attempts++;

    for (const strategy of discovery.strategies) {
      const address = await strategy.find(target);
      if (address) {
        return { status: 'ready', address, strategy: strategy.name, elapsedMs: clock.now() - start, attempts };
      }
    }

    if (discovery.fallback && !fallbackUsed && clock.now() - start >= options.sweepAfterMs) {
      fallbackUsed = true;
      logger.info(`No address yet, trying ${discovery.fallback.name}`);
      const address = await discovery.fallback.find(target);
      if (address) {
        return {
          status: 'ready',
          address,
          strategy: discovery.fallback.name,
          elapsedMs: clock.now() - start,
          attempts,
        };
      }
    }

    const elapsed = clock.now() - start;
    if (elapsed >= options.timeoutMs) {
      return { status: 'timeout', elapsedMs: elapsed, attempts };
    }
    await pause(deps, options, elapsed);
  }
}

/**
 * Wait until a no-op command succeeds over SSH.
 */
export async function awaitShell(
  shell: RemoteShell,
  target: ShellTarget,
  options: WaitOptions,
  deps: WaitDeps
): Promise<ShellOutcome> {
  const { clock } = deps;
  const start = clock.now();
  let attempts = 0;
  let lastError: string | undefined;

  for (;;) {
    attempts++;
    const result = await shell.exec(target, ['true'], { timeoutMs: 15000 });
    if (result.reachable && result.exitCode === 0) {
      return { status: 'ready', elapsedMs: clock.now() - start, attempts };
    }
    lastError = result.reachable ? `exit code ${result.exitCode}` : result.reason;

    const elapsed = clock.now() - start;
    if (elapsed >= options.timeoutMs) {
      const outcome: ShellOutcome = { status: 'timeout', elapsedMs: elapsed, attempts };
      if (lastError) outcome.lastError = lastError;
      return outcome;
    }
    await pause(deps, options, elapsed);
  }
}

/**
 * Read the state from `cloud-init status` output.
 *
 * @returns The final state, or null while cloud-init is still running
 */
export function parseCloudInitStatus(output: string): Exclude<CloudInitStatus, 'timeout' | 'not-installed'> | null {
  const match = output.match(/^status:\s*(.+)$/m);
  const status = match?.[1]?.trim();
  switch (status) {
    case 'done':
      return 'done';
    case 'disabled':
      return 'disabled';
    case 'error':
      return 'error';
    default:
      return null;
  }
}

/**
 * Wait for cloud-init to finish its first boot.
 */
export async function awaitCloudInit(
  shell: RemoteShell,
  target: ShellTarget,
  options: WaitOptions,
  deps: WaitDeps
): Promise<CloudInitOutcome> {
  const { clock } = deps;
  const start = clock.now();

  for (;;) {
    const result = await shell.exec(target, ['cloud-init', 'status'], { timeoutMs: 30000 });
    if (result.reachable) {
      if (result.exitCode === 127) {
        return { status: 'not-installed', elapsedMs: clock.now() - start };
      }
      const status = parseCloudInitStatus(result.stdout);
      if (status) {
        return { status, elapsedMs: clock.now() - start };
      }
    }

    const elapsed = clock.now() - start;
    if (elapsed >= options.timeoutMs) {
      return { status: 'timeout', elapsedMs: elapsed };
    }
    await pause(deps, options, elapsed);
  }
}
