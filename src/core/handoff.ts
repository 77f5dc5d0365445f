/**
 * Hand-off
 *
 * Work done inside a ready guest: make sure the QEMU guest agent runs,
 * then run the configured provisioning command once and record the
 * services it installs as tags.
 */

import type { Clock } from '../lib/clock.js';
import type { Logger } from '../lib/logger.js';
import type { ExecResult, RemoteShell, ShellTarget } from '../remote/ssh.js';
import type { TagLedger } from './tags.js';

export type AgentInstallStatus = 'running' | 'started' | 'installed' | 'unsupported' | 'failed';

export interface AgentInstallOutcome {
  status: AgentInstallStatus;
  distribution?: string;
  attempts: number;
}

export type CommandStatus = 'skipped' | 'succeeded' | 'failed';

export interface HandoffOutcome {
  agent: AgentInstallOutcome | null;
  command: CommandStatus;
  exitCode?: number;
  /** Service tags now present on the VM */
  tagged: string[];
}

export interface HandoffDeps {
  shell: RemoteShell;
  tags: TagLedger;
  clock: Clock;
  logger: Logger;
}

export interface HandoffRequest {
  id: number;
  target: ShellTarget;
  installAgent: boolean;
  /** Remote argv; empty skips the command and the service tags */
  command: readonly string[];
  serviceTags: readonly string[];
}

export const AGENT_INSTALL_ATTEMPTS = 3;
const AGENT_PACKAGE = 'qemu-guest-agent';

const APT_FAMILY = new Set(['ubuntu', 'debian']);
const DNF_FAMILY = new Set(['rocky', 'rhel', 'centos', 'fedora', 'almalinux']);

/**
 * Read `ID=` from /etc/os-release content.
 */
export function parseOsReleaseId(text: string): string | null {
  const match = text.match(/^ID=["']?([^"'\n]+)["']?$/m);
  return match?.[1]?.trim().toLowerCase() ?? null;
}

/**
 * Package-manager commands that install and enable the agent.
 */
export function agentInstallCommands(distribution: string): string[][] | null {
  if (APT_FAMILY.has(distribution)) {
    return [
      ['sudo', 'apt-get', 'update', '-qq'],
      ['sudo', 'DEBIAN_FRONTEND=noninteractive', 'apt-get', 'install', '-y', AGENT_PACKAGE],
      ['sudo', 'systemctl', 'enable', '--now', AGENT_PACKAGE],
    ];
  }
  if (DNF_FAMILY.has(distribution)) {
    return [
      ['sudo', 'dnf', 'install', '-y', AGENT_PACKAGE],
      ['sudo', 'systemctl', 'enable', '--now', AGENT_PACKAGE],
    ];
  }
  return null;
}

function succeeded(result: ExecResult): boolean {
  return result.reachable && result.exitCode === 0;
}

/**
 * Ensure the guest agent runs inside the VM. Never fails the run.
 */
export async function installGuestAgent(
  shell: RemoteShell,
  target: ShellTarget,
  deps: { clock: Clock; logger: Logger }
): Promise<AgentInstallOutcome> {
  const { clock, logger } = deps;

  if (succeeded(await shell.exec(target, ['systemctl', 'is-active', '--quiet', AGENT_PACKAGE]))) {
    logger.skip('qemu-guest-agent is already running');
    return { status: 'running', attempts: 0 };
  }

  if (succeeded(await shell.exec(target, ['test', '-x', '/usr/bin/qemu-ga']))) {
    const started = await shell.exec(target, ['sudo', 'systemctl', 'start', AGENT_PACKAGE]);
    if (succeeded(started)) {
      logger.success('qemu-guest-agent started');
      return { status: 'started', attempts: 0 };
    }
  }

  const release = await shell.exec(target, ['cat', '/etc/os-release']);
  const distribution = release.reachable ? parseOsReleaseId(release.stdout) : null;
  if (!distribution) {
    logger.warning('Could not detect the guest distribution; skipping qemu-guest-agent install');
    return { status: 'unsupported', attempts: 0 };
  }

  const commands = agentInstallCommands(distribution);
  if (!commands) {
    logger.warning(`Unsupported distribution "${distribution}"; skipping qemu-guest-agent install`);
    return { status: 'unsupported', distribution, attempts: 0 };
  }

  for (let attempt = 1; attempt <= AGENT_INSTALL_ATTEMPTS; attempt++) {
    if (attempt > 1) {
      logger.info(`Attempt ${attempt}/${AGENT_INSTALL_ATTEMPTS}: waiting ${attempt * 10}s before retrying`);
      await clock.sleep(attempt * 10 * 1000);
    }

    let ok = true;
    for (const argv of commands) {
      if (!succeeded(await shell.exec(target, argv, { timeoutMs: 10 * 60 * 1000 }))) {
        ok = false;
        break;
      }
    }
    if (ok) {
      logger.success(`qemu-guest-agent installed on ${distribution}`);
      return { status: 'installed', distribution, attempts: attempt };
    }
  }

  logger.warning(`Failed to install qemu-guest-agent after ${AGENT_INSTALL_ATTEMPTS} attempts (non-critical)`);
  return { status: 'failed', distribution, attempts: AGENT_INSTALL_ATTEMPTS };
}

/**
 * Run the hand-off inside a ready VM.
 */
export async function handoff(deps: HandoffDeps, request: HandoffRequest): Promise<HandoffOutcome> {
  const { shell, tags, logger } = deps;

  const agent = request.installAgent ? await installGuestAgent(shell, request.target, deps) : null;

  if (request.command.length === 0) {
    return { agent, command: 'skipped', tagged: [] };
  }

  logger.step(`Running ${request.command.join(' ')}`);
  const result = await shell.exec(request.target, request.command, { timeoutMs: 2 * 60 * 60 * 1000 });
  if (!result.reachable) {
    logger.error(`Guest unreachable: ${result.reason}`);
    return { agent, command: 'failed', tagged: [] };
  }
  if (result.exitCode !== 0) {
    logger.error(`Command exited with code ${result.exitCode}`);
    return { agent, command: 'failed', exitCode: result.exitCode, tagged: [] };
  }
  logger.success('Command completed');

  const tagged: string[] = [];
  for (const tag of request.serviceTags) {
    if (await tags.addOne(request.id, tag)) {
      tagged.push(tag);
    }
  }
  return { agent, command: 'succeeded', exitCode: 0, tagged };
}
