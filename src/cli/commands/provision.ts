/**
 * Provision Command Handler
 *
 * Creates or completes a VM, waits until it accepts SSH logins and runs
 * the hand-off inside it. Safe to re-run: completed steps are skipped.
 */

import type { ResolvedConfig, ResolvedImage } from '../../config/types.js';
import { createDiscovery } from '../../core/discovery.js';
import { ConfigError, LabError, StateError } from '../../core/errors.js';
import { handoff } from '../../core/handoff.js';
import { provision, type ProvisionOutcome } from '../../core/lifecycle.js';
import { detectNuma } from '../../core/numa.js';
import { assertPreflightPassed, runPreflightChecks } from '../../core/preflight.js';
import { TagLedger } from '../../core/tags.js';
import type { DesiredConfig, GuestIdentity } from '../../core/types.js';
import { systemClock } from '../../lib/clock.js';
import { CommandExecutor } from '../../lib/executor.js';
import { Logger } from '../../lib/logger.js';
import { getLockPath } from '../../lib/paths.js';
import { getHostVersion, QmHost } from '../../proxmox/index.js';
import { SshClient } from '../../remote/ssh.js';
import { ProcessLock } from '../../state/lock.js';
import { StateManager } from '../../state/manager.js';
import { createOutput, type OutputFormatter } from '../output.js';
import { promptForOs } from '../prompt.js';
import { loadResolvedConfig, reportError, type VmCommandOptions } from '../shared.js';

export type ProvisionCommandOptions = VmCommandOptions;

/**
 * Pick the OS class: from flags or file, else ask on a terminal.
 */
async function chooseImage(config: ResolvedConfig, interactive: boolean): Promise<ResolvedImage> {
  const os = config.vm.os ?? (interactive ? await promptForOs(config.images) : undefined);
  if (!os) {
    throw new ConfigError(
      'No OS class given',
      'UNKNOWN_OS',
      `Pass --os with one of: ${Object.keys(config.images).join(', ')}`
    );
  }
  const image = config.images[os];
  if (!image) {
    throw new ConfigError(`Unknown OS class "${os}"`, 'UNKNOWN_OS');
  }
  return image;
}

/**
 * Record what this run did. The hints are advisory, so a broken file is
 * replaced rather than failing the run.
 */
async function saveHints(
  config: ResolvedConfig,
  desired: DesiredConfig,
  outcome: ProvisionOutcome,
  logger: Logger
): Promise<void> {
  const state = new StateManager(config.paths.stateDir);
  try {
    await state.load();
  } catch (error) {
    if (!(error instanceof StateError)) {
      throw error;
    }
    logger.warning(`${error.message}; starting a new hint file`);
    state.reset();
  }

  state.set({
    lastName: desired.name,
    lastOs: desired.os,
    lastStorage: desired.storage,
  });
  if (outcome.id !== null) {
    state.set({ lastIdentifier: String(outcome.id) });
  }
  if (outcome.state === 'Ready') {
    state.set({ lastAddress: outcome.address });
  }
  await state.save();
}

function reportOutcome(output: OutputFormatter, outcome: ProvisionOutcome): void {
  if (outcome.state === 'Ready') {
    output.provisionResult(outcome.id, outcome.transitions, outcome.steps, outcome.address);
  } else {
    output.provisionResult(outcome.id, outcome.transitions, outcome.steps);
    output.error(`Step "${outcome.step}" failed: ${outcome.error.message}`, outcome.error);
    if (outcome.id !== null) {
      output.info(`VM ${outcome.id} was left in place. Re-run the same command to resume.`);
    }
  }
}

/**
 * Execute the provision command.
 *
 * This command:
 * 1. Resolves configuration (flags, file, defaults) and the OS image
 * 2. Takes the process lock
 * 3. Runs preflight checks (host tools, image, SSH key, storage)
 * 4. Runs the lifecycle controller until the VM is Ready or Failed
 * 5. Runs the hand-off inside the VM
 * 6. Saves hints for the next run
 */
export async function provisionCommand(options: ProvisionCommandOptions): Promise<void> {
  const output = createOutput('provision', options);
  const logger = Logger.fromOptions(options);
  let lock: ProcessLock | null = null;
  let exitCode = 0;

  try {
    const config = await loadResolvedConfig(options);
    const image = await chooseImage(config, Boolean(process.stdin.isTTY) && !options.json);

    lock = new ProcessLock(getLockPath(config.paths.stateDir, 'provision'));
    await lock.acquire();

    const executor = new CommandExecutor({ verbose: options.verbose ?? false });
    const host = new QmHost(executor);

    logger.step('Preflight checks');
    const preflight = await runPreflightChecks(
      { host, hostVersion: () => getHostVersion(executor), logger },
      {
        imagePath: image.path,
        imageUrl: image.url,
        sshKey: config.paths.sshKey,
        sshPublicKey: config.paths.sshPublicKey,
        storage: config.vm.storage,
      }
    );
    assertPreflightPassed(preflight);
    const storage = preflight.storage.pool;
    if (!storage) {
      throw new LabError('Preflight selected no storage pool', 'STORAGE_NOT_FOUND');
    }
    logger.success(`Preflight passed (storage: ${storage})`);

    const numa = await detectNuma(executor);
    const desired: DesiredConfig = {
      name: config.vm.name,
      cores: config.vm.cores,
      memoryMB: config.vm.memoryMB,
      diskGB: config.vm.diskGB,
      storage,
      os: image.key,
      forceRecreate: options.force ?? false,
    };
    const identity: GuestIdentity = {
      user: config.vm.user ?? image.defaultUser,
      sshPublicKeyPath: config.paths.sshPublicKey,
    };

    const shell = new SshClient(executor);
    const outcome = await provision(
      {
        host,
        shell,
        discovery: createDiscovery(host, executor, systemClock),
        clock: systemClock,
        logger,
      },
      {
        id: config.vm.vmid,
        desired,
        identity,
        sshPrivateKey: config.paths.sshKey,
        sourceImage: image.path,
        hardware: config.hardware,
        machineOverride: image.machine,
        numa,
        timeouts: config.timeouts,
      }
    );

    await saveHints(config, desired, outcome, logger);
    reportOutcome(output, outcome);

    if (outcome.state === 'Failed') {
      exitCode = outcome.error.exitCode;
    } else {
      logger.step('Hand-off');
      const result = await handoff(
        { shell, tags: new TagLedger(host, logger), clock: systemClock, logger },
        {
          id: outcome.id,
          target: { host: outcome.address, user: identity.user, identityFile: config.paths.sshKey },
          installAgent: config.handoff.installAgent,
          command: config.handoff.command,
          serviceTags: config.handoff.serviceTags,
        }
      );
      output.setData('handoff', result);
      if (result.command === 'failed') {
        const error = new LabError(
          `Hand-off command failed on VM ${outcome.id}`,
          'OPERATION_FAILED',
          'The VM is ready; fix the command and run provision again.'
        );
        output.error(error.message, error);
        exitCode = error.exitCode;
      }
    }
  } catch (error) {
    exitCode = reportError(output, error);
  } finally {
    await lock?.release();
  }

  if (output.isJson()) {
    output.setLog(logger.getEntries());
  }
  output.flush();
  process.exit(exitCode);
}
