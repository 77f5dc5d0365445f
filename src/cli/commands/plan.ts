/**
 * Plan Command Handler
 *
 * Shows what `labforge provision` would do to one VM without changing it.
 * Only read-only host queries are made.
 */

import { generateIdentifier } from '../../core/identifier.js';
import { inspect } from '../../core/inspector.js';
import { detectNuma } from '../../core/numa.js';
import { planProvision } from '../../core/planner.js';
import { resolveStorage } from '../../core/storage.js';
import { ConfigError } from '../../core/errors.js';
import { CommandExecutor } from '../../lib/executor.js';
import { Logger } from '../../lib/logger.js';
import { QmHost } from '../../proxmox/index.js';
import { createOutput } from '../output.js';
import { loadResolvedConfig, reportError, type VmCommandOptions } from '../shared.js';

export type PlanCommandOptions = VmCommandOptions;

/**
 * Execute the plan command.
 *
 * This command:
 * 1. Resolves configuration the same way provision does
 * 2. Picks the storage pool and the identifier provision would use
 * 3. Inspects the VM and computes every step from that one snapshot
 * 4. Displays the plan without executing anything
 */
export async function planCommand(options: PlanCommandOptions): Promise<void> {
  const output = createOutput('plan', options);
  const logger = Logger.fromOptions(options);
  let exitCode = 0;

  try {
    const config = await loadResolvedConfig(options);
    const os = config.vm.os;
    const image = os ? config.images[os] : undefined;
    if (!image) {
      throw new ConfigError(
        os ? `Unknown OS class "${os}"` : 'No OS class given',
        'UNKNOWN_OS',
        `Pass --os with one of: ${Object.keys(config.images).join(', ')}`
      );
    }

    const executor = new CommandExecutor({ verbose: options.verbose ?? false });
    const host = new QmHost(executor);

    const storage = await resolveStorage(host, config.vm.storage, logger);
    let vmid = config.vm.vmid;
    if (vmid === undefined) {
      vmid = await generateIdentifier(host);
      output.info(`No --vmid given; provision would allocate ${vmid}`);
    }

    const state = await inspect(host, vmid);
    const plan = planProvision(
      state,
      {
        name: config.vm.name,
        cores: config.vm.cores,
        memoryMB: config.vm.memoryMB,
        diskGB: config.vm.diskGB,
        storage,
        os: image.key,
        forceRecreate: options.force ?? false,
      },
      {
        identity: {
          user: config.vm.user ?? image.defaultUser,
          sshPublicKeyPath: config.paths.sshPublicKey,
        },
        sourceImage: image.path,
        numa: await detectNuma(executor),
      }
    );

    output.newline();
    output.planSummary(vmid, plan);
  } catch (error) {
    exitCode = reportError(output, error);
  }

  output.flush();
  process.exit(exitCode);
}
