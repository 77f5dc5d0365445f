/**
 * Status Command Handler
 *
 * Shows the facets and power state of one VM. Read-only.
 */

import { IdentifierError } from '../../core/errors.js';
import { parseIdentifier } from '../../core/identifier.js';
import { inspect } from '../../core/inspector.js';
import { CommandExecutor } from '../../lib/executor.js';
import { QmHost } from '../../proxmox/index.js';
import { StateManager } from '../../state/manager.js';
import { createOutput } from '../output.js';
import { loadResolvedConfig, reportError } from '../shared.js';

/**
 * Options for the status command
 */
export interface StatusCommandOptions {
  config?: string;
  json?: boolean;
  verbose?: boolean;
}

/**
 * Execute the status command.
 *
 * Without an explicit identifier the VM from the last provision run is shown.
 */
export async function statusCommand(vmid: number | undefined, options: StatusCommandOptions): Promise<void> {
  const output = createOutput('status', options);
  let exitCode = 0;

  try {
    let id = vmid;
    if (id === undefined) {
      const config = await loadResolvedConfig({ config: options.config });
      const state = new StateManager(config.paths.stateDir);
      await state.load();
      const last = state.get('lastIdentifier');
      if (last === undefined) {
        throw new IdentifierError(
          'No VM identifier given and no previous run recorded',
          '',
          'Pass the identifier: labforge status <vmid>'
        );
      }
      id = parseIdentifier(last);
    }

    const host = new QmHost(new CommandExecutor({ verbose: options.verbose ?? false }));
    const resource = await inspect(host, id);
    const power = resource ? await host.powerState(id) : null;
    output.statusReport(id, resource, power);
  } catch (error) {
    exitCode = reportError(output, error);
  }

  output.flush();
  process.exit(exitCode);
}
