#!/usr/bin/env node
import { Command, program } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

import { provisionCommand } from './commands/provision.js';
import { validateCommand } from './commands/validate.js';
import { planCommand } from './commands/plan.js';
import { statusCommand } from './commands/status.js';
import { parsePositiveInt, parseVmidOption, type VmCommandOptions } from './shared.js';

// Get version from package.json
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packagePath = join(__dirname, '..', '..', 'package.json');
const packageJson = JSON.parse(readFileSync(packagePath, 'utf-8')) as { version: string };

program
  .name('labforge')
  .description('Idempotent lab VM provisioning for Proxmox VE')
  .version(packageJson.version)
  .option('--verbose', 'Print host commands before execution');

/**
 * Verbose option description shared across all commands that run host tools.
 */
const VERBOSE_DESC = 'Print host commands before execution';

/**
 * Merge the global --verbose flag into command-level options.
 * Supports both positions:
 *   labforge --verbose provision    (parent parses --verbose)
 *   labforge provision --verbose    (subcommand parses --verbose)
 */
function withGlobalOpts<T extends { verbose?: boolean }>(opts: T): T & { verbose: boolean } {
  const globalOpts = program.opts<{ verbose?: boolean }>();
  return { ...opts, verbose: opts.verbose === true || globalOpts.verbose === true };
}

/**
 * Options shared by provision and plan.
 */
function vmOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', 'Configuration file (default: ./labforge.yaml)')
    .option('--vmid <id>', 'VM identifier (allocated when omitted)', parseVmidOption)
    .option('--name <name>', 'VM name')
    .option('--os <class>', 'OS class from the image catalog')
    .option('--cores <n>', 'CPU cores', parsePositiveInt)
    .option('--memory <mb>', 'Memory in MB', parsePositiveInt)
    .option('--disk <gb>', 'Primary disk size in GB', parsePositiveInt)
    .option('--storage <pool>', 'Storage pool for VM disks')
    .option('--user <name>', 'Login user created by cloud-init')
    .option('--force', 'Destroy and recreate a fully configured VM')
    .option('--json', 'Output as JSON')
    .option('--verbose', VERBOSE_DESC);
}

program
  .command('validate <file>')
  .description('Validate YAML configuration against schema')
  .option('--json', 'Output as JSON')
  .action(validateCommand);

vmOptions(program.command('plan'))
  .description('Show intended actions without executing')
  .action((opts: VmCommandOptions) => planCommand(withGlobalOpts(opts)));

vmOptions(program.command('provision'))
  .description('Create or complete a VM and wait until it accepts SSH logins')
  .action((opts: VmCommandOptions) => provisionCommand(withGlobalOpts(opts)));

program
  .command('status [vmid]')
  .description('Show facets and power state of a VM (default: the last provisioned)')
  .option('-c, --config <file>', 'Configuration file (default: ./labforge.yaml)')
  .option('--json', 'Output as JSON')
  .option('--verbose', VERBOSE_DESC)
  .action((vmid: string | undefined, opts: { config?: string; json?: boolean; verbose?: boolean }) =>
    statusCommand(vmid === undefined ? undefined : parseVmidOption(vmid), withGlobalOpts(opts))
  );

await program.parseAsync();
