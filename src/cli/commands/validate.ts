/**
 * Validate Command Handler
 *
 * Validates a YAML configuration file against the schema without
 * touching the host.
 */

import { resolve } from 'node:path';

import { loadConfig } from '../../config/loader.js';
import { resolveConfig } from '../../config/resolver.js';
import { ConfigError } from '../../core/errors.js';
import { createOutput } from '../output.js';
import { reportError } from '../shared.js';

/**
 * Options for the validate command
 */
export interface ValidateCommandOptions {
  json?: boolean;
}

/**
 * Execute the validate command.
 *
 * This command:
 * 1. Loads the YAML configuration file
 * 2. Validates it against the JSON schema
 * 3. Resolves it, which also checks the OS class against the image catalog
 * 4. Reports validation errors or success
 */
export async function validateCommand(file: string, options: ValidateCommandOptions): Promise<void> {
  const output = createOutput('validate', options);
  let exitCode = 0;

  try {
    const configPath = resolve(file);
    output.info(`Validating configuration: ${file}`);

    const config = resolveConfig(await loadConfig(configPath), {}, configPath);
    output.validationSuccess(config.vm.os, Object.keys(config.images));
  } catch (error) {
    if (error instanceof ConfigError && error.validationErrors) {
      output.validationError(error.validationErrors);
      exitCode = error.exitCode;
    } else {
      exitCode = reportError(output, error);
    }
  }

  output.flush();
  process.exit(exitCode);
}
