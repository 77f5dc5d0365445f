/**
 * Interactive OS selection.
 */

import { createInterface } from 'node:readline/promises';

import type { ResolvedImage } from '../config/types.js';
import { ConfigError } from '../core/errors.js';

/**
 * Match an answer against the menu: a 1-based number or an OS key.
 */
export function matchOsChoice(answer: string, keys: readonly string[]): string | null {
  const trimmed = answer.trim();
  if (/^\d+$/.test(trimmed)) {
    return keys[Number(trimmed) - 1] ?? null;
  }
  return keys.includes(trimmed) ? trimmed : null;
}

/**
 * Ask the operator which OS class to provision.
 *
 * @throws ConfigError after three unusable answers
 */
export async function promptForOs(images: Record<string, ResolvedImage>): Promise<string> {
  const keys = Object.keys(images);
  const rl = createInterface({ input: process.stdin, output: process.stderr });

  try {
    process.stderr.write('Select an operating system:\n');
    keys.forEach((key, index) => {
      process.stderr.write(`  ${index + 1}) ${images[key]?.displayName ?? key} [${key}]\n`);
    });

    for (let attempt = 0; attempt < 3; attempt++) {
      const choice = matchOsChoice(await rl.question(`Choice [1-${keys.length}]: `), keys);
      if (choice) {
        return choice;
      }
      process.stderr.write('Invalid choice.\n');
    }
  } finally {
    rl.close();
  }

  throw new ConfigError('No OS class selected', 'UNKNOWN_OS', `Pass --os with one of: ${keys.join(', ')}`);
}
