/**
 * VM identifier allocation and validation.
 */

import type { VirtualizationHost } from '../proxmox/types.js';
import { IdentifierError } from './errors.js';

/** Lowest identifier Proxmox hands out */
export const MIN_IDENTIFIER = 100;
export const MAX_IDENTIFIER = 999999;

/**
 * Parse a user-supplied identifier.
 *
 * @throws IdentifierError when it is not an integer in range
 */
export function parseIdentifier(text: string): number {
  const trimmed = text.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new IdentifierError(`Invalid VM identifier "${text}": not a number`, text);
  }
  const id = Number(trimmed);
  if (id < MIN_IDENTIFIER || id > MAX_IDENTIFIER) {
    throw new IdentifierError(
      `Invalid VM identifier ${id}: must be between ${MIN_IDENTIFIER} and ${MAX_IDENTIFIER}`,
      text
    );
  }
  return id;
}

/**
 * Next free identifier: one above the highest VM or container identifier
 * in use, never below the platform floor.
 */
export function nextIdentifier(allocated: readonly number[]): number {
  const highest = allocated.reduce((max, id) => Math.max(max, id), MIN_IDENTIFIER - 1);
  const next = highest + 1;
  if (next > MAX_IDENTIFIER) {
    throw new IdentifierError(`No identifier left above ${highest}`, String(next));
  }
  return next;
}

export async function generateIdentifier(host: VirtualizationHost): Promise<number> {
  return nextIdentifier(await host.listAllocatedIdentifiers());
}

export async function isIdentifierAllocated(host: VirtualizationHost, id: number): Promise<boolean> {
  return (await host.listAllocatedIdentifiers()).includes(id);
}
