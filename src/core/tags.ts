/**
 * Tag Ledger
 *
 * Grow-only label set on a VM. Writes are merges; nothing is ever removed.
 * A failed write is a warning, never a failure of the run.
 */

import type { Logger } from '../lib/logger.js';
import type { VirtualizationHost } from '../proxmox/types.js';
import { parseResourceConfig } from './inspector.js';

/**
 * Render tags the way the host stores them.
 */
export function joinTags(tags: readonly string[]): string {
  return tags.join(';');
}

/**
 * Merge tags into a set, keeping first-seen order and dropping duplicates.
 */
export function mergeTags(current: readonly string[], additions: readonly string[]): string[] {
  const merged = [...current];
  for (const tag of additions) {
    if (!merged.includes(tag)) {
      merged.push(tag);
    }
  }
  return merged;
}

export class TagLedger {
  constructor(
    private readonly host: VirtualizationHost,
    private readonly logger: Logger
  ) {}

  /**
   * Read the VM's current tags.
   */
  async read(id: number): Promise<string[]> {
    return parseResourceConfig(await this.host.readConfig(id)).tags;
  }

  /**
   * Replace all tags. No write when the stored string already matches.
   *
   * @returns Whether the tags now match
   */
  async setAll(id: number, tags: readonly string[]): Promise<boolean> {
    const target = joinTags(mergeTags([], tags));
    try {
      const current = joinTags(await this.read(id));
      if (current === target) {
        return true;
      }
      await this.host.configure(id, { tags: target });
      this.logger.success(`Tags set: ${target}`);
      return true;
    } catch (error) {
      this.logger.warning(`Could not set tags on VM ${id}: ${errorMessage(error)}`);
      return false;
    }
  }

  /**
   * Add one tag if absent, writing back the full set.
   *
   * @returns Whether the tag is now present
   */
  async addOne(id: number, tag: string): Promise<boolean> {
    try {
      const current = await this.read(id);
      if (current.includes(tag)) {
        return true;
      }
      await this.host.configure(id, { tags: joinTags(mergeTags(current, [tag])) });
      this.logger.success(`Tag added: ${tag}`);
      return true;
    } catch (error) {
      this.logger.warning(`Could not add tag "${tag}" to VM ${id}: ${errorMessage(error)}`);
      return false;
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
