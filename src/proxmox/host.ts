/**
 * QmHost
 *
 * VirtualizationHost backed by the local Proxmox management tools.
 */

import { CommandExecutor, HostCommandError, type CommandExecutorOptions } from '../lib/executor.js';
import {
  buildCreateVM,
  buildDestroyVM,
  buildImportDisk,
  buildResizeDisk,
  buildSetVM,
  buildStartVM,
  buildStopVM,
  type HostInvocation,
} from './commands.js';
import {
  getGuestNetworkInterfaces,
  getPowerState,
  getVMConfig,
  listAllocatedIdentifiers,
  listStoragePools,
  parseImportedVolume,
} from './queries.js';
import type {
  ConfigPatch,
  CreateVMSpec,
  GuestNetworkInterface,
  PowerState,
  StoragePool,
  VirtualizationHost,
} from './types.js';

/** Disk import copies a multi-GB image; allow it half an hour. */
const IMPORT_TIMEOUT_MS = 30 * 60 * 1000;

export class QmHost implements VirtualizationHost {
  private readonly executor: CommandExecutor;

  constructor(executor?: CommandExecutor, options?: CommandExecutorOptions) {
    this.executor = executor ?? new CommandExecutor(options);
  }

  async create(id: number, spec: CreateVMSpec): Promise<void> {
    await this.invoke(buildCreateVM(id, spec));
  }

  async configure(id: number, patch: ConfigPatch): Promise<void> {
    if (Object.keys(patch).length === 0) {
      return;
    }
    await this.invoke(buildSetVM(id, patch));
  }

  async readConfig(id: number): Promise<string> {
    return getVMConfig(this.executor, id);
  }

  async powerState(id: number): Promise<PowerState> {
    return getPowerState(this.executor, id);
  }

  async importDisk(id: number, image: string, pool: string): Promise<string> {
    const invocation = buildImportDisk(id, image, pool);
    const output = await this.invoke(invocation, IMPORT_TIMEOUT_MS);
    const volume = parseImportedVolume(output, id);
    if (!volume) {
      throw new HostCommandError(
        `Could not find the imported volume name in qm output: ${output.slice(0, 200)}`,
        'INVALID_RESPONSE',
        0,
        '',
        invocation.command,
        invocation.args
      );
    }
    return volume;
  }

  async resizeDisk(id: number, disk: string, sizeGB: number): Promise<void> {
    await this.invoke(buildResizeDisk(id, disk, sizeGB));
  }

  async start(id: number): Promise<void> {
    await this.invoke(buildStartVM(id));
  }

  async stop(id: number): Promise<void> {
    await this.invoke(buildStopVM(id));
  }

  async destroy(id: number): Promise<void> {
    await this.invoke(buildDestroyVM(id), IMPORT_TIMEOUT_MS);
  }

  async listAllocatedIdentifiers(): Promise<number[]> {
    return listAllocatedIdentifiers(this.executor);
  }

  async listStoragePools(contentType: string): Promise<StoragePool[]> {
    return listStoragePools(this.executor, contentType);
  }

  async queryNetworkInterfaces(id: number): Promise<GuestNetworkInterface[]> {
    return getGuestNetworkInterfaces(this.executor, id);
  }

  private async invoke(invocation: HostInvocation, timeout?: number): Promise<string> {
    return this.executor.execute(invocation.command, invocation.args, timeout ? { timeout } : {});
  }
}
