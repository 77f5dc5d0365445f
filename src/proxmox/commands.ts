/**
 * Proxmox Command Builders
 *
 * Builds argument vectors for the qm, pct, pvesh, pvesm and pvecm tools.
 * Every builder returns a plain invocation; nothing is executed here.
 */

import type { ConfigPatch, CreateVMSpec } from './types.js';

/**
 * A host tool invocation
 */
export interface HostInvocation {
  command: string;
  args: string[];
}

/**
 * Firmware store settings rendered into efidisk0
 */
export interface FirmwareStoreOptions {
  /** Volume size passed to the allocator, e.g. '1' */
  size: string;
  /** OVMF variable store type, e.g. '4m' */
  efiType: string;
  /** Ship Microsoft secure boot keys */
  preEnrolledKeys: boolean;
}

/**
 * Build `qm create` for a new VM shell with no disks attached.
 */
export function buildCreateVM(id: number, spec: CreateVMSpec): HostInvocation {
  return {
    command: 'qm',
    args: [
      'create',
      String(id),
      '--name',
      spec.name,
      '--machine',
      spec.machine,
      '--bios',
      spec.bios,
      '--cpu',
      spec.cpuType,
      '--cores',
      String(spec.cores),
      '--memory',
      String(spec.memoryMB),
      '--numa',
      spec.numa ? '1' : '0',
      '--net0',
      spec.net0,
      '--scsihw',
      spec.scsiController,
      '--vga',
      spec.vga,
      '--ostype',
      spec.ostype,
    ],
  };
}

/**
 * Build `qm set` applying every key of the patch in insertion order.
 */
export function buildSetVM(id: number, patch: ConfigPatch): HostInvocation {
  const args = ['set', String(id)];
  for (const [key, value] of Object.entries(patch)) {
    args.push(`--${key}`, value);
  }
  return { command: 'qm', args };
}

export function buildGetConfig(id: number): HostInvocation {
  return { command: 'qm', args: ['config', String(id)] };
}

export function buildGetStatus(id: number): HostInvocation {
  return { command: 'qm', args: ['status', String(id)] };
}

export function buildStartVM(id: number): HostInvocation {
  return { command: 'qm', args: ['start', String(id)] };
}

export function buildStopVM(id: number): HostInvocation {
  return { command: 'qm', args: ['stop', String(id)] };
}

export function buildDestroyVM(id: number): HostInvocation {
  return { command: 'qm', args: ['destroy', String(id)] };
}

/**
 * Build `qm disk import`. The image is copied, never moved.
 */
export function buildImportDisk(
  id: number,
  image: string,
  pool: string,
  format: string = 'qcow2'
): HostInvocation {
  return {
    command: 'qm',
    args: ['disk', 'import', String(id), image, pool, '--format', format],
  };
}

/**
 * Build `qm disk resize` to an absolute size in GB.
 */
export function buildResizeDisk(id: number, disk: string, sizeGB: number): HostInvocation {
  return {
    command: 'qm',
    args: ['disk', 'resize', String(id), disk, `${sizeGB}G`],
  };
}

export function buildGuestNetworkQuery(id: number): HostInvocation {
  return {
    command: 'qm',
    args: ['guest', 'cmd', String(id), 'network-get-interfaces'],
  };
}

export function buildListVMs(): HostInvocation {
  return { command: 'qm', args: ['list'] };
}

export function buildListContainers(): HostInvocation {
  return { command: 'pct', args: ['list'] };
}

/**
 * Build `pvecm status`; exit code 0 means the node is part of a cluster.
 */
export function buildClusterStatus(): HostInvocation {
  return { command: 'pvecm', args: ['status'] };
}

export function buildClusterResources(): HostInvocation {
  return {
    command: 'pvesh',
    args: ['get', '/cluster/resources', '--type', 'vm', '--output-format', 'json'],
  };
}

export function buildStorageStatus(contentType: string): HostInvocation {
  return { command: 'pvesm', args: ['status', '--content', contentType] };
}

export function buildVersion(): HostInvocation {
  return { command: 'pveversion', args: [] };
}

/**
 * Render the net0 value, e.g. `virtio,bridge=vmbr0`.
 */
export function renderNetworkDevice(model: string, bridge: string): string {
  return `${model},bridge=${bridge}`;
}

/**
 * Render the efidisk0 value allocating a new firmware store in a pool.
 */
export function renderFirmwareStore(pool: string, options: FirmwareStoreOptions): string {
  const keys = options.preEnrolledKeys ? '1' : '0';
  return `${pool}:${options.size},efitype=${options.efiType},pre-enrolled-keys=${keys}`;
}

/**
 * Render the scsi0 value attaching an imported volume.
 */
export function renderDiskAttachment(pool: string, volume: string): string {
  return `${pool}:${volume},iothread=1,ssd=1,discard=on`;
}

/**
 * Render the ide2 value allocating a cloud-init drive.
 */
export function renderInitDrive(pool: string): string {
  return `${pool}:cloudinit`;
}

/**
 * Render the agent value.
 */
export function renderGuestAgent(fstrimClonedDisks: boolean): string {
  return fstrimClonedDisks ? 'enabled=1,fstrim_cloned_disks=1' : 'enabled=1';
}
