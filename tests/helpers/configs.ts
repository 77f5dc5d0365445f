/**
 * Shared inputs for core tests.
 */

import { DEFAULT_HARDWARE } from '../../src/config/resolver.js';
import type { ResolvedHardware, ResolvedTimeouts } from '../../src/config/types.js';
import type { DesiredConfig, GuestIdentity } from '../../src/core/types.js';

export const HARDWARE: ResolvedHardware = DEFAULT_HARDWARE;

export const DESIRED: DesiredConfig = {
  name: 'lab',
  cores: 2,
  memoryMB: 2048,
  diskGB: 32,
  storage: 'local-lvm',
  os: 'rocky10',
  forceRecreate: false,
};

export const IDENTITY: GuestIdentity = {
  user: 'rocky',
  sshPublicKeyPath: '/keys/id_ed25519.pub',
};

export const SOURCE_IMAGE = '/images/rocky10.qcow2';

export const TIMEOUTS: ResolvedTimeouts = {
  networkMs: 60000,
  shellMs: 30000,
  cloudInitMs: 30000,
  pollIntervalMs: 5000,
  sweepAfterMs: 15000,
};

/**
 * The `qm config` of a VM every step has finished with.
 */
export function completeConfig(overrides: Record<string, string> = {}): Record<string, string> {
  return {
    name: 'lab',
    cores: '2',
    memory: '2048',
    net0: 'virtio=BC:24:11:00:00:01,bridge=vmbr0',
    efidisk0: 'local-lvm:vm-101-disk-0,efitype=4m,pre-enrolled-keys=0,size=4M',
    scsi0: 'local-lvm:vm-101-disk-1,iothread=1,ssd=1,discard=on,size=32G',
    ide2: 'local-lvm:vm-101-cloudinit,media=cdrom',
    boot: 'order=scsi0',
    agent: 'enabled=1,fstrim_cloned_disks=1',
    ciuser: 'rocky',
    sshkeys: 'ssh-ed25519%20AAAAtest%20lab',
    ipconfig0: 'ip=dhcp',
    tags: 'rocky10',
    ...overrides,
  };
}

/**
 * Drop keys from a config, to model an interrupted run.
 */
export function without(config: Record<string, string>, ...keys: string[]): Record<string, string> {
  return Object.fromEntries(Object.entries(config).filter(([key]) => !keys.includes(key)));
}
