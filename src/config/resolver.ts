/**
 * Configuration Resolver
 *
 * Layers command-line overrides over the configuration file over built-in
 * defaults, and expands paths, to produce a fully resolved configuration.
 */

import { dirname, resolve } from 'node:path';

import { ConfigError } from '../core/errors.js';
import {
  expandPath,
  getDefaultImageDir,
  getDefaultSshKeyPath,
  getDefaultStateDir,
} from '../lib/paths.js';
import type {
  CliOverrides,
  ImageSection,
  LabforgeConfig,
  ResolvedConfig,
  ResolvedHardware,
  ResolvedImage,
} from './types.js';

/**
 * Default values when not specified in config
 */
export const DEFAULTS = {
  name: 'labforge',
  cores: 2,
  memoryMB: 8192,
  diskGB: 32,
  timeouts: {
    network: 300,
    shell: 180,
    cloudInit: 600,
    pollInterval: 5,
    sweepAfter: 35,
  },
};

export const DEFAULT_HARDWARE: ResolvedHardware = {
  machine: 'q35,viommu=virtio',
  bios: 'ovmf',
  cpuType: 'host',
  netModel: 'virtio',
  bridge: 'vmbr0',
  scsiController: 'virtio-scsi-single',
  vga: 'std',
  ostype: 'l26',
  efi: { size: '1', efiType: '4m', preEnrolledKeys: false },
  agentFstrim: true,
};

/**
 * Built-in OS image catalogue
 */
export const DEFAULT_IMAGES: Record<string, ImageSection> = {
  rocky10: {
    display_name: 'Rocky Linux 10',
    default_user: 'rocky',
    url: 'https://dl.rockylinux.org/pub/rocky/10/images/x86_64/Rocky-10-GenericCloud-Base.latest.x86_64.qcow2',
    file: 'Rocky-10-GenericCloud-Base.latest.x86_64.qcow2',
  },
  debian13: {
    display_name: 'Debian 13 (Trixie)',
    default_user: 'debian',
    url: 'https://cloud.debian.org/images/cloud/trixie/latest/debian-13-genericcloud-amd64.qcow2',
    file: 'debian-13-genericcloud-amd64.qcow2',
    machine: 'q35',
  },
  ubuntu2404: {
    display_name: 'Ubuntu 24.04 LTS',
    default_user: 'ubuntu',
    url: 'https://cloud-images.ubuntu.com/noble/current/noble-server-cloudimg-amd64.img',
    file: 'noble-server-cloudimg-amd64.img',
  },
};

function resolveHardware(config: LabforgeConfig): ResolvedHardware {
  const hw = config.hardware ?? {};
  return {
    machine: hw.machine ?? DEFAULT_HARDWARE.machine,
    bios: hw.bios ?? DEFAULT_HARDWARE.bios,
    cpuType: hw.cpu_type ?? DEFAULT_HARDWARE.cpuType,
    netModel: hw.net_model ?? DEFAULT_HARDWARE.netModel,
    bridge: hw.bridge ?? DEFAULT_HARDWARE.bridge,
    scsiController: hw.scsi_controller ?? DEFAULT_HARDWARE.scsiController,
    vga: hw.vga ?? DEFAULT_HARDWARE.vga,
    ostype: hw.ostype ?? DEFAULT_HARDWARE.ostype,
    efi: {
      size: hw.efi_disk_size ?? DEFAULT_HARDWARE.efi.size,
      efiType: hw.efi_type ?? DEFAULT_HARDWARE.efi.efiType,
      preEnrolledKeys: hw.pre_enrolled_keys ?? DEFAULT_HARDWARE.efi.preEnrolledKeys,
    },
    agentFstrim: hw.agent_fstrim ?? DEFAULT_HARDWARE.agentFstrim,
  };
}

function resolveImages(config: LabforgeConfig, imageDir: string): Record<string, ResolvedImage> {
  const merged: Record<string, ImageSection> = { ...DEFAULT_IMAGES, ...config.images };
  const images: Record<string, ResolvedImage> = {};

  for (const [key, image] of Object.entries(merged)) {
    const resolved: ResolvedImage = {
      key,
      displayName: image.display_name,
      defaultUser: image.default_user,
      url: image.url,
      path: resolve(imageDir, image.file),
    };
    if (image.machine) {
      resolved.machine = image.machine;
    }
    images[key] = resolved;
  }
  return images;
}

/**
 * Resolve a complete configuration with all defaults applied and paths expanded.
 *
 * @param config - Validated configuration (empty when no file was loaded)
 * @param overrides - Values from command-line flags
 * @param configPath - Path to the configuration file, if any
 * @param cwd - Base for relative paths when there is no file
 * @throws ConfigError when the requested OS class is not in the catalogue
 */
export function resolveConfig(
  config: LabforgeConfig,
  overrides: CliOverrides = {},
  configPath?: string,
  cwd: string = process.cwd()
): ResolvedConfig {
  const absoluteConfigPath = configPath ? resolve(cwd, configPath) : undefined;
  const basePath = absoluteConfigPath ? dirname(absoluteConfigPath) : cwd;

  const paths = config.paths ?? {};
  const stateDir = expandPath(paths.state_dir ?? getDefaultStateDir(), basePath);
  const imageDir = expandPath(paths.image_dir ?? getDefaultImageDir(), basePath);
  const sshKey = expandPath(paths.ssh_key ?? getDefaultSshKeyPath(), basePath);

  const images = resolveImages(config, imageDir);

  const vm = config.vm ?? {};
  const os = overrides.os ?? vm.os;
  if (os !== undefined && !images[os]) {
    throw new ConfigError(
      `Unknown OS class "${os}"`,
      'UNKNOWN_OS',
      `Choose one of: ${Object.keys(images).join(', ')}`,
      absoluteConfigPath
    );
  }

  const timeouts = config.timeouts ?? {};
  const handoff = config.handoff ?? {};

  const resolved: ResolvedConfig = {
    vm: {
      name: overrides.name ?? vm.name ?? DEFAULTS.name,
      cores: overrides.cores ?? vm.cores ?? DEFAULTS.cores,
      memoryMB: overrides.memory ?? vm.memory ?? DEFAULTS.memoryMB,
      diskGB: overrides.disk ?? vm.disk ?? DEFAULTS.diskGB,
    },
    hardware: resolveHardware(config),
    images,
    timeouts: {
      networkMs: (timeouts.network ?? DEFAULTS.timeouts.network) * 1000,
      shellMs: (timeouts.shell ?? DEFAULTS.timeouts.shell) * 1000,
      cloudInitMs: (timeouts.cloud_init ?? DEFAULTS.timeouts.cloudInit) * 1000,
      pollIntervalMs: (timeouts.poll_interval ?? DEFAULTS.timeouts.pollInterval) * 1000,
      sweepAfterMs: (timeouts.sweep_after ?? DEFAULTS.timeouts.sweepAfter) * 1000,
    },
    paths: {
      stateDir,
      imageDir,
      sshKey,
      sshPublicKey: `${sshKey}.pub`,
    },
    handoff: {
      installAgent: handoff.install_agent ?? true,
      command: handoff.command ?? [],
      serviceTags: handoff.service_tags ?? [],
    },
  };

  const vmid = overrides.vmid ?? vm.vmid;
  if (vmid !== undefined) resolved.vm.vmid = vmid;
  const storage = overrides.storage ?? vm.storage;
  if (storage !== undefined) resolved.vm.storage = storage;
  if (os !== undefined) resolved.vm.os = os;
  const user = overrides.user ?? vm.user;
  if (user !== undefined) resolved.vm.user = user;
  if (absoluteConfigPath) resolved.configPath = absoluteConfigPath;

  return resolved;
}
