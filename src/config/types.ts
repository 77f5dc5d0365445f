/**
 * Configuration Types for labforge
 *
 * These types represent the YAML configuration structure and the resolved
 * configuration with defaults and command-line overrides applied.
 */

// =============================================================================
// YAML Input Types
// =============================================================================

/**
 * Root configuration object parsed from labforge.yaml
 */
export interface LabforgeConfig {
  vm?: VmSection;
  hardware?: HardwareSection;
  /** OS image catalogue keyed by OS class, merged over the built-in one */
  images?: Record<string, ImageSection>;
  timeouts?: TimeoutsSection;
  paths?: PathsSection;
  handoff?: HandoffSection;
}

/**
 * Desired VM shape
 */
export interface VmSection {
  /** Identifier to reuse; auto-allocated when omitted */
  vmid?: number;
  /** VM name. Default: labforge */
  name?: string;
  /** Virtual CPU cores. Default: 2 */
  cores?: number;
  /** Memory in MB. Default: 8192 */
  memory?: number;
  /** Disk size in GB. Default: 32 */
  disk?: number;
  /** Storage pool; picked from the host when omitted */
  storage?: string;
  /** OS class, a key of the image catalogue */
  os?: string;
  /** Login user; the image's default user when omitted */
  user?: string;
}

/**
 * Virtual hardware profile
 */
export interface HardwareSection {
  machine?: string;
  bios?: string;
  cpu_type?: string;
  net_model?: string;
  bridge?: string;
  scsi_controller?: string;
  vga?: string;
  ostype?: string;
  efi_disk_size?: string;
  efi_type?: string;
  pre_enrolled_keys?: boolean;
  agent_fstrim?: boolean;
}

/**
 * One entry of the OS image catalogue
 */
export interface ImageSection {
  display_name: string;
  default_user: string;
  url: string;
  file: string;
  /** Machine type override for this OS class */
  machine?: string;
}

/**
 * Readiness timeouts, in seconds
 */
export interface TimeoutsSection {
  network?: number;
  shell?: number;
  cloud_init?: number;
  poll_interval?: number;
  sweep_after?: number;
}

/**
 * Local file locations
 */
export interface PathsSection {
  state_dir?: string;
  image_dir?: string;
  /** Private key; the public key is expected next to it with a .pub suffix */
  ssh_key?: string;
}

/**
 * What runs inside the VM once it is ready
 */
export interface HandoffSection {
  /** Install qemu-guest-agent over SSH. Default: true */
  install_agent?: boolean;
  /** Command argv run in the guest; skipped when empty */
  command?: string[];
  /** Tags merged onto the VM after the command succeeds */
  service_tags?: string[];
}

// =============================================================================
// Resolved Types
// =============================================================================

/**
 * OS image entry with its file resolved to an absolute path
 */
export interface ResolvedImage {
  /** OS class key, e.g. rocky10 */
  key: string;
  displayName: string;
  defaultUser: string;
  url: string;
  /** Absolute path of the image file on the host */
  path: string;
  machine?: string;
}

/**
 * Hardware profile with all defaults applied
 */
export interface ResolvedHardware {
  machine: string;
  bios: string;
  cpuType: string;
  netModel: string;
  bridge: string;
  scsiController: string;
  vga: string;
  ostype: string;
  efi: {
    size: string;
    efiType: string;
    preEnrolledKeys: boolean;
  };
  agentFstrim: boolean;
}

/**
 * Readiness timeouts in milliseconds
 */
export interface ResolvedTimeouts {
  networkMs: number;
  shellMs: number;
  cloudInitMs: number;
  pollIntervalMs: number;
  sweepAfterMs: number;
}

/**
 * Fully resolved configuration ready for execution
 */
export interface ResolvedConfig {
  vm: {
    vmid?: number;
    name: string;
    cores: number;
    memoryMB: number;
    diskGB: number;
    /** Preferred pool; validated against the host at run time */
    storage?: string;
    /** Unset when neither flags nor file name an OS class */
    os?: string;
    user?: string;
  };
  hardware: ResolvedHardware;
  images: Record<string, ResolvedImage>;
  timeouts: ResolvedTimeouts;
  paths: {
    stateDir: string;
    imageDir: string;
    sshKey: string;
    sshPublicKey: string;
  };
  handoff: {
    installAgent: boolean;
    command: string[];
    serviceTags: string[];
  };
  /** Absolute path to the YAML file, when one was loaded */
  configPath?: string;
}

/**
 * Values given on the command line; they win over the file
 */
export interface CliOverrides {
  vmid?: number;
  name?: string;
  cores?: number;
  memory?: number;
  disk?: number;
  storage?: string;
  os?: string;
  user?: string;
}
