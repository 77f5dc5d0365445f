/**
 * Proxmox Types
 *
 * Type definitions for the virtualization host contract and the
 * responses of the Proxmox management tools.
 */

/**
 * Power state reported by `qm status`
 */
export type PowerState = 'running' | 'stopped' | 'paused' | 'unknown';

/**
 * Parameters for `qm create`
 */
export interface CreateVMSpec {
  /** VM display name */
  name: string;
  /** Virtual CPU cores */
  cores: number;
  /** Memory in MB */
  memoryMB: number;
  /** Expose NUMA topology to the guest */
  numa: boolean;
  /** Machine type, e.g. q35,viommu=virtio */
  machine: string;
  /** Firmware, e.g. ovmf */
  bios: string;
  /** CPU model, e.g. host */
  cpuType: string;
  /** Rendered net0 value, e.g. virtio,bridge=vmbr0 */
  net0: string;
  /** SCSI controller model */
  scsiController: string;
  /** Display adapter */
  vga: string;
  /** Guest OS classifier, e.g. l26 */
  ostype: string;
}

/**
 * Ordered key/value patch applied with `qm set`
 */
export type ConfigPatch = Readonly<Record<string, string>>;

/**
 * One IP address reported by the guest agent
 */
export interface GuestIpAddress {
  type: 'ipv4' | 'ipv6';
  address: string;
  prefix?: number;
}

/**
 * One interface reported by the guest agent
 */
export interface GuestNetworkInterface {
  name: string;
  hardwareAddress?: string;
  addresses: GuestIpAddress[];
}

/**
 * Storage pool row from `pvesm status`
 */
export interface StoragePool {
  /** Storage identifier, e.g. local-zfs */
  id: string;
  /** Backend type, e.g. zfspool, lvmthin, dir */
  type: string;
  /** active, inactive or disabled */
  status: string;
  /** Available space in KiB, when reported */
  availableKiB?: number;
}

/**
 * Management interface of the virtualization host.
 *
 * One call is one effect. Failures surface as HostCommandError;
 * a missing VM is reported with the NOT_FOUND code.
 */
export interface VirtualizationHost {
  create(id: number, spec: CreateVMSpec): Promise<void>;
  configure(id: number, patch: ConfigPatch): Promise<void>;
  /** Raw `qm config` text */
  readConfig(id: number): Promise<string>;
  powerState(id: number): Promise<PowerState>;
  /** Import an image into a pool; resolves to the new volume name */
  importDisk(id: number, image: string, pool: string): Promise<string>;
  resizeDisk(id: number, disk: string, sizeGB: number): Promise<void>;
  start(id: number): Promise<void>;
  stop(id: number): Promise<void>;
  destroy(id: number): Promise<void>;
  /** Every VM and container identifier known to the host or cluster */
  listAllocatedIdentifiers(): Promise<number[]>;
  listStoragePools(contentType: string): Promise<StoragePool[]>;
  /** Guest agent query; fails until the agent inside the guest is up */
  queryNetworkInterfaces(id: number): Promise<GuestNetworkInterface[]>;
}
