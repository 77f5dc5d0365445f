/**
 * Core Types for labforge
 *
 * Types for resource inspection, reconciliation and the provisioning lifecycle.
 */

import type { ResolvedHardware } from '../config/types.js';
import type { Logger } from '../lib/logger.js';
import type { VirtualizationHost } from '../proxmox/types.js';

/**
 * Immutable input of one provisioning run
 */
export interface DesiredConfig {
  readonly name: string;
  readonly cores: number;
  readonly memoryMB: number;
  readonly diskGB: number;
  /** Storage pool for the firmware store, disk and init drive */
  readonly storage: string;
  /** OS class key, e.g. rocky10 */
  readonly os: string;
  readonly forceRecreate: boolean;
}

/**
 * Login identity injected through cloud-init
 */
export interface GuestIdentity {
  readonly user: string;
  /** Path of the public key file handed to the host */
  readonly sshPublicKeyPath: string;
}

/**
 * The five independently checkable aspects of a VM's configuration
 */
export interface ResourceFacets {
  firmwareStore: boolean;
  primaryDisk: boolean;
  initDrive: boolean;
  bootOrder: boolean;
  guestAgent: boolean;
}

/**
 * Snapshot of a VM's live configuration.
 *
 * Built fresh on every inspection; never cached.
 */
export interface ResourceState {
  exists: true;
  name: string | null;
  facets: ResourceFacets;
  /** AND of all five facets */
  isComplete: boolean;
  /** Declared size of scsi0 in GB */
  diskSizeGB: number | null;
  ciUser: string | null;
  hasSshKeys: boolean;
  dhcp: boolean;
  tags: string[];
  macAddress: string | null;
  bridge: string | null;
}

/**
 * One corrective action the reconciler can take
 */
export type ReconciliationAction =
  | { kind: 'CreateResource'; name: string; cores: number; memoryMB: number; numa: boolean }
  | { kind: 'AttachFirmwareStore'; pool: string }
  | { kind: 'ImportAndResizeDisk'; sourceImage: string; targetSizeGB: number; pool: string }
  | { kind: 'AttachInitDrive'; pool: string }
  | { kind: 'SetBootOrder' }
  | { kind: 'EnableGuestAgent' }
  | { kind: 'SetIdentity'; user: string; sshKey: string }
  | { kind: 'SetNetworkMode'; mode: 'dhcp' };

export type ReconciliationActionKind = ReconciliationAction['kind'];

/**
 * A difference that is reported to the operator but never corrected
 */
export interface AdvisoryMismatch {
  kind: 'AdvisoryMismatch';
  facet: 'disk-size';
  expected: string;
  actual: string;
  message: string;
}

/**
 * Reconciler steps, in their fixed order
 */
export const RECONCILE_STEPS = [
  'identity-and-firmware',
  'disk',
  'boot-and-agent',
  'identity-config',
] as const;

export type ReconcileStep = (typeof RECONCILE_STEPS)[number];

/**
 * Outcome of one reconciler step
 */
export interface StepResult {
  step: ReconcileStep;
  applied: ReconciliationAction[];
  skipped: ReconciliationAction[];
  advisories: AdvisoryMismatch[];
}

/**
 * Everything a reconciler step needs, passed explicitly
 */
export interface ReconcileContext {
  host: VirtualizationHost;
  logger: Logger;
  hardware: ResolvedHardware;
  /** Host NUMA topology, detected once per run */
  numa: boolean;
  /** Machine type override for the OS class */
  machineOverride?: string;
  /** Called before each mutating action is applied */
  onAction?: (step: ReconcileStep, action: ReconciliationAction) => void;
}

/**
 * Lifecycle states of a provisioning run
 */
export type LifecycleState =
  | 'Absent'
  | 'ExistsIncomplete'
  | 'ExistsComplete'
  | 'Destroying'
  | 'Provisioning'
  | 'Ready'
  | 'Failed';

/**
 * Result of a single preflight check
 */
export interface PreflightResult {
  /** Whether the check passed */
  passed: boolean;
  /** Error message if failed */
  message?: string;
  /** Suggested fix if failed */
  suggestion?: string;
}

/**
 * Aggregate result of all preflight checks
 */
export interface PreflightCheckResults {
  /** Whether all checks passed */
  allPassed: boolean;
  hostTools: PreflightResult;
  image: PreflightResult;
  sshKey: PreflightResult;
  /** Storage pool picked for the run; absent when no pool is usable */
  storage: PreflightResult & { pool?: string };
}
