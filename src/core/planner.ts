/**
 * Action Planner for labforge
 *
 * Pure functions that decide, from a ResourceState snapshot, which
 * reconciliation actions each step must apply and which it can skip.
 * The reconciler runs them against live state; the plan command runs
 * them once to preview a whole provisioning run.
 */

import type {
  AdvisoryMismatch,
  DesiredConfig,
  GuestIdentity,
  LifecycleState,
  ReconcileStep,
  ReconciliationAction,
  ResourceState,
} from './types.js';

/**
 * Actions of one step, split by whether their effect is already present
 */
export interface StepPlan {
  apply: ReconciliationAction[];
  skip: ReconciliationAction[];
  advisories: AdvisoryMismatch[];
}

/**
 * What the lifecycle controller will do with an existing resource
 */
export type ProvisionDecision = 'create' | 'recreate' | 'resume' | 'none';

/**
 * Inputs that do not come from DesiredConfig
 */
export interface PlanInputs {
  identity: GuestIdentity;
  /** Image file imported when the disk is missing */
  sourceImage: string;
  numa: boolean;
}

/**
 * Preview of a provisioning run
 */
export interface ProvisionPlan {
  initialState: LifecycleState;
  decision: ProvisionDecision;
  steps: Array<{ step: ReconcileStep } & StepPlan>;
  summary: {
    apply: number;
    skip: number;
    destroy: number;
  };
}

function split(entries: Array<[ReconciliationAction, boolean]>, advisories: AdvisoryMismatch[] = []): StepPlan {
  const plan: StepPlan = { apply: [], skip: [], advisories };
  for (const [action, needed] of entries) {
    (needed ? plan.apply : plan.skip).push(action);
  }
  return plan;
}

/**
 * Classify a snapshot into its lifecycle entry state.
 */
export function classifyState(state: ResourceState | null): LifecycleState {
  if (!state) {
    return 'Absent';
  }
  return state.isComplete ? 'ExistsComplete' : 'ExistsIncomplete';
}

/**
 * Whether cloud-init already carries the desired login identity and DHCP.
 */
export function isIdentityApplied(state: ResourceState, identity: GuestIdentity): boolean {
  return state.ciUser === identity.user && state.hasSshKeys && state.dhcp;
}

/**
 * Decide between create, recreate, resume and doing nothing.
 *
 * Force-recreate only destroys a complete resource; an incomplete one is
 * resumed whatever the flag says.
 */
export function decideProvision(
  state: ResourceState | null,
  desired: DesiredConfig,
  identity: GuestIdentity
): ProvisionDecision {
  if (!state) {
    return 'create';
  }
  if (!state.isComplete) {
    return 'resume';
  }
  if (desired.forceRecreate) {
    return 'recreate';
  }
  return isIdentityApplied(state, identity) ? 'none' : 'resume';
}

export function planIdentityAndFirmware(
  state: ResourceState | null,
  desired: DesiredConfig,
  numa: boolean
): StepPlan {
  const create: ReconciliationAction = {
    kind: 'CreateResource',
    name: desired.name,
    cores: desired.cores,
    memoryMB: desired.memoryMB,
    numa,
  };
  const firmware: ReconciliationAction = { kind: 'AttachFirmwareStore', pool: desired.storage };

  return split([
    [create, state === null],
    [firmware, !state?.facets.firmwareStore],
  ]);
}

/**
 * Plan the disk step. An attached disk is never resized; a size
 * difference becomes an advisory.
 */
export function planDisk(state: ResourceState | null, desired: DesiredConfig, sourceImage: string): StepPlan {
  const importDisk: ReconciliationAction = {
    kind: 'ImportAndResizeDisk',
    sourceImage,
    targetSizeGB: desired.diskGB,
    pool: desired.storage,
  };

  if (!state?.facets.primaryDisk) {
    return split([[importDisk, true]]);
  }

  const advisories: AdvisoryMismatch[] = [];
  if (state.diskSizeGB !== null && state.diskSizeGB !== desired.diskGB) {
    advisories.push({
      kind: 'AdvisoryMismatch',
      facet: 'disk-size',
      expected: `${desired.diskGB}G`,
      actual: `${state.diskSizeGB}G`,
      message: `Disk is ${state.diskSizeGB}G, requested ${desired.diskGB}G; resize it manually if needed`,
    });
  }
  return split([[importDisk, false]], advisories);
}

export function planBootAndAgent(state: ResourceState | null, storage: string): StepPlan {
  return split([
    [{ kind: 'AttachInitDrive', pool: storage }, !state?.facets.initDrive],
    [{ kind: 'SetBootOrder' }, !state?.facets.bootOrder],
    [{ kind: 'EnableGuestAgent' }, !state?.facets.guestAgent],
  ]);
}

/**
 * Plan the identity step. The key and the upgrade flag are always
 * re-applied; DHCP is only set when missing.
 */
export function planIdentityConfig(state: ResourceState | null, identity: GuestIdentity): StepPlan {
  return split([
    [{ kind: 'SetIdentity', user: identity.user, sshKey: identity.sshPublicKeyPath }, true],
    [{ kind: 'SetNetworkMode', mode: 'dhcp' }, !state?.dhcp],
  ]);
}

/**
 * Preview every step of a provisioning run from one snapshot.
 */
export function planProvision(
  state: ResourceState | null,
  desired: DesiredConfig,
  inputs: PlanInputs
): ProvisionPlan {
  const decision = decideProvision(state, desired, inputs.identity);
  // After a create or recreate every step starts from an empty resource
  const base = decision === 'create' || decision === 'recreate' ? null : state;

  const steps: ProvisionPlan['steps'] =
    decision === 'none'
      ? []
      : [
          { step: 'identity-and-firmware', ...planIdentityAndFirmware(base, desired, inputs.numa) },
          { step: 'disk', ...planDisk(base, desired, inputs.sourceImage) },
          { step: 'boot-and-agent', ...planBootAndAgent(base, desired.storage) },
          { step: 'identity-config', ...planIdentityConfig(base, inputs.identity) },
        ];

  return {
    initialState: classifyState(state),
    decision,
    steps,
    summary: {
      apply: steps.reduce((sum, step) => sum + step.apply.length, 0),
      skip: steps.reduce((sum, step) => sum + step.skip.length, 0),
      destroy: decision === 'recreate' ? 1 : 0,
    },
  };
}

/**
 * Check if plan has any changes.
 */
export function hasChanges(plan: ProvisionPlan): boolean {
  return plan.summary.apply > 0 || plan.summary.destroy > 0;
}

/**
 * One-line description of an action.
 */
export function describeAction(action: ReconciliationAction): string {
  switch (action.kind) {
    case 'CreateResource':
      return `Create VM "${action.name}" (${action.cores} cores, ${action.memoryMB} MB${action.numa ? ', NUMA' : ''})`;
    case 'AttachFirmwareStore':
      return `Attach EFI disk on ${action.pool}`;
    case 'ImportAndResizeDisk':
      return `Import ${action.sourceImage} and resize to ${action.targetSizeGB}G`;
    case 'AttachInitDrive':
      return `Attach cloud-init drive on ${action.pool}`;
    case 'SetBootOrder':
      return 'Boot from scsi0 with serial console';
    case 'EnableGuestAgent':
      return 'Enable QEMU guest agent';
    case 'SetIdentity':
      return `Set login user ${action.user} and SSH key`;
    case 'SetNetworkMode':
      return 'Configure DHCP on ipconfig0';
  }
}

/**
 * Get a human-readable summary of the plan.
 */
export function formatPlanSummary(plan: ProvisionPlan): string {
  const parts: string[] = [];

  if (plan.summary.destroy > 0) {
    parts.push(`${plan.summary.destroy} to destroy`);
  }
  if (plan.summary.apply > 0) {
    parts.push(`${plan.summary.apply} to apply`);
  }
  if (plan.summary.skip > 0) {
    parts.push(`${plan.summary.skip} already in place`);
  }

  if (!hasChanges(plan)) {
    return 'No changes needed';
  }

  return parts.join(', ');
}
