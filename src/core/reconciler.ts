/**
 * Reconciler for labforge
 *
 * One idempotent step per configuration aspect. Each step reads live
 * state, applies only the actions whose effect is missing, and stops the
 * run on the first host failure. Steps must run in RECONCILE_STEPS order.
 */

import {
  renderDiskAttachment,
  renderFirmwareStore,
  renderGuestAgent,
  renderInitDrive,
  renderNetworkDevice,
} from '../proxmox/commands.js';
import { HostCallFailure } from './errors.js';
import { inspect } from './inspector.js';
import {
  describeAction,
  planBootAndAgent,
  planDisk,
  planIdentityAndFirmware,
  planIdentityConfig,
  type StepPlan,
} from './planner.js';
import type {
  DesiredConfig,
  GuestIdentity,
  ReconcileContext,
  ReconcileStep,
  ReconciliationAction,
  ResourceState,
  StepResult,
} from './types.js';

/** Disk slot the imported image is attached to */
export const PRIMARY_DISK = 'scsi0';

async function readState(ctx: ReconcileContext, step: ReconcileStep, id: number): Promise<ResourceState | null> {
  try {
    return await inspect(ctx.host, id);
  } catch (error) {
    throw HostCallFailure.from(step, error);
  }
}

async function requireState(ctx: ReconcileContext, step: ReconcileStep, id: number): Promise<ResourceState> {
  const state = await readState(ctx, step, id);
  if (!state) {
    throw new HostCallFailure(step, `VM ${id} does not exist`, '');
  }
  return state;
}

/**
 * Apply one action against the host.
 */
async function applyAction(
  ctx: ReconcileContext,
  id: number,
  action: ReconciliationAction,
  state: ResourceState | null
): Promise<void> {
  const { host, hardware } = ctx;

  switch (action.kind) {
    case 'CreateResource':
      await host.create(id, {
        name: action.name,
        cores: action.cores,
        memoryMB: action.memoryMB,
        numa: action.numa,
        machine: ctx.machineOverride ?? hardware.machine,
        bios: hardware.bios,
        cpuType: hardware.cpuType,
        net0: renderNetworkDevice(hardware.netModel, hardware.bridge),
        scsiController: hardware.scsiController,
        vga: hardware.vga,
        ostype: hardware.ostype,
      });
      return;

    case 'AttachFirmwareStore':
      await host.configure(id, { efidisk0: renderFirmwareStore(action.pool, hardware.efi) });
      return;

    case 'ImportAndResizeDisk': {
      const volume = await host.importDisk(id, action.sourceImage, action.pool);
      await host.configure(id, { [PRIMARY_DISK]: renderDiskAttachment(action.pool, volume) });
      await host.resizeDisk(id, PRIMARY_DISK, action.targetSizeGB);
      return;
    }

    case 'AttachInitDrive':
      await host.configure(id, { ide2: renderInitDrive(action.pool) });
      return;

    case 'SetBootOrder':
      await host.configure(id, {
        boot: `order=${PRIMARY_DISK}`,
        bootdisk: PRIMARY_DISK,
        serial0: 'socket',
        vga: 'serial0',
      });
      return;

    case 'EnableGuestAgent':
      await host.configure(id, { agent: renderGuestAgent(hardware.agentFstrim) });
      return;

    case 'SetIdentity': {
      const patch: Record<string, string> = {};
      if (state?.ciUser !== action.user) {
        patch.ciuser = action.user;
      }
      patch.sshkeys = action.sshKey;
      patch.ciupgrade = '1';
      await host.configure(id, patch);
      return;
    }

    case 'SetNetworkMode':
      await host.configure(id, { ipconfig0: `ip=${action.mode}` });
      return;
  }
}

/**
 * Run a planned step: skip what is present, apply the rest in order.
 */
async function runStep(
  ctx: ReconcileContext,
  step: ReconcileStep,
  id: number,
  plan: StepPlan,
  state: ResourceState | null
): Promise<StepResult> {
  const result: StepResult = { step, applied: [], skipped: [], advisories: plan.advisories };

  for (const action of plan.skip) {
    ctx.logger.skip(`${describeAction(action)}: already in place`);
    result.skipped.push(action);
  }

  for (const advisory of plan.advisories) {
    ctx.logger.warning(advisory.message);
  }

  for (const action of plan.apply) {
    ctx.onAction?.(step, action);
    try {
      await applyAction(ctx, id, action, state);
    } catch (error) {
      ctx.logger.error(`${describeAction(action)}: failed`);
      throw HostCallFailure.from(step, error);
    }
    ctx.logger.success(describeAction(action));
    result.applied.push(action);
  }

  return result;
}

/**
 * Create the VM and its firmware store when missing.
 *
 * An existing VM is left as it is, except that a missing firmware store
 * is attached.
 */
export async function ensureIdentityAndFirmware(
  ctx: ReconcileContext,
  id: number,
  desired: DesiredConfig
): Promise<StepResult> {
  const step = 'identity-and-firmware';
  const state = await readState(ctx, step, id);
  return runStep(ctx, step, id, planIdentityAndFirmware(state, desired, ctx.numa), state);
}

/**
 * Import, attach and resize the primary disk when missing.
 *
 * An attached disk is never resized; a size difference is reported.
 */
export async function ensureDisk(
  ctx: ReconcileContext,
  id: number,
  desired: DesiredConfig,
  sourceImage: string
): Promise<StepResult> {
  const step = 'disk';
  const state = await requireState(ctx, step, id);
  return runStep(ctx, step, id, planDisk(state, desired, sourceImage), state);
}

/**
 * Attach the init drive, set boot order and enable the agent, each gated
 * on its own facet.
 */
export async function ensureBootAndAgent(ctx: ReconcileContext, id: number, storage: string): Promise<StepResult> {
  const step = 'boot-and-agent';
  const state = await requireState(ctx, step, id);
  return runStep(ctx, step, id, planBootAndAgent(state, storage), state);
}

/**
 * Apply login identity, SSH key, DHCP and the upgrade-on-boot flag.
 */
export async function ensureIdentityConfig(
  ctx: ReconcileContext,
  id: number,
  identity: GuestIdentity
): Promise<StepResult> {
  const step = 'identity-config';
  const state = await requireState(ctx, step, id);
  return runStep(ctx, step, id, planIdentityConfig(state, identity), state);
}

/**
 * Run every step in order.
 */
export async function reconcile(
  ctx: ReconcileContext,
  id: number,
  desired: DesiredConfig,
  identity: GuestIdentity,
  sourceImage: string
): Promise<StepResult[]> {
  const results: StepResult[] = [];

  ctx.logger.step('Identity and firmware');
  results.push(await ensureIdentityAndFirmware(ctx, id, desired));

  ctx.logger.step('Primary disk');
  results.push(await ensureDisk(ctx, id, desired, sourceImage));

  ctx.logger.step('Boot and guest agent');
  results.push(await ensureBootAndAgent(ctx, id, desired.storage));

  ctx.logger.step('Cloud-init identity');
  results.push(await ensureIdentityConfig(ctx, id, identity));

  return results;
}
