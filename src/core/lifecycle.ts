/**
 * Lifecycle Controller
 *
 * Drives one VM from whatever state it is in to Ready: allocate or accept
 * an identifier, decide create, recreate, resume or nothing, run the
 * reconciler, start the VM and wait for it to be reachable.
 *
 * A failure ends the run in Failed and leaves the VM as it is; running
 * the same request again resumes from the first missing facet.
 */

import type { ResolvedHardware, ResolvedTimeouts } from '../config/types.js';
import type { Clock } from '../lib/clock.js';
import type { Logger } from '../lib/logger.js';
import type { VirtualizationHost } from '../proxmox/types.js';
import type { RemoteShell, ShellTarget } from '../remote/ssh.js';
import type { Discovery } from './discovery.js';
import { HostCallFailure, IdentifierError, LabError, ReadinessTimeoutError } from './errors.js';
import { generateIdentifier, isIdentifierAllocated } from './identifier.js';
import { inspect } from './inspector.js';
import { classifyState, decideProvision, type ProvisionDecision } from './planner.js';
import { awaitCloudInit, awaitNetwork, awaitShell, type CloudInitStatus } from './readiness.js';
import { reconcile } from './reconciler.js';
import { TagLedger } from './tags.js';
import type {
  DesiredConfig,
  GuestIdentity,
  LifecycleState,
  ReconcileContext,
  ResourceState,
  StepResult,
} from './types.js';

export interface LifecycleDeps {
  host: VirtualizationHost;
  shell: RemoteShell;
  discovery: Discovery;
  clock: Clock;
  logger: Logger;
}

export interface ProvisionRequest {
  /** Explicit identifier; allocated when omitted */
  id?: number;
  desired: DesiredConfig;
  identity: GuestIdentity;
  /** Private key used for the readiness probes */
  sshPrivateKey: string;
  sourceImage: string;
  hardware: ResolvedHardware;
  machineOverride?: string;
  numa: boolean;
  timeouts: ResolvedTimeouts;
  /** Pause between stopping and destroying a running VM (default: 3000) */
  stopGraceMs?: number;
}

export type ProvisionOutcome =
  | {
      state: 'Ready';
      id: number;
      address: string;
      decision: ProvisionDecision;
      cloudInit: CloudInitStatus;
      transitions: LifecycleState[];
      steps: StepResult[];
    }
  | {
      state: 'Failed';
      id: number | null;
      /** Name of the step that failed */
      step: string;
      error: LabError;
      transitions: LifecycleState[];
      steps: StepResult[];
    };

/**
 * Stop (best effort) and destroy a VM.
 */
async function destroyResource(deps: LifecycleDeps, id: number, graceMs: number): Promise<void> {
  const { host, logger, clock } = deps;

  try {
    if ((await host.powerState(id)) === 'running') {
      logger.info(`Stopping VM ${id}`);
      await host.stop(id);
      await clock.sleep(graceMs);
    }
  } catch (error) {
    logger.warning(`Could not stop VM ${id}: ${error instanceof Error ? error.message : String(error)}`);
  }

  await host.destroy(id);
  logger.success(`VM ${id} destroyed`);
}

async function startIfStopped(deps: LifecycleDeps, id: number): Promise<void> {
  const power = await deps.host.powerState(id);
  if (power === 'running') {
    deps.logger.skip(`VM ${id} is already running`);
    return;
  }
  await deps.host.start(id);
  deps.logger.success(`VM ${id} started`);
}

function toLabError(step: string, error: unknown): LabError {
  return error instanceof LabError ? error : HostCallFailure.from(step, error);
}

/**
 * Provision a VM and wait until it accepts SSH logins.
 */
export async function provision(deps: LifecycleDeps, request: ProvisionRequest): Promise<ProvisionOutcome> {
  const { host, logger, clock } = deps;
  const { desired, identity, timeouts } = request;
  const tags = new TagLedger(host, logger);

  const transitions: LifecycleState[] = [];
  const steps: StepResult[] = [];
  let id: number | null = request.id ?? null;
  let stepName = 'allocate-identifier';

  const fail = (error: unknown): ProvisionOutcome => {
    transitions.push('Failed');
    const labError = toLabError(stepName, error);
    const step = labError instanceof HostCallFailure ? labError.step : stepName;
    logger.error(labError.message);
    return { state: 'Failed', id, step, error: labError, transitions, steps };
  };

  try {
    if (id === null) {
      id = await generateIdentifier(host);
      logger.info(`Allocated VM identifier ${id}`);
    }
    const vmid = id;

    stepName = 'inspect';
    const initial = await inspect(host, vmid);
    if (!initial && request.id !== undefined && (await isIdentifierAllocated(host, vmid))) {
      throw new IdentifierError(
        `VM identifier ${vmid} is held by a container or another node`,
        String(vmid),
        'Pick a free identifier or omit --vmid to allocate one.'
      );
    }
    transitions.push(classifyState(initial));
    const decision = decideProvision(initial, desired, identity);

    if (decision === 'none') {
      logger.skip(`VM ${vmid} is already fully configured`);
    } else if (initial && desired.forceRecreate && decision === 'resume') {
      logger.info(`VM ${vmid} is incomplete; resuming instead of recreating`);
    }

    if (decision === 'recreate') {
      stepName = 'destroy';
      transitions.push('Destroying');
      logger.step(`Destroying VM ${vmid} for recreation`);
      await destroyResource(deps, vmid, request.stopGraceMs ?? 3000);
    }

    if (decision !== 'none') {
      transitions.push('Provisioning');
      const ctx: ReconcileContext = {
        host,
        logger,
        hardware: request.hardware,
        numa: request.numa,
        onAction: (step) => {
          stepName = step;
        },
      };
      if (request.machineOverride) {
        ctx.machineOverride = request.machineOverride;
      }

      stepName = 'identity-and-firmware';
      steps.push(...(await reconcile(ctx, vmid, desired, identity, request.sourceImage)));

      const created = steps.some((result) => result.applied.some((action) => action.kind === 'CreateResource'));
      if (created) {
        await tags.setAll(vmid, [desired.os]);
      }
    }

    stepName = 'start';
    logger.step('Starting VM');
    await startIfStopped(deps, vmid);

    stepName = 'inspect';
    const current: ResourceState | null = await inspect(host, vmid);

    stepName = 'await-network';
    logger.step('Waiting for network');
    const network = await awaitNetwork(
      { id: vmid, macAddress: current?.macAddress ?? null, bridge: current?.bridge ?? request.hardware.bridge },
      deps.discovery,
      {
        timeoutMs: timeouts.networkMs,
        intervalMs: timeouts.pollIntervalMs,
        sweepAfterMs: timeouts.sweepAfterMs,
      },
      { clock, logger }
    );
    if (network.status === 'timeout') {
      throw new ReadinessTimeoutError(
        'NETWORK_TIMEOUT',
        `VM ${vmid} got no IPv4 address within ${Math.round(network.elapsedMs / 1000)}s`,
        network.elapsedMs
      );
    }
    logger.success(`Address ${network.address} (via ${network.strategy})`);

    const target: ShellTarget = {
      host: network.address,
      user: identity.user,
      identityFile: request.sshPrivateKey,
    };

    stepName = 'await-shell';
    logger.step('Waiting for SSH');
    const shellOutcome = await awaitShell(
      deps.shell,
      target,
      { timeoutMs: timeouts.shellMs, intervalMs: timeouts.pollIntervalMs },
      { clock, logger }
    );
    if (shellOutcome.status === 'timeout') {
      const detail = shellOutcome.lastError ? ` (${shellOutcome.lastError})` : '';
      throw new ReadinessTimeoutError(
        'SHELL_TIMEOUT',
        `SSH to ${identity.user}@${network.address} not ready within ${Math.round(shellOutcome.elapsedMs / 1000)}s${detail}`,
        shellOutcome.elapsedMs
      );
    }
    logger.success('SSH is ready');

    stepName = 'await-cloud-init';
    logger.step('Waiting for cloud-init');
    const cloudInit = await awaitCloudInit(
      deps.shell,
      target,
      { timeoutMs: timeouts.cloudInitMs, intervalMs: timeouts.pollIntervalMs },
      { clock, logger }
    );
    switch (cloudInit.status) {
      case 'done':
        logger.success('cloud-init finished');
        break;
      case 'timeout':
        logger.warning('cloud-init did not finish in time; continuing');
        break;
      default:
        logger.warning(`cloud-init reported "${cloudInit.status}"; continuing`);
    }

    stepName = 'tags';
    await tags.addOne(vmid, desired.os);

    transitions.push('Ready');
    return {
      state: 'Ready',
      id: vmid,
      address: network.address,
      decision,
      cloudInit: cloudInit.status,
      transitions,
      steps,
    };
  } catch (error) {
    return fail(error);
  }
}
