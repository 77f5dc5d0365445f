/**
 * Integration tests for the provision workflow
 *
 * Runs the full flow from a YAML file on disk through the lifecycle
 * controller and the hand-off, against an in-memory Proxmox host.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { loadConfig } from '../../src/config/loader.js';
import { resolveConfig } from '../../src/config/resolver.js';
import type { CliOverrides, ResolvedConfig } from '../../src/config/types.js';
import { guestAgentStrategy, leaseStrategy, neighborStrategy, sweepFallback, type Discovery } from '../../src/core/discovery.js';
import { handoff, type HandoffOutcome } from '../../src/core/handoff.js';
import { provision, type ProvisionOutcome } from '../../src/core/lifecycle.js';
import { TagLedger } from '../../src/core/tags.js';
import { Logger } from '../../src/lib/logger.js';
import { StateManager } from '../../src/state/manager.js';
import { FakeClock, FakeHost, ok, ScriptedShell, StubLookup, StubSweeper } from '../helpers/fakes.js';

// =============================================================================
// Test Helpers
// =============================================================================

const MAC = 'bc:24:11:00:00:01';

function createTestConfig(disk = 40): string {
  return `
vm:
  vmid: 300
  name: ci-runner
  cores: 4
  memory: 4096
  disk: ${disk}
  storage: local-lvm
  os: rocky10
timeouts:
  network: 60
  shell: 30
  cloud_init: 30
  poll_interval: 5
  sweep_after: 15
paths:
  state_dir: ./state
  image_dir: ./images
  ssh_key: ./keys/id_ed25519
handoff:
  install_agent: false
  command: ["sudo", "/opt/bootstrap.sh"]
  service_tags: [docker]
`;
}

interface RunResult {
  outcome: ProvisionOutcome;
  handoff: HandoffOutcome | null;
  logger: Logger;
}

/**
 * Run provision and hand-off the way the provision command wires them.
 */
async function runProvision(
  config: ResolvedConfig,
  host: FakeHost,
  options: { shell?: ScriptedShell; discovery?: Discovery; clock?: FakeClock; force?: boolean } = {}
): Promise<RunResult> {
  const logger = new Logger('json');
  const clock = options.clock ?? new FakeClock();
  const shell =
    options.shell ?? new ScriptedShell((command) => (command === 'cloud-init status' ? ok('status: done\n') : ok()));
  const image = config.images[config.vm.os ?? 'rocky10'];
  assert.ok(image);

  const identity = { user: config.vm.user ?? image.defaultUser, sshPublicKeyPath: config.paths.sshPublicKey };
  const desired = {
    name: config.vm.name,
    cores: config.vm.cores,
    memoryMB: config.vm.memoryMB,
    diskGB: config.vm.diskGB,
    storage: config.vm.storage ?? 'local-lvm',
    os: image.key,
    forceRecreate: options.force ?? false,
  };

  const outcome = await provision(
    { host, shell, discovery: options.discovery ?? { strategies: [guestAgentStrategy(host)] }, clock, logger },
    {
      id: config.vm.vmid,
      desired,
      identity,
      sshPrivateKey: config.paths.sshKey,
      sourceImage: image.path,
      hardware: config.hardware,
      numa: false,
      timeouts: config.timeouts,
    }
  );

  const state = new StateManager(config.paths.stateDir);
  await state.load();
  state.set({ lastName: desired.name, lastOs: desired.os, lastStorage: desired.storage });
  if (outcome.id !== null) state.set({ lastIdentifier: String(outcome.id) });
  if (outcome.state === 'Ready') state.set({ lastAddress: outcome.address });
  await state.save();

  if (outcome.state !== 'Ready') {
    return { outcome, handoff: null, logger };
  }

  const result = await handoff(
    { shell, tags: new TagLedger(host, logger), clock, logger },
    {
      id: outcome.id,
      target: { host: outcome.address, user: identity.user, identityFile: config.paths.sshKey },
      installAgent: config.handoff.installAgent,
      command: config.handoff.command,
      serviceTags: config.handoff.serviceTags,
    }
  );
  return { outcome, handoff: result, logger };
}

// =============================================================================
// Tests
// =============================================================================

describe('provision workflow', () => {
  let tempDir: string;
  let configPath: string;
  let host: FakeHost;

  async function load(overrides: CliOverrides = {}): Promise<ResolvedConfig> {
    return resolveConfig(await loadConfig(configPath), overrides, configPath);
  }

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'labforge-provision-'));
    configPath = join(tempDir, 'labforge.yaml');
    await writeFile(configPath, createTestConfig());
    host = new FakeHost();
    host.interfaces.set(300, [{ name: 'eth0', addresses: [{ type: 'ipv4', address: '192.0.2.50' }] }]);
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should build the VM from the file, run the hand-off and record hints', async () => {
    const config = await load();

    const { outcome, handoff: result } = await runProvision(config, host);

    assert.strictEqual(outcome.state, 'Ready');
    const vm = host.configOf(300);
    assert.strictEqual(vm.get('name'), 'ci-runner');
    assert.strictEqual(vm.get('cores'), '4');
    assert.strictEqual(vm.get('memory'), '4096');
    assert.strictEqual(vm.get('scsi0'), 'local-lvm:vm-300-disk-1,iothread=1,ssd=1,discard=on,size=40G');
    assert.strictEqual(vm.get('sshkeys'), join(tempDir, 'keys', 'id_ed25519.pub'));
    assert.strictEqual(vm.get('tags'), 'rocky10;docker');

    const importCall = host.calls.find((call) => call.method === 'importDisk');
    assert.deepStrictEqual(importCall?.args, [
      join(tempDir, 'images', 'Rocky-10-GenericCloud-Base.latest.x86_64.qcow2'),
      'local-lvm',
    ]);
    assert.deepStrictEqual(result, { agent: null, command: 'succeeded', exitCode: 0, tagged: ['docker'] });

    const hints = new StateManager(config.paths.stateDir);
    await hints.load();
    assert.strictEqual(hints.get('lastIdentifier'), '300');
    assert.strictEqual(hints.get('lastAddress'), '192.0.2.50');
    assert.strictEqual(hints.get('lastOs'), 'rocky10');
  });

  it('should make no host changes on a second run', async () => {
    const config = await load();
    await runProvision(config, host);
    const before = host.mutations().length;

    const { outcome } = await runProvision(config, host);

    assert.ok(outcome.state === 'Ready');
    assert.strictEqual(outcome.decision, 'none');
    assert.strictEqual(host.mutations().length, before);
  });

  it('should never remove tags that are already on the VM', async () => {
    const config = await load();
    await runProvision(config, host);
    host.configOf(300).set('tags', 'rocky10;docker;team-qa');
    host.configOf(300).delete('ipconfig0');

    await runProvision(config, host);

    assert.strictEqual(host.configOf(300).get('tags'), 'rocky10;docker;team-qa');
  });

  it('should report a larger disk request instead of resizing', async () => {
    await runProvision(await load(), host);
    host.configOf(300).delete('ipconfig0');
    await writeFile(configPath, createTestConfig(80));

    const { outcome, logger } = await runProvision(await load(), host);

    assert.ok(outcome.state === 'Ready');
    assert.strictEqual(host.calls.filter((call) => call.method === 'resizeDisk').length, 1);
    assert.strictEqual(host.configOf(300).get('scsi0'), 'local-lvm:vm-300-disk-1,iothread=1,ssd=1,discard=on,size=40G');
    assert.deepStrictEqual(logger.messages('warning'), ['Disk is 40G, requested 80G; resize it manually if needed']);
  });

  it('should rebuild on --force and re-tag from scratch', async () => {
    await runProvision(await load(), host);

    const { outcome } = await runProvision(await load(), host, { force: true });

    assert.ok(outcome.state === 'Ready');
    assert.strictEqual(outcome.decision, 'recreate');
    assert.strictEqual(host.calls.filter((call) => call.method === 'destroy').length, 1);
    assert.strictEqual(host.configOf(300).get('tags'), 'rocky10;docker');
    assert.strictEqual(host.configOf(300).get('scsi0'), 'local-lvm:vm-300-disk-2,iothread=1,ssd=1,discard=on,size=40G');
  });

  it('should take the address from a DHCP lease without sweeping', async () => {
    host.interfaces.clear();
    const sweeper = new StubSweeper();
    const table = new StubLookup();
    const discovery: Discovery = {
      strategies: [
        guestAgentStrategy(host),
        neighborStrategy(table),
        leaseStrategy(new StubLookup({ [MAC]: '192.0.2.60' })),
      ],
      fallback: sweepFallback(sweeper, table),
    };

    const { outcome } = await runProvision(await load(), host, { discovery });

    assert.ok(outcome.state === 'Ready');
    assert.strictEqual(outcome.address, '192.0.2.60');
    assert.deepStrictEqual(table.queries, [MAC]);
    assert.deepStrictEqual(sweeper.bridges, []);
  });

  it('should sweep the bridge once nothing else has answered', async () => {
    host.interfaces.clear();
    const table = new StubLookup();
    const sweeper = new StubSweeper(() => {
      table.answers[MAC] = '192.0.2.70';
    });
    const clock = new FakeClock();
    const discovery: Discovery = {
      strategies: [guestAgentStrategy(host), neighborStrategy(table), leaseStrategy(new StubLookup())],
      fallback: sweepFallback(sweeper, table),
    };

    const { outcome, logger } = await runProvision(await load(), host, { discovery, clock });

    assert.ok(outcome.state === 'Ready');
    assert.strictEqual(outcome.address, '192.0.2.70');
    assert.deepStrictEqual(sweeper.bridges, ['vmbr0']);
    assert.ok(logger.messages('success').includes('Address 192.0.2.70 (via subnet-sweep)'));
    assert.deepStrictEqual(clock.sleeps.slice(0, 3), [5000, 5000, 5000]);
  });

  it('should fail with the network timeout exit code and keep the VM', async () => {
    host.interfaces.clear();

    const { outcome, handoff: result } = await runProvision(await load(), host);

    assert.ok(outcome.state === 'Failed');
    assert.strictEqual(outcome.error.exitCode, 3);
    assert.strictEqual(result, null);
    assert.ok(host.vms.has(300));

    const hints = new StateManager(join(tempDir, 'state'));
    await hints.load();
    assert.strictEqual(hints.get('lastIdentifier'), '300');
    assert.strictEqual(hints.get('lastAddress'), undefined);
  });
});
