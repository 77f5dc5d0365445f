/**
 * Unit tests for the guest hand-off
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  agentInstallCommands,
  handoff,
  installGuestAgent,
  parseOsReleaseId,
  type HandoffRequest,
} from '../../../src/core/handoff.js';
import { TagLedger } from '../../../src/core/tags.js';
import { Logger } from '../../../src/lib/logger.js';
import type { ExecResult, ShellTarget } from '../../../src/remote/ssh.js';
import { exitWith, FakeClock, FakeHost, ok, ScriptedShell, unreachable } from '../../helpers/fakes.js';
import { completeConfig } from '../../helpers/configs.js';

const TARGET: ShellTarget = { host: '192.0.2.10', user: 'rocky', identityFile: '/keys/id_ed25519' };

/**
 * Guest without a running agent, answering os-release with the given ID.
 */
function guest(id: string, install: (command: string, attempt: number) => ExecResult = () => ok()): ScriptedShell {
  return new ScriptedShell((command, attempt) => {
    if (command === 'systemctl is-active --quiet qemu-guest-agent') return exitWith(3);
    if (command === 'test -x /usr/bin/qemu-ga') return exitWith(1);
    if (command === 'cat /etc/os-release') return ok(`NAME="Test Linux"\nID=${id}\nID_LIKE="other"\n`);
    return install(command, attempt);
  });
}

describe('parseOsReleaseId', () => {
  it('should read quoted and bare IDs', () => {
    assert.strictEqual(parseOsReleaseId('NAME="Rocky Linux"\nID="rocky"\nID_LIKE="rhel centos fedora"\n'), 'rocky');
    assert.strictEqual(parseOsReleaseId('ID=debian\n'), 'debian');
  });

  it('should return null without an ID line', () => {
    assert.strictEqual(parseOsReleaseId('NAME=Unknown\n'), null);
  });
});

describe('agentInstallCommands', () => {
  it('should use dnf for the Red Hat family', () => {
    assert.deepStrictEqual(agentInstallCommands('almalinux'), [
      ['sudo', 'dnf', 'install', '-y', 'qemu-guest-agent'],
      ['sudo', 'systemctl', 'enable', '--now', 'qemu-guest-agent'],
    ]);
  });

  it('should return null for other distributions', () => {
    assert.strictEqual(agentInstallCommands('arch'), null);
  });
});

describe('installGuestAgent', () => {
  it('should do nothing when the agent is running', async () => {
    const shell = new ScriptedShell(() => ok());

    const outcome = await installGuestAgent(shell, TARGET, { clock: new FakeClock(), logger: new Logger('json') });

    assert.deepStrictEqual(outcome, { status: 'running', attempts: 0 });
    assert.deepStrictEqual(shell.commands(), ['systemctl is-active --quiet qemu-guest-agent']);
  });

  it('should start an installed but stopped agent', async () => {
    const shell = new ScriptedShell((command) =>
      command === 'systemctl is-active --quiet qemu-guest-agent' ? exitWith(3) : ok()
    );

    const outcome = await installGuestAgent(shell, TARGET, { clock: new FakeClock(), logger: new Logger('json') });

    assert.deepStrictEqual(outcome, { status: 'started', attempts: 0 });
    assert.deepStrictEqual(shell.commands().slice(1), [
      'test -x /usr/bin/qemu-ga',
      'sudo systemctl start qemu-guest-agent',
    ]);
  });

  it('should install with apt on Debian', async () => {
    const shell = guest('debian');

    const outcome = await installGuestAgent(shell, TARGET, { clock: new FakeClock(), logger: new Logger('json') });

    assert.deepStrictEqual(outcome, { status: 'installed', distribution: 'debian', attempts: 1 });
    assert.deepStrictEqual(shell.commands().slice(3), [
      'sudo apt-get update -qq',
      'sudo DEBIAN_FRONTEND=noninteractive apt-get install -y qemu-guest-agent',
      'sudo systemctl enable --now qemu-guest-agent',
    ]);
  });

  it('should retry with a growing pause', async () => {
    const clock = new FakeClock();
    const shell = guest('rocky', (command, attempt) =>
      command === 'sudo dnf install -y qemu-guest-agent' && attempt < 3 ? exitWith(1, 'mirror timeout') : ok()
    );

    const outcome = await installGuestAgent(shell, TARGET, { clock, logger: new Logger('json') });

    assert.deepStrictEqual(outcome, { status: 'installed', distribution: 'rocky', attempts: 3 });
    assert.deepStrictEqual(clock.sleeps, [20000, 30000]);
  });

  it('should give up after three attempts without failing', async () => {
    const logger = new Logger('json');
    const shell = guest('ubuntu', () => exitWith(100));

    const outcome = await installGuestAgent(shell, TARGET, { clock: new FakeClock(), logger });

    assert.deepStrictEqual(outcome, { status: 'failed', distribution: 'ubuntu', attempts: 3 });
    assert.deepStrictEqual(logger.messages('warning'), [
      'Failed to install qemu-guest-agent after 3 attempts (non-critical)',
    ]);
  });

  it('should skip unknown distributions', async () => {
    const outcome = await installGuestAgent(guest('arch'), TARGET, {
      clock: new FakeClock(),
      logger: new Logger('json'),
    });

    assert.deepStrictEqual(outcome, { status: 'unsupported', distribution: 'arch', attempts: 0 });
  });
});

describe('handoff', () => {
  function setup(shell: ScriptedShell): { host: FakeHost; deps: Parameters<typeof handoff>[0] } {
    const host = new FakeHost();
    host.seed(101, completeConfig(), 'running');
    const logger = new Logger('json');
    return { host, deps: { shell, tags: new TagLedger(host, logger), clock: new FakeClock(), logger } };
  }

  const request: HandoffRequest = {
    id: 101,
    target: TARGET,
    installAgent: false,
    command: ['sudo', '/opt/setup.sh', '--role', 'ci'],
    serviceTags: ['docker', 'gitlab-runner'],
  };

  it('should skip when no command is configured', async () => {
    const shell = new ScriptedShell();
    const { deps } = setup(shell);

    const outcome = await handoff(deps, { ...request, command: [] });

    assert.deepStrictEqual(outcome, { agent: null, command: 'skipped', tagged: [] });
    assert.deepStrictEqual(shell.calls, []);
  });

  it('should tag the services after the command succeeds', async () => {
    const shell = new ScriptedShell();
    const { host, deps } = setup(shell);

    const outcome = await handoff(deps, request);

    assert.deepStrictEqual(outcome, {
      agent: null,
      command: 'succeeded',
      exitCode: 0,
      tagged: ['docker', 'gitlab-runner'],
    });
    assert.deepStrictEqual(shell.commands(), ['sudo /opt/setup.sh --role ci']);
    assert.strictEqual(host.configOf(101).get('tags'), 'rocky10;docker;gitlab-runner');
  });

  it('should not tag when the command fails', async () => {
    const { host, deps } = setup(new ScriptedShell(() => exitWith(2)));

    const outcome = await handoff(deps, request);

    assert.deepStrictEqual(outcome, { agent: null, command: 'failed', exitCode: 2, tagged: [] });
    assert.strictEqual(host.configOf(101).get('tags'), 'rocky10');
  });

  it('should fail when the guest is unreachable', async () => {
    const { deps } = setup(new ScriptedShell(() => unreachable()));

    const outcome = await handoff(deps, request);

    assert.deepStrictEqual(outcome, { agent: null, command: 'failed', tagged: [] });
  });

  it('should check the agent before the command when asked', async () => {
    const shell = new ScriptedShell();
    const { deps } = setup(shell);

    const outcome = await handoff(deps, { ...request, installAgent: true });

    assert.deepStrictEqual(outcome.agent, { status: 'running', attempts: 0 });
    assert.deepStrictEqual(shell.commands(), [
      'systemctl is-active --quiet qemu-guest-agent',
      'sudo /opt/setup.sh --role ci',
    ]);
  });
});
