/**
 * Unit tests for Proxmox queries and QmHost
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { HostCommandError } from '../../../src/lib/executor.js';
import { QmHost } from '../../../src/proxmox/host.js';
import {
  getHostVersion,
  listAllocatedIdentifiers,
  parseClusterResources,
  parseGuestInterfaces,
  parseIdentifierList,
  parseImportedVolume,
  parsePowerState,
  parseStorageStatus,
} from '../../../src/proxmox/queries.js';
import { missingTool, result, ScriptedExecutor } from '../../helpers/fakes.js';

const QM_LIST = `      VMID NAME                 STATUS     MEM(MB)    BOOTDISK(GB) PID
       100 dns                  running    1024              8.00 1234
       101 build                stopped    4096             32.00 0
`;

const PCT_LIST = `VMID       Status     Lock         Name
200        running                 proxy
`;

const PVESM_STATUS = `Name             Type     Status           Total            Used       Available        %
local             dir     active        98497780        17376096        81121684   17.64%
local-lvm     lvmthin     active       832888832        10000000       822888832    1.20%
tank          zfspool   inactive               0               0               0    0.00%
`;

describe('parseIdentifierList', () => {
  it('should read the VMID column and skip the header', () => {
    assert.deepStrictEqual(parseIdentifierList(QM_LIST), [100, 101]);
    assert.deepStrictEqual(parseIdentifierList(PCT_LIST), [200]);
    assert.deepStrictEqual(parseIdentifierList(''), []);
  });
});

describe('parseClusterResources', () => {
  it('should collect integer vmids and ignore other resources', () => {
    const data = [
      { id: 'qemu/100', vmid: 100, type: 'qemu' },
      { id: 'lxc/205', vmid: 205, type: 'lxc' },
      { id: 'storage/pve/local', type: 'storage' },
      'garbage',
    ];
    assert.deepStrictEqual(parseClusterResources(data), [100, 205]);
    assert.deepStrictEqual(parseClusterResources({ vmid: 1 }), []);
  });
});

describe('parsePowerState', () => {
  it('should map qm status output', () => {
    assert.strictEqual(parsePowerState('status: running\n'), 'running');
    assert.strictEqual(parsePowerState('status: stopped'), 'stopped');
    assert.strictEqual(parsePowerState('status: prelaunch'), 'unknown');
    assert.strictEqual(parsePowerState(''), 'unknown');
  });
});

describe('parseImportedVolume', () => {
  it('should find the volume for this VM only', () => {
    const output = "importing disk '/img/rocky.qcow2' to VM 101 ...\nSuccessfully imported disk as 'unused0:local-lvm:vm-101-disk-1'\n";
    assert.strictEqual(parseImportedVolume(output, 101), 'vm-101-disk-1');
    assert.strictEqual(parseImportedVolume(output, 10), null);
  });
});

describe('parseStorageStatus', () => {
  it('should parse every pool row', () => {
    assert.deepStrictEqual(parseStorageStatus(PVESM_STATUS), [
      { id: 'local', type: 'dir', status: 'active', availableKiB: 81121684 },
      { id: 'local-lvm', type: 'lvmthin', status: 'active', availableKiB: 822888832 },
      { id: 'tank', type: 'zfspool', status: 'inactive', availableKiB: 0 },
    ]);
  });
});

describe('parseGuestInterfaces', () => {
  const interfaces = [
    {
      name: 'lo',
      'hardware-address': '00:00:00:00:00:00',
      'ip-addresses': [{ 'ip-address-type': 'ipv4', 'ip-address': '127.0.0.1', prefix: 8 }],
    },
    {
      name: 'eth0',
      'hardware-address': 'bc:24:11:00:00:01',
      'ip-addresses': [
        { 'ip-address-type': 'ipv6', 'ip-address': 'fe80::1', prefix: 64 },
        { 'ip-address-type': 'ipv4', 'ip-address': '192.168.1.50', prefix: 24 },
        { 'ip-address-type': 'bogus', 'ip-address': 'x' },
      ],
    },
  ];

  it('should accept the bare array', () => {
    const parsed = parseGuestInterfaces(interfaces);

    assert.strictEqual(parsed.length, 2);
    assert.deepStrictEqual(parsed[1], {
      name: 'eth0',
      hardwareAddress: 'bc:24:11:00:00:01',
      addresses: [
        { type: 'ipv6', address: 'fe80::1', prefix: 64 },
        { type: 'ipv4', address: '192.168.1.50', prefix: 24 },
      ],
    });
  });

  it('should accept the result envelope', () => {
    assert.deepStrictEqual(parseGuestInterfaces({ result: interfaces }), parseGuestInterfaces(interfaces));
  });

  it('should return nothing for unexpected data', () => {
    assert.deepStrictEqual(parseGuestInterfaces({ error: 'agent not running' }), []);
    assert.deepStrictEqual(parseGuestInterfaces(null), []);
  });
});

describe('listAllocatedIdentifiers', () => {
  it('should list VMs and containers on a single node', async () => {
    const executor = new ScriptedExecutor((command) => {
      switch (command) {
        case 'pvecm':
          return result('', 2, 'Error: Corosync config does not exist');
        case 'qm':
          return result(QM_LIST);
        case 'pct':
          return result(PCT_LIST);
        default:
          return result('', 1);
      }
    });

    assert.deepStrictEqual(await listAllocatedIdentifiers(executor), [100, 101, 200]);
  });

  it('should ask the whole cluster when clustered', async () => {
    const executor = new ScriptedExecutor((command) => {
      if (command === 'pvecm') return result('Quorum information\n');
      if (command === 'pvesh') return result(JSON.stringify([{ vmid: 100 }, { vmid: 310 }]));
      return result('', 1);
    });

    assert.deepStrictEqual(await listAllocatedIdentifiers(executor), [100, 310]);
    assert.deepStrictEqual(executor.commandLines(), [
      'pvecm status',
      'pvesh get /cluster/resources --type vm --output-format json',
    ]);
  });
});

describe('getHostVersion', () => {
  it('should return the version line', async () => {
    const executor = new ScriptedExecutor(() => result('pve-manager/8.2.4/faa83925c9641325 (running kernel: 6.8.8-2-pve)\n'));

    assert.strictEqual(
      await getHostVersion(executor),
      'pve-manager/8.2.4/faa83925c9641325 (running kernel: 6.8.8-2-pve)'
    );
  });

  it('should return null when the tool is missing', async () => {
    const executor = new ScriptedExecutor(() => {
      throw missingTool('pveversion');
    });

    assert.strictEqual(await getHostVersion(executor), null);
  });
});

describe('QmHost', () => {
  it('should report a missing VM as NOT_FOUND', async () => {
    const host = new QmHost(
      new ScriptedExecutor(() => result('', 2, "Configuration file 'nodes/pve/qemu-server/999.conf' does not exist\n"))
    );

    await assert.rejects(host.readConfig(999), (error: unknown) => {
      assert.ok(error instanceof HostCommandError);
      assert.strictEqual(error.code, 'NOT_FOUND');
      assert.strictEqual(error.message, "Configuration file 'nodes/pve/qemu-server/999.conf' does not exist");
      return true;
    });
  });

  it('should return the imported volume name', async () => {
    const executor = new ScriptedExecutor(() =>
      result("Successfully imported disk as 'unused0:local-lvm:vm-101-disk-1'\n")
    );
    const host = new QmHost(executor);

    assert.strictEqual(await host.importDisk(101, '/img/rocky.qcow2', 'local-lvm'), 'vm-101-disk-1');
    assert.strictEqual(executor.runner.calls[0]?.options?.timeout, 30 * 60 * 1000);
  });

  it('should reject import output without a volume', async () => {
    const host = new QmHost(new ScriptedExecutor(() => result('done\n')));

    await assert.rejects(host.importDisk(101, '/img/rocky.qcow2', 'local-lvm'), { code: 'INVALID_RESPONSE' });
  });

  it('should skip qm set for an empty patch', async () => {
    const executor = new ScriptedExecutor(() => result(''));
    const host = new QmHost(executor);

    await host.configure(101, {});
    await host.configure(101, { agent: 'enabled=1' });

    assert.deepStrictEqual(executor.commandLines(), ['qm set 101 --agent enabled=1']);
  });

  it('should parse guest interfaces from the agent reply', async () => {
    const executor = new ScriptedExecutor(() =>
      result(JSON.stringify([{ name: 'eth0', 'ip-addresses': [{ 'ip-address-type': 'ipv4', 'ip-address': '10.0.0.9' }] }]))
    );
    const host = new QmHost(executor);

    assert.deepStrictEqual(await host.queryNetworkInterfaces(5), [
      { name: 'eth0', addresses: [{ type: 'ipv4', address: '10.0.0.9' }] },
    ]);
    assert.strictEqual(executor.runner.calls[0]?.options?.timeout, 15000);
  });
});
