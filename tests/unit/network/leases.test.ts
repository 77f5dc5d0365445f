/**
 * Unit tests for DHCP lease lookup
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import {
  findLease,
  LeaseReader,
  parseDhcpdLeases,
  parseDnsmasqLeases,
  parseLeaseFile,
} from '../../../src/network/leases.js';

const DNSMASQ = `1760000000 bc:24:11:00:00:01 192.168.1.40 lab-a 01:bc:24:11:00:00:01
1760000500 00:11:22:33:44:55 192.168.1.41 * *
1760000900 BC:24:11:00:00:01 192.168.1.42 lab-a *
`;

const DHCPD = `# The format of this file is documented in the dhcpd.leases(5) manual page.
lease 10.0.0.20 {
  starts 4 2026/10/15 08:00:00;
  hardware ethernet bc:24:11:00:00:01;
  client-hostname "lab-a";
}
lease 10.0.0.21 {
  hardware ethernet 00:11:22:33:44:55;
}
lease 10.0.0.22 {
  starts 4 2026/10/15 09:00:00;
  hardware ethernet BC:24:11:00:00:01;
}
`;

function enoent(path: string): Error {
  return Object.assign(new Error(`ENOENT: no such file or directory, open '${path}'`), { code: 'ENOENT' });
}

describe('lease parsers', () => {
  it('should parse dnsmasq rows', () => {
    assert.deepStrictEqual(parseDnsmasqLeases(DNSMASQ), [
      { macAddress: 'bc:24:11:00:00:01', address: '192.168.1.40' },
      { macAddress: '00:11:22:33:44:55', address: '192.168.1.41' },
      { macAddress: 'bc:24:11:00:00:01', address: '192.168.1.42' },
    ]);
  });

  it('should parse dhcpd blocks', () => {
    assert.deepStrictEqual(parseDhcpdLeases(DHCPD), [
      { macAddress: 'bc:24:11:00:00:01', address: '10.0.0.20' },
      { macAddress: '00:11:22:33:44:55', address: '10.0.0.21' },
      { macAddress: 'bc:24:11:00:00:01', address: '10.0.0.22' },
    ]);
  });

  it('should detect the format from the content', () => {
    assert.strictEqual(parseLeaseFile(DHCPD)[0]?.address, '10.0.0.20');
    assert.strictEqual(parseLeaseFile(DNSMASQ)[0]?.address, '192.168.1.40');
  });
});

describe('findLease', () => {
  it('should let the last lease for a MAC win', () => {
    assert.strictEqual(findLease(parseLeaseFile(DNSMASQ), 'BC:24:11:00:00:01'), '192.168.1.42');
    assert.strictEqual(findLease(parseLeaseFile(DHCPD), 'bc:24:11:00:00:01'), '10.0.0.22');
    assert.strictEqual(findLease([], 'bc:24:11:00:00:01'), null);
  });
});

describe('LeaseReader', () => {
  it('should skip missing files and stop at the first hit', async () => {
    const read: string[] = [];
    const files: Record<string, string> = { '/b.leases': DHCPD, '/c.leases': DNSMASQ };
    const reader = new LeaseReader(['/a.leases', '/b.leases', '/c.leases'], async (path) => {
      read.push(path);
      const text = files[path];
      if (text === undefined) {
        throw enoent(path);
      }
      return text;
    });

    assert.strictEqual(await reader.lookup('bc:24:11:00:00:01'), '10.0.0.22');
    assert.deepStrictEqual(read, ['/a.leases', '/b.leases']);
  });

  it('should return null when no file has the MAC', async () => {
    const reader = new LeaseReader(['/c.leases'], async () => DNSMASQ);

    assert.strictEqual(await reader.lookup('aa:bb:cc:dd:ee:ff'), null);
  });

  it('should propagate errors other than a missing file', async () => {
    const denied = Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
    const reader = new LeaseReader(['/secret.leases'], async () => {
      throw denied;
    });

    await assert.rejects(reader.lookup('aa:bb:cc:dd:ee:ff'), denied);
  });
});
