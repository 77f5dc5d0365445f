/**
 * Unit tests for verbose command formatting
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { formatCommand, shellQuote } from '../../../src/lib/verbose.js';

describe('shellQuote', () => {
  it('should leave plain arguments alone', () => {
    assert.strictEqual(shellQuote('local-lvm:vm-101-disk-1,iothread=1'), 'local-lvm:vm-101-disk-1,iothread=1');
    assert.strictEqual(shellQuote('--ciuser'), '--ciuser');
  });

  it('should single-quote whitespace and metacharacters', () => {
    assert.strictEqual(shellQuote('a b'), "'a b'");
    assert.strictEqual(shellQuote('$HOME'), "'$HOME'");
    assert.strictEqual(shellQuote('x;rm'), "'x;rm'");
  });

  it('should escape embedded single quotes', () => {
    assert.strictEqual(shellQuote("it's"), "'it'\\''s'");
  });

  it('should render the empty string as a pair of quotes', () => {
    assert.strictEqual(shellQuote(''), "''");
  });
});

describe('formatCommand', () => {
  it('should fence a short command on one line', () => {
    assert.strictEqual(
      formatCommand('qm', ['set', '101', '--ciuser', 'rocky'], false),
      '\n[qm] qm set 101 --ciuser rocky\n\n'
    );
  });

  it('should put each flag on its own line when the command is long', () => {
    const output = formatCommand(
      'qm',
      [
        'create', '9001',
        '--name', 'build-box',
        '--machine', 'q35,viommu=virtio',
        '--bios', 'ovmf',
        '--cpu', 'host',
        '--cores', '4',
        '--memory', '4096',
        '--net0', 'virtio,bridge=vmbr0',
      ],
      false
    );

    assert.strictEqual(
      output,
      [
        '',
        '[qm] qm create 9001',
        '    --name build-box',
        '    --machine q35,viommu=virtio',
        '    --bios ovmf',
        '    --cpu host',
        '    --cores 4',
        '    --memory 4096',
        '    --net0 virtio,bridge=vmbr0',
        '',
        '',
      ].join('\n')
    );
  });

  it('should wrap the block in gray when ANSI is supported', () => {
    assert.strictEqual(formatCommand('pveversion', [], true), '\x1b[90m\n[pveversion] pveversion\n\n\x1b[0m');
  });
});
