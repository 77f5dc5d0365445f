/**
 * Unit tests for the tag ledger
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { joinTags, mergeTags, TagLedger } from '../../../src/core/tags.js';
import { Logger } from '../../../src/lib/logger.js';
import { FakeHost } from '../../helpers/fakes.js';

describe('mergeTags', () => {
  it('should keep order and drop duplicates', () => {
    assert.deepStrictEqual(mergeTags(['rocky10', 'docker'], ['docker', 'k3s', 'k3s']), ['rocky10', 'docker', 'k3s']);
    assert.strictEqual(joinTags(['a', 'b']), 'a;b');
  });
});

describe('TagLedger', () => {
  it('should add a tag without removing existing ones', async () => {
    const host = new FakeHost();
    host.seed(101, { name: 'lab', tags: 'rocky10;manual' });
    const ledger = new TagLedger(host, new Logger('json'));

    assert.strictEqual(await ledger.addOne(101, 'docker'), true);

    assert.strictEqual(host.configOf(101).get('tags'), 'rocky10;manual;docker');
    assert.deepStrictEqual(await ledger.read(101), ['rocky10', 'manual', 'docker']);
  });

  it('should not write when the tag is already present', async () => {
    const host = new FakeHost();
    host.seed(101, { name: 'lab', tags: 'rocky10' });

    await new TagLedger(host, new Logger('json')).addOne(101, 'rocky10');

    assert.deepStrictEqual(host.mutations(), []);
  });

  it('should not rewrite an identical tag set', async () => {
    const host = new FakeHost();
    host.seed(101, { name: 'lab', tags: 'rocky10' });
    const ledger = new TagLedger(host, new Logger('json'));

    assert.strictEqual(await ledger.setAll(101, ['rocky10']), true);
    assert.deepStrictEqual(host.mutations(), []);

    assert.strictEqual(await ledger.setAll(101, ['debian13']), true);
    assert.strictEqual(host.configOf(101).get('tags'), 'debian13');
  });

  it('should turn write failures into warnings', async () => {
    const host = new FakeHost();
    host.seed(101, { name: 'lab' });
    host.failOnce((call) => call.method === 'configure', 'tag write refused');
    const logger = new Logger('json');

    assert.strictEqual(await new TagLedger(host, logger).addOne(101, 'docker'), false);
    assert.deepStrictEqual(logger.messages('warning'), ['Could not add tag "docker" to VM 101: tag write refused']);
  });

  it('should warn when the VM is gone', async () => {
    const logger = new Logger('json');

    assert.strictEqual(await new TagLedger(new FakeHost(), logger).setAll(101, ['x']), false);
    assert.deepStrictEqual(logger.messages('warning'), [
      "Could not set tags on VM 101: Configuration file 'nodes/pve/qemu-server/101.conf' does not exist",
    ]);
  });
});
