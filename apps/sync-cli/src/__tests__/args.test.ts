import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { ConfigInvalidError } from '@pricesync/config';

import { parseCliArgs } from '../args.js';

void describe('parseCliArgs', () => {
  void it('leaves env defaults in place when no flags are given', () => {
    assert.deepEqual(parseCliArgs([]), {
      help: false,
      dryRun: undefined,
      concurrency: undefined,
      debug: false,
    });
  });

  void it('reads --dry-run and --concurrency', () => {
    assert.deepEqual(parseCliArgs(['--dry-run', '--concurrency', '8']), {
      help: false,
      dryRun: true,
      concurrency: 8,
      debug: false,
    });
    assert.equal(parseCliArgs(['--concurrency=2']).concurrency, 2);
  });

  void it('reads --debug', () => {
    assert.equal(parseCliArgs(['--debug']).debug, true);
  });

  void it('recognizes -h', () => {
    assert.equal(parseCliArgs(['-h']).help, true);
  });

  void it('rejects concurrency outside 1..32', () => {
    for (const value of ['0', '33', '1.5', 'many']) {
      assert.throws(
        () => parseCliArgs(['--concurrency', value]),
        (error: unknown) => error instanceof ConfigInvalidError && error.variable === '--concurrency'
      );
    }
  });

  void it('rejects unknown flags and positionals', () => {
    assert.throws(() => parseCliArgs(['--force']), ConfigInvalidError);
    assert.throws(() => parseCliArgs(['run']), ConfigInvalidError);
  });
});
