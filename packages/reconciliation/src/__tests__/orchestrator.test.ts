import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import type { CatalogPlatform } from '@pricesync/platform-client';

import { FetchFailedError } from '../errors.js';
import { exitCodeFor, runReconciliation, type RunSettings } from '../orchestrator.js';
import { IDENTITY_PRICE_RULE } from '../pricing.js';

import { createFakePlatform, createTestLogger, product } from './fakes.js';

const SETTINGS: RunSettings = {
  tolerance: 0.01,
  absoluteFloor: 0.01,
  perPage: 2,
  maxPages: 100,
  dryRun: false,
  concurrency: 2,
  includeInactive: false,
  priceRule: IDENTITY_PRICE_RULE,
};

function sourcePlatform() {
  return createFakePlatform(
    [product('MLA1', 'A', 10), product('MLA2', 'B', 20), product('MLA3', 'C', 30, false)],
    { name: 'mercadolibre' }
  );
}

void describe('runReconciliation', () => {
  void it('fetches both sides, plans and applies updates', async () => {
    const source = sourcePlatform();
    const target = createFakePlatform([product('1', 'a', 8), product('2', 'b', 20), product('3', 'c', 1)]);

    const outcome = await runReconciliation({
      source: source.platform,
      target: target.platform,
      settings: SETTINGS,
      logger: createTestLogger(),
    });

    assert.equal(outcome.status, 'completed');
    if (outcome.status !== 'completed') return;
    assert.equal(outcome.report.matched, 2);
    assert.equal(outcome.report.updated, 1);
    assert.equal(outcome.report.skippedBelowThreshold, 1);
    assert.equal(outcome.report.unmatchedTarget, 1);
    assert.deepEqual(outcome.diagnostics.source, [
      { kind: 'INACTIVE_SKIPPED', sku: 'c', target: { productId: 'MLA3', variantId: null } },
    ]);
    assert.deepEqual(target.updatePrice.mock.calls[0]?.arguments, [
      { productId: '1', variantId: null },
      10,
    ]);
    assert.equal(source.updatePrice.mock.callCount(), 0);
    assert.equal(exitCodeFor(outcome), 0);
  });

  void it('aborts before any update when a catalog cannot be fetched', async () => {
    const source = sourcePlatform();
    const target = createFakePlatform([product('1', 'a', 8)]);
    const brokenTarget: CatalogPlatform = {
      ...target.platform,
      fetchPage: (page) =>
        page === 1 ? target.platform.fetchPage(page, 2) : Promise.reject(new Error('HTTP 502')),
    };

    const outcome = await runReconciliation({
      source: source.platform,
      target: brokenTarget,
      settings: SETTINGS,
      logger: createTestLogger(),
    });

    assert.equal(outcome.status, 'aborted');
    if (outcome.status !== 'aborted') return;
    assert.ok(outcome.error instanceof FetchFailedError);
    assert.equal(outcome.error.platform, 'tiendanube');
    assert.equal(outcome.error.page, 2);
    assert.equal(target.updatePrice.mock.callCount(), 0);
    assert.equal(exitCodeFor(outcome), 2);
  });

  void it('signals item failures through the exit code', async () => {
    const target = createFakePlatform([product('1', 'a', 8), product('2', 'b', 2)], {
      failOn: ['2'],
    });

    const outcome = await runReconciliation({
      source: sourcePlatform().platform,
      target: target.platform,
      settings: SETTINGS,
      logger: createTestLogger(),
    });

    assert.equal(outcome.status, 'completed');
    if (outcome.status !== 'completed') return;
    assert.equal(outcome.report.updated, 1);
    assert.equal(outcome.report.failed, 1);
    assert.equal(exitCodeFor(outcome), 1);
  });

  void it('counts would-be updates in dry run without writing', async () => {
    const target = createFakePlatform([product('1', 'a', 8), product('2', 'b', 2)]);

    const outcome = await runReconciliation({
      source: sourcePlatform().platform,
      target: target.platform,
      settings: { ...SETTINGS, dryRun: true },
      logger: createTestLogger(),
    });

    assert.equal(outcome.status, 'completed');
    if (outcome.status !== 'completed') return;
    assert.equal(outcome.report.dryRun, true);
    assert.equal(outcome.report.updated, 2);
    assert.equal(target.updatePrice.mock.callCount(), 0);
    assert.equal(exitCodeFor(outcome), 0);
  });
});
