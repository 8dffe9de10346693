import type { CatalogPlatform } from '@pricesync/platform-client';
import { describeError } from '@pricesync/platform-client';
import type { Logger } from '@pricesync/logger';
import type {
  MatchedUpdateDecision,
  ReconciliationDecision,
  RunCounters,
  RunReport,
  UpdateFailure,
  UpdateOutcome,
} from '@pricesync/types';
import { formatPriceTarget } from '@pricesync/types';
import pLimit from 'p-limit';

export const DEFAULT_CONCURRENCY = 4;

export type ExecuteOptions = Readonly<{
  dryRun: boolean;
  concurrency?: number;
  /** Once aborted, updates that have not started yet are skipped as cancelled. */
  signal?: AbortSignal;
  logger?: Logger;
}>;

function emptyCounters(): RunCounters {
  return {
    matched: 0,
    updated: 0,
    skippedBelowThreshold: 0,
    unmatchedSource: 0,
    unmatchedTarget: 0,
    failed: 0,
    cancelled: 0,
  };
}

async function applyUpdate(
  decision: MatchedUpdateDecision,
  target: CatalogPlatform,
  options: ExecuteOptions
): Promise<UpdateOutcome> {
  const { sku, newPrice } = decision;
  if (options.signal?.aborted) return { kind: 'cancelled', sku };
  if (options.dryRun) return { kind: 'dry_run', sku, price: newPrice };

  try {
    await target.updatePrice(decision.target.target, newPrice);
    options.logger?.debug(
      { sku, target: formatPriceTarget(decision.target.target), price: newPrice },
      'Price updated'
    );
    return { kind: 'updated', sku, price: newPrice };
  } catch (error) {
    const failure: UpdateFailure = {
      sku,
      target: decision.target.target,
      attemptedPrice: newPrice,
      error: describeError(error),
    };
    options.logger?.warn(
      { sku, target: formatPriceTarget(failure.target), attemptedPrice: newPrice, error },
      'Price update failed'
    );
    return { kind: 'failed', failure };
  }
}

/**
 * Applies every MATCHED_UPDATE to the target platform through a bounded pool.
 * A failing item is recorded and never stops the others; failures keep decision order.
 */
export async function execute(
  decisions: readonly ReconciliationDecision[],
  target: CatalogPlatform,
  options: ExecuteOptions
): Promise<RunReport> {
  const counters = emptyCounters();
  const updates: MatchedUpdateDecision[] = [];

  for (const decision of decisions) {
    switch (decision.kind) {
      case 'MATCHED_NOOP':
        counters.matched += 1;
        counters.skippedBelowThreshold += 1;
        break;
      case 'MATCHED_UPDATE':
        counters.matched += 1;
        updates.push(decision);
        break;
      case 'SOURCE_ONLY':
        counters.unmatchedSource += 1;
        break;
      case 'TARGET_ONLY':
        counters.unmatchedTarget += 1;
        break;
    }
  }

  const limit = pLimit(Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY)));
  const outcomes = await Promise.all(
    updates.map((decision) => limit(() => applyUpdate(decision, target, options)))
  );

  const failures: UpdateFailure[] = [];
  for (const outcome of outcomes) {
    switch (outcome.kind) {
      case 'updated':
      case 'dry_run':
        counters.updated += 1;
        break;
      case 'cancelled':
        counters.cancelled += 1;
        break;
      case 'failed':
        counters.failed += 1;
        failures.push(outcome.failure);
        break;
    }
  }

  return Object.freeze({ ...counters, dryRun: options.dryRun, failures: Object.freeze(failures) });
}
