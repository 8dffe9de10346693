import type { CatalogEntry, ReconciliationDecision } from '@pricesync/types';

import type { CatalogIndex } from './catalog-index.js';
import {
  IDENTITY_PRICE_RULE,
  MAX_COMPARE_DIGITS,
  applyPriceRule,
  decimalPlaces,
  fromMinorUnits,
  toMinorUnits,
  type PriceRule,
} from './pricing.js';

export type PlanOptions = Readonly<{
  /** Relative difference above which a matched price is rewritten; `[0, 1)`. */
  tolerance: number;
  /** Absolute difference used instead when the expected price is zero. */
  absoluteFloor: number;
  priceRule?: PriceRule;
}>;

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function decideMatched(
  sku: string,
  source: CatalogEntry,
  target: CatalogEntry,
  options: PlanOptions
): ReconciliationDecision {
  const rule = options.priceRule ?? IDENTITY_PRICE_RULE;

  // Only the expected price is rounded; the target is compared as stored, at whichever
  // precision is finer.
  const expectedPrice = applyPriceRule(source.price, rule);
  const digits = Math.min(
    MAX_COMPARE_DIGITS,
    Math.max(rule.roundDigits, decimalPlaces(target.price))
  );
  const expectedUnits = toMinorUnits(expectedPrice, digits);
  const deltaUnits = expectedUnits - toMinorUnits(target.price, digits);

  const relativeDelta = expectedUnits > 0 ? Math.abs(deltaUnits) / expectedUnits : null;
  const needsUpdate =
    relativeDelta === null
      ? Math.abs(deltaUnits) > toMinorUnits(options.absoluteFloor, digits)
      : relativeDelta > options.tolerance;

  const fields = {
    sku,
    source,
    target,
    sourcePrice: source.price,
    targetPrice: target.price,
    expectedPrice,
    delta: fromMinorUnits(deltaUnits, digits),
    relativeDelta,
  };

  return needsUpdate
    ? { kind: 'MATCHED_UPDATE', ...fields, newPrice: expectedPrice }
    : { kind: 'MATCHED_NOOP', ...fields };
}

/**
 * Joins the two indices into one decision per SKU, in SKU code-unit order.
 * The source side is authoritative: updates always move the target toward it.
 */
export function plan(
  sourceIndex: CatalogIndex,
  targetIndex: CatalogIndex,
  options: PlanOptions
): ReconciliationDecision[] {
  const skus = [...new Set([...sourceIndex.skus(), ...targetIndex.skus()])].sort(compareCodeUnits);

  return skus.map((sku): ReconciliationDecision => {
    const source = sourceIndex.get(sku);
    const target = targetIndex.get(sku);

    if (source && target) return decideMatched(sku, source, target, options);
    if (source) return { kind: 'SOURCE_ONLY', sku, source, sourcePrice: source.price };
    if (target) return { kind: 'TARGET_ONLY', sku, target, targetPrice: target.price };
    throw new Error(`SKU ${sku} is in neither index`);
  });
}
