import type { CatalogEntry, PriceTarget } from './catalog.js';

export const DECISION_KINDS = [
  'MATCHED_NOOP',
  'MATCHED_UPDATE',
  'SOURCE_ONLY',
  'TARGET_ONLY',
] as const;

export type DecisionKind = (typeof DECISION_KINDS)[number];

type MatchedFields = Readonly<{
  sku: string;
  source: CatalogEntry;
  target: CatalogEntry;
  sourcePrice: number;
  targetPrice: number;
  /** Source price after the configured price rule; the value the target should carry. */
  expectedPrice: number;
  /** expectedPrice - targetPrice */
  delta: number;
  /** |delta| / expectedPrice, null when expectedPrice is zero. */
  relativeDelta: number | null;
}>;

export type MatchedNoopDecision = MatchedFields & Readonly<{ kind: 'MATCHED_NOOP' }>;

export type MatchedUpdateDecision = MatchedFields &
  Readonly<{
    kind: 'MATCHED_UPDATE';
    newPrice: number;
  }>;

export type SourceOnlyDecision = Readonly<{
  kind: 'SOURCE_ONLY';
  sku: string;
  source: CatalogEntry;
  sourcePrice: number;
}>;

export type TargetOnlyDecision = Readonly<{
  kind: 'TARGET_ONLY';
  sku: string;
  target: CatalogEntry;
  targetPrice: number;
}>;

export type ReconciliationDecision =
  | MatchedNoopDecision
  | MatchedUpdateDecision
  | SourceOnlyDecision
  | TargetOnlyDecision;

export type IndexDiagnostic =
  | Readonly<{
      kind: 'DUPLICATE_SKU';
      sku: string;
      keptTarget: PriceTarget;
      discardedTarget: PriceTarget;
    }>
  | Readonly<{
      kind: 'MISSING_SKU';
      target: PriceTarget;
      displayName: string;
    }>
  | Readonly<{
      kind: 'MISSING_PRICE';
      sku: string;
      target: PriceTarget;
    }>
  | Readonly<{
      kind: 'INACTIVE_SKIPPED';
      sku: string;
      target: PriceTarget;
    }>;

export type UpdateFailure = Readonly<{
  sku: string;
  target: PriceTarget;
  attemptedPrice: number;
  error: string;
}>;

export type UpdateOutcome =
  | Readonly<{ kind: 'updated'; sku: string; price: number }>
  | Readonly<{ kind: 'dry_run'; sku: string; price: number }>
  | Readonly<{ kind: 'cancelled'; sku: string }>
  | Readonly<{ kind: 'failed'; failure: UpdateFailure }>;

export interface RunCounters {
  matched: number;
  /** Applied updates; in dry run, the updates that would have been applied. */
  updated: number;
  skippedBelowThreshold: number;
  unmatchedSource: number;
  unmatchedTarget: number;
  failed: number;
  cancelled: number;
}

export type RunReport = Readonly<
  RunCounters & {
    dryRun: boolean;
    failures: readonly UpdateFailure[];
  }
>;
