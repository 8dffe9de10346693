import { randomUUID } from 'node:crypto';

import type { CatalogPlatform } from '@pricesync/platform-client';
import { OTEL_ATTR, withSpan, type Logger } from '@pricesync/logger';
import type { IndexDiagnostic, ReconciliationDecision, RunReport } from '@pricesync/types';
import { formatPriceTarget } from '@pricesync/types';

import { buildIndex, type CatalogIndex } from './catalog-index.js';
import { FetchFailedError } from './errors.js';
import { execute } from './executor.js';
import { fetchCatalog } from './fetcher.js';
import { plan } from './planner.js';
import type { PriceRule } from './pricing.js';

export type RunSettings = Readonly<{
  tolerance: number;
  absoluteFloor: number;
  perPage: number;
  maxPages: number;
  dryRun: boolean;
  concurrency: number;
  includeInactive: boolean;
  priceRule: PriceRule;
}>;

export type RunInput = Readonly<{
  source: CatalogPlatform;
  target: CatalogPlatform;
  settings: RunSettings;
  logger: Logger;
  signal?: AbortSignal;
}>;

export type RunDiagnostics = Readonly<{
  source: readonly IndexDiagnostic[];
  target: readonly IndexDiagnostic[];
}>;

export type RunOutcome =
  | Readonly<{
      status: 'completed';
      runId: string;
      report: RunReport;
      diagnostics: RunDiagnostics;
      decisions: readonly ReconciliationDecision[];
    }>
  | Readonly<{
      status: 'aborted';
      runId: string;
      error: FetchFailedError;
    }>;

export const EXIT_CODES = {
  OK: 0,
  ITEM_FAILURES: 1,
  FETCH_ABORTED: 2,
  CONFIG_INVALID: 3,
} as const;

export function exitCodeFor(outcome: RunOutcome): number {
  if (outcome.status === 'aborted') return EXIT_CODES.FETCH_ABORTED;
  const { failed, cancelled } = outcome.report;
  return failed > 0 || cancelled > 0 ? EXIT_CODES.ITEM_FAILURES : EXIT_CODES.OK;
}

function logDiagnostics(
  logger: Logger,
  role: 'source' | 'target',
  platform: string,
  diagnostics: readonly IndexDiagnostic[]
): void {
  for (const diagnostic of diagnostics) {
    switch (diagnostic.kind) {
      case 'DUPLICATE_SKU':
        logger.warn(
          {
            role,
            platform,
            sku: diagnostic.sku,
            keptTarget: formatPriceTarget(diagnostic.keptTarget),
            discardedTarget: formatPriceTarget(diagnostic.discardedTarget),
          },
          'Duplicate SKU; keeping the first listing'
        );
        break;
      case 'MISSING_SKU':
        logger.warn(
          {
            role,
            platform,
            target: formatPriceTarget(diagnostic.target),
            displayName: diagnostic.displayName,
          },
          'Listing has no SKU; not indexed'
        );
        break;
      case 'MISSING_PRICE':
        logger.warn(
          { role, platform, sku: diagnostic.sku, target: formatPriceTarget(diagnostic.target) },
          'Listing has no price; not indexed'
        );
        break;
      case 'INACTIVE_SKIPPED':
        logger.warn(
          { role, platform, sku: diagnostic.sku, target: formatPriceTarget(diagnostic.target) },
          'Inactive listing skipped'
        );
        break;
    }
  }
}

async function indexPlatform(
  platform: CatalogPlatform,
  role: 'source' | 'target',
  input: RunInput
): Promise<CatalogIndex> {
  const { settings, logger } = input;
  return withSpan(
    `sync.index.${role}`,
    {
      [OTEL_ATTR.PLATFORM]: platform.name,
      [OTEL_ATTR.PLATFORM_ROLE]: role,
      [OTEL_ATTR.PAGE_SIZE]: settings.perPage,
    },
    async (span) => {
      const index = await buildIndex(
        fetchCatalog(platform, { perPage: settings.perPage, maxPages: settings.maxPages }),
        { includeInactive: settings.includeInactive }
      );
      span.setAttribute(OTEL_ATTR.INDEX_SIZE, index.size);
      logger.info(
        { role, platform: platform.name, size: index.size, diagnostics: index.diagnostics.length },
        'Catalog indexed'
      );
      logDiagnostics(logger, role, platform.name, index.diagnostics);
      return index;
    }
  );
}

/**
 * One reconciliation run: index source, index target, plan, execute.
 * A fetch failure on either side ends the run before any update is sent.
 */
export async function runReconciliation(input: RunInput): Promise<RunOutcome> {
  const { source, target, settings } = input;
  const runId = randomUUID();
  const logger = input.logger.child({ runId });

  logger.info(
    { source: source.name, target: target.name, dryRun: settings.dryRun },
    'Reconciliation run started'
  );

  return withSpan(
    'sync.run',
    { [OTEL_ATTR.RUN_ID]: runId, [OTEL_ATTR.RUN_DRY_RUN]: settings.dryRun },
    async (): Promise<RunOutcome> => {
      let sourceIndex: CatalogIndex;
      let targetIndex: CatalogIndex;
      try {
        sourceIndex = await indexPlatform(source, 'source', { ...input, logger });
        targetIndex = await indexPlatform(target, 'target', { ...input, logger });
      } catch (error) {
        if (!(error instanceof FetchFailedError)) throw error;
        logger.error(
          { platform: error.platform, page: error.page, error },
          'Catalog fetch failed; run aborted before any update'
        );
        return { status: 'aborted', runId, error };
      }

      const decisions = await withSpan('sync.plan', {}, (span) => {
        const planned = plan(sourceIndex, targetIndex, {
          tolerance: settings.tolerance,
          absoluteFloor: settings.absoluteFloor,
          priceRule: settings.priceRule,
        });
        span.setAttribute(OTEL_ATTR.DECISIONS, planned.length);
        span.setAttribute(
          OTEL_ATTR.UPDATES_PLANNED,
          planned.filter((decision) => decision.kind === 'MATCHED_UPDATE').length
        );
        return Promise.resolve(planned);
      });

      const report = await withSpan('sync.execute', {}, () =>
        execute(decisions, target, {
          dryRun: settings.dryRun,
          concurrency: settings.concurrency,
          ...(input.signal ? { signal: input.signal } : {}),
          logger,
        })
      );

      logger.info({ report }, 'Reconciliation run finished');

      return {
        status: 'completed',
        runId,
        report,
        diagnostics: { source: sourceIndex.diagnostics, target: targetIndex.diagnostics },
        decisions,
      };
    }
  );
}
