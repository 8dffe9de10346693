import type { RunReport } from '@pricesync/types';
import { formatPriceTarget } from '@pricesync/types';

const LABEL_WIDTH = 25;

function row(label: string, value: number): string {
  return `  ${`${label}:`.padEnd(LABEL_WIDTH)}${value}`;
}

/**
 * Plain-text run summary for stdout; the structured report goes to the log.
 */
export function formatRunSummary(report: RunReport): string {
  const lines = [
    report.dryRun ? 'Price sync summary (dry run)' : 'Price sync summary',
    row('matched', report.matched),
    row(report.dryRun ? 'would update' : 'updated', report.updated),
    row('skipped below threshold', report.skippedBelowThreshold),
    row('unmatched in source', report.unmatchedSource),
    row('unmatched in target', report.unmatchedTarget),
    row('failed', report.failed),
  ];
  if (report.cancelled > 0) {
    lines.push(row('cancelled', report.cancelled));
  }

  if (report.failures.length > 0) {
    lines.push('Failures:');
    for (const failure of report.failures) {
      lines.push(
        `  - ${failure.sku} (${formatPriceTarget(failure.target)}) -> ${failure.attemptedPrice}: ${failure.error}`
      );
    }
  }
  return lines.join('\n');
}
