import type { CatalogPlatform } from '@pricesync/platform-client';
import { describeError } from '@pricesync/platform-client';
import type { ProductRecord } from '@pricesync/types';

import { FetchFailedError } from './errors.js';

export const DEFAULT_MAX_PAGES = 10_000;

export type FetchCatalogOptions = Readonly<{
  perPage: number;
  maxPages?: number;
}>;

/**
 * Full listing of one platform, page by page until the first empty page.
 *
 * Each iteration starts again at page 1, and the next page is requested only once the
 * consumer has taken every record of the current one.
 */
export function fetchCatalog(
  platform: CatalogPlatform,
  options: FetchCatalogOptions
): AsyncIterable<ProductRecord> {
  return {
    [Symbol.asyncIterator]: () => walkPages(platform, options),
  };
}

async function* walkPages(
  platform: CatalogPlatform,
  options: FetchCatalogOptions
): AsyncGenerator<ProductRecord, void, undefined> {
  const { perPage } = options;
  const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;

  if (!Number.isInteger(perPage) || perPage < 1) {
    throw new FetchFailedError({
      platform: platform.name,
      page: 1,
      message: `Page size must be a positive integer, got ${perPage}`,
    });
  }

  for (let page = 1; ; page += 1) {
    let records: readonly ProductRecord[];
    try {
      records = await platform.fetchPage(page, perPage);
    } catch (error) {
      throw new FetchFailedError({
        platform: platform.name,
        page,
        message: `Fetching page ${page} from ${platform.name} failed: ${describeError(error)}`,
        cause: error,
      });
    }

    if (records.length === 0) return;

    if (records.length > perPage) {
      throw new FetchFailedError({
        platform: platform.name,
        page,
        message: `Page ${page} from ${platform.name} returned ${records.length} records, more than the page size ${perPage}`,
      });
    }
    if (page > maxPages) {
      throw new FetchFailedError({
        platform: platform.name,
        page,
        message: `${platform.name} still returned records past the ${maxPages} page limit`,
      });
    }

    yield* records;
  }
}
