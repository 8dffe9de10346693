import type { PlatformName, PriceTarget, ProductRecord } from '@pricesync/types';

/**
 * One e-commerce platform as seen by the reconciliation engine.
 *
 * Adapters map the platform's JSON into ProductRecord here, so everything downstream stays
 * platform-agnostic.
 */
export interface CatalogPlatform {
  readonly name: PlatformName;

  /** 1-based page; an empty array means the listing is exhausted. */
  fetchPage(page: number, perPage: number): Promise<readonly ProductRecord[]>;

  updatePrice(target: PriceTarget, price: number): Promise<void>;
}
