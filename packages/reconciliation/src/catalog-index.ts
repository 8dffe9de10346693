import type {
  CatalogEntry,
  IndexDiagnostic,
  LocalizedName,
  PriceTarget,
  ProductRecord,
} from '@pricesync/types';
import { primaryName } from '@pricesync/types';

export function normalizeSku(sku: string): string {
  return sku.trim().toLowerCase();
}

/**
 * Normalized SKU -> entry lookup for one catalog. Immutable once built.
 */
export class CatalogIndex {
  private readonly entries: ReadonlyMap<string, CatalogEntry>;
  public readonly diagnostics: readonly IndexDiagnostic[];

  constructor(entries: ReadonlyMap<string, CatalogEntry>, diagnostics: readonly IndexDiagnostic[]) {
    this.entries = entries;
    this.diagnostics = Object.freeze([...diagnostics]);
  }

  get size(): number {
    return this.entries.size;
  }

  /** Looks the SKU up after normalization. */
  get(sku: string): CatalogEntry | undefined {
    return this.entries.get(normalizeSku(sku));
  }

  skus(): string[] {
    return [...this.entries.keys()];
  }
}

export type BuildIndexOptions = Readonly<{
  /** Index listings their platform reports as inactive. */
  includeInactive?: boolean;
}>;

type Candidate = Readonly<{
  rawSku: string;
  price: number | null;
  target: PriceTarget;
}>;

function candidatesOf(record: ProductRecord): Candidate[] {
  if (record.variants && record.variants.length > 0) {
    return record.variants.map((variant) => ({
      rawSku: variant.sku,
      price: variant.price,
      target: { productId: record.nativeId, variantId: variant.nativeId },
    }));
  }
  return [
    {
      rawSku: record.sku,
      price: record.price,
      target: { productId: record.nativeId, variantId: null },
    },
  ];
}

function freezeEntry(
  sku: string,
  displayName: LocalizedName,
  price: number,
  target: PriceTarget
): CatalogEntry {
  return Object.freeze({
    sku,
    displayName: Object.freeze({ ...displayName }),
    price,
    target,
  });
}

/**
 * Consumes a fetched catalog exactly once. A rejected sequence rejects the whole build.
 */
export async function buildIndex(
  records: AsyncIterable<ProductRecord> | Iterable<ProductRecord>,
  options: BuildIndexOptions = {}
): Promise<CatalogIndex> {
  const entries = new Map<string, CatalogEntry>();
  const diagnostics: IndexDiagnostic[] = [];

  for await (const record of records) {
    for (const candidate of candidatesOf(record)) {
      const sku = normalizeSku(candidate.rawSku);
      const target = Object.freeze({ ...candidate.target });

      if (!sku) {
        diagnostics.push({
          kind: 'MISSING_SKU',
          target,
          displayName: primaryName(record.displayName),
        });
        continue;
      }
      if (!record.active && !options.includeInactive) {
        diagnostics.push({ kind: 'INACTIVE_SKIPPED', sku, target });
        continue;
      }

      // No price set is unknown, not zero.
      if (candidate.price === null) {
        diagnostics.push({ kind: 'MISSING_PRICE', sku, target });
        continue;
      }

      const kept = entries.get(sku);
      if (kept) {
        diagnostics.push({
          kind: 'DUPLICATE_SKU',
          sku,
          keptTarget: kept.target,
          discardedTarget: target,
        });
        continue;
      }
      entries.set(sku, freezeEntry(sku, record.displayName, candidate.price, target));
    }
  }

  return new CatalogIndex(entries, diagnostics);
}
