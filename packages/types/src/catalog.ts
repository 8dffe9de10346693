export const PLATFORM_NAMES = ['mercadolibre', 'tiendanube'] as const;

export type PlatformName = (typeof PLATFORM_NAMES)[number];

export function isPlatformName(value: string): value is PlatformName {
  return (PLATFORM_NAMES as readonly string[]).includes(value);
}

/** Locale tag -> name, e.g. `{ es: 'Remera', pt: 'Camiseta' }`. */
export type LocalizedName = Readonly<Record<string, string>>;

export interface VariantRecord {
  nativeId: string;
  sku: string;
  /** null when the platform has no price set. */
  price: number | null;
}

/**
 * Platform-agnostic view of one catalog item, produced at the platform adapter boundary.
 * When `variants` is non-empty, reconciliation runs per variant and the parent's own
 * `sku`/`price` are ignored.
 */
export interface ProductRecord {
  nativeId: string;
  sku: string;
  displayName: LocalizedName;
  /** null when the platform has no price set; such records are never indexed. */
  price: number | null;
  active: boolean;
  variants?: readonly VariantRecord[];
}

/** Where a price update is sent back to. `variantId` is null for variant-less products. */
export type PriceTarget = Readonly<{
  productId: string;
  variantId: string | null;
}>;

export type CatalogEntry = Readonly<{
  sku: string;
  displayName: LocalizedName;
  price: number;
  target: PriceTarget;
}>;

export function formatPriceTarget(target: PriceTarget): string {
  return target.variantId == null
    ? target.productId
    : `${target.productId}/${target.variantId}`;
}

/**
 * Picks the name for the preferred locale, falling back to the first non-empty one.
 */
export function primaryName(name: LocalizedName, preferredLocale = 'es'): string {
  const preferred = name[preferredLocale];
  if (preferred?.trim()) return preferred;
  for (const value of Object.values(name)) {
    if (value.trim()) return value;
  }
  return '';
}
