import type { PriceTarget, ProductRecord } from '@pricesync/types';
import {
  TiendaNubeErrorSchema,
  TiendaNubeProductPageSchema,
  type TiendaNubeProduct,
} from '@pricesync/validation';

import { HttpError, ProtocolError } from './errors.js';
import type { HttpClient } from './http-client.js';
import { parsePayload } from './payload.js';
import type { CatalogPlatform } from './platform.js';

const PLATFORM = 'tiendanube';

export type TiendaNubePlatformOptions = Readonly<{
  http: HttpClient;
  apiUrl: string;
  storeId: string;
}>;

/**
 * Paging past the end answers 404 with `{"description": "Last page is N"}` instead of `[]`.
 */
export function isLastPageError(error: unknown): boolean {
  if (!(error instanceof HttpError) || error.status !== 404) return false;
  const body = TiendaNubeErrorSchema.safeParse(error.body);
  return body.success && (body.data.description ?? '').startsWith('Last page is');
}

export function tiendaNubeAuthHeaders(
  accessToken: string,
  userAgent: string
): Record<string, string> {
  return {
    Authentication: `bearer ${accessToken}`,
    'User-Agent': userAgent,
  };
}

function toProductRecord(product: TiendaNubeProduct): ProductRecord {
  const variants = product.variants.map((variant) => ({
    nativeId: variant.id,
    sku: variant.sku ?? '',
    price: variant.price,
  }));
  const first = variants[0];

  return {
    nativeId: product.id,
    sku: first?.sku ?? '',
    displayName: product.name,
    price: first?.price ?? null,
    active: true,
    variants,
  };
}

export class TiendaNubePlatform implements CatalogPlatform {
  public readonly name = PLATFORM;
  private readonly options: TiendaNubePlatformOptions;

  constructor(options: TiendaNubePlatformOptions) {
    this.options = options;
  }

  private get storeUrl(): string {
    return `${this.options.apiUrl}/${encodeURIComponent(this.options.storeId)}`;
  }

  async fetchPage(page: number, perPage: number): Promise<readonly ProductRecord[]> {
    let payload: unknown;
    try {
      payload = await this.options.http.get(`${this.storeUrl}/products`, {
        page,
        per_page: perPage,
      });
    } catch (error) {
      if (isLastPageError(error)) return [];
      throw error;
    }

    const products = parsePayload(TiendaNubeProductPageSchema, payload, {
      platform: PLATFORM,
      what: 'products page',
    });
    return products.map(toProductRecord);
  }

  /** Prices live on variants; every indexed Tienda Nube entry targets one. */
  async updatePrice(target: PriceTarget, price: number): Promise<void> {
    if (target.variantId == null) {
      throw new ProtocolError({
        platform: PLATFORM,
        message: `Product ${target.productId} has no variant to carry the price`,
      });
    }
    const url = `${this.storeUrl}/products/${encodeURIComponent(target.productId)}/variants/${encodeURIComponent(target.variantId)}`;
    await this.options.http.put(url, { price });
  }
}
