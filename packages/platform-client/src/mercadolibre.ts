import type { PriceTarget, ProductRecord } from '@pricesync/types';
import {
  MercadoLibreItemSchema,
  MercadoLibreMultigetResponseSchema,
  MercadoLibreSearchResponseSchema,
  type MercadoLibreItem,
} from '@pricesync/validation';

import { ProtocolError } from './errors.js';
import type { HttpClient } from './http-client.js';
import { parsePayload } from './payload.js';
import type { CatalogPlatform } from './platform.js';

const PLATFORM = 'mercadolibre';
const SELLER_SKU_ATTRIBUTE = 'SELLER_SKU';

/** Upper bound of ids per `/items?ids=` multiget request. */
export const MERCADOLIBRE_MULTIGET_MAX = 20;

export type MercadoLibrePlatformOptions = Readonly<{
  http: HttpClient;
  apiUrl: string;
  userId: string;
  locale: string;
}>;

export function mercadoLibreAuthHeaders(accessToken: string): Record<string, string> {
  return { Authorization: `Bearer ${accessToken}` };
}

export function extractSellerSku(item: MercadoLibreItem): string {
  const attribute = item.attributes?.find((attr) => attr.id === SELLER_SKU_ATTRIBUTE);
  const fromAttribute = attribute?.value_name?.trim();
  if (fromAttribute) return fromAttribute;
  return item.seller_custom_field?.trim() ?? '';
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}

/**
 * Seller listings: `items/search` pages ids by offset/limit, details come from multiget.
 * Listings are variant-less here; every listing is matched on its own seller SKU.
 */
export class MercadoLibrePlatform implements CatalogPlatform {
  public readonly name = PLATFORM;
  private readonly options: MercadoLibrePlatformOptions;

  constructor(options: MercadoLibrePlatformOptions) {
    this.options = options;
  }

  async fetchPage(page: number, perPage: number): Promise<readonly ProductRecord[]> {
    const { http, apiUrl, userId } = this.options;
    const search = parsePayload(
      MercadoLibreSearchResponseSchema,
      await http.get(`${apiUrl}/users/${encodeURIComponent(userId)}/items/search`, {
        offset: (page - 1) * perPage,
        limit: perPage,
      }),
      { platform: PLATFORM, what: 'items search' }
    );

    const records: ProductRecord[] = [];
    for (const ids of chunk(search.results, MERCADOLIBRE_MULTIGET_MAX)) {
      const entries = parsePayload(
        MercadoLibreMultigetResponseSchema,
        await http.get(`${apiUrl}/items`, { ids: ids.join(',') }),
        { platform: PLATFORM, what: 'items multiget' }
      );
      if (entries.length !== ids.length) {
        throw new ProtocolError({
          platform: PLATFORM,
          message: `Multiget returned ${entries.length} entries for ${ids.length} ids`,
        });
      }

      entries.forEach((entry, i) => {
        if (entry.code !== 200) {
          throw new ProtocolError({
            platform: PLATFORM,
            message: `Item ${ids[i] ?? '?'} details returned status ${entry.code}`,
          });
        }
        const item = parsePayload(MercadoLibreItemSchema, entry.body, {
          platform: PLATFORM,
          what: 'item',
        });
        records.push(this.toProductRecord(item));
      });
    }
    return records;
  }

  async updatePrice(target: PriceTarget, price: number): Promise<void> {
    const { http, apiUrl } = this.options;
    await http.put(`${apiUrl}/items/${encodeURIComponent(target.productId)}`, { price });
  }

  private toProductRecord(item: MercadoLibreItem): ProductRecord {
    return {
      nativeId: item.id,
      sku: extractSellerSku(item),
      displayName: { [this.options.locale]: item.title },
      price: item.price,
      active: item.status === undefined || item.status === 'active',
    };
  }
}
