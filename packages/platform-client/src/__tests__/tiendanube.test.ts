import { describe, it, mock } from 'node:test';
import assert from 'node:assert/strict';

import { HttpError, ProtocolError } from '../errors.js';
import type { HttpClient, QueryParams } from '../http-client.js';
import { TiendaNubePlatform, isLastPageError, tiendaNubeAuthHeaders } from '../tiendanube.js';

const API_URL = 'https://api.tiendanube.test/v1';

function createHttp(getImpl: (url: string, params?: QueryParams) => Promise<unknown>) {
  const get = mock.fn(getImpl);
  const put = mock.fn((_url: string, _body: unknown): Promise<unknown> => Promise.resolve({}));
  const http: HttpClient = { get, put };
  return { http, get, put };
}

void describe('TiendaNubePlatform.fetchPage', () => {
  void it('maps products and variants into records', async () => {
    const { http, get } = createHttp(() =>
      Promise.resolve([
        {
          id: 10,
          name: { es: 'Remera', pt: 'Camiseta' },
          variants: [
            { id: 101, product_id: 10, sku: 'REM-S', price: '1499.90' },
            { id: 102, product_id: 10, sku: null, price: null },
          ],
        },
      ])
    );
    const platform = new TiendaNubePlatform({ http, apiUrl: API_URL, storeId: '555' });

    const records = await platform.fetchPage(2, 50);

    assert.equal(get.mock.callCount(), 1);
    assert.deepEqual(get.mock.calls[0]?.arguments, [
      `${API_URL}/555/products`,
      { page: 2, per_page: 50 },
    ]);
    assert.deepEqual(records, [
      {
        nativeId: '10',
        sku: 'REM-S',
        displayName: { es: 'Remera', pt: 'Camiseta' },
        price: 1499.9,
        active: true,
        variants: [
          { nativeId: '101', sku: 'REM-S', price: 1499.9 },
          { nativeId: '102', sku: '', price: null },
        ],
      },
    ]);
  });

  void it('keeps a missing variant price unknown instead of zero', async () => {
    const { http } = createHttp(() =>
      Promise.resolve([
        { id: 11, name: { es: 'Gorra' }, variants: [{ id: 111, sku: 'GOR-1', price: null }] },
      ])
    );
    const platform = new TiendaNubePlatform({ http, apiUrl: API_URL, storeId: '555' });

    const [record] = await platform.fetchPage(1, 50);

    assert.equal(record?.price, null);
    assert.deepEqual(record?.variants, [{ nativeId: '111', sku: 'GOR-1', price: null }]);
  });

  void it('treats the "Last page is" 404 as an empty page', async () => {
    const { http } = createHttp(() =>
      Promise.reject(
        new HttpError({
          status: 404,
          method: 'GET',
          url: `${API_URL}/555/products`,
          body: { code: 404, message: 'Not Found', description: 'Last page is 3' },
        })
      )
    );
    const platform = new TiendaNubePlatform({ http, apiUrl: API_URL, storeId: '555' });

    assert.deepEqual(await platform.fetchPage(4, 50), []);
  });

  void it('propagates other 404s', async () => {
    const notFound = new HttpError({
      status: 404,
      method: 'GET',
      url: `${API_URL}/555/products`,
      body: { code: 404, message: 'Not Found' },
    });
    const { http } = createHttp(() => Promise.reject(notFound));
    const platform = new TiendaNubePlatform({ http, apiUrl: API_URL, storeId: '555' });

    await assert.rejects(platform.fetchPage(1, 50), (error: unknown) => error === notFound);
  });

  void it('rejects malformed pages with ProtocolError', async () => {
    const { http } = createHttp(() => Promise.resolve({ products: [] }));
    const platform = new TiendaNubePlatform({ http, apiUrl: API_URL, storeId: '555' });

    await assert.rejects(platform.fetchPage(1, 50), ProtocolError);
  });
});

void describe('TiendaNubePlatform.updatePrice', () => {
  void it('writes the variant price when a variant is targeted', async () => {
    const { http, put } = createHttp(() => Promise.resolve([]));
    const platform = new TiendaNubePlatform({ http, apiUrl: API_URL, storeId: '555' });

    await platform.updatePrice({ productId: '10', variantId: '101' }, 1200);

    assert.deepEqual(put.mock.calls[0]?.arguments, [
      `${API_URL}/555/products/10/variants/101`,
      { price: 1200 },
    ]);
  });

  void it('refuses a product-level target without calling the API', async () => {
    const { http, put } = createHttp(() => Promise.resolve([]));
    const platform = new TiendaNubePlatform({ http, apiUrl: API_URL, storeId: '555' });

    await assert.rejects(
      platform.updatePrice({ productId: '10', variantId: null }, 99.5),
      ProtocolError
    );
    assert.equal(put.mock.callCount(), 0);
  });
});

void describe('tiendanube helpers', () => {
  void it('builds the Authentication header with a lowercase bearer', () => {
    assert.deepEqual(tiendaNubeAuthHeaders('test-token', 'price-sync (ops@example.test)'), {
      Authentication: 'bearer test-token',
      'User-Agent': 'price-sync (ops@example.test)',
    });
  });

  void it('only recognizes 404s with the last-page description', () => {
    const body = { description: 'Last page is 1' };
    assert.equal(isLastPageError(new HttpError({ status: 404, method: 'GET', url: 'u', body })), true);
    assert.equal(isLastPageError(new HttpError({ status: 500, method: 'GET', url: 'u', body })), false);
    assert.equal(isLastPageError(new Error('Last page is 1')), false);
  });
});
