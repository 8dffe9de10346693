import { describe, it, mock } from 'node:test';
import assert from 'node:assert/strict';

import { StaticTokenAuthProvider } from '../auth.js';
import { AuthFailedError, HttpError, RateLimitedError, describeError } from '../errors.js';
import { buildUrl, createHttpClient, type FetchLike } from '../http-client.js';

function jsonResponse(status: number, body: unknown, headers: Record<string, string> = {}) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

function createClient(fetchImpl: FetchLike, token = 'test-token') {
  return createHttpClient({
    platform: 'tiendanube',
    auth: new StaticTokenAuthProvider('tiendanube', token),
    authHeaders: (accessToken) => ({ Authentication: `bearer ${accessToken}` }),
    headers: { 'User-Agent': 'price-sync-tests' },
    fetchImpl,
  });
}

void describe('buildUrl', () => {
  void it('appends encoded query params', () => {
    assert.equal(
      buildUrl('https://api.example.test/items', { ids: 'A,B', limit: 20 }),
      'https://api.example.test/items?ids=A%2CB&limit=20'
    );
    assert.equal(buildUrl('https://api.example.test/x?a=1', { b: 2 }), 'https://api.example.test/x?a=1&b=2');
    assert.equal(buildUrl('https://api.example.test/x'), 'https://api.example.test/x');
  });
});

void describe('createHttpClient', () => {
  void it('sends auth headers and returns parsed JSON', async () => {
    const fetchImpl = mock.fn<FetchLike>(() => Promise.resolve(jsonResponse(200, [{ id: 1 }])));
    const client = createClient(fetchImpl);

    const body = await client.get('https://api.example.test/products', { page: 2, per_page: 50 });

    assert.deepEqual(body, [{ id: 1 }]);
    assert.equal(fetchImpl.mock.callCount(), 1);
    const [url, init] = fetchImpl.mock.calls[0]?.arguments ?? [];
    assert.equal(url, 'https://api.example.test/products?page=2&per_page=50');
    assert.equal(init?.method, 'GET');
    assert.deepEqual(init?.headers, {
      Accept: 'application/json',
      'User-Agent': 'price-sync-tests',
      Authentication: 'bearer test-token',
    });
  });

  void it('serializes PUT bodies as JSON', async () => {
    const fetchImpl = mock.fn<FetchLike>(() => Promise.resolve(jsonResponse(200, { ok: true })));
    const client = createClient(fetchImpl);

    await client.put('https://api.example.test/products/1', { price: 10.5 });

    const init = fetchImpl.mock.calls[0]?.arguments[1];
    assert.equal(init?.method, 'PUT');
    assert.equal(init?.body, '{"price":10.5}');
  });

  void it('maps 401 to AuthFailedError', async () => {
    const client = createClient(() => Promise.resolve(jsonResponse(401, { message: 'nope' })));
    await assert.rejects(client.get('https://api.example.test/products'), AuthFailedError);
  });

  void it('maps 429 to RateLimitedError using Retry-After', async () => {
    const client = createClient(() =>
      Promise.resolve(jsonResponse(429, {}, { 'Retry-After': '2' }))
    );
    await assert.rejects(client.get('https://api.example.test/products'), (error: unknown) => {
      assert.ok(error instanceof RateLimitedError);
      assert.equal(error.delayMs, 2000);
      assert.equal(
        describeError(error),
        'tiendanube rate limited GET https://api.example.test/products; retry after 2000 ms'
      );
      return true;
    });
  });

  void it('rejects other non-2xx responses with HttpError carrying the body', async () => {
    const client = createClient(() =>
      Promise.resolve(jsonResponse(500, { message: 'boom' }))
    );
    await assert.rejects(client.put('https://api.example.test/products/1', {}), (error: unknown) => {
      assert.ok(error instanceof HttpError);
      assert.equal(error.status, 500);
      assert.deepEqual(error.body, { message: 'boom' });
      return true;
    });
  });

  void it('fails before any request when the token is blank', async () => {
    const fetchImpl = mock.fn<FetchLike>(() => Promise.resolve(jsonResponse(200, [])));
    const client = createClient(fetchImpl, '   ');
    await assert.rejects(client.get('https://api.example.test/products'), AuthFailedError);
    assert.equal(fetchImpl.mock.callCount(), 0);
  });
});
