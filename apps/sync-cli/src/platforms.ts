import { ConfigInvalidError, type SyncEnv } from '@pricesync/config';
import {
  MercadoLibrePlatform,
  StaticTokenAuthProvider,
  TiendaNubePlatform,
  createHttpClient,
  mercadoLibreAuthHeaders,
  tiendaNubeAuthHeaders,
  type CatalogPlatform,
  type FetchLike,
} from '@pricesync/platform-client';
import type { PlatformName } from '@pricesync/types';

export type PlatformPair = Readonly<{
  source: CatalogPlatform;
  target: CatalogPlatform;
}>;

export type PlatformFactoryOptions = Readonly<{
  fetchImpl?: FetchLike;
}>;

function createPlatform(
  name: PlatformName,
  env: SyncEnv,
  options: PlatformFactoryOptions
): CatalogPlatform {
  const transport = {
    requestIntervalMs: env.requestIntervalMs,
    ...(options.fetchImpl ? { fetchImpl: options.fetchImpl } : {}),
  };

  switch (name) {
    case 'mercadolibre': {
      const credentials = env.credentials.mercadolibre;
      if (!credentials) {
        throw new ConfigInvalidError('MERCADOLIBRE_ACCESS_TOKEN', 'Mercado Libre is not configured');
      }
      const http = createHttpClient({
        platform: name,
        auth: new StaticTokenAuthProvider(name, credentials.accessToken),
        authHeaders: mercadoLibreAuthHeaders,
        ...transport,
      });
      return new MercadoLibrePlatform({
        http,
        apiUrl: credentials.apiUrl,
        userId: credentials.userId,
        locale: credentials.locale,
      });
    }
    case 'tiendanube': {
      const credentials = env.credentials.tiendanube;
      if (!credentials) {
        throw new ConfigInvalidError('TIENDANUBE_ACCESS_TOKEN', 'Tienda Nube is not configured');
      }
      const http = createHttpClient({
        platform: name,
        auth: new StaticTokenAuthProvider(name, credentials.accessToken),
        authHeaders: (token) => tiendaNubeAuthHeaders(token, credentials.userAgent),
        ...transport,
      });
      return new TiendaNubePlatform({
        http,
        apiUrl: credentials.apiUrl,
        storeId: credentials.storeId,
      });
    }
  }
}

/** Wires each configured platform to its own paced HTTP client and static token. */
export function createPlatforms(env: SyncEnv, options: PlatformFactoryOptions = {}): PlatformPair {
  return {
    source: createPlatform(env.sourcePlatform, env, options),
    target: createPlatform(env.targetPlatform, env, options),
  };
}
