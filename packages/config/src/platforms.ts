export const MERCADOLIBRE_API_URL_DEFAULT = 'https://api.mercadolibre.com';
export const MERCADOLIBRE_LOCALE_DEFAULT = 'es';

export const TIENDANUBE_API_URL_DEFAULT = 'https://api.tiendanube.com/v1';
export const TIENDANUBE_USER_AGENT_DEFAULT = 'catalog-price-sync (ops@example.com)';

export type MercadoLibreCredentials = Readonly<{
  apiUrl: string;
  accessToken: string;
  userId: string;
  locale: string;
}>;

export type TiendaNubeCredentials = Readonly<{
  apiUrl: string;
  accessToken: string;
  storeId: string;
  userAgent: string;
}>;

export type PlatformCredentials = Readonly<{
  mercadolibre: MercadoLibreCredentials | null;
  tiendanube: TiendaNubeCredentials | null;
}>;
