export * from './auth.js';
export * from './errors.js';
export * from './http-client.js';
export * from './mercadolibre.js';
export * from './payload.js';
export * from './platform.js';
export * from './rate-limiting.js';
export * from './tiendanube.js';
