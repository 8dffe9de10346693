export * from './mercadolibre.js';
export * from './price.js';
export * from './tiendanube.js';
