export * from './catalog.js';
export * from './reconciliation.js';
