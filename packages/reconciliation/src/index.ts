export * from './catalog-index.js';
export * from './errors.js';
export * from './executor.js';
export * from './fetcher.js';
export * from './orchestrator.js';
export * from './planner.js';
export * from './pricing.js';
export * from './summary.js';
