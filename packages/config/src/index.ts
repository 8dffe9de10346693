export * from './env.js';
export * from './errors.js';
export * from './platforms.js';
