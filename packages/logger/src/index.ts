export * from './logger.js';
export * from './otel-attributes.js';
export * from './otel-correlation.js';
export type { RedactionMode } from './redaction.js';
