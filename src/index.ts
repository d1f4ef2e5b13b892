/**
 * docschema
 *
 * Contract-bearing documentation for code elements: a schema, a parser, a
 * validator that checks documentation against what the code does, and a
 * synthesizer that regenerates it.
 *
 * @packageDocumentation
 */

/**
 * Library version string.
 */
export const VERSION = '0.1.0';

export * from './element/index.js';
export * from './schema/index.js';
export * from './diagnostics/index.js';
export * from './docs/index.js';
export * from './facts/index.js';
export * from './contracts/index.js';
export * from './validator/index.js';
export * from './synthesizer/index.js';
export * from './report/index.js';
export * from './engine/index.js';
export * from './frontend/index.js';
export * from './config/index.js';
export { Logger, type LogEntry, type LogLevel, type LoggerOptions } from './utils/logger.js';
