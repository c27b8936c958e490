/**
 * Logging module barrel export
 */

export * from './buffer.js';
export * from './log-buffer.js';
export * from './logger.js';
export * from './sinks.js';
