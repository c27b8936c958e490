/**
 * Server module barrel export
 */

export * from './pool.js';
export * from './engine.js';
