/**
 * API module barrel export
 */

export * from './types.js';
export * from './results-store.js';
export * from './dispatch.js';
