/**
 * Config module barrel export
 */

export * from './types.js';
export * from './loader.js';
