/**
 * HTTP module barrel export
 */

export * from './types.js';
export * from './parser.js';
export * from './path-guard.js';
export * from './mime.js';
export * from './response.js';
export * from './router.js';
export * from './socket-connection.js';
export * from './handler.js';
