/**
 * Server configuration types
 */

import type { LogLevel } from '../logging/logger.js';

// ============================================================================
// Configuration
// ============================================================================

export type SimulatedFailureStatus = 500 | 503 | 504;

export interface FailureInjectionConfig {
  enabled: boolean;
  rate: number; // 0-1, probability per request
  statusCodes: SimulatedFailureStatus[];
}

/**
 * Immutable for the lifetime of the process once loaded.
 */
export interface ServerConfig {
  host: string;
  port: number;
  maxWorkers: number;
  publicDir: string;
  readTimeoutMs: number;
  chunkSize: number;
  maxHeaderBytes: number;
  logFile?: string;
  logLevel: LogLevel;
  logBufferSize: number;
  indexFile: string;
  notFoundPage: string;
  failureInjection: FailureInjectionConfig;
}

export const SIMULATED_FAILURE_STATUSES: readonly SimulatedFailureStatus[] = [500, 503, 504];

export const DEFAULT_SERVER_CONFIG: ServerConfig = {
  host: '127.0.0.1',
  port: 8000,
  maxWorkers: 10,
  publicDir: 'public',
  readTimeoutMs: 30000,
  chunkSize: 8192,
  maxHeaderBytes: 8 * 1024,
  logLevel: 'debug',
  logBufferSize: 500,
  indexFile: 'index.html',
  notFoundPage: '404.html',
  failureInjection: {
    enabled: false,
    rate: 0.1,
    statusCodes: [500, 503, 504],
  },
};

/**
 * On-disk config file shape (snake_case keys, timeout in seconds).
 */
export interface ConfigFile {
  [key: string]: unknown;
  host?: unknown;
  port?: unknown;
  max_threads?: unknown;
  public_dir?: unknown;
  log_file?: unknown;
  log_level?: unknown;
  log_buffer_size?: unknown;
  chunk_size?: unknown;
  timeout?: unknown;
  max_header_bytes?: unknown;
  index_file?: unknown;
  not_found_page?: unknown;
  failure_injection?: unknown;
}

export interface FailureInjectionFile {
  [key: string]: unknown;
  enabled?: unknown;
  rate?: unknown;
  status_codes?: unknown;
}
