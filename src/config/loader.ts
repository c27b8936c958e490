/**
 * Config loading
 *
 * Priority: environment variables > config file > defaults.
 */

import * as path from 'path';
import { promises as fs } from 'fs';
import { ConfigError, describeError } from '../errors.js';
import { isLogLevel } from '../logging/logger.js';
import {
  ConfigFile,
  DEFAULT_SERVER_CONFIG,
  FailureInjectionFile,
  ServerConfig,
  SIMULATED_FAILURE_STATUSES,
  SimulatedFailureStatus,
} from './types.js';

const MAX_PORT = 65535;
const MAX_WORKERS_LIMIT = 1024;
const MAX_CHUNK_SIZE = 1024 * 1024;

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSimulatedFailureStatus(value: unknown): value is SimulatedFailureStatus {
  return SIMULATED_FAILURE_STATUSES.some((status) => status === value);
}

// Helper to validate a numeric env var as an integer within bounds
function parseEnvVarAsInt(
  value: string,
  envVarName: string,
  minValue: number,
  maxValue: number
): number | null {
  const parsed = Number(value);

  if (value.trim() === '' || isNaN(parsed)) {
    console.warn(`[config] Warning: ${envVarName}="${value}" is not a valid number, ignoring`);
    return null;
  }

  if (!Number.isInteger(parsed)) {
    console.warn(`[config] Warning: ${envVarName}=${parsed} must be an integer, ignoring`);
    return null;
  }

  if (parsed < minValue || parsed > maxValue) {
    console.warn(`[config] Warning: ${envVarName}=${parsed} must be between ${minValue} and ${maxValue}, ignoring`);
    return null;
  }

  return parsed;
}

function parseEnvVarAsRate(value: string, envVarName: string): number | null {
  const parsed = Number(value);
  if (value.trim() === '' || isNaN(parsed) || parsed < 0 || parsed > 1) {
    console.warn(`[config] Warning: ${envVarName}="${value}" must be a number between 0 and 1, ignoring`);
    return null;
  }
  return parsed;
}

// ============================================================================
// File -> ServerConfig
// ============================================================================

function takeString(value: unknown, key: string, problems: string[]): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || value.length === 0) {
    problems.push(`${key} must be a non-empty string`);
    return undefined;
  }
  return value;
}

function takeNumber(value: unknown, key: string, problems: string[]): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    problems.push(`${key} must be a number`);
    return undefined;
  }
  return value;
}

function applyFailureInjection(
  base: ServerConfig['failureInjection'],
  raw: unknown,
  problems: string[]
): ServerConfig['failureInjection'] {
  if (raw === undefined) return { ...base, statusCodes: [...base.statusCodes] };
  if (!isRecord(raw)) {
    problems.push('failure_injection must be an object');
    return { ...base };
  }

  const file: FailureInjectionFile = raw;
  const result = { ...base, statusCodes: [...base.statusCodes] };

  if (file.enabled !== undefined) {
    if (typeof file.enabled === 'boolean') {
      result.enabled = file.enabled;
    } else {
      problems.push('failure_injection.enabled must be a boolean');
    }
  }

  const rate = takeNumber(file.rate, 'failure_injection.rate', problems);
  if (rate !== undefined) result.rate = rate;

  if (file.status_codes !== undefined) {
    if (Array.isArray(file.status_codes) && file.status_codes.every(isSimulatedFailureStatus)) {
      result.statusCodes = [...file.status_codes];
    } else {
      problems.push(`failure_injection.status_codes must only contain ${SIMULATED_FAILURE_STATUSES.join(', ')}`);
    }
  }

  return result;
}

/**
 * Overlay a parsed config file on the defaults. Type mismatches are collected
 * in `problems` and the default is kept for that field.
 */
export function configFromFile(file: ConfigFile, problems: string[] = []): ServerConfig {
  const config: ServerConfig = {
    ...DEFAULT_SERVER_CONFIG,
    failureInjection: applyFailureInjection(
      DEFAULT_SERVER_CONFIG.failureInjection,
      file.failure_injection,
      problems
    ),
  };

  config.host = takeString(file.host, 'host', problems) ?? config.host;
  config.port = takeNumber(file.port, 'port', problems) ?? config.port;
  config.maxWorkers = takeNumber(file.max_threads, 'max_threads', problems) ?? config.maxWorkers;
  config.publicDir = takeString(file.public_dir, 'public_dir', problems) ?? config.publicDir;
  config.logFile = takeString(file.log_file, 'log_file', problems) ?? config.logFile;
  config.chunkSize = takeNumber(file.chunk_size, 'chunk_size', problems) ?? config.chunkSize;
  config.maxHeaderBytes = takeNumber(file.max_header_bytes, 'max_header_bytes', problems) ?? config.maxHeaderBytes;
  config.logBufferSize = takeNumber(file.log_buffer_size, 'log_buffer_size', problems) ?? config.logBufferSize;
  config.indexFile = takeString(file.index_file, 'index_file', problems) ?? config.indexFile;
  config.notFoundPage = takeString(file.not_found_page, 'not_found_page', problems) ?? config.notFoundPage;

  const timeoutSeconds = takeNumber(file.timeout, 'timeout', problems);
  if (timeoutSeconds !== undefined) {
    config.readTimeoutMs = Math.round(timeoutSeconds * 1000);
  }

  if (file.log_level !== undefined) {
    if (isLogLevel(file.log_level)) {
      config.logLevel = file.log_level;
    } else {
      problems.push('log_level must be one of debug, info, warning, error');
    }
  }

  return config;
}

/**
 * Apply SERVER_* environment overrides.
 */
export function applyEnvOverrides(base: ServerConfig, env: Env = process.env): ServerConfig {
  const config: ServerConfig = {
    ...base,
    failureInjection: { ...base.failureInjection, statusCodes: [...base.failureInjection.statusCodes] },
  };

  if (env.SERVER_HOST) {
    config.host = env.SERVER_HOST;
  }

  if (env.SERVER_PORT !== undefined) {
    const parsed = parseEnvVarAsInt(env.SERVER_PORT, 'SERVER_PORT', 0, MAX_PORT);
    if (parsed !== null) config.port = parsed;
  }

  if (env.SERVER_MAX_WORKERS !== undefined) {
    const parsed = parseEnvVarAsInt(env.SERVER_MAX_WORKERS, 'SERVER_MAX_WORKERS', 1, MAX_WORKERS_LIMIT);
    if (parsed !== null) config.maxWorkers = parsed;
  }

  if (env.SERVER_PUBLIC_DIR) {
    config.publicDir = env.SERVER_PUBLIC_DIR;
  }

  if (env.SERVER_LOG_FILE) {
    config.logFile = env.SERVER_LOG_FILE;
  }

  if (env.SERVER_FAILURE_RATE !== undefined) {
    const parsed = parseEnvVarAsRate(env.SERVER_FAILURE_RATE, 'SERVER_FAILURE_RATE');
    if (parsed !== null) config.failureInjection.rate = parsed;
  }

  if (env.SERVER_FAILURE_INJECTION !== undefined) {
    // Accept 'true', '1', 'yes' as true, anything else as false
    config.failureInjection.enabled = ['true', '1', 'yes'].includes(
      env.SERVER_FAILURE_INJECTION.toLowerCase()
    );
  }

  return config;
}

export function validateServerConfig(config: ServerConfig): string[] {
  const errors: string[] = [];

  if (!Number.isInteger(config.port) || config.port < 0 || config.port > MAX_PORT) {
    errors.push(`port must be an integer between 0 and ${MAX_PORT}`);
  }
  if (!Number.isInteger(config.maxWorkers) || config.maxWorkers < 1 || config.maxWorkers > MAX_WORKERS_LIMIT) {
    errors.push(`max_threads must be an integer between 1 and ${MAX_WORKERS_LIMIT}`);
  }
  if (!(config.readTimeoutMs > 0)) {
    errors.push('timeout must be greater than 0');
  }
  if (!Number.isInteger(config.chunkSize) || config.chunkSize < 1 || config.chunkSize > MAX_CHUNK_SIZE) {
    errors.push(`chunk_size must be an integer between 1 and ${MAX_CHUNK_SIZE}`);
  }
  if (!Number.isInteger(config.maxHeaderBytes) || config.maxHeaderBytes < 64) {
    errors.push('max_header_bytes must be an integer of at least 64');
  }
  if (!Number.isInteger(config.logBufferSize) || config.logBufferSize < 1) {
    errors.push('log_buffer_size must be a positive integer');
  }
  if (config.failureInjection.rate < 0 || config.failureInjection.rate > 1) {
    errors.push('failure_injection.rate must be between 0 and 1');
  }
  if (config.failureInjection.statusCodes.length === 0) {
    errors.push('failure_injection.status_codes must not be empty');
  }
  for (const [key, value] of [['index_file', config.indexFile], ['not_found_page', config.notFoundPage]]) {
    if (value.includes('/') || value.includes('\\') || value === '..' || value === '.') {
      errors.push(`${key} must be a plain file name`);
    }
  }

  return errors;
}

/**
 * Read, merge and validate the config file. Relative paths are resolved
 * against the working directory.
 */
export async function loadConfig(filePath: string, env: Env = process.env): Promise<ServerConfig> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${filePath}: ${describeError(error)}`, [], { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Config file ${filePath} is not valid JSON: ${describeError(error)}`, [], { cause: error });
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file ${filePath} must contain a JSON object`);
  }

  const problems: string[] = [];
  const fromFile = configFromFile(parsed, problems);
  const config = applyEnvOverrides(fromFile, env);
  problems.push(...validateServerConfig(config));

  if (problems.length > 0) {
    throw new ConfigError(`Invalid config in ${filePath}: ${problems.join('; ')}`, problems);
  }

  return {
    ...config,
    publicDir: path.resolve(config.publicDir),
    logFile: config.logFile !== undefined ? path.resolve(config.logFile) : undefined,
  };
}
