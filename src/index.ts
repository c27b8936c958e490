#!/usr/bin/env node

/**
 * Static file server with a test-telemetry JSON API.
 *
 * Usage: telemetry-static-server [config.json]
 *
 * The config path may also come from SERVER_CONFIG; it defaults to
 * ./config.json. See src/config/loader.ts for SERVER_* overrides.
 */

import { loadConfig } from './config/index.js';
import { describeError, FatalStartupError } from './errors.js';
import { ConsoleSink, LogBuffer, Logger, LogSink, RotatingFileSink } from './logging/index.js';
import { ServerEngine } from './server/index.js';

const CONFIG_FILE = process.argv[2] ?? process.env.SERVER_CONFIG ?? 'config.json';

let engine: ServerEngine | null = null;
let logger: Logger | null = null;
let shuttingDown = false;

async function gracefulShutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;

  logger?.info(`Received ${signal}, stopping server...`);
  try {
    await engine?.shutdown();
    await logger?.flush();
  } catch (error) {
    console.error(`[server] Error during shutdown: ${describeError(error)}`);
    process.exit(1);
  }
  process.exit(0);
}

process.on('SIGTERM', () => {
  void gracefulShutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void gracefulShutdown('SIGINT');
});

async function main(): Promise<void> {
  const config = await loadConfig(CONFIG_FILE);

  const sinks: LogSink[] = [new ConsoleSink()];
  if (config.logFile) {
    sinks.push(new RotatingFileSink(config.logFile));
  }
  logger = Logger.create({
    buffer: new LogBuffer(config.logBufferSize),
    sinks,
    level: config.logLevel,
  });

  if (config.failureInjection.enabled) {
    logger.warning(
      `Failure injection enabled: rate=${config.failureInjection.rate}, statuses=${config.failureInjection.statusCodes.join(',')}`
    );
  }

  engine = new ServerEngine(config, { logger });
  await engine.start();
  logger.info('Press Ctrl+C to stop the server');
}

main().catch((error: unknown) => {
  if (error instanceof FatalStartupError) {
    console.error(`[server] ${error.name}: ${error.message}`);
  } else {
    console.error('[server] Fatal error:', error);
  }
  process.exit(1);
});
