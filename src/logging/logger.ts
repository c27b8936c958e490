/**
 * Logger shared by the accept loop and every worker.
 *
 * Lines look like `2024-05-01 12:00:00 - [HTTPWorker_3] - INFO - message` and
 * are written to each sink and to the LogBuffer exposed over /api/logs.
 */

import { LogBuffer } from './log-buffer.js';
import type { LogSink } from './sinks.js';

export type LogLevel = 'debug' | 'info' | 'warning' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warning', 'error'];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warning: 30,
  error: 40,
};

export const MAIN_THREAD_NAME = 'MainThread';

export interface LoggerOptions {
  buffer: LogBuffer;
  sinks?: LogSink[];
  level?: LogLevel;
  name?: string;
  now?: () => Date;
}

interface LoggerCore {
  buffer: LogBuffer;
  sinks: LogSink[];
  level: LogLevel;
  now: () => Date;
}

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export class Logger {
  private constructor(
    private readonly core: LoggerCore,
    readonly name: string
  ) {}

  static create(options: LoggerOptions): Logger {
    const logger = new Logger(
      {
        buffer: options.buffer,
        sinks: options.sinks ?? [],
        level: options.level ?? 'debug',
        now: options.now ?? (() => new Date()),
      },
      options.name ?? MAIN_THREAD_NAME
    );
    logger.info('Logger initialized');
    return logger;
  }

  /**
   * Logger that tags its lines with another worker name but shares sinks,
   * level and buffer with this one.
   */
  child(name: string): Logger {
    return new Logger(this.core, name);
  }

  get buffer(): LogBuffer {
    return this.core.buffer;
  }

  debug(message: string): void {
    this.log('debug', message);
  }

  info(message: string): void {
    this.log('info', message);
  }

  warning(message: string): void {
    this.log('warning', message);
  }

  error(message: string): void {
    this.log('error', message);
  }

  async flush(): Promise<void> {
    await Promise.all(this.core.sinks.map((sink) => sink.flush?.()));
  }

  private log(level: LogLevel, message: string): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.core.level]) {
      return;
    }
    const line = `${formatTimestamp(this.core.now())} - [${this.name}] - ${level.toUpperCase()} - ${message}`;
    this.core.buffer.append(line);
    for (const sink of this.core.sinks) {
      sink.write(level, line);
    }
  }
}
