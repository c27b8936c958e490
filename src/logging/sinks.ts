/**
 * Log sinks: where formatted lines go besides the in-memory LogBuffer.
 */

import * as path from 'path';
import { promises as fs } from 'fs';
import { describeError, isErrnoException } from '../errors.js';
import type { LogLevel } from './logger.js';

export interface LogSink {
  write(level: LogLevel, line: string): void;
  flush?(): Promise<void>;
}

// ============================================================================
// Console
// ============================================================================

export class ConsoleSink implements LogSink {
  write(_level: LogLevel, line: string): void {
    console.error(line);
  }
}

// ============================================================================
// Rotating file
// ============================================================================

export interface RotatingFileSinkOptions {
  maxBytes?: number;
  maxFiles?: number;
}

const DEFAULT_MAX_LOG_BYTES = 10 * 1024 * 1024; // 10MB
const DEFAULT_MAX_LOG_FILES = 5;

/**
 * Appends lines to a file, rotating it to `<file>.1 … <file>.N` once it grows
 * past maxBytes. Writes are chained so lines land in call order.
 */
export class RotatingFileSink implements LogSink {
  private chain: Promise<void> = Promise.resolve();
  private readonly maxBytes: number;
  private readonly maxFiles: number;
  private dirReady = false;

  constructor(
    private readonly filePath: string,
    options: RotatingFileSinkOptions = {}
  ) {
    this.maxBytes = options.maxBytes ?? DEFAULT_MAX_LOG_BYTES;
    this.maxFiles = options.maxFiles ?? DEFAULT_MAX_LOG_FILES;
  }

  write(_level: LogLevel, line: string): void {
    this.chain = this.chain.then(() => this.append(line));
  }

  /**
   * Resolves once every line written so far has reached the file.
   */
  flush(): Promise<void> {
    return this.chain;
  }

  private async append(line: string): Promise<void> {
    try {
      if (!this.dirReady) {
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        this.dirReady = true;
      }
      await this.rotateIfNeeded();
      await fs.appendFile(this.filePath, line + '\n', 'utf-8');
    } catch (error) {
      // Logging must never break request handling
      console.error(`[log-sink] Could not write ${this.filePath}: ${describeError(error)}`);
    }
  }

  private async rotateIfNeeded(): Promise<void> {
    let size: number;
    try {
      size = (await fs.stat(this.filePath)).size;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return;
      }
      throw error;
    }
    if (size < this.maxBytes) {
      return;
    }

    await fs.rm(`${this.filePath}.${this.maxFiles}`, { force: true });

    // .4 -> .5, .3 -> .4, ... .1 -> .2
    for (let i = this.maxFiles - 1; i >= 1; i--) {
      try {
        await fs.rename(`${this.filePath}.${i}`, `${this.filePath}.${i + 1}`);
      } catch (error) {
        if (!isErrnoException(error) || error.code !== 'ENOENT') {
          throw error;
        }
      }
    }

    await fs.rename(this.filePath, `${this.filePath}.1`);
  }
}
