/**
 * Unit tests for Logger and log sinks
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as path from 'path';
import { promises as fs } from 'fs';
import { LogBuffer } from '../../logging/log-buffer.js';
import { formatTimestamp, isLogLevel, Logger, LogLevel } from '../../logging/logger.js';
import { LogSink, RotatingFileSink } from '../../logging/sinks.js';
import { createSandbox, removeSandbox, TEST_NOW, TEST_TIMESTAMP } from '../helpers/test-utils.js';

class RecordingSink implements LogSink {
  readonly entries: Array<{ level: LogLevel; line: string }> = [];
  flushed = 0;

  write(level: LogLevel, line: string): void {
    this.entries.push({ level, line });
  }

  async flush(): Promise<void> {
    this.flushed++;
  }
}

// =============================================================================
// Logger
// =============================================================================

describe('Logger', () => {
  let buffer: LogBuffer;
  let sink: RecordingSink;

  beforeEach(() => {
    buffer = new LogBuffer(10);
    sink = new RecordingSink();
  });

  it('should format timestamps as local date and time', () => {
    expect(formatTimestamp(TEST_NOW)).toBe(TEST_TIMESTAMP);
    expect(formatTimestamp(new Date(2023, 0, 9, 7, 3, 4))).toBe('2023-01-09 07:03:04');
  });

  it('should record its own initialization', () => {
    Logger.create({ buffer, sinks: [sink], now: () => TEST_NOW });

    expect(buffer.snapshot()).toEqual([`${TEST_TIMESTAMP} - [MainThread] - INFO - Logger initialized`]);
    expect(sink.entries).toEqual([
      { level: 'info', line: `${TEST_TIMESTAMP} - [MainThread] - INFO - Logger initialized` },
    ]);
  });

  it('should tag child logger lines with the worker name', () => {
    const logger = Logger.create({ buffer, sinks: [sink], now: () => TEST_NOW });
    logger.child('HTTPWorker_3').warning('careful');

    expect(buffer.snapshot()[1]).toBe(`${TEST_TIMESTAMP} - [HTTPWorker_3] - WARNING - careful`);
    expect(sink.entries[1].level).toBe('warning');
  });

  it('should share the buffer between parent and children', () => {
    const logger = Logger.create({ buffer, now: () => TEST_NOW });
    const child = logger.child('HTTPWorker_0');

    expect(child.buffer).toBe(buffer);
    child.error('boom');
    expect(logger.buffer.snapshot()[1]).toBe(`${TEST_TIMESTAMP} - [HTTPWorker_0] - ERROR - boom`);
  });

  it('should drop lines below the configured level', () => {
    const logger = Logger.create({ buffer, sinks: [sink], level: 'warning', now: () => TEST_NOW });
    logger.debug('hidden');
    logger.info('hidden too');
    logger.warning('shown');

    expect(buffer.snapshot()).toEqual([`${TEST_TIMESTAMP} - [MainThread] - WARNING - shown`]);
    expect(sink.entries).toHaveLength(1);
  });

  it('should flush every sink that supports it', async () => {
    const logger = Logger.create({ buffer, sinks: [sink, { write: () => undefined }] });
    await logger.flush();

    expect(sink.flushed).toBe(1);
  });

  it('should recognise log level names', () => {
    expect(isLogLevel('warning')).toBe(true);
    expect(isLogLevel('warn')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});

// =============================================================================
// RotatingFileSink
// =============================================================================

describe('RotatingFileSink', () => {
  let root: string;

  beforeEach(async () => {
    root = await createSandbox();
  });

  afterEach(async () => {
    await removeSandbox(root);
  });

  it('should create the log directory and append lines in order', async () => {
    const file = path.join(root, 'logs', 'server.log');
    const sink = new RotatingFileSink(file);
    sink.write('info', 'one');
    sink.write('error', 'two');
    await sink.flush();

    expect(await fs.readFile(file, 'utf-8')).toBe('one\ntwo\n');
  });

  it('should rotate once the file reaches maxBytes', async () => {
    const file = path.join(root, 'server.log');
    const sink = new RotatingFileSink(file, { maxBytes: 10, maxFiles: 2 });
    sink.write('info', 'first line');
    sink.write('info', 'second');
    await sink.flush();

    expect(await fs.readFile(file, 'utf-8')).toBe('second\n');
    expect(await fs.readFile(`${file}.1`, 'utf-8')).toBe('first line\n');
  });

  it('should keep at most maxFiles rotated files', async () => {
    const file = path.join(root, 'server.log');
    const sink = new RotatingFileSink(file, { maxBytes: 1, maxFiles: 2 });
    for (const line of ['a', 'b', 'c', 'd']) {
      sink.write('info', line);
    }
    await sink.flush();

    expect(await fs.readFile(file, 'utf-8')).toBe('d\n');
    expect(await fs.readFile(`${file}.1`, 'utf-8')).toBe('c\n');
    expect(await fs.readFile(`${file}.2`, 'utf-8')).toBe('b\n');
    await expect(fs.stat(`${file}.3`)).rejects.toThrow();
  });
});
