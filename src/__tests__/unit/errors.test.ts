/**
 * Unit tests for error helpers
 */

import { describe, it, expect } from '@jest/globals';
import * as vm from 'vm';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { BindError, ConfigError, describeError, FatalStartupError, isErrnoException } from '../../errors.js';

describe('isErrnoException', () => {
  it('should recognise errors from the fs bindings', async () => {
    const error = await fs.stat(path.join(os.tmpdir(), 'no-such-entry-for-errors-test')).catch((e: unknown) => e);

    expect(isErrnoException(error)).toBe(true);
    if (isErrnoException(error)) {
      expect(error.code).toBe('ENOENT');
    }
  });

  it('should recognise errors created in another realm', () => {
    const foreign: unknown = vm.runInNewContext('Object.assign(new Error("gone"), { code: "ENOENT" })');

    expect(foreign instanceof Error).toBe(false);
    expect(isErrnoException(foreign)).toBe(true);
    expect(describeError(foreign)).toBe('gone');
  });

  it('should reject values without a code', () => {
    expect(isErrnoException(new Error('plain'))).toBe(false);
    expect(isErrnoException('ENOENT')).toBe(false);
    expect(isErrnoException(null)).toBe(false);
  });
});

describe('describeError', () => {
  it('should use the message of an error and stringify anything else', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError(42)).toBe('42');
  });
});

describe('FatalStartupError', () => {
  it('should be the base of config and bind errors', () => {
    const config = new ConfigError('bad config', ['port must be a number']);
    const bind = new BindError('in use');

    expect(config).toBeInstanceOf(FatalStartupError);
    expect(config.name).toBe('ConfigError');
    expect(config.problems).toEqual(['port must be a number']);
    expect(bind).toBeInstanceOf(FatalStartupError);
    expect(bind.name).toBe('BindError');
  });
});
