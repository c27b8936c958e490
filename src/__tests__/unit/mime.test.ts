/**
 * Unit tests for MIME type lookup
 */

import { describe, it, expect } from '@jest/globals';
import { DEFAULT_MIME_TYPE, getMimeType } from '../../http/mime.js';

describe('getMimeType', () => {
  it('should map known extensions', () => {
    expect(getMimeType('/srv/www/index.html')).toBe('text/html; charset=utf-8');
    expect(getMimeType('app.js')).toBe('application/javascript; charset=utf-8');
    expect(getMimeType('logo.png')).toBe('image/png');
  });

  it('should ignore extension case', () => {
    expect(getMimeType('PHOTO.JPG')).toBe('image/jpeg');
  });

  it('should fall back to application/octet-stream', () => {
    expect(getMimeType('archive.tar.zst')).toBe(DEFAULT_MIME_TYPE);
    expect(getMimeType('Makefile')).toBe('application/octet-stream');
    expect(getMimeType('weird.constructor')).toBe('application/octet-stream');
  });
});
