/**
 * Request parser. Pure: works on bytes already read from the connection.
 */

import {
  HttpRequest,
  isAllowedMethod,
  ParseError,
  ParseResult,
} from './types.js';

export const HEADER_TERMINATOR = Buffer.from('\r\n\r\n', 'latin1');

export type ContentLength =
  | { valid: true; length: number }
  | { valid: false; raw: string };

function badRequest(message: string): { success: false; error: ParseError } {
  return { success: false, error: { kind: 'bad_request', status: 400, message } };
}

/**
 * Offset of the blank line ending the header block, or -1.
 */
export function findHeaderEnd(data: Buffer): number {
  return data.indexOf(HEADER_TERMINATOR);
}

export function parseHeaderFields(lines: string[]): Record<string, string> {
  // Null prototype: header names must not collide with Object.prototype keys
  const headers: Record<string, string> = Object.create(null);
  for (const line of lines) {
    const colon = line.indexOf(':');
    if (colon <= 0) continue;
    const name = line.slice(0, colon).trim().toLowerCase();
    if (!name || name in headers) continue;
    headers[name] = line.slice(colon + 1).trim();
  }
  return headers;
}

export function readContentLength(headers: Record<string, string>): ContentLength {
  const raw = headers['content-length'];
  if (raw === undefined) {
    return { valid: true, length: 0 };
  }
  if (!/^\d+$/.test(raw)) {
    return { valid: false, raw };
  }
  const length = Number(raw);
  if (!Number.isSafeInteger(length)) {
    return { valid: false, raw };
  }
  return { valid: true, length };
}

/**
 * Total bytes the request occupies (headers plus declared body), or null
 * while the header block is incomplete. A malformed Content-Length counts as
 * no body so the parser gets to reject it.
 */
export function expectedRequestLength(data: Buffer): number | null {
  const headerEnd = findHeaderEnd(data);
  if (headerEnd < 0) return null;

  const lines = data.subarray(0, headerEnd).toString('utf-8').split('\r\n');
  const contentLength = readContentLength(parseHeaderFields(lines.slice(1)));
  const bodyStart = headerEnd + HEADER_TERMINATOR.length;
  return contentLength.valid ? bodyStart + contentLength.length : bodyStart;
}

function splitTarget(target: string): { pathname: string; query: string | null } | null {
  if (/^https?:\/\//i.test(target)) {
    try {
      const url = new URL(target);
      return { pathname: url.pathname, query: url.search ? url.search.slice(1) : null };
    } catch {
      return null;
    }
  }

  const withoutFragment = target.split('#', 1)[0];
  const queryStart = withoutFragment.indexOf('?');
  if (queryStart < 0) {
    return { pathname: withoutFragment, query: null };
  }
  return {
    pathname: withoutFragment.slice(0, queryStart),
    query: withoutFragment.slice(queryStart + 1),
  };
}

export function parseRequest(raw: Buffer): ParseResult {
  const headerEnd = findHeaderEnd(raw);
  if (headerEnd < 0) {
    return badRequest('Incomplete request headers');
  }

  const lines = raw.subarray(0, headerEnd).toString('utf-8').split('\r\n');
  const parts = lines[0].split(' ');
  if (parts.length < 3 || !parts[0] || !parts[1]) {
    return badRequest('Malformed request line');
  }

  const method = parts[0].toUpperCase();
  if (!isAllowedMethod(method)) {
    return { success: false, error: { kind: 'method_not_allowed', status: 405, method } };
  }

  const rawPath = parts[1];
  const version = parts[2];

  const target = splitTarget(rawPath);
  if (!target || !target.pathname.startsWith('/')) {
    return badRequest('Request target must be an absolute path');
  }

  let path: string;
  try {
    path = decodeURIComponent(target.pathname);
  } catch {
    return badRequest('Malformed percent-encoding in path');
  }

  const headerLines = lines.slice(1);
  const headers = parseHeaderFields(headerLines);
  const contentLength = readContentLength(headers);
  if (!contentLength.valid) {
    return badRequest(`Invalid Content-Length: ${contentLength.raw}`);
  }

  const bodyStart = headerEnd + HEADER_TERMINATOR.length;
  const request: HttpRequest = {
    method,
    rawPath,
    path,
    query: target.query,
    version,
    rawHeaders: headerLines.join('\r\n'),
    headers,
    host: headers['host'],
    contentLength: contentLength.length,
    body: Buffer.from(raw.subarray(bodyStart, bodyStart + contentLength.length)),
  };

  return { success: true, request };
}
