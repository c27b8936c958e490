/**
 * Router: decides between a static file, an API endpoint, or a rejection.
 */

import * as path from 'path';
import { promises as fs } from 'fs';
import { isErrnoException } from '../errors.js';
import { API_PREFIX, matchApiEndpoint } from '../api/types.js';
import { resolveSafePath } from './path-guard.js';
import type { HttpRequest, ResolvedTarget } from './types.js';

export interface RouteOptions {
  indexFile: string;
  notFoundPage: string;
}

const DEFAULT_ROUTE_OPTIONS: RouteOptions = {
  indexFile: 'index.html',
  notFoundPage: '404.html',
};

type EntryKind = 'file' | 'other' | 'missing';

async function entryKind(filePath: string): Promise<EntryKind> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile() ? 'file' : 'other';
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return 'missing';
    }
    throw error;
  }
}

async function notFound(sandboxRoot: string, options: RouteOptions): Promise<ResolvedTarget> {
  const page = await resolveSafePath(options.notFoundPage, sandboxRoot);
  if (page.safe && (await entryKind(page.path)) === 'file') {
    return { kind: 'static', filePath: page.path, status: 404 };
  }
  return { kind: 'rejected', status: 404, reason: 'File not found' };
}

/**
 * @param sandboxRoot - canonical sandbox directory
 */
export async function route(
  request: HttpRequest,
  sandboxRoot: string,
  options: RouteOptions = DEFAULT_ROUTE_OPTIONS
): Promise<ResolvedTarget> {
  // API paths never touch the filesystem
  if (request.path.startsWith(API_PREFIX)) {
    const endpoint = matchApiEndpoint(request.method, request.path);
    if (!endpoint) {
      return { kind: 'rejected', status: 404, reason: 'API endpoint not found' };
    }
    return { kind: 'api', endpoint };
  }

  const requestPath = request.path === '/' ? path.posix.join('/', options.indexFile) : request.path;

  // `/file.txt/` still serves file.txt; anything else falls through to
  // directory handling below
  if (requestPath.length > 1 && requestPath.endsWith('/')) {
    const stripped = requestPath.replace(/\/+$/, '');
    const candidate = await resolveSafePath(stripped, sandboxRoot);
    if (candidate.safe && (await entryKind(candidate.path)) === 'file') {
      return { kind: 'static', filePath: candidate.path, status: 200 };
    }
  }

  const guarded = await resolveSafePath(requestPath, sandboxRoot);
  if (!guarded.safe) {
    return { kind: 'rejected', status: 403, reason: guarded.reason };
  }

  switch (await entryKind(guarded.path)) {
    case 'missing':
      return notFound(sandboxRoot, options);
    case 'other':
      return { kind: 'rejected', status: 403, reason: 'Not a regular file' };
    case 'file':
      return { kind: 'static', filePath: guarded.path, status: 200 };
  }
}
