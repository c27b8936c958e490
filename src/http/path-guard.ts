/**
 * Path guard: keeps static file lookups inside the sandbox root.
 *
 * A cheap lexical check rejects `..` segments and absolute paths before the
 * filesystem is touched; the joined path is then canonicalized (symlinks
 * resolved) and must still sit at or below the root.
 */

import * as path from 'path';
import { promises as fs } from 'fs';
import { describeError, isErrnoException } from '../errors.js';
import type { GuardResult } from './types.js';

/**
 * realpath() that tolerates missing trailing components: the deepest existing
 * ancestor is resolved and the rest appended as-is.
 */
export async function canonicalize(target: string): Promise<string> {
  try {
    return await fs.realpath(target);
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      const parent = path.dirname(target);
      if (parent === target) {
        return target;
      }
      return path.join(await canonicalize(parent), path.basename(target));
    }
    throw error;
  }
}

export function isWithinRoot(root: string, candidate: string): boolean {
  const relative = path.relative(root, candidate);
  if (relative === '') {
    return true;
  }
  return relative.split(path.sep)[0] !== '..' && !path.isAbsolute(relative);
}

/**
 * @param sandboxRoot - must already be canonical (see ServerEngine.start)
 */
export async function resolveSafePath(requestedPath: string, sandboxRoot: string): Promise<GuardResult> {
  const stripped = requestedPath.startsWith('/') ? requestedPath.slice(1) : requestedPath;

  if (stripped.includes('\0')) {
    return { safe: false, reason: 'Null byte in path' };
  }
  if (stripped.split(/[\\/]/).includes('..')) {
    return { safe: false, reason: 'Parent directory segment in path' };
  }
  if (path.posix.isAbsolute(stripped) || path.win32.isAbsolute(stripped)) {
    return { safe: false, reason: 'Absolute path after stripping leading slash' };
  }

  let resolved: string;
  try {
    resolved = await canonicalize(path.join(sandboxRoot, stripped));
  } catch (error) {
    return { safe: false, reason: `Cannot resolve path: ${describeError(error)}` };
  }

  if (!isWithinRoot(sandboxRoot, resolved)) {
    return { safe: false, reason: 'Resolved path escapes sandbox root' };
  }

  return { safe: true, path: resolved };
}
