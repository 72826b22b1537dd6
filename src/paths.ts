/**
 * Path normalization and sandboxing.
 *
 * Template-facing paths always use forward slashes. Host separators only
 * appear once a relative path is joined onto a real directory.
 */

import { join, relative, sep } from 'node:path';
import { PathTraversalError, type ConfigPos } from './types.js';

/**
 * Sandbox a template-supplied relative path.
 *
 * Strips exactly one leading `/` (a leading slash means "relative to the
 * root", not "absolute"), drops `.` and empty segments and rejects any `..`
 * segment. A trailing `/` survives so callers can tell "directory" intent.
 * The empty path and `/` both mean the root, returned as `.`.
 *
 * @throws {PathTraversalError} If any segment is `..`.
 */
export function safeRelPath(path: string, pos?: ConfigPos): string {
  const trailingSlash = path.length > 1 && path.endsWith('/');
  const stripped = path.startsWith('/') ? path.slice(1) : path;
  const kept: string[] = [];
  for (const seg of stripped.split('/')) {
    if (seg === '..') throw new PathTraversalError(path, pos);
    if (seg === '' || seg === '.') continue;
    kept.push(seg);
  }
  if (kept.length === 0) return '.';
  const joined = kept.join('/');
  return trailingSlash ? `${joined}/` : joined;
}

/** Join a forward-slash relative path onto a host directory. */
export function joinRel(root: string, rel: string): string {
  const segments = rel.split('/').filter((s) => s !== '' && s !== '.');
  return segments.length === 0 ? root : join(root, ...segments);
}

/** Express `abs` relative to `root` with forward slashes (`.` for the root). */
export function toRelPosix(root: string, abs: string): string {
  const rel = relative(root, abs);
  if (rel === '') return '.';
  return sep === '/' ? rel : rel.split(sep).join('/');
}

/** Join forward-slash relative paths, ignoring `.` components. */
export function joinPosix(...parts: string[]): string {
  const segments: string[] = [];
  for (const part of parts) {
    for (const seg of part.split('/')) {
      if (seg !== '' && seg !== '.') segments.push(seg);
    }
  }
  return segments.length === 0 ? '.' : segments.join('/');
}

/** Last component of a forward-slash path. */
export function basenamePosix(path: string): string {
  const trimmed = path.replace(/\/+$/, '');
  const slash = trimmed.lastIndexOf('/');
  return slash >= 0 ? trimmed.slice(slash + 1) : trimmed;
}
