/**
 * Glob matching and expansion.
 *
 * Patterns use forward slashes and are matched one path segment at a time.
 * `*` and `?` never cross a `/`, and unlike shell globbing they DO match a
 * leading `.`: template authors who write `*` mean every file, hidden or not.
 * Backslashes are rejected outright instead of being treated as escapes.
 */

import { getLogger } from './logger.js';
import { isNotExistError, lstatIfExists, type RenderFs } from './fs.js';
import { joinRel, safeRelPath } from './paths.js';
import {
  BackslashInGlobError,
  ConfigError,
  NoGlobMatchError,
  type ConfigPos,
  type PosString,
} from './types.js';

const logger = getLogger('glob');

/** True if `pattern` contains any wildcard character. */
export function hasGlobMeta(pattern: string): boolean {
  return /[*?[]/.test(pattern);
}

/**
 * Match a single path segment against a glob pattern segment.
 *
 * Supports `*`, `?`, `[seq]`, `[a-z]`, `[!seq]` and `[^seq]`.
 */
export function matchSegment(pattern: string, name: string): boolean {
  return globToRegex(pattern).test(name);
}

/**
 * Match a whole forward-slash path against a pattern, segment by segment.
 * Both must have the same number of segments.
 */
export function matchPath(pattern: string, path: string): boolean {
  if (pattern.includes('\\')) throw new BackslashInGlobError(pattern);
  const patSegs = pattern.split('/').filter(Boolean);
  const pathSegs = path.split('/').filter(Boolean);
  if (patSegs.length !== pathSegs.length) return false;
  return patSegs.every((seg, i) => matchSegment(seg, pathSegs[i]));
}

const regexCache = new Map<string, RegExp>();

function globToRegex(pattern: string): RegExp {
  const cached = regexCache.get(pattern);
  if (cached) return cached;

  let result = '^';
  let i = 0;
  while (i < pattern.length) {
    const ch = pattern[i];
    if (ch === '*') {
      result += '[^/]*';
    } else if (ch === '?') {
      result += '[^/]';
    } else if (ch === '[') {
      let j = i + 1;
      let negate = false;
      if (j < pattern.length && (pattern[j] === '!' || pattern[j] === '^')) {
        negate = true;
        j++;
      }
      // A `]` right after the opening bracket is a literal member.
      const end = pattern.indexOf(']', j + 1);
      if (end < 0) {
        throw new ConfigError(`glob "${pattern}" has an unterminated character class`);
      }
      const chars = pattern.slice(j, end).replace(/[\]^[]/g, '\\$&');
      result += negate ? `[^/${chars}]` : `[${chars}]`;
      i = end;
    } else if ('.+^${}()|/'.includes(ch)) {
      result += '\\' + ch;
    } else {
      result += ch;
    }
    i++;
  }
  result += '$';

  let regex: RegExp;
  try {
    regex = new RegExp(result);
  } catch (err) {
    throw new ConfigError(`invalid glob "${pattern}"`, { cause: err });
  }
  regexCache.set(pattern, regex);
  return regex;
}

// ---------------------------------------------------------------------------
// Expansion against a directory tree
// ---------------------------------------------------------------------------

/** A path produced by glob expansion, relative to the root it was expanded in. */
export interface ConcretePath {
  /** Forward-slash path relative to the expansion root (`.` for the root). */
  rel: string;
  /** The pattern this path came from. */
  pattern: string;
  pos?: ConfigPos;
  /** True when the pattern had no wildcards and wasn't checked for existence. */
  literal: boolean;
}

export interface ExpandGlobsOptions {
  /** Treat every pattern as a literal path (for spec versions without globs). */
  skipGlobs?: boolean;
}

/**
 * Expand path patterns against `root`.
 *
 * Each pattern is sandboxed with {@link safeRelPath}. A pattern without
 * wildcards is returned as-is without touching the disk, leaving it to the
 * caller to decide what a missing path means. A wildcard pattern must match
 * at least one existing path. Results keep pattern order, sorted within a
 * pattern, with duplicates across patterns dropped.
 *
 * @throws {BackslashInGlobError} If a pattern contains `\`.
 * @throws {PathTraversalError} If a pattern contains a `..` segment.
 * @throws {NoGlobMatchError} If a wildcard pattern matches nothing.
 */
export async function expandGlobs(
  fs: RenderFs,
  patterns: PosString[],
  root: string,
  opts: ExpandGlobsOptions = {},
): Promise<ConcretePath[]> {
  const seen = new Set<string>();
  const out: ConcretePath[] = [];

  for (const p of patterns) {
    if (p.val.includes('\\')) throw new BackslashInGlobError(p.val, p.pos);
    const rel = safeRelPath(p.val, p.pos).replace(/\/$/, '');

    let matches: string[];
    let literal = false;
    if (opts.skipGlobs || !hasGlobMeta(rel)) {
      matches = [rel];
      literal = true;
    } else {
      matches = await globWalk(fs, root, rel.split('/'), '.');
      if (matches.length === 0) throw new NoGlobMatchError(p.val, p.pos);
      logger.debug('glob path expanded', { glob: p.val, matches });
    }

    for (const m of matches) {
      if (seen.has(m)) continue;
      seen.add(m);
      out.push({ rel: m, pattern: p.val, pos: p.pos, literal });
    }
  }
  return out;
}

async function globWalk(
  fs: RenderFs,
  root: string,
  segments: string[],
  prefix: string,
): Promise<string[]> {
  const [seg, ...rest] = segments;
  const join = (name: string) => (prefix === '.' ? name : `${prefix}/${name}`);

  if (!hasGlobMeta(seg)) {
    const full = join(seg);
    if (rest.length > 0) return globWalk(fs, root, rest, full);
    return (await lstatIfExists(fs, joinRel(root, full))) ? [full] : [];
  }

  let entries: string[];
  try {
    entries = (await fs.readdir(joinRel(root, prefix))).sort();
  } catch (err) {
    if (isNotExistError(err)) return [];
    throw err;
  }

  const results: string[] = [];
  for (const name of entries) {
    if (!matchSegment(seg, name)) continue;
    if (rest.length > 0) {
      results.push(...(await globWalk(fs, root, rest, join(name))));
    } else {
      results.push(join(name));
    }
  }
  return results;
}
