/**
 * Gitignore-style ignore filter for the include action.
 *
 * Patterns use the glob syntax of {@link matchSegment}: `*`, `?` and
 * character classes, with `*` matching dotfiles. A pattern with no `/` is
 * matched against the entry's name alone, so `.DS_Store` is ignored at any
 * depth. A pattern containing `/` is matched against the whole path relative
 * to the include's source directory; a leading `/` is allowed and means the
 * same thing. A leading `!` re-includes what an earlier pattern ignored and a
 * trailing `/` restricts the pattern to directories.
 */

import { matchPath, matchSegment } from './glob.js';
import { basenamePosix } from './paths.js';
import { BackslashInGlobError, type ConfigPos, type PosString } from './types.js';

interface Pattern {
  body: string;
  negated: boolean;
  dirOnly: boolean;
  /** Match against the full relative path rather than the basename. */
  anchored: boolean;
}

/**
 * Ordered set of ignore patterns; the last one matching a path decides.
 *
 * @example
 * ```ts
 * const filter = new IgnoreFilter(['.DS_Store', '/build/', '!build/keep.txt']);
 * filter.isIgnored('docs/.DS_Store');     // true
 * filter.isIgnored('build', true);        // true
 * filter.isIgnored('src/build', true);    // false (anchored at the root)
 * ```
 */
export class IgnoreFilter {
  private readonly patterns: Pattern[] = [];

  /**
   * @throws {BackslashInGlobError} If a pattern contains a backslash.
   */
  constructor(patterns: readonly (string | PosString)[] = []) {
    this.addPatterns(patterns);
  }

  /**
   * Add patterns after the existing ones. Blank entries and entries
   * beginning with `#` are ignored.
   *
   * @throws {BackslashInGlobError} If a pattern contains a backslash.
   */
  addPatterns(patterns: readonly (string | PosString)[]): void {
    for (const p of patterns) {
      const raw = typeof p === 'string' ? p : p.val;
      const pos: ConfigPos | undefined = typeof p === 'string' ? undefined : p.pos;
      const trimmed = raw.trim();
      if (trimmed.length === 0 || trimmed.startsWith('#')) continue;
      if (trimmed.includes('\\')) throw new BackslashInGlobError(raw, pos);

      let s = trimmed;
      let negated = false;
      let dirOnly = false;
      if (s.startsWith('!')) {
        negated = true;
        s = s.slice(1);
      }
      if (s.endsWith('/')) {
        dirOnly = true;
        s = s.slice(0, -1);
      }
      const anchored = s.includes('/');
      if (s.startsWith('/')) s = s.slice(1);
      if (s.length > 0) {
        this.patterns.push({ body: s, negated, dirOnly, anchored });
      }
    }
  }

  /**
   * Whether `relPath` (forward slashes, relative to the source directory)
   * should be left out.
   */
  isIgnored(relPath: string, isDir = false): boolean {
    let ignored = false;
    for (const p of this.patterns) {
      if (p.dirOnly && !isDir) continue;
      const matched = p.anchored ? matchPath(p.body, relPath) : matchSegment(p.body, basenamePosix(relPath));
      if (matched) ignored = !p.negated;
    }
    return ignored;
  }
}
