/**
 * Regular expressions as template authors write them.
 *
 * Spec files use RE2-style syntax: named groups are written `(?P<name>...)`
 * (or `(?<name>...)`), a name may be used by more than one group, and flags
 * may be set with a leading `(?i)`. JavaScript accepts none of the first
 * two, so patterns are translated: every named group becomes a plain
 * positional group and its name is recorded on the side.
 */

import { ConfigError, errorMessage, type ConfigPos } from './types.js';

export interface CompiledPattern {
  /** The pattern as written. */
  source: string;
  /** Compiled with the `g` and `d` flags. */
  regex: RegExp;
  /** `groupNames[i]` is the name of capture group `i + 1`, or null if it's unnamed. */
  groupNames: (string | null)[];
}

const GROUP_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

interface FlagState {
  multiLine: boolean;
  dotAll: boolean;
}

/**
 * Translate and compile a pattern.
 *
 * Inline `m` and `s` flags (`(?m)`, `(?s:...)`, `(?-m)`) are honored
 * wherever they appear by rewriting `^`, `$` and `.` within their reach,
 * since JavaScript can only set flags for a whole expression. The `i` flag
 * is only accepted at the very start of the pattern. `\A` and `\z` are
 * translated to their JavaScript equivalents.
 *
 * @throws {ConfigError} If the pattern is malformed or uses syntax with no
 *   JavaScript equivalent.
 */
export function compilePattern(pattern: string, pos?: ConfigPos): CompiledPattern {
  const fail = (why: string, cause?: unknown): never => {
    throw new ConfigError(`failed compiling regex "${pattern}": ${why}`, { pos, cause });
  };

  let jsFlags = '';
  const groupNames: (string | null)[] = [];
  const stack: FlagState[] = [{ multiLine: false, dotAll: false }];
  const top = (): FlagState => stack[stack.length - 1];

  const applyFlags = (state: FlagState, spec: string, atStart: boolean): FlagState => {
    const next = { ...state };
    let on = true;
    for (const f of spec) {
      if (f === '-') {
        on = false;
      } else if (f === 'm') {
        next.multiLine = on;
      } else if (f === 's') {
        next.dotAll = on;
      } else if (f === 'i' && on && atStart) {
        if (!jsFlags.includes('i')) jsFlags += 'i';
      } else {
        fail(`unsupported flag "${f}"${f === 'i' ? ' (only allowed at the start of the pattern)' : ''}`);
      }
    }
    return next;
  };

  let out = '';
  let inClass = false;
  let i = 0;
  while (i < pattern.length) {
    const ch = pattern[i];

    if (ch === '\\') {
      if (i + 1 >= pattern.length) fail('trailing backslash');
      const next = pattern[i + 1];
      if (!inClass && next === 'A') {
        out += '^';
      } else if (!inClass && next === 'z') {
        out += '$';
      } else {
        out += ch + next;
      }
      i += 2;
      continue;
    }

    if (inClass) {
      if (ch === ']') inClass = false;
      out += ch;
      i++;
      continue;
    }

    switch (ch) {
      case '[':
        inClass = true;
        out += ch;
        i++;
        // A `]` first in the class (after an optional `^`) is a literal.
        if (pattern[i] === '^') {
          out += '^';
          i++;
        }
        if (pattern[i] === ']') {
          out += '\\]';
          i++;
        }
        continue;
      case '^':
        out += top().multiLine ? '(?<=^|\\n)' : '^';
        i++;
        continue;
      case '$':
        out += top().multiLine ? '(?=\\n|$)' : '$';
        i++;
        continue;
      case '.':
        out += top().dotAll ? '[\\s\\S]' : '[^\\n]';
        i++;
        continue;
      case ')':
        if (stack.length === 1) fail('unexpected )');
        stack.pop();
        out += ch;
        i++;
        continue;
      case '(':
        break;
      default:
        out += ch;
        i++;
        continue;
    }

    // An opening parenthesis.
    const rest = pattern.slice(i);
    const named = /^\(\?P?<([^>=!]*)>/.exec(rest);
    if (named) {
      if (!GROUP_NAME.test(named[1])) fail(`invalid group name "${named[1]}"`);
      groupNames.push(named[1]);
      stack.push({ ...top() });
      out += '(';
      i += named[0].length;
      continue;
    }
    const lookaround = /^\(\?(?::|=|!|<=|<!)/.exec(rest);
    if (lookaround) {
      stack.push({ ...top() });
      out += lookaround[0];
      i += lookaround[0].length;
      continue;
    }
    const flagGroup = /^\(\?([a-zA-Z-]*)(:|\))/.exec(rest);
    if (flagGroup) {
      const state = applyFlags(top(), flagGroup[1], i === 0 && flagGroup[2] === ')');
      if (flagGroup[2] === ')') {
        stack[stack.length - 1] = state;
      } else {
        stack.push(state);
        out += '(?:';
      }
      i += flagGroup[0].length;
      continue;
    }
    if (rest.startsWith('(?')) fail('unsupported group syntax');
    groupNames.push(null);
    stack.push({ ...top() });
    out += '(';
    i++;
  }
  if (inClass) fail('missing closing ]');
  if (stack.length !== 1) fail('missing closing )');

  let regex: RegExp;
  try {
    regex = new RegExp(out, `dg${jsFlags}`);
  } catch (err) {
    return fail(errorMessage(err), err);
  }
  return { source: pattern, regex, groupNames };
}

/** Every non-overlapping match of `pattern` in `text`, in order. */
export function findAll(pattern: CompiledPattern, text: string): RegExpExecArray[] {
  const re = new RegExp(pattern.regex.source, pattern.regex.flags);
  const matches: RegExpExecArray[] = [];
  let m: RegExpExecArray | null;
  while ((m = re.exec(text)) !== null) {
    matches.push(m);
    if (m[0] === '') re.lastIndex++;
  }
  return matches;
}

/** `[start, end)` of group `index` in a match, or undefined if the group didn't participate. */
export function groupSpan(match: RegExpExecArray, index: number): [number, number] | undefined {
  const span = match.indices?.[index];
  return span ? [span[0], span[1]] : undefined;
}

/** Index of the first group called `name`, or -1. */
export function groupIndex(pattern: CompiledPattern, name: string): number {
  const i = pattern.groupNames.indexOf(name);
  return i < 0 ? -1 : i + 1;
}

// ---------------------------------------------------------------------------
// Replacement templates
// ---------------------------------------------------------------------------

interface Reference {
  name: string;
  /** Characters consumed, including the `$`. */
  length: number;
}

function parseReference(template: string, at: number): Reference | null {
  const rest = template.slice(at + 1);
  if (rest.startsWith('{')) {
    const close = rest.indexOf('}');
    if (close < 0) return null;
    const name = rest.slice(1, close);
    if (!/^[A-Za-z0-9_]+$/.test(name)) return null;
    return { name, length: close + 2 };
  }
  const m = /^[A-Za-z0-9_]+/.exec(rest);
  if (!m) return null;
  return { name: m[0], length: m[0].length + 1 };
}

/**
 * Substitute group references in a replacement template.
 *
 * `$1` and `${1}` insert numbered groups, `$name` and `${name}` named ones
 * (the first group with that name), and `$$` a literal `$`. In `$name` the
 * name is the longest run of letters, digits and underscores, so `$1x`
 * refers to a group called `1x`. References to groups that don't exist or
 * didn't participate in the match insert nothing. A `$` that doesn't start a
 * reference is copied as-is.
 */
export function expandReplacement(template: string, match: RegExpExecArray, pattern: CompiledPattern): string {
  let out = '';
  let i = 0;
  while (i < template.length) {
    const dollar = template.indexOf('$', i);
    if (dollar < 0) {
      out += template.slice(i);
      break;
    }
    out += template.slice(i, dollar);
    if (template[dollar + 1] === '$') {
      out += '$';
      i = dollar + 2;
      continue;
    }
    const ref = parseReference(template, dollar);
    if (!ref) {
      out += '$';
      i = dollar + 1;
      continue;
    }
    const index = /^[0-9]+$/.test(ref.name) ? Number(ref.name) : groupIndex(pattern, ref.name);
    if (index >= 0 && index < match.length) {
      out += match[index] ?? '';
    }
    i = dollar + ref.length;
  }
  return out;
}

/**
 * Highest group number referenced as `$N` or `${N}` in a replacement
 * template, ignoring escaped dollars. 0 when there are none.
 */
export function maxSubgroupRef(template: string): number {
  let max = 0;
  for (const m of template.matchAll(/(\$+)\{?([0-9]+)/g)) {
    if (m[1].length % 2 === 0) continue;
    max = Math.max(max, Number(m[2]));
  }
  return max;
}
