/**
 * Helper functions available inside templates.
 *
 * Handlebars calls a helper with the template's arguments followed by an
 * options object, so every helper here drops its last argument before
 * looking at the rest.
 */

export type TemplateHelper = (...args: unknown[]) => unknown;

const KEEP_FOR_CASE_CONVERSION = /[^a-zA-Z0-9\-_ ]+/g;
const SNAKE_CASE_SEPARATORS = /[- ]+/g;
const HYPHEN_CASE_SEPARATORS = /[_ ]+/g;

function str(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === undefined || value === null) return '';
  return String(value);
}

function strs(value: unknown): string[] {
  if (Array.isArray(value)) return value.map(str);
  return [str(value)];
}

/** Wrap `fn` so it receives only the template's own arguments. */
function helper(fn: (...args: unknown[]) => unknown): TemplateHelper {
  return (...args: unknown[]) => fn(...args.slice(0, -1));
}

/** Drop characters other than letters, digits, `-`, `_` and space, then join words with `_`. */
export function toSnakeCase(v: string): string {
  return v.replace(KEEP_FOR_CASE_CONVERSION, '').replace(SNAKE_CASE_SEPARATORS, '_');
}

/** Like {@link toSnakeCase} but joins words with `-`. */
export function toHyphenCase(v: string): string {
  return v.replace(KEEP_FOR_CASE_CONVERSION, '').replace(HYPHEN_CASE_SEPARATORS, '-');
}

/**
 * Replace the first `n` occurrences of `oldStr` (all of them when `n` is
 * negative). An empty `oldStr` matches before every character and at the end.
 */
export function replaceN(s: string, oldStr: string, newStr: string, n: number): string {
  if (n < 0) return s.split(oldStr).join(newStr);
  let out = '';
  let rest = s;
  let done = 0;
  while (done < n) {
    const idx = rest.indexOf(oldStr);
    if (idx < 0) break;
    if (oldStr === '') {
      out += newStr;
      if (rest.length === 0) {
        done++;
        break;
      }
      out += rest[0];
      rest = rest.slice(1);
    } else {
      out += rest.slice(0, idx) + newStr;
      rest = rest.slice(idx + oldStr.length);
    }
    done++;
  }
  return out + rest;
}

/** The default helper set. Each call returns a fresh record. */
export function defaultHelpers(): Record<string, TemplateHelper> {
  return {
    contains: helper((s, sub) => str(s).includes(str(sub))),
    replace: helper((s, o, n, count) => replaceN(str(s), str(o), str(n), Number(count))),
    replaceAll: helper((s, o, n) => str(s).split(str(o)).join(str(n))),
    sortStrings: helper((list) => [...strs(list)].sort()),
    split: helper((s, sep) => str(s).split(str(sep))),
    toLower: helper((s) => str(s).toLowerCase()),
    toUpper: helper((s) => str(s).toUpperCase()),
    trimPrefix: helper((s, p) => {
      const v = str(s);
      const prefix = str(p);
      return prefix !== '' && v.startsWith(prefix) ? v.slice(prefix.length) : v;
    }),
    trimSuffix: helper((s, x) => {
      const v = str(s);
      const suffix = str(x);
      return suffix !== '' && v.endsWith(suffix) ? v.slice(0, -suffix.length) : v;
    }),
    trimSpace: helper((s) => str(s).trim()),
    toSnakeCase: helper((s) => toSnakeCase(str(s))),
    toLowerSnakeCase: helper((s) => toSnakeCase(str(s)).toLowerCase()),
    toUpperSnakeCase: helper((s) => toSnakeCase(str(s)).toUpperCase()),
    toHyphenCase: helper((s) => toHyphenCase(str(s))),
    toLowerHyphenCase: helper((s) => toHyphenCase(str(s)).toLowerCase()),
    toUpperHyphenCase: helper((s) => toHyphenCase(str(s)).toUpperCase()),
  };
}
