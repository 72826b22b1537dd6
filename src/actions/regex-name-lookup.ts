import type { RegexNameLookupParams } from '../model.js';
import { findAll, groupSpan, type CompiledPattern } from '../regex.js';
import type { Scope } from '../scope.js';
import { ConfigError, UnknownVarError, type ConfigPos } from '../types.js';
import { transformText, walkAndModify } from '../walk-modify.js';
import type { StepContext } from './context.js';
import { templateAndCompile } from './regex-replace.js';

/**
 * Replace the text captured by each named group with the variable of the
 * same name. Matches are processed from the end of the file backwards, and
 * groups within a match from last to first, so earlier offsets stay valid.
 */
function replaceGroupsWithVars(text: string, pattern: CompiledPattern, scope: Scope, pos?: ConfigPos): string {
  let out = text;
  for (const m of findAll(pattern, text).reverse()) {
    for (let g = pattern.groupNames.length; g > 0; g--) {
      const name = pattern.groupNames[g - 1];
      if (name === null) continue;
      const value = scope.lookup(name);
      if (value === undefined) {
        throw new UnknownVarError(name, scope.names(), { pos });
      }
      const span = groupSpan(m, g);
      if (!span) continue;
      out = out.slice(0, span[0]) + value + out.slice(span[1]);
    }
  }
  return out;
}

/**
 * For every match of each regex, replace each named group's text with the
 * value of the variable it's named after. Unnamed groups aren't allowed.
 */
export async function actionRegexNameLookup(params: RegexNameLookupParams, ctx: StepContext): Promise<void> {
  const compiled = params.replacements.map(({ regex }) => {
    const pattern = templateAndCompile(regex, ctx.scope);
    if (pattern.groupNames.some((n) => n === null)) {
      throw new ConfigError(
        'all capturing groups in a regex_name_lookup must be named, like (?P<myinputvar>myregex), not like (myregex)',
        { pos: regex.pos },
      );
    }
    return { pattern, pos: regex.pos };
  });

  await walkAndModify(ctx, params.paths, (buf) =>
    transformText(buf, (text) =>
      compiled.reduce((acc, c) => replaceGroupsWithVars(acc, c.pattern, ctx.scope, c.pos), text),
    ),
  );
}
