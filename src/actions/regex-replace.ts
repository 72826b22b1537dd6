import type { RegexReplaceParams, RegexReplacement } from '../model.js';
import {
  compilePattern,
  expandReplacement,
  findAll,
  groupIndex,
  groupSpan,
  maxSubgroupRef,
  type CompiledPattern,
} from '../regex.js';
import type { Scope } from '../scope.js';
import { renderString } from '../template.js';
import { ConfigError, type PosString } from '../types.js';
import { transformText, walkAndModify } from '../walk-modify.js';
import type { StepContext } from './context.js';

interface PreparedReplacement {
  entry: RegexReplacement;
  pattern: CompiledPattern;
  /** 0 for the whole match. */
  subgroup: number;
}

/** Render and compile a regex written in the spec file. */
export function templateAndCompile(regex: PosString, scope: Scope): CompiledPattern {
  return compilePattern(renderString(regex.val, scope, regex.pos), regex.pos);
}

function resolveSubgroup(entry: RegexReplacement, pattern: CompiledPattern): number {
  const sub = entry.subgroupToReplace;
  if (!sub || sub.val === '') return 0;
  const numGroups = pattern.groupNames.length;
  if (/^[0-9]+$/.test(sub.val)) {
    const n = Number(sub.val);
    if (n > numGroups) {
      throw new ConfigError(
        `subgroup_to_replace ${n} is out of range; the largest subgroup in this regex is ${numGroups}`,
        { pos: sub.pos },
      );
    }
    return n;
  }
  const idx = groupIndex(pattern, sub.val);
  if (idx < 0) {
    throw new ConfigError(`subgroup_to_replace "${sub.val}" isn't a named group in the regex "${pattern.source}"`, {
      pos: sub.pos,
    });
  }
  return idx;
}

/** Replace one regex's matches in `text`, last match first. */
function replaceMatches(text: string, r: PreparedReplacement, scope: Scope): string {
  let matches = findAll(r.pattern, text);
  if (r.entry.count !== undefined && r.entry.count >= 0) {
    matches = matches.slice(0, r.entry.count);
  }
  let out = text;
  for (const m of matches.reverse()) {
    const span = groupSpan(m, r.subgroup);
    if (!span) continue;
    // Group references are expanded first so that they can form variable
    // names in the template expression that follows.
    const expanded = expandReplacement(r.entry.with.val, m, r.pattern);
    const replacement = renderString(expanded, scope, r.entry.with.pos);
    out = out.slice(0, span[0]) + replacement + out.slice(span[1]);
  }
  return out;
}

/**
 * Replace regex matches, or one group within each match, with a
 * replacement that may reference the match's groups and contain template
 * expressions. Replacements are applied in order.
 */
export async function actionRegexReplace(params: RegexReplaceParams, ctx: StepContext): Promise<void> {
  const prepared: PreparedReplacement[] = params.replacements.map((entry) => {
    const pattern = templateAndCompile(entry.regex, ctx.scope);
    const numGroups = pattern.groupNames.length;
    const max = maxSubgroupRef(entry.with.val);
    if (max > numGroups) {
      throw new ConfigError(
        `subgroup $${max} is out of range; the largest subgroup in this regex is ${numGroups}`,
        { pos: entry.with.pos },
      );
    }
    return { entry, pattern, subgroup: resolveSubgroup(entry, pattern) };
  });

  await walkAndModify(ctx, params.paths, (buf) =>
    transformText(buf, (text) => prepared.reduce((acc, r) => replaceMatches(acc, r, ctx.scope), text)),
  );
}
