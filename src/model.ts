/**
 * Typed shape of a template's steps, as handed over by the spec-file loader.
 *
 * The loader has already checked the structure (required fields present,
 * `as` lists as long as `paths` lists, and so on). Values that may contain
 * template expressions are {@link PosString}s so errors can point back into
 * the spec file.
 */

import type { ConfigPos, PosString } from './types.js';

/** Behavior switches that depend on the spec file's API version. */
export interface Features {
  /** Treat every path as a literal; glob characters have no meaning. */
  skipGlobs?: boolean;
}

export interface AppendParams {
  paths: PosString[];
  with: PosString;
  /** Don't add a newline to the end of the appended text. */
  skipEnsureNewline?: boolean;
}

export interface StringReplacement {
  toReplace: PosString;
  with: PosString;
  /** Replace only this many occurrences, from the start of the file. */
  count?: number;
}

export interface StringReplaceParams {
  paths: PosString[];
  replacements: StringReplacement[];
}

export interface RegexReplacement {
  regex: PosString;
  /** May reference groups as `$1`, `${1}`, `$name` or `${name}`, and may contain template expressions. */
  with: PosString;
  /** Replace only this group (by name or number) instead of the whole match. */
  subgroupToReplace?: PosString;
  /** Replace only this many matches, from the start of the file. */
  count?: number;
}

export interface RegexReplaceParams {
  paths: PosString[];
  replacements: RegexReplacement[];
}

export interface RegexNameLookupParams {
  paths: PosString[];
  /** Every group in each regex must be named after a variable. */
  replacements: { regex: PosString }[];
}

export interface GoTemplateParams {
  paths: PosString[];
}

export type IncludeSource = 'template' | 'destination';

export interface IncludePath {
  paths: PosString[];
  /** Output names, one per entry in `paths`. */
  as?: PosString[];
  /** Where to copy from. Default `template`. */
  from?: IncludeSource;
  /** Path globs relative to the source directory that aren't copied. */
  skip?: PosString[];
  /** Removed from the front of every output path. */
  stripPrefix?: PosString;
  /** Added to the front of every output path. */
  addPrefix?: PosString;
  pos?: ConfigPos;
}

export interface IncludeParams {
  paths: IncludePath[];
}

export interface PrintParams {
  message: PosString;
}

export interface ForEachIterator {
  /** Name of the loop variable. */
  key: PosString;
  /** Literal values, each of which may contain template expressions. */
  values?: PosString[];
  /** Expression producing the values; evaluated by the {@link ExpressionEvaluator}. */
  valuesFrom?: PosString;
}

export interface ForEachParams {
  iterator: ForEachIterator;
  steps: Step[];
}

interface StepBase {
  desc?: string;
  /** Expression deciding whether the step runs. */
  if?: PosString;
  pos?: ConfigPos;
}

export type Step =
  | (StepBase & { action: 'append'; params: AppendParams })
  | (StepBase & { action: 'string_replace'; params: StringReplaceParams })
  | (StepBase & { action: 'regex_replace'; params: RegexReplaceParams })
  | (StepBase & { action: 'regex_name_lookup'; params: RegexNameLookupParams })
  | (StepBase & { action: 'go_template'; params: GoTemplateParams })
  | (StepBase & { action: 'include'; params: IncludeParams })
  | (StepBase & { action: 'print'; params: PrintParams })
  | (StepBase & { action: 'for_each'; params: ForEachParams });

export type ActionName = Step['action'];

/** A parsed template spec file. */
export interface TemplateSpec {
  desc?: string;
  steps: Step[];
  /** Replaces the default ignore patterns for include actions when non-empty. */
  ignore?: PosString[];
  features?: Features;
}
