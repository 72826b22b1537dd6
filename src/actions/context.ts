import type { PosString } from '../types.js';
import type { Scope } from '../scope.js';
import type { WalkModifyContext } from '../walk-modify.js';

/**
 * Evaluates the expressions in `if` and `values_from`. Expression semantics
 * belong to the caller; tmplcraft only decides when to ask.
 */
export interface ExpressionEvaluator {
  evalBool(expr: PosString, scope: Scope): Promise<boolean>;
  evalStringList(expr: PosString, scope: Scope): Promise<string[]>;
}

/** Where print actions write. `process.stdout` fits. */
export interface PrintSink {
  write(text: string): unknown;
}

/** Everything an action can see while it runs. */
export interface StepContext extends WalkModifyContext {
  templateDir: string;
  destDir: string;
  /** Patterns for entries include never copies; empty means the defaults. */
  ignorePatterns: readonly PosString[];
  /** Used when `ignorePatterns` is empty. */
  defaultIgnorePatterns: readonly string[];
  stdout: PrintSink;
  /** Extra variables visible only to print messages. */
  extraPrintVars: Readonly<Record<string, string>>;
  evaluator?: ExpressionEvaluator;
  /**
   * Destination-relative paths of files that include copied from the
   * destination. Shared by every context derived from the same render.
   */
  includedFromDest: string[];
  /** Log a listing of the scratch directory after every step. */
  debugScratchContents?: boolean;
}

/** A copy of `ctx` whose scope has `vars` bound on top. */
export function withScope(ctx: StepContext, vars: Record<string, string>): StepContext {
  return { ...ctx, scope: ctx.scope.with(vars) };
}
