/**
 * Shared types and error classes for tmplcraft.
 */

// ---------------------------------------------------------------------------
// Spec-file positions
// ---------------------------------------------------------------------------

/** Location in the template's spec file that a value came from. */
export interface ConfigPos {
  line: number;
  column: number;
}

/**
 * A string authored in the spec file, paired with where it was written.
 * Paths, regexes and replacement texts all arrive in this shape.
 */
export interface PosString {
  val: string;
  pos?: ConfigPos;
}

/** Wrap plain strings as position-less {@link PosString}s. */
export function posStrings(values: string[]): PosString[] {
  return values.map((val) => ({ val }));
}

function atPos(pos: ConfigPos | undefined, message: string): string {
  if (!pos) return message;
  return `at line ${pos.line} column ${pos.column}: ${message}`;
}

// ---------------------------------------------------------------------------
// Error classes
// ---------------------------------------------------------------------------

export interface RenderErrorOptions {
  pos?: ConfigPos;
  cause?: unknown;
}

export class RenderError extends Error {
  code = 'RENDER';
  readonly pos?: ConfigPos;

  constructor(message: string, options: RenderErrorOptions = {}) {
    super(atPos(options.pos, message), options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'RenderError';
    this.pos = options.pos;
  }
}

/** A relative path would climb out of the directory it is resolved against. */
export class PathTraversalError extends RenderError {
  code = 'PATH_TRAVERSAL';
  constructor(readonly path: string, pos?: ConfigPos) {
    super(`path "${path}" must not contain ".."`, { pos });
    this.name = 'PathTraversalError';
  }
}

/** Glob patterns may not contain backslashes; escaping differs across platforms. */
export class BackslashInGlobError extends RenderError {
  code = 'BACKSLASH_IN_GLOB';
  constructor(readonly pattern: string, pos?: ConfigPos) {
    super(`backslashes in glob "${pattern}" are forbidden`, { pos });
    this.name = 'BackslashInGlobError';
  }
}

export class NoGlobMatchError extends RenderError {
  code = 'NO_GLOB_MATCH';
  constructor(readonly pattern: string, pos?: ConfigPos) {
    super(`glob "${pattern}" did not match any files`, { pos });
    this.name = 'NoGlobMatchError';
  }
}

/** A template referenced a variable that is not in scope. */
export class UnknownVarError extends RenderError {
  code = 'UNKNOWN_VAR';
  readonly availableVars: string[];

  constructor(
    readonly varName: string,
    availableVars: string[],
    options: RenderErrorOptions = {},
  ) {
    const sorted = [...availableVars].sort();
    super(
      `the template referenced a nonexistent variable name "${varName}"; available variable names are [${sorted.join(' ')}]`,
      options,
    );
    this.name = 'UnknownVarError';
    this.availableVars = sorted;
  }
}

export class SymlinkForbiddenError extends RenderError {
  code = 'SYMLINK_FORBIDDEN';
  /** Path of the symlink, relative to the copy's source root. */
  constructor(readonly path: string) {
    super(`a symlink was found at "${path}", but symlinks are forbidden here`);
    this.name = 'SymlinkForbiddenError';
  }
}

/** The destination already holds something the copy may not replace. */
export class OverwriteConflictError extends RenderError {
  code = 'OVERWRITE_CONFLICT';
  constructor(message: string, readonly path: string, pos?: ConfigPos) {
    super(message, { pos });
    this.name = 'OverwriteConflictError';
  }
}

/** A filesystem call failed; `op` names the call and `cause` holds the OS error. */
export class IoError extends RenderError {
  code = 'IO';
  constructor(
    readonly op: string,
    readonly path: string,
    cause: unknown,
    pos?: ConfigPos,
  ) {
    super(`${op}(${path}): ${errorMessage(cause)}`, { pos, cause });
    this.name = 'IoError';
  }
}

/** Invalid template configuration discovered while executing it. */
export class ConfigError extends RenderError {
  code = 'CONFIG';
  constructor(message: string, options: RenderErrorOptions = {}) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/** A render step failed. The underlying error is the `cause`. */
export class StepError extends RenderError {
  code = 'STEP_FAILED';
  constructor(
    readonly stepIndex: number,
    readonly action: string,
    cause: unknown,
    pos?: ConfigPos,
  ) {
    super(`step ${stepIndex} (action "${action}") failed: ${errorMessage(cause)}`, { pos, cause });
    this.name = 'StepError';
  }
}

/** A dependency graph has a cycle. `members` lists it in edge order. */
export class CycleError extends RenderError {
  code = 'CYCLE';
  constructor(readonly members: string[]) {
    super(`this directed graph has a cycle: ${[...members, members[0]].join(' -> ')}`);
    this.name = 'CycleError';
  }
}

// ---------------------------------------------------------------------------
// Error helpers
// ---------------------------------------------------------------------------

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Walk the `cause` chain of `err` and return the first error that is an
 * instance of `ctor`, or `undefined`.
 */
export function findError<T extends Error>(
  err: unknown,
  ctor: abstract new (...args: never[]) => T,
): T | undefined {
  let current: unknown = err;
  const seen = new Set<unknown>();
  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof ctor) return current;
    seen.add(current);
    current = current.cause;
  }
  return undefined;
}
