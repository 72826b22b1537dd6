/**
 * Chained variable scopes.
 */

import { defaultHelpers, type TemplateHelper } from './funcs.js';

/**
 * Binds variable names to values. Scopes form a chain: a child created with
 * {@link Scope.with} sees its own bindings first and falls back to its
 * parent's. A for_each loop, for example, binds its key in a child scope;
 * the binding shadows any outer variable of the same name and disappears
 * when the loop body is done.
 *
 * Scopes are immutable. Bindings are copied on construction, and a child
 * never changes its parent.
 */
export class Scope {
  private readonly vars: ReadonlyMap<string, string>;
  private readonly parent: Scope | null;
  private readonly templateHelpers: Readonly<Record<string, TemplateHelper>>;

  constructor(
    vars: Record<string, string> = {},
    helpers: Record<string, TemplateHelper> = defaultHelpers(),
    parent: Scope | null = null,
  ) {
    this.vars = new Map(Object.entries(vars));
    this.templateHelpers = Object.isFrozen(helpers) ? helpers : Object.freeze({ ...helpers });
    this.parent = parent;
  }

  /** A child scope whose bindings shadow this one's. */
  with(vars: Record<string, string>): Scope {
    return new Scope(vars, this.templateHelpers, this);
  }

  /** Innermost value bound to `name`, or `undefined`. */
  lookup(name: string): string | undefined {
    for (let s: Scope | null = this; s; s = s.parent) {
      const val = s.vars.get(name);
      if (val !== undefined) return val;
    }
    return undefined;
  }

  /**
   * Every binding in scope, inner bindings winning over outer ones. The
   * returned object belongs to the caller.
   */
  allVars(): Record<string, string> {
    const out: Record<string, string> = this.parent ? this.parent.allVars() : {};
    for (const [k, v] of this.vars) out[k] = v;
    return out;
  }

  /** Sorted names of every variable in scope. */
  names(): string[] {
    return Object.keys(this.allVars()).sort();
  }

  /**
   * Helper functions available to templates rendered in this scope. The
   * record is shared by every scope in the chain.
   */
  helpers(): Readonly<Record<string, TemplateHelper>> {
    return this.templateHelpers;
  }
}
