/**
 * Rendering template text against a {@link Scope}.
 *
 * Templates are Handlebars, compiled without HTML escaping since the output
 * is source code, not markup. A reference to a variable that isn't in scope
 * fails instead of rendering as empty, wherever it appears.
 */

import Handlebars from 'handlebars';
import type { Scope } from './scope.js';
import type { TemplateHelper } from './funcs.js';
import { ConfigError, UnknownVarError, errorMessage, type ConfigPos, type PosString } from './types.js';

type HandlebarsEnv = ReturnType<typeof Handlebars.create>;

const MISSING_VAR = /"([^"]+)" not defined in/;

// One isolated Handlebars environment per helper set.
const envCache = new WeakMap<Readonly<Record<string, TemplateHelper>>, HandlebarsEnv>();

function envFor(helpers: Readonly<Record<string, TemplateHelper>>): HandlebarsEnv {
  let env = envCache.get(helpers);
  if (!env) {
    env = Handlebars.create();
    for (const [name, fn] of Object.entries(helpers)) {
      env.registerHelper(name, fn);
    }
    envCache.set(helpers, env);
  }
  return env;
}

function isPath(node: hbs.AST.Node): node is hbs.AST.PathExpression {
  return node.type === 'PathExpression';
}

const hasOwn = (obj: object, key: string): boolean => Object.prototype.hasOwnProperty.call(obj, key);

// Block helpers whose body renders against the caller's context.
const SAME_CONTEXT_BLOCKS = new Set(['if', 'unless']);

/**
 * Strict mode only rejects bare `{{name}}` lookups; a name passed to a helper
 * or used as a block condition resolves to `undefined`. This walk checks
 * every variable reference against the scope before anything runs.
 */
class VarChecker extends Handlebars.Visitor {
  private readonly locals: string[][] = [];
  private foreignContext = 0;

  constructor(
    private readonly helpers: Readonly<Record<string, unknown>>,
    private readonly vars: Readonly<Record<string, string>>,
    private readonly pos: ConfigPos | undefined,
  ) {
    super();
  }

  Program(program: hbs.AST.Program): void {
    this.locals.push(program.blockParams ?? []);
    super.Program(program);
    this.locals.pop();
  }

  MustacheStatement(node: hbs.AST.MustacheStatement): void {
    this.callee(node.path);
    this.args(node.params, node.hash);
  }

  SubExpression(node: hbs.AST.SubExpression): void {
    this.callee(node.path);
    this.args(node.params, node.hash);
  }

  BlockStatement(node: hbs.AST.BlockStatement): void {
    this.callee(node.path);
    this.args(node.params, node.hash);
    const helper = isPath(node.path) ? node.path.original : '';
    const foreign = !SAME_CONTEXT_BLOCKS.has(helper);
    if (foreign) this.foreignContext++;
    if (node.program) this.accept(node.program);
    if (node.inverse) this.accept(node.inverse);
    if (foreign) this.foreignContext--;
  }

  PathExpression(path: hbs.AST.PathExpression): void {
    if (path.data || path.depth > 0 || path.parts.length === 0 || this.foreignContext > 0) return;
    const head = path.parts[0];
    if (this.locals.some((names) => names.includes(head))) return;
    if (!hasOwn(this.vars, head)) {
      throw new UnknownVarError(head, Object.keys(this.vars), { pos: this.pos });
    }
  }

  private callee(path: hbs.AST.PathExpression | hbs.AST.Literal): void {
    if (!isPath(path)) return;
    const isHelperName = !path.data && path.depth === 0 && path.parts.length === 1;
    if (isHelperName && hasOwn(this.helpers, path.parts[0])) return;
    this.accept(path);
  }

  private args(params: hbs.AST.Expression[], hash: hbs.AST.Hash | undefined): void {
    this.acceptArray(params);
    if (hash) this.accept(hash);
  }
}

/**
 * Render `text` with every variable in `scope`.
 *
 * @param pos - Where `text` was written in the spec file, for error messages.
 * @throws {UnknownVarError} If the template references a variable not in scope.
 * @throws {ConfigError} If the template doesn't parse or a helper fails.
 */
export function renderString(text: string, scope: Scope, pos?: ConfigPos): string {
  const vars = scope.allVars();
  const env = envFor(scope.helpers());
  let ast: hbs.AST.Program;
  try {
    ast = env.parse(text);
  } catch (err) {
    throw new ConfigError(`failed executing template: ${errorMessage(err)}`, { pos, cause: err });
  }
  new VarChecker(env.helpers, vars, pos).accept(ast);
  try {
    const compiled = env.compile(ast, { strict: true, noEscape: true });
    return compiled(vars);
  } catch (err) {
    const missing = MISSING_VAR.exec(errorMessage(err));
    if (missing) {
      throw new UnknownVarError(missing[1], Object.keys(vars), { pos, cause: err });
    }
    throw new ConfigError(`failed executing template: ${errorMessage(err)}`, { pos, cause: err });
  }
}

/** Render each string, stopping at the first failure. */
export function renderAll(values: PosString[], scope: Scope): string[] {
  return values.map((v) => renderString(v.val, scope, v.pos));
}

/** Render a {@link PosString}, keeping its position. */
export function renderPosString(value: PosString, scope: Scope): PosString {
  return { val: renderString(value.val, scope, value.pos), pos: value.pos };
}
