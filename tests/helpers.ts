import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  DEFAULT_IGNORE_PATTERNS,
  NodeFs,
  Scope,
  type ExpressionEvaluator,
  type PosString,
  type RenderFs,
  type StepContext,
} from '../src/index.js';

const enc = new TextEncoder();
const dec = new TextDecoder();

export function toBytes(s: string): Uint8Array {
  return enc.encode(s);
}

export function fromBytes(b: Uint8Array): string {
  return dec.decode(b);
}

export function makeTmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'tmplcraft-test-'));
}

export function rmTmpDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** A file's contents, or its contents and permission bits. */
export type TreeEntry = string | { content: string; mode: number };

/** Write `{ 'a/b.txt': 'contents' }` style trees under `root`. */
export function writeTree(root: string, files: Record<string, TreeEntry>): void {
  for (const [rel, entry] of Object.entries(files)) {
    const full = path.join(root, ...rel.split('/'));
    fs.mkdirSync(path.dirname(full), { recursive: true });
    if (typeof entry === 'string') {
      fs.writeFileSync(full, entry);
    } else {
      fs.writeFileSync(full, entry.content);
      fs.chmodSync(full, entry.mode);
    }
  }
}

/** Read every regular file under `root` into `{ 'a/b.txt': 'contents' }`. */
export function readTree(root: string): Record<string, string> {
  const out: Record<string, string> = {};
  if (!fs.existsSync(root)) return out;
  function recurse(dir: string, rel: string): void {
    for (const name of fs.readdirSync(dir).sort()) {
      const full = path.join(dir, name);
      const childRel = rel ? `${rel}/${name}` : name;
      const st = fs.lstatSync(full);
      if (st.isDirectory()) {
        recurse(full, childRel);
      } else {
        out[childRel] = fs.readFileSync(full, 'utf8');
      }
    }
  }
  recurse(root, '');
  return out;
}

export function modeOf(file: string): number {
  return fs.statSync(file).mode & 0o777;
}

type ErrorClass<T extends Error> = abstract new (...args: never[]) => T;

function asInstance<T extends Error>(ctor: ErrorClass<T>, err: unknown): T {
  if (err instanceof ctor) return err;
  throw new Error(`expected ${ctor.name}, got: ${String(err)}`);
}

/** Run `fn` and return what it threw, which must be a `ctor`. */
export function caught<T extends Error>(ctor: ErrorClass<T>, fn: () => unknown): T {
  try {
    fn();
  } catch (err) {
    return asInstance(ctor, err);
  }
  throw new Error(`expected ${ctor.name} to be thrown`);
}

/** Await `promise` and return its rejection, which must be a `ctor`. */
export async function rejection<T extends Error>(ctor: ErrorClass<T>, promise: Promise<unknown>): Promise<T> {
  try {
    await promise;
  } catch (err) {
    return asInstance(ctor, err);
  }
  throw new Error(`expected ${ctor.name} to be thrown`);
}

/** Position-less spec strings. */
export function S(val: string): PosString {
  return { val };
}

export function Ss(...vals: string[]): PosString[] {
  return vals.map(S);
}

/** Collects everything written to it. */
export class BufferSink {
  text = '';
  write(s: string): void {
    this.text += s;
  }
}

/**
 * Evaluates a tiny expression language for tests: `true`, `false`, a
 * variable name (true when it's "true"), or a comma-separated list.
 */
export const fakeEvaluator: ExpressionEvaluator = {
  async evalBool(expr, scope) {
    if (expr.val === 'true') return true;
    if (expr.val === 'false') return false;
    return scope.lookup(expr.val) === 'true';
  },
  async evalStringList(expr) {
    return expr.val.split(',').map((s) => s.trim());
  },
};

export interface ContextDirs {
  scratchDir: string;
  templateDir: string;
  destDir: string;
}

/** Create scratch, template and destination directories under `root`. */
export function makeContextDirs(root: string): ContextDirs {
  const dirs = {
    scratchDir: path.join(root, 'scratch'),
    templateDir: path.join(root, 'template'),
    destDir: path.join(root, 'dest'),
  };
  for (const d of Object.values(dirs)) fs.mkdirSync(d, { recursive: true });
  return dirs;
}

export function makeContext(
  dirs: ContextDirs,
  overrides: Partial<StepContext> & { vars?: Record<string, string>; rfs?: RenderFs } = {},
): StepContext {
  const { vars, rfs, ...rest } = overrides;
  return {
    fs: rfs ?? new NodeFs(),
    scope: new Scope(vars ?? {}),
    ...dirs,
    ignorePatterns: [],
    defaultIgnorePatterns: DEFAULT_IGNORE_PATTERNS,
    stdout: new BufferSink(),
    extraPrintVars: {},
    includedFromDest: [],
    ...rest,
  };
}

export { fs, path };
