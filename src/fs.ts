/**
 * Filesystem abstraction.
 *
 * Everything in tmplcraft touches the disk through a {@link RenderFs} so that
 * tests can inject failures into individual calls. {@link NodeFs} is the real
 * implementation; {@link ErrorFs} wraps another implementation and fails the
 * calls it's told to fail.
 */

import * as fsp from 'node:fs/promises';
import { join, sep } from 'node:path';

/** Permission bits: rwx------ */
export const OWNER_RWX_PERMS = 0o700;
/** Permission bits: rw------- */
export const OWNER_RW_PERMS = 0o600;

export interface FileInfo {
  /** Full mode, including permission bits. */
  mode: number;
  size: number;
  isDirectory(): boolean;
  isFile(): boolean;
  isSymbolicLink(): boolean;
}

export interface RenderFs {
  stat(path: string): Promise<FileInfo>;
  /** Like stat, but reports symlinks instead of following them. */
  lstat(path: string): Promise<FileInfo>;
  /** Entry names (not paths) of a directory, in no particular order. */
  readdir(path: string): Promise<string[]>;
  readFile(path: string): Promise<Uint8Array>;
  /** Create or truncate `path`. `mode` only applies when the file is created. */
  writeFile(path: string, data: Uint8Array, mode?: number): Promise<void>;
  chmod(path: string, mode: number): Promise<void>;
  mkdirAll(path: string, mode?: number): Promise<void>;
  /** Create a fresh directory under `dir` whose name starts with `prefix`. */
  mkdirTemp(dir: string, prefix: string): Promise<string>;
  remove(path: string): Promise<void>;
  removeAll(path: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
}

// ---------------------------------------------------------------------------
// Real implementation
// ---------------------------------------------------------------------------

export class NodeFs implements RenderFs {
  stat(path: string): Promise<FileInfo> {
    return fsp.stat(path);
  }

  lstat(path: string): Promise<FileInfo> {
    return fsp.lstat(path);
  }

  readdir(path: string): Promise<string[]> {
    return fsp.readdir(path);
  }

  async readFile(path: string): Promise<Uint8Array> {
    return new Uint8Array(await fsp.readFile(path));
  }

  writeFile(path: string, data: Uint8Array, mode = OWNER_RW_PERMS): Promise<void> {
    return fsp.writeFile(path, data, { mode });
  }

  chmod(path: string, mode: number): Promise<void> {
    return fsp.chmod(path, mode);
  }

  async mkdirAll(path: string, mode = OWNER_RWX_PERMS): Promise<void> {
    await fsp.mkdir(path, { recursive: true, mode });
  }

  mkdirTemp(dir: string, prefix: string): Promise<string> {
    // mkdtemp appends its random suffix to the string as given.
    return fsp.mkdtemp(join(dir, sep) + prefix);
  }

  remove(path: string): Promise<void> {
    return fsp.rm(path);
  }

  removeAll(path: string): Promise<void> {
    return fsp.rm(path, { recursive: true, force: true });
  }

  rename(from: string, to: string): Promise<void> {
    return fsp.rename(from, to);
  }
}

// ---------------------------------------------------------------------------
// Fault injection
// ---------------------------------------------------------------------------

/** Errors to throw from each {@link RenderFs} method instead of calling through. */
export type InjectedErrors = Partial<Record<keyof RenderFs, Error>>;

/**
 * A {@link RenderFs} that fails selected methods with the configured error
 * and forwards everything else to `base`.
 *
 * @example
 * ```ts
 * const fs = new ErrorFs(new NodeFs(), { writeFile: new Error('disk full') });
 * ```
 */
export class ErrorFs implements RenderFs {
  constructor(
    private readonly base: RenderFs,
    readonly errors: InjectedErrors = {},
  ) {}

  private fail(method: keyof RenderFs): void {
    const err = this.errors[method];
    if (err) throw err;
  }

  async stat(path: string): Promise<FileInfo> {
    this.fail('stat');
    return this.base.stat(path);
  }

  async lstat(path: string): Promise<FileInfo> {
    this.fail('lstat');
    return this.base.lstat(path);
  }

  async readdir(path: string): Promise<string[]> {
    this.fail('readdir');
    return this.base.readdir(path);
  }

  async readFile(path: string): Promise<Uint8Array> {
    this.fail('readFile');
    return this.base.readFile(path);
  }

  async writeFile(path: string, data: Uint8Array, mode?: number): Promise<void> {
    this.fail('writeFile');
    return this.base.writeFile(path, data, mode);
  }

  async chmod(path: string, mode: number): Promise<void> {
    this.fail('chmod');
    return this.base.chmod(path, mode);
  }

  async mkdirAll(path: string, mode?: number): Promise<void> {
    this.fail('mkdirAll');
    return this.base.mkdirAll(path, mode);
  }

  async mkdirTemp(dir: string, prefix: string): Promise<string> {
    this.fail('mkdirTemp');
    return this.base.mkdirTemp(dir, prefix);
  }

  async remove(path: string): Promise<void> {
    this.fail('remove');
    return this.base.remove(path);
  }

  async removeAll(path: string): Promise<void> {
    this.fail('removeAll');
    return this.base.removeAll(path);
  }

  async rename(from: string, to: string): Promise<void> {
    this.fail('rename');
    return this.base.rename(from, to);
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * True if `err` (as thrown by stat and friends) means "that path doesn't
 * exist", including the case where a parent component is a regular file.
 */
export function isNotExistError(err: unknown): boolean {
  const code = errorCode(err);
  return code === 'ENOENT' || code === 'ENOTDIR';
}

/** Stat `path`, returning `null` when it doesn't exist. Other errors propagate. */
export async function statIfExists(fs: RenderFs, path: string): Promise<FileInfo | null> {
  try {
    return await fs.stat(path);
  } catch (err) {
    if (isNotExistError(err)) return null;
    throw err;
  }
}

/** Like {@link statIfExists}, but doesn't follow a final symlink. */
export async function lstatIfExists(fs: RenderFs, path: string): Promise<FileInfo | null> {
  try {
    return await fs.lstat(path);
  } catch (err) {
    if (isNotExistError(err)) return null;
    throw err;
  }
}

/** Permission bits (the low 9 bits) of a mode. */
export function permBits(mode: number): number {
  return mode & 0o777;
}

// ---------------------------------------------------------------------------
// Directory walking
// ---------------------------------------------------------------------------

/** Returned from a {@link walkDir} visitor to skip a directory's contents. */
export const SKIP_DIR = Symbol('skipDir');

export type WalkVisitor = (
  path: string,
  relPath: string,
  info: FileInfo,
) => Promise<void | typeof SKIP_DIR> | void | typeof SKIP_DIR;

/**
 * Walk `root` depth-first, pre-order, visiting each directory before its
 * children and children in lexical order. `relPath` uses forward slashes and
 * is `.` for the root itself. Entries are lstat'ed, so symlinks are reported
 * rather than followed.
 *
 * Errors from lstat/readdir propagate unchanged.
 */
export async function walkDir(fs: RenderFs, root: string, visit: WalkVisitor): Promise<void> {
  async function recurse(path: string, relPath: string): Promise<void> {
    const info = await fs.lstat(path);
    const result = await visit(path, relPath, info);
    if (result === SKIP_DIR || !info.isDirectory()) return;
    const names = (await fs.readdir(path)).sort();
    for (const name of names) {
      await recurse(join(path, name), relPath === '.' ? name : `${relPath}/${name}`);
    }
  }
  await recurse(root, '.');
}
