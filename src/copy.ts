/**
 * Recursive copy from one directory tree into another, under a per-entry
 * policy chosen by the caller.
 *
 * Used both to pull template files into the scratch directory and to commit
 * the finished scratch directory into the destination.
 */

import { dirname } from 'node:path';
import { getLogger } from './logger.js';
import {
  OWNER_RW_PERMS,
  OWNER_RWX_PERMS,
  SKIP_DIR,
  isNotExistError,
  permBits,
  walkDir,
  type FileInfo,
  type RenderFs,
} from './fs.js';
import type { HasherFactory } from './hash.js';
import { basenamePosix, joinRel } from './paths.js';
import {
  IoError,
  OverwriteConflictError,
  SymlinkForbiddenError,
  type ConfigPos,
} from './types.js';

const logger = getLogger('copy');

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** What to do with one source entry. All fields default to false. */
export interface CopyHint {
  /**
   * Don't copy this entry. For a directory, nothing beneath it is visited
   * either.
   */
  skip?: boolean;
  /**
   * Replace the destination file if it already exists. Without this an
   * existing destination file is an error. Has no effect on directories.
   */
  allowPreexisting?: boolean;
  /**
   * Before replacing an existing destination file, save its old contents in
   * the backup directory. Only used together with `allowPreexisting`.
   */
  backupIfExists?: boolean;
}

/**
 * Called for every file and directory in the source tree, in walk order.
 * `relPath` is relative to the source root, with forward slashes (`.` for
 * the root itself).
 */
export type CopyVisitor = (relPath: string, info: FileInfo) => CopyHint | Promise<CopyHint>;

/** Creates the backup directory and returns its path. */
export type BackupDirMaker = (fs: RenderFs) => Promise<string>;

export interface CopyParams {
  fs: RenderFs;
  /** File or directory to copy from. */
  srcRoot: string;
  /** Where `srcRoot` ends up. */
  dstRoot: string;
  /** Per-entry policy. Without one, every entry is copied and nothing is overwritten. */
  visitor?: CopyVisitor;
  /**
   * Check everything a real copy would check, read and hash every file, but
   * create and write nothing.
   */
  dryRun?: boolean;
  /** If set, a hash of every copied file is returned. */
  hasher?: HasherFactory;
  /**
   * Called the first time a file needs backing up; at most once per copy.
   * Required when any hint sets `backupIfExists`.
   */
  backupDirMaker?: BackupDirMaker;
  signal?: AbortSignal;
  /** Spec file position to attach to errors. */
  pos?: ConfigPos;
}

export interface CopyResult {
  /** Content hash per source-relative path; empty when no hasher was given. */
  hashes: Map<string, string>;
  /** The backup directory, if one was created. */
  backupDir?: string;
}

// ---------------------------------------------------------------------------
// Recursive copy
// ---------------------------------------------------------------------------

/**
 * Copy `srcRoot` to `dstRoot`.
 *
 * The source is walked depth-first, directories before their contents.
 * Directories are never created on their own account: a destination
 * directory comes into existence only when a file is written beneath it,
 * so empty source directories don't appear in the output.
 *
 * Permission bits of each source file are carried over to its copy.
 *
 * A failure stops the copy at that entry. Files copied before it stay where
 * they are.
 *
 * @throws {SymlinkForbiddenError} If the source contains a symlink anywhere.
 * @throws {OverwriteConflictError} If a destination file exists and may not
 *   be overwritten, or a file and a directory would have to swap places.
 * @throws {IoError} If a filesystem call made by the copy itself fails.
 *   Errors from walking the source are thrown as the OS reported them.
 */
export async function copyRecursive(params: CopyParams): Promise<CopyResult> {
  const { fs, srcRoot, dstRoot, visitor, dryRun = false, hasher, signal, pos } = params;
  const hashes = new Map<string, string>();
  let backupDir: string | undefined;

  await walkDir(fs, srcRoot, async (path, relPath, info) => {
    signal?.throwIfAborted();

    if (info.isSymbolicLink()) throw new SymlinkForbiddenError(relPath);

    const hint: CopyHint = visitor ? await visitor(relPath, info) : {};
    if (hint.skip) {
      logger.debug('visitor skipped entry', { path: relPath });
      return info.isDirectory() ? SKIP_DIR : undefined;
    }
    if (info.isDirectory()) return undefined;

    const dst = joinRel(dstRoot, relPath);
    await mkdirAllChecked(fs, dirname(dst), dryRun, pos);

    const dstInfo = await statOrNull(fs, dst, pos);
    if (dstInfo) {
      if (dstInfo.isDirectory()) {
        throw new OverwriteConflictError(
          `cannot overwrite a directory with a file of the same name, "${relPath}"`,
          relPath,
          pos,
        );
      }
      if (!hint.allowPreexisting) {
        throw new OverwriteConflictError(
          `destination file "${relPath}" already exists and overwriting was not enabled`,
          relPath,
          pos,
        );
      }
      if (hint.backupIfExists && !dryRun) {
        if (backupDir === undefined) {
          if (!params.backupDirMaker) {
            throw new IoError('backUp', dst, new Error('no backup directory was configured'), pos);
          }
          try {
            backupDir = await params.backupDirMaker(fs);
          } catch (err) {
            throw new IoError('makeBackupDir', dstRoot, err, pos);
          }
          logger.debug('created backup directory', { backupDir });
        }
        const backupRel = relPath === '.' ? basenamePosix(dstRoot) : relPath;
        await backUp(fs, backupDir, dst, backupRel, pos);
      }
    }

    const digest = await copyFile(fs, path, dst, {
      mode: permBits(info.mode),
      dryRun,
      hasher,
      pos,
    });
    if (digest !== undefined) hashes.set(relPath, digest);
  });

  return { hashes, backupDir };
}

// ---------------------------------------------------------------------------
// Single files
// ---------------------------------------------------------------------------

export interface CopyFileOptions {
  /** Permission bits for the destination. Default rw-------. */
  mode?: number;
  /** Read (and hash) the source but don't write anything. */
  dryRun?: boolean;
  hasher?: HasherFactory;
  pos?: ConfigPos;
}

/**
 * Copy one file, replacing `dst` if it exists and setting its permission
 * bits to `mode`.
 *
 * @returns The content hash, if a hasher was given.
 */
export async function copyFile(
  fs: RenderFs,
  src: string,
  dst: string,
  opts: CopyFileOptions = {},
): Promise<string | undefined> {
  const { mode = OWNER_RW_PERMS, dryRun = false, hasher, pos } = opts;

  let data: Uint8Array;
  try {
    data = await fs.readFile(src);
  } catch (err) {
    throw new IoError('readFile', src, err, pos);
  }

  let digest: string | undefined;
  if (hasher) {
    const h = hasher();
    h.update(data);
    digest = await h.digest();
  }

  if (dryRun) return digest;

  try {
    await fs.writeFile(dst, data, mode);
  } catch (err) {
    throw new IoError('writeFile', dst, err, pos);
  }
  // writeFile only applies the mode to new files.
  try {
    await fs.chmod(dst, mode);
  } catch (err) {
    throw new IoError('chmod', dst, err, pos);
  }
  logger.debug('copied file', { source: src, destination: dst });
  return digest;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Save the current contents of `dst` as `backupDir/relPath`. */
async function backUp(
  fs: RenderFs,
  backupDir: string,
  dst: string,
  relPath: string,
  pos?: ConfigPos,
): Promise<void> {
  const backupFile = joinRel(backupDir, relPath);
  const parent = dirname(backupFile);
  try {
    await fs.mkdirAll(parent, OWNER_RWX_PERMS);
  } catch (err) {
    throw new IoError('mkdirAll', parent, err, pos);
  }
  await copyFile(fs, dst, backupFile, { mode: OWNER_RW_PERMS, pos });
  logger.debug('completed backup', { source: dst, destination: backupFile });
}

async function statOrNull(fs: RenderFs, path: string, pos?: ConfigPos): Promise<FileInfo | null> {
  try {
    return await fs.stat(path);
  } catch (err) {
    if (isNotExistError(err)) return null;
    throw new IoError('stat', path, err, pos);
  }
}

/**
 * Make sure `dir` exists as a directory, creating it and its parents unless
 * this is a dry run. The nearest existing ancestor is checked in either case,
 * so a dry run reports a file that's in the way just like a real run would.
 */
async function mkdirAllChecked(fs: RenderFs, dir: string, dryRun: boolean, pos?: ConfigPos): Promise<void> {
  let current = dir;
  for (;;) {
    const info = await statOrNull(fs, current, pos);
    if (info) {
      if (!info.isDirectory()) {
        throw new OverwriteConflictError(
          `cannot overwrite a file with a directory of the same name, "${current}"`,
          current,
          pos,
        );
      }
      if (current === dir) return;
      break;
    }
    const parent = dirname(current);
    if (parent === current) break;
    current = parent;
  }

  if (dryRun) return;
  try {
    await fs.mkdirAll(dir, OWNER_RWX_PERMS);
  } catch (err) {
    throw new IoError('mkdirAll', dir, err, pos);
  }
}
