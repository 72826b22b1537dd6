/**
 * Read-transform-write over a set of files in the scratch directory.
 */

import { getLogger } from './logger.js';
import { OWNER_RW_PERMS, lstatIfExists, walkDir, type RenderFs } from './fs.js';
import { expandGlobs } from './glob.js';
import type { Features } from './model.js';
import { joinRel, safeRelPath, toRelPosix } from './paths.js';
import type { Scope } from './scope.js';
import { renderString } from './template.js';
import { IoError, NoGlobMatchError, RenderError, errorMessage, type PosString } from './types.js';

const logger = getLogger('walk-modify');

/** Receives a file's contents and returns what they should become. */
export type Transform = (contents: Uint8Array) => Uint8Array | Promise<Uint8Array>;

/** The parts of a step's context that walking and modifying needs. */
export interface WalkModifyContext {
  fs: RenderFs;
  scope: Scope;
  scratchDir: string;
  features?: Features;
  signal?: AbortSignal;
}

/**
 * Render each path's template expressions and sandbox the result with
 * {@link safeRelPath}.
 */
export function processPaths(paths: readonly PosString[], scope: Scope): PosString[] {
  return paths.map((p) => ({
    val: safeRelPath(renderString(p.val, scope, p.pos), p.pos),
    pos: p.pos,
  }));
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Run a text transform over file contents. Valid UTF-8 is decoded as such;
 * anything else is read as Latin-1 so every byte maps to one character and
 * survives the round trip. When the text comes back unchanged the original
 * bytes are returned untouched.
 */
export async function transformText(
  buf: Uint8Array,
  fn: (text: string) => string | Promise<string>,
): Promise<Uint8Array> {
  let text: string;
  let encoding: BufferEncoding = 'utf8';
  try {
    text = utf8.decode(buf);
  } catch (err) {
    if (!(err instanceof TypeError)) throw err;
    encoding = 'latin1';
    text = Buffer.from(buf.buffer, buf.byteOffset, buf.byteLength).toString(encoding);
  }
  const out = await fn(text);
  return out === text ? buf : Buffer.from(out, encoding);
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && Buffer.compare(a, b) === 0;
}

/**
 * Apply `transform` to every file selected by `rawPaths`.
 *
 * Each path is rendered, sandboxed and glob-expanded against the scratch
 * directory. A path naming a directory selects every file beneath it. A file
 * selected more than once, for example by itself and by its parent
 * directory, is transformed only once. Files are written back only when the
 * transform changed their bytes.
 *
 * The first error stops the walk; files already rewritten stay rewritten.
 *
 * @throws {NoGlobMatchError} If a path or glob selects nothing.
 * @throws {IoError} If reading or writing a file fails.
 */
export async function walkAndModify(
  ctx: WalkModifyContext,
  rawPaths: readonly PosString[],
  transform: Transform,
): Promise<void> {
  const { fs, scratchDir } = ctx;
  const seen = new Set<string>();

  const paths = processPaths(rawPaths, ctx.scope);
  const matches = await expandGlobs(fs, paths, scratchDir, { skipGlobs: ctx.features?.skipGlobs });

  for (const match of matches) {
    const root = joinRel(scratchDir, match.rel);
    if (match.literal && !(await lstatOrNull(fs, root))) {
      throw new NoGlobMatchError(match.pattern, match.pos);
    }

    await walkDir(fs, root, async (path, _relPath, info) => {
      if (info.isDirectory()) return;
      if (seen.has(path)) {
        logger.debug('skipping file as already seen', { path });
        return;
      }
      ctx.signal?.throwIfAborted();

      let oldBuf: Uint8Array;
      try {
        oldBuf = await fs.readFile(path);
      } catch (err) {
        throw new IoError('readFile', path, err, match.pos);
      }

      const relToScratch = toRelPosix(scratchDir, path);
      let newBuf: Uint8Array;
      try {
        newBuf = await transform(oldBuf.slice());
      } catch (err) {
        throw new RenderError(`when processing template file "${relToScratch}": ${errorMessage(err)}`, {
          cause: err,
        });
      }
      seen.add(path);

      if (bytesEqual(oldBuf, newBuf)) return;

      try {
        await fs.writeFile(path, newBuf, OWNER_RW_PERMS);
      } catch (err) {
        throw new IoError('writeFile', path, err, match.pos);
      }
      logger.debug('wrote modification', { path: relToScratch });
    });
  }
}

async function lstatOrNull(fs: RenderFs, path: string) {
  try {
    return await lstatIfExists(fs, path);
  } catch (err) {
    throw new IoError('lstat', path, err);
  }
}
