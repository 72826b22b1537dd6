import { GOLDEN_TEST_DIR, SPEC_FILE_NAME } from '../config.js';
import { copyRecursive } from '../copy.js';
import { lstatIfExists, type FileInfo } from '../fs.js';
import { expandGlobs, matchPath } from '../glob.js';
import { IgnoreFilter } from '../ignore.js';
import { getLogger } from '../logger.js';
import type { IncludeParams, IncludePath } from '../model.js';
import { joinPosix, joinRel, safeRelPath } from '../paths.js';
import { renderString } from '../template.js';
import { ConfigError, IoError, RenderError, errorMessage, type ConfigPos, type PosString } from '../types.js';
import { processPaths } from '../walk-modify.js';
import type { StepContext } from './context.js';

const logger = getLogger('include');

function stripTrailingSlash(p: string): string {
  return p.length > 1 ? p.replace(/\/+$/, '') : p;
}

/**
 * Output path for an included path when no `as` was given: `stripPrefix`
 * removed from the front, then `addPrefix` added.
 */
export function prefixedDest(relPath: string, stripPrefix: string, addPrefix: string, pos?: ConfigPos): string {
  let out = relPath;
  if (stripPrefix !== '') {
    if (!out.startsWith(stripPrefix)) {
      throw new ConfigError(`the strip_prefix "${stripPrefix}" wasn't a prefix of the actual path "${relPath}"`, {
        pos,
      });
    }
    out = out.slice(stripPrefix.length);
  }
  if (addPrefix !== '') out = addPrefix + out;
  return stripTrailingSlash(safeRelPath(out, pos));
}

/**
 * Copy files from the template directory (or the destination directory)
 * into the scratch directory.
 */
export async function actionInclude(params: IncludeParams, ctx: StepContext): Promise<void> {
  const ignore = new IgnoreFilter(ctx.ignorePatterns.length > 0 ? ctx.ignorePatterns : ctx.defaultIgnorePatterns);
  for (const inc of params.paths) {
    await includePath(inc, ctx, ignore);
  }
}

async function includePath(inc: IncludePath, ctx: StepContext, ignore: IgnoreFilter): Promise<void> {
  const fromDestination = inc.from === 'destination';
  const fromDir = fromDestination ? ctx.destDir : ctx.templateDir;
  const skipGlobs = ctx.features?.skipGlobs ?? false;

  const skipPaths = processPaths(inc.skip ?? [], ctx.scope).map((p) => ({ ...p, val: stripTrailingSlash(p.val) }));
  if (!fromDestination) {
    // The spec file and golden test data are never part of the output.
    skipPaths.push({ val: SPEC_FILE_NAME }, { val: GOLDEN_TEST_DIR });
  }

  const asPaths = processPaths(inc.as ?? [], ctx.scope).map((p) => stripTrailingSlash(p.val));
  if (asPaths.length > 0 && asPaths.length !== inc.paths.length) {
    throw new ConfigError(
      `"as" has ${asPaths.length} entries but "paths" has ${inc.paths.length}; they must be the same length`,
      { pos: inc.pos },
    );
  }
  const stripPrefix = inc.stripPrefix ? renderString(inc.stripPrefix.val, ctx.scope, inc.stripPrefix.pos) : '';
  const addPrefix = inc.addPrefix ? renderString(inc.addPrefix.val, ctx.scope, inc.addPrefix.pos) : '';
  if (asPaths.length > 0 && (stripPrefix !== '' || addPrefix !== '')) {
    throw new ConfigError('"as" may not be combined with strip_prefix or add_prefix', { pos: inc.pos });
  }

  const incPaths = processPaths(inc.paths, ctx.scope);
  for (const [i, incPath] of incPaths.entries()) {
    const matches = await expandGlobs(ctx.fs, [incPath], fromDir, { skipGlobs });
    const requested = stripTrailingSlash(incPath.val);

    for (const match of matches) {
      let relDst: string;
      if (asPaths.length > 0) {
        // A pattern that expanded to something other than itself keeps the
        // matched names and lands inside the `as` directory.
        const expanded = matches.length !== 1 || requested !== match.rel;
        relDst = expanded ? joinPosix(asPaths[i], match.rel) : asPaths[i];
      } else {
        relDst = prefixedDest(match.rel, stripPrefix, addPrefix, incPath.pos);
      }

      await copyToScratch(ctx, {
        fromDir,
        relSrc: match.rel,
        relDst,
        skipPaths,
        ignore,
        fromDestination,
        pos: incPath.pos,
      });
    }
  }
}

interface CopyToScratchParams {
  fromDir: string;
  relSrc: string;
  relDst: string;
  skipPaths: PosString[];
  ignore: IgnoreFilter;
  fromDestination: boolean;
  pos?: ConfigPos;
}

async function copyToScratch(ctx: StepContext, p: CopyToScratchParams): Promise<void> {
  const absSrc = joinRel(p.fromDir, p.relSrc);
  let srcInfo: FileInfo | null;
  try {
    srcInfo = await lstatIfExists(ctx.fs, absSrc);
  } catch (err) {
    throw new IoError('lstat', absSrc, err, p.pos);
  }
  if (!srcInfo) {
    throw new ConfigError(`include path doesn't exist: "${p.relSrc}"`, { pos: p.pos });
  }
  const skipGlobs = ctx.features?.skipGlobs ?? false;

  try {
    await copyRecursive({
      fs: ctx.fs,
      srcRoot: absSrc,
      dstRoot: joinRel(ctx.scratchDir, p.relDst),
      signal: ctx.signal,
      visitor: (relToSrcRoot, info) => {
        const relToFromDir = joinPosix(p.relSrc, relToSrcRoot);
        for (const skip of p.skipPaths) {
          const matched = skipGlobs ? skip.val === relToFromDir : matchPath(skip.val, relToFromDir);
          if (matched) return { skip: true };
        }
        if (p.ignore.isIgnored(relToFromDir, info.isDirectory())) {
          logger.debug('path ignored', { path: relToFromDir });
          return { skip: true };
        }
        if (p.fromDestination && !info.isDirectory()) {
          ctx.includedFromDest.push(joinPosix(p.relDst, relToSrcRoot));
        }
        // Later includes may replace earlier ones in the scratch directory.
        // Whether the destination may be overwritten is decided at commit.
        return { allowPreexisting: true };
      },
    });
  } catch (err) {
    throw new RenderError(`copying failed: ${errorMessage(err)}`, { pos: p.pos, cause: err });
  }
}
