/**
 * Rendering a template into a destination directory.
 *
 * Steps run against a scratch directory. Only once every step has succeeded
 * is the scratch directory copied into the destination, and that copy is
 * first rehearsed as a dry run so that a conflict partway through can't
 * leave the destination half-written.
 */

import { DEFAULT_IGNORE_PATTERNS, loadConfig } from './config.js';
import { copyRecursive, type BackupDirMaker } from './copy.js';
import { NodeFs, OWNER_RWX_PERMS, type RenderFs } from './fs.js';
import { sha256Hasher, type HasherFactory } from './hash.js';
import { getLogger } from './logger.js';
import type { TemplateSpec } from './model.js';
import { Scope } from './scope.js';
import { IoError, RenderError, errorMessage } from './types.js';
import type { ExpressionEvaluator, PrintSink, StepContext } from './actions/context.js';
import { executeSteps } from './actions/steps.js';

const logger = getLogger('render');

/** Name prefix of scratch directories. */
export const SCRATCH_DIR_PREFIX = 'tmplcraft-scratch-';

export interface RenderParams {
  /** The template's parsed spec. */
  spec: TemplateSpec;
  /** Directory holding the template's files. */
  templateDir: string;
  destDir: string;
  /** Resolved input variables. */
  inputs?: Record<string, string>;
  fs?: RenderFs;
  /** Allow replacing destination files that weren't included from the destination. */
  forceOverwrite?: boolean;
  /** Back up destination files before replacing them. */
  backups?: boolean;
  /** Parent of the per-render backup directory. Defaults to the configured backup dir. */
  backupDir?: string;
  /** Parent of the scratch directory. Defaults to the configured temp dir. */
  tempDirBase?: string;
  /** Leave the scratch directory behind. Defaults to the configured value. */
  keepTempDirs?: boolean;
  /** Hash for the output manifest. Default SHA-256. */
  hasher?: HasherFactory;
  /** Where print actions write. Default `process.stdout`. */
  stdout?: PrintSink;
  /** Variables visible to print messages only, on top of `_flag_dest`. */
  extraPrintVars?: Record<string, string>;
  /** Ignore list for templates that declare none. Default {@link DEFAULT_IGNORE_PATTERNS}. */
  defaultIgnorePatterns?: readonly string[];
  evaluator?: ExpressionEvaluator;
  debugScratchContents?: boolean;
  signal?: AbortSignal;
}

export interface RenderResult {
  /** Content hash of every file written to the destination, by relative path. */
  outputHashes: Map<string, string>;
  /** Destination-relative paths of files the template pulled from the destination. */
  includedFromDest: string[];
  /** The directory overwritten files were backed up into, if any were. */
  backupDir?: string;
}

/**
 * Collects temporary directories and removes them at the end of a render,
 * unless asked to keep them.
 */
class TempDirRemover {
  private readonly dirs: string[] = [];

  constructor(
    private readonly fs: RenderFs,
    private readonly keep: boolean,
  ) {}

  add(dir: string): void {
    if (dir) this.dirs.push(dir);
  }

  async removeAll(): Promise<void> {
    if (this.keep) {
      logger.warn('keeping temporary directories', { paths: this.dirs });
      return;
    }
    logger.debug('removing temporary directories', { paths: this.dirs });
    const failures: unknown[] = [];
    for (const dir of this.dirs) {
      try {
        await this.fs.removeAll(dir);
      } catch (err) {
        failures.push(new IoError('removeAll', dir, err));
      }
    }
    if (failures.length === 1) throw failures[0];
    if (failures.length > 1) {
      throw new AggregateError(failures, 'failed removing temporary directories');
    }
  }
}

/**
 * Run a template's steps and write the result into `destDir`.
 *
 * Existing destination files are only replaced when they were included
 * from the destination by the template itself or when `forceOverwrite` is
 * set; `backups` saves their old contents first.
 *
 * @throws {StepError} If a step fails; the destination is untouched.
 * @throws {RenderError} If committing to the destination fails.
 */
export async function render(params: RenderParams): Promise<RenderResult> {
  const config = loadConfig();
  const fs = params.fs ?? new NodeFs();
  const remover = new TempDirRemover(fs, params.keepTempDirs ?? config.keepTempDirs);

  let result: RenderResult;
  try {
    result = await renderInScratch(params, fs, remover, params.backupDir ?? config.backupDir, params.tempDirBase ?? config.tempDirBase);
  } catch (err) {
    try {
      await remover.removeAll();
    } catch (cleanupErr) {
      logger.error('cleanup after failed render also failed', { error: errorMessage(cleanupErr) });
    }
    throw err;
  }
  await remover.removeAll();
  return result;
}

async function renderInScratch(
  params: RenderParams,
  fs: RenderFs,
  remover: TempDirRemover,
  backupParent: string,
  tempDirBase: string,
): Promise<RenderResult> {
  let scratchDir: string;
  try {
    scratchDir = await fs.mkdirTemp(tempDirBase, SCRATCH_DIR_PREFIX);
  } catch (err) {
    throw new IoError('mkdirTemp', tempDirBase, err);
  }
  remover.add(scratchDir);
  logger.debug('created scratch directory', { path: scratchDir });

  const ctx: StepContext = {
    fs,
    scope: new Scope(params.inputs ?? {}),
    scratchDir,
    templateDir: params.templateDir,
    destDir: params.destDir,
    features: params.spec.features,
    ignorePatterns: params.spec.ignore ?? [],
    defaultIgnorePatterns: params.defaultIgnorePatterns ?? DEFAULT_IGNORE_PATTERNS,
    stdout: params.stdout ?? process.stdout,
    extraPrintVars: { _flag_dest: params.destDir, ...params.extraPrintVars },
    evaluator: params.evaluator,
    includedFromDest: [],
    debugScratchContents: params.debugScratchContents,
    signal: params.signal,
  };

  await executeSteps(params.spec.steps, ctx);

  const includedFromDest = new Set(ctx.includedFromDest);
  let backupDir: string | undefined;
  // One backup directory per render, shared by the dry run and the real commit.
  const backupDirMaker: BackupDirMaker = async (rfs) => {
    if (backupDir === undefined) {
      await rfs.mkdirAll(backupParent, OWNER_RWX_PERMS);
      backupDir = await rfs.mkdirTemp(backupParent, '');
      logger.debug('created backup directory', { path: backupDir });
    }
    return backupDir;
  };

  let outputHashes = new Map<string, string>();
  for (const dryRun of [true, false]) {
    params.signal?.throwIfAborted();
    try {
      const copied = await copyRecursive({
        fs,
        srcRoot: scratchDir,
        dstRoot: params.destDir,
        dryRun,
        hasher: params.hasher ?? sha256Hasher,
        backupDirMaker,
        signal: params.signal,
        visitor: (relPath) => ({
          backupIfExists: params.backups ?? false,
          // The template pulled these from the destination in order to
          // modify them, so writing them back is always allowed.
          allowPreexisting: includedFromDest.has(relPath) || (params.forceOverwrite ?? false),
        }),
      });
      outputHashes = copied.hashes;
    } catch (err) {
      if (params.signal?.aborted && err === params.signal.reason) throw err;
      throw new RenderError(`failed writing to the destination directory: ${errorMessage(err)}`, { cause: err });
    }
    if (dryRun) {
      logger.debug('template render (dry run) succeeded');
    } else {
      logger.info('template render succeeded', { destination: params.destDir });
    }
  }

  return { outputHashes, includedFromDest: [...includedFromDest].sort(), backupDir };
}
