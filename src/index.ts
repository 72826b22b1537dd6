/**
 * tmplcraft: renders template directories into destination trees.
 *
 * A template is a directory of files plus a list of steps. Steps copy files
 * into a scratch directory and rewrite them there; when every step has
 * succeeded the scratch directory is committed to the destination.
 *
 * @example
 * ```ts
 * import { render, posStrings } from 'tmplcraft';
 *
 * const result = await render({
 *   templateDir: '/path/to/template',
 *   destDir: '/path/to/output',
 *   inputs: { service_name: 'billing' },
 *   spec: {
 *     steps: [
 *       { action: 'include', params: { paths: [{ paths: posStrings(['.']) }] } },
 *       { action: 'go_template', params: { paths: posStrings(['main.go']) } },
 *     ],
 *   },
 * });
 * console.log(result.outputHashes);
 * ```
 */

// Rendering
export { render, SCRATCH_DIR_PREFIX, type RenderParams, type RenderResult } from './render.js';
export { executeSteps } from './actions/steps.js';
export {
  withScope,
  type ExpressionEvaluator,
  type PrintSink,
  type StepContext,
} from './actions/context.js';

// Individual actions
export { actionAppend } from './actions/append.js';
export { actionStringReplace, replaceBytes } from './actions/string-replace.js';
export { actionRegexReplace } from './actions/regex-replace.js';
export { actionRegexNameLookup } from './actions/regex-name-lookup.js';
export { actionGoTemplate } from './actions/go-template.js';
export { actionInclude, prefixedDest } from './actions/include.js';
export { actionPrint } from './actions/print.js';
export { actionForEach, type StepRunner } from './actions/for-each.js';

// Step model
export type {
  ActionName,
  AppendParams,
  Features,
  ForEachIterator,
  ForEachParams,
  GoTemplateParams,
  IncludeParams,
  IncludePath,
  IncludeSource,
  PrintParams,
  RegexNameLookupParams,
  RegexReplaceParams,
  RegexReplacement,
  Step,
  StringReplaceParams,
  StringReplacement,
  TemplateSpec,
} from './model.js';

// Engine pieces (usable standalone)
export {
  copyRecursive,
  copyFile,
  type CopyHint,
  type CopyVisitor,
  type CopyParams,
  type CopyResult,
  type CopyFileOptions,
  type BackupDirMaker,
} from './copy.js';
export { walkAndModify, processPaths, transformText, bytesEqual, type Transform, type WalkModifyContext } from './walk-modify.js';
export { expandGlobs, matchPath, matchSegment, hasGlobMeta, type ConcretePath, type ExpandGlobsOptions } from './glob.js';
export { IgnoreFilter } from './ignore.js';
export {
  compilePattern,
  expandReplacement,
  maxSubgroupRef,
  findAll,
  groupSpan,
  groupIndex,
  type CompiledPattern,
} from './regex.js';
export { topoSort } from './graph.js';

// Variables and templates
export { Scope } from './scope.js';
export { renderString, renderAll, renderPosString } from './template.js';
export { defaultHelpers, toSnakeCase, toHyphenCase, replaceN, type TemplateHelper } from './funcs.js';

// Filesystem
export {
  NodeFs,
  ErrorFs,
  walkDir,
  isNotExistError,
  statIfExists,
  lstatIfExists,
  permBits,
  SKIP_DIR,
  OWNER_RW_PERMS,
  OWNER_RWX_PERMS,
  type RenderFs,
  type FileInfo,
  type InjectedErrors,
  type WalkVisitor,
} from './fs.js';
export { sha256Hasher, gitBlobHasher, type ContentHasher, type HasherFactory } from './hash.js';

// Paths
export { safeRelPath, joinRel, joinPosix, toRelPosix, basenamePosix } from './paths.js';

// Configuration and logging
export {
  loadConfig,
  DEFAULT_IGNORE_PATTERNS,
  DEFAULT_LOG_LEVEL,
  SPEC_FILE_NAME,
  GOLDEN_TEST_DIR,
  LOG_LEVELS,
  type Config,
  type LogLevel,
} from './config.js';
export { getLogger, setLogLevel } from './logger.js';

// Types and errors
export {
  posStrings,
  errorMessage,
  findError,
  RenderError,
  PathTraversalError,
  BackslashInGlobError,
  NoGlobMatchError,
  UnknownVarError,
  SymlinkForbiddenError,
  OverwriteConflictError,
  IoError,
  ConfigError,
  StepError,
  CycleError,
  type ConfigPos,
  type PosString,
  type RenderErrorOptions,
} from './types.js';
