/**
 * Environment-driven configuration.
 *
 * Every value the CLI layer would normally pass in has a default here, so
 * library callers only override what they care about:
 *
 * - TMPLCRAFT_LOG_LEVEL - winston level (error, warn, info, debug, ...)
 * - TMPLCRAFT_BACKUP_DIR - where overwritten destination files are backed up
 * - TMPLCRAFT_TEMP_DIR - parent of the scratch directory
 * - TMPLCRAFT_KEEP_TEMP_DIRS=1 - leave scratch directories behind for debugging
 */

import { homedir, tmpdir } from 'node:os';
import { join } from 'node:path';

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Config {
  logLevel: LogLevel;
  /** True when the level was chosen explicitly rather than defaulted. */
  logLevelExplicit: boolean;
  backupDir: string;
  tempDirBase: string;
  keepTempDirs: boolean;
}

/**
 * Files and directories never copied by an include, unless the template
 * declares its own ignore list. Matched gitignore-style against each entry.
 */
export const DEFAULT_IGNORE_PATTERNS: readonly string[] = Object.freeze(['.DS_Store', '.bin', '.ssh', '.git']);

/** Name of the spec file at the template root; never copied into the output. */
export const SPEC_FILE_NAME = 'spec.yaml';

/** Reserved for golden-test fixtures inside a template; never copied into the output. */
export const GOLDEN_TEST_DIR = 'testdata/golden';

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function truthy(value: string | undefined): boolean {
  return value === '1' || value?.toLowerCase() === 'true';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<Config> {
  const rawLevel = env.TMPLCRAFT_LOG_LEVEL?.trim().toLowerCase();
  const explicit = rawLevel !== undefined && isLogLevel(rawLevel);
  let logLevel: LogLevel = DEFAULT_LOG_LEVEL;
  if (rawLevel !== undefined && isLogLevel(rawLevel)) {
    logLevel = rawLevel;
  } else if (env.NODE_ENV === 'test' || env.VITEST) {
    logLevel = 'error';
  }

  return Object.freeze({
    logLevel,
    logLevelExplicit: explicit,
    backupDir: env.TMPLCRAFT_BACKUP_DIR || join(homedir(), '.tmplcraft', 'backups'),
    tempDirBase: env.TMPLCRAFT_TEMP_DIR || tmpdir(),
    keepTempDirs: truthy(env.TMPLCRAFT_KEEP_TEMP_DIRS),
  });
}
