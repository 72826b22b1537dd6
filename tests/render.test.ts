import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createHash } from 'node:crypto';
import {
  render,
  NodeFs,
  ErrorFs,
  gitBlobHasher,
  SCRATCH_DIR_PREFIX,
  IoError,
  OverwriteConflictError,
  RenderError,
  StepError,
  findError,
  type RenderParams,
  type Step,
} from '../src/index.js';
import { makeTmpDir, rmTmpDir, writeTree, readTree, rejection, BufferSink, S, Ss, fs, path } from './helpers.js';

let tmpDir: string;
let templateDir: string;
let destDir: string;
let tempDirBase: string;
let backupDir: string;
let out: BufferSink;

function sha256(s: string): string {
  return createHash('sha256').update(s).digest('hex');
}

const includeAll: Step = { action: 'include', params: { paths: [{ paths: Ss('.') }] } };
const templateAll: Step = { action: 'go_template', params: { paths: Ss('.') } };

function params(steps: Step[], overrides: Partial<RenderParams> = {}): RenderParams {
  return {
    spec: { steps },
    templateDir,
    destDir,
    inputs: { pkg: 'app', name: 'Demo' },
    tempDirBase,
    backupDir,
    stdout: out,
    ...overrides,
  };
}

beforeEach(() => {
  tmpDir = makeTmpDir();
  templateDir = path.join(tmpDir, 'template');
  destDir = path.join(tmpDir, 'dest');
  tempDirBase = path.join(tmpDir, 'tmp');
  backupDir = path.join(tmpDir, 'backups');
  fs.mkdirSync(tempDirBase);
  out = new BufferSink();
  writeTree(templateDir, {
    'spec.yaml': 'desc: demo',
    'main.go': 'package {{pkg}}',
    'README.md': '# {{name}}',
  });
});

afterEach(() => {
  rmTmpDir(tmpDir);
});

// ---------------------------------------------------------------------------
// Successful renders
// ---------------------------------------------------------------------------

describe('render', () => {
  it('renders a template into a new directory', async () => {
    const result = await render(params([includeAll, templateAll]));
    expect(readTree(destDir)).toEqual({ 'main.go': 'package app', 'README.md': '# Demo' });
    expect(Object.fromEntries(result.outputHashes)).toEqual({
      'main.go': sha256('package app'),
      'README.md': sha256('# Demo'),
    });
    expect(result.includedFromDest).toEqual([]);
    expect(result.backupDir).toBeUndefined();
  });

  it('removes the scratch directory afterwards', async () => {
    await render(params([includeAll]));
    expect(fs.readdirSync(tempDirBase)).toEqual([]);
  });

  it('can keep the scratch directory', async () => {
    await render(params([includeAll], { keepTempDirs: true }));
    const left = fs.readdirSync(tempDirBase);
    expect(left).toHaveLength(1);
    expect(left[0].startsWith(SCRATCH_DIR_PREFIX)).toBe(true);
    expect(readTree(path.join(tempDirBase, left[0]))).toEqual({ 'main.go': 'package {{pkg}}', 'README.md': '# {{name}}' });
  });

  it('print steps see the destination', async () => {
    await render(params([{ action: 'print', params: { message: S('wrote {{name}} to {{_flag_dest}}') } }]));
    expect(out.text).toBe(`wrote Demo to ${destDir}\n`);
  });

  it('uses the given hasher', async () => {
    writeTree(templateDir, { 'main.go': 'hello\n' });
    const result = await render(params([includeAll], { hasher: gitBlobHasher }));
    expect(result.outputHashes.get('main.go')).toBe('ce013625030ba8dba906f756967f9e9ca394464a');
  });

  it('spec ignore patterns replace the defaults', async () => {
    writeTree(templateDir, { '.DS_Store': 'junk' });
    await render({ ...params([includeAll]), spec: { steps: [includeAll], ignore: Ss('*.md') } });
    expect(readTree(destDir)).toEqual({ '.DS_Store': 'junk', 'main.go': 'package {{pkg}}' });
  });

  it('the default ignore patterns can be replaced by the caller', async () => {
    writeTree(templateDir, { '.DS_Store': 'junk' });
    await render(params([includeAll], { defaultIgnorePatterns: ['README.md'] }));
    expect(readTree(destDir)).toEqual({ '.DS_Store': 'junk', 'main.go': 'package {{pkg}}' });
  });
});

// ---------------------------------------------------------------------------
// Existing destination files
// ---------------------------------------------------------------------------

describe('existing destination files', () => {
  beforeEach(() => {
    writeTree(destDir, { 'main.go': 'old', 'CHANGELOG.md': 'v1\n' });
  });

  it('are not overwritten by default, and nothing is written', async () => {
    const err = await rejection(RenderError, render(params([includeAll, templateAll])));
    expect(err.message).toBe(
      'failed writing to the destination directory: destination file "main.go" already exists and overwriting was not enabled',
    );
    expect(findError(err, OverwriteConflictError)?.path).toBe('main.go');
    expect(readTree(destDir)).toEqual({ 'main.go': 'old', 'CHANGELOG.md': 'v1\n' });
    expect(fs.readdirSync(tempDirBase)).toEqual([]);
  });

  it('are overwritten with forceOverwrite', async () => {
    await render(params([includeAll, templateAll], { forceOverwrite: true }));
    expect(readTree(destDir)).toEqual({ 'main.go': 'package app', 'README.md': '# Demo', 'CHANGELOG.md': 'v1\n' });
  });

  it('are backed up first when asked', async () => {
    const result = await render(params([includeAll, templateAll], { forceOverwrite: true, backups: true }));
    const dir = result.backupDir ?? '';
    expect(path.dirname(dir)).toBe(backupDir);
    expect(readTree(dir)).toEqual({ 'main.go': 'old' });
  });

  it('may be modified in place once included from the destination', async () => {
    const result = await render(
      params([
        { action: 'include', params: { paths: [{ paths: Ss('CHANGELOG.md'), from: 'destination' }] } },
        { action: 'append', params: { paths: Ss('CHANGELOG.md'), with: S('v2') } },
      ]),
    );
    expect(readTree(destDir)).toEqual({ 'main.go': 'old', 'CHANGELOG.md': 'v1\nv2\n' });
    expect(result.includedFromDest).toEqual(['CHANGELOG.md']);
  });
});

// ---------------------------------------------------------------------------
// Failures
// ---------------------------------------------------------------------------

describe('render failures', () => {
  it('a failed step leaves the destination alone', async () => {
    const err = await rejection(
      StepError,
      render(params([includeAll, { action: 'go_template', params: { paths: Ss('missing.txt') } }])),
    );
    expect(err.stepIndex).toBe(1);
    expect(fs.existsSync(destDir)).toBe(false);
    expect(fs.readdirSync(tempDirBase)).toEqual([]);
  });

  it('reports a scratch directory that cannot be created', async () => {
    const rfs = new ErrorFs(new NodeFs(), { mkdirTemp: new Error('no space') });
    const err = await rejection(IoError, render(params([includeAll], { fs: rfs })));
    expect(err.message).toBe(`mkdirTemp(${tempDirBase}): no space`);
  });

  it('reports a scratch directory that cannot be removed', async () => {
    const rfs = new ErrorFs(new NodeFs(), { removeAll: new Error('busy') });
    const err = await rejection(IoError, render(params([includeAll], { fs: rfs })));
    expect(err.op).toBe('removeAll');
    expect(err.message.endsWith('): busy')).toBe(true);
  });

  it('stops when aborted', async () => {
    const controller = new AbortController();
    const reason = new Error('cancelled');
    controller.abort(reason);
    await expect(render(params([includeAll], { signal: controller.signal }))).rejects.toBe(reason);
    expect(fs.existsSync(destDir)).toBe(false);
  });
});
