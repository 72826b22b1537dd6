import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createHash } from 'node:crypto';
import {
  NodeFs,
  ErrorFs,
  copyRecursive,
  copyFile,
  sha256Hasher,
  gitBlobHasher,
  IoError,
  OverwriteConflictError,
  SymlinkForbiddenError,
  type BackupDirMaker,
  type CopyHint,
} from '../src/index.js';
import { makeTmpDir, rmTmpDir, writeTree, readTree, modeOf, rejection, fs, path } from './helpers.js';

const nodeFs = new NodeFs();
let tmpDir: string;
let src: string;
let dst: string;

function sha256(s: string): string {
  return createHash('sha256').update(s).digest('hex');
}

const overwrite = (): CopyHint => ({ allowPreexisting: true });
const overwriteWithBackup = (): CopyHint => ({ allowPreexisting: true, backupIfExists: true });

function backupMaker(): BackupDirMaker {
  return async (rfs) => {
    const parent = path.join(tmpDir, 'backups');
    await rfs.mkdirAll(parent);
    return rfs.mkdirTemp(parent, '');
  };
}

beforeEach(() => {
  tmpDir = makeTmpDir();
  src = path.join(tmpDir, 'src');
  dst = path.join(tmpDir, 'dst');
  writeTree(src, { 'a.txt': 'hello', 'sub/b.txt': 'world' });
});

afterEach(() => {
  rmTmpDir(tmpDir);
});

// ---------------------------------------------------------------------------
// Plain copies
// ---------------------------------------------------------------------------

describe('copyRecursive', () => {
  it('copies a tree into a new directory', async () => {
    const result = await copyRecursive({ fs: nodeFs, srcRoot: src, dstRoot: dst });
    expect(readTree(dst)).toEqual({ 'a.txt': 'hello', 'sub/b.txt': 'world' });
    expect(result.hashes.size).toBe(0);
    expect(result.backupDir).toBeUndefined();
  });

  it('returns a hash per file', async () => {
    const { hashes } = await copyRecursive({ fs: nodeFs, srcRoot: src, dstRoot: dst, hasher: sha256Hasher });
    expect(Object.fromEntries(hashes)).toEqual({
      'a.txt': sha256('hello'),
      'sub/b.txt': sha256('world'),
    });
  });

  it('hashes as git blob ids', async () => {
    writeTree(src, { 'a.txt': 'hello\n' });
    const { hashes } = await copyRecursive({ fs: nodeFs, srcRoot: src, dstRoot: dst, hasher: gitBlobHasher });
    expect(hashes.get('a.txt')).toBe('ce013625030ba8dba906f756967f9e9ca394464a');
  });

  it('does not create empty directories', async () => {
    fs.mkdirSync(path.join(src, 'empty'));
    await copyRecursive({ fs: nodeFs, srcRoot: src, dstRoot: dst });
    expect(fs.existsSync(path.join(dst, 'empty'))).toBe(false);
    expect(fs.existsSync(path.join(dst, 'sub'))).toBe(true);
  });

  it('carries permission bits over', async () => {
    writeTree(src, { 'run.sh': { content: '#!/bin/sh\n', mode: 0o755 }, 'secret.txt': { content: 's', mode: 0o600 } });
    await copyRecursive({ fs: nodeFs, srcRoot: src, dstRoot: dst });
    expect(modeOf(path.join(dst, 'run.sh'))).toBe(0o755);
    expect(modeOf(path.join(dst, 'secret.txt'))).toBe(0o600);
  });

  it('copies a single file to a new path', async () => {
    const out = path.join(tmpDir, 'out', 'nested', 'copy.txt');
    const { hashes } = await copyRecursive({
      fs: nodeFs,
      srcRoot: path.join(src, 'a.txt'),
      dstRoot: out,
      hasher: sha256Hasher,
    });
    expect(fs.readFileSync(out, 'utf8')).toBe('hello');
    expect([...hashes.keys()]).toEqual(['.']);
  });

  it('is idempotent when overwriting is allowed', async () => {
    writeTree(src, { 'run.sh': { content: '#!/bin/sh\n', mode: 0o755 } });
    await copyRecursive({ fs: nodeFs, srcRoot: src, dstRoot: dst, visitor: overwrite });
    await copyRecursive({ fs: nodeFs, srcRoot: src, dstRoot: dst, visitor: overwrite });
    expect(readTree(dst)).toEqual({ 'a.txt': 'hello', 'run.sh': '#!/bin/sh\n', 'sub/b.txt': 'world' });
    expect(modeOf(path.join(dst, 'run.sh'))).toBe(0o755);
    expect(modeOf(path.join(dst, 'a.txt'))).toBe(modeOf(path.join(src, 'a.txt')));
  });
});

// ---------------------------------------------------------------------------
// Visitor policy
// ---------------------------------------------------------------------------

describe('visitor hints', () => {
  it('visits directories before their contents', async () => {
    const visited: string[] = [];
    await copyRecursive({
      fs: nodeFs,
      srcRoot: src,
      dstRoot: dst,
      visitor: (rel) => {
        visited.push(rel);
        return {};
      },
    });
    expect(visited).toEqual(['.', 'a.txt', 'sub', 'sub/b.txt']);
  });

  it('skipping a directory skips everything below it', async () => {
    const visited: string[] = [];
    await copyRecursive({
      fs: nodeFs,
      srcRoot: src,
      dstRoot: dst,
      visitor: (rel) => {
        visited.push(rel);
        return { skip: rel === 'sub' };
      },
    });
    expect(visited).toEqual(['.', 'a.txt', 'sub']);
    expect(readTree(dst)).toEqual({ 'a.txt': 'hello' });
  });

  it('refuses to overwrite by default', async () => {
    writeTree(dst, { 'a.txt': 'old' });
    const err = await rejection(OverwriteConflictError, copyRecursive({ fs: nodeFs, srcRoot: src, dstRoot: dst }));
    expect(err.message).toBe('destination file "a.txt" already exists and overwriting was not enabled');
    expect(err.path).toBe('a.txt');
    expect(fs.readFileSync(path.join(dst, 'a.txt'), 'utf8')).toBe('old');
  });

  it('overwrites when allowed', async () => {
    writeTree(dst, { 'a.txt': 'old', 'keep.txt': 'k' });
    await copyRecursive({ fs: nodeFs, srcRoot: src, dstRoot: dst, visitor: overwrite });
    expect(readTree(dst)).toEqual({ 'a.txt': 'hello', 'keep.txt': 'k', 'sub/b.txt': 'world' });
  });

  it('backs up files before overwriting them', async () => {
    writeTree(dst, { 'sub/b.txt': 'old world' });
    const result = await copyRecursive({
      fs: nodeFs,
      srcRoot: src,
      dstRoot: dst,
      visitor: overwriteWithBackup,
      backupDirMaker: backupMaker(),
    });
    expect(readTree(dst)).toEqual({ 'a.txt': 'hello', 'sub/b.txt': 'world' });
    expect(result.backupDir).toBeDefined();
    const backupDir = result.backupDir ?? '';
    expect(path.dirname(backupDir)).toBe(path.join(tmpDir, 'backups'));
    expect(readTree(backupDir)).toEqual({ 'sub/b.txt': 'old world' });
    expect(modeOf(path.join(backupDir, 'sub', 'b.txt'))).toBe(0o600);
  });

  it('creates no backup directory when nothing is overwritten', async () => {
    const result = await copyRecursive({
      fs: nodeFs,
      srcRoot: src,
      dstRoot: dst,
      visitor: overwriteWithBackup,
      backupDirMaker: backupMaker(),
    });
    expect(result.backupDir).toBeUndefined();
    expect(fs.existsSync(path.join(tmpDir, 'backups'))).toBe(false);
  });

  it('backs up a single-file copy under the destination name', async () => {
    const out = path.join(tmpDir, 'out.txt');
    fs.writeFileSync(out, 'previous');
    const result = await copyRecursive({
      fs: nodeFs,
      srcRoot: path.join(src, 'a.txt'),
      dstRoot: out,
      visitor: overwriteWithBackup,
      backupDirMaker: backupMaker(),
    });
    expect(readTree(result.backupDir ?? '')).toEqual({ 'out.txt': 'previous' });
  });

  it('backing up without a backup directory maker fails', async () => {
    writeTree(dst, { 'a.txt': 'old' });
    const err = await rejection(
      IoError,
      copyRecursive({ fs: nodeFs, srcRoot: src, dstRoot: dst, visitor: overwriteWithBackup }),
    );
    expect(err.op).toBe('backUp');
    expect(err.message).toBe(`backUp(${path.join(dst, 'a.txt')}): no backup directory was configured`);
  });
});

// ---------------------------------------------------------------------------
// Dry runs
// ---------------------------------------------------------------------------

describe('dry run', () => {
  it('writes nothing but still hashes', async () => {
    const { hashes } = await copyRecursive({
      fs: nodeFs,
      srcRoot: src,
      dstRoot: dst,
      dryRun: true,
      hasher: sha256Hasher,
    });
    expect(fs.existsSync(dst)).toBe(false);
    expect(hashes.get('sub/b.txt')).toBe(sha256('world'));
  });

  it('reports the same conflicts as a real copy', async () => {
    writeTree(dst, { 'a.txt': 'old' });
    await expect(copyRecursive({ fs: nodeFs, srcRoot: src, dstRoot: dst, dryRun: true })).rejects.toThrow(
      OverwriteConflictError,
    );
  });

  it('makes no backups', async () => {
    writeTree(dst, { 'a.txt': 'old' });
    const result = await copyRecursive({
      fs: nodeFs,
      srcRoot: src,
      dstRoot: dst,
      dryRun: true,
      visitor: overwriteWithBackup,
      backupDirMaker: backupMaker(),
    });
    expect(result.backupDir).toBeUndefined();
    expect(fs.readFileSync(path.join(dst, 'a.txt'), 'utf8')).toBe('old');
  });

  it('detects a file where a directory is needed', async () => {
    writeTree(dst, { sub: 'i am a file' });
    writeTree(src, { 'sub/deeper/c.txt': 'c' });
    const err = await rejection(
      OverwriteConflictError,
      copyRecursive({ fs: nodeFs, srcRoot: src, dstRoot: dst, dryRun: true, visitor: overwrite }),
    );
    expect(err.message).toBe(`cannot overwrite a file with a directory of the same name, "${path.join(dst, 'sub')}"`);
  });
});

// ---------------------------------------------------------------------------
// Failures
// ---------------------------------------------------------------------------

describe('copy failures', () => {
  it('rejects symlinks anywhere in the source', async () => {
    fs.symlinkSync(path.join(src, 'a.txt'), path.join(src, 'sub', 'link'));
    const err = await rejection(SymlinkForbiddenError, copyRecursive({ fs: nodeFs, srcRoot: src, dstRoot: dst }));
    expect(err.path).toBe('sub/link');
    expect(err.message).toBe('a symlink was found at "sub/link", but symlinks are forbidden here');
  });

  it('refuses to replace a directory with a file', async () => {
    fs.mkdirSync(path.join(dst, 'a.txt'), { recursive: true });
    const err = await rejection(
      OverwriteConflictError,
      copyRecursive({ fs: nodeFs, srcRoot: src, dstRoot: dst, visitor: overwrite }),
    );
    expect(err.message).toBe('cannot overwrite a directory with a file of the same name, "a.txt"');
  });

  it('wraps write failures', async () => {
    const efs = new ErrorFs(nodeFs, { writeFile: new Error('disk full') });
    const err = await rejection(IoError, copyRecursive({ fs: efs, srcRoot: src, dstRoot: dst }));
    expect(err.op).toBe('writeFile');
    expect(err.message).toBe(`writeFile(${path.join(dst, 'a.txt')}): disk full`);
  });

  it('stops when the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('cancelled'));
    await expect(
      copyRecursive({ fs: nodeFs, srcRoot: src, dstRoot: dst, signal: controller.signal }),
    ).rejects.toThrow('cancelled');
    expect(fs.existsSync(dst)).toBe(false);
  });
});

describe('copyFile', () => {
  it('replaces the destination and sets its mode', async () => {
    const to = path.join(tmpDir, 'to.txt');
    fs.writeFileSync(to, 'before');
    fs.chmodSync(to, 0o644);
    const digest = await copyFile(nodeFs, path.join(src, 'a.txt'), to, { mode: 0o600, hasher: sha256Hasher });
    expect(digest).toBe(sha256('hello'));
    expect(fs.readFileSync(to, 'utf8')).toBe('hello');
    expect(modeOf(to)).toBe(0o600);
  });

  it('wraps read failures with the spec position', async () => {
    const err = await rejection(
      IoError,
      copyFile(nodeFs, path.join(src, 'missing'), path.join(tmpDir, 'x'), { pos: { line: 2, column: 4 } }),
    );
    expect(err.op).toBe('readFile');
    expect(err.message.startsWith(`at line 2 column 4: readFile(${path.join(src, 'missing')}): ENOENT`)).toBe(true);
  });
});
