/**
 * Path Sandbox Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, realpathSync, rmSync, symlinkSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { PathSandbox, canonicalizePath, isWithinRoot } from '../../src/integrations/path-sandbox.js';
import { SandboxViolationError } from '../../src/errors/index.js';

describe('PathSandbox', () => {
  let base: string;
  let root: string;
  let outside: string;
  let sandbox: PathSandbox;

  beforeEach(() => {
    base = realpathSync(mkdtempSync(join(tmpdir(), 'tidecode-sandbox-')));
    root = join(base, 'workspace');
    outside = join(base, 'outside');
    mkdirSync(join(root, 'src'), { recursive: true });
    mkdirSync(outside);
    writeFileSync(join(root, 'src', 'index.ts'), 'export {};\n');
    writeFileSync(join(outside, 'secret.txt'), 'test-secret\n');
    sandbox = new PathSandbox(root);
  });

  afterEach(() => {
    rmSync(base, { recursive: true, force: true });
  });

  it('resolves paths inside the workspace', () => {
    expect(sandbox.resolve('src/index.ts')).toBe(join(root, 'src', 'index.ts'));
    expect(sandbox.resolve('.')).toBe(root);
    expect(sandbox.resolve('src/../src/index.ts')).toBe(join(root, 'src', 'index.ts'));
  });

  it('resolves paths that do not exist yet', () => {
    expect(sandbox.resolve('new/dir/file.txt')).toBe(join(root, 'new', 'dir', 'file.txt'));
  });

  it('accepts absolute paths inside the workspace', () => {
    expect(sandbox.resolve(join(root, 'src'))).toBe(join(root, 'src'));
  });

  it('rejects parent traversal', () => {
    expect(() => sandbox.resolve('../outside/secret.txt')).toThrow(SandboxViolationError);
    expect(() => sandbox.resolve('src/../../outside')).toThrow(SandboxViolationError);
  });

  it('rejects absolute paths outside the workspace', () => {
    expect(() => sandbox.resolve(join(outside, 'secret.txt'))).toThrow(SandboxViolationError);
  });

  it('rejects a sibling directory that shares the root as a prefix', () => {
    mkdirSync(`${root}-other`);
    expect(() => sandbox.resolve(`${root}-other`)).toThrow(SandboxViolationError);
  });

  it('rejects symlinks that point outside', () => {
    symlinkSync(outside, join(root, 'escape'));
    expect(() => sandbox.resolve('escape/secret.txt')).toThrow(SandboxViolationError);
  });

  it('rejects dangling symlinks that point outside', () => {
    symlinkSync(join(outside, 'not-yet.txt'), join(root, 'dangling'));
    expect(() => sandbox.resolve('dangling')).toThrow(SandboxViolationError);
  });

  it('follows symlinks that stay inside', () => {
    symlinkSync(join(root, 'src', 'index.ts'), join(root, 'alias.ts'));
    expect(sandbox.resolve('alias.ts')).toBe(join(root, 'src', 'index.ts'));
  });

  it('rejects symlink loops', () => {
    symlinkSync('loop', join(root, 'loop'));
    expect(() => sandbox.resolve('loop')).toThrow(SandboxViolationError);
  });

  it('reports the resolved location in the error', () => {
    try {
      sandbox.resolve('../outside/secret.txt');
      expect.unreachable('resolve should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(SandboxViolationError);
      if (error instanceof SandboxViolationError) {
        expect(error.resolvedPath).toBe(join(outside, 'secret.txt'));
        expect(error.root).toBe(root);
      }
    }
  });

  it('formats workspace-relative paths', () => {
    expect(sandbox.relative(root)).toBe('.');
    expect(sandbox.relative(join(root, 'src', 'index.ts'))).toBe('src/index.ts');
  });

  it('checks containment', () => {
    expect(sandbox.contains(join(root, 'src'))).toBe(true);
    expect(sandbox.contains(outside)).toBe(false);
  });
});

describe('isWithinRoot', () => {
  it('is an inclusive prefix check on path segments', () => {
    expect(isWithinRoot('/ws', '/ws')).toBe(true);
    expect(isWithinRoot('/ws/a/b', '/ws')).toBe(true);
    expect(isWithinRoot('/ws-other', '/ws')).toBe(false);
    expect(isWithinRoot('/etc', '/ws')).toBe(false);
    expect(isWithinRoot('/anything', '/')).toBe(true);
  });
});

describe('canonicalizePath', () => {
  it('keeps the missing tail of a path', () => {
    const base = realpathSync(tmpdir());
    expect(canonicalizePath(join(base, 'tidecode-missing', 'a', '..', 'b.txt'))).toBe(
      join(base, 'tidecode-missing', 'b.txt')
    );
  });
});
