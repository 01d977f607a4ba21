import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, mkdirSync, writeFileSync, rmSync, symlinkSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { IgnoreResolver, parsePatterns, walkTree } from '../../../src/context/index.js';
import type { TreeNode } from '../../../src/context/index.js';

// Directory whose listing fails with EACCES; empty means none
const unreadable = vi.hoisted(() => ({ dir: '' }));

vi.mock('fs', async (importOriginal) => {
  const actual = await importOriginal<typeof import('fs')>();
  return {
    ...actual,
    readdirSync: (path: unknown, ...rest: unknown[]): unknown => {
      if (unreadable.dir && String(path) === unreadable.dir) {
        throw Object.assign(new Error(`EACCES: permission denied, scandir '${unreadable.dir}'`), { code: 'EACCES' });
      }
      return Reflect.apply(actual.readdirSync, actual, [path, ...rest]);
    },
  };
});

const noRules = new IgnoreResolver([]);

function child(node: TreeNode, name: string): TreeNode | undefined {
  return node.children.find(c => c.name === name);
}

describe('walkTree', () => {
  let fixture: string;

  beforeEach(() => {
    fixture = mkdtempSync(join(tmpdir(), 'ctxbundle-walk-'));
  });

  afterEach(() => {
    rmSync(fixture, { recursive: true, force: true });
    unreadable.dir = '';
  });

  // ── Ordering ──────────────────────────────────────────────────────────────

  it('orders siblings by case-sensitive name', () => {
    for (const name of ['b.txt', 'B.txt', 'a.txt', '_x.txt']) {
      writeFileSync(join(fixture, name), name);
    }

    const { candidates } = walkTree(fixture, noRules);
    expect(candidates.map(c => c.path)).toEqual(['B.txt', '_x.txt', 'a.txt', 'b.txt']);
  });

  it('walks depth-first and records depth', () => {
    mkdirSync(join(fixture, 'a', 'b'), { recursive: true });
    writeFileSync(join(fixture, 'a', 'z.txt'), 'z');
    writeFileSync(join(fixture, 'a', 'b', 'y.txt'), 'y');
    writeFileSync(join(fixture, 'c.txt'), 'c');

    const { candidates } = walkTree(fixture, noRules);

    expect(candidates.map(c => c.path)).toEqual(['a/b/y.txt', 'a/z.txt', 'c.txt']);
    expect(candidates.map(c => c.depth)).toEqual([3, 2, 1]);
    expect(candidates[0].absolutePath).toBe(join(fixture, 'a', 'b', 'y.txt'));
    expect(candidates[0].kind).toBe('file');
  });

  it('mirrors the walk in the tree', () => {
    mkdirSync(join(fixture, 'src'));
    mkdirSync(join(fixture, 'empty'));
    writeFileSync(join(fixture, 'src', 'index.ts'), 'x');

    const { tree } = walkTree(fixture, noRules);

    expect(tree.path).toBe('');
    expect(tree.children.map(c => c.name)).toEqual(['empty', 'src']);
    expect(child(tree, 'empty')?.children).toEqual([]);
    expect(child(tree, 'src')?.children.map(c => c.path)).toEqual(['src/index.ts']);
  });

  // ── Hidden files ──────────────────────────────────────────────────────────

  it('skips dotfiles and dot-directories unless includeHidden is set', () => {
    mkdirSync(join(fixture, '.hidden'));
    writeFileSync(join(fixture, '.hidden', 'x.txt'), 'x');
    writeFileSync(join(fixture, '.env'), 'A=1');
    writeFileSync(join(fixture, 'main.ts'), 'x');

    expect(walkTree(fixture, noRules).candidates.map(c => c.path)).toEqual(['main.ts']);
    expect(walkTree(fixture, noRules, { includeHidden: true }).candidates.map(c => c.path))
      .toEqual(['.env', '.hidden/x.txt', 'main.ts']);
  });

  // ── Pruning ───────────────────────────────────────────────────────────────

  it('prunes ignored directories; a negation cannot reach inside', () => {
    mkdirSync(join(fixture, 'build'));
    writeFileSync(join(fixture, 'build', 'keep.txt'), 'k');
    writeFileSync(join(fixture, 'main.ts'), 'x');
    const resolver = new IgnoreResolver([parsePatterns(['build/', '!build/keep.txt'])]);

    const { candidates, tree } = walkTree(fixture, resolver);

    expect(candidates.map(c => c.path)).toEqual(['main.ts']);
    expect(child(tree, 'build')).toBeUndefined();
  });

  it('counts pruned entries as visited but never looks inside them', () => {
    mkdirSync(join(fixture, 'build'));
    writeFileSync(join(fixture, 'build', 'a.txt'), 'a');
    writeFileSync(join(fixture, 'build', 'b.txt'), 'b');
    const resolver = new IgnoreResolver([parsePatterns(['build/'])]);

    expect(walkTree(fixture, resolver).visited).toBe(1);
  });

  // ── Symlinks ──────────────────────────────────────────────────────────────

  it('records symlinks as leaves when not following them', () => {
    mkdirSync(join(fixture, 'real'));
    writeFileSync(join(fixture, 'real', 'f.txt'), 'f');
    writeFileSync(join(fixture, 'target.txt'), 't');
    symlinkSync(join(fixture, 'real'), join(fixture, 'link'));
    symlinkSync('target.txt', join(fixture, 'alias.txt'));

    const { candidates, tree } = walkTree(fixture, noRules);

    expect(candidates.map(c => c.path)).toEqual(['real/f.txt', 'target.txt']);
    expect(child(tree, 'link')).toEqual({
      name: 'link',
      path: 'link',
      kind: 'symlink',
      children: [],
      linkTarget: join(fixture, 'real'),
    });
    expect(child(tree, 'alias.txt')?.kind).toBe('symlink');
  });

  it('descends into symlinked directories when following', () => {
    mkdirSync(join(fixture, 'real'));
    writeFileSync(join(fixture, 'real', 'f.txt'), 'f');
    symlinkSync(join(fixture, 'real'), join(fixture, 'link'));

    const { candidates } = walkTree(fixture, noRules, { followSymlinks: true });

    expect(candidates.map(c => c.path)).toEqual(['link/f.txt', 'real/f.txt']);
  });

  it('makes symlinked files candidates when following', () => {
    writeFileSync(join(fixture, 'target.txt'), 't');
    symlinkSync('target.txt', join(fixture, 'alias.txt'));

    const { candidates } = walkTree(fixture, noRules, { followSymlinks: true });

    expect(candidates.map(c => [c.path, c.kind])).toEqual([
      ['alias.txt', 'symlink'],
      ['target.txt', 'file'],
    ]);
  });

  it('treats a link back to an ancestor as a cyclic leaf', () => {
    mkdirSync(join(fixture, 'real'));
    writeFileSync(join(fixture, 'real', 'f.txt'), 'f');
    symlinkSync(fixture, join(fixture, 'real', 'loop'));

    const { candidates, tree } = walkTree(fixture, noRules, { followSymlinks: true });

    expect(candidates.map(c => c.path)).toEqual(['real/f.txt']);
    const real = child(tree, 'real');
    const loop = real ? child(real, 'loop') : undefined;
    expect(loop?.kind).toBe('dir');
    expect(loop?.cyclic).toBe(true);
    expect(loop?.children).toEqual([]);
  });

  it('terminates on mutually linked directories', () => {
    mkdirSync(join(fixture, 'a'));
    mkdirSync(join(fixture, 'b'));
    writeFileSync(join(fixture, 'a', 'fa.txt'), 'a');
    writeFileSync(join(fixture, 'b', 'fb.txt'), 'b');
    symlinkSync(join(fixture, 'b'), join(fixture, 'a', 'link_to_b'));
    symlinkSync(join(fixture, 'a'), join(fixture, 'b', 'link_to_a'));

    const { candidates } = walkTree(fixture, noRules, { followSymlinks: true });

    expect(candidates.map(c => c.path)).toEqual([
      'a/fa.txt',
      'a/link_to_b/fb.txt',
      'b/fb.txt',
      'b/link_to_a/fa.txt',
    ]);
  });

  it('applies directory-only rules to symlinked directories', () => {
    mkdirSync(join(fixture, 'real'));
    writeFileSync(join(fixture, 'real', 'f.txt'), 'f');
    symlinkSync(join(fixture, 'real'), join(fixture, 'vendor'));
    const resolver = new IgnoreResolver([parsePatterns(['vendor/'])]);

    const { candidates, tree } = walkTree(fixture, resolver, { followSymlinks: true });

    expect(candidates.map(c => c.path)).toEqual(['real/f.txt']);
    expect(child(tree, 'vendor')).toBeUndefined();
  });

  // ── Entry errors ──────────────────────────────────────────────────────────

  it('records a dangling symlink as skipped when following, and keeps walking', () => {
    symlinkSync(join(fixture, 'missing'), join(fixture, 'dangling'));
    writeFileSync(join(fixture, 'z.txt'), 'z');

    const { candidates, skipped } = walkTree(fixture, noRules, { followSymlinks: true });

    expect(candidates.map(c => c.path)).toEqual(['z.txt']);
    expect(skipped).toHaveLength(1);
    expect(skipped[0].path).toBe('dangling');
    expect(skipped[0].reason.startsWith('ENOENT')).toBe(true);
  });

  it('keeps a dangling symlink as a leaf when not following', () => {
    symlinkSync(join(fixture, 'missing'), join(fixture, 'dangling'));

    const { candidates, skipped, tree } = walkTree(fixture, noRules);

    expect(candidates).toEqual([]);
    expect(skipped).toEqual([]);
    expect(child(tree, 'dangling')?.kind).toBe('symlink');
  });

  it('records a directory it cannot list and walks its siblings', () => {
    mkdirSync(join(fixture, 'locked'));
    writeFileSync(join(fixture, 'locked', 'secret.txt'), 's');
    writeFileSync(join(fixture, 'z.txt'), 'z');
    unreadable.dir = join(fixture, 'locked');

    const { candidates, skipped, tree } = walkTree(fixture, noRules);

    expect(candidates.map(c => c.path)).toEqual(['z.txt']);
    expect(skipped).toEqual([
      { path: 'locked', reason: `EACCES: permission denied, scandir '${join(fixture, 'locked')}'` },
    ]);
    expect(child(tree, 'locked')?.children).toEqual([]);
  });

  it('records the root itself when it cannot be listed', () => {
    writeFileSync(join(fixture, 'a.txt'), 'a');
    unreadable.dir = fixture;

    const { candidates, skipped } = walkTree(fixture, noRules);

    expect(candidates).toEqual([]);
    expect(skipped.map(s => s.path)).toEqual(['.']);
  });

  it('is repeatable on an unchanged tree', () => {
    mkdirSync(join(fixture, 'src', 'lib'), { recursive: true });
    writeFileSync(join(fixture, 'src', 'lib', 'a.ts'), 'a');
    writeFileSync(join(fixture, 'src', 'b.ts'), 'b');
    writeFileSync(join(fixture, 'README.md'), 'r');

    const first = walkTree(fixture, noRules);
    const second = walkTree(fixture, noRules);

    expect(second.candidates).toEqual(first.candidates);
    expect(second.tree).toEqual(first.tree);
  });
});
