/**
 * Tree Walker - depth-first traversal of the root, consulting the resolver at
 * every entry. Ignored directories are pruned before descent.
 */

import { readdirSync, readlinkSync, realpathSync, statSync, type Dirent, type Stats } from 'fs';
import { basename, join, resolve } from 'path';
import { describeError } from './errors.js';
import type { IgnoreResolver } from './resolver.js';
import { createDirNode, createLeafNode, type TreeNode } from './tree.js';

export interface WalkOptions {
    /** Walk dotfiles and dot-directories (default: false) */
    includeHidden?: boolean;
    /** Descend into symlinked directories and read symlinked files (default: false) */
    followSymlinks?: boolean;
}

export type EntryKind = 'file' | 'dir' | 'symlink';

export interface WalkEntry {
    /** Relative to the walk root, `/`-separated */
    path: string;
    absolutePath: string;
    kind: EntryKind;
    /** 1 for direct children of the root */
    depth: number;
}

/** An entry the walker could not stat or list. */
export interface SkippedEntry {
    path: string;
    reason: string;
}

export interface WalkResult {
    /** Files eligible for classification, in traversal order */
    candidates: WalkEntry[];
    tree: TreeNode;
    skipped: SkippedEntry[];
    /** Directory entries looked at, pruned ones included */
    visited: number;
}

interface WalkContext {
    resolver: IgnoreResolver;
    includeHidden: boolean;
    followSymlinks: boolean;
    candidates: WalkEntry[];
    skipped: SkippedEntry[];
    /** Real paths of the directories currently open on the traversal stack */
    open: Set<string>;
    visited: number;
}

export function walkTree(root: string, resolver: IgnoreResolver, options: WalkOptions = {}): WalkResult {
    const absRoot = resolve(root);
    const tree = createDirNode(basename(absRoot), '');
    const ctx: WalkContext = {
        resolver,
        includeHidden: options.includeHidden ?? false,
        followSymlinks: options.followSymlinks ?? false,
        candidates: [],
        skipped: [],
        open: new Set(),
        visited: 0,
    };

    try {
        ctx.open.add(realpathSync(absRoot));
    } catch (error) {
        ctx.skipped.push({ path: '.', reason: describeError(error) });
        return { candidates: [], tree, skipped: ctx.skipped, visited: 0 };
    }

    walkDir(absRoot, '', 1, tree, ctx);

    return { candidates: ctx.candidates, tree, skipped: ctx.skipped, visited: ctx.visited };
}

/** Byte-wise name order, the same on every platform and locale. */
function compareNames(a: Dirent, b: Dirent): number {
    if (a.name < b.name) return -1;
    if (a.name > b.name) return 1;
    return 0;
}

function walkDir(absDir: string, relDir: string, depth: number, node: TreeNode, ctx: WalkContext): void {
    let entries: Dirent[];
    try {
        entries = readdirSync(absDir, { withFileTypes: true });
    } catch (error) {
        ctx.skipped.push({ path: relDir || '.', reason: describeError(error) });
        return;
    }

    entries.sort(compareNames);

    for (const entry of entries) {
        ctx.visited++;
        const absPath = join(absDir, entry.name);
        const relPath = relDir ? `${relDir}/${entry.name}` : entry.name;

        // Independent of the ignore rules: a dot-directory takes its subtree with it
        if (!ctx.includeHidden && entry.name.startsWith('.')) continue;

        if (entry.isSymbolicLink()) {
            visitSymlink(entry.name, absPath, relPath, depth, node, ctx);
            continue;
        }

        const isDir = entry.isDirectory();
        if (ctx.resolver.isIgnored(relPath, isDir)) continue;

        if (isDir) {
            descend(entry.name, absPath, relPath, depth, node, ctx);
            continue;
        }

        // FIFOs, sockets and devices are candidates too; the classifier turns them away
        node.children.push(createLeafNode(entry.name, relPath, 'file'));
        ctx.candidates.push({ path: relPath, absolutePath: absPath, kind: 'file', depth });
    }
}

function visitSymlink(
    name: string,
    absPath: string,
    relPath: string,
    depth: number,
    parent: TreeNode,
    ctx: WalkContext
): void {
    let linkTarget: string | undefined;
    try {
        linkTarget = readlinkSync(absPath);
    } catch (error) {
        ctx.skipped.push({ path: relPath, reason: describeError(error) });
        return;
    }

    let target: Stats | undefined;
    try {
        target = statSync(absPath);
    } catch (error) {
        if (ctx.followSymlinks) {
            // Dangling or unreachable: nothing to follow
            ctx.skipped.push({ path: relPath, reason: describeError(error) });
            return;
        }
    }

    const isDir = target?.isDirectory() ?? false;
    if (ctx.resolver.isIgnored(relPath, isDir)) return;

    if (!ctx.followSymlinks) {
        parent.children.push(createLeafNode(name, relPath, 'symlink', linkTarget));
        return;
    }

    if (isDir) {
        descend(name, absPath, relPath, depth, parent, ctx);
        return;
    }

    parent.children.push(createLeafNode(name, relPath, 'symlink', linkTarget));
    ctx.candidates.push({ path: relPath, absolutePath: absPath, kind: 'symlink', depth });
}

function descend(
    name: string,
    absPath: string,
    relPath: string,
    depth: number,
    parent: TreeNode,
    ctx: WalkContext
): void {
    let real: string;
    try {
        real = realpathSync(absPath);
    } catch (error) {
        ctx.skipped.push({ path: relPath, reason: describeError(error) });
        return;
    }

    const child = createDirNode(name, relPath);
    parent.children.push(child);

    if (ctx.open.has(real)) {
        child.cyclic = true;
        return;
    }

    ctx.open.add(real);
    walkDir(absPath, relPath, depth + 1, child, ctx);
    ctx.open.delete(real);
}
