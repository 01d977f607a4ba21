/**
 * Context Gatherer - full pipeline:
 *
 * 1. Validate configuration (root, size limit, encoding, preset, gitignore)
 * 2. Build the ignore resolver once
 * 3. Walk the root → candidates + tree shape
 * 4. Classify every candidate, in traversal order
 *
 * Only step 1 can throw. Per-entry and per-file problems end up in the result.
 */

import { existsSync, statSync } from 'fs';
import { resolve } from 'path';
import { assertEncoding, classifyFile, type FileVerdict } from './classify.js';
import { ConfigurationError } from './errors.js';
import { buildResolver } from './resolver.js';
import { countTree, type TreeNode } from './tree.js';
import { walkTree, type SkippedEntry } from './walker.js';

export const DEFAULT_MAX_FILE_SIZE = 1024 * 1024;
export const DEFAULT_ENCODING = 'utf-8';

export interface GatherOptions {
  /** Explicit gitignore file (default: `<root>/.gitignore` when present) */
  gitignorePath?: string;
  /** Respect gitignore rules (default: true) */
  useGitignore?: boolean;
  /** Ignore preset name */
  preset?: string;
  /** Extra ignore patterns, highest precedence */
  extraPatterns?: string[];
  /** Builtin always-ignore rules (default: DEFAULT_IGNORES) */
  defaults?: readonly string[];
  /** Include dotfiles and dot-directories (default: false) */
  includeHidden?: boolean;
  /** Follow symlinks (default: false) */
  followSymlinks?: boolean;
  /** Max file size in bytes; larger files are skipped (default: 1 MiB) */
  maxFileSize?: number;
  /** Text encoding tried first (default: utf-8) */
  encoding?: string;
  /** Verbose logging */
  verbose?: boolean;
}

export interface GatherResult {
  /** Absolute root path */
  root: string;
  tree: TreeNode;
  /** One verdict per candidate, in traversal order */
  verdicts: FileVerdict[];
  /** Entries the walker could not stat or list */
  skippedEntries: SkippedEntry[];
  /** Effective limits, for reporting */
  maxFileSize: number;
  encoding: string;
  timing: {
    walkMs: number;
    classifyMs: number;
    totalMs: number;
  };
}

/**
 * Validate that the root exists and is a directory. Returns the absolute path.
 */
export function validateRoot(path: string): string {
  const abs = resolve(path);

  if (!existsSync(abs)) {
    throw new ConfigurationError(`Root does not exist: ${path}\nResolved to: ${abs}`);
  }

  if (!statSync(abs).isDirectory()) {
    throw new ConfigurationError(`Root is not a directory: ${path}\nResolved to: ${abs}`);
  }

  return abs;
}

export function gatherContext(rootPath: string, options: GatherOptions = {}): GatherResult {
  const totalStart = Date.now();
  const { verbose = false } = options;

  // ── Step 1: configuration, fatal on error ────────────────────────────────
  const root = validateRoot(rootPath);

  const maxFileSize = options.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
  if (!Number.isSafeInteger(maxFileSize) || maxFileSize < 0) {
    throw new ConfigurationError(`Invalid max file size: ${maxFileSize}`);
  }
  const encoding = assertEncoding(options.encoding ?? DEFAULT_ENCODING);

  // ── Step 2: resolver ─────────────────────────────────────────────────────
  const resolver = buildResolver({
    root,
    defaults: options.defaults,
    gitignorePath: options.gitignorePath,
    useGitignore: options.useGitignore,
    preset: options.preset,
    extraPatterns: options.extraPatterns,
  });

  if (verbose) {
    const sizes = resolver.boundaries.map(b => `${b.source}=${b.end - b.start}`);
    console.error(`  Ignore rules: ${sizes.join(', ')}`);
  }

  // ── Step 3: walk ─────────────────────────────────────────────────────────
  const walkStart = Date.now();
  const walk = walkTree(root, resolver, {
    includeHidden: options.includeHidden,
    followSymlinks: options.followSymlinks,
  });
  const walkMs = Date.now() - walkStart;

  if (verbose) {
    const counts = countTree(walk.tree);
    console.error(`  Walked ${walk.visited} entries in ${walkMs}ms (${counts.dirs} dirs, ${walk.candidates.length} candidates)`);
    if (walk.skipped.length > 0) {
      console.error(`  Could not read ${walk.skipped.length} entr${walk.skipped.length === 1 ? 'y' : 'ies'}`);
    }
  }

  // ── Step 4: classify ─────────────────────────────────────────────────────
  const classifyStart = Date.now();
  const verdicts = walk.candidates.map(entry => classifyFile(entry, { maxFileSize, encoding }));
  const classifyMs = Date.now() - classifyStart;

  if (verbose) {
    const included = verdicts.filter(v => v.status === 'included');
    const bytes = included.reduce((sum, v) => sum + v.size, 0);
    console.error(`  Included ${included.length} files (${(bytes / 1024).toFixed(1)}KB) in ${classifyMs}ms`);
    console.error(`  Skipped ${verdicts.length - included.length} files`);
  }

  return {
    root,
    tree: walk.tree,
    verdicts,
    skippedEntries: walk.skipped,
    maxFileSize,
    encoding,
    timing: { walkMs, classifyMs, totalMs: Date.now() - totalStart },
  };
}
