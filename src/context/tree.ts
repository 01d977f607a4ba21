/**
 * Directory Tree - the shape of what survived the walk, and its text view.
 */

export type TreeNodeKind = 'dir' | 'file' | 'symlink';

export interface TreeNode {
  name: string;
  /** Path relative to the walk root, `/`-separated; '' for the root itself */
  path: string;
  kind: TreeNodeKind;
  /** Directories only; leaves keep an empty array */
  children: TreeNode[];
  /** Symlinks: the link text as read from disk */
  linkTarget?: string;
  /** Directory reached again through a symlink while already open; not descended */
  cyclic?: boolean;
}

export interface TreeOptions {
  /** Label for the first line (default: root node name) */
  rootLabel?: string;
  /** Show directories with nothing under them (default: true) */
  showEmptyDirs?: boolean;
}

export interface TreeCounts {
  dirs: number;
  files: number;
  symlinks: number;
}

export function createDirNode(name: string, path: string): TreeNode {
  return { name, path, kind: 'dir', children: [] };
}

export function createLeafNode(name: string, path: string, kind: 'file' | 'symlink', linkTarget?: string): TreeNode {
  return linkTarget === undefined
    ? { name, path, kind, children: [] }
    : { name, path, kind, children: [], linkTarget };
}

/** Count every node below the root. */
export function countTree(root: TreeNode): TreeCounts {
  const counts: TreeCounts = { dirs: 0, files: 0, symlinks: 0 };
  const stack = [...root.children];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    if (node.kind === 'dir') {
      counts.dirs++;
      stack.push(...node.children);
    } else if (node.kind === 'file') {
      counts.files++;
    } else {
      counts.symlinks++;
    }
  }
  return counts;
}

/**
 * Render the tree as lines:
 *
 *   project/
 *   ├── src/
 *   │   └── index.ts
 *   └── README.md
 */
export function renderTreeLines(root: TreeNode, options: TreeOptions = {}): string[] {
  const { rootLabel = root.name, showEmptyDirs = true } = options;
  return [`${rootLabel}/`, ...treeHelper(root, '', showEmptyDirs)];
}

function* treeHelper(dir: TreeNode, prefix: string, showEmptyDirs: boolean): Generator<string> {
  const visible = showEmptyDirs ? dir.children : dir.children.filter(hasContent);

  for (let i = 0; i < visible.length; i++) {
    const node = visible[i];
    const isLast = i === visible.length - 1;
    const connector = isLast ? '└── ' : '├── ';
    const childPrefix = isLast ? '    ' : '│   ';

    yield `${prefix}${connector}${label(node)}`;

    if (node.kind === 'dir') {
      yield* treeHelper(node, `${prefix}${childPrefix}`, showEmptyDirs);
    }
  }
}

function label(node: TreeNode): string {
  if (node.kind === 'dir') return node.cyclic ? `${node.name}/ (cycle)` : `${node.name}/`;
  if (node.kind === 'symlink' && node.linkTarget !== undefined) return `${node.name} -> ${node.linkTarget}`;
  return node.name;
}

function hasContent(node: TreeNode): boolean {
  if (node.kind !== 'dir' || node.cyclic) return true;
  return node.children.some(hasContent);
}
