export { validateRoot, gatherContext, DEFAULT_MAX_FILE_SIZE, DEFAULT_ENCODING } from './gather.js';
export type { GatherOptions, GatherResult } from './gather.js';

// Pattern sets and resolution
export { parsePatterns, compileRule, matchesRule, splitPatternLines } from './patterns.js';
export type { PatternRule, PatternSet } from './patterns.js';
export { IgnoreResolver, buildResolver } from './resolver.js';
export type { ResolverOptions, IgnoreDecision, SetBoundary } from './resolver.js';
export { DEFAULT_IGNORES, PRESETS, PRESET_NAMES, getPreset, isPresetName } from './presets.js';
export type { PresetName } from './presets.js';

// Traversal
export { walkTree } from './walker.js';
export type { WalkOptions, WalkEntry, WalkResult, SkippedEntry, EntryKind } from './walker.js';

// Tree
export { renderTreeLines, countTree, createDirNode, createLeafNode } from './tree.js';
export type { TreeNode, TreeNodeKind, TreeOptions, TreeCounts } from './tree.js';

// Classification
export { classifyFile, sniffBinary, decodeText, assertEncoding, SNIFF_BYTES, BINARY_THRESHOLD } from './classify.js';
export type { FileVerdict, IncludedVerdict, SkippedVerdict, VerdictStatus, DecodeResult, DecodeMode, ClassifyOptions } from './classify.js';

// Rendering
export { renderBundle, languageFor, formatTimestamp, fenceFor, isBundleFormat, BUNDLE_FORMATS } from './render.js';
export type { BundleFormat, RenderOptions } from './render.js';

export { ConfigurationError, describeError } from './errors.js';
