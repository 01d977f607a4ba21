/**
 * Ignore Resolver - merges every pattern source into one ordered rule list.
 *
 * Precedence, lowest first:
 *   builtin defaults < .gitignore < preset < extra (CLI) patterns
 *
 * The last matching rule across the whole concatenation decides, so a later
 * `!pattern` can re-include what an earlier source excluded.
 */

import { existsSync, readFileSync } from 'fs';
import { join, resolve } from 'path';
import { ConfigurationError, describeError } from './errors.js';
import { matchesRule, parsePatterns, splitPatternLines, type PatternRule, type PatternSet } from './patterns.js';
import { DEFAULT_IGNORES, PRESET_NAMES, getPreset } from './presets.js';

export interface ResolverOptions {
  /** Root directory; `<root>/.gitignore` is read when no explicit file is given */
  root: string;
  /** Builtin always-ignore rules (default: DEFAULT_IGNORES) */
  defaults?: readonly string[];
  /** Explicit gitignore file; must be readable */
  gitignorePath?: string;
  /** false: no gitignore rules at all, even if a file exists (default: true) */
  useGitignore?: boolean;
  /** Preset name, see PRESET_NAMES */
  preset?: string;
  /** Highest-precedence patterns */
  extraPatterns?: readonly string[];
}

export interface IgnoreDecision {
  ignored: boolean;
  /** The rule that decided; absent when nothing matched */
  rule?: PatternRule;
}

export interface SetBoundary {
  source: string;
  /** Index of the set's first rule in `IgnoreResolver.rules` */
  start: number;
  /** One past the set's last rule */
  end: number;
}

export class IgnoreResolver {
  readonly rules: readonly PatternRule[];
  readonly boundaries: readonly SetBoundary[];

  constructor(sets: readonly PatternSet[]) {
    const rules: PatternRule[] = [];
    const boundaries: SetBoundary[] = [];
    for (const set of sets) {
      const start = rules.length;
      rules.push(...set.rules);
      boundaries.push({ source: set.source, start, end: rules.length });
    }
    this.rules = Object.freeze(rules);
    this.boundaries = Object.freeze(boundaries);
  }

  decide(relativePath: string, isDir: boolean): IgnoreDecision {
    // Walking backwards, the first match is the last one in precedence order
    for (let i = this.rules.length - 1; i >= 0; i--) {
      const rule = this.rules[i];
      if (matchesRule(rule, relativePath, isDir)) {
        return { ignored: !rule.negated, rule };
      }
    }
    return { ignored: false };
  }

  isIgnored(relativePath: string, isDir: boolean): boolean {
    return this.decide(relativePath, isDir).ignored;
  }
}

/**
 * Build the resolver for a run. Throws ConfigurationError for an unknown preset
 * or an unreadable explicit gitignore file.
 */
export function buildResolver(options: ResolverOptions): IgnoreResolver {
  const { root, defaults = DEFAULT_IGNORES, preset, extraPatterns = [] } = options;

  let presetPatterns: readonly string[] = [];
  if (preset !== undefined) {
    const found = getPreset(preset);
    if (!found) {
      throw new ConfigurationError(`Unknown preset: ${preset} (available: ${PRESET_NAMES.join(', ')})`);
    }
    presetPatterns = found;
  }

  return new IgnoreResolver([
    parsePatterns(defaults, 'defaults'),
    parsePatterns(readGitignoreLines(root, options), 'gitignore'),
    parsePatterns(presetPatterns, preset ? `preset:${preset.trim().toLowerCase()}` : 'preset'),
    parsePatterns(extraPatterns, 'extra'),
  ]);
}

function readGitignoreLines(root: string, options: ResolverOptions): string[] {
  if (options.useGitignore === false) return [];

  if (options.gitignorePath !== undefined) {
    const explicit = resolve(options.gitignorePath);
    try {
      return splitPatternLines(readFileSync(explicit, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(`Cannot read gitignore file: ${explicit} (${describeError(error)})`, { cause: error });
    }
  }

  const discovered = join(resolve(root), '.gitignore');
  if (!existsSync(discovered)) return [];
  try {
    return splitPatternLines(readFileSync(discovered, 'utf-8'));
  } catch (error) {
    console.warn(`Warning: Could not read ${discovered}: ${describeError(error)}`);
    return [];
  }
}
