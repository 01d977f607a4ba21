/**
 * Pattern Set - gitignore-style rules compiled to regular expressions.
 *
 * One PatternSet per source (builtin defaults, a .gitignore, a preset, CLI patterns).
 * Rules are immutable once compiled; the resolver decides precedence between them.
 */

export interface PatternRule {
  /** Line as written in its source */
  readonly raw: string;
  /** Label of the PatternSet this rule came from */
  readonly source: string;
  /** `!pattern`: a match re-includes the path */
  readonly negated: boolean;
  /** Trailing `/`: only directories can match */
  readonly dirOnly: boolean;
  /** Leading or inner `/`: matched against the whole relative path */
  readonly anchored: boolean;
  readonly regex: RegExp;
}

export interface PatternSet {
  readonly source: string;
  readonly rules: readonly PatternRule[];
}

export function splitPatternLines(text: string): string[] {
  return text.split(/\r?\n/);
}

/**
 * Compile pattern lines into a PatternSet, keeping their order.
 * Blank lines and `#` comments are dropped; nothing here throws.
 */
export function parsePatterns(lines: Iterable<string>, source: string = 'inline'): PatternSet {
  const rules: PatternRule[] = [];
  for (const line of lines) {
    const rule = compileRule(line, source);
    if (rule) rules.push(rule);
  }
  return Object.freeze({ source, rules: Object.freeze(rules) });
}

/** Compile one line. Returns null for blanks, comments and patterns that can never match. */
export function compileRule(line: string, source: string = 'inline'): PatternRule | null {
  let glob = stripTrailingSpaces(line);
  if (!glob.trim() || glob.startsWith('#')) return null;

  const negated = glob.startsWith('!');
  if (negated) glob = glob.slice(1);

  const dirOnly = glob.endsWith('/');
  if (dirOnly) glob = glob.slice(0, -1);

  const anchored = glob.includes('/');
  if (glob.startsWith('/')) glob = glob.slice(1);
  if (!glob) return null;

  const prefix = anchored ? '^' : '(?:^|/)';
  let regex: RegExp;
  try {
    regex = new RegExp(`${prefix}${translateGlob(glob)}$`);
  } catch {
    // e.g. a reversed range like [z-a]: fall back to the literal text
    regex = new RegExp(`${prefix}${escapeRegex(glob)}$`);
  }

  return Object.freeze({ raw: line, source, negated, dirOnly, anchored, regex });
}

/**
 * Does the rule match this root-relative path? Polarity is ignored here;
 * the caller reads `rule.negated`.
 */
export function matchesRule(rule: PatternRule, relativePath: string, isDir: boolean): boolean {
  if (rule.dirOnly && !isDir) return false;
  return rule.regex.test(normalizeRelative(relativePath));
}

export function normalizeRelative(relativePath: string): string {
  let p = relativePath;
  while (p.startsWith('./')) p = p.slice(2);
  while (p.length > 1 && p.endsWith('/')) p = p.slice(0, -1);
  return p;
}

function stripTrailingSpaces(line: string): string {
  let end = line.length;
  while (end > 0 && (line[end - 1] === ' ' || line[end - 1] === '\r')) {
    // `\ ` keeps the escaped space
    if (end >= 2 && line[end - 2] === '\\' && line[end - 1] === ' ') break;
    end--;
  }
  return line.slice(0, end);
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function translateGlob(glob: string): string {
  let out = '';
  let i = 0;

  while (i < glob.length) {
    const ch = glob[i];

    if (ch === '*') {
      let j = i;
      while (glob[j] === '*') j++;
      const wholeSegment = j - i >= 2 && (i === 0 || glob[i - 1] === '/') && (j === glob.length || glob[j] === '/');

      if (!wholeSegment) {
        out += '[^/]*';
        i = j;
      } else if (j === glob.length) {
        out += '.*';
        i = j;
      } else {
        // `**/` at the start or `/**/` inside: zero or more directories
        out += '(?:.*/)?';
        i = j + 1;
      }
      continue;
    }

    if (ch === '?') {
      out += '[^/]';
      i++;
      continue;
    }

    if (ch === '[') {
      const cls = readClass(glob, i);
      if (cls) {
        out += cls.source;
        i = cls.end;
      } else {
        out += '\\[';
        i++;
      }
      continue;
    }

    if (ch === '\\' && i + 1 < glob.length) {
      out += escapeRegex(glob[i + 1]);
      i += 2;
      continue;
    }

    out += escapeRegex(ch);
    i++;
  }

  return out;
}

/** `[:name:]` inside a bracket expression, as regex class bodies (ASCII only) */
const POSIX_CLASSES = new Map<string, string>([
  ['alnum', 'a-zA-Z0-9'],
  ['alpha', 'a-zA-Z'],
  ['blank', ' \\t'],
  ['cntrl', '\\x00-\\x1f\\x7f'],
  ['digit', '0-9'],
  ['graph', '!-~'],
  ['lower', 'a-z'],
  ['print', ' -~'],
  ['punct', '!-\\/:-@\\[-`{-~'],
  ['space', ' \\t\\n\\r\\f\\v'],
  ['upper', 'A-Z'],
  ['xdigit', '0-9A-Fa-f'],
]);

/** Read a `[...]` class starting at `start`; null when it is unbalanced or names an unknown `[:class:]`. */
function readClass(glob: string, start: number): { source: string; end: number } | null {
  let j = start + 1;
  let negate = false;
  if (glob[j] === '!' || glob[j] === '^') {
    negate = true;
    j++;
  }

  let body = '';
  if (glob[j] === ']') {
    body += '\\]';
    j++;
  }

  while (j < glob.length && glob[j] !== ']') {
    const c = glob[j];
    if (c === '/') return null;
    if (c === '[' && glob[j + 1] === ':') {
      const close = glob.indexOf(':]', j + 2);
      const named = close < 0 ? undefined : POSIX_CLASSES.get(glob.slice(j + 2, close));
      if (named === undefined) return null;
      body += named;
      j = close + 2;
      continue;
    }
    if (c === '\\' && j + 1 < glob.length) {
      body += escapeClassChar(glob[j + 1]);
      j += 2;
      continue;
    }
    body += c === '-' ? c : escapeClassChar(c);
    j++;
  }

  if (j >= glob.length || !body) return null;
  // A class never matches the separator
  return { source: negate ? `[^/${body}]` : `(?!/)[${body}]`, end: j + 1 };
}

function escapeClassChar(c: string): string {
  return '\\^-[]'.includes(c) ? `\\${c}` : c;
}
