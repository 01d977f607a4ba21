import { describe, it, expect, afterEach, vi } from 'vitest';
import { loadConfig, CONFIG_TEMPLATE } from '../../../src/config/config.js';
import { ConfigurationError } from '../../../src/context/errors.js';
import { writeFileSync, mkdirSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

// ── Helpers ─────────────────────────────────────────────────────────────────

const TEST_DIR = join(tmpdir(), 'ctxbundle-config-test-' + Date.now());

function writeConfig(filename: string, content: unknown): string {
  mkdirSync(TEST_DIR, { recursive: true });
  const filepath = join(TEST_DIR, filename);
  writeFileSync(filepath, typeof content === 'string' ? content : JSON.stringify(content), 'utf-8');
  return filepath;
}

// ── Tests ───────────────────────────────────────────────────────────────────

describe('loadConfig', () => {
  afterEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  // ── File loading ──────────────────────────────────────────────────────────

  it('throws if config file does not exist', () => {
    expect(() => loadConfig('/nonexistent/path/config.json'))
      .toThrow('Config file not found');
  });

  it('throws ConfigurationError on invalid JSON', () => {
    const path = writeConfig('bad.json', '{ not valid json }');
    expect(() => loadConfig(path)).toThrow(ConfigurationError);
    expect(() => loadConfig(path)).toThrow('Invalid JSON');
  });

  it('throws if config is an array', () => {
    const path = writeConfig('array.json', [1, 2, 3]);
    expect(() => loadConfig(path)).toThrow('must contain a JSON object');
  });

  it('throws if config is a string', () => {
    const path = writeConfig('string.json', '"hello"');
    expect(() => loadConfig(path)).toThrow('must contain a JSON object');
  });

  it('loads a valid empty config', () => {
    const path = writeConfig('empty.json', {});
    expect(loadConfig(path)).toEqual({});
  });

  // ── Fields ────────────────────────────────────────────────────────────────

  it('loads every field', () => {
    const path = writeConfig('full.json', {
      root: '/abs/project',
      gitignore: '/abs/project/.gitignore',
      useGitignore: false,
      preset: 'node',
      ignore: ['*.log', '!keep.log'],
      includeHidden: true,
      followSymlinks: true,
      maxFileSize: '500k',
      encoding: 'latin1',
      output: '/abs/out.md',
      stdout: false,
      format: 'txt',
      absolutePaths: true,
      showEmptyDirs: false,
      quiet: true,
      verbose: false,
    });

    expect(loadConfig(path)).toEqual({
      root: '/abs/project',
      gitignore: '/abs/project/.gitignore',
      useGitignore: false,
      preset: 'node',
      ignore: ['*.log', '!keep.log'],
      includeHidden: true,
      followSymlinks: true,
      maxFileSize: '500k',
      encoding: 'latin1',
      output: '/abs/out.md',
      stdout: false,
      format: 'txt',
      absolutePaths: true,
      showEmptyDirs: false,
      quiet: true,
      verbose: false,
    });
  });

  it('resolves relative paths from the config file directory', () => {
    const path = writeConfig('paths.json', { root: 'src', gitignore: '../.gitignore', output: 'out/bundle.md' });
    const config = loadConfig(path);

    expect(config.root).toBe(join(TEST_DIR, 'src'));
    expect(config.gitignore).toBe(join(TEST_DIR, '..', '.gitignore'));
    expect(config.output).toBe(join(TEST_DIR, 'out', 'bundle.md'));
  });

  it('accepts maxFileSize as a byte count', () => {
    const path = writeConfig('size.json', { maxFileSize: 2048 });
    expect(loadConfig(path).maxFileSize).toBe(2048);
  });

  // ── Type validation ───────────────────────────────────────────────────────

  it('throws on a non-string root', () => {
    const path = writeConfig('bad-root.json', { root: 42 });
    expect(() => loadConfig(path)).toThrow('Config "root" must be a string');
  });

  it('throws on a non-boolean flag', () => {
    const path = writeConfig('bad-flag.json', { includeHidden: 'yes' });
    expect(() => loadConfig(path)).toThrow('Config "includeHidden" must be a boolean');
  });

  it('throws when ignore is not an array of strings', () => {
    expect(() => loadConfig(writeConfig('bad-ignore-1.json', { ignore: '*.log' })))
      .toThrow('Config "ignore" must be an array of strings');
    expect(() => loadConfig(writeConfig('bad-ignore-2.json', { ignore: ['*.log', 3] })))
      .toThrow('Config "ignore" must be an array of strings');
  });

  it('throws on a negative or fractional maxFileSize', () => {
    expect(() => loadConfig(writeConfig('neg.json', { maxFileSize: -1 }))).toThrow('Config "maxFileSize"');
    expect(() => loadConfig(writeConfig('frac.json', { maxFileSize: 1.5 }))).toThrow('Config "maxFileSize"');
  });

  // ── Unknown keys ──────────────────────────────────────────────────────────

  it('warns about unknown keys and ignores them', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const path = writeConfig('unknown.json', { format: 'md', colour: 'blue', depth: 3 });

    expect(loadConfig(path)).toEqual({ format: 'md' });
    expect(warnSpy).toHaveBeenCalledWith('Warning: Unknown config keys ignored: colour, depth');
  });

  it('does not warn when every key is known', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    loadConfig(writeConfig('known.json', { quiet: true }));
    expect(warnSpy).not.toHaveBeenCalled();
  });
});

describe('CONFIG_TEMPLATE', () => {
  afterEach(() => {
    rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it('loads back through loadConfig without errors', () => {
    const path = writeConfig('template.json', CONFIG_TEMPLATE);
    const config = loadConfig(path);

    expect(config.root).toBe(TEST_DIR);
    expect(config.maxFileSize).toBe('1m');
    expect(config.format).toBe('md');
    expect(config.showEmptyDirs).toBe(true);
  });
});
