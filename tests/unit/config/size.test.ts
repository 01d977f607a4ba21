import { describe, it, expect } from 'vitest';
import { parseSize } from '../../../src/config/size.js';
import { ConfigurationError } from '../../../src/context/errors.js';

describe('parseSize', () => {
  it('reads plain byte counts', () => {
    expect(parseSize('4096', 1)).toBe(4096);
    expect(parseSize('0', 1)).toBe(0);
  });

  it('applies binary unit suffixes with an optional b', () => {
    expect(parseSize('500k', 1)).toBe(512000);
    expect(parseSize('500KB', 1)).toBe(512000);
    expect(parseSize('2m', 1)).toBe(2097152);
    expect(parseSize('1g', 1)).toBe(1073741824);
  });

  it('floors fractional values', () => {
    expect(parseSize('1.5k', 1)).toBe(1536);
    expect(parseSize('.5k', 1)).toBe(512);
    expect(parseSize('10.9', 1)).toBe(10);
  });

  it('trims surrounding whitespace', () => {
    expect(parseSize('  1m ', 1)).toBe(1048576);
  });

  it('returns the fallback for empty input', () => {
    expect(parseSize(undefined, 77)).toBe(77);
    expect(parseSize('', 77)).toBe(77);
    expect(parseSize('   ', 77)).toBe(77);
  });

  it('rejects malformed values', () => {
    expect(() => parseSize('abc', 1)).toThrow(ConfigurationError);
    expect(() => parseSize('-5', 1)).toThrow('Invalid size value: "-5"');
    expect(() => parseSize('1 m', 1)).toThrow('Invalid size value: "1 m"');
    expect(() => parseSize('2t', 1)).toThrow('Invalid size value: "2t"');
  });
});
