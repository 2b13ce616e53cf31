/**
 * Channel pattern tests
 */

import { describe, it, expect } from 'vitest';
import { globToRegex, filterByPattern } from './pattern.js';

describe('globToRegex', () => {
  it('should match everything with a lone star', () => {
    expect(globToRegex('*').test('general')).toBe(true);
  });

  it('should anchor the pattern', () => {
    expect(globToRegex('help').test('help')).toBe(true);
    expect(globToRegex('help').test('help-desk')).toBe(false);
    expect(globToRegex('help').test('rivet-help')).toBe(false);
  });

  it('should treat ? as a single character', () => {
    expect(globToRegex('team-?').test('team-a')).toBe(true);
    expect(globToRegex('team-?').test('team-ab')).toBe(false);
  });

  it('should support character classes', () => {
    expect(globToRegex('dev-[ab]').test('dev-a')).toBe(true);
    expect(globToRegex('dev-[ab]').test('dev-c')).toBe(false);
    expect(globToRegex('dev-[!ab]').test('dev-c')).toBe(true);
  });

  it('should escape regex metacharacters', () => {
    expect(globToRegex('a.b').test('a.b')).toBe(true);
    expect(globToRegex('a.b').test('axb')).toBe(false);
    expect(globToRegex('c++').test('c++')).toBe(true);
  });

  it('should treat an unclosed bracket literally', () => {
    expect(globToRegex('x[').test('x[')).toBe(true);
  });
});

describe('filterByPattern', () => {
  it('should return sorted matches', () => {
    expect(filterByPattern(['random', 'help-b', 'help-a', 'general'], 'help*')).toEqual([
      'help-a',
      'help-b',
    ]);
  });

  it('should return an empty list when nothing matches', () => {
    expect(filterByPattern(['general'], 'ops-*')).toEqual([]);
  });
});
