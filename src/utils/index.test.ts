/**
 * Utility tests
 */

import { describe, it, expect } from 'vitest';
import {
  TIMESTAMP_PATTERN,
  parseTimestamp,
  compareTimestamps,
  timestampToDate,
  formatUtcTimestamp,
  describeType,
} from './index.js';

describe('TIMESTAMP_PATTERN', () => {
  it('should accept integer and decimal timestamps', () => {
    expect(TIMESTAMP_PATTERN.test('1706745600')).toBe(true);
    expect(TIMESTAMP_PATTERN.test('1706745600.000200')).toBe(true);
  });

  it('should reject other strings', () => {
    expect(TIMESTAMP_PATTERN.test('')).toBe(false);
    expect(TIMESTAMP_PATTERN.test('yesterday')).toBe(false);
    expect(TIMESTAMP_PATTERN.test('-1')).toBe(false);
    expect(TIMESTAMP_PATTERN.test('1.')).toBe(false);
  });
});

describe('parseTimestamp', () => {
  it('should parse decimal seconds', () => {
    expect(parseTimestamp('1706745600.5')).toBe(1706745600.5);
  });
});

describe('compareTimestamps', () => {
  it('should compare numerically rather than lexicographically', () => {
    expect(compareTimestamps('9', '10')).toBeLessThan(0);
    expect(compareTimestamps('10', '9')).toBeGreaterThan(0);
    expect(compareTimestamps('1.50', '1.5')).toBe(0);
  });
});

describe('timestampToDate', () => {
  it('should convert seconds to a Date', () => {
    expect(timestampToDate('1706745600').toISOString()).toBe('2024-02-01T00:00:00.000Z');
  });
});

describe('formatUtcTimestamp', () => {
  it('should format with second precision and a UTC suffix', () => {
    expect(formatUtcTimestamp('1706745600')).toBe('2024-02-01 00:00:00 UTC');
  });

  it('should drop the sub-second part', () => {
    expect(formatUtcTimestamp('1706789045.250000')).toBe('2024-02-01 12:04:05 UTC');
  });
});

describe('describeType', () => {
  it('should name JSON value types', () => {
    expect(describeType(null)).toBe('null');
    expect(describeType([])).toBe('array');
    expect(describeType({})).toBe('object');
    expect(describeType('x')).toBe('string');
    expect(describeType(3)).toBe('number');
  });
});
