// Tests for version parsing and the minimum-version rule

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { formatRequirement, formatVersion, meetsMinimum, parseVersion } from './version.js';
import { ValidationError } from './errors.js';

describe('parseVersion', () => {
  it('should parse a full triple', () => {
    expect(parseVersion('20.11.1')).toEqual({ major: 20, minor: 11, patch: 1 });
  });

  it('should accept a leading v and fill missing parts with 0', () => {
    expect(parseVersion('v18')).toEqual({ major: 18, minor: 0, patch: 0 });
    expect(parseVersion('3.6')).toEqual({ major: 3, minor: 6, patch: 0 });
  });

  it('should ignore pre-release suffixes', () => {
    expect(parseVersion('21.0.0-nightly2023')).toEqual({ major: 21, minor: 0, patch: 0 });
  });

  it('should reject malformed input', () => {
    expect(() => parseVersion('latest')).toThrow(ValidationError);
    expect(() => parseVersion('1.2.3.4')).toThrow(ValidationError);
  });
});

describe('meetsMinimum', () => {
  const minimum = { major: 3, minor: 6 };

  it('should compare (major, minor) lexicographically', () => {
    expect(meetsMinimum({ major: 3, minor: 6, patch: 0 }, minimum)).toBe(true);
    expect(meetsMinimum({ major: 3, minor: 5, patch: 99 }, minimum)).toBe(false);
    expect(meetsMinimum({ major: 4, minor: 0, patch: 0 }, minimum)).toBe(true);
  });

  it('should pass whenever major >= 3 and minor >= 6', () => {
    fc.assert(
      fc.property(fc.integer({ min: 3, max: 100 }), fc.integer({ min: 6, max: 100 }), fc.nat(50), (major, minor, patch) => {
        expect(meetsMinimum({ major, minor, patch }, minimum)).toBe(true);
      })
    );
  });

  it('should fail whenever major < 3', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 2 }), fc.nat(100), fc.nat(50), (major, minor, patch) => {
        expect(meetsMinimum({ major, minor, patch }, minimum)).toBe(false);
      })
    );
  });
});

describe('formatting', () => {
  it('should format versions and requirements', () => {
    expect(formatVersion({ major: 20, minor: 11, patch: 1 })).toBe('20.11.1');
    expect(formatRequirement({ major: 20, minor: 0 })).toBe('20.0+');
  });
});
