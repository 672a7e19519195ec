import { describe, it, expect } from 'vitest';
import {
  clampConfidence,
  coerceCategory,
  coerceSeverity,
  coerceStringList,
  coerceText,
  isRecord,
  uniqueStrings,
} from './coercion-rules.js';

describe('coerceCategory', () => {
  it('keeps a vocabulary label as-is', () => {
    expect(coerceCategory('syntax_error')).toBe('syntax_error');
  });

  it('normalizes case, spaces and hyphens', () => {
    expect(coerceCategory('  Missing Package ')).toBe('missing_package');
    expect(coerceCategory('version-conflict')).toBe('version_conflict');
  });

  it('maps out-of-vocabulary labels to unknown', () => {
    expect(coerceCategory('compiler_bug')).toBe('unknown');
  });

  it('maps non-strings to unknown', () => {
    expect(coerceCategory(42)).toBe('unknown');
    expect(coerceCategory(undefined)).toBe('unknown');
  });
});

describe('coerceSeverity', () => {
  it('lower-cases a valid severity', () => {
    expect(coerceSeverity('CRITICAL')).toBe('critical');
  });

  it('defaults invalid or missing severity to medium', () => {
    expect(coerceSeverity('catastrophic')).toBe('medium');
    expect(coerceSeverity(null)).toBe('medium');
  });
});

describe('clampConfidence', () => {
  it('clamps values above 1 to 1', () => {
    expect(clampConfidence(1.4)).toBe(1);
  });

  it('clamps values below 0 to 0', () => {
    expect(clampConfidence(-0.2)).toBe(0);
  });

  it('keeps in-range values', () => {
    expect(clampConfidence(0.42)).toBe(0.42);
  });

  it('parses numeric strings', () => {
    expect(clampConfidence(' 0.8 ')).toBe(0.8);
    expect(clampConfidence('3')).toBe(1);
  });

  it('treats non-numeric values as 0', () => {
    expect(clampConfidence('high')).toBe(0);
    expect(clampConfidence(Number.NaN)).toBe(0);
    expect(clampConfidence(undefined)).toBe(0);
    expect(clampConfidence('')).toBe(0);
  });

  it('clamps infinities to the nearest bound', () => {
    expect(clampConfidence(Number.POSITIVE_INFINITY)).toBe(1);
    expect(clampConfidence(Number.NEGATIVE_INFINITY)).toBe(0);
  });
});

describe('coerceText', () => {
  it('trims strings', () => {
    expect(coerceText('  hello ')).toBe('hello');
  });

  it('stringifies numbers and booleans', () => {
    expect(coerceText(3)).toBe('3');
    expect(coerceText(false)).toBe('false');
  });

  it('falls back for blank or non-scalar values', () => {
    expect(coerceText('   ', 'n/a')).toBe('n/a');
    expect(coerceText({ a: 1 }, 'n/a')).toBe('n/a');
    expect(coerceText(undefined)).toBe('');
  });
});

describe('coerceStringList', () => {
  it('drops non-string and blank entries', () => {
    expect(coerceStringList(['a', 1, null, ' ', ' b '])).toEqual(['a', 'b']);
  });

  it('wraps a lone string', () => {
    expect(coerceStringList('src/index.js')).toEqual(['src/index.js']);
  });

  it('returns an empty list for anything else', () => {
    expect(coerceStringList({ path: 'x' })).toEqual([]);
  });
});

describe('uniqueStrings', () => {
  it('keeps first-seen order', () => {
    expect(uniqueStrings(['b', 'a', 'b', 'c', 'a'])).toEqual(['b', 'a', 'c']);
  });
});

describe('isRecord', () => {
  it('accepts plain objects only', () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord('x')).toBe(false);
  });
});
