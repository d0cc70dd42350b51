/**
 * Validation and error taxonomy tests
 */

import { describe, it, expect } from 'vitest';
import {
  ValidationError,
  parseFiniteNumber,
  parseWindow,
  validateFraction,
} from '../../../src/utils/validation';
import {
  DegenerateWindowError,
  InvalidWindowError,
  MalformedDataError,
  isHrmError,
} from '../../../src/utils/errors';

describe('parseFiniteNumber', () => {
  it('should parse trimmed numbers', () => {
    expect(parseFiniteNumber(' 2.5 ', 'x')).toBe(2.5);
  });

  it('should reject blanks and non-numbers', () => {
    expect(() => parseFiniteNumber('', 'x')).toThrow('x: Must be a finite number');
    expect(() => parseFiniteNumber('Infinity', 'x')).toThrow(ValidationError);
  });
});

describe('validateFraction', () => {
  it('should accept 1', () => {
    expect(validateFraction(1, 'f')).toBe(1);
  });

  it('should reject 0 and NaN', () => {
    expect(() => validateFraction(0, 'f')).toThrow(ValidationError);
    expect(() => validateFraction(NaN, 'f')).toThrow(ValidationError);
  });
});

describe('parseWindow', () => {
  it('should parse "start,end"', () => {
    expect(parseWindow('1.5,7')).toEqual({ start: 1.5, end: 7 });
  });

  it('should reject a single value', () => {
    expect(() => parseWindow('3')).toThrow('window: Expected "start,end" in seconds');
  });

  it('should reject an inverted window', () => {
    expect(() => parseWindow('5,2')).toThrow('window: Start must not be after end');
  });
});

describe('error taxonomy', () => {
  it('should tag each error with its kind and name', () => {
    const malformed = new MalformedDataError('bad', 'length-mismatch');
    const invalid = new InvalidWindowError({ start: 0, end: 12 }, { start: 0, end: 10 });
    const degenerate = new DegenerateWindowError({ start: 3, end: 3 });

    expect([malformed.kind, invalid.kind, degenerate.kind]).toEqual([
      'malformed-data',
      'invalid-window',
      'degenerate-window',
    ]);
    expect(malformed.name).toBe('MalformedDataError');
    expect(invalid.message).toBe('Window (0, 12) is outside recording range [0, 10]');
    expect(degenerate.message).toBe('Window (3, 3) has zero width');
  });

  it('should recognise pipeline errors only', () => {
    expect(isHrmError(new DegenerateWindowError({ start: 1, end: 1 }))).toBe(true);
    expect(isHrmError(new ValidationError('x', 'f', 1))).toBe(false);
    expect(isHrmError('oops')).toBe(false);
  });
});
