/**
 * Input validation utilities
 * @module utils/validation
 */

import type { AnalysisWindow } from '../types';

/**
 * Validation error with details
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public field: string,
    public value: unknown
  ) {
    super(`${field}: ${message}`);
    this.name = 'ValidationError';
  }
}

/**
 * Parse a numeric setting, rejecting blanks and non-finite values
 */
export function parseFiniteNumber(raw: string, field: string): number {
  const trimmed = raw.trim();
  const value = trimmed === '' ? NaN : Number(trimmed);

  if (!Number.isFinite(value)) {
    throw new ValidationError('Must be a finite number', field, raw);
  }

  return value;
}

/**
 * Validate a fraction lies in (0, 1]
 */
export function validateFraction(value: number, field: string): number {
  if (!(value > 0 && value <= 1)) {
    throw new ValidationError('Must be greater than 0 and at most 1', field, value);
  }
  return value;
}

/**
 * Parse a "start,end" pair into a window
 */
export function parseWindow(raw: string): AnalysisWindow {
  const parts = raw.split(',');
  if (parts.length !== 2) {
    throw new ValidationError('Expected "start,end" in seconds', 'window', raw);
  }

  const start = parseFiniteNumber(parts[0], 'window.start');
  const end = parseFiniteNumber(parts[1], 'window.end');

  if (start > end) {
    throw new ValidationError('Start must not be after end', 'window', raw);
  }

  return { start, end };
}
