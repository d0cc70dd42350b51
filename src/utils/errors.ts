/**
 * Pipeline error taxonomy
 *
 * Every failure the core raises is an {@link HrmError} with a `kind`
 * discriminant, so callers can branch on cause instead of on class.
 *
 * @module utils/errors
 */

import type { AnalysisWindow } from '../types';

export type HrmErrorKind = 'malformed-data' | 'invalid-window' | 'degenerate-window';

/**
 * Why a recording was rejected
 */
export type MalformedDataReason =
  | 'empty-recording'
  | 'non-finite-time'
  | 'non-finite-voltage'
  | 'length-mismatch'
  | 'unsupported-extension'
  | 'file-not-found'
  | 'unparseable-csv';

/**
 * Base class for all pipeline errors
 */
export abstract class HrmError extends Error {
  abstract readonly kind: HrmErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * The recording cannot be trusted. Fatal to the run.
 */
export class MalformedDataError extends HrmError {
  readonly kind = 'malformed-data' as const;

  constructor(
    message: string,
    public readonly reason: MalformedDataReason,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(message);
  }
}

/**
 * Requested window lies outside the recording. Recoverable: callers fall
 * back to the full-recording window.
 */
export class InvalidWindowError extends HrmError {
  readonly kind = 'invalid-window' as const;

  constructor(
    public readonly requested: AnalysisWindow,
    public readonly allowed: AnalysisWindow
  ) {
    super(
      `Window (${requested.start}, ${requested.end}) is outside recording range ` +
        `[${allowed.start}, ${allowed.end}]`
    );
  }
}

/**
 * Zero-width window, BPM is undefined
 */
export class DegenerateWindowError extends HrmError {
  readonly kind = 'degenerate-window' as const;

  constructor(public readonly window: AnalysisWindow) {
    super(`Window (${window.start}, ${window.end}) has zero width`);
  }
}

export function isHrmError(value: unknown): value is HrmError {
  return value instanceof HrmError;
}
