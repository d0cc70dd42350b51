/**
 * Signal Ingestor
 *
 * Turns raw time/voltage columns into a trusted {@link Recording} and resolves
 * the window the heart rate is averaged over.
 *
 * Missing time samples are recovered by position-indexed linear interpolation
 * when at least 90% of the column is finite. Gaps at either end of the column
 * cannot be interpolated; they take the nearest finite value instead, which is
 * only correct for a recording whose first and last samples are present.
 * Voltage is never interpolated.
 *
 * @module signal/ingest/signal-ingestor
 */

import type { AnalysisWindow, Recording } from '../../types';
import { DEFAULT_INGEST_CONFIG, type IngestConfig } from '../../config/defaults';
import { InvalidWindowError, MalformedDataError } from '../../utils/errors';
import { finiteFraction, interpolateLinear, maxOf, minOf } from '../../utils/math';
import { createLogger, type Reporter } from '../../utils/logger';

/**
 * Whether a column has few enough missing values to interpolate
 */
export function canInterpolate(
  values: readonly number[],
  minFiniteFraction: number = DEFAULT_INGEST_CONFIG.minFiniteFraction
): boolean {
  return finiteFraction(values) >= minFiniteFraction;
}

/**
 * Fill non-finite entries by linear interpolation over the array index.
 * Finite entries are returned unchanged.
 */
export function interpolateMissing(values: readonly number[]): number[] {
  const knotsX: number[] = [];
  const knotsY: number[] = [];

  values.forEach((v, i) => {
    if (Number.isFinite(v)) {
      knotsX.push(i);
      knotsY.push(v);
    }
  });

  if (knotsX.length === 0) {
    return [...values];
  }

  return values.map((v, i) => (Number.isFinite(v) ? v : interpolateLinear(i, knotsX, knotsY)));
}

function countNonFinite(values: readonly number[]): number {
  return values.reduce((n, v) => (Number.isFinite(v) ? n : n + 1), 0);
}

export interface SignalIngestorOptions {
  config?: Partial<IngestConfig>;
  reporter?: Reporter;
}

/**
 * Validates and sanitizes raw recordings
 */
export class SignalIngestor {
  private config: IngestConfig;
  private reporter: Reporter;

  constructor(options: SignalIngestorOptions = {}) {
    this.config = { ...DEFAULT_INGEST_CONFIG, ...options.config };
    this.reporter = options.reporter ?? createLogger('ingest');
  }

  /**
   * Build a recording from raw columns, interpolating missing times
   * when recoverable. Inputs are not mutated.
   *
   * @throws MalformedDataError when the columns cannot be trusted
   */
  sanitize(time: readonly number[], voltage: readonly number[]): Recording {
    if (time.length === 0 || voltage.length === 0) {
      throw new MalformedDataError('Recording contains no samples', 'empty-recording', {
        timeLength: time.length,
        voltageLength: voltage.length,
      });
    }

    let cleanTime = [...time];
    const missingTime = countNonFinite(cleanTime);

    if (missingTime > 0) {
      if (canInterpolate(cleanTime, this.config.minFiniteFraction)) {
        cleanTime = interpolateMissing(cleanTime);
        this.reporter.warn('Interpolated missing time samples', {
          missing: missingTime,
          total: cleanTime.length,
        });
      } else {
        this.reporter.warn('Too many missing time samples to interpolate', {
          missing: missingTime,
          total: cleanTime.length,
          minFiniteFraction: this.config.minFiniteFraction,
        });
      }
    }

    const remainingTime = countNonFinite(cleanTime);
    if (remainingTime > 0) {
      throw new MalformedDataError(
        `Time column has ${remainingTime} non-finite value(s)`,
        'non-finite-time',
        { missing: remainingTime, total: cleanTime.length }
      );
    }

    const missingVoltage = countNonFinite(voltage);
    if (missingVoltage > 0) {
      throw new MalformedDataError(
        `Voltage column has ${missingVoltage} non-finite value(s)`,
        'non-finite-voltage',
        { missing: missingVoltage, total: voltage.length }
      );
    }

    if (cleanTime.length !== voltage.length) {
      throw new MalformedDataError(
        `Time has ${cleanTime.length} samples but voltage has ${voltage.length}`,
        'length-mismatch',
        { timeLength: cleanTime.length, voltageLength: voltage.length }
      );
    }

    return Object.freeze({
      time: Object.freeze(cleanTime),
      voltage: Object.freeze([...voltage]),
    });
  }

  /**
   * Window spanning the whole recording, or the validated requested one
   *
   * @throws InvalidWindowError when the requested window leaves the recording
   */
  resolveWindow(recording: Recording, requested?: AnalysisWindow): AnalysisWindow {
    const full: AnalysisWindow = { start: minOf(recording.time), end: maxOf(recording.time) };

    if (requested === undefined) {
      return full;
    }

    const inside =
      requested.start >= full.start &&
      requested.end <= full.end &&
      requested.start <= requested.end;

    if (!inside) {
      throw new InvalidWindowError(requested, full);
    }

    return { start: requested.start, end: requested.end };
  }
}
