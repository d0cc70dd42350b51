/**
 * Core recording types
 * @module types/recording
 */

/**
 * Raw time/voltage columns as decoded from a CSV source.
 * Blank or non-numeric cells are carried as NaN.
 */
export interface RawSamples {
  time: number[];
  voltage: number[];
}

/**
 * A sanitized single-lead recording.
 * Both columns have equal length and contain only finite values.
 */
export interface Recording {
  /** Sample times in seconds, ascending */
  readonly time: readonly number[];

  /** Sample voltages in millivolts */
  readonly voltage: readonly number[];
}

/**
 * Interval (in seconds) over which the mean heart rate is computed
 */
export interface AnalysisWindow {
  readonly start: number;
  readonly end: number;
}

/**
 * Timestamp (seconds) of one QRS peak
 */
export type Beat = number;

/**
 * Voltage extremes as [min, max] in millivolts
 */
export type VoltageExtremes = readonly [min: number, max: number];
