/**
 * Heart rate metrics and the outcome wrapper handed to persistence
 * @module types/metrics
 */

import type { AnalysisWindow, Beat, VoltageExtremes } from './recording';

/**
 * Summary metrics for one recording and window
 */
export interface Metrics {
  readonly voltageExtremes: VoltageExtremes;

  /** Strip duration (max time) in seconds */
  readonly duration: number;

  readonly beats: readonly Beat[];
  readonly numBeats: number;

  /** Undefined when the window has zero width */
  readonly meanHrBpm: number | undefined;

  /** Window the BPM was computed over */
  readonly window: AnalysisWindow;
}

/**
 * Reasons that make metrics unfit to persist
 */
export type FlagReason = 'beat-count-implausible';

/**
 * Non-invalidating warnings attached to an outcome
 */
export type Advisory = 'voltage-out-of-range' | 'bpm-unavailable';

export interface ValidMetrics {
  readonly status: 'valid';
  readonly metrics: Metrics;
  readonly advisories: readonly Advisory[];
}

export interface FlaggedMetrics {
  readonly status: 'flagged';
  readonly metrics: Metrics;
  readonly reasons: readonly FlagReason[];
  readonly advisories: readonly Advisory[];
}

/**
 * Result of analysing a recording
 */
export type MetricsOutcome = ValidMetrics | FlaggedMetrics;

export function isValidOutcome(outcome: MetricsOutcome): outcome is ValidMetrics {
  return outcome.status === 'valid';
}
