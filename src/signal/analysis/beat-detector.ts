/**
 * Thresholding QRS Beat Detector
 *
 * Locates beats in a sanitized single-lead recording and derives the summary
 * metrics. The detector marks every sample above a fixed fraction (75%) of the
 * global voltage peak, splits those samples into runs wherever the index gap
 * exceeds two samples, and takes the voltage maximum of each run as the QRS
 * peak.
 *
 * The threshold is global, not adaptive: baseline wander, large T waves or a
 * single artefact spike can hide or split beats. Results outside the
 * physiological rate range are flagged rather than thrown.
 *
 * @module signal/analysis/beat-detector
 */

import type {
  Advisory,
  AnalysisWindow,
  Beat,
  FlagReason,
  Metrics,
  MetricsOutcome,
  Recording,
  VoltageExtremes,
} from '../../types';
import {
  DEFAULT_DETECTOR_CONFIG,
  PLAUSIBILITY_LIMITS,
  type DetectorConfig,
  type PlausibilityLimits,
} from '../../config/defaults';
import { DegenerateWindowError } from '../../utils/errors';
import { argmaxInRange, diff, firstIndexOrZero, maxOf, minOf } from '../../utils/math';
import { createLogger, type Reporter } from '../../utils/logger';

// ============================================================================
// Detection steps
// ============================================================================

/**
 * QRS threshold: a fraction of the largest voltage
 */
export function determineThreshold(
  voltage: readonly number[],
  fraction: number = DEFAULT_DETECTOR_CONFIG.thresholdFraction
): number {
  return fraction * maxOf(voltage);
}

/**
 * Ascending indices whose voltage is strictly above the threshold
 */
export function findIndicesAboveThreshold(
  voltage: readonly number[],
  threshold: number
): number[] {
  const indices: number[] = [];
  for (let i = 0; i < voltage.length; i++) {
    if (voltage[i] > threshold) indices.push(i);
  }
  return indices;
}

/**
 * Closing index of every above-threshold run except the last.
 *
 * A run closes at indices[k] when the next above-threshold index is more
 * than `gap` samples away.
 */
export function findBeatSeparationPoints(
  indices: readonly number[],
  gap: number = DEFAULT_DETECTOR_CONFIG.separationGap
): number[] {
  const separations: number[] = [];
  diff(indices).forEach((d, k) => {
    if (d > gap) separations.push(indices[k]);
  });
  return separations;
}

/**
 * Index of the voltage maximum in each run.
 *
 * Runs tile the whole recording: [0, s0], [s0 + 1, s1], ..., [sLast + 1, n - 1].
 * Ties resolve to the earliest sample.
 */
export function findQrsPeakIndices(
  voltage: readonly number[],
  separations: readonly number[]
): number[] {
  if (voltage.length === 0) return [];

  const peaks: number[] = [];
  let start = 0;

  for (const sep of separations) {
    peaks.push(argmaxInRange(voltage, start, sep));
    start = sep + 1;
  }
  peaks.push(argmaxInRange(voltage, start, voltage.length - 1));

  return peaks;
}

export function indexBeatTimes(time: readonly number[], peakIndices: readonly number[]): Beat[] {
  return peakIndices.map(i => time[i]);
}

/**
 * Beat timestamps (QRS peaks) in ascending order
 */
export function detectBeats(
  recording: Recording,
  config: DetectorConfig = DEFAULT_DETECTOR_CONFIG
): Beat[] {
  const { time, voltage } = recording;
  const threshold = determineThreshold(voltage, config.thresholdFraction);
  const above = findIndicesAboveThreshold(voltage, threshold);

  // Flat or fully negative trace
  if (above.length === 0) return [];

  const separations = findBeatSeparationPoints(above, config.separationGap);
  const peaks = findQrsPeakIndices(voltage, separations);
  return indexBeatTimes(time, peaks);
}

// ============================================================================
// Metrics
// ============================================================================

export function determineVoltageExtremes(voltage: readonly number[]): VoltageExtremes {
  return [minOf(voltage), maxOf(voltage)];
}

/**
 * Strip duration, taken as the last sample time
 */
export function determineDuration(time: readonly number[]): number {
  return maxOf(time);
}

export function determineNumBeats(beats: readonly Beat[]): number {
  return beats.length;
}

/**
 * Mean heart rate over a window.
 *
 * The count is the difference between two ranks: the first beat at or after
 * `start` and the first beat at or after `end` (clamped to the last beat when
 * every beat precedes `end`). When no beat satisfies a bound its rank is 0.
 * For evenly spaced beats this approximates the number of beats in the window
 * but it can be off by one at either edge.
 *
 * @throws DegenerateWindowError when start equals end
 */
export function determineBpm(beats: readonly Beat[], window: AnalysisWindow): number {
  const seconds = window.end - window.start;
  if (seconds === 0) {
    throw new DegenerateWindowError(window);
  }

  if (beats.length === 0) return 0;

  const startIndex = firstIndexOrZero(beats, b => b >= window.start);
  let endIndex = firstIndexOrZero(beats, b => b >= window.end);

  if (beats[beats.length - 1] < window.end) {
    endIndex = beats.length - 1;
  }

  const count = endIndex - startIndex;
  return count / (seconds / 60);
}

/**
 * Whether the beat count fits a 36-150 bpm rate over the strip
 */
export function isPhysiologicallyPlausible(
  numBeats: number,
  duration: number,
  limits: PlausibilityLimits = PLAUSIBILITY_LIMITS
): boolean {
  const minExpected = (limits.minBpm / 60) * duration;
  const maxExpected = (limits.maxBpm / 60) * duration;
  return numBeats >= minExpected && numBeats <= maxExpected;
}

export function isVoltageInRange(
  extremes: VoltageExtremes,
  limits: PlausibilityLimits = PLAUSIBILITY_LIMITS
): boolean {
  const [min, max] = extremes;
  return Math.abs(min) <= limits.maxAbsVoltage && Math.abs(max) <= limits.maxAbsVoltage;
}

// ============================================================================
// Analysis
// ============================================================================

export interface AnalyzeOptions {
  detector?: Partial<DetectorConfig>;
  limits?: Partial<PlausibilityLimits>;
  reporter?: Reporter;
}

/**
 * Detect beats and compute all metrics for one recording and window.
 *
 * A zero-width window leaves `meanHrBpm` undefined; every other metric is
 * still produced.
 */
export function analyzeRecording(
  recording: Recording,
  window: AnalysisWindow,
  options: AnalyzeOptions = {}
): MetricsOutcome {
  const detector = { ...DEFAULT_DETECTOR_CONFIG, ...options.detector };
  const limits = { ...PLAUSIBILITY_LIMITS, ...options.limits };
  const reporter = options.reporter ?? createLogger('beat-detector');

  const voltageExtremes = determineVoltageExtremes(recording.voltage);
  const duration = determineDuration(recording.time);
  const beats = detectBeats(recording, detector);
  const numBeats = determineNumBeats(beats);

  const advisories: Advisory[] = [];
  const reasons: FlagReason[] = [];

  let meanHrBpm: number | undefined;
  try {
    meanHrBpm = determineBpm(beats, window);
  } catch (err) {
    if (!(err instanceof DegenerateWindowError)) throw err;
    reporter.warn('Mean heart rate unavailable', { window: err.window });
    advisories.push('bpm-unavailable');
  }

  if (!isVoltageInRange(voltageExtremes, limits)) {
    reporter.warn('Voltage outside expected range', {
      extremes: voltageExtremes,
      limit: limits.maxAbsVoltage,
    });
    advisories.push('voltage-out-of-range');
  }

  if (!isPhysiologicallyPlausible(numBeats, duration, limits)) {
    reporter.warn('Beat count is not physiologically plausible', { numBeats, duration });
    reasons.push('beat-count-implausible');
  }

  reporter.debug('Analysis complete', { numBeats, meanHrBpm, duration });

  const metrics: Metrics = Object.freeze({
    voltageExtremes: Object.freeze(voltageExtremes),
    duration,
    beats: Object.freeze(beats),
    numBeats,
    meanHrBpm,
    window: Object.freeze({ start: window.start, end: window.end }),
  });

  return reasons.length > 0
    ? { status: 'flagged', metrics, reasons, advisories }
    : { status: 'valid', metrics, advisories };
}
