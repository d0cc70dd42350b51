/**
 * Default configuration values
 * @module config/defaults
 */

/**
 * Thresholding QRS detector settings
 */
export interface DetectorConfig {
  /** Fraction of the global voltage peak used as the QRS threshold */
  thresholdFraction: number;

  /** Index gaps larger than this separate two above-threshold runs */
  separationGap: number;
}

/**
 * Missing-value policy for the time column
 */
export interface IngestConfig {
  /** Minimum fraction of finite time samples required to interpolate */
  minFiniteFraction: number;
}

/**
 * Plausibility bounds applied to a finished analysis
 */
export interface PlausibilityLimits {
  /** Lowest plausible mean rate (bpm) */
  minBpm: number;

  /** Highest plausible mean rate (bpm) */
  maxBpm: number;

  /** Largest expected absolute voltage (mV) */
  maxAbsVoltage: number;
}

export const DEFAULT_DETECTOR_CONFIG: Readonly<DetectorConfig> = {
  thresholdFraction: 0.75,
  separationGap: 2,
};

export const DEFAULT_INGEST_CONFIG: Readonly<IngestConfig> = {
  minFiniteFraction: 0.9,
};

/**
 * 36-150 bpm, i.e. 0.6-2.5 beats per second of recording
 */
export const PLAUSIBILITY_LIMITS: Readonly<PlausibilityLimits> = {
  minBpm: 36,
  maxBpm: 150,
  maxAbsVoltage: 300,
};
