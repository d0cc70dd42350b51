/**
 * Environment-driven configuration
 * @module config/env
 */

import {
  DEFAULT_DETECTOR_CONFIG,
  DEFAULT_INGEST_CONFIG,
  PLAUSIBILITY_LIMITS,
  type DetectorConfig,
  type IngestConfig,
  type PlausibilityLimits,
} from './defaults';
import { parseLogLevel, LogLevel } from '../utils/logger';
import { parseFiniteNumber, validateFraction } from '../utils/validation';

export interface HrmConfig {
  detector: DetectorConfig;
  ingest: IngestConfig;
  limits: PlausibilityLimits;
  logLevel: LogLevel;
  jsonLogs: boolean;
}

export const DEFAULT_CONFIG: Readonly<HrmConfig> = {
  detector: { ...DEFAULT_DETECTOR_CONFIG },
  ingest: { ...DEFAULT_INGEST_CONFIG },
  limits: { ...PLAUSIBILITY_LIMITS },
  logLevel: LogLevel.INFO,
  jsonLogs: false,
};

/**
 * Build the configuration from environment variables.
 *
 * Recognised: HRM_THRESHOLD_FRACTION, HRM_MIN_FINITE_FRACTION,
 * HRM_LOG_LEVEL (or LOG_LEVEL), HRM_JSON_LOGS.
 *
 * @throws ValidationError on a malformed numeric setting
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): HrmConfig {
  const detector = { ...DEFAULT_DETECTOR_CONFIG };
  const ingest = { ...DEFAULT_INGEST_CONFIG };

  if (env.HRM_THRESHOLD_FRACTION !== undefined) {
    detector.thresholdFraction = validateFraction(
      parseFiniteNumber(env.HRM_THRESHOLD_FRACTION, 'HRM_THRESHOLD_FRACTION'),
      'HRM_THRESHOLD_FRACTION'
    );
  }

  if (env.HRM_MIN_FINITE_FRACTION !== undefined) {
    ingest.minFiniteFraction = validateFraction(
      parseFiniteNumber(env.HRM_MIN_FINITE_FRACTION, 'HRM_MIN_FINITE_FRACTION'),
      'HRM_MIN_FINITE_FRACTION'
    );
  }

  return {
    detector,
    ingest,
    limits: { ...PLAUSIBILITY_LIMITS },
    logLevel: parseLogLevel(env.HRM_LOG_LEVEL || env.LOG_LEVEL),
    jsonLogs: env.HRM_JSON_LOGS === 'true',
  };
}
