/**
 * Environment configuration tests
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, loadConfig } from '../../../src/config/env';
import { LogLevel } from '../../../src/utils/logger';
import { ValidationError } from '../../../src/utils/validation';

describe('loadConfig', () => {
  it('should return defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('should use the documented default constants', () => {
    const config = loadConfig({});
    expect(config.detector).toEqual({ thresholdFraction: 0.75, separationGap: 2 });
    expect(config.ingest.minFiniteFraction).toBe(0.9);
    expect(config.limits).toEqual({ minBpm: 36, maxBpm: 150, maxAbsVoltage: 300 });
  });

  it('should read overrides', () => {
    const config = loadConfig({
      HRM_THRESHOLD_FRACTION: '0.6',
      HRM_MIN_FINITE_FRACTION: '0.95',
      HRM_LOG_LEVEL: 'debug',
      HRM_JSON_LOGS: 'true',
    });

    expect(config.detector.thresholdFraction).toBe(0.6);
    expect(config.ingest.minFiniteFraction).toBe(0.95);
    expect(config.logLevel).toBe(LogLevel.DEBUG);
    expect(config.jsonLogs).toBe(true);
  });

  it('should fall back to LOG_LEVEL', () => {
    expect(loadConfig({ LOG_LEVEL: 'warn' }).logLevel).toBe(LogLevel.WARN);
  });

  it('should reject non-numeric fractions', () => {
    expect(() => loadConfig({ HRM_THRESHOLD_FRACTION: 'high' })).toThrow(ValidationError);
  });

  it('should reject fractions outside (0, 1]', () => {
    expect(() => loadConfig({ HRM_MIN_FINITE_FRACTION: '1.5' })).toThrow(
      'HRM_MIN_FINITE_FRACTION: Must be greater than 0 and at most 1'
    );
    expect(() => loadConfig({ HRM_THRESHOLD_FRACTION: '0' })).toThrow(ValidationError);
  });
});
