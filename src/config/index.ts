/**
 * Configuration exports
 * @module config
 */

export {
  DEFAULT_DETECTOR_CONFIG,
  DEFAULT_INGEST_CONFIG,
  PLAUSIBILITY_LIMITS,
  type DetectorConfig,
  type IngestConfig,
  type PlausibilityLimits,
} from './defaults';

export { DEFAULT_CONFIG, loadConfig, type HrmConfig } from './env';
