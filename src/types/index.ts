/**
 * ecg-hrm type definitions
 *
 * @module types
 */

// Recording types
export type {
  RawSamples,
  Recording,
  AnalysisWindow,
  Beat,
  VoltageExtremes,
} from './recording';

// Metrics types
export type {
  Metrics,
  FlagReason,
  Advisory,
  ValidMetrics,
  FlaggedMetrics,
  MetricsOutcome,
} from './metrics';

export { isValidOutcome } from './metrics';
