/**
 * ecg-hrm - single-lead ECG heart rate monitor
 *
 * Sanitizes two-column time/voltage recordings, detects beats with a
 * thresholding QRS detector and reports voltage extremes, duration, beat
 * times and mean heart rate over a window.
 *
 * @packageDocumentation
 */

export const VERSION = '0.1.0';

// ============================================================================
// Type Exports
// ============================================================================

export type {
  RawSamples,
  Recording,
  AnalysisWindow,
  Beat,
  VoltageExtremes,
  Metrics,
  FlagReason,
  Advisory,
  ValidMetrics,
  FlaggedMetrics,
  MetricsOutcome,
} from './types';

export { isValidOutcome } from './types';

// ============================================================================
// Configuration
// ============================================================================

export {
  DEFAULT_DETECTOR_CONFIG,
  DEFAULT_INGEST_CONFIG,
  PLAUSIBILITY_LIMITS,
  DEFAULT_CONFIG,
  loadConfig,
  type DetectorConfig,
  type IngestConfig,
  type PlausibilityLimits,
  type HrmConfig,
} from './config';

// ============================================================================
// Signal Processing
// ============================================================================

export {
  SignalIngestor,
  canInterpolate,
  interpolateMissing,
  type SignalIngestorOptions,
} from './signal/ingest';

export {
  determineThreshold,
  findIndicesAboveThreshold,
  findBeatSeparationPoints,
  findQrsPeakIndices,
  indexBeatTimes,
  detectBeats,
  determineVoltageExtremes,
  determineDuration,
  determineNumBeats,
  determineBpm,
  isPhysiologicallyPlausible,
  isVoltageInRange,
  analyzeRecording,
  type AnalyzeOptions,
} from './signal/analysis';

export { parseEcgCsv, loadEcgCsvFile } from './signal/loader';

export {
  MetricsWriter,
  jsonPathFor,
  toPersistable,
  type MetricsWriterOptions,
  type MetricsDocument,
  type WriteResult,
} from './signal/export';

export {
  generateSyntheticECG,
  generateFlatLine,
  type SyntheticECGOptions,
} from './signal/synthetic';

// ============================================================================
// Pipeline
// ============================================================================

export {
  processRecording,
  processFile,
  type PipelineOptions,
  type PipelineResult,
  type ProcessFileOptions,
  type FileResult,
} from './pipeline';

// ============================================================================
// Utilities
// ============================================================================

export {
  HrmError,
  MalformedDataError,
  InvalidWindowError,
  DegenerateWindowError,
  isHrmError,
  type HrmErrorKind,
  type MalformedDataReason,
} from './utils/errors';

export { ValidationError } from './utils/validation';

export {
  Logger,
  LogLevel,
  createLogger,
  createSilentLogger,
  configureLogger,
  setLogLevel,
  type LogEntry,
  type Reporter,
} from './utils/logger';
