/**
 * Utility exports
 * @module utils
 */

// Math utilities
export {
  minOf,
  maxOf,
  diff,
  argmaxInRange,
  firstIndexOrZero,
  finiteFraction,
  interpolateLinear,
} from './math';

// Error taxonomy
export {
  HrmError,
  MalformedDataError,
  InvalidWindowError,
  DegenerateWindowError,
  isHrmError,
  type HrmErrorKind,
  type MalformedDataReason,
} from './errors';

// Validation utilities
export { ValidationError, parseFiniteNumber, validateFraction, parseWindow } from './validation';

// Logging utilities
export {
  Logger,
  LogLevel,
  createLogger,
  createSilentLogger,
  createFileOutputHandler,
  configureLogger,
  resetLoggerConfig,
  formatLogEntry,
  serializeLogEntry,
  parseLogLevel,
  setLogLevel,
  getLogLevel,
  type LogEntry,
  type LoggerConfig,
  type LogFormat,
  type OutputHandler,
  type LogLevelName,
  type Reporter,
} from './logger';
