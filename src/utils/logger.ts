/**
 * Structured Logging Utility
 *
 * Module-scoped loggers with levels, a console or file sink, and text or
 * JSON formatting. The analysis core never logs through a global: it takes a
 * {@link Reporter} and callers decide where the entries go.
 *
 * @module utils/logger
 */

import { appendFileSync } from 'fs';

/**
 * Available log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Log entry structure
 */
export interface LogEntry {
  /** Timestamp in ISO format */
  timestamp: string;

  level: LogLevelName;

  /** Module/component name */
  module: string;

  message: string;

  /** Additional context data */
  context?: Record<string, unknown>;

  error?: Error;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  minLevel: LogLevel;

  /** Enable JSON output format */
  jsonOutput?: boolean;

  /** Include timestamps in output */
  includeTimestamp?: boolean;

  /** Custom output handler (default: console) */
  outputHandler?: OutputHandler;
}

/**
 * Formatting settings resolved for the logger that produced an entry
 */
export type LogFormat = Pick<LoggerConfig, 'jsonOutput' | 'includeTimestamp'>;

export type OutputHandler = (entry: LogEntry, format: LogFormat) => void;

/**
 * What the analysis core needs from a logger
 */
export interface Reporter {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
}

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: LogLevel.INFO,
  jsonOutput: false,
  includeTimestamp: true,
};

let globalConfig: LoggerConfig = { ...DEFAULT_CONFIG };

/**
 * Parse log level from string
 */
export function parseLogLevel(level: string | undefined): LogLevel {
  if (!level) return LogLevel.INFO;

  switch (level.toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
    case 'warning':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'silent':
    case 'none':
      return LogLevel.SILENT;
    default:
      return LogLevel.INFO;
  }
}

function getLevelName(level: LogLevel): LogLevelName {
  switch (level) {
    case LogLevel.DEBUG:
      return 'debug';
    case LogLevel.INFO:
      return 'info';
    case LogLevel.WARN:
      return 'warn';
    case LogLevel.ERROR:
      return 'error';
    case LogLevel.SILENT:
      return 'silent';
    default:
      return 'info';
  }
}

/**
 * Configure the global logger
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}

/**
 * Reset global configuration to defaults
 */
export function resetLoggerConfig(): void {
  globalConfig = { ...DEFAULT_CONFIG };
}

export function setLogLevel(level: LogLevel | string): void {
  if (typeof level === 'string') {
    globalConfig.minLevel = parseLogLevel(level);
  } else {
    globalConfig.minLevel = level;
  }
}

export function getLogLevel(): LogLevel {
  return globalConfig.minLevel;
}

/**
 * Format log entry as a single text line
 */
export function formatLogEntry(entry: LogEntry, includeTimestamp: boolean = true): string {
  const parts: string[] = [];

  if (includeTimestamp) {
    parts.push(`[${entry.timestamp}]`);
  }

  parts.push(`[${entry.level.toUpperCase()}]`);
  parts.push(`[${entry.module}]`);
  parts.push(entry.message);

  if (entry.context && Object.keys(entry.context).length > 0) {
    parts.push(JSON.stringify(entry.context));
  }

  if (entry.error) {
    parts.push(`${entry.error.name}: ${entry.error.message}`);
  }

  return parts.join(' ');
}

/**
 * Render an entry as JSON or as a text line
 */
export function serializeLogEntry(entry: LogEntry, format: LogFormat): string {
  return format.jsonOutput
    ? JSON.stringify({ ...entry, error: entry.error?.message })
    : formatLogEntry(entry, format.includeTimestamp ?? true);
}

function defaultOutputHandler(entry: LogEntry, format: LogFormat): void {
  const output = serializeLogEntry(entry, format);

  switch (entry.level) {
    case 'error':
      console.error(output);
      break;
    case 'warn':
      console.warn(output);
      break;
    case 'debug':
      console.debug(output);
      break;
    default:
      console.log(output);
  }
}

/**
 * Output handler appending one line per entry to a file
 */
export function createFileOutputHandler(filePath: string): OutputHandler {
  return (entry, format) => {
    appendFileSync(filePath, serializeLogEntry(entry, format) + '\n', 'utf-8');
  };
}

/**
 * Module-specific logger instance
 */
export class Logger implements Reporter {
  private module: string;
  private config: LoggerConfig;

  constructor(module: string, config?: Partial<LoggerConfig>) {
    this.module = module;
    this.config = { ...globalConfig, ...config };
  }

  private shouldLog(level: LogLevel): boolean {
    return level >= this.config.minLevel;
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: getLevelName(level),
      module: this.module,
      message,
      context,
      error,
    };
    const handler = this.config.outputHandler ?? defaultOutputHandler;
    handler(entry, {
      jsonOutput: this.config.jsonOutput,
      includeTimestamp: this.config.includeTimestamp,
    });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  /**
   * Create a child logger sharing this logger's sink and level
   */
  child(subModule: string): Logger {
    return new Logger(`${this.module}:${subModule}`, this.config);
  }

  /**
   * Create a logger that adds fixed context to every entry
   */
  withContext(fixedContext: Record<string, unknown>): Reporter {
    return new LoggerWithContext(this, fixedContext);
  }
}

class LoggerWithContext implements Reporter {
  constructor(
    private logger: Reporter,
    private fixedContext: Record<string, unknown>
  ) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.logger.debug(message, { ...this.fixedContext, ...context });
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.logger.info(message, { ...this.fixedContext, ...context });
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.logger.warn(message, { ...this.fixedContext, ...context });
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.logger.error(message, error, { ...this.fixedContext, ...context });
  }
}

export function createLogger(module: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger(module, config);
}

/**
 * Create a silent logger (for testing)
 */
export function createSilentLogger(module: string): Logger {
  return new Logger(module, { minLevel: LogLevel.SILENT });
}
