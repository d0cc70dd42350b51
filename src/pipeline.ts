/**
 * Recording pipeline
 *
 * raw columns → sanitize → resolve window → detect beats → metrics outcome,
 * with optional CSV input and JSON output on either side.
 *
 * @module pipeline
 */

import type { AnalysisWindow, MetricsOutcome, Recording } from './types';
import { DEFAULT_CONFIG, type HrmConfig } from './config/env';
import { SignalIngestor } from './signal/ingest/signal-ingestor';
import { analyzeRecording } from './signal/analysis/beat-detector';
import { loadEcgCsvFile } from './signal/loader/csv-reader';
import { MetricsWriter, type WriteResult } from './signal/export/json-writer';
import { InvalidWindowError } from './utils/errors';
import { createLogger, type Reporter } from './utils/logger';

export interface PipelineOptions {
  /** BPM window; the whole recording when omitted or out of range */
  window?: AnalysisWindow;

  reporter?: Reporter;

  config?: HrmConfig;
}

export interface PipelineResult {
  recording: Recording;
  window: AnalysisWindow;

  /** True when the requested window was rejected and replaced */
  windowFallback: boolean;

  outcome: MetricsOutcome;
}

/**
 * Analyse in-memory time/voltage columns
 *
 * @throws MalformedDataError when the columns cannot be sanitized
 */
export function processRecording(
  time: readonly number[],
  voltage: readonly number[],
  options: PipelineOptions = {}
): PipelineResult {
  const config = options.config ?? DEFAULT_CONFIG;
  const reporter = options.reporter ?? createLogger('pipeline');

  const ingestor = new SignalIngestor({ config: config.ingest, reporter });
  const recording = ingestor.sanitize(time, voltage);

  let window: AnalysisWindow;
  let windowFallback = false;
  try {
    window = ingestor.resolveWindow(recording, options.window);
  } catch (err) {
    if (!(err instanceof InvalidWindowError)) throw err;
    reporter.warn('Requested window rejected, using full recording', {
      requested: err.requested,
      allowed: err.allowed,
    });
    window = err.allowed;
    windowFallback = true;
  }

  const outcome = analyzeRecording(recording, window, {
    detector: config.detector,
    limits: config.limits,
    reporter,
  });

  reporter.info('Recording analysed', {
    status: outcome.status,
    numBeats: outcome.metrics.numBeats,
    meanHrBpm: outcome.metrics.meanHrBpm,
  });

  return { recording, window, windowFallback, outcome };
}

export interface FileResult extends PipelineResult {
  write: WriteResult;
}

export interface ProcessFileOptions extends PipelineOptions {
  /** Persist flagged outcomes, marked invalid */
  allowFlagged?: boolean;
}

/**
 * Load a CSV, analyse it and write `<name>.json` beside it
 *
 * @throws MalformedDataError when the file is missing, not CSV, or unusable
 */
export function processFile(csvPath: string, options: ProcessFileOptions = {}): FileResult {
  const reporter = options.reporter ?? createLogger('pipeline');
  const { time, voltage } = loadEcgCsvFile(csvPath);
  reporter.debug('Loaded CSV', { path: csvPath, rows: time.length });

  const result = processRecording(time, voltage, { ...options, reporter });

  const writer = new MetricsWriter({ allowFlagged: options.allowFlagged });
  const write = writer.write(csvPath, result.outcome);

  if (write.written) {
    reporter.info('Metrics written', { path: write.path });
  } else {
    reporter.warn('Metrics not written: result failed plausibility check', {
      path: write.path,
      reasons: write.reasons,
    });
  }

  return { ...result, write };
}
