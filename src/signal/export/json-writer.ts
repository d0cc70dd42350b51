/**
 * Metrics JSON Writer
 * Persist heart rate metrics beside the CSV they were computed from
 *
 * @module signal/export/json-writer
 */

import { writeFileSync } from 'fs';
import { extname } from 'path';
import { isValidOutcome, type Advisory, type FlagReason, type MetricsOutcome } from '../../types';

/**
 * JSON writer options
 */
export interface MetricsWriterOptions {
  /** Write flagged outcomes too, marked `is_valid: false` (default: false) */
  allowFlagged?: boolean;

  /** Pretty print with indentation (default: true) */
  prettyPrint?: boolean;

  /** Indentation spaces (default: 2) */
  indent?: number;
}

/**
 * Persisted document layout
 */
export interface MetricsDocument {
  voltage_extremes: [number, number];
  duration: number;
  beats: number[];
  num_beats: number;
  mean_hr_bpm?: number;
  window: [number, number];
  is_valid: boolean;
  flag_reasons?: FlagReason[];
  advisories?: Advisory[];
}

export type WriteResult =
  | { written: true; path: string }
  | { written: false; path: string; reasons: readonly FlagReason[] };

/**
 * Output path for a CSV input: same name, .json extension
 */
export function jsonPathFor(csvPath: string): string {
  const ext = extname(csvPath);
  return (ext ? csvPath.slice(0, -ext.length) : csvPath) + '.json';
}

/**
 * Convert an outcome into its persisted document form
 */
export function toPersistable(outcome: MetricsOutcome): MetricsDocument {
  const { metrics } = outcome;
  const doc: MetricsDocument = {
    voltage_extremes: [metrics.voltageExtremes[0], metrics.voltageExtremes[1]],
    duration: metrics.duration,
    beats: [...metrics.beats],
    num_beats: metrics.numBeats,
    window: [metrics.window.start, metrics.window.end],
    is_valid: isValidOutcome(outcome),
  };

  if (metrics.meanHrBpm !== undefined) {
    doc.mean_hr_bpm = metrics.meanHrBpm;
  }
  if (outcome.status === 'flagged') {
    doc.flag_reasons = [...outcome.reasons];
  }
  if (outcome.advisories.length > 0) {
    doc.advisories = [...outcome.advisories];
  }

  return doc;
}

/**
 * Metrics writer class
 */
export class MetricsWriter {
  private options: Required<MetricsWriterOptions>;

  constructor(options: MetricsWriterOptions = {}) {
    this.options = {
      allowFlagged: options.allowFlagged ?? false,
      prettyPrint: options.prettyPrint ?? true,
      indent: options.indent ?? 2,
    };
  }

  /**
   * Serialize an outcome to a JSON string
   */
  serialize(outcome: MetricsOutcome): string {
    const doc = toPersistable(outcome);
    return this.options.prettyPrint
      ? JSON.stringify(doc, null, this.options.indent)
      : JSON.stringify(doc);
  }

  /**
   * Write the outcome next to its CSV. Flagged outcomes are refused
   * unless `allowFlagged` is set.
   */
  write(csvPath: string, outcome: MetricsOutcome): WriteResult {
    const path = jsonPathFor(csvPath);

    if (outcome.status === 'flagged' && !this.options.allowFlagged) {
      return { written: false, path, reasons: outcome.reasons };
    }

    writeFileSync(path, this.serialize(outcome) + '\n', 'utf-8');
    return { written: true, path };
  }
}
