/**
 * Two-column ECG CSV reader
 *
 * Reads headerless `time,voltage` rows. Cells that are blank or not numeric
 * are kept as NaN so the ingestor's missing-value policy can act on them.
 *
 * @module signal/loader/csv-reader
 */

import { existsSync, readFileSync } from 'fs';
import { extname } from 'path';
import Papa from 'papaparse';
import type { RawSamples } from '../../types';
import { MalformedDataError } from '../../utils/errors';

/**
 * Decode one CSV cell; blank and non-numeric cells become NaN
 */
export function parseCell(cell: string | undefined): number {
  if (cell === undefined) return NaN;
  const trimmed = cell.trim();
  if (trimmed === '') return NaN;
  return Number(trimmed);
}

/**
 * Parse CSV text into time and voltage columns
 *
 * @throws MalformedDataError when the text is not valid CSV
 */
export function parseEcgCsv(text: string): RawSamples {
  const result = Papa.parse<string[]>(text, {
    header: false,
    delimiter: ',',
    skipEmptyLines: 'greedy',
  });

  const fatal = result.errors.find(e => e.type === 'Quotes');
  if (fatal) {
    throw new MalformedDataError(`CSV parse error: ${fatal.message}`, 'unparseable-csv', {
      row: fatal.row,
      code: fatal.code,
    });
  }

  const time: number[] = [];
  const voltage: number[] = [];

  for (const row of result.data) {
    time.push(parseCell(row[0]));
    voltage.push(parseCell(row[1]));
  }

  return { time, voltage };
}

/**
 * Read and parse an ECG CSV file
 *
 * @throws MalformedDataError when the path is not an existing .csv file
 */
export function loadEcgCsvFile(filePath: string): RawSamples {
  if (extname(filePath).toLowerCase() !== '.csv') {
    throw new MalformedDataError(`Not a .csv file: ${filePath}`, 'unsupported-extension', {
      path: filePath,
    });
  }

  if (!existsSync(filePath)) {
    throw new MalformedDataError(`File not found: ${filePath}`, 'file-not-found', {
      path: filePath,
    });
  }

  return parseEcgCsv(readFileSync(filePath, 'utf-8'));
}
