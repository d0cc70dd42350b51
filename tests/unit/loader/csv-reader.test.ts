/**
 * CSV reader tests
 */

import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { loadEcgCsvFile, parseCell, parseEcgCsv } from '../../../src/signal/loader/csv-reader';
import { MalformedDataError } from '../../../src/utils/errors';

describe('parseCell', () => {
  it('should parse numbers with surrounding whitespace', () => {
    expect(parseCell(' -0.145 ')).toBe(-0.145);
  });

  it('should map blank, missing and non-numeric cells to NaN', () => {
    expect(parseCell('')).toBeNaN();
    expect(parseCell('   ')).toBeNaN();
    expect(parseCell(undefined)).toBeNaN();
    expect(parseCell('bad')).toBeNaN();
    expect(parseCell('NaN')).toBeNaN();
  });
});

describe('parseEcgCsv', () => {
  it('should split rows into time and voltage columns', () => {
    expect(parseEcgCsv('0,10\n1,15\n2,20\n')).toEqual({ time: [0, 1, 2], voltage: [10, 15, 20] });
  });

  it('should keep missing cells as NaN', () => {
    const { time, voltage } = parseEcgCsv('0,-0.1\n,-0.2\n0.006,bad\n0.009\n');

    expect(time).toHaveLength(4);
    expect(time[1]).toBeNaN();
    expect(time[2]).toBe(0.006);
    expect(voltage[2]).toBeNaN();
    expect(voltage[3]).toBeNaN();
  });

  it('should skip blank lines and accept CRLF endings', () => {
    expect(parseEcgCsv('0,1\r\n\r\n0.5,2\r\n')).toEqual({ time: [0, 0.5], voltage: [1, 2] });
  });

  it('should return empty columns for empty text', () => {
    expect(parseEcgCsv('')).toEqual({ time: [], voltage: [] });
  });
});

describe('loadEcgCsvFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ecg-hrm-csv-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should read a CSV file from disk', () => {
    const path = join(dir, 'strip.csv');
    writeFileSync(path, '0,0.1\n0.003,0.2\n');

    expect(loadEcgCsvFile(path)).toEqual({ time: [0, 0.003], voltage: [0.1, 0.2] });
  });

  it('should reject other extensions', () => {
    const path = join(dir, 'strip.txt');
    writeFileSync(path, '0,1\n');

    try {
      loadEcgCsvFile(path);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedDataError);
      if (err instanceof MalformedDataError) {
        expect(err.reason).toBe('unsupported-extension');
      }
    }
  });

  it('should reject missing files', () => {
    try {
      loadEcgCsvFile(join(dir, 'absent.csv'));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MalformedDataError);
      if (err instanceof MalformedDataError) {
        expect(err.reason).toBe('file-not-found');
      }
    }
  });
});
