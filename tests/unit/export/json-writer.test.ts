/**
 * Metrics JSON writer tests
 */

import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MetricsWriter, jsonPathFor, toPersistable } from '../../../src/signal/export/json-writer';
import type { Metrics, MetricsOutcome } from '../../../src/types';

const metrics: Metrics = {
  voltageExtremes: [-0.5, 1.2],
  duration: 4,
  beats: [0.5, 1.5, 2.5, 3.5],
  numBeats: 4,
  meanHrBpm: 60,
  window: { start: 0, end: 4 },
};

const valid: MetricsOutcome = { status: 'valid', metrics, advisories: [] };

const flagged: MetricsOutcome = {
  status: 'flagged',
  metrics: { ...metrics, numBeats: 1, beats: [0.5], meanHrBpm: undefined },
  reasons: ['beat-count-implausible'],
  advisories: ['bpm-unavailable'],
};

describe('jsonPathFor', () => {
  it('should swap the extension for .json', () => {
    expect(jsonPathFor('data/test_data1.csv')).toBe('data/test_data1.json');
  });

  it('should only replace the final extension', () => {
    expect(jsonPathFor('/tmp/run.2024.csv')).toBe('/tmp/run.2024.json');
  });

  it('should append .json when there is no extension', () => {
    expect(jsonPathFor('strip')).toBe('strip.json');
  });
});

describe('toPersistable', () => {
  it('should lay out a valid outcome', () => {
    expect(toPersistable(valid)).toEqual({
      voltage_extremes: [-0.5, 1.2],
      duration: 4,
      beats: [0.5, 1.5, 2.5, 3.5],
      num_beats: 4,
      mean_hr_bpm: 60,
      window: [0, 4],
      is_valid: true,
    });
  });

  it('should mark flagged outcomes and omit an undefined rate', () => {
    expect(toPersistable(flagged)).toEqual({
      voltage_extremes: [-0.5, 1.2],
      duration: 4,
      beats: [0.5],
      num_beats: 1,
      window: [0, 4],
      is_valid: false,
      flag_reasons: ['beat-count-implausible'],
      advisories: ['bpm-unavailable'],
    });
  });
});

describe('MetricsWriter', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'ecg-hrm-json-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should write valid metrics beside the CSV', () => {
    const csv = join(dir, 'strip.csv');
    const result = new MetricsWriter().write(csv, valid);

    expect(result).toEqual({ written: true, path: join(dir, 'strip.json') });
    expect(JSON.parse(readFileSync(join(dir, 'strip.json'), 'utf-8'))).toEqual(toPersistable(valid));
  });

  it('should refuse flagged metrics by default', () => {
    const csv = join(dir, 'strip.csv');
    const result = new MetricsWriter().write(csv, flagged);

    expect(result).toEqual({
      written: false,
      path: join(dir, 'strip.json'),
      reasons: ['beat-count-implausible'],
    });
    expect(existsSync(join(dir, 'strip.json'))).toBe(false);
  });

  it('should write flagged metrics when allowed', () => {
    const csv = join(dir, 'strip.csv');
    new MetricsWriter({ allowFlagged: true }).write(csv, flagged);

    const written = JSON.parse(readFileSync(join(dir, 'strip.json'), 'utf-8'));
    expect(written.is_valid).toBe(false);
  });

  it('should serialize compactly when pretty printing is off', () => {
    const json = new MetricsWriter({ prettyPrint: false }).serialize(valid);
    expect(json).toBe(
      '{"voltage_extremes":[-0.5,1.2],"duration":4,"beats":[0.5,1.5,2.5,3.5],"num_beats":4,' +
        '"window":[0,4],"is_valid":true,"mean_hr_bpm":60}'
    );
  });
});
