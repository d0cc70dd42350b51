/**
 * Synthetic ECG Signal Generator
 *
 * Generates single-lead time/voltage strips (millivolts) for tests and demos.
 *
 * @module signal/synthetic
 */

import type { RawSamples } from '../types';

/**
 * Synthetic ECG options
 */
export interface SyntheticECGOptions {
  /** Duration in seconds */
  duration?: number;
  /** Sample rate in Hz */
  sampleRate?: number;
  /** Heart rate in bpm */
  heartRate?: number;
  /** Peak noise amplitude (mV), 0 for a clean trace */
  noise?: number;
  /** Seed for the noise generator */
  seed?: number;
  /** P wave amplitude (mV) */
  pAmplitude?: number;
  /** QRS amplitude (mV) */
  qrsAmplitude?: number;
  /** T wave amplitude (mV) */
  tAmplitude?: number;
  /** Constant offset added to every sample (mV) */
  baseline?: number;
}

/**
 * Position of the R peak as a fraction of one beat
 */
export const R_PEAK_FRACTION = 0.3;

/**
 * Generate a single ECG beat waveform
 * Uses a simplified mathematical model
 */
function generateBeat(
  samplesPerBeat: number,
  pAmp: number,
  qrsAmp: number,
  tAmp: number
): number[] {
  const samples = new Array<number>(samplesPerBeat).fill(0);

  // Time points (as fraction of beat)
  const pStart = 0.1;
  const pPeak = 0.15;
  const pEnd = 0.2;
  const qStart = 0.25;
  const rPeak = R_PEAK_FRACTION;
  const sEnd = 0.35;
  const tStart = 0.4;
  const tPeak = 0.55;
  const tEnd = 0.7;

  for (let i = 0; i < samplesPerBeat; i++) {
    const t = i / samplesPerBeat;
    let value = 0;

    if (t >= pStart && t <= pEnd) {
      const pWidth = (pEnd - pStart) / 4;
      value += pAmp * Math.exp(-Math.pow((t - pPeak) / pWidth, 2));
    }

    if (t >= qStart && t <= sEnd) {
      const qrsWidth = (sEnd - qStart) / 6;

      // Q wave (small negative)
      if (t < rPeak - qrsWidth) {
        const qCenter = qStart + (rPeak - qStart) / 3;
        value -= qrsAmp * 0.1 * Math.exp(-Math.pow((t - qCenter) / (qrsWidth / 2), 2));
      }

      value += qrsAmp * Math.exp(-Math.pow((t - rPeak) / qrsWidth, 2));

      // S wave (negative)
      if (t > rPeak) {
        const sCenter = rPeak + (sEnd - rPeak) / 2;
        value -= qrsAmp * 0.25 * Math.exp(-Math.pow((t - sCenter) / (qrsWidth / 2), 2));
      }
    }

    if (t >= tStart && t <= tEnd) {
      const tWidth = (tEnd - tStart) / 4;
      value += tAmp * Math.exp(-Math.pow((t - tPeak) / tWidth, 2));
    }

    samples[i] = value;
  }

  return samples;
}

/**
 * Deterministic uniform generator in [0, 1) (mulberry32)
 */
function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let r = Math.imul(state ^ (state >>> 15), 1 | state);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Generate a synthetic single-lead ECG strip starting at t = 0
 */
export function generateSyntheticECG(options: SyntheticECGOptions = {}): RawSamples {
  const {
    duration = 10,
    sampleRate = 250,
    heartRate = 60,
    noise = 0,
    seed = 1,
    pAmplitude = 0.15,
    qrsAmplitude = 1.0,
    tAmplitude = 0.3,
    baseline = 0,
  } = options;

  const samplesPerBeat = Math.round((sampleRate * 60) / heartRate);
  const beat = generateBeat(samplesPerBeat, pAmplitude, qrsAmplitude, tAmplitude);
  const totalSamples = Math.round(sampleRate * duration);
  const random = createRandom(seed);

  const time: number[] = [];
  const voltage: number[] = [];

  for (let i = 0; i < totalSamples; i++) {
    let value = beat[i % samplesPerBeat] + baseline;
    if (noise > 0) {
      value += (random() - 0.5) * 2 * noise;
    }
    time.push(i / sampleRate);
    voltage.push(value);
  }

  return { time, voltage };
}

/**
 * Generate a flat line strip (no beats)
 */
export function generateFlatLine(
  duration: number = 10,
  sampleRate: number = 250,
  level: number = 0
): RawSamples {
  const totalSamples = Math.round(sampleRate * duration);
  const time: number[] = [];
  for (let i = 0; i < totalSamples; i++) {
    time.push(i / sampleRate);
  }
  return { time, voltage: new Array<number>(totalSamples).fill(level) };
}
