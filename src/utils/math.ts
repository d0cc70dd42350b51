/**
 * Array math utilities
 * @module utils/math
 */

/**
 * Smallest value of a non-empty array (loop based, safe for long recordings)
 */
export function minOf(values: readonly number[]): number {
  if (values.length === 0) {
    throw new RangeError('minOf requires at least one value');
  }

  let min = values[0];
  for (let i = 1; i < values.length; i++) {
    if (values[i] < min) min = values[i];
  }
  return min;
}

/**
 * Largest value of a non-empty array
 */
export function maxOf(values: readonly number[]): number {
  if (values.length === 0) {
    throw new RangeError('maxOf requires at least one value');
  }

  let max = values[0];
  for (let i = 1; i < values.length; i++) {
    if (values[i] > max) max = values[i];
  }
  return max;
}

/**
 * Consecutive differences: out[i] = values[i + 1] - values[i]
 */
export function diff(values: readonly number[]): number[] {
  const out: number[] = [];
  for (let i = 0; i < values.length - 1; i++) {
    out.push(values[i + 1] - values[i]);
  }
  return out;
}

/**
 * Index of the first maximum within [from, to] (inclusive)
 */
export function argmaxInRange(values: readonly number[], from: number, to: number): number {
  let best = from;
  for (let i = from + 1; i <= to; i++) {
    if (values[i] > values[best]) best = i;
  }
  return best;
}

/**
 * Index of the first element satisfying the predicate, or 0 when none does
 */
export function firstIndexOrZero(
  values: readonly number[],
  predicate: (value: number) => boolean
): number {
  const index = values.findIndex(predicate);
  return index === -1 ? 0 : index;
}

/**
 * Fraction of entries that are finite numbers (0 for an empty array)
 */
export function finiteFraction(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const finite = values.filter(v => Number.isFinite(v)).length;
  return finite / values.length;
}

/**
 * Piecewise-linear interpolation through (xs[k], ys[k]) evaluated at x.
 *
 * xs must ascend. Outside [xs[0], xs[last]] the end value is held.
 */
export function interpolateLinear(
  x: number,
  xs: readonly number[],
  ys: readonly number[]
): number {
  if (xs.length === 0 || xs.length !== ys.length) {
    throw new RangeError('interpolateLinear requires equal-length, non-empty knots');
  }

  const last = xs.length - 1;
  if (x <= xs[0]) return ys[0];
  if (x >= xs[last]) return ys[last];

  // Binary search for the segment containing x
  let lo = 0;
  let hi = last;
  while (hi - lo > 1) {
    const mid = (lo + hi) >> 1;
    if (xs[mid] <= x) lo = mid;
    else hi = mid;
  }

  const t = (x - xs[lo]) / (xs[hi] - xs[lo]);
  return ys[lo] + (ys[hi] - ys[lo]) * t;
}
