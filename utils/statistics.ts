import type { CellValue } from '../types';

export const isMissing = (value: CellValue): value is null => value === null;

export const presentNumbers = (values: readonly CellValue[]): number[] =>
  values.filter((value): value is number => typeof value === 'number');

export const mean = (values: readonly number[]): number | null =>
  values.length === 0 ? null : values.reduce((a, b) => a + b, 0) / values.length;

// Sample standard deviation (n - 1 denominator)
export const sampleStd = (values: readonly number[]): number | null => {
  if (values.length < 2) return null;
  const avg = values.reduce((a, b) => a + b, 0) / values.length;
  const squares = values.reduce((acc, v) => acc + (v - avg) ** 2, 0);
  return Math.sqrt(squares / (values.length - 1));
};

/**
 * Quantile by linear interpolation between the closest ranks.
 * `sorted` must be in ascending order.
 */
export const quantile = (sorted: readonly number[], q: number): number | null => {
  if (sorted.length === 0) return null;
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const fraction = position - lower;
  return sorted[lower] + (sorted[upper] - sorted[lower]) * fraction;
};

export const sortAscending = (values: readonly number[]): number[] =>
  [...values].sort((a, b) => a - b);

/**
 * Most frequent non-missing value. Ties go to the value seen first in row
 * order. Returns `null` when nothing is observed.
 */
export const mostFrequent = (values: readonly CellValue[]): { value: CellValue; count: number } | null => {
  const counts = new Map<CellValue, number>();
  for (const value of values) {
    if (isMissing(value)) continue;
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  let best: { value: CellValue; count: number } | null = null;
  // Map iteration follows insertion order, i.e. first appearance
  for (const [value, count] of counts) {
    if (!best || count > best.count) best = { value, count };
  }
  return best;
};

export const uniqueCount = (values: readonly CellValue[]): number =>
  new Set(values.filter(value => !isMissing(value))).size;

/**
 * Pearson correlation over the rows where both values are present.
 * Undefined (null) with fewer than two pairs or a constant side.
 */
export const pearson = (xs: readonly CellValue[], ys: readonly CellValue[]): number | null => {
  const pairs: [number, number][] = [];
  const length = Math.min(xs.length, ys.length);
  for (let i = 0; i < length; i++) {
    const x = xs[i];
    const y = ys[i];
    if (typeof x === 'number' && typeof y === 'number') pairs.push([x, y]);
  }
  if (pairs.length < 2) return null;

  const meanX = pairs.reduce((acc, [x]) => acc + x, 0) / pairs.length;
  const meanY = pairs.reduce((acc, [, y]) => acc + y, 0) / pairs.length;

  let covariance = 0;
  let varianceX = 0;
  let varianceY = 0;
  for (const [x, y] of pairs) {
    covariance += (x - meanX) * (y - meanY);
    varianceX += (x - meanX) ** 2;
    varianceY += (y - meanY) ** 2;
  }
  if (varianceX === 0 || varianceY === 0) return null;

  const r = covariance / Math.sqrt(varianceX * varianceY);
  return Math.max(-1, Math.min(1, r));
};

/**
 * Gaussian kernel density estimate with Scott's rule bandwidth
 * (`std * n^(-1/5)`). Returns null when the bandwidth is zero or undefined.
 */
export const gaussianKde = (values: readonly number[]): ((x: number) => number) | null => {
  const std = sampleStd(values);
  if (std === null || std === 0) return null;

  const n = values.length;
  const bandwidth = std * Math.pow(n, -1 / 5);
  const norm = 1 / (n * bandwidth * Math.sqrt(2 * Math.PI));

  return (x: number) => {
    let sum = 0;
    for (const v of values) {
      const z = (x - v) / bandwidth;
      sum += Math.exp(-0.5 * z * z);
    }
    return sum * norm;
  };
};
