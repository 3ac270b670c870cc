import { EstimationError } from './errors.js';
import type { CostRange } from './types.js';

export const clamp = (value: number, min: number, max: number): number => Math.min(max, Math.max(min, value));

/** Pod-count style ratio: a zero denominator means there is nothing to divide, so the ratio is 0. */
/** Rounds to the nearest integer, ties to even (4.5 → 4, 5.5 → 6). */
export const roundHalfEven = (value: number): number => {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
};

export const ratio = (numerator: number, denominator: number): number =>
  denominator > 0 ? numerator / denominator : 0;

export const requirePositive = (value: number, field: string): number => {
  if (!Number.isFinite(value) || value <= 0) {
    throw new EstimationError('InvalidInput', field, `${field} must be greater than 0 (got ${value})`);
  }
  return value;
};

export const scaleRange = (amount: number, band: readonly [number, number, number]): CostRange => ({
  low: amount * band[0],
  best: amount * band[1],
  high: amount * band[2],
});

export const subtractRanges = (a: CostRange, b: CostRange): CostRange => ({
  low: a.low - b.low,
  best: a.best - b.best,
  high: a.high - b.high,
});

export const sumRanges = (ranges: readonly CostRange[]): CostRange =>
  ranges.reduce<CostRange>(
    (total, range) => ({
      low: total.low + range.low,
      best: total.best + range.best,
      high: total.high + range.high,
    }),
    { low: 0, best: 0, high: 0 },
  );

export const multiplyRange = (range: CostRange, factor: number): CostRange => ({
  low: range.low * factor,
  best: range.best * factor,
  high: range.high * factor,
});

export const isMonotonic = (range: CostRange): boolean =>
  range.low >= 0 && range.low <= range.best && range.best <= range.high;
