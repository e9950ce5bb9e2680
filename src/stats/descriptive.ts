import type { NumericStats } from '../core/types.js';

export function round(value: number, decimals = 4): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Sample standard deviation (n - 1); 0 for fewer than two values. */
export function sampleStd(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const m = mean(values);
  const squared = values.reduce((sum, v) => sum + Math.pow(v - m, 2), 0);
  return Math.sqrt(squared / (values.length - 1));
}

/** Quantile of pre-sorted values, linear between the two closest ranks. */
export function quantile(sorted: readonly number[], q: number): number {
  if (sorted.length === 0) return 0;
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
}

export function describe(values: readonly number[]): NumericStats {
  const sorted = [...values].sort((a, b) => a - b);
  const count = sorted.length;

  return {
    count,
    mean: round(mean(sorted)),
    std: round(sampleStd(sorted)),
    min: count > 0 ? sorted[0] : 0,
    p25: round(quantile(sorted, 0.25)),
    median: round(quantile(sorted, 0.5)),
    p75: round(quantile(sorted, 0.75)),
    max: count > 0 ? sorted[count - 1] : 0,
  };
}
