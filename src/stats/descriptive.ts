import type { Sample, StatisticResult } from './types';

function sum(values: Sample): number {
  return values.reduce((acc, value) => acc + value, 0);
}

/**
 * Arithmetic mean. An empty sample has a mean of 0.
 */
export function mean(values: Sample): StatisticResult {
  if (values.length === 0) {
    return 0;
  }
  return sum(values) / values.length;
}

/**
 * Sample standard deviation (Bessel-corrected, divides by n - 1).
 *
 * Undefined for an empty sample. A single value yields NaN, which is what
 * 0 / 0 produces; callers filtering non-finite results must check for it.
 */
export function stddev(values: Sample): StatisticResult {
  if (values.length === 0) {
    return null;
  }
  const avg = mean(values) ?? 0;
  const squaredDeviations = values.map((value) => (value - avg) * (value - avg));
  const variance = sum(squaredDeviations) / (values.length - 1);
  return Math.sqrt(variance);
}

/**
 * Median, taking the lower middle element when the sample has an even
 * length. Undefined for an empty sample.
 *
 * Values must be comparable: NaN has no place in the ordering.
 */
export function median(values: Sample): StatisticResult {
  if (values.length === 0) {
    return null;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 0) {
    return sorted[mid - 1];
  }
  return sorted[mid];
}

/**
 * Euclidean norm. An empty sample has a norm of 0.
 */
export function l2(values: Sample): StatisticResult {
  const squares = values.map((value) => value * value);
  return Math.sqrt(sum(squares));
}
