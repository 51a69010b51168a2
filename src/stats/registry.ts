import { l2, mean, median, stddev } from './descriptive';
import type { Sample, StatFn, StatisticEntry, StatisticName, StatisticSummary } from './types';

export const STATISTICS: Readonly<Record<StatisticName, StatFn>> = {
  mean,
  stddev,
  median,
  l2
};

export const STATISTIC_NAMES: readonly StatisticName[] = ['mean', 'stddev', 'median', 'l2'];

export function isStatisticName(value: string): value is StatisticName {
  return STATISTIC_NAMES.some((name) => name === value);
}

export function summarize(
  sample: Sample,
  names: readonly StatisticName[] = STATISTIC_NAMES
): StatisticSummary {
  const seen = new Set<StatisticName>();
  const results: StatisticEntry[] = [];

  names.forEach((name) => {
    if (seen.has(name)) return;
    seen.add(name);
    const statistic: StatFn = STATISTICS[name];
    results.push({ name, value: statistic(sample) });
  });

  return { count: sample.length, results };
}
