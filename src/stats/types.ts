/** Read-only view over the observations a statistic is computed from. */
export type Sample = readonly number[];

/** `null` marks a statistic that has no value for the given sample. */
export type StatisticResult = number | null;

export type StatFn = (sample: Sample) => StatisticResult;

export type StatisticName = 'mean' | 'stddev' | 'median' | 'l2';

export interface StatisticEntry {
  name: StatisticName;
  value: StatisticResult;
}

export interface StatisticSummary {
  count: number;
  results: StatisticEntry[];
}
