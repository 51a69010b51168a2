export { mean, stddev, median, l2 } from './descriptive';
export { STATISTICS, STATISTIC_NAMES, isStatisticName, summarize } from './registry';
export type {
  Sample,
  StatisticResult,
  StatFn,
  StatisticName,
  StatisticEntry,
  StatisticSummary
} from './types';
