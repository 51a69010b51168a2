export { mean, stddev, median, l2, STATISTICS, STATISTIC_NAMES, isStatisticName, summarize } from './stats';
export type {
  Sample,
  StatisticResult,
  StatFn,
  StatisticName,
  StatisticEntry,
  StatisticSummary
} from './stats';
export { parseSample, SampleParseError } from './utils/text';
