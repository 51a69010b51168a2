import { readFileSync } from 'node:fs';
import { basename, resolve } from 'node:path';

import type { Settings } from './config';
import { StatisticsReporter, formatStatistic } from './export';
import { summarize } from './stats';
import type { StatisticSummary } from './stats';
import { Logger } from './utils/logger';
import { parseSample } from './utils/text';

export interface RunStatisticsOptions {
  samplePath: string;
  settings: Settings;
  logger: Logger;
}

export interface RunStatisticsResult {
  summary: StatisticSummary;
  exportPath: string | null;
}

export function runStatistics(options: RunStatisticsOptions): RunStatisticsResult {
  const { settings } = options;
  const samplePath = resolve(options.samplePath);
  const logger = options.logger.child({ source: basename(samplePath) });

  try {
    const sample = parseSample(readFileSync(samplePath, 'utf-8'));
    logger.info('Sample loaded', { samplePath, count: sample.length });

    const summary = summarize(sample, settings.statistics);
    summary.results.forEach((entry) => {
      logger.info('Statistic computed', {
        statistic: entry.name,
        present: entry.value !== null,
        value: formatStatistic(entry.value, settings.report.digits)
      });
      if (entry.value !== null && !Number.isFinite(entry.value)) {
        logger.warn('Statistic is not finite', { statistic: entry.name, count: sample.length });
      }
    });

    const reporter = new StatisticsReporter({ logger, config: settings.report });
    const exportPath = reporter.export(summary, basename(samplePath));
    if (exportPath) {
      logger.info('CSV export ready', { outputPath: exportPath });
    }

    return { summary, exportPath };
  } catch (error) {
    logger.error('Statistics run failed', {
      error: error instanceof Error ? error.message : String(error)
    });
    throw error;
  }
}
