import { mkdirSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';

import type { ReportConfig } from '../config';
import type { StatisticResult, StatisticSummary } from '../stats';
import { Logger } from '../utils/logger';

interface StatisticsReporterDependencies {
  logger: Logger;
  config: ReportConfig;
}

/** Absent results render empty so they never read as a number. */
export function formatStatistic(value: StatisticResult, digits: number): string {
  if (value === null) {
    return '';
  }
  if (!Number.isFinite(value)) {
    return String(value);
  }
  return value.toFixed(digits);
}

function escapeCsv(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function fileSafe(value: string): string {
  const cleaned = value.replace(/\.[^./\\]*$/, '').replace(/[^A-Za-z0-9_-]+/g, '-');
  return cleaned.replace(/^-+|-+$/g, '') || 'sample';
}

export class StatisticsReporter {
  constructor(private readonly deps: StatisticsReporterDependencies) {}

  render(summary: StatisticSummary): string {
    const rows = ['statistic,value'];
    summary.results.forEach((entry) => {
      rows.push([escapeCsv(entry.name), formatStatistic(entry.value, this.deps.config.digits)].join(','));
    });
    rows.push(`count,${summary.count}`);
    return `${rows.join('\n')}\n`;
  }

  export(summary: StatisticSummary, sourceName: string): string | null {
    if (!this.deps.config.export_csv) {
      this.deps.logger.debug('CSV export disabled');
      return null;
    }

    const outputDir = resolve(this.deps.config.output_dir);
    mkdirSync(outputDir, { recursive: true });

    const fileName = `${this.deps.config.output_basename}_${fileSafe(sourceName)}.csv`;
    const outputPath = resolve(outputDir, fileName);
    writeFileSync(outputPath, this.render(summary), 'utf-8');

    this.deps.logger.debug('CSV export written', {
      outputPath,
      rows: summary.results.length
    });
    return outputPath;
  }
}
