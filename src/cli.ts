#!/usr/bin/env node
import { loadEnvConfig, loadSettings } from './config';
import { StatisticsReporter } from './export';
import { runStatistics } from './runner';
import { Logger } from './utils/logger';

function bootstrap() {
  const settings = loadSettings();
  const env = loadEnvConfig();

  const logger = new Logger({
    level: env.logLevel ?? settings.logging.level,
    format: env.logFormat ?? settings.logging.format,
    bindings: { component: 'sample-stats' }
  });

  const samplePath = process.argv[2] ?? env.samplePath ?? settings.input.sample_path;
  logger.debug('Bootstrap complete', {
    samplePath,
    statistics: settings.statistics,
    digits: settings.report.digits,
    exportCsv: settings.report.export_csv
  });

  const { summary } = runStatistics({ samplePath, settings, logger });
  const reporter = new StatisticsReporter({ logger, config: settings.report });
  process.stdout.write(reporter.render(summary));
}

try {
  bootstrap();
} catch (error) {
  // eslint-disable-next-line no-console
  console.error('Bootstrap failed', error instanceof Error ? error.message : error);
  process.exitCode = 1;
}
