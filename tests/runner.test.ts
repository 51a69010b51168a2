import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import type { Settings } from '../src/config';
import { runStatistics } from '../src/runner';
import { Logger } from '../src/utils/logger';
import { SampleParseError } from '../src/utils/text';

interface LogRecord {
  level: string;
  message: string;
  metadata: Record<string, unknown> | null;
}

function makeSettings(outputDir: string, exportCsv: boolean): Settings {
  return {
    logging: { level: 'debug', format: 'json' },
    statistics: ['mean', 'median', 'stddev'],
    input: { sample_path: 'unused.txt' },
    report: { digits: 2, export_csv: exportCsv, output_dir: outputDir, output_basename: 'run' }
  };
}

describe('runStatistics', () => {
  let root: string;
  let lines: string[];
  let logger: Logger;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'sample-stats-run-'));
    lines = [];
    logger = new Logger({ level: 'info', format: 'json', sink: (line) => lines.push(line) });
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  function records(): LogRecord[] {
    return lines.map((line) => JSON.parse(line));
  }

  it('summarizes the sample file with the configured statistics', () => {
    const samplePath = join(root, 'readings.txt');
    writeFileSync(samplePath, '# readings\n4, 1\n3 2\n');

    const { summary, exportPath } = runStatistics({
      samplePath,
      settings: makeSettings(join(root, 'out'), false),
      logger
    });

    expect(summary.count).toBe(4);
    expect(summary.results.map((entry) => entry.name)).toEqual(['mean', 'median', 'stddev']);
    expect(summary.results[0].value).toBe(2.5);
    expect(summary.results[1].value).toBe(2);
    expect(exportPath).toBeNull();

    const computed = records().filter((record) => record.message === 'Statistic computed');
    expect(computed.map((record) => record.metadata)).toEqual([
      { source: 'readings.txt', statistic: 'mean', present: true, value: '2.50' },
      { source: 'readings.txt', statistic: 'median', present: true, value: '2.00' },
      { source: 'readings.txt', statistic: 'stddev', present: true, value: '1.29' }
    ]);
  });

  it('warns about non-finite statistics', () => {
    const samplePath = join(root, 'single.txt');
    writeFileSync(samplePath, '9');

    runStatistics({ samplePath, settings: makeSettings(join(root, 'out'), false), logger });

    const warnings = records().filter((record) => record.level === 'warn');
    expect(warnings).toHaveLength(1);
    expect(warnings[0].metadata).toEqual({ source: 'single.txt', statistic: 'stddev', count: 1 });
  });

  it('exports the summary when enabled', () => {
    const samplePath = join(root, 'readings.txt');
    writeFileSync(samplePath, '1 2 3');

    const { exportPath } = runStatistics({
      samplePath,
      settings: makeSettings(join(root, 'out'), true),
      logger
    });

    expect(exportPath).toBe(join(root, 'out', 'run_readings.csv'));
  });

  it('logs and rethrows parse failures', () => {
    const samplePath = join(root, 'broken.txt');
    writeFileSync(samplePath, '1\n2\nthree');

    expect(() =>
      runStatistics({ samplePath, settings: makeSettings(join(root, 'out'), false), logger })
    ).toThrow(SampleParseError);

    const failures = records().filter((record) => record.level === 'error');
    expect(failures.map((record) => record.metadata)).toEqual([
      { source: 'broken.txt', error: 'Invalid sample value "three" on line 3' }
    ]);
  });
});
