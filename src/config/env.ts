import { config as loadEnv } from 'dotenv';
import { resolve } from 'node:path';

import { LOG_FORMATS, LOG_LEVELS } from '../utils/logger';
import type { LogFormat, LogLevel } from '../utils/logger';
import type { EnvConfig } from './types';

let cachedEnv: EnvConfig | null = null;

function pickLevel(value: string | undefined): LogLevel | undefined {
  return LOG_LEVELS.find((level) => level === value?.toLowerCase());
}

function pickFormat(value: string | undefined): LogFormat | undefined {
  return LOG_FORMATS.find((format) => format === value?.toLowerCase());
}

export function readEnvConfig(source: NodeJS.ProcessEnv): EnvConfig {
  const samplePath = source.STATS_SAMPLE_PATH?.trim();
  return {
    logLevel: pickLevel(source.STATS_LOG_LEVEL),
    logFormat: pickFormat(source.STATS_LOG_FORMAT),
    samplePath: samplePath ? samplePath : undefined
  };
}

export function loadEnvConfig(): EnvConfig {
  if (cachedEnv) {
    return cachedEnv;
  }

  loadEnv({ path: resolve(process.cwd(), '.env') });

  cachedEnv = readEnvConfig(process.env);
  return cachedEnv;
}
