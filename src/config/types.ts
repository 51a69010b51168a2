import type { z } from 'zod';

import type { LogLevel, LogFormat } from '../utils/logger';
import type { SettingsSchema } from './schema';

export type Settings = z.infer<typeof SettingsSchema>;
export type LoggingConfig = Settings['logging'];
export type InputConfig = Settings['input'];
export type ReportConfig = Settings['report'];

export interface EnvConfig {
  logLevel?: LogLevel;
  logFormat?: LogFormat;
  samplePath?: string;
}
