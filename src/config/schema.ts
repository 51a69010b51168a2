import { z } from 'zod';

import { STATISTIC_NAMES, isStatisticName } from '../stats';
import type { StatisticName } from '../stats';

const StatisticNameSchema = z
  .string()
  .refine((value): value is StatisticName => isStatisticName(value), {
    message: `expected one of ${STATISTIC_NAMES.join(', ')}`
  });

export const SettingsSchema = z.object({
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
    format: z.enum(['json', 'pretty'])
  }),
  statistics: z.array(StatisticNameSchema).min(1),
  input: z.object({
    sample_path: z.string().min(1)
  }),
  report: z.object({
    digits: z.number().int().min(0).max(17),
    export_csv: z.boolean(),
    output_dir: z.string().min(1),
    output_basename: z.string().min(1)
  })
});
