import type { ReportConfig } from '@/types';
import { z } from 'zod';
import { DEFAULT_REGION } from '../cost/fetcher';

export const DEFAULT_DAYS = 30;

const optionsSchema = z.object({
  json: z.boolean().default(false),
  days: z.coerce.number().int().positive().default(DEFAULT_DAYS),
  region: z.string().min(1).optional(),
  color: z.boolean().default(true),
});

export type RawOptions = z.input<typeof optionsSchema>;

/**
 * Turns parsed command-line options into a {@link ReportConfig}.
 * The region falls back to `COST_EXPLORER_REGION`, then to us-east-1.
 */
export const loadConfig = (
  options: RawOptions,
  env: NodeJS.ProcessEnv = process.env
): ReportConfig => {
  const parsed = optionsSchema.parse(options);
  return {
    mode: parsed.json ? 'json' : 'human',
    days: parsed.days,
    region: parsed.region || env.COST_EXPLORER_REGION || DEFAULT_REGION,
    color: parsed.color,
  };
};

export const parseDays = (value: string) => z.coerce.number().int().positive().parse(value);
