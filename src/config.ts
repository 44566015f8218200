import { z } from 'zod';
import { EVENT_SECTIONS } from './adapters/vlr/urls.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  VLR_BASE_URL: z.string().url().default('https://www.vlr.gg'),
  MAX_CONCURRENCY: z.coerce.number().int().positive().default(4),
  BROWSER_CONCURRENCY: z.coerce.number().int().positive().default(1),
  RENDER_MODE_DEFAULT: z.enum(['http', 'browser']).default('http'),
  DETAIL_RENDER_MODE: z.enum(['http', 'browser']).optional(),
  RETRY_LIMIT: z.coerce.number().int().positive().default(3),
  MIN_REQUEST_INTERVAL_MS: z.coerce.number().int().nonnegative().default(2000),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  BACKOFF_DELAY_MS: z.coerce.number().int().nonnegative().default(5000),
  OUTPUT_FORMAT: z.enum(['table', 'sequence']).default('sequence'),
  UPSTREAM_UTC_OFFSET_MINUTES: z.coerce.number().int().default(0),
  RESPECT_ROBOTS_TXT: booleanFlag.default('true'),
  // Comma-separated, e.g. "matches,stats,agents"
  EVENT_SECTIONS: z
    .string()
    .default('matches')
    .transform((v) => v.split(',').map((s) => s.trim()).filter(Boolean))
    .pipe(z.array(z.enum(EVENT_SECTIONS)).min(1)),
});

export const config = envSchema.parse(process.env);
export type Config = z.infer<typeof envSchema>;
