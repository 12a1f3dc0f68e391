import os from 'node:os';
import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  LOG_FORMAT: z.enum(['pretty', 'json']).default('pretty'),
  HTTP_USER_AGENT: z.string().default('nfl-spreads/0.1 (historical research)'),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  /** Minimum spacing between two requests to the same site */
  RATE_LIMIT_MS: z.coerce.number().int().nonnegative().default(250),
  CONCURRENCY: z.coerce.number().int().positive().default(() => os.availableParallelism()),
  /** First season both sources carry spread history for */
  EARLIEST_SEASON: z.coerce.number().int().default(2008),
});

export const config = envSchema.parse(process.env);
export type Config = z.infer<typeof envSchema>;
