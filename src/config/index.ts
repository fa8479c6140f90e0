import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

const configSchema = z.object({
  // HTTP
  host: z.string().default('0.0.0.0'),
  port: z.coerce.number().int().positive().default(5000),

  // Catalog storage (better-sqlite3 file; ':memory:' is accepted)
  databasePath: z.string().optional(),

  // Journal
  wordsPerMinute: z.coerce.number().int().positive().default(200),
  sessionTtlMinutes: z.coerce.number().int().positive().default(60),
  sessionSweepCron: z.string().min(1).default('*/5 * * * *'),

  logLevel: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Empty strings count as unset
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    host: env('HOST'),
    port: env('PORT'),
    databasePath: env('DATABASE_PATH'),
    wordsPerMinute: env('WORDS_PER_MINUTE'),
    sessionTtlMinutes: env('SESSION_TTL_MINUTES'),
    sessionSweepCron: env('SESSION_SWEEP_CRON'),
    logLevel: env('LOG_LEVEL'),
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`);
  }
  return result.data;
}
