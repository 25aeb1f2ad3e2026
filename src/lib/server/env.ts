import { z } from 'zod';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

const EnvSchema = z.object({
  SLEEPER_API_BASE_URL: z.string().url().default('https://api.sleeper.app/v1'),
  SLEEPER_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  SLEEPER_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  SLEEPER_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(500),
  RIVALRY_BATCH_SIZE: z.coerce.number().int().positive().default(6),
  RIVALRY_CONCURRENCY: z.coerce.number().int().positive().default(6),
  RIVALRY_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
  RIVALRY_RESULT_TTL_MINUTES: z.coerce.number().positive().default(15),
  RIVALRY_DEFAULT_SEASON: z.string().regex(/^\d{4}$/).optional(),
  RIVALRY_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export type Env = z.infer<typeof EnvSchema>;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function loadEnv(input: Partial<NodeJS.ProcessEnv>): Env {
  // Empty strings from hosting dashboards should fall back to defaults.
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value.trim();
  }
  return EnvSchema.parse(cleaned);
}

/** Season the app defaults to when a request names none. */
export function getDefaultSeason(env: Env, now: Date = new Date()): string {
  if (env.RIVALRY_DEFAULT_SEASON) return env.RIVALRY_DEFAULT_SEASON;
  // Jan-Feb still belong to the previous NFL season
  const year = now.getUTCFullYear();
  return String(now.getUTCMonth() < 2 ? year - 1 : year);
}
