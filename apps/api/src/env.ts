import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  CORS_ORIGIN: z.string().optional(),

  MEILI_HOST: z.string().url().default('http://127.0.0.1:7700'),
  MEILI_API_KEY: z.string().default(''),
  MEILI_INDEX: z.string().min(1).default('properties'),
  MEILI_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
  MEILI_TASK_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  MEILI_MAX_TOTAL_HITS: z.coerce.number().int().positive().default(100_000),

  // Unset leaves the admin routes unmounted.
  ADMIN_API_KEY: z.string().min(1).optional(),

  POSTCODES_API_BASE_URL: z.string().url().default('https://api.postcodes.io'),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  LOG_PRETTY: z.enum(['true', 'false']).optional()
});

export type Env = z.infer<typeof envSchema>;

export function getEnv(): Env {
  const parsed = envSchema.safeParse(process.env);
  if (!parsed.success) {
    throw new Error(`Invalid environment variables: ${parsed.error.message}`);
  }
  return parsed.data;
}
