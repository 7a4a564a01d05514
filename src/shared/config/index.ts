import { z } from 'zod';

const commaSeparated = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((item) => item.trim().toLowerCase())
      .filter(Boolean)
  );

const envSchema = z.object({
  PORT: z.coerce.number().default(3000),
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  DATABASE_URL: z.string().url(),
  REDIS_URL: z.string().url(),
  ADMIN_API_KEY: z.string().min(1),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  METRICS_ENABLED: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),
  // Identity tokens
  TOKEN_SECRET: z.string().min(32),
  TOKEN_ISSUER: z.string().min(1).default('tenant-gate'),
  TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(900),
  // Tenant resolution
  TENANT_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(5),
  RESERVED_SUBDOMAINS: commaSeparated.default('www,api,app'),
  // Shared store and rate limiting
  STORE_TIMEOUT_MS: z.coerce.number().int().positive().default(50),
  RATE_LIMIT_DEGRADATION: z.enum(['fail-open', 'fail-closed']).default('fail-open'),
  RATE_LIMIT_STATE_TTL_SECONDS: z.coerce.number().int().positive().default(120),
  DEGRADED_RETRY_AFTER_SECONDS: z.coerce.number().positive().default(1),
});

export type Env = z.infer<typeof envSchema>;

function loadConfig(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = Object.entries(result.error.flatten().fieldErrors)
      .map(([key, messages]) => `  ${key}: ${messages?.join(', ') ?? 'Invalid'}`)
      .join('\n');

    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}

export const config = loadConfig();
