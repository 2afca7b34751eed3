/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Env vars are parsed and validated once at startup; a bad value fails the
 *   boot with a zod error instead of surfacing later as `undefined`.
 * - Local runs read backend/.env through dotenv; deployed runs get real env vars.
 *
 * NOTES:
 * - NODE_ENV is an enum so `nodeEnv === 'production'` checks cannot be fooled
 *   by 'prod' or 'staging'.
 * - Boolean flags accept only the strings 'true' / 'false'.
 */

import 'dotenv/config';
import { z } from 'zod';

const flag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(fallback)
    .transform((v) => v === 'true');

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    DATABASE_URL: z.string().min(1),
    REDIS_URL: z.string().min(1),

    LOG_LEVEL: z
      .enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
      .default('info'),
    SERVICE_NAME: z.string().default('account-desk-backend'),

    BCRYPT_COST: z.coerce.number().int().min(10).max(15).default(12),
    SESSION_TTL_SECONDS: z.coerce.number().int().min(300).max(7 * 24 * 3600).default(24 * 3600),

    /** false: an account with no users answers 404 instead of an empty list. */
    ACCOUNT_USER_LIST_ALLOW_EMPTY: flag('true'),
    /** Fallback redirect after a profile save when no same-site referrer came with it. */
    PROFILE_SUCCESS_URL: z.string().startsWith('/').default('/'),

    SEED_ON_START: flag('false'),
    SEED_TENANT_KEY: z.string().default('acme'),
    SEED_TENANT_NAME: z.string().default('Acme Provider'),
    SEED_ADMIN_EMAIL: z.string().email().default('admin@example.com'),
    SEED_ADMIN_PASSWORD: z.string().min(8).default('change-me-please'),
  })
  .transform((env) => ({
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    databaseUrl: env.DATABASE_URL,
    redisUrl: env.REDIS_URL,
    logLevel: env.LOG_LEVEL,
    serviceName: env.SERVICE_NAME,
    bcryptCost: env.BCRYPT_COST,
    sessionTtlSeconds: env.SESSION_TTL_SECONDS,
    accountUsers: { allowEmpty: env.ACCOUNT_USER_LIST_ALLOW_EMPTY },
    profile: { successUrl: env.PROFILE_SUCCESS_URL },
    seed: {
      enabled: env.SEED_ON_START,
      tenantKey: env.SEED_TENANT_KEY,
      tenantName: env.SEED_TENANT_NAME,
      adminEmail: env.SEED_ADMIN_EMAIL,
      adminPassword: env.SEED_ADMIN_PASSWORD,
    },
  }));

export type AppConfig = z.output<typeof envSchema>;

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return envSchema.parse(env);
}
