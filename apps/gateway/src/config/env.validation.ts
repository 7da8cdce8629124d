// src/config/env.validation.ts
import { z } from 'zod';
import { MissingSecretError } from '../modules/auth/auth.errors';

const positiveInt = z.coerce.number().int().positive();

// dotenv yields '' for `KEY=`; treat it as unset
const optionalString = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.string().min(1).optional(),
);

/**
 * Environment schema for the gateway.
 * Parsed once by ConfigModule at bootstrap; a failure aborts startup.
 */
export const EnvZ = z
  .object({
    APP_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: positiveInt.default(4000),

    JWT_SECRET: z.string().min(1),
    REFRESH_JWT_SECRET: optionalString,
    JWT_ACCESS_TTL: positiveInt.default(60 * 15),
    JWT_REFRESH_TTL: positiveInt.default(60 * 60 * 24 * 14),
    BCRYPT_COST: z.coerce.number().int().min(4).max(31).default(10),

    DATABASE_URL: optionalString,
    PG_USER: z.string().default('postgres'),
    PG_PASSWORD: z.string().default(''),
    PG_HOST: z.string().default('localhost'),
    PG_PORT: positiveInt.default(5432),
    PG_DB: z.string().default('postgres'),
    PG_QUERY_TIMEOUT_MS: positiveInt.default(5000),
  })
  .refine((env) => env.JWT_REFRESH_TTL > env.JWT_ACCESS_TTL, {
    message: 'JWT_REFRESH_TTL must be greater than JWT_ACCESS_TTL',
    path: ['JWT_REFRESH_TTL'],
  });

export type Env = z.infer<typeof EnvZ>;

/**
 * `validate` hook for ConfigModule.forRoot.
 * A missing signing secret is reported on its own so the fatal cause is obvious in the boot log.
 */
export function validateEnv(raw: Record<string, unknown>): Env {
  const secret = raw.JWT_SECRET;
  if (typeof secret !== 'string' || secret.length === 0) {
    throw new MissingSecretError('JWT_SECRET');
  }

  const parsed = EnvZ.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.map(String).join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${detail}`);
  }
  return parsed.data;
}
