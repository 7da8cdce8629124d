// src/modules/auth/auth.options.ts
import { ConfigService } from '@nestjs/config';
import type { Env } from '../../config/env.validation';
import { SigningSecret } from './signing-secret';

export interface AuthOptions {
  accessSecret: SigningSecret;
  /** Same key as accessSecret unless REFRESH_JWT_SECRET is set. */
  refreshSecret: SigningSecret;
  accessTtlSeconds: number;
  refreshTtlSeconds: number;
  bcryptCost: number;
}

export function authOptionsFromConfig(cfg: ConfigService<Env, true>): AuthOptions {
  const accessSecret = SigningSecret.from(cfg.get('JWT_SECRET', { infer: true }), 'JWT_SECRET');
  const refreshRaw = cfg.get('REFRESH_JWT_SECRET', { infer: true });

  return {
    accessSecret,
    refreshSecret:
      refreshRaw === undefined ? accessSecret : SigningSecret.from(refreshRaw, 'REFRESH_JWT_SECRET'),
    accessTtlSeconds: cfg.get('JWT_ACCESS_TTL', { infer: true }),
    refreshTtlSeconds: cfg.get('JWT_REFRESH_TTL', { infer: true }),
    bcryptCost: cfg.get('BCRYPT_COST', { infer: true }),
  };
}
