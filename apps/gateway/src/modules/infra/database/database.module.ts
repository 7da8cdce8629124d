// src/modules/infra/database/database.module.ts
import { Global, Inject, Logger, Module, OnModuleDestroy } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { Pool } from 'pg';
import type { Env } from '../../../config/env.validation';

/**
 * Neutral DI token so callers don't care about the underlying driver.
 */
export const DATABASE_POOL = Symbol('DATABASE_POOL');

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: DATABASE_POOL,
      inject: [ConfigService],
      useFactory: (cfg: ConfigService<Env, true>): Pool => {
        // Prefer a single DATABASE_URL if provided, otherwise compose from PG_* pieces.
        const fromUrl = cfg.get('DATABASE_URL', { infer: true });
        const user = cfg.get('PG_USER', { infer: true });
        const pass = cfg.get('PG_PASSWORD', { infer: true });
        const host = cfg.get('PG_HOST', { infer: true });
        const port = cfg.get('PG_PORT', { infer: true });
        const db = cfg.get('PG_DB', { infer: true });

        const connStr =
          fromUrl ??
          `postgresql://${encodeURIComponent(user)}:${encodeURIComponent(pass)}@${host}:${port}/${db}`;

        const logger = new Logger('DB');
        logger.debug(connStr.replace(/:([^:@/]*)@/, ':****@'));

        const pool = new Pool({
          connectionString: connStr,
          // a stalled credential lookup fails the login instead of hanging it
          query_timeout: cfg.get('PG_QUERY_TIMEOUT_MS', { infer: true }),
          connectionTimeoutMillis: cfg.get('PG_QUERY_TIMEOUT_MS', { infer: true }),
        });

        pool.on('error', (err: Error) => {
          logger.error('Pool error', err.stack);
        });

        return pool;
      },
    },
  ],
  exports: [DATABASE_POOL],
})
export class DatabaseModule implements OnModuleDestroy {
  constructor(@Inject(DATABASE_POOL) private readonly pool: Pool) {}

  async onModuleDestroy() {
    await this.pool.end();
  }
}
