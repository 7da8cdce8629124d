// src/main.ts
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import type { Env } from './config/env.validation';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    logger: ['error', 'warn', 'debug', 'log', 'verbose'],
  });
  // closes the pg pool via DatabaseModule.onModuleDestroy
  app.enableShutdownHooks();

  const cfg = app.get<ConfigService<Env, true>>(ConfigService);
  const port = cfg.get('PORT', { infer: true });
  await app.listen(port, '0.0.0.0');

  new Logger('Bootstrap').log(`Gateway up on :${port} (${cfg.get('APP_ENV', { infer: true })})`);
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(
    'Startup failed',
    err instanceof Error ? err.stack : String(err),
  );
  process.exit(1);
});
