// src/modules/auth/auth.module.ts
import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { APP_FILTER } from '@nestjs/core';
import type { Env } from '../../config/env.validation';
import { AuthExceptionFilter } from '../../common/filters/auth-exception.filter';
import { UsersModule } from '../users/users.module';
import {
  ACCESS_GATE,
  ACCESS_TOKEN_ISSUER,
  AUTH_OPTIONS,
  CLOCK,
  PASSWORD_HASHER,
  REFRESH_GATE,
  REFRESH_TOKEN_ISSUER,
  TOKEN_TYPES,
} from './auth.constants';
import { AuthController } from './auth.controller';
import { AuthGate } from './auth-gate';
import { AuthOptions, authOptionsFromConfig } from './auth.options';
import { AuthService } from './auth.service';
import { Clock, systemClock } from './clock';
import { JwtAuthGuard, RefreshJwtAuthGuard } from './jwt.guard';
import { BcryptPasswordHasher } from './password-hasher';
import { TokenIssuer } from './token-issuer';
import { TokenValidator } from './token-validator';

@Module({
  imports: [ConfigModule, UsersModule],
  providers: [
    { provide: CLOCK, useValue: systemClock },
    {
      provide: AUTH_OPTIONS,
      inject: [ConfigService],
      useFactory: (cfg: ConfigService<Env, true>) => authOptionsFromConfig(cfg),
    },
    {
      provide: PASSWORD_HASHER,
      inject: [AUTH_OPTIONS],
      useFactory: (opts: AuthOptions) => new BcryptPasswordHasher(opts.bcryptCost),
    },
    // Access and refresh tokens carry distinct `typ` headers, so they are not interchangeable even under one secret
    {
      provide: ACCESS_TOKEN_ISSUER,
      inject: [AUTH_OPTIONS, CLOCK],
      useFactory: (opts: AuthOptions, clock: Clock) =>
        new TokenIssuer(opts.accessSecret, clock, TOKEN_TYPES.access),
    },
    {
      provide: REFRESH_TOKEN_ISSUER,
      inject: [AUTH_OPTIONS, CLOCK],
      useFactory: (opts: AuthOptions, clock: Clock) =>
        new TokenIssuer(opts.refreshSecret, clock, TOKEN_TYPES.refresh),
    },
    {
      provide: ACCESS_GATE,
      inject: [AUTH_OPTIONS, CLOCK],
      useFactory: (opts: AuthOptions, clock: Clock) =>
        new AuthGate(new TokenValidator(opts.accessSecret, clock, TOKEN_TYPES.access), 'access'),
    },
    {
      provide: REFRESH_GATE,
      inject: [AUTH_OPTIONS, CLOCK],
      useFactory: (opts: AuthOptions, clock: Clock) =>
        new AuthGate(new TokenValidator(opts.refreshSecret, clock, TOKEN_TYPES.refresh), 'refresh'),
    },
    AuthService,
    JwtAuthGuard,
    RefreshJwtAuthGuard,
    { provide: APP_FILTER, useClass: AuthExceptionFilter },
  ],
  controllers: [AuthController],
})
export class AuthModule {}
