// src/modules/auth/auth.controller.ts
import { Body, Controller, Get, HttpCode, Post, UseGuards } from '@nestjs/common';
import {
  AuthViewZ,
  LoginRequestZ,
  SignupRequestZ,
  UserViewZ,
} from '@warden/types-zod';
import type {
  AuthViewZod,
  LoginRequestZod,
  SignupRequestZod,
  TokenViewZod,
  UserViewZod,
} from '@warden/types-zod';
import { ZodValidationPipe } from '../../common/pipes/zod-validation.pipe';
import type { AuthPrincipal } from './auth-gate';
import { AuthService, TokenPair } from './auth.service';
import { CurrentUser } from './current-user.decorator';
import { JwtAuthGuard, RefreshJwtAuthGuard } from './jwt.guard';
import type { IssuedToken } from './token-issuer';

function toTokenView({ token, claims }: IssuedToken): TokenViewZod {
  return {
    tokenType: 'Bearer',
    token,
    issuedAt: claims.iat,
    expiresIn: claims.exp - claims.iat,
    expiresAt: claims.exp,
  };
}

function toAuthView(pair: TokenPair): AuthViewZod {
  // Normalize and validate response shape with Zod before returning
  return AuthViewZ.parse({
    access: toTokenView(pair.access),
    refresh: toTokenView(pair.refresh),
  });
}

/**
 * AuthController handles signup, login, token refresh, and user info retrieval endpoints.
 * All routes are prefixed with /v1/auth.
 */
@Controller('v1/auth')
export class AuthController {
  constructor(private readonly auth: AuthService) {}

  /**
   * POST /v1/auth/signup
   * Creates an account; the password is stored only as a bcrypt digest.
   */
  @Post('signup')
  @HttpCode(201)
  async signup(
    @Body(new ZodValidationPipe(SignupRequestZ)) dto: SignupRequestZod,
  ): Promise<UserViewZod> {
    return UserViewZ.parse(await this.auth.signup(dto));
  }

  /**
   * POST /v1/auth/login
   * Returns an access/refresh token pair for valid credentials.
   */
  @Post('login')
  @HttpCode(201)
  async login(
    @Body(new ZodValidationPipe(LoginRequestZ)) dto: LoginRequestZod,
  ): Promise<AuthViewZod> {
    return toAuthView(await this.auth.login(dto.email, dto.password));
  }

  /**
   * POST /v1/auth/refresh
   * Requires `Authorization: Bearer <refresh token>`.
   */
  @Post('refresh')
  @HttpCode(201)
  @UseGuards(RefreshJwtAuthGuard)
  async refresh(@CurrentUser() principal: AuthPrincipal): Promise<AuthViewZod> {
    return toAuthView(await this.auth.refresh(principal.subject));
  }

  /**
   * GET /v1/auth/me
   * Requires `Authorization: Bearer <access token>`.
   */
  @Get('me')
  @UseGuards(JwtAuthGuard)
  async me(@CurrentUser() principal: AuthPrincipal): Promise<UserViewZod> {
    return UserViewZ.parse(await this.auth.me(principal.subject));
  }
}
