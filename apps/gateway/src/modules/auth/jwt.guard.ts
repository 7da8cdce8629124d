/**
 * Nest guards that put an AuthGate in front of a route.
 * Admitted requests get `req.principal`; every rejection becomes the same 401.
 */
import {
  CanActivate,
  ExecutionContext,
  Inject,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import type { Request } from 'express';
import { ACCESS_GATE, REFRESH_GATE, UNAUTHORIZED_MESSAGE } from './auth.constants';
import { AuthGate, AuthPrincipal } from './auth-gate';

export type AuthenticatedRequest = Request & { principal?: AuthPrincipal };

abstract class BearerAuthGuard implements CanActivate {
  protected constructor(private readonly gate: AuthGate) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const req = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const outcome = await this.gate.inspect(req);
    if (outcome.state === 'Rejected') {
      throw new UnauthorizedException(UNAUTHORIZED_MESSAGE);
    }
    req.principal = outcome.principal;
    return true;
  }
}

/** Requires a valid access token. */
@Injectable()
export class JwtAuthGuard extends BearerAuthGuard {
  constructor(@Inject(ACCESS_GATE) gate: AuthGate) {
    super(gate);
  }
}

/** Requires a valid refresh token (POST /v1/auth/refresh only). */
@Injectable()
export class RefreshJwtAuthGuard extends BearerAuthGuard {
  constructor(@Inject(REFRESH_GATE) gate: AuthGate) {
    super(gate);
  }
}
