/**
 * Parameter decorator that injects the AuthPrincipal set by JwtAuthGuard / RefreshJwtAuthGuard.
 *
 * Usage:
 * ```ts
 * @UseGuards(JwtAuthGuard)
 * me(@CurrentUser() principal: AuthPrincipal) { ... }
 * ```
 */
import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { UNAUTHORIZED_MESSAGE } from './auth.constants';
import type { AuthPrincipal } from './auth-gate';
import type { AuthenticatedRequest } from './jwt.guard';

export function principalFromContext(ctx: ExecutionContext): AuthPrincipal {
  const req = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
  // Only reachable on an unguarded route
  if (!req.principal) throw new UnauthorizedException(UNAUTHORIZED_MESSAGE);
  return req.principal;
}

export const CurrentUser = createParamDecorator((_data: unknown, ctx: ExecutionContext) =>
  principalFromContext(ctx),
);
