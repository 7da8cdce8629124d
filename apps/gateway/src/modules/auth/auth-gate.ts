// src/modules/auth/auth-gate.ts
import { Logger } from '@nestjs/common';
import type { IncomingHttpHeaders } from 'http';
import type { TokenKind } from './auth.constants';
import { TokenErrorKind, TokenValidationError } from './auth.errors';
import { TokenValidator } from './token-validator';
import type { JwtPayload } from './types/jwt-payload';

/** Authenticated identity attached to one in-flight request. */
export interface AuthPrincipal {
  subject: string;
  claims: JwtPayload;
}

export type GateRejectReason = 'MissingHeader' | 'MalformedHeader' | TokenErrorKind;

/**
 * Result of inspecting one request.
 * Unauthenticated -> HeaderParsed -> Admitted | Rejected; both end states are terminal.
 */
export type GateOutcome =
  | { readonly state: 'Admitted'; readonly principal: AuthPrincipal }
  | { readonly state: 'Rejected'; readonly reason: GateRejectReason };

/** The only part of a request the gate looks at. */
export interface GateRequest {
  headers: IncomingHttpHeaders;
}

const BEARER = /^Bearer ([^\s]+)$/i;

/**
 * Extracts `Authorization: Bearer <token>`, validates it and decides admit/reject.
 * Transport-agnostic: Nest guards (see jwt.guard.ts) call `inspect` and act on the outcome.
 */
export class AuthGate {
  private readonly logger: Logger;

  constructor(
    private readonly validator: TokenValidator,
    readonly tokenKind: TokenKind = 'access',
  ) {
    this.logger = new Logger(`AuthGate:${tokenKind}`);
  }

  async inspect(request: GateRequest): Promise<GateOutcome> {
    const header = request.headers.authorization;
    if (header === undefined || header === '') {
      return this.reject('MissingHeader');
    }

    const match = BEARER.exec(header);
    if (!match) {
      return this.reject('MalformedHeader');
    }

    try {
      const claims = await this.validator.validate(match[1]);
      this.logger.debug(`admitted sub=${claims.sub}`);
      return { state: 'Admitted', principal: { subject: claims.sub, claims } };
    } catch (err) {
      if (err instanceof TokenValidationError) {
        return this.reject(err.kind, err.detail);
      }
      throw err;
    }
  }

  private reject(reason: GateRejectReason, detail?: string): GateOutcome {
    this.logger.warn(detail ? `rejected (${reason}): ${detail}` : `rejected (${reason})`);
    return { state: 'Rejected', reason };
  }
}
