// src/modules/auth/token-issuer.ts
import { JwtService } from '@nestjs/jwt';
import { SigningFailureError } from './auth.errors';
import { Clock, toEpochSeconds } from './clock';
import { SigningSecret } from './signing-secret';
import type { JwtPayload } from './types/jwt-payload';

export const TOKEN_ALGORITHM = 'HS256';

export interface IssuedToken {
  token: string;
  claims: JwtPayload;
}

/**
 * Mints HS256 tokens for a subject.
 * One instance per token kind; the secret, clock and optional `typ` header are fixed at construction.
 */
export class TokenIssuer {
  private readonly jwt: JwtService;

  constructor(
    secret: SigningSecret,
    private readonly clock: Clock,
    private readonly tokenType?: string,
  ) {
    this.jwt = new JwtService({
      secret: secret.toBuffer(),
      signOptions: { algorithm: TOKEN_ALGORITHM },
    });
  }

  /**
   * @param subject user id placed in `sub`
   * @param ttlSeconds lifetime; `exp = iat + ttlSeconds`
   * @throws SigningFailureError
   */
  issue(subject: string, ttlSeconds: number): IssuedToken {
    if (subject.length === 0) {
      throw new SigningFailureError('subject is empty');
    }
    if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
      throw new SigningFailureError(`ttl must be a positive integer, got ${ttlSeconds}`);
    }

    const now = toEpochSeconds(this.clock.now());
    // iat/nbf/exp are set explicitly so jsonwebtoken never reads the wall clock
    const claims: JwtPayload = {
      sub: subject,
      iat: now,
      nbf: now,
      exp: now + ttlSeconds,
    };

    try {
      const token =
        this.tokenType === undefined
          ? this.jwt.sign({ ...claims })
          : this.jwt.sign({ ...claims }, { header: { alg: TOKEN_ALGORITHM, typ: this.tokenType } });
      return { token, claims };
    } catch (err) {
      throw new SigningFailureError(err instanceof Error ? err.message : 'unknown error', err);
    }
  }
}
