// src/modules/auth/token-validator.ts
import { errors, jwtVerify } from 'jose';
import type { JWTPayload } from 'jose';
import { TokenValidationError } from './auth.errors';
import { Clock } from './clock';
import { SigningSecret } from './signing-secret';
import { JwtPayload, JwtPayloadZ } from './types/jwt-payload';

/** Only the HMAC family is accepted; anything else (RS*, ES*, "none") is a downgrade. */
export const HMAC_ALGORITHMS = ['HS256', 'HS384', 'HS512'];

/**
 * Verifies tokens minted by a TokenIssuer sharing the same secret.
 *
 * Order of checks:
 *  1. compact structure and protected header  -> Malformed
 *  2. header `alg` within the HMAC family      -> SignatureInvalid
 *  3. HMAC over the raw header.payload text, compared in constant time -> SignatureInvalid
 *  4. nbf / exp against the injected clock     -> NotYetValid / Expired
 *  5. `typ` header (when one is expected), subject and claim shape -> ClaimsInvalid
 *
 * The payload is decoded only after the signature has been verified.
 */
export class TokenValidator {
  constructor(
    private readonly secret: SigningSecret,
    private readonly clock: Clock,
    private readonly tokenType?: string,
  ) {}

  async validate(token: string): Promise<JwtPayload> {
    let payload: JWTPayload;
    try {
      ({ payload } = await jwtVerify(token, this.secret.toKey(), {
        algorithms: HMAC_ALGORITHMS,
        currentDate: this.clock.now(),
        requiredClaims: ['iat', 'nbf', 'exp'],
        typ: this.tokenType,
      }));
    } catch (err) {
      throw toTokenValidationError(err);
    }

    const claims = JwtPayloadZ.safeParse(payload);
    if (!claims.success) {
      throw new TokenValidationError(
        'ClaimsInvalid',
        claims.error.issues.map((issue) => issue.message).join('; '),
      );
    }
    return claims.data;
  }
}

function toTokenValidationError(err: unknown): unknown {
  // JWTExpired also carries claim/reason, so it is matched first
  if (err instanceof errors.JWTExpired) {
    return new TokenValidationError('Expired', err.message, { cause: err });
  }
  if (err instanceof errors.JWTClaimValidationFailed) {
    const kind = err.claim === 'nbf' && err.reason === 'check_failed' ? 'NotYetValid' : 'ClaimsInvalid';
    return new TokenValidationError(kind, err.message, { cause: err });
  }
  if (
    err instanceof errors.JOSEAlgNotAllowed ||
    err instanceof errors.JOSENotSupported ||
    err instanceof errors.JWSSignatureVerificationFailed
  ) {
    return new TokenValidationError('SignatureInvalid', err.message, { cause: err });
  }
  if (err instanceof errors.JWSInvalid || err instanceof errors.JWTInvalid) {
    return new TokenValidationError('Malformed', err.message, { cause: err });
  }
  return err;
}
