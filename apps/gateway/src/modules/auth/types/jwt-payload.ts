// src/modules/auth/types/jwt-payload.ts
import { z } from 'zod';

/**
 * Claims carried by every token this service issues.
 * Access and refresh tokens share the shape; they differ only in ttl and, optionally, secret.
 */
export interface JwtPayload {
  /**
   * Subject: the user's immutable identifier (users.id, UUID)
   */
  sub: string;

  /**
   * Issued at (Unix seconds)
   */
  iat: number;

  /**
   * Not before (Unix seconds)
   * - Always equal to iat at issuance
   */
  nbf: number;

  /**
   * Expiration (Unix seconds)
   * - iat + ttl
   */
  exp: number;
}

/** Runtime check applied after the signature and time window have been verified. */
export const JwtPayloadZ = z
  .object({
    sub: z.string().min(1),
    iat: z.number().int(),
    nbf: z.number().int(),
    exp: z.number().int(),
  })
  .refine((claims) => claims.nbf <= claims.iat, { message: 'nbf must not be after iat' })
  .refine((claims) => claims.exp > claims.iat, { message: 'exp must be after iat' });
