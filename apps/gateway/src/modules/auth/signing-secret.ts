// src/modules/auth/signing-secret.ts
import { MissingSecretError } from './auth.errors';

/**
 * HMAC key material shared by an issuer and its validator.
 * Built once at startup and never mutated; an empty value is rejected here so
 * neither side can ever observe one.
 */
export class SigningSecret {
  private readonly bytes: Uint8Array;

  private constructor(bytes: Uint8Array) {
    this.bytes = Uint8Array.from(bytes);
  }

  /**
   * @param name config key reported in the MissingSecret error
   */
  static from(raw: string | Uint8Array | undefined, name = 'JWT_SECRET'): SigningSecret {
    const bytes = typeof raw === 'string' ? new TextEncoder().encode(raw) : raw;
    if (!bytes || bytes.length === 0) {
      throw new MissingSecretError(name);
    }
    return new SigningSecret(bytes);
  }

  /** Key for jsonwebtoken (via @nestjs/jwt). */
  toBuffer(): Buffer {
    return Buffer.from(this.bytes);
  }

  /** Key for jose. */
  toKey(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }

  toJSON(): string {
    return '[redacted]';
  }

  toString(): string {
    return '[redacted]';
  }
}
