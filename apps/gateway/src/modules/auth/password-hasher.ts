// src/modules/auth/password-hasher.ts
import bcrypt from 'bcrypt';
import { HashingFailureError } from './auth.errors';

export const DEFAULT_BCRYPT_COST = 10;

/** bcrypt reads at most this many bytes of input and ignores the rest. */
export const MAX_PASSWORD_BYTES = 72;

export const passwordByteLength = (plaintext: string): number => Buffer.byteLength(plaintext, 'utf8');

// $2a$ / $2b$ / $2y$, two-digit cost, 22-char salt + 31-char hash
const BCRYPT_DIGEST = /^\$2[aby]\$\d{2}\$[./A-Za-z0-9]{53}$/;

export interface PasswordHasher {
  hash(plaintext: string): Promise<string>;
  verify(plaintext: string, digest: string): Promise<boolean>;
}

/**
 * bcrypt with a per-call random salt embedded in the digest.
 * The async bcrypt API runs on libuv's thread pool, off the event loop.
 */
export class BcryptPasswordHasher implements PasswordHasher {
  constructor(private readonly cost: number = DEFAULT_BCRYPT_COST) {}

  async hash(plaintext: string): Promise<string> {
    const bytes = passwordByteLength(plaintext);
    if (bytes > MAX_PASSWORD_BYTES) {
      throw new HashingFailureError(new RangeError(`password is ${bytes} bytes, limit is ${MAX_PASSWORD_BYTES}`));
    }
    try {
      return await bcrypt.hash(plaintext, this.cost);
    } catch (err) {
      throw new HashingFailureError(err);
    }
  }

  /**
   * Re-derives the hash from the salt and cost stored in `digest` and compares in constant time.
   * A malformed digest reads as a mismatch, and so does a plaintext over MAX_PASSWORD_BYTES,
   * which could otherwise match on its first 72 bytes alone.
   */
  async verify(plaintext: string, digest: string): Promise<boolean> {
    if (!BCRYPT_DIGEST.test(digest)) return false;
    if (passwordByteLength(plaintext) > MAX_PASSWORD_BYTES) return false;
    try {
      return await bcrypt.compare(plaintext, digest);
    } catch (_error) {
      return false;
    }
  }
}
