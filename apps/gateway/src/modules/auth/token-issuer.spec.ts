import { decodeProtectedHeader, decodeJwt } from 'jose';
import { ManualClock, T0 } from '../../../test/support/manual-clock';
import { MissingSecretError, SigningFailureError } from './auth.errors';
import { SigningSecret } from './signing-secret';
import { TokenIssuer } from './token-issuer';

describe('TokenIssuer', () => {
  const secret = SigningSecret.from('test-secret');

  it('mints an HS256 JWT with iat = nbf = now and exp = now + ttl', () => {
    const issuer = new TokenIssuer(secret, new ManualClock());

    const { token, claims } = issuer.issue('user-1', 3600);

    expect(token.split('.')).toHaveLength(3);
    expect(claims).toEqual({ sub: 'user-1', iat: T0, nbf: T0, exp: T0 + 3600 });
    expect(decodeProtectedHeader(token)).toEqual({ alg: 'HS256', typ: 'JWT' });
    expect(decodeJwt(token)).toEqual({ sub: 'user-1', iat: T0, nbf: T0, exp: T0 + 3600 });
  });

  it('reads time from the injected clock on every call', () => {
    const clock = new ManualClock();
    const issuer = new TokenIssuer(secret, clock);

    const first = issuer.issue('user-1', 60);
    clock.advance(10_000);
    const second = issuer.issue('user-1', 60);

    expect(second.claims.iat).toBe(first.claims.iat + 10);
    expect(second.token).not.toBe(first.token);
  });

  it('fails with SigningFailure for an empty subject or a non-positive ttl', () => {
    const issuer = new TokenIssuer(secret, new ManualClock());

    expect(() => issuer.issue('', 60)).toThrow(SigningFailureError);
    expect(() => issuer.issue('user-1', 0)).toThrow(SigningFailureError);
    expect(() => issuer.issue('user-1', 1.5)).toThrow(SigningFailureError);
  });
});

describe('SigningSecret', () => {
  it('refuses an empty secret with MissingSecret', () => {
    expect(() => SigningSecret.from('')).toThrow(MissingSecretError);
    expect(() => SigningSecret.from(undefined, 'REFRESH_JWT_SECRET')).toThrow(
      'REFRESH_JWT_SECRET cannot be empty',
    );
    expect(() => SigningSecret.from(new Uint8Array(0))).toThrow(MissingSecretError);
  });

  it('never serializes the key material', () => {
    const secret = SigningSecret.from('test-secret');

    expect(JSON.stringify({ secret })).toBe('{"secret":"[redacted]"}');
    expect(String(secret)).toBe('[redacted]');
  });

  it('hands out copies so callers cannot mutate the key', () => {
    const secret = SigningSecret.from('abc');
    const key = secret.toKey();
    key[0] = 0;

    expect(Array.from(secret.toKey())).toEqual([97, 98, 99]);
  });
});
