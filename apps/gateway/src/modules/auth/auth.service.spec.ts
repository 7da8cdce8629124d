import { InMemoryCredentialStore } from '../../../test/support/in-memory-credential-store';
import { ManualClock, T0 } from '../../../test/support/manual-clock';
import {
  CredentialStoreError,
  DuplicateIdentityError,
  InvalidCredentialsError,
} from './auth.errors';
import type { AuthOptions } from './auth.options';
import { AuthService } from './auth.service';
import { BcryptPasswordHasher } from './password-hasher';
import { SigningSecret } from './signing-secret';
import { TokenIssuer } from './token-issuer';
import { TokenValidator } from './token-validator';

describe('AuthService', () => {
  const accessSecret = SigningSecret.from('test-secret');
  const refreshSecret = SigningSecret.from('test-refresh-secret');
  const options: AuthOptions = {
    accessSecret,
    refreshSecret,
    accessTtlSeconds: 900,
    refreshTtlSeconds: 86_400,
    bcryptCost: 4,
  };

  let clock: ManualClock;
  let store: InMemoryCredentialStore;
  let hasher: BcryptPasswordHasher;
  let service: AuthService;
  let userId: string;

  beforeEach(async () => {
    clock = new ManualClock();
    store = new InMemoryCredentialStore();
    hasher = new BcryptPasswordHasher(options.bcryptCost);
    service = new AuthService(
      store,
      hasher,
      new TokenIssuer(accessSecret, clock),
      new TokenIssuer(refreshSecret, clock),
      options,
    );
    const user = await service.signup({
      name: 'Ada',
      email: 'Ada@Example.com',
      password: 'password-1',
    });
    userId = user.id;
  });

  describe('login', () => {
    it('returns two distinct tokens that each validate to the user id', async () => {
      const pair = await service.login('ada@example.com', 'password-1');

      expect(pair.access.token).not.toBe(pair.refresh.token);
      expect(pair.access.claims).toEqual({ sub: userId, iat: T0, nbf: T0, exp: T0 + 900 });
      expect(pair.refresh.claims).toEqual({ sub: userId, iat: T0, nbf: T0, exp: T0 + 86_400 });

      await expect(
        new TokenValidator(accessSecret, clock).validate(pair.access.token),
      ).resolves.toMatchObject({ sub: userId });
      await expect(
        new TokenValidator(refreshSecret, clock).validate(pair.refresh.token),
      ).resolves.toMatchObject({ sub: userId });
    });

    it('matches the login identifier case-insensitively', async () => {
      await expect(service.login('  ADA@example.COM ', 'password-1')).resolves.toBeDefined();
    });

    it('fails with InvalidCredentials for a wrong password', async () => {
      await expect(service.login('ada@example.com', 'password-2')).rejects.toBeInstanceOf(
        InvalidCredentialsError,
      );
    });

    it('fails identically for an unknown identifier', async () => {
      const unknown = await service.login('nobody@example.com', 'password-1').catch((e: unknown) => e);
      const wrong = await service.login('ada@example.com', 'nope').catch((e: unknown) => e);

      expect(unknown).toBeInstanceOf(InvalidCredentialsError);
      expect(wrong).toBeInstanceOf(InvalidCredentialsError);
      expect(unknown instanceof Error && unknown.message).toBe(
        wrong instanceof Error && wrong.message,
      );
    });

    it('still runs a password comparison when the identifier is unknown', async () => {
      const verify = jest.spyOn(hasher, 'verify');

      await service.login('nobody@example.com', 'password-1').catch(() => undefined);

      expect(verify).toHaveBeenCalledTimes(1);
    });

    it('refuses a deactivated account with InvalidCredentials', async () => {
      store.deactivate(userId);

      await expect(service.login('ada@example.com', 'password-1')).rejects.toBeInstanceOf(
        InvalidCredentialsError,
      );
    });

    it('surfaces store failures as-is and does not retry the lookup', async () => {
      const failure = new CredentialStoreError('findByLoginIdentifier', new Error('timeout'));
      const lookup = jest.spyOn(store, 'findByLoginIdentifier').mockRejectedValue(failure);

      await expect(service.login('ada@example.com', 'password-1')).rejects.toBe(failure);
      expect(lookup).toHaveBeenCalledTimes(1);
    });
  });

  describe('signup', () => {
    it('stores a bcrypt digest, never the plaintext', async () => {
      const stored = await store.findByIdentity(userId);

      expect(stored?.email).toBe('ada@example.com');
      expect(stored?.passwordHash).not.toContain('password-1');
      await expect(hasher.verify('password-1', stored?.passwordHash ?? '')).resolves.toBe(true);
    });

    it('rejects a second account for the same email', async () => {
      await expect(
        service.signup({ name: 'Ada Two', email: 'ada@example.com', password: 'password-3' }),
      ).rejects.toBeInstanceOf(DuplicateIdentityError);
    });
  });

  describe('refresh / me', () => {
    it('issues a fresh pair for an existing subject', async () => {
      clock.advance(60_000);

      const pair = await service.refresh(userId);

      expect(pair.access.claims.iat).toBe(T0 + 60);
      expect(pair.access.claims.sub).toBe(userId);
    });

    it('refuses subjects that no longer resolve', async () => {
      store.remove(userId);

      await expect(service.refresh(userId)).rejects.toBeInstanceOf(InvalidCredentialsError);
      await expect(service.me(userId)).rejects.toBeInstanceOf(InvalidCredentialsError);
    });

    it('returns the public user view', async () => {
      await expect(service.me(userId)).resolves.toEqual({
        id: userId,
        name: 'Ada',
        email: 'ada@example.com',
        role: 'user',
        createdAt: '2026-01-01T00:00:00.000Z',
      });
    });
  });
});
