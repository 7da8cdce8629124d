/**
 * AuthService
 * - Login: credential lookup -> password verify -> access & refresh issuance
 * - Signup: hashes the password and stores a new credential
 * - Refresh / me: re-resolve the token subject through the credential store
 */
// src/modules/auth/auth.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import type { SignupRequestZod, UserViewZod } from '@warden/types-zod';
import {
  ACCESS_TOKEN_ISSUER,
  AUTH_OPTIONS,
  PASSWORD_HASHER,
  REFRESH_TOKEN_ISSUER,
} from './auth.constants';
import { InvalidCredentialsError } from './auth.errors';
import type { AuthOptions } from './auth.options';
import type { PasswordHasher } from './password-hasher';
import { IssuedToken, TokenIssuer } from './token-issuer';
import {
  Credential,
  CREDENTIAL_STORE,
  CredentialStore,
  normalizeLoginIdentifier,
  toUserView,
} from '../users/credential-store';

export interface TokenPair {
  access: IssuedToken;
  refresh: IssuedToken;
}

/** Service layer for authentication flows (login, signup, token refresh). */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);
  // digest compared against when the identifier is unknown, so both paths pay for one bcrypt compare
  private decoyDigest?: Promise<string>;

  constructor(
    @Inject(CREDENTIAL_STORE) private readonly credentials: CredentialStore,
    @Inject(PASSWORD_HASHER) private readonly hasher: PasswordHasher,
    @Inject(ACCESS_TOKEN_ISSUER) private readonly accessIssuer: TokenIssuer,
    @Inject(REFRESH_TOKEN_ISSUER) private readonly refreshIssuer: TokenIssuer,
    @Inject(AUTH_OPTIONS) private readonly options: AuthOptions,
  ) {}

  /**
   * Verify email + password and issue a token pair for the account.
   * Unknown email, wrong password and deactivated account all fail with the same error.
   * @throws InvalidCredentialsError
   * @throws CredentialStoreError when the lookup itself fails (not retried)
   */
  async login(loginIdentifier: string, password: string): Promise<TokenPair> {
    const email = normalizeLoginIdentifier(loginIdentifier);
    const credential = await this.credentials.findByLoginIdentifier(email);

    if (!credential) {
      await this.hasher.verify(password, await this.getDecoyDigest());
      this.logger.warn(`login failed for ${email}: unknown identifier`);
      throw new InvalidCredentialsError();
    }

    const matches = await this.hasher.verify(password, credential.passwordHash);
    if (!matches || !credential.isActive) {
      this.logger.warn(
        `login failed for ${email}: ${matches ? 'account inactive' : 'password mismatch'}`,
      );
      throw new InvalidCredentialsError();
    }

    const pair = this.issueTokens(credential.id);
    this.logger.log(`login ok for ${email} (sub=${credential.id})`);
    return pair;
  }

  /**
   * Exchange a validated refresh-token subject for a new pair.
   * The account must still exist and be active.
   */
  async refresh(subject: string): Promise<TokenPair> {
    const credential = await this.requireActive(subject);
    return this.issueTokens(credential.id);
  }

  async signup(input: SignupRequestZod): Promise<UserViewZod> {
    const email = normalizeLoginIdentifier(input.email);
    const passwordHash = await this.hasher.hash(input.password);
    const created = await this.credentials.create({ name: input.name, email, passwordHash });
    this.logger.log(`signup ok for ${email} (sub=${created.id})`);
    return toUserView(created);
  }

  async me(subject: string): Promise<UserViewZod> {
    return toUserView(await this.requireActive(subject));
  }

  issueTokens(subject: string): TokenPair {
    const access = this.accessIssuer.issue(subject, this.options.accessTtlSeconds);
    const refresh = this.refreshIssuer.issue(subject, this.options.refreshTtlSeconds);
    this.logger.debug(`issued token pair for sub=${subject}`);
    return { access, refresh };
  }

  private async requireActive(subject: string): Promise<Credential> {
    const credential = await this.credentials.findByIdentity(subject);
    if (!credential || !credential.isActive) {
      this.logger.warn(`token subject ${subject} is unknown or inactive`);
      throw new InvalidCredentialsError();
    }
    return credential;
  }

  private getDecoyDigest(): Promise<string> {
    if (!this.decoyDigest) {
      const pending = this.hasher.hash(randomUUID());
      void pending.catch(() => {
        this.decoyDigest = undefined;
      });
      this.decoyDigest = pending;
    }
    return this.decoyDigest;
  }
}
