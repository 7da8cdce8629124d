// src/modules/users/credential-store.ts
import type { UserViewZod } from '@warden/types-zod';

/** A stored account as the auth module sees it. */
export interface Credential {
  id: string;
  name: string;
  /** Login identifier, stored lower-cased. */
  email: string;
  /** bcrypt digest; never the plaintext. */
  passwordHash: string;
  role: string;
  isActive: boolean;
  createdAt: Date;
}

export interface NewCredential {
  name: string;
  email: string;
  passwordHash: string;
}

/**
 * Lookup contract consumed by AuthService.
 * Not-found is `null`; any other failure is a CredentialStoreError.
 */
export interface CredentialStore {
  findByLoginIdentifier(email: string): Promise<Credential | null>;
  findByIdentity(id: string): Promise<Credential | null>;
  /** @throws DuplicateIdentityError when the email is taken */
  create(input: NewCredential): Promise<Credential>;
}

export const CREDENTIAL_STORE = Symbol('CREDENTIAL_STORE');

export function normalizeLoginIdentifier(email: string): string {
  return email.trim().toLowerCase();
}

export function toUserView(credential: Credential): UserViewZod {
  return {
    id: credential.id,
    name: credential.name,
    email: credential.email,
    role: credential.role,
    createdAt: credential.createdAt.toISOString(),
  };
}
