// src/modules/auth/auth.errors.ts

/** Failures raised by credential handling and token issuance. */
export type AuthErrorKind =
  | 'InvalidCredentials'
  | 'HashingFailure'
  | 'SigningFailure'
  | 'MissingSecret'
  | 'CredentialStoreFailure'
  | 'DuplicateIdentity';

/** Reasons a presented token is refused. All collapse to one outward 401. */
export type TokenErrorKind =
  | 'Malformed'
  | 'SignatureInvalid'
  | 'NotYetValid'
  | 'Expired'
  | 'ClaimsInvalid';

export class AuthError extends Error {
  constructor(
    readonly kind: AuthErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'AuthError';
  }
}

/** Wrong login identifier or wrong password; the two are never distinguished. */
export class InvalidCredentialsError extends AuthError {
  constructor() {
    super('InvalidCredentials', 'Invalid credentials');
  }
}

export class HashingFailureError extends AuthError {
  constructor(cause: unknown) {
    super('HashingFailure', 'Password hashing failed', { cause });
  }
}

export class SigningFailureError extends AuthError {
  constructor(reason: string, cause?: unknown) {
    super('SigningFailure', `Token signing failed: ${reason}`, { cause });
  }
}

/** Fatal at startup: the process must not serve traffic without a signing secret. */
export class MissingSecretError extends AuthError {
  constructor(readonly secretName: string) {
    super('MissingSecret', `${secretName} cannot be empty`);
  }
}

/** Lookup or persistence failed (driver error, timeout). Never retried. */
export class CredentialStoreError extends AuthError {
  constructor(operation: string, cause: unknown) {
    super('CredentialStoreFailure', `Credential store ${operation} failed`, { cause });
  }
}

export class DuplicateIdentityError extends AuthError {
  constructor() {
    super('DuplicateIdentity', 'An account with this email already exists');
  }
}

export class TokenValidationError extends Error {
  constructor(
    readonly kind: TokenErrorKind,
    readonly detail: string,
    options?: { cause?: unknown },
  ) {
    super(`${kind}: ${detail}`, options);
    this.name = 'TokenValidationError';
  }
}
