// src/modules/auth/auth.constants.ts
export const AUTH_OPTIONS = Symbol('AUTH_OPTIONS');
export const CLOCK = Symbol('CLOCK');
export const PASSWORD_HASHER = Symbol('PASSWORD_HASHER');

export const ACCESS_TOKEN_ISSUER = Symbol('ACCESS_TOKEN_ISSUER');
export const REFRESH_TOKEN_ISSUER = Symbol('REFRESH_TOKEN_ISSUER');
export const ACCESS_GATE = Symbol('ACCESS_GATE');
export const REFRESH_GATE = Symbol('REFRESH_GATE');

export type TokenKind = 'access' | 'refresh';

/** JOSE `typ` header per token kind; each gate accepts only its own. */
export const TOKEN_TYPES: Record<TokenKind, string> = {
  access: 'at+jwt',
  refresh: 'rt+jwt',
};

/** The one message a rejected bearer credential ever sees. */
export const UNAUTHORIZED_MESSAGE = 'invalid or expired credential';
