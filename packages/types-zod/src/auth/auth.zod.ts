import { z } from 'zod';

/** bcrypt input limit, counted in UTF-8 bytes */
export const PASSWORD_MAX_BYTES = 72;

const utf8 = new TextEncoder();

/**
 * Login request body
 */
export const LoginRequestZ = z.object({
  email: z.email().max(255),
  password: z.string().min(1),
});

/**
 * Signup request body
 */
export const SignupRequestZ = z.object({
  name: z.string().trim().min(2).max(100),
  email: z.email().max(255),
  password: z
    .string()
    .min(8)
    .refine((value) => utf8.encode(value).length <= PASSWORD_MAX_BYTES, {
      message: `Password must be at most ${PASSWORD_MAX_BYTES} bytes`,
    }),
});

/**
 * Token view schema
 */
export const TokenViewZ = z.object({
  tokenType: z.literal('Bearer'),
  token: z.string().min(10),
  issuedAt: z.number().int(),
  expiresIn: z.number().int().positive(),
  expiresAt: z.number().int(),
});

/**
 * AuthViewZod schema (access + refresh)
 */
export const AuthViewZ = z.object({
  access: TokenViewZ,
  refresh: TokenViewZ,
});

export type LoginRequestZod = z.infer<typeof LoginRequestZ>;
export type SignupRequestZod = z.infer<typeof SignupRequestZ>;
export type TokenViewZod = z.infer<typeof TokenViewZ>;
export type AuthViewZod = z.infer<typeof AuthViewZ>;
