export * from './auth/auth.zod';
export * from './users/user.zod';
