import { z } from 'zod';

/**
 * Public user view (never carries the password hash)
 */
export const UserViewZ = z.object({
  id: z.uuid(),
  name: z.string(),
  email: z.email(),
  role: z.string(),
  createdAt: z.string(),
});

export type UserViewZod = z.infer<typeof UserViewZ>;
