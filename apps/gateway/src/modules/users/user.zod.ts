// src/modules/users/user.zod.ts
import { z } from 'zod';

export const UserRowSchema = z.object({
  id: z.uuid(),
  name: z.string().min(1).max(100),
  email: z.string().min(1).max(255),
  password_hash: z.string().min(1),
  role: z.string().min(1),
  is_active: z.boolean(),
  created_at: z.date(),
  updated_at: z.date(),
});

export type UserRow = z.infer<typeof UserRowSchema>;
