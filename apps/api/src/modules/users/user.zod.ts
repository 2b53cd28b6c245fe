// src/modules/users/user.zod.ts
import { z } from 'zod';
import { PublicUserViewZ } from '@todo/types-zod';
import type { PublicUserViewZod } from '@todo/types-zod';

/** Row shape of `users` as returned by node-postgres. */
export const UserSchema = z.object({
  id: z.number().int(),
  email: z.string(),
  username: z.string(),
  password_hash: z.string(),
  first_name: z
    .string()
    .nullable()
    .transform((v) => v ?? ''),
  last_name: z
    .string()
    .nullable()
    .transform((v) => v ?? ''),
  is_active: z.boolean(),
  is_admin: z.boolean(),
  last_login_at: z.date().nullable(),
  created_at: z.date(),
  updated_at: z.date(),
});

export type UserRow = z.infer<typeof UserSchema>;

export type NewUser = Pick<
  UserRow,
  'email' | 'username' | 'password_hash' | 'first_name' | 'last_name' | 'is_active' | 'is_admin'
>;

/** Public projection; the password hash never leaves this module. */
export function toPublicUser(user: UserRow): PublicUserViewZod {
  return PublicUserViewZ.parse({
    id: user.id,
    email: user.email,
    username: user.username,
    first_name: user.first_name,
    last_name: user.last_name,
    is_active: user.is_active,
    is_admin: user.is_admin,
    ...(user.last_login_at ? { last_login_at: user.last_login_at.toISOString() } : {}),
    created_at: user.created_at.toISOString(),
    updated_at: user.updated_at.toISOString(),
  });
}
