// src/modules/users/user.store.ts
import type { NewUser, UserRow } from './user.zod';

/**
 * Persistence contract for user identities. Lookups by email/username expect
 * already-normalized (trimmed, lower-cased) input.
 */
export abstract class UserStore {
  abstract create(user: NewUser): Promise<UserRow>;
  abstract findById(id: number): Promise<UserRow | null>;
  abstract findByEmail(email: string): Promise<UserRow | null>;
  abstract findByUsername(username: string): Promise<UserRow | null>;
  abstract existsByEmail(email: string): Promise<boolean>;
  abstract existsByUsername(username: string): Promise<boolean>;
  abstract updateLastLogin(id: number, at: Date): Promise<void>;
}
