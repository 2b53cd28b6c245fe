// src/modules/auth/session.store.ts

export interface RefreshTokenRecord {
  id: number;
  userId: number;
  token: string;
  expiresAt: Date;
  createdAt: Date;
}

/**
 * Server-side registry of refresh tokens. A token is usable only while its
 * row exists and `expiresAt` is strictly after the current time.
 */
export abstract class SessionStore {
  /** Insert a new row; a duplicate token is an error. */
  abstract save(userId: number, token: string, expiresAt: Date): Promise<void>;

  /** Row for `token` if present and unexpired at `now`. */
  abstract findValid(token: string, now?: Date): Promise<RefreshTokenRecord | null>;

  /** Idempotent; deleting an unknown token is not an error. */
  abstract delete(token: string): Promise<void>;

  /** @returns number of rows removed */
  abstract deleteAllForUser(userId: number): Promise<number>;

  /** Remove rows with `expiresAt` strictly before `now`. @returns number of rows removed */
  abstract sweepExpired(now?: Date): Promise<number>;

  /**
   * Replace `oldToken` by `newToken` in one atomic step.
   * @returns false when `oldToken` was already gone (nothing is inserted then)
   */
  abstract rotate(oldToken: string, userId: number, newToken: string, expiresAt: Date): Promise<boolean>;
}
