// src/modules/auth/password.service.ts
import { Inject, Injectable } from '@nestjs/common';
import * as bcrypt from 'bcrypt';
import { AUTH_OPTIONS } from './auth.options';
import type { AuthOptions } from './auth.options';
import { AuthError } from './auth.errors';

export const BCRYPT_MIN_COST = 4;
export const BCRYPT_MAX_COST = 31;
export const BCRYPT_DEFAULT_COST = 10;

/** Out-of-range cost falls back to the default rather than the nearest bound. */
export const resolveBcryptCost = (requested: number): number =>
  Number.isInteger(requested) && requested >= BCRYPT_MIN_COST && requested <= BCRYPT_MAX_COST
    ? requested
    : BCRYPT_DEFAULT_COST;

/** One-way password hashing (bcrypt, fresh salt per hash). */
@Injectable()
export class PasswordService {
  readonly cost: number;

  constructor(@Inject(AUTH_OPTIONS) opts: AuthOptions) {
    this.cost = resolveBcryptCost(opts.bcryptCost);
  }

  async hash(password: string): Promise<string> {
    if (password === '') throw new AuthError('VALIDATION_ERROR', 'password cannot be empty');
    return bcrypt.hash(password, this.cost);
  }

  /**
   * Compare a plaintext password with a stored hash.
   * @throws AuthError(INVALID_CREDENTIALS) on empty input or mismatch
   * @throws Error when the comparison itself fails
   */
  async verify(password: string, hash: string): Promise<void> {
    if (password === '' || hash === '') throw new AuthError('INVALID_CREDENTIALS');

    let matches: boolean;
    try {
      // compare() resolves false on a malformed hash; getRounds() throws
      bcrypt.getRounds(hash);
      matches = await bcrypt.compare(password, hash);
    } catch (err: unknown) {
      throw new Error('password comparison failed', { cause: err });
    }
    if (!matches) throw new AuthError('INVALID_CREDENTIALS');
  }
}
