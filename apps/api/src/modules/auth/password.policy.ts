// src/modules/auth/password.policy.ts
import { AuthError } from './auth.errors';

export const MIN_PASSWORD_LENGTH = 8;

const RULES: ReadonlyArray<{ test: (pw: string) => boolean; message: string }> = [
  {
    test: (pw) => pw.length >= MIN_PASSWORD_LENGTH,
    message: `password must be at least ${MIN_PASSWORD_LENGTH} characters long`,
  },
  { test: (pw) => /[A-Z]/.test(pw), message: 'password must contain at least one uppercase letter' },
  { test: (pw) => /[a-z]/.test(pw), message: 'password must contain at least one lowercase letter' },
  { test: (pw) => /[0-9]/.test(pw), message: 'password must contain at least one number' },
];

/**
 * Check password strength rules in order.
 * @throws AuthError(VALIDATION_ERROR) naming the first rule that fails
 */
export function assertPasswordStrength(password: string): void {
  const failed = RULES.find((rule) => !rule.test(password));
  if (failed) throw new AuthError('VALIDATION_ERROR', failed.message);
}
