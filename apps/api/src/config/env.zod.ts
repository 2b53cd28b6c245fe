// src/config/env.zod.ts
import { z } from 'zod';
import { parseDuration } from '@/common/utils/duration.util';

export const DEFAULT_JWT_SECRET = 'your-super-secret-jwt-key-change-this-in-production';

const durationString = (fallback: string) =>
  z
    .string()
    .trim()
    .default(fallback)
    .refine(
      (v) => {
        try {
          parseDuration(v);
          return true;
        } catch {
          return false;
        }
      },
      { message: 'must be a duration such as 15m, 168h or 1h30m' },
    );

/** Unset or non-integer cost falls back to 10; range clamping happens in PasswordService. */
const bcryptCost = z
  .string()
  .optional()
  .transform((v) => {
    if (v === undefined || !/^[+-]?\d+$/.test(v.trim())) return 10;
    return Number.parseInt(v, 10);
  });

export const EnvSchema = z
  .object({
    NODE_ENV: z.string().default('development'),
    PORT: z.coerce.number().int().positive().default(8080),
    DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
    JWT_SECRET_KEY: z.string().min(1).default(DEFAULT_JWT_SECRET),
    JWT_ACCESS_TOKEN_EXPIRY: durationString('15m'),
    JWT_REFRESH_TOKEN_EXPIRY: durationString('168h'),
    BCRYPT_COST: bcryptCost,
    TOKEN_SWEEP_INTERVAL: durationString('1h'),
  })
  .superRefine((env, ctx) => {
    if (env.NODE_ENV === 'production' && env.JWT_SECRET_KEY === DEFAULT_JWT_SECRET) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['JWT_SECRET_KEY'],
        message: 'JWT_SECRET_KEY must be changed in production',
      });
    }
  });

export type Env = z.infer<typeof EnvSchema>;

/**
 * ConfigModule `validate` hook. Returns the parsed, defaulted env so that
 * ConfigService.get() sees typed values.
 */
export function validateEnv(raw: Record<string, unknown>): Env {
  const parsed = EnvSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new Error(`Invalid environment: ${details}`);
  }
  return parsed.data;
}
