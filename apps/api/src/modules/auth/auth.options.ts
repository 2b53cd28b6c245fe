// src/modules/auth/auth.options.ts
import { ConfigService } from '@nestjs/config';
import type { JwtModuleOptions } from '@nestjs/jwt';
import { parseDuration } from '@/common/utils/duration.util';
import type { Env } from '@/config/env.zod';

/** DI token for the immutable auth configuration struct. */
export const AUTH_OPTIONS = Symbol('AUTH_OPTIONS');

/** Fixed `iss` claim of every token this service mints. */
export const TOKEN_ISSUER = 'todo-api';

export interface AuthOptions {
  /** HMAC signing secret shared by access and refresh tokens */
  secret: string;
  accessTokenTtlMs: number;
  refreshTokenTtlMs: number;
  /** Requested bcrypt cost; clamped by PasswordService */
  bcryptCost: number;
  sweepIntervalMs: number;
}

/** Built once from the validated env and injected by reference. */
export function authOptionsFactory(cfg: ConfigService<Env, true>): AuthOptions {
  return Object.freeze({
    secret: cfg.get('JWT_SECRET_KEY', { infer: true }),
    accessTokenTtlMs: parseDuration(cfg.get('JWT_ACCESS_TOKEN_EXPIRY', { infer: true })),
    refreshTokenTtlMs: parseDuration(cfg.get('JWT_REFRESH_TOKEN_EXPIRY', { infer: true })),
    bcryptCost: cfg.get('BCRYPT_COST', { infer: true }),
    sweepIntervalMs: parseDuration(cfg.get('TOKEN_SWEEP_INTERVAL', { infer: true })),
  });
}

/** HMAC family accepted on verification; anything else (RS*, ES*, none) is rejected. */
export const ACCEPTED_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;

/** JwtModule options: HS256 signing, fixed issuer, HMAC-only verification. */
export function jwtModuleOptions(secret: string): JwtModuleOptions {
  return {
    secret,
    signOptions: { algorithm: 'HS256', issuer: TOKEN_ISSUER },
    verifyOptions: { algorithms: [...ACCEPTED_ALGORITHMS], issuer: TOKEN_ISSUER },
  };
}
