// src/modules/auth/auth.errors.ts
import { HttpException, HttpStatus } from '@nestjs/common';

export type AuthErrorCode =
  | 'INVALID_CREDENTIALS'
  | 'USER_NOT_ACTIVE'
  | 'EMAIL_EXISTS'
  | 'USERNAME_EXISTS'
  | 'INVALID_REFRESH_TOKEN'
  | 'INVALID_TOKEN'
  | 'EXPIRED_TOKEN'
  | 'VALIDATION_ERROR'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'USER_NOT_FOUND';

const STATUS: Record<AuthErrorCode, HttpStatus> = {
  INVALID_CREDENTIALS: HttpStatus.UNAUTHORIZED,
  USER_NOT_ACTIVE: HttpStatus.FORBIDDEN,
  EMAIL_EXISTS: HttpStatus.CONFLICT,
  USERNAME_EXISTS: HttpStatus.CONFLICT,
  INVALID_REFRESH_TOKEN: HttpStatus.UNAUTHORIZED,
  INVALID_TOKEN: HttpStatus.UNAUTHORIZED,
  EXPIRED_TOKEN: HttpStatus.UNAUTHORIZED,
  VALIDATION_ERROR: HttpStatus.BAD_REQUEST,
  UNAUTHORIZED: HttpStatus.UNAUTHORIZED,
  FORBIDDEN: HttpStatus.FORBIDDEN,
  USER_NOT_FOUND: HttpStatus.NOT_FOUND,
};

const DEFAULT_MESSAGE: Record<AuthErrorCode, string> = {
  INVALID_CREDENTIALS: 'Invalid username or password',
  USER_NOT_ACTIVE: 'User account is not active',
  EMAIL_EXISTS: 'Email already exists',
  USERNAME_EXISTS: 'Username already exists',
  INVALID_REFRESH_TOKEN: 'Invalid refresh token',
  INVALID_TOKEN: 'Invalid token',
  EXPIRED_TOKEN: 'Token has expired',
  VALIDATION_ERROR: 'Validation failed',
  UNAUTHORIZED: 'Authorization header required',
  FORBIDDEN: 'Admin access required',
  USER_NOT_FOUND: 'User not found',
};

/**
 * Domain error of the auth subsystem. The `code` is part of the response body
 * so clients can tell e.g. an expired session from a forged token.
 */
export class AuthError extends HttpException {
  constructor(
    readonly code: AuthErrorCode,
    message: string = DEFAULT_MESSAGE[code],
  ) {
    super({ statusCode: STATUS[code], error: code, message }, STATUS[code]);
    this.name = 'AuthError';
  }
}

export const isAuthError = (e: unknown, code?: AuthErrorCode): e is AuthError =>
  e instanceof AuthError && (code === undefined || e.code === code);
