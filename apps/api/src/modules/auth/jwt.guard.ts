/**
 * Guard for routes that require an access token.
 * Maps passport outcomes to the auth error taxonomy:
 * - missing/malformed header -> UNAUTHORIZED
 * - expired token            -> EXPIRED_TOKEN
 * - anything else            -> INVALID_TOKEN
 */
import { ExecutionContext, Injectable } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import type { Request } from 'express';
import { AuthError, isAuthError } from './auth.errors';
import { extractBearerToken } from './bearer.util';
import type { AuthenticatedIdentity } from './types/jwt-payload';

@Injectable()
export class JwtAuthGuard extends AuthGuard('jwt') {
  handleRequest<TUser = AuthenticatedIdentity>(
    err: unknown,
    user: TUser | false,
    info: unknown,
    context: ExecutionContext,
  ): TUser {
    if (user) return user;

    const header = context.switchToHttp().getRequest<Request>().headers.authorization;
    if (!header) throw new AuthError('UNAUTHORIZED');
    if (extractBearerToken(header) === null) {
      throw new AuthError('UNAUTHORIZED', 'Invalid authorization header format');
    }

    if (isAuthError(err)) throw err;
    if (info instanceof Error && info.name === 'TokenExpiredError') {
      throw new AuthError('EXPIRED_TOKEN');
    }
    throw new AuthError('INVALID_TOKEN');
  }
}
