/**
 * Parameter decorator that hands the authenticated identity to a handler
 * explicitly, instead of handlers reaching into the request themselves.
 */
import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { Request } from 'express';
import type { AuthenticatedIdentity } from './types/jwt-payload';

/**
 * Resolves to `request.user` as set by JwtAuthGuard / OptionalJwtAuthGuard,
 * or null on unauthenticated requests.
 *
 * Usage:
 * ```ts
 * @CurrentUser() user: AuthenticatedIdentity
 * ```
 */
export const CurrentUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): AuthenticatedIdentity | null => {
    const req = ctx.switchToHttp().getRequest<Request & { user?: AuthenticatedIdentity }>();
    return req.user ?? null;
  },
);
