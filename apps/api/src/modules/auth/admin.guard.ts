// src/modules/auth/admin.guard.ts
import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import type { Request } from 'express';
import { AuthError } from './auth.errors';
import type { AuthenticatedIdentity } from './types/jwt-payload';

/** Use after JwtAuthGuard: `@UseGuards(JwtAuthGuard, AdminGuard)`. */
@Injectable()
export class AdminGuard implements CanActivate {
  canActivate(context: ExecutionContext): boolean {
    const req = context.switchToHttp().getRequest<Request & { user?: AuthenticatedIdentity }>();
    if (!req.user) throw new AuthError('UNAUTHORIZED', 'User not found in context');
    if (!req.user.isAdmin) throw new AuthError('FORBIDDEN');
    return true;
  }
}
