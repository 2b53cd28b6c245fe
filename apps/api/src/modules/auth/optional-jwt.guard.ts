// src/modules/auth/optional-jwt.guard.ts
import { CanActivate, ExecutionContext, Injectable, Logger } from '@nestjs/common';
import type { Request } from 'express';
import { isAuthError } from './auth.errors';
import { extractBearerToken } from './bearer.util';
import { TokenService } from './token.service';
import type { AuthenticatedIdentity } from './types/jwt-payload';

/**
 * Attaches the identity when a well-formed, valid access token is present and
 * lets the request through unauthenticated otherwise. Never aborts.
 */
@Injectable()
export class OptionalJwtAuthGuard implements CanActivate {
  private readonly logger = new Logger(OptionalJwtAuthGuard.name);

  constructor(private readonly tokens: TokenService) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const req = context.switchToHttp().getRequest<Request & { user?: AuthenticatedIdentity }>();
    const token = extractBearerToken(req.headers.authorization);
    if (!token) return true;

    try {
      const claims = await this.tokens.verifyAccessToken(token);
      req.user = this.tokens.toIdentity(claims);
    } catch (err: unknown) {
      if (!isAuthError(err)) throw err;
      this.logger.debug(`continuing unauthenticated: ${err.code}`);
    }
    return true;
  }
}
