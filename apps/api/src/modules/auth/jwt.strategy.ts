// src/modules/auth/jwt.strategy.ts
/**
 * Passport strategy for access tokens.
 * Extraction is strict (`Bearer <token>` only) and verification uses the same
 * secret, issuer and HMAC allow-list as TokenService.
 */
import { Inject, Injectable } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { Strategy } from 'passport-jwt';
import { ACCEPTED_ALGORITHMS, AUTH_OPTIONS, TOKEN_ISSUER } from './auth.options';
import type { AuthOptions } from './auth.options';
import { bearerFromRequest } from './bearer.util';
import { TokenService } from './token.service';
import type { AuthenticatedIdentity } from './types/jwt-payload';

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(
    @Inject(AUTH_OPTIONS) opts: AuthOptions,
    private readonly tokens: TokenService,
  ) {
    super({
      jwtFromRequest: bearerFromRequest,
      ignoreExpiration: false,
      secretOrKey: opts.secret,
      algorithms: [...ACCEPTED_ALGORITHMS],
      issuer: TOKEN_ISSUER,
    });
  }

  /**
   * Runs after signature and expiry checks; becomes `request.user`.
   * Deliberately no SessionStore lookup: access tokens are stateless.
   */
  validate(payload: unknown): AuthenticatedIdentity {
    return this.tokens.identityFromPayload(payload);
  }
}
