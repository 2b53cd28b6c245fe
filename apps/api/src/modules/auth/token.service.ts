// src/modules/auth/token.service.ts
import { Inject, Injectable } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { v4 as uuidv4 } from 'uuid';
import type { ZodType, ZodTypeDef } from 'zod';
import { toSeconds } from '@/common/utils/duration.util';
import { AUTH_OPTIONS } from './auth.options';
import type { AuthOptions } from './auth.options';
import { AuthError } from './auth.errors';
import {
  AccessTokenClaimsZ,
  RefreshTokenClaimsZ,
} from './types/jwt-payload';
import type {
  AccessTokenClaims,
  AuthenticatedIdentity,
  RefreshTokenClaims,
} from './types/jwt-payload';

/** Subset of a user needed to mint an access token. */
export type TokenSubject = {
  id: number;
  email: string;
  username: string;
  is_admin: boolean;
};

export interface IssuedRefreshToken {
  token: string;
  expiresAt: Date;
}

const nowSeconds = (): number => Math.floor(Date.now() / 1000);

/**
 * Mints and verifies access and refresh JWTs with the shared HMAC secret.
 * - Access tokens are verified statelessly on every request.
 * - Refresh tokens are also tracked in the SessionStore; a valid signature
 *   alone does not make a refresh token usable.
 */
@Injectable()
export class TokenService {
  constructor(
    private readonly jwt: JwtService,
    @Inject(AUTH_OPTIONS) private readonly opts: AuthOptions,
  ) {}

  /** Access token lifetime in whole seconds (the `expires_in` of a token pair). */
  get accessTokenTtlSeconds(): number {
    return toSeconds(this.opts.accessTokenTtlMs);
  }

  async issueAccessToken(user: TokenSubject): Promise<string> {
    return this.jwt.signAsync(
      {
        user_id: user.id,
        email: user.email,
        username: user.username,
        is_admin: user.is_admin,
        iat: nowSeconds(),
      },
      {
        expiresIn: this.accessTokenTtlSeconds,
        notBefore: 0,
        subject: String(user.id),
      },
    );
  }

  async issueRefreshToken(): Promise<IssuedRefreshToken> {
    const iat = nowSeconds();
    const ttl = toSeconds(this.opts.refreshTokenTtlMs);
    const token = await this.jwt.signAsync({ iat }, { expiresIn: ttl, jwtid: uuidv4() });
    return { token, expiresAt: new Date((iat + ttl) * 1000) };
  }

  /**
   * @throws AuthError(EXPIRED_TOKEN) when `exp` has passed
   * @throws AuthError(INVALID_TOKEN) for any other signature, algorithm or claim failure
   */
  verifyAccessToken(token: string): Promise<AccessTokenClaims> {
    return this.verify(token, AccessTokenClaimsZ);
  }

  /** Signature and claim check only; callers must still consult the SessionStore. */
  verifyRefreshToken(token: string): Promise<RefreshTokenClaims> {
    return this.verify(token, RefreshTokenClaimsZ);
  }

  /**
   * Map an already signature-checked payload to the request identity.
   * @throws AuthError(INVALID_TOKEN) when the payload is not a set of access claims
   */
  identityFromPayload(payload: unknown): AuthenticatedIdentity {
    return this.toIdentity(this.parseClaims(payload, AccessTokenClaimsZ));
  }

  toIdentity(claims: AccessTokenClaims): AuthenticatedIdentity {
    return {
      id: claims.user_id,
      email: claims.email,
      username: claims.username,
      isAdmin: claims.is_admin,
    };
  }

  private async verify<T>(token: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
    let payload: Record<string, unknown>;
    try {
      payload = await this.jwt.verifyAsync<Record<string, unknown>>(token);
    } catch (err: unknown) {
      if (err instanceof Error && err.name === 'TokenExpiredError') {
        throw new AuthError('EXPIRED_TOKEN');
      }
      throw new AuthError('INVALID_TOKEN');
    }

    return this.parseClaims(payload, schema);
  }

  private parseClaims<T>(payload: unknown, schema: ZodType<T, ZodTypeDef, unknown>): T {
    const parsed = schema.safeParse(payload);
    if (!parsed.success) throw new AuthError('INVALID_TOKEN');
    return parsed.data;
  }
}
