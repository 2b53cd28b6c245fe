// src/modules/auth/types/jwt-payload.ts
import { z } from 'zod';
import { TOKEN_ISSUER } from '../auth.options';

/** Registered claims common to both token kinds (Unix seconds). */
const RegisteredClaimsZ = z.object({
  iss: z.literal(TOKEN_ISSUER),
  iat: z.number().int(),
  exp: z.number().int(),
});

/**
 * Access token claims. Fixed, named fields; anything else in the payload is
 * ignored, anything missing makes the token invalid.
 */
export const AccessTokenClaimsZ = RegisteredClaimsZ.extend({
  /** Same as users.id */
  user_id: z.number().int(),
  email: z.string(),
  username: z.string(),
  is_admin: z.boolean(),
  nbf: z.number().int(),
  /** String form of user_id */
  sub: z.string(),
});

/**
 * Refresh token claims. Carries no identity: the owning user is known only
 * through the session row. `jti` gives every token its own entropy.
 */
export const RefreshTokenClaimsZ = RegisteredClaimsZ.extend({
  jti: z.string().uuid(),
});

export type AccessTokenClaims = z.infer<typeof AccessTokenClaimsZ>;
export type RefreshTokenClaims = z.infer<typeof RefreshTokenClaimsZ>;

/** Identity attached to an authenticated request. */
export interface AuthenticatedIdentity {
  id: number;
  email: string;
  username: string;
  isAdmin: boolean;
}
