// src/modules/auth/bearer.util.ts
import type { Request } from 'express';

/**
 * Pull the token out of an `Authorization: Bearer <token>` header.
 * The header must split on single spaces into exactly two parts, the first
 * being literally `Bearer` (case-sensitive).
 * @returns the token, or null when the header is absent or malformed
 */
export function extractBearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const parts = header.split(' ');
  if (parts.length !== 2 || parts[0] !== 'Bearer') return null;
  return parts[1];
}

/** passport-jwt `jwtFromRequest` adapter over extractBearerToken. */
export const bearerFromRequest = (req: Request): string | null =>
  extractBearerToken(req.headers.authorization);
