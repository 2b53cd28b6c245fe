/**
 * AuthService
 * - Registers users and authenticates them by username or email
 * - Issues access/refresh token pairs and rotates refresh tokens on use
 * - Revokes sessions one at a time or all at once per user
 */
// src/modules/auth/auth.service.ts
import { Injectable, Logger } from '@nestjs/common';
import { TokenPairViewZ } from '@todo/types-zod';
import type { PublicUserViewZod, TokenPairViewZod } from '@todo/types-zod';
import { bestEffort } from '@/common/utils/best-effort.util';
import { UserStore } from '@/modules/users/user.store';
import { toPublicUser } from '@/modules/users/user.zod';
import type { UserRow } from '@/modules/users/user.zod';
import { AuthError, isAuthError } from './auth.errors';
import { assertPasswordStrength } from './password.policy';
import { PasswordService } from './password.service';
import { SessionStore } from './session.store';
import { TokenService } from './token.service';

export interface RegisterInput {
  email: string;
  username: string;
  password: string;
  firstName?: string;
  lastName?: string;
}

const normalize = (v: string): string => v.trim().toLowerCase();

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly users: UserStore,
    private readonly sessions: SessionStore,
    private readonly passwords: PasswordService,
    private readonly tokens: TokenService,
  ) {}

  /**
   * Create an active, non-admin account.
   * Validation and uniqueness are checked before anything is written.
   * @throws AuthError VALIDATION_ERROR | EMAIL_EXISTS | USERNAME_EXISTS
   */
  async register(input: RegisterInput): Promise<PublicUserViewZod> {
    assertPasswordStrength(input.password);

    const email = normalize(input.email);
    const username = normalize(input.username);

    if (await this.users.existsByEmail(email)) throw new AuthError('EMAIL_EXISTS');
    if (await this.users.existsByUsername(username)) throw new AuthError('USERNAME_EXISTS');

    const passwordHash = await this.passwords.hash(input.password);
    const user = await this.users.create({
      email,
      username,
      password_hash: passwordHash,
      first_name: (input.firstName ?? '').trim(),
      last_name: (input.lastName ?? '').trim(),
      is_active: true,
      is_admin: false,
    });

    return toPublicUser(user);
  }

  /**
   * Authenticate by username, or by email when the identifier contains `@`.
   * Unknown user and wrong password are indistinguishable to the caller.
   * The password is verified before the active flag is looked at.
   * @throws AuthError INVALID_CREDENTIALS | USER_NOT_ACTIVE
   */
  async login(usernameOrEmail: string, password: string): Promise<TokenPairViewZod> {
    const identifier = normalize(usernameOrEmail);
    const user = identifier.includes('@')
      ? await this.users.findByEmail(identifier)
      : await this.users.findByUsername(identifier);
    if (!user) throw new AuthError('INVALID_CREDENTIALS');

    await this.passwords.verify(password, user.password_hash);

    if (!user.is_active) throw new AuthError('USER_NOT_ACTIVE');

    const accessToken = await this.tokens.issueAccessToken(user);
    const refresh = await this.tokens.issueRefreshToken();
    await this.sessions.save(user.id, refresh.token, refresh.expiresAt);

    void (await bestEffort(this.logger, `update last_login_at for user ${user.id}`, () =>
      this.users.updateLastLogin(user.id, new Date(Date.now())),
    ));

    return this.tokenPair(accessToken, refresh.token);
  }

  /**
   * Exchange a refresh token for a new pair. The presented token is consumed:
   * it is swapped for the new one atomically, so a second concurrent use of
   * the same token fails.
   * @throws AuthError INVALID_REFRESH_TOKEN
   */
  async refresh(refreshToken: string): Promise<TokenPairViewZod> {
    try {
      await this.tokens.verifyRefreshToken(refreshToken);
    } catch (err: unknown) {
      if (isAuthError(err)) throw new AuthError('INVALID_REFRESH_TOKEN');
      throw err;
    }

    const session = await this.sessions.findValid(refreshToken);
    if (!session) throw new AuthError('INVALID_REFRESH_TOKEN');

    const user = await this.users.findById(session.userId);
    if (!user || !user.is_active) throw new AuthError('INVALID_REFRESH_TOKEN');

    const accessToken = await this.tokens.issueAccessToken(user);
    const next = await this.tokens.issueRefreshToken();

    const rotated = await this.sessions.rotate(refreshToken, user.id, next.token, next.expiresAt);
    if (!rotated) throw new AuthError('INVALID_REFRESH_TOKEN');

    return this.tokenPair(accessToken, next.token);
  }

  /** Revoke one refresh token. Succeeds whether or not it existed. */
  async logout(refreshToken: string): Promise<void> {
    await this.sessions.delete(refreshToken);
  }

  /** Revoke every refresh token of a user. */
  async logoutAll(userId: number): Promise<number> {
    return this.sessions.deleteAllForUser(userId);
  }

  async getCurrentUser(userId: number): Promise<PublicUserViewZod> {
    const user: UserRow | null = await this.users.findById(userId);
    if (!user) throw new AuthError('USER_NOT_FOUND');
    return toPublicUser(user);
  }

  /** Sweep expired sessions; meant for the background cycle, not request paths. */
  async cleanupExpiredTokens(): Promise<number> {
    return this.sessions.sweepExpired(new Date(Date.now()));
  }

  private tokenPair(accessToken: string, refreshToken: string): TokenPairViewZod {
    return TokenPairViewZ.parse({
      access_token: accessToken,
      refresh_token: refreshToken,
      token_type: 'Bearer',
      expires_in: this.tokens.accessTokenTtlSeconds,
    });
  }
}
