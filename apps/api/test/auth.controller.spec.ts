import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { T0 } from './support/auth-fixture';
import { createTestApp } from './support/create-test-app';
import type { InMemorySessionStore } from './support/in-memory-session.store';
import type { InMemoryUserStore } from './support/in-memory-user.store';

describe('AuthController', () => {
  let app: INestApplication;
  let users: InMemoryUserStore;
  let sessions: InMemorySessionStore;
  let now: jest.SpyInstance<number, []>;

  const http = () => request(app.getHttpServer());

  const register = (body: Record<string, string> = {}) =>
    http()
      .post('/auth/register')
      .send({ email: 'Alice@Example.com', username: 'alice', password: 'Password1', first_name: 'Alice', ...body });

  const login = async (username = 'alice', password = 'Password1') => {
    const res = await http().post('/auth/login').send({ username, password }).expect(200);
    const pair: { access_token: string; refresh_token: string } = res.body;
    return pair;
  };

  beforeAll(async () => {
    ({ app, users, sessions } = await createTestApp());
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => {
    users.clear();
    sessions.clear();
    now = jest.spyOn(Date, 'now').mockReturnValue(T0);
  });

  afterEach(() => jest.restoreAllMocks());

  describe('POST /auth/register', () => {
    it('creates the user -> 201', async () => {
      const res = await register().expect(201);

      expect(res.body).toEqual({
        id: 1,
        email: 'alice@example.com',
        username: 'alice',
        first_name: 'Alice',
        last_name: '',
        is_active: true,
        is_admin: false,
        created_at: new Date(T0).toISOString(),
        updated_at: new Date(T0).toISOString(),
      });
    });

    it('duplicate email in another case -> 409 EMAIL_EXISTS', async () => {
      await register().expect(201);

      const res = await register({ email: 'ALICE@example.com', username: 'alice2' }).expect(409);

      expect(res.body).toEqual({ statusCode: 409, error: 'EMAIL_EXISTS', message: 'Email already exists' });
      expect(users.count).toBe(1);
    });

    it('duplicate username -> 409 USERNAME_EXISTS', async () => {
      await register().expect(201);
      const res = await register({ email: 'other@example.com' }).expect(409);
      expect(res.body.error).toBe('USERNAME_EXISTS');
    });

    it('weak password -> 400 naming the rule', async () => {
      const res = await register({ password: 'password1' }).expect(400);
      expect(res.body).toEqual({
        statusCode: 400,
        error: 'VALIDATION_ERROR',
        message: 'password must contain at least one uppercase letter',
      });
    });

    it('malformed body -> 400', async () => {
      await register({ username: 'al' }).expect(400);
      await register({ email: 'not-an-email' }).expect(400);
      expect(users.count).toBe(0);
    });
  });

  describe('POST /auth/login', () => {
    beforeEach(async () => {
      await register().expect(201);
    });

    it('by username or email -> 200 token pair', async () => {
      for (const username of ['alice', 'ALICE@example.com']) {
        const res = await http().post('/auth/login').send({ username, password: 'Password1' }).expect(200);
        expect(res.body).toEqual({
          access_token: expect.any(String),
          refresh_token: expect.any(String),
          token_type: 'Bearer',
          expires_in: 900,
        });
      }
    });

    it('wrong password -> 401 INVALID_CREDENTIALS', async () => {
      const res = await http().post('/auth/login').send({ username: 'alice', password: 'Password2' }).expect(401);
      expect(res.body).toEqual({
        statusCode: 401,
        error: 'INVALID_CREDENTIALS',
        message: 'Invalid username or password',
      });
    });

    it('inactive account -> 403 USER_NOT_ACTIVE', async () => {
      users.patch(1, { is_active: false });
      const res = await http().post('/auth/login').send({ username: 'alice', password: 'Password1' }).expect(403);
      expect(res.body.error).toBe('USER_NOT_ACTIVE');
    });
  });

  describe('GET /auth/me', () => {
    beforeEach(async () => {
      await register().expect(201);
    });

    it('returns the caller', async () => {
      const { access_token } = await login();

      const res = await http().get('/auth/me').set('Authorization', `Bearer ${access_token}`).expect(200);

      expect(res.body).toMatchObject({
        id: 1,
        username: 'alice',
        last_login_at: new Date(T0).toISOString(),
      });
      expect(res.body).not.toHaveProperty('password_hash');
    });

    it('no header -> 401 UNAUTHORIZED', async () => {
      const res = await http().get('/auth/me').expect(401);
      expect(res.body).toEqual({
        statusCode: 401,
        error: 'UNAUTHORIZED',
        message: 'Authorization header required',
      });
    });

    it('malformed header -> 401 UNAUTHORIZED', async () => {
      const { access_token } = await login();
      const res = await http().get('/auth/me').set('Authorization', `Token ${access_token}`).expect(401);
      expect(res.body.message).toBe('Invalid authorization header format');
    });

    it('garbage token -> 401 INVALID_TOKEN', async () => {
      const res = await http().get('/auth/me').set('Authorization', 'Bearer not-a-jwt').expect(401);
      expect(res.body.error).toBe('INVALID_TOKEN');
    });

    it('refresh token in place of an access token -> 401 INVALID_TOKEN', async () => {
      const { refresh_token } = await login();
      const res = await http().get('/auth/me').set('Authorization', `Bearer ${refresh_token}`).expect(401);
      expect(res.body.error).toBe('INVALID_TOKEN');
    });

    it('expired token -> 401 EXPIRED_TOKEN', async () => {
      const { access_token } = await login();
      now.mockReturnValue(T0 + 15 * 60 * 1000);

      const res = await http().get('/auth/me').set('Authorization', `Bearer ${access_token}`).expect(401);

      expect(res.body).toEqual({ statusCode: 401, error: 'EXPIRED_TOKEN', message: 'Token has expired' });
    });
  });

  describe('refresh and logout', () => {
    beforeEach(async () => {
      await register().expect(201);
    });

    it('POST /auth/refresh rotates the refresh token', async () => {
      const first = await login();

      const res = await http().post('/auth/refresh').send({ refresh_token: first.refresh_token }).expect(200);

      expect(res.body.token_type).toBe('Bearer');
      expect(res.body.refresh_token).not.toBe(first.refresh_token);
      const reuse = await http().post('/auth/refresh').send({ refresh_token: first.refresh_token }).expect(401);
      expect(reuse.body.error).toBe('INVALID_REFRESH_TOKEN');
    });

    it('POST /auth/refresh without a token -> 400', async () => {
      await http().post('/auth/refresh').send({}).expect(400);
    });

    it('POST /auth/logout revokes the refresh token', async () => {
      const { access_token, refresh_token } = await login();

      const res = await http()
        .post('/auth/logout')
        .set('Authorization', `Bearer ${access_token}`)
        .send({ refresh_token })
        .expect(200);

      expect(res.body).toEqual({ message: 'Logout successful' });
      await http().post('/auth/refresh').send({ refresh_token }).expect(401);
    });

    it('POST /auth/logout requires authentication', async () => {
      const { refresh_token } = await login();
      await http().post('/auth/logout').send({ refresh_token }).expect(401);
      expect(sessions.has(refresh_token)).toBe(true);
    });

    it('POST /auth/logout-all revokes every session of the caller', async () => {
      const a = await login();
      const b = await login('alice@example.com');

      const res = await http().post('/auth/logout-all').set('Authorization', `Bearer ${a.access_token}`).expect(200);

      expect(res.body).toEqual({ message: 'Logged out from all devices' });
      expect(sessions.size).toBe(0);
      await http().post('/auth/refresh').send({ refresh_token: b.refresh_token }).expect(401);
    });
  });

  describe('GET /auth/health', () => {
    it('confirms the token is accepted', async () => {
      await register().expect(201);
      const { access_token } = await login();

      const res = await http().get('/auth/health').set('Authorization', `Bearer ${access_token}`).expect(200);

      expect(res.body).toEqual({ status: 'healthy', user_id: 1, message: 'Authentication is working' });
    });
  });

  describe('GET /auth/users/:id', () => {
    beforeEach(async () => {
      await register().expect(201);
      await register({ email: 'bob@example.com', username: 'bob' }).expect(201);
    });

    it('non-admin -> 403 FORBIDDEN', async () => {
      const { access_token } = await login('bob');
      const res = await http().get('/auth/users/1').set('Authorization', `Bearer ${access_token}`).expect(403);
      expect(res.body).toEqual({ statusCode: 403, error: 'FORBIDDEN', message: 'Admin access required' });
    });

    it('admin can look up any user', async () => {
      users.patch(1, { is_admin: true });
      const { access_token } = await login();

      const res = await http().get('/auth/users/2').set('Authorization', `Bearer ${access_token}`).expect(200);
      expect(res.body).toMatchObject({ id: 2, username: 'bob' });

      const missing = await http().get('/auth/users/99').set('Authorization', `Bearer ${access_token}`).expect(404);
      expect(missing.body.error).toBe('USER_NOT_FOUND');

      await http().get('/auth/users/abc').set('Authorization', `Bearer ${access_token}`).expect(400);
    });
  });
});
