import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { createTestApp } from './support/create-test-app';

describe('HealthController', () => {
  let app: INestApplication;
  let accessToken: string;

  beforeAll(async () => {
    ({ app } = await createTestApp());
    await request(app.getHttpServer())
      .post('/auth/register')
      .send({ email: 'alice@example.com', username: 'alice', password: 'Password1' })
      .expect(201);
    const res = await request(app.getHttpServer())
      .post('/auth/login')
      .send({ username: 'alice', password: 'Password1' })
      .expect(200);
    accessToken = res.body.access_token;
  });

  afterAll(async () => {
    await app.close();
  });

  afterEach(() => jest.restoreAllMocks());

  it('GET /health anonymously', async () => {
    const res = await request(app.getHttpServer()).get('/health').expect(200);
    expect(res.body).toEqual({ status: 'healthy' });
  });

  it('GET /health echoes the caller when a valid token is sent', async () => {
    const res = await request(app.getHttpServer())
      .get('/health')
      .set('Authorization', `Bearer ${accessToken}`)
      .expect(200);
    expect(res.body).toEqual({ status: 'healthy', user_id: 1 });
  });

  it('GET /health ignores invalid tokens', async () => {
    await request(app.getHttpServer())
      .get('/health')
      .set('Authorization', 'Bearer not-a-jwt')
      .expect(200, { status: 'healthy' });
  });

  it('GET /health ignores expired tokens', async () => {
    const anHourLater = Date.now() + 60 * 60 * 1000;
    jest.spyOn(Date, 'now').mockReturnValue(anHourLater);
    await request(app.getHttpServer())
      .get('/health')
      .set('Authorization', `Bearer ${accessToken}`)
      .expect(200, { status: 'healthy' });
  });
});
