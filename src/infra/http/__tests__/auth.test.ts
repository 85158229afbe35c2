import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type express from 'express';
import jwt from 'jsonwebtoken';
import { createApp } from '../app.js';
import { Credential } from '../../../domain/auth/credential.js';
import { User } from '../../../domain/users/user.js';
import { InMemoryUserRepo } from '../../../__tests__/helpers/inMemoryUserRepo.js';
import {
  RecordingEventBus,
  TEST_SECRET,
  silentLogger,
  testConfig,
} from '../../../__tests__/helpers/fixtures.js';

const generousLimits = {
  api: { windowMs: 60 * 1000, max: 1000 },
  login: { windowMs: 60 * 1000, max: 1000 },
};

function buildApp(repo: InMemoryUserRepo, rateLimits = generousLimits): express.Express {
  return createApp({
    config: testConfig,
    userRepo: repo,
    logger: silentLogger,
    eventBus: new RecordingEventBus(),
    rateLimits,
  });
}

async function register(
  app: express.Express,
  email: string,
  username: string
): Promise<{ id: string }> {
  const response = await request(app).post('/api/v1/users').send({
    email,
    username,
    firstName: 'Test',
    lastName: 'User',
    password: 'Passw0rd',
  });
  expect(response.status).toBe(201);
  const body: { id: string } = response.body;
  return body;
}

describe('Auth API', () => {
  let repo: InMemoryUserRepo;
  let app: express.Express;

  beforeEach(() => {
    repo = new InMemoryUserRepo();
    app = buildApp(repo);
  });

  describe('POST /api/v1/auth/login', () => {
    it('should return the token artifact for valid credentials', async () => {
      const { id } = await register(app, 'a@b.com', 'login_user');

      const response = await request(app)
        .post('/api/v1/auth/login')
        .send({ email: 'a@b.com', password: 'Passw0rd' });

      expect(response.status).toBe(200);
      expect(Object.keys(response.body).sort()).toEqual([
        'access_token',
        'email',
        'expires_at',
        'subject_id',
        'token_type',
      ]);
      expect(response.body.token_type).toBe('bearer');
      expect(response.body.subject_id).toBe(id);
      expect(response.body.email).toBe('a@b.com');
      expect(new Date(response.body.expires_at).toISOString()).toBe(response.body.expires_at);
    });

    it('should answer every credential failure with the same 401 body', async () => {
      await register(app, 'a@b.com', 'login_user');
      const off = await register(app, 'off@b.com', 'off_user');
      const admin = await request(app)
        .post('/api/v1/auth/login')
        .send({ email: 'a@b.com', password: 'Passw0rd' });
      await request(app)
        .post(`/api/v1/users/${off.id}/deactivate`)
        .set('Authorization', `Bearer ${admin.body.access_token}`)
        .expect(200);

      const unknown = await request(app)
        .post('/api/v1/auth/login')
        .send({ email: 'nobody@b.com', password: 'Passw0rd' });
      const wrongPassword = await request(app)
        .post('/api/v1/auth/login')
        .send({ email: 'a@b.com', password: 'Wr0ngPassword' });
      const inactive = await request(app)
        .post('/api/v1/auth/login')
        .send({ email: 'off@b.com', password: 'Passw0rd' });

      for (const response of [unknown, wrongPassword, inactive]) {
        expect(response.status).toBe(401);
        expect(response.headers['www-authenticate']).toBe('Bearer');
        expect(response.body).toEqual({
          code: 'UNAUTHORIZED',
          message: 'Invalid email or password',
        });
      }
    });

    it('should answer 500, not 401, when the user store fails', async () => {
      const broken = new InMemoryUserRepo();
      broken.findByEmail = () => Promise.reject(new Error('connection refused'));

      const response = await request(buildApp(broken))
        .post('/api/v1/auth/login')
        .send({ email: 'a@b.com', password: 'Passw0rd' });

      expect(response.status).toBe(500);
      expect(response.body).toEqual({ code: 'INTERNAL_ERROR', message: 'Internal server error' });
    });

    it('should answer 500 when the stored hash is corrupt', async () => {
      await repo.save(
        User.create({
          email: 'corrupt@b.com',
          username: 'corrupt_user',
          firstName: 'Corrupt',
          lastName: 'Row',
          credential: Credential.fromEncoded('garbage-not-argon2'),
        }).user
      );

      const response = await request(app)
        .post('/api/v1/auth/login')
        .send({ email: 'corrupt@b.com', password: 'Passw0rd' });

      expect(response.status).toBe(500);
      expect(response.body).toEqual({ code: 'INTERNAL_ERROR', message: 'Internal server error' });
    });

    it('should reject an invalid email format', async () => {
      const response = await request(app)
        .post('/api/v1/auth/login')
        .send({ email: 'invalid-email', password: 'Passw0rd' });

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('VALIDATION_ERROR');
    });

    it('should report each invalid field once', async () => {
      const response = await request(app).post('/api/v1/auth/login').send({ email: 'a@b.com' });

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('Validation failed');
      expect(response.body.details.issues).toEqual([{ path: 'password', message: 'Required' }]);
    });

    it('should enforce the login rate limit', async () => {
      const limited = buildApp(repo, {
        api: generousLimits.api,
        login: { windowMs: 60 * 1000, max: 2 },
      });

      const statuses: number[] = [];
      for (let i = 0; i < 3; i++) {
        const response = await request(limited)
          .post('/api/v1/auth/login')
          .send({ email: 'nobody@b.com', password: 'Passw0rd' });
        statuses.push(response.status);
      }

      expect(statuses).toEqual([401, 401, 429]);
    });
  });

  describe('POST /api/v1/auth/verify', () => {
    it('should return the claims of a valid token', async () => {
      const { id } = await register(app, 'a@b.com', 'verify_user');
      const login = await request(app)
        .post('/api/v1/auth/login')
        .send({ email: 'a@b.com', password: 'Passw0rd' });

      const response = await request(app)
        .post('/api/v1/auth/verify')
        .set('Authorization', `Bearer ${login.body.access_token}`);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ valid: true, subject_id: id, email: 'a@b.com' });
    });

    it('should report a missing email claim as null', async () => {
      const token = jwt.sign({ sub: 'user-1', exp: Math.floor(Date.now() / 1000) + 60 }, TEST_SECRET);

      const response = await request(app)
        .post('/api/v1/auth/verify')
        .set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ valid: true, subject_id: 'user-1', email: null });
    });

    it('should reject an invalid token', async () => {
      const response = await request(app)
        .post('/api/v1/auth/verify')
        .set('Authorization', 'Bearer invalid-token');

      expect(response.status).toBe(401);
      expect(response.body).toEqual({ code: 'UNAUTHORIZED', message: 'Invalid token' });
    });

    it('should reject a request without a token', async () => {
      const response = await request(app).post('/api/v1/auth/verify');

      expect(response.status).toBe(401);
      expect(response.body.message).toBe('Missing or invalid authorization header');
    });

    it('should reject a malformed header', async () => {
      const response = await request(app)
        .post('/api/v1/auth/verify')
        .set('Authorization', 'InvalidFormat token');

      expect(response.status).toBe(401);
      expect(response.body.code).toBe('UNAUTHORIZED');
    });
  });

  describe('POST /api/v1/auth/refresh', () => {
    it('should issue a new token while the old one keeps working', async () => {
      const { id } = await register(app, 'a@b.com', 'refresh_user');
      const login = await request(app)
        .post('/api/v1/auth/login')
        .send({ email: 'a@b.com', password: 'Passw0rd' });

      const response = await request(app)
        .post('/api/v1/auth/refresh')
        .set('Authorization', `Bearer ${login.body.access_token}`);

      expect(response.status).toBe(200);
      expect(response.body.subject_id).toBe(id);
      expect(response.body.token_type).toBe('bearer');
      expect(response.body.access_token).not.toBe(login.body.access_token);

      for (const token of [login.body.access_token, response.body.access_token]) {
        const verify = await request(app)
          .post('/api/v1/auth/verify')
          .set('Authorization', `Bearer ${token}`);
        expect(verify.status).toBe(200);
      }
    });

    it('should refuse a token without an email claim', async () => {
      const token = jwt.sign({ sub: 'user-1', exp: Math.floor(Date.now() / 1000) + 60 }, TEST_SECRET);

      const response = await request(app)
        .post('/api/v1/auth/refresh')
        .set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(401);
      expect(response.body).toEqual({ code: 'UNAUTHORIZED', message: 'Invalid or expired token' });
    });

    it('should refuse a request without a token', async () => {
      const response = await request(app).post('/api/v1/auth/refresh');

      expect(response.status).toBe(401);
    });
  });

  describe('GET /healthz', () => {
    it('should report ok when the store is reachable', async () => {
      const response = await request(app).get('/healthz');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ status: 'ok' });
    });

    it('should report DB_UNAVAILABLE when the health check fails', async () => {
      const down = createApp({
        config: testConfig,
        userRepo: repo,
        logger: silentLogger,
        healthCheck: () => Promise.reject(new Error('connection refused')),
      });

      const response = await request(down).get('/healthz');

      expect(response.status).toBe(500);
      expect(response.body).toEqual({ code: 'DB_UNAVAILABLE', message: 'Database unavailable' });
    });
  });
});
