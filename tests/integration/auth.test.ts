import { ADMIN, IntegrationTestBase, bearer } from './helpers/test-base';

describe('Auth Endpoints', () => {
  let base: IntegrationTestBase;

  beforeEach(async () => {
    base = await IntegrationTestBase.setup();
  });

  afterEach(async () => {
    await base.teardown();
  });

  describe('POST /auth/login', () => {
    it('should return a bearer token for valid credentials', async () => {
      const response = await base.app.inject({ method: 'POST', url: '/auth/login', payload: ADMIN });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body).toEqual({
        token: expect.any(String),
        username: 'admin',
        role: 'admin',
        expiresAt: expect.any(String),
      });
    });

    it('should reject a wrong password with 401', async () => {
      const response = await base.app.inject({
        method: 'POST',
        url: '/auth/login',
        payload: { username: 'admin', password: 'wrong-password' },
      });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toMatchObject({
        status: 401,
        title: 'Invalid Credentials',
        detail: 'Invalid credentials',
        code: 'INVALID_CREDENTIALS',
        instance: '/auth/login',
      });
    });

    it('should reject a missing password with 400', async () => {
      const response = await base.app.inject({ method: 'POST', url: '/auth/login', payload: { username: 'admin' } });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({
        code: 'VALIDATION_ERROR',
        errors: [{ field: 'password', message: '"password" is required' }],
      });
    });

    it('should reject a request without a body with 400', async () => {
      const response = await base.app.inject({ method: 'POST', url: '/auth/login' });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({
        code: 'VALIDATION_ERROR',
        errors: [
          { field: 'username', message: '"username" is required' },
          { field: 'password', message: '"password" is required' },
        ],
      });
    });
  });

  describe('GET /auth/me', () => {
    it('should describe the caller', async () => {
      const token = await base.login(ADMIN);

      const response = await base.app.inject({ method: 'GET', url: '/auth/me', headers: bearer(token) });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ username: 'admin', role: 'admin' });
    });

    it('should require a bearer token', async () => {
      const response = await base.app.inject({ method: 'GET', url: '/auth/me' });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toMatchObject({ detail: 'Missing or invalid authorization header' });
    });

    it('should reject a garbage token', async () => {
      const response = await base.app.inject({ method: 'GET', url: '/auth/me', headers: bearer('not.a.jwt') });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toMatchObject({ code: 'INVALID_TOKEN' });
    });
  });

  describe('POST /auth/logout', () => {
    it('should revoke the token', async () => {
      const token = await base.login(ADMIN);

      const logout = await base.app.inject({ method: 'POST', url: '/auth/logout', headers: bearer(token) });
      expect(logout.statusCode).toBe(204);

      const me = await base.app.inject({ method: 'GET', url: '/auth/me', headers: bearer(token) });
      expect(me.statusCode).toBe(401);
      expect(me.json()).toMatchObject({ detail: 'Token has been revoked' });
    });
  });

  describe('login rate limit', () => {
    it('should answer 429 once the per-minute budget is spent', async () => {
      await base.teardown();
      base = await IntegrationTestBase.setup({ LOGIN_RATE_LIMIT_MAX: '2' });

      const attempt = () =>
        base.app.inject({ method: 'POST', url: '/auth/login', payload: { username: 'admin', password: 'wrong-password' } });

      expect((await attempt()).statusCode).toBe(401);
      expect((await attempt()).statusCode).toBe(401);
      expect((await attempt()).statusCode).toBe(429);
    });
  });
});
