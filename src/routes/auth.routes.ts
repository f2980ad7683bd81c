import { FastifyInstance } from 'fastify';
import { Container } from '../config/dependencies';
import { AuthController } from '../controllers/auth.controller';
import { createAuthMiddleware } from '../middleware/auth.middleware';
import { validate } from '../middleware/validation.middleware';
import { LoginInput } from '../types/entry-pass.types';
import * as schemas from '../validators/auth.validators';

export async function authRoutes(fastify: FastifyInstance, options: { container: Container }) {
  const { container } = options;
  const config = container.resolve('config');

  const controller = new AuthController(container.resolve('authService'));
  const authMiddleware = createAuthMiddleware(container.resolve('jwtService'));

  // Public, rate limited per IP
  fastify.post<{ Body: LoginInput }>('/login', {
    config: {
      rateLimit: {
        max: config.LOGIN_RATE_LIMIT_MAX,
        timeWindow: '1 minute',
      },
    },
    preHandler: validate(schemas.loginSchema),
  }, (request, reply) => controller.login(request, reply));

  fastify.post('/logout', {
    preHandler: authMiddleware.authenticate,
  }, (request, reply) => controller.logout(request, reply));

  fastify.get('/me', {
    preHandler: authMiddleware.authenticate,
  }, (request, reply) => controller.me(request, reply));
}
