import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import { randomUUID } from 'crypto';
import { createDependencyContainer, Container } from './config/dependencies';
import { env, EnvConfig } from './config/env';
import { createErrorHandler } from './middleware/error.middleware';
import { authRoutes } from './routes/auth.routes';
import { adminRoutes } from './routes/admin.routes';
import { scanRoutes } from './routes/scan.routes';
import { userRoutes } from './routes/user.routes';
import { healthRoutes } from './routes/health.routes';
import { loggerOptions } from './utils/logger';

declare module 'fastify' {
  interface FastifyInstance {
    container: Container;
  }
}

function corsOrigin(setting: string): boolean | string[] {
  if (setting === '*') {
    return true;
  }
  return setting.split(',').map((origin) => origin.trim()).filter(Boolean);
}

export async function buildApp(config: EnvConfig = env): Promise<FastifyInstance> {
  const app = Fastify({
    logger: {
      ...loggerOptions,
      level: config.LOG_LEVEL,
    },
    trustProxy: true,
    requestIdHeader: 'x-request-id',
    bodyLimit: 1048576,
    genReqId: () => randomUUID(),
  });

  // Register plugins
  await app.register(cors, {
    origin: corsOrigin(config.CORS_ORIGIN),
  });

  await app.register(helmet, {
    hsts: {
      maxAge: 31536000,
      includeSubDomains: true,
    },
  });

  // Opt-in per route (login)
  await app.register(rateLimit, {
    global: false,
    addHeaders: {
      'x-ratelimit-limit': true,
      'x-ratelimit-remaining': true,
      'x-ratelimit-reset': true,
      'retry-after': true,
    },
  });

  // Create and attach dependency container
  const container = createDependencyContainer(config);
  app.decorate('container', container);

  // 404 Not Found handler (RFC 7807)
  app.setNotFoundHandler((request, reply) => {
    reply
      .status(404)
      .header('Content-Type', 'application/problem+json')
      .send({
        type: 'https://httpstatuses.com/404',
        title: 'Not Found',
        status: 404,
        detail: `Route ${request.method} ${request.url} not found`,
        code: 'ROUTE_NOT_FOUND',
        instance: request.url,
        correlationId: request.id,
      });
  });

  app.setErrorHandler(createErrorHandler({ exposeInternalErrors: config.NODE_ENV !== 'production' }));

  await app.register(healthRoutes);
  await app.register(authRoutes, { prefix: '/auth', container });
  await app.register(adminRoutes, { prefix: '/admin', container });
  await app.register(scanRoutes, { prefix: '/scan', container });
  await app.register(userRoutes, { prefix: '/user', container });

  app.addHook('onClose', async () => {
    await container.dispose();
  });

  return app;
}
