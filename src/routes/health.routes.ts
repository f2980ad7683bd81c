import { FastifyInstance } from 'fastify';

export async function healthRoutes(fastify: FastifyInstance) {
  fastify.get('/', async (_request, reply) => reply.redirect('/health'));

  fastify.get('/health', async () => ({
    status: 'ok',
    service: 'entry-pass-service',
    timestamp: new Date().toISOString(),
  }));
}
