import { FastifyInstance } from 'fastify';
import { Container } from '../config/dependencies';
import { UserController } from '../controllers/user.controller';
import { createAuthMiddleware } from '../middleware/auth.middleware';

export async function userRoutes(fastify: FastifyInstance, options: { container: Container }) {
  const { container } = options;

  const controller = new UserController(container.resolve('ticketService'));
  const authMiddleware = createAuthMiddleware(container.resolve('jwtService'));

  fastify.addHook('preHandler', authMiddleware.authenticate);
  fastify.addHook('preHandler', authMiddleware.requireRole('user'));

  fastify.get('/ticket', (request, reply) => controller.ticket(request, reply));
  fastify.get('/ticket/qr', (request, reply) => controller.ticketQr(request, reply));
  fastify.get('/ticket/pdf', (request, reply) => controller.ticketPdf(request, reply));
}
