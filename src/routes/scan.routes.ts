import { FastifyInstance } from 'fastify';
import { Container } from '../config/dependencies';
import { ScanController } from '../controllers/scan.controller';
import { createAuthMiddleware } from '../middleware/auth.middleware';
import { validate } from '../middleware/validation.middleware';
import { manualEntrySchema, verifyScanSchema } from '../validators/scan.validators';

type TicketParams = { Params: { ticketId: string } };

export async function scanRoutes(fastify: FastifyInstance, options: { container: Container }) {
  const { container } = options;

  const controller = new ScanController(container.resolve('scanService'));
  const authMiddleware = createAuthMiddleware(container.resolve('jwtService'));

  fastify.addHook('preHandler', authMiddleware.authenticate);
  fastify.addHook('preHandler', authMiddleware.requireRole('admin', 'scanner'));

  fastify.post<{ Body: { qrData: string } }>('/verify', {
    preHandler: validate(verifyScanSchema),
  }, (request, reply) => controller.verify(request, reply));

  fastify.post<{ Body: { code: string } }>('/manual', {
    preHandler: validate(manualEntrySchema),
  }, (request, reply) => controller.manual(request, reply));

  fastify.get<TicketParams>('/check/:ticketId', (request, reply) => controller.check(request, reply));

  fastify.get<TicketParams>('/result/:ticketId', (request, reply) => controller.result(request, reply));
}
