import { FastifyInstance } from 'fastify';
import { Container } from '../config/dependencies';
import { AdminController } from '../controllers/admin.controller';
import { createAuthMiddleware } from '../middleware/auth.middleware';
import { validate } from '../middleware/validation.middleware';
import { createStaffSchema } from '../validators/auth.validators';
import { createTicketSchema, ticketIdParamsSchema } from '../validators/ticket.validators';
import { CreateTicketInput, StaffAccountInput } from '../types/entry-pass.types';

type TicketParams = { Params: { ticketId: string } };

export async function adminRoutes(fastify: FastifyInstance, options: { container: Container }) {
  const { container } = options;

  const controller = new AdminController(
    container.resolve('ticketService'),
    container.resolve('scanService'),
    container.resolve('authService')
  );
  const authMiddleware = createAuthMiddleware(container.resolve('jwtService'));

  // Every route in this plugin is admin only
  fastify.addHook('preHandler', authMiddleware.authenticate);
  fastify.addHook('preHandler', authMiddleware.requireRole('admin'));

  const withTicketId = { preHandler: validate(ticketIdParamsSchema, 'params') };

  fastify.get('/stats', (request, reply) => controller.stats(request, reply));

  fastify.get('/tickets', (request, reply) => controller.listTickets(request, reply));

  fastify.post<{ Body: CreateTicketInput }>('/tickets', {
    preHandler: validate(createTicketSchema),
  }, (request, reply) => controller.createTicket(request, reply));

  fastify.post('/tickets/clear', (request, reply) => controller.clearTickets(request, reply));

  fastify.get<TicketParams>('/tickets/:ticketId', withTicketId, (request, reply) => controller.getTicket(request, reply));

  fastify.get<TicketParams>('/tickets/:ticketId/qr', withTicketId, (request, reply) => controller.ticketQr(request, reply));

  fastify.get<TicketParams>('/tickets/:ticketId/pdf', withTicketId, (request, reply) => controller.ticketPdf(request, reply));

  fastify.delete<TicketParams>('/tickets/:ticketId', withTicketId, (request, reply) => controller.deleteTicket(request, reply));

  fastify.get('/attendance', (request, reply) => controller.attendance(request, reply));

  fastify.get('/users', (request, reply) => controller.listUsers(request, reply));

  fastify.post<{ Body: StaffAccountInput }>('/staff', {
    preHandler: validate(createStaffSchema),
  }, (request, reply) => controller.createStaff(request, reply));
}
