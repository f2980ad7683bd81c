import { FastifyReply, FastifyRequest } from 'fastify';
import { TicketService, toTicketView } from '../services/ticket.service';
import { requireUser } from '../middleware/auth.middleware';

// A team account's username is its team code
export class UserController {
  constructor(private ticketService: TicketService) {}

  async ticket(request: FastifyRequest, reply: FastifyReply) {
    const user = requireUser(request);
    const ticket = await this.ticketService.getTicketByTeamCode(user.username);
    return reply.send({ ticket: toTicketView(ticket) });
  }

  async ticketQr(request: FastifyRequest, reply: FastifyReply) {
    const user = requireUser(request);
    const ticket = await this.ticketService.getTicketByTeamCode(user.username);
    const png = await this.ticketService.renderQr(ticket.ticketId);
    return reply
      .header('Content-Type', 'image/png')
      .header('Content-Disposition', `attachment; filename="${ticket.ticketId}_qr.png"`)
      .send(png);
  }

  async ticketPdf(request: FastifyRequest, reply: FastifyReply) {
    const user = requireUser(request);
    const ticket = await this.ticketService.getTicketByTeamCode(user.username);
    const pdf = await this.ticketService.renderPdf(ticket.ticketId);
    return reply
      .header('Content-Type', 'application/pdf')
      .header('Content-Disposition', `attachment; filename="${ticket.ticketId}_pass.pdf"`)
      .send(pdf);
  }
}
