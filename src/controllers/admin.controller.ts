import { FastifyReply, FastifyRequest } from 'fastify';
import { TicketService, toTicketView } from '../services/ticket.service';
import { ScanService } from '../services/scan.service';
import { AuthService } from '../services/auth.service';
import { requireUser } from '../middleware/auth.middleware';
import { CreateTicketInput, StaffAccountInput } from '../types/entry-pass.types';

type TicketParams = { Params: { ticketId: string } };

export class AdminController {
  constructor(
    private ticketService: TicketService,
    private scanService: ScanService,
    private authService: AuthService
  ) {}

  async stats(_request: FastifyRequest, reply: FastifyReply) {
    return reply.send(await this.ticketService.getStats());
  }

  async listTickets(_request: FastifyRequest, reply: FastifyReply) {
    const tickets = await this.ticketService.listTickets();
    return reply.send({ tickets, count: tickets.length });
  }

  async createTicket(request: FastifyRequest<{ Body: CreateTicketInput }>, reply: FastifyReply) {
    const user = requireUser(request);
    const issued = await this.ticketService.createTicket(request.body, user.username);
    return reply.status(201).send(issued);
  }

  async getTicket(request: FastifyRequest<TicketParams>, reply: FastifyReply) {
    const { ticketId } = request.params;
    const [ticket, check] = await Promise.all([
      this.ticketService.getTicket(ticketId),
      this.scanService.check(ticketId),
    ]);
    return reply.send({ ticket: toTicketView(ticket), used: check.used });
  }

  async ticketQr(request: FastifyRequest<TicketParams>, reply: FastifyReply) {
    const { ticketId } = request.params;
    const png = await this.ticketService.renderQr(ticketId);
    return reply
      .header('Content-Type', 'image/png')
      .header('Content-Disposition', `attachment; filename="${ticketId}_qr.png"`)
      .send(png);
  }

  async ticketPdf(request: FastifyRequest<TicketParams>, reply: FastifyReply) {
    const { ticketId } = request.params;
    const pdf = await this.ticketService.renderPdf(ticketId);
    return reply
      .header('Content-Type', 'application/pdf')
      .header('Content-Disposition', `attachment; filename="${ticketId}_pass.pdf"`)
      .send(pdf);
  }

  async deleteTicket(request: FastifyRequest<TicketParams>, reply: FastifyReply) {
    await this.ticketService.deleteTicket(request.params.ticketId);
    return reply.status(204).send();
  }

  async clearTickets(_request: FastifyRequest, reply: FastifyReply) {
    await this.ticketService.clearAll();
    return reply.status(204).send();
  }

  async attendance(_request: FastifyRequest, reply: FastifyReply) {
    const [records, stats] = await Promise.all([this.scanService.listAttendance(), this.ticketService.getStats()]);
    return reply.send({ records, stats });
  }

  async listUsers(_request: FastifyRequest, reply: FastifyReply) {
    const users = await this.authService.listTeamUsers();
    return reply.send({ users, count: users.length });
  }

  async createStaff(request: FastifyRequest<{ Body: StaffAccountInput }>, reply: FastifyReply) {
    const user = requireUser(request);
    const { username, password, role } = request.body;
    const account = await this.authService.createStaffAccount(username, password, role, user.username);
    return reply.status(201).send({ user: account });
  }
}
