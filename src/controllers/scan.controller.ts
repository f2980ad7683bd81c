import { FastifyReply, FastifyRequest } from 'fastify';
import { ScanService } from '../services/scan.service';
import { requireUser } from '../middleware/auth.middleware';

type TicketParams = { Params: { ticketId: string } };

export class ScanController {
  constructor(private scanService: ScanService) {}

  async verify(request: FastifyRequest<{ Body: { qrData: string } }>, reply: FastifyReply) {
    const user = requireUser(request);
    return reply.send(await this.scanService.verify(request.body.qrData, user.username));
  }

  async manual(request: FastifyRequest<{ Body: { code: string } }>, reply: FastifyReply) {
    const user = requireUser(request);
    return reply.send(await this.scanService.manualEntry(request.body.code, user.username));
  }

  async check(request: FastifyRequest<TicketParams>, reply: FastifyReply) {
    return reply.send(await this.scanService.check(request.params.ticketId));
  }

  async result(request: FastifyRequest<TicketParams>, reply: FastifyReply) {
    return reply.send(await this.scanService.result(request.params.ticketId));
  }
}
