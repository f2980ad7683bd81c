import { JsonStore } from '../storage/json-store';
import { TicketRecord } from '../types/entry-pass.types';
import { ConflictError } from '../errors';

export class TicketModel {
  constructor(private readonly store: JsonStore) {}

  async findAll(): Promise<TicketRecord[]> {
    return this.store.read('tickets');
  }

  async findById(ticketId: string): Promise<TicketRecord | null> {
    const tickets = await this.findAll();
    return tickets.find((ticket) => ticket.ticketId === ticketId) ?? null;
  }

  async findByTeamCode(teamCode: string): Promise<TicketRecord | null> {
    const tickets = await this.findAll();
    return tickets.find((ticket) => ticket.teamCode === teamCode) ?? null;
  }

  async create(ticket: TicketRecord): Promise<TicketRecord> {
    return this.store.update('tickets', (tickets) => {
      if (tickets.some((existing) => existing.ticketId === ticket.ticketId || existing.teamCode === ticket.teamCode)) {
        throw new ConflictError(`Ticket ${ticket.ticketId} already exists`, 'TICKET_EXISTS');
      }
      return { items: [...tickets, ticket], result: ticket };
    });
  }

  async delete(ticketId: string): Promise<TicketRecord | null> {
    return this.store.update('tickets', (tickets) => {
      const target = tickets.find((ticket) => ticket.ticketId === ticketId) ?? null;
      return {
        items: tickets.filter((ticket) => ticket.ticketId !== ticketId),
        result: target,
      };
    });
  }

  async clear(): Promise<void> {
    await this.store.clear('tickets');
  }
}
