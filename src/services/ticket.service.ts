import { v4 as uuidv4 } from 'uuid';
import { TicketModel } from '../models/ticket.model';
import { UserModel } from '../models/user.model';
import { AttendanceModel } from '../models/attendance.model';
import { CryptoService } from './crypto.service';
import { QrService } from './qr.service';
import { TicketPdfService } from './ticket-pdf.service';
import { CreateTicketInput, DashboardStats, TicketRecord } from '../types/entry-pass.types';
import { TicketNotFoundError } from '../errors';
import {
  generateTeamCode,
  generateTemporaryPassword,
  generateTicketId,
  generateUnique,
} from '../utils/identifiers';
import { createLogger } from '../utils/logger';
import { assertValid } from '../middleware/validation.middleware';
import { createTicketSchema } from '../validators/ticket.validators';

const log = createLogger('tickets');

export interface TicketDefaults {
  TEAM_CODE_PREFIX: string;
  DEFAULT_SLOT: string;
  EVENT: { name: string };
}

export interface IssuedTicket {
  ticket: TicketView;
  credentials: {
    username: string;
    temporaryPassword: string;
  };
}

/** Ticket as returned over the API: the QR token stays server side. */
export type TicketView = Omit<TicketRecord, 'qrPayload'>;

export interface TicketListItem extends TicketView {
  attendanceStatus: 'Present' | 'Not Checked In';
  scannedAt?: string;
}

export const DEFAULT_TEAM_SIZE = 3;

export function toTicketView(ticket: TicketRecord): TicketView {
  const { qrPayload: _qrPayload, ...view } = ticket;
  return view;
}

export class TicketService {
  constructor(
    private readonly ticketModel: TicketModel,
    private readonly userModel: UserModel,
    private readonly attendanceModel: AttendanceModel,
    private readonly cryptoService: CryptoService,
    private readonly qrService: QrService,
    private readonly ticketPdfService: TicketPdfService,
    private readonly defaults: TicketDefaults
  ) {}

  /**
   * Issues a ticket and the team account that owns it. The temporary
   * password is only ever returned here; storage keeps its bcrypt hash.
   */
  async createTicket(rawInput: CreateTicketInput, createdBy: string): Promise<IssuedTicket> {
    const input = assertValid(createTicketSchema, rawInput);
    const [tickets, users] = await Promise.all([this.ticketModel.findAll(), this.userModel.findAll()]);

    const takenCodes = new Set([
      ...tickets.map((ticket) => ticket.teamCode),
      ...users.map((user) => user.username.toUpperCase()),
    ]);
    const takenIds = new Set(tickets.map((ticket) => ticket.ticketId));

    const teamCode = generateUnique(
      () => generateTeamCode(this.cryptoService, this.defaults.TEAM_CODE_PREFIX),
      (candidate) => takenCodes.has(candidate)
    );
    const ticketId = generateUnique(generateTicketId, (candidate) => takenIds.has(candidate));
    const temporaryPassword = generateTemporaryPassword(this.cryptoService);
    const createdAt = new Date().toISOString();
    const teamName = input.teamName.trim();

    const userId = uuidv4();
    await this.userModel.create({
      id: userId,
      username: teamCode,
      passwordHash: await this.cryptoService.hashPassword(temporaryPassword),
      role: 'user',
      teamName,
      createdAt,
      createdBy,
    });

    let ticket: TicketRecord;
    try {
      ticket = await this.ticketModel.create({
        ticketId,
        teamCode,
        teamName,
        collegeName: input.collegeName.trim(),
        teamLeaderEmail: input.teamLeaderEmail.trim(),
        teamSize: input.teamSize ?? DEFAULT_TEAM_SIZE,
        slot: input.slot?.trim() || this.defaults.DEFAULT_SLOT,
        eventName: input.eventName?.trim() || this.defaults.EVENT.name,
        qrPayload: this.qrService.createPayload({ ticketId, teamCode, teamName }),
        createdAt,
        createdBy,
      });
    } catch (error) {
      // No team account without its ticket
      await this.userModel.deleteById(userId);
      log.error({ err: error, ticketId, teamCode }, 'Ticket write failed, team account removed');
      throw error;
    }

    log.info({ ticketId, teamCode, createdBy }, 'Ticket created');

    return {
      ticket: toTicketView(ticket),
      credentials: { username: teamCode, temporaryPassword },
    };
  }

  async listTickets(): Promise<TicketListItem[]> {
    const [tickets, records] = await Promise.all([this.ticketModel.findAll(), this.attendanceModel.findAll()]);
    const attendanceByTicket = new Map(records.map((record) => [record.ticketId, record]));

    return tickets.map((ticket) => {
      const record = attendanceByTicket.get(ticket.ticketId);
      const item: TicketListItem = {
        ...toTicketView(ticket),
        attendanceStatus: record ? 'Present' : 'Not Checked In',
      };
      if (record) {
        item.scannedAt = record.timestamp;
      }
      return item;
    });
  }

  async getTicket(ticketId: string): Promise<TicketRecord> {
    const ticket = await this.ticketModel.findById(ticketId);
    if (!ticket) {
      throw new TicketNotFoundError(ticketId);
    }
    return ticket;
  }

  async getTicketByTeamCode(teamCode: string): Promise<TicketRecord> {
    const ticket = await this.ticketModel.findByTeamCode(teamCode);
    if (!ticket) {
      throw new TicketNotFoundError(teamCode);
    }
    return ticket;
  }

  /**
   * Removes the ticket together with its team account and attendance.
   */
  async deleteTicket(ticketId: string): Promise<TicketRecord> {
    const removed = await this.ticketModel.delete(ticketId);
    if (!removed) {
      throw new TicketNotFoundError(ticketId);
    }

    try {
      const owner = await this.userModel.findByUsername(removed.teamCode);
      if (owner && owner.role === 'user') {
        await this.userModel.deleteById(owner.id);
      }
      await this.attendanceModel.deleteByTicket(ticketId);
    } catch (error) {
      log.error(
        { err: error, ticketId, teamCode: removed.teamCode },
        'Ticket deleted but its team account or attendance could not be removed'
      );
      throw error;
    }

    log.info({ ticketId, teamCode: removed.teamCode }, 'Ticket deleted');
    return removed;
  }

  // Admin and scanner accounts survive
  async clearAll(): Promise<void> {
    await this.ticketModel.clear();
    await this.attendanceModel.clear();
    const removedUsers = await this.userModel.deleteByRole('user');
    log.warn({ removedUsers }, 'All tickets and attendance cleared');
  }

  async getStats(): Promise<DashboardStats> {
    const [tickets, records, users] = await Promise.all([
      this.ticketModel.findAll(),
      this.attendanceModel.findAll(),
      this.userModel.findAll(),
    ]);
    const checkedIn = records.filter((record) => record.status === 'present').length;

    return {
      totalTickets: tickets.length,
      checkedIn,
      pending: tickets.length - checkedIn,
      totalUsers: users.length,
    };
  }

  async renderQr(ticketId: string): Promise<Buffer> {
    const ticket = await this.getTicket(ticketId);
    return this.qrService.renderPng(ticket.qrPayload);
  }

  async renderPdf(ticketId: string): Promise<Buffer> {
    const ticket = await this.getTicket(ticketId);
    const qrPng = await this.qrService.renderPng(ticket.qrPayload);
    return this.ticketPdfService.render(ticket, qrPng);
  }
}
