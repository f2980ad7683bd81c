import { TicketModel } from '../models/ticket.model';
import { AttendanceModel } from '../models/attendance.model';
import { QrService } from './qr.service';
import { AttendanceRecord, TicketRecord } from '../types/entry-pass.types';
import { createLogger } from '../utils/logger';

const log = createLogger('scan');

export type ScanStatus = 'VALID' | 'USED' | 'INVALID' | 'CHECKED_IN';

export interface TicketSummary {
  ticketId: string;
  teamCode: string;
  teamName: string;
  slot: string;
  eventName: string;
}

export interface ScanResult {
  success: boolean;
  status: ScanStatus;
  message: string;
  ticket?: TicketSummary;
  scannedAt?: string;
  timestamp?: string;
}

export interface TicketCheck {
  exists: boolean;
  used: boolean;
  ticket?: TicketSummary;
}

export const SCAN_MESSAGES = {
  NO_DATA: 'No QR data provided',
  BAD_TICKET_DATA: 'Invalid ticket data in QR code',
  MISMATCH: 'Ticket data mismatch - possible tampering',
  USED: 'Ticket already used for entry',
  ENTRY_ALLOWED: 'Entry Allowed',
  NO_CODE: 'No ticket ID or team code provided',
  CHECKED_IN: 'Already checked in',
  VALID: 'Ticket is valid',
} as const;

function summarize(ticket: TicketRecord): TicketSummary {
  return {
    ticketId: ticket.ticketId,
    teamCode: ticket.teamCode,
    teamName: ticket.teamName,
    slot: ticket.slot,
    eventName: ticket.eventName,
  };
}

function invalid(message: string): ScanResult {
  return { success: false, status: 'INVALID', message };
}

function notFound(id: string): ScanResult {
  return invalid(`Ticket ${id} not found in system`);
}

export class ScanService {
  constructor(
    private readonly ticketModel: TicketModel,
    private readonly attendanceModel: AttendanceModel,
    private readonly qrService: QrService
  ) {}

  /**
   * Decodes a scanned QR token, checks it against the stored ticket and
   * records attendance on first use.
   */
  async verify(qrData: string, scannedBy: string): Promise<ScanResult> {
    const token = qrData.trim();
    if (!token) {
      return invalid(SCAN_MESSAGES.NO_DATA);
    }

    const decoded = this.qrService.decodePayload(token);
    if (!decoded.valid) {
      log.warn({ scannedBy, reason: decoded.error }, 'Rejected QR payload');
      return invalid(decoded.error);
    }

    const { ticket_id: ticketId, user_id: teamCode } = decoded.data;
    if (!ticketId) {
      return invalid(SCAN_MESSAGES.BAD_TICKET_DATA);
    }

    const ticket = await this.ticketModel.findById(ticketId);
    if (!ticket) {
      return notFound(ticketId);
    }

    if (ticket.teamCode !== teamCode) {
      log.warn({ ticketId, scannedBy }, 'QR payload does not match stored ticket');
      return invalid(SCAN_MESSAGES.MISMATCH);
    }

    return this.admit(ticket, scannedBy);
  }

  /**
   * Admits a team by ticket ID or team code typed in at the gate.
   */
  async manualEntry(code: string, scannedBy: string): Promise<ScanResult> {
    const normalized = code.trim().toUpperCase();
    if (!normalized) {
      return invalid(SCAN_MESSAGES.NO_CODE);
    }

    const ticket =
      (await this.ticketModel.findById(normalized)) ?? (await this.ticketModel.findByTeamCode(normalized));
    if (!ticket) {
      return notFound(normalized);
    }

    return this.admit(ticket, scannedBy);
  }

  async check(ticketId: string): Promise<TicketCheck> {
    const ticket = await this.ticketModel.findById(ticketId.trim().toUpperCase());
    if (!ticket) {
      return { exists: false, used: false };
    }
    return {
      exists: true,
      used: await this.attendanceModel.isUsed(ticket.ticketId),
      ticket: summarize(ticket),
    };
  }

  async result(ticketId: string): Promise<ScanResult> {
    const normalized = ticketId.trim().toUpperCase();
    const ticket = await this.ticketModel.findById(normalized);
    if (!ticket) {
      return notFound(normalized);
    }

    const attendance = await this.attendanceModel.findByTicket(ticket.ticketId);
    if (attendance) {
      return {
        success: true,
        status: 'CHECKED_IN',
        message: SCAN_MESSAGES.CHECKED_IN,
        ticket: summarize(ticket),
        scannedAt: attendance.timestamp,
      };
    }
    return { success: true, status: 'VALID', message: SCAN_MESSAGES.VALID, ticket: summarize(ticket) };
  }

  async listAttendance(): Promise<AttendanceRecord[]> {
    return this.attendanceModel.findAll();
  }

  private async admit(ticket: TicketRecord, scannedBy: string): Promise<ScanResult> {
    const outcome = await this.attendanceModel.checkIn({
      ticketId: ticket.ticketId,
      teamCode: ticket.teamCode,
      teamName: ticket.teamName,
      timestamp: new Date().toISOString(),
      status: 'present',
      scannedBy,
    });

    if (!outcome.recorded) {
      log.info({ ticketId: ticket.ticketId, scannedBy }, 'Repeat scan rejected');
      return {
        success: false,
        status: 'USED',
        message: SCAN_MESSAGES.USED,
        ticket: summarize(ticket),
        scannedAt: outcome.existing.timestamp,
      };
    }

    log.info({ ticketId: ticket.ticketId, scannedBy }, 'Entry recorded');
    return {
      success: true,
      status: 'VALID',
      message: SCAN_MESSAGES.ENTRY_ALLOWED,
      ticket: summarize(ticket),
      timestamp: outcome.record.timestamp,
    };
  }
}
