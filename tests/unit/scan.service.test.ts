import { createDependencyContainer, Container } from '../../src/config/dependencies';
import { ScanService } from '../../src/services/scan.service';
import { IssuedTicket } from '../../src/services/ticket.service';
import { TicketRecord } from '../../src/types/entry-pass.types';
import { createTempDataDir, createTestConfig, removeDataDir } from '../helpers/test-config';

describe('ScanService', () => {
  let dataDir: string;
  let container: Container;
  let scanService: ScanService;
  let issued: IssuedTicket;
  let stored: TicketRecord;

  beforeEach(async () => {
    dataDir = await createTempDataDir();
    container = createDependencyContainer(createTestConfig(dataDir));
    scanService = container.resolve('scanService');

    const ticketService = container.resolve('ticketService');
    issued = await ticketService.createTicket(
      {
        teamName: 'Null Pointers',
        collegeName: 'City Engineering College',
        teamLeaderEmail: 'lead@example.com',
        slot: 'Slot A',
      },
      'admin'
    );
    stored = await ticketService.getTicket(issued.ticket.ticketId);
  });

  afterEach(async () => {
    await container.dispose();
    await removeDataDir(dataDir);
  });

  describe('verify', () => {
    it('admits a valid ticket and records the scanner', async () => {
      const result = await scanService.verify(stored.qrPayload, 'gate-1');

      expect(result).toEqual({
        success: true,
        status: 'VALID',
        message: 'Entry Allowed',
        ticket: {
          ticketId: stored.ticketId,
          teamCode: stored.teamCode,
          teamName: 'Null Pointers',
          slot: 'Slot A',
          eventName: 'HACKFEST2K26',
        },
        timestamp: expect.any(String),
      });

      const records = await scanService.listAttendance();
      expect(records).toEqual([
        {
          ticketId: stored.ticketId,
          teamCode: stored.teamCode,
          teamName: 'Null Pointers',
          timestamp: result.timestamp,
          status: 'present',
          scannedBy: 'gate-1',
        },
      ]);
    });

    it('reports a second scan as used', async () => {
      const first = await scanService.verify(stored.qrPayload, 'gate-1');
      const second = await scanService.verify(stored.qrPayload, 'gate-2');

      expect(second).toMatchObject({
        success: false,
        status: 'USED',
        message: 'Ticket already used for entry',
        scannedAt: first.timestamp,
      });
      await expect(scanService.listAttendance()).resolves.toHaveLength(1);
    });

    it('admits exactly one of two simultaneous scans', async () => {
      const results = await Promise.all([
        scanService.verify(stored.qrPayload, 'gate-1'),
        scanService.verify(stored.qrPayload, 'gate-2'),
      ]);

      expect(results.map((result) => result.status).sort()).toEqual(['USED', 'VALID']);
      await expect(scanService.listAttendance()).resolves.toHaveLength(1);
    });

    it('rejects empty input', async () => {
      await expect(scanService.verify('   ', 'gate-1')).resolves.toEqual({
        success: false,
        status: 'INVALID',
        message: 'No QR data provided',
      });
    });

    it('passes through decode failures', async () => {
      const result = await scanService.verify('not-a-token', 'gate-1');

      expect(result.status).toBe('INVALID');
      expect(result.message).toMatch(/^Failed to decode payload: /);
    });

    it('rejects a signed payload without a ticket ID', async () => {
      const cryptoService = container.resolve('cryptoService');
      const body = { user_id: stored.teamCode, team_name: 'Null Pointers', timestamp: 1 };
      const token = cryptoService.encrypt(
        JSON.stringify({ ...body, signature: cryptoService.sign(JSON.stringify(body)) }),
        'qr'
      );

      await expect(scanService.verify(token, 'gate-1')).resolves.toEqual({
        success: false,
        status: 'INVALID',
        message: 'Invalid ticket data in QR code',
      });
    });

    it('rejects a ticket that was deleted', async () => {
      await container.resolve('ticketService').deleteTicket(stored.ticketId);

      await expect(scanService.verify(stored.qrPayload, 'gate-1')).resolves.toEqual({
        success: false,
        status: 'INVALID',
        message: `Ticket ${stored.ticketId} not found in system`,
      });
    });

    it('rejects a payload whose team code does not match the ticket', async () => {
      const token = container
        .resolve('qrService')
        .createPayload({ ticketId: stored.ticketId, teamCode: 'HF26ZZZZZZ', teamName: 'Null Pointers' });

      await expect(scanService.verify(token, 'gate-1')).resolves.toEqual({
        success: false,
        status: 'INVALID',
        message: 'Ticket data mismatch - possible tampering',
      });
      await expect(scanService.listAttendance()).resolves.toEqual([]);
    });
  });

  describe('manualEntry', () => {
    it('accepts a lower-case ticket ID', async () => {
      const result = await scanService.manualEntry(` ${stored.ticketId.toLowerCase()} `, 'gate-1');

      expect(result.status).toBe('VALID');
      expect(result.ticket?.ticketId).toBe(stored.ticketId);
    });

    it('accepts a team code', async () => {
      const result = await scanService.manualEntry(stored.teamCode, 'gate-1');

      expect(result.status).toBe('VALID');
    });

    it('reports a used ticket', async () => {
      await scanService.manualEntry(stored.teamCode, 'gate-1');

      await expect(scanService.manualEntry(stored.ticketId, 'gate-1')).resolves.toMatchObject({ status: 'USED' });
    });

    it('reports an unknown code', async () => {
      await expect(scanService.manualEntry('hf26nope00', 'gate-1')).resolves.toEqual({
        success: false,
        status: 'INVALID',
        message: 'Ticket HF26NOPE00 not found in system',
      });
    });

    it('rejects an empty code', async () => {
      await expect(scanService.manualEntry('  ', 'gate-1')).resolves.toEqual({
        success: false,
        status: 'INVALID',
        message: 'No ticket ID or team code provided',
      });
    });
  });

  describe('check', () => {
    it('reports status without recording attendance', async () => {
      await expect(scanService.check(stored.ticketId)).resolves.toMatchObject({ exists: true, used: false });
      await expect(scanService.listAttendance()).resolves.toEqual([]);

      await scanService.manualEntry(stored.ticketId, 'gate-1');
      await expect(scanService.check(stored.ticketId)).resolves.toMatchObject({ exists: true, used: true });
    });

    it('reports an unknown ticket', async () => {
      await expect(scanService.check('FFFF0000')).resolves.toEqual({ exists: false, used: false });
    });
  });

  describe('result', () => {
    it('moves from VALID to CHECKED_IN', async () => {
      await expect(scanService.result(stored.ticketId)).resolves.toMatchObject({
        success: true,
        status: 'VALID',
        message: 'Ticket is valid',
      });

      const entry = await scanService.manualEntry(stored.ticketId, 'gate-1');

      await expect(scanService.result(stored.ticketId)).resolves.toMatchObject({
        success: true,
        status: 'CHECKED_IN',
        message: 'Already checked in',
        scannedAt: entry.timestamp,
      });
    });

    it('reports an unknown ticket', async () => {
      await expect(scanService.result('ffff0000')).resolves.toEqual({
        success: false,
        status: 'INVALID',
        message: 'Ticket FFFF0000 not found in system',
      });
    });
  });
});
