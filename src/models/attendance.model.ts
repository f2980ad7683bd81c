import { JsonStore } from '../storage/json-store';
import { AttendanceRecord } from '../types/entry-pass.types';

export type CheckInOutcome =
  | { recorded: true; record: AttendanceRecord }
  | { recorded: false; existing: AttendanceRecord };

export class AttendanceModel {
  constructor(private readonly store: JsonStore) {}

  async findAll(): Promise<AttendanceRecord[]> {
    return this.store.read('attendance');
  }

  async findByTicket(ticketId: string): Promise<AttendanceRecord | null> {
    const records = await this.findAll();
    return records.find((record) => record.ticketId === ticketId) ?? null;
  }

  async isUsed(ticketId: string): Promise<boolean> {
    const record = await this.findByTicket(ticketId);
    return record?.status === 'present';
  }

  /**
   * Inserts `record` unless the ticket already has a `present` record; the
   * check and the insert happen in one serialized write.
   */
  async checkIn(record: AttendanceRecord): Promise<CheckInOutcome> {
    return this.store.update('attendance', (records): { items: AttendanceRecord[]; result: CheckInOutcome } => {
      const existing = records.find((entry) => entry.ticketId === record.ticketId && entry.status === 'present');
      if (existing) {
        return { items: records, result: { recorded: false, existing } };
      }
      return { items: [...records, record], result: { recorded: true, record } };
    });
  }

  async deleteByTicket(ticketId: string): Promise<number> {
    return this.store.update('attendance', (records) => {
      const remaining = records.filter((record) => record.ticketId !== ticketId);
      return { items: remaining, result: records.length - remaining.length };
    });
  }

  async clear(): Promise<void> {
    await this.store.clear('attendance');
  }
}
