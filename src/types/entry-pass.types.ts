export type Role = 'admin' | 'scanner' | 'user';

export interface UserRecord {
  id: string;
  username: string;
  passwordHash: string;
  role: Role;
  teamName?: string;
  createdAt: string;
  createdBy: string;
}

export type PublicUser = Omit<UserRecord, 'passwordHash'>;

export interface TicketRecord {
  ticketId: string;
  teamCode: string;
  teamName: string;
  collegeName: string;
  teamLeaderEmail: string;
  teamSize: number;
  slot: string;
  eventName: string;
  qrPayload: string;
  createdAt: string;
  createdBy: string;
}

export type AttendanceStatus = 'present';

export interface AttendanceRecord {
  ticketId: string;
  teamCode: string;
  teamName: string;
  timestamp: string;
  status: AttendanceStatus;
  scannedBy: string;
}

export interface CollectionItems {
  users: UserRecord;
  tickets: TicketRecord;
  attendance: AttendanceRecord;
}

export type CollectionName = keyof CollectionItems;

export interface DashboardStats {
  totalTickets: number;
  checkedIn: number;
  pending: number;
  totalUsers: number;
}

export interface CreateTicketInput {
  teamName: string;
  collegeName: string;
  teamLeaderEmail: string;
  teamSize?: number;
  slot?: string;
  eventName?: string;
}

export interface StaffAccountInput {
  username: string;
  password: string;
  role: 'admin' | 'scanner';
}

export interface LoginInput {
  username: string;
  password: string;
}
