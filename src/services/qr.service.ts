import QRCode from 'qrcode';
import { CryptoService } from './crypto.service';
import { InternalError } from '../errors';
import { createLogger } from '../utils/logger';

const log = createLogger('qr');

export interface QrPayloadSubject {
  ticketId: string;
  teamCode: string;
  teamName: string;
}

/** Wire shape of the signed body carried inside the QR token. */
export interface QrPayloadData {
  ticket_id: string;
  user_id: string;
  team_name: string;
  timestamp: number;
}

export type QrDecodeResult =
  | { valid: true; data: Partial<QrPayloadData> }
  | { valid: false; error: string };

export interface QrRenderOptions {
  errorCorrectionLevel?: 'L' | 'M' | 'Q' | 'H';
  scale?: number;
  margin?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readPayloadData(body: Record<string, unknown>): Partial<QrPayloadData> {
  const data: Partial<QrPayloadData> = {};
  if (typeof body.ticket_id === 'string') data.ticket_id = body.ticket_id;
  if (typeof body.user_id === 'string') data.user_id = body.user_id;
  if (typeof body.team_name === 'string') data.team_name = body.team_name;
  if (typeof body.timestamp === 'number') data.timestamp = body.timestamp;
  return data;
}

export class QrService {
  constructor(private readonly cryptoService: CryptoService) {}

  /**
   * Signs `{ ticket_id, user_id, team_name, timestamp }`, appends the
   * signature and encrypts the result into a URL-safe token.
   */
  createPayload(subject: QrPayloadSubject, issuedAt: Date = new Date()): string {
    const body: QrPayloadData = {
      ticket_id: subject.ticketId,
      user_id: subject.teamCode,
      team_name: subject.teamName,
      timestamp: Math.floor(issuedAt.getTime() / 1000),
    };
    const signature = this.cryptoService.sign(JSON.stringify(body));
    return this.cryptoService.encrypt(JSON.stringify({ ...body, signature }), 'qr');
  }

  decodePayload(token: string): QrDecodeResult {
    let parsed: unknown;
    try {
      parsed = JSON.parse(this.cryptoService.decrypt(token.trim(), 'qr'));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return { valid: false, error: `Failed to decode payload: ${reason}` };
    }

    if (!isRecord(parsed)) {
      return { valid: false, error: 'Failed to decode payload: not an object' };
    }

    const { signature, ...body } = parsed;
    if (typeof signature !== 'string' || !this.cryptoService.verifySignature(JSON.stringify(body), signature)) {
      return { valid: false, error: 'Invalid signature - payload may be tampered' };
    }

    return { valid: true, data: readPayloadData(body) };
  }

  async renderPng(payload: string, options: QrRenderOptions = {}): Promise<Buffer> {
    try {
      const buffer = await QRCode.toBuffer(payload, {
        type: 'png',
        errorCorrectionLevel: options.errorCorrectionLevel ?? 'H',
        scale: options.scale ?? 10,
        margin: options.margin ?? 4,
        color: { dark: '#000000', light: '#FFFFFF' },
      });
      log.debug({ payloadLength: payload.length }, 'QR code rendered');
      return buffer;
    } catch (error) {
      log.error({ err: error }, 'QR generation failed');
      throw new InternalError('Failed to generate QR code', 'QR_GENERATION_FAILED');
    }
  }
}
