import { v4 as uuidv4 } from 'uuid';
import { CryptoService } from '../services/crypto.service';

export const TEAM_CODE_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
export const TEAM_CODE_SUFFIX_LENGTH = 6;

// No 0/O or 1/l/I: the password is read off a screen and typed by hand
export const TEMP_PASSWORD_ALPHABET = 'ABCDEFGHJKMNPQRSTUVWXYZabcdefghjkmnpqrstuvwxyz23456789';
export const TEMP_PASSWORD_LENGTH = 10;

const MAX_ATTEMPTS = 20;

export function generateTeamCode(cryptoService: CryptoService, prefix: string): string {
  return `${prefix}${cryptoService.randomCode(TEAM_CODE_ALPHABET, TEAM_CODE_SUFFIX_LENGTH)}`;
}

export function generateTicketId(): string {
  return uuidv4().slice(0, 8).toUpperCase();
}

export function generateTemporaryPassword(cryptoService: CryptoService): string {
  return cryptoService.randomCode(TEMP_PASSWORD_ALPHABET, TEMP_PASSWORD_LENGTH);
}

/**
 * Draws from `generate` until `isTaken` rejects the value.
 */
export function generateUnique(generate: () => string, isTaken: (candidate: string) => boolean): string {
  for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
    const candidate = generate();
    if (!isTaken(candidate)) {
      return candidate;
    }
  }
  throw new Error(`Could not generate a unique identifier after ${MAX_ATTEMPTS} attempts`);
}

export function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}
