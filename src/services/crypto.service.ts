import crypto from 'crypto';
import bcrypt from 'bcrypt';

export type KeyPurpose = 'storage' | 'qr';

export interface CryptoConfig {
  ENCRYPTION_KEY: string;
  HMAC_SECRET: string;
  BCRYPT_ROUNDS: number;
}

/**
 * Password hashing, authenticated encryption and payload signing.
 *
 * Ciphertexts are base64url(iv | tag | ciphertext) under AES-256-GCM. Each
 * purpose gets its own key, derived from ENCRYPTION_KEY with HKDF, so a QR
 * token can never be replayed as a storage document or the other way round.
 */
export class CryptoService {
  private static readonly ALGORITHM = 'aes-256-gcm';
  private static readonly KEY_LENGTH = 32;
  private static readonly IV_LENGTH = 12;
  private static readonly TAG_LENGTH = 16;

  private readonly keys: Record<KeyPurpose, Buffer>;
  private readonly hmacSecret: Buffer;
  private readonly bcryptRounds: number;

  constructor(config: CryptoConfig) {
    this.keys = {
      storage: CryptoService.deriveKey(config.ENCRYPTION_KEY, 'storage'),
      qr: CryptoService.deriveKey(config.ENCRYPTION_KEY, 'qr'),
    };
    this.hmacSecret = Buffer.from(config.HMAC_SECRET, 'utf8');
    this.bcryptRounds = config.BCRYPT_ROUNDS;
  }

  private static deriveKey(secret: string, purpose: KeyPurpose): Buffer {
    const derived = crypto.hkdfSync('sha256', secret, Buffer.alloc(0), `entry-pass:${purpose}`, CryptoService.KEY_LENGTH);
    return Buffer.from(derived);
  }

  encrypt(plaintext: string, purpose: KeyPurpose): string {
    const iv = crypto.randomBytes(CryptoService.IV_LENGTH);
    const cipher = crypto.createCipheriv(CryptoService.ALGORITHM, this.keys[purpose], iv);
    const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    const tag = cipher.getAuthTag();

    return Buffer.concat([iv, tag, encrypted]).toString('base64url');
  }

  /**
   * Throws when the token is malformed, was produced under another key or
   * has been modified.
   */
  decrypt(token: string, purpose: KeyPurpose): string {
    const combined = Buffer.from(token, 'base64url');
    const headerLength = CryptoService.IV_LENGTH + CryptoService.TAG_LENGTH;
    if (combined.length <= headerLength) {
      throw new Error('Ciphertext too short');
    }

    const iv = combined.subarray(0, CryptoService.IV_LENGTH);
    const tag = combined.subarray(CryptoService.IV_LENGTH, headerLength);
    const encrypted = combined.subarray(headerLength);

    const decipher = crypto.createDecipheriv(CryptoService.ALGORITHM, this.keys[purpose], iv);
    decipher.setAuthTag(tag);

    return Buffer.concat([decipher.update(encrypted), decipher.final()]).toString('utf8');
  }

  // Hex HMAC-SHA256
  sign(payload: string): string {
    return crypto.createHmac('sha256', this.hmacSecret).update(payload, 'utf8').digest('hex');
  }

  verifySignature(payload: string, signature: string): boolean {
    const expected = Buffer.from(this.sign(payload), 'hex');
    if (!/^[0-9a-f]+$/i.test(signature)) return false;
    const provided = Buffer.from(signature, 'hex');
    if (provided.length !== expected.length) return false;
    return crypto.timingSafeEqual(expected, provided);
  }

  async hashPassword(password: string): Promise<string> {
    return bcrypt.hash(password, this.bcryptRounds);
  }

  async verifyPassword(password: string, hash: string): Promise<boolean> {
    return bcrypt.compare(password, hash);
  }

  randomCode(alphabet: string, length: number): string {
    let code = '';
    for (let i = 0; i < length; i++) {
      code += alphabet[crypto.randomInt(0, alphabet.length)];
    }
    return code;
  }
}
