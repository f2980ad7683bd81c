import { CryptoService } from '../../src/services/crypto.service';

const config = {
  ENCRYPTION_KEY: 'test-encryption-key-for-testing-only',
  HMAC_SECRET: 'test-hmac-secret-key-for-testing-only',
  BCRYPT_ROUNDS: 4,
};

describe('CryptoService', () => {
  const cryptoService = new CryptoService(config);

  describe('encrypt / decrypt', () => {
    it('recovers the plaintext', () => {
      const token = cryptoService.encrypt('{"tickets":[]}', 'storage');

      expect(token).toMatch(/^[A-Za-z0-9_-]+$/);
      expect(cryptoService.decrypt(token, 'storage')).toBe('{"tickets":[]}');
    });

    it('uses a fresh IV per call', () => {
      expect(cryptoService.encrypt('same', 'qr')).not.toBe(cryptoService.encrypt('same', 'qr'));
    });

    it('keeps storage and QR keys apart', () => {
      const token = cryptoService.encrypt('payload', 'qr');

      expect(() => cryptoService.decrypt(token, 'storage')).toThrow();
    });

    it('rejects a modified token', () => {
      const token = cryptoService.encrypt('payload', 'storage');
      const bytes = Buffer.from(token, 'base64url');
      bytes[bytes.length - 1] ^= 0x01;

      expect(() => cryptoService.decrypt(bytes.toString('base64url'), 'storage')).toThrow();
    });

    it('rejects a token shorter than the header', () => {
      expect(() => cryptoService.decrypt('abc', 'storage')).toThrow('Ciphertext too short');
    });

    it('rejects tokens from another key', () => {
      const other = new CryptoService({ ...config, ENCRYPTION_KEY: 'another-encryption-key-for-testing' });

      expect(() => other.decrypt(cryptoService.encrypt('payload', 'storage'), 'storage')).toThrow();
    });
  });

  describe('sign / verifySignature', () => {
    it('produces a 64 character hex digest', () => {
      expect(cryptoService.sign('body')).toMatch(/^[0-9a-f]{64}$/);
    });

    it('accepts the matching signature', () => {
      expect(cryptoService.verifySignature('body', cryptoService.sign('body'))).toBe(true);
    });

    it('rejects a signature over other content', () => {
      expect(cryptoService.verifySignature('body', cryptoService.sign('other'))).toBe(false);
    });

    it('rejects malformed signatures', () => {
      expect(cryptoService.verifySignature('body', 'not-hex')).toBe(false);
      expect(cryptoService.verifySignature('body', 'abcd')).toBe(false);
      expect(cryptoService.verifySignature('body', '')).toBe(false);
    });
  });

  describe('passwords', () => {
    it('verifies a bcrypt hash', async () => {
      const hash = await cryptoService.hashPassword('test-password');

      expect(hash).toMatch(/^\$2[aby]\$04\$/);
      await expect(cryptoService.verifyPassword('test-password', hash)).resolves.toBe(true);
      await expect(cryptoService.verifyPassword('wrong-password', hash)).resolves.toBe(false);
    });
  });

  describe('randomCode', () => {
    it('draws only from the alphabet', () => {
      const code = cryptoService.randomCode('AB', 32);

      expect(code).toHaveLength(32);
      expect(code).toMatch(/^[AB]+$/);
    });
  });
});
