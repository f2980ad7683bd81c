import { CryptoService } from '../../src/services/crypto.service';
import {
  TEMP_PASSWORD_ALPHABET,
  generateTeamCode,
  generateTemporaryPassword,
  generateTicketId,
  generateUnique,
  truncate,
} from '../../src/utils/identifiers';

const cryptoService = new CryptoService({
  ENCRYPTION_KEY: 'test-encryption-key-for-testing-only',
  HMAC_SECRET: 'test-hmac-secret-key-for-testing-only',
  BCRYPT_ROUNDS: 4,
});

describe('identifiers', () => {
  it('builds team codes from the prefix and six characters', () => {
    expect(generateTeamCode(cryptoService, 'HF26')).toMatch(/^HF26[A-Z0-9]{6}$/);
  });

  it('builds eight character upper-case ticket IDs', () => {
    expect(generateTicketId()).toMatch(/^[0-9A-F]{8}$/);
  });

  it('builds temporary passwords without ambiguous characters', () => {
    const password = generateTemporaryPassword(cryptoService);

    expect(password).toHaveLength(10);
    for (const char of password) {
      expect(TEMP_PASSWORD_ALPHABET).toContain(char);
    }
    expect(TEMP_PASSWORD_ALPHABET).not.toMatch(/[0O1lI]/);
  });

  describe('generateUnique', () => {
    it('skips taken values', () => {
      const values = ['A', 'B', 'C'];
      const generate = jest.fn(() => values.shift() ?? 'Z');

      expect(generateUnique(generate, (candidate) => candidate !== 'C')).toBe('C');
      expect(generate).toHaveBeenCalledTimes(3);
    });

    it('gives up after twenty attempts', () => {
      const generate = jest.fn(() => 'A');

      expect(() => generateUnique(generate, () => true)).toThrow(
        'Could not generate a unique identifier after 20 attempts'
      );
      expect(generate).toHaveBeenCalledTimes(20);
    });
  });

  describe('truncate', () => {
    it('leaves short text alone', () => {
      expect(truncate('Null Pointers', 35)).toBe('Null Pointers');
      expect(truncate('abcde', 5)).toBe('abcde');
    });

    it('cuts long text and appends an ellipsis', () => {
      expect(truncate('abcdefgh', 5)).toBe('abcde...');
    });
  });
});
