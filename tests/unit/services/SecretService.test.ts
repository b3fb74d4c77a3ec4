import { describe, it, expect } from 'vitest';
import { createHash, createHmac } from 'node:crypto';
import { SecretCipher } from '../../../src/infra/crypto/SecretCipher.js';
import { SECRET_SIZE_BYTES, SecretService } from '../../../src/services/SecretService.js';
import { SecretIntegrityError } from '../../../src/domain/errors.js';

const MASTER = 'test-master-secret-0123456789abcdef';

function hexOf(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex');
}

describe('SecretCipher', () => {
  const cipher = new SecretCipher(MASTER);
  const plaintext = Buffer.from('0123456789abcdefghij', 'utf8');

  it('should open what it sealed for the same context', () => {
    const sealed = cipher.seal(plaintext, 'D1');

    expect(sealed.startsWith('v1:')).toBe(true);
    expect(sealed.split(':')).toHaveLength(4);
    expect(cipher.open(sealed, 'D1')?.toString('utf8')).toBe('0123456789abcdefghij');
  });

  it('should use a fresh IV per seal', () => {
    expect(cipher.seal(plaintext, 'D1')).not.toBe(cipher.seal(plaintext, 'D1'));
  });

  it('should refuse a sealed value moved to another context', () => {
    const sealed = cipher.seal(plaintext, 'D1');

    expect(cipher.open(sealed, 'D2')).toBeNull();
  });

  it('should refuse tampered ciphertext', () => {
    const [version, iv, tag, ciphertext] = cipher.seal(plaintext, 'D1').split(':');
    const bytes = Buffer.from(ciphertext, 'base64');
    bytes[0] ^= 0xff;

    expect(cipher.open([version, iv, tag, bytes.toString('base64')].join(':'), 'D1')).toBeNull();
  });

  it('should refuse malformed values', () => {
    expect(cipher.open('not-sealed', 'D1')).toBeNull();
    expect(cipher.open('v2:a:b:c', 'D1')).toBeNull();
    expect(cipher.open('v1:AAAA:AAAA:AAAA', 'D1')).toBeNull();
  });

  it('should refuse values sealed under another master secret', () => {
    const other = new SecretCipher('another-test-master-secret-0123456789');

    expect(other.open(cipher.seal(plaintext, 'D1'), 'D1')).toBeNull();
  });
});

describe('SecretService', () => {
  const cipher = new SecretCipher(MASTER);

  describe('random derivation', () => {
    const service = new SecretService(cipher, { derivation: 'random', masterSecret: MASTER });

    it('should create 160-bit secrets with their SHA-256 hash', () => {
      const { secret, hash } = service.derive('D1', 'U1');

      expect(secret.bytes).toHaveLength(SECRET_SIZE_BYTES);
      expect(hash).toBe(createHash('sha256').update(secret.bytes).digest('hex'));
      expect(hash).toMatch(/^[0-9a-f]{64}$/);
    });

    it('should never repeat a secret', () => {
      const first = service.derive('D1', 'U1');
      const second = service.derive('D1', 'U1');

      expect(first.hash).not.toBe(second.hash);
    });

    it('should recover the sealed secret when the hash matches', () => {
      const { secret, hash } = service.derive('D1', 'U1');
      const sealed = service.seal('D1', secret);

      expect(hexOf(service.open('D1', sealed, hash).bytes)).toBe(hexOf(secret.bytes));
    });

    it('should fail integrity when the hash does not match', () => {
      const { secret } = service.derive('D1', 'U1');
      const other = service.derive('D1', 'U1');
      const sealed = service.seal('D1', secret);

      expect(() => service.open('D1', sealed, other.hash)).toThrow(SecretIntegrityError);
      expect(() => service.open('D1', sealed, 'short')).toThrow(SecretIntegrityError);
    });

    it('should fail integrity for a secret sealed for another device', () => {
      const { secret, hash } = service.derive('D1', 'U1');
      const sealed = service.seal('D1', secret);

      expect(() => service.open('D2', sealed, hash)).toThrow(SecretIntegrityError);
    });
  });

  describe('hmac derivation', () => {
    const service = new SecretService(cipher, { derivation: 'hmac', masterSecret: MASTER });

    it('should derive HMAC-SHA256 of the device id under the master secret', () => {
      const { secret } = service.derive('D1', 'U1');

      expect(hexOf(secret.bytes)).toBe(createHmac('sha256', MASTER).update('D1').digest('hex'));
    });

    it('should be deterministic per device', () => {
      expect(service.derive('D1', 'U1').hash).toBe(service.derive('D1', 'U2').hash);
      expect(service.derive('D1', 'U1').hash).not.toBe(service.derive('D2', 'U1').hash);
    });
  });
});
