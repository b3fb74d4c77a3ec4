import { createCipheriv, createDecipheriv, hkdfSync, randomBytes } from 'node:crypto';

const FORMAT_VERSION = 'v1';
const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12;
const KEY_INFO = 'device-otp-service/secret-at-rest';

/**
 * Authenticated encryption of device secrets at rest (AES-256-GCM).
 * The key is derived from the process-wide master secret with HKDF-SHA256,
 * and the caller-supplied context (the device id) is bound as AAD so a sealed
 * value cannot be moved to another device row.
 *
 * Sealed format: `v1:<iv>:<tag>:<ciphertext>`, base64 parts.
 */
export class SecretCipher {
  private readonly key: Buffer;

  constructor(masterSecret: string) {
    this.key = Buffer.from(
      hkdfSync('sha256', Buffer.from(masterSecret, 'utf8'), Buffer.alloc(0), KEY_INFO, 32)
    );
  }

  seal(plaintext: Uint8Array, context: string): string {
    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv(ALGORITHM, this.key, iv);
    cipher.setAAD(Buffer.from(context, 'utf8'));
    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
    const tag = cipher.getAuthTag();

    return [
      FORMAT_VERSION,
      iv.toString('base64'),
      tag.toString('base64'),
      ciphertext.toString('base64'),
    ].join(':');
  }

  /**
   * @returns the plaintext, or null when the value is malformed or fails authentication
   */
  open(sealed: string, context: string): Buffer | null {
    const parts = sealed.split(':');
    if (parts.length !== 4 || parts[0] !== FORMAT_VERSION) {
      return null;
    }

    const [, ivB64, tagB64, ciphertextB64] = parts;
    const iv = Buffer.from(ivB64, 'base64');
    const tag = Buffer.from(tagB64, 'base64');
    if (iv.length !== IV_LENGTH || tag.length !== 16) {
      return null;
    }

    try {
      const decipher = createDecipheriv(ALGORITHM, this.key, iv);
      decipher.setAAD(Buffer.from(context, 'utf8'));
      decipher.setAuthTag(tag);
      return Buffer.concat([
        decipher.update(Buffer.from(ciphertextB64, 'base64')),
        decipher.final(),
      ]);
    } catch {
      // GCM authentication failure
      return null;
    }
  }
}
