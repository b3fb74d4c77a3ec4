import { createHash, createHmac, timingSafeEqual } from 'node:crypto';
import * as OTPAuth from 'otpauth';
import type { SecretCipher } from '../infra/crypto/SecretCipher.js';
import { SecretIntegrityError } from '../domain/errors.js';

/** RFC 4226 recommends 160-bit keys for HMAC-SHA1 */
export const SECRET_SIZE_BYTES = 20;

export type SecretDerivation = 'random' | 'hmac';

export interface DerivedSecret {
  secret: OTPAuth.Secret;
  hash: string;
}

/**
 * SecretService - creates device secrets and protects them at rest.
 * The raw secret leaves this service once, at registration; storage only
 * ever sees its SHA-256 hash and its sealed form.
 */
export class SecretService {
  constructor(
    private cipher: SecretCipher,
    private options: { derivation: SecretDerivation; masterSecret: string }
  ) {}

  /**
   * Create the secret for a new device.
   * `random` draws fresh bytes from the CSPRNG; `hmac` derives
   * HMAC-SHA256(master secret, device id) for devices that compute their own key.
   */
  derive(deviceId: string, _userId: string): DerivedSecret {
    const secret =
      this.options.derivation === 'hmac'
        ? OTPAuth.Secret.fromHex(
            createHmac('sha256', this.options.masterSecret).update(deviceId).digest('hex')
          )
        : new OTPAuth.Secret({ size: SECRET_SIZE_BYTES });

    return { secret, hash: this.hash(secret) };
  }

  /**
   * One-way hash for storage (64 hex chars)
   */
  hash(secret: OTPAuth.Secret): string {
    return createHash('sha256').update(secret.bytes).digest('hex');
  }

  seal(deviceId: string, secret: OTPAuth.Secret): string {
    return this.cipher.seal(secret.bytes, deviceId);
  }

  /**
   * Recover the secret for one verification call.
   * Fails when the sealed value does not authenticate or no longer matches the stored hash.
   */
  open(deviceId: string, sealed: string, expectedHash: string): OTPAuth.Secret {
    const plaintext = this.cipher.open(sealed, deviceId);
    if (!plaintext) {
      throw new SecretIntegrityError(deviceId);
    }

    const secret = OTPAuth.Secret.fromHex(plaintext.toString('hex'));
    const actual = Buffer.from(this.hash(secret), 'hex');
    const expected = Buffer.from(expectedHash, 'hex');
    if (actual.length !== expected.length || !timingSafeEqual(actual, expected)) {
      throw new SecretIntegrityError(deviceId);
    }

    return secret;
  }
}
