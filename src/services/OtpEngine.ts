import { timingSafeEqual } from 'node:crypto';
import * as OTPAuth from 'otpauth';

export type OtpAlgorithm = 'SHA1' | 'SHA256' | 'SHA512';

/**
 * OTP configuration
 */
export interface OtpOptions {
  /** Number of code digits (6 or 8) */
  digits: number;
  /** Time step in seconds */
  period: number;
  /** Steps accepted either side of the current one */
  window: number;
  algorithm: OtpAlgorithm;
}

export const DEFAULT_OTP_OPTIONS: OtpOptions = {
  digits: 6,
  period: 30,
  window: 1,
  algorithm: 'SHA1',
};

export type OtpVerification =
  | { accepted: true; movingFactor: number; matchedOffset: number }
  | { accepted: false; reason: 'invalid_code' }
  | { accepted: false; reason: 'replay_detected'; matchedOffset: number };

/**
 * OtpEngine - RFC 6238 time-based codes (RFC 4226 HOTP over the time step).
 * Stateless: the replay high-water mark is supplied by the caller.
 */
export class OtpEngine {
  readonly options: OtpOptions;

  constructor(options: Partial<OtpOptions> = {}) {
    this.options = { ...DEFAULT_OTP_OPTIONS, ...options };
  }

  stepAt(at: Date): number {
    return OTPAuth.TOTP.counter({ period: this.options.period, timestamp: at.getTime() });
  }

  computeExpected(secret: OTPAuth.Secret, step: number): string {
    return OTPAuth.HOTP.generate({
      secret,
      algorithm: this.options.algorithm,
      digits: this.options.digits,
      counter: step,
    });
  }

  /**
   * Check a submitted code against the current step and `window` steps either side.
   * Every candidate is compared in constant time; a match on a step at or below
   * `lastAcceptedStep` is a replay.
   */
  verify(
    secret: OTPAuth.Secret,
    submittedCode: string,
    context: { at: Date; lastAcceptedStep: number | null }
  ): OtpVerification {
    const code = normalizeCode(submittedCode);
    if (code === null || code.length !== this.options.digits) {
      return { accepted: false, reason: 'invalid_code' };
    }

    const submitted = Buffer.from(code, 'utf8');
    const current = this.stepAt(context.at);
    let freshOffset: number | null = null;
    let consumedOffset: number | null = null;

    for (let offset = -this.options.window; offset <= this.options.window; offset++) {
      const step = current + offset;
      if (step < 0) continue;

      const expected = Buffer.from(this.computeExpected(secret, step), 'utf8');
      if (!timingSafeEqual(expected, submitted)) continue;

      if (context.lastAcceptedStep !== null && step <= context.lastAcceptedStep) {
        consumedOffset = consumedOffset ?? offset;
      } else {
        freshOffset = offset;
      }
    }

    if (freshOffset !== null) {
      return { accepted: true, movingFactor: current + freshOffset, matchedOffset: freshOffset };
    }
    if (consumedOffset !== null) {
      return { accepted: false, reason: 'replay_detected', matchedOffset: consumedOffset };
    }
    return { accepted: false, reason: 'invalid_code' };
  }
}

/**
 * Strip whitespace; null unless only decimal digits remain
 */
export function normalizeCode(code: string): string | null {
  const normalized = code.replace(/\s/g, '');
  return /^\d+$/.test(normalized) ? normalized : null;
}
