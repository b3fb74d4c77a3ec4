import * as OTPAuth from 'otpauth';
import type { Device } from '../domain/entities/Device.js';
import type { AuditAction, Provenance } from '../domain/entities/AuditEntry.js';
import type { VerificationResult } from '../domain/entities/VerificationResult.js';
import {
  DeviceInactiveError,
  DeviceNotFoundError,
  ReplayDetectedError,
  TooManyAttemptsError,
  ValidationError,
  isAppError,
} from '../domain/errors.js';
import type { AuditLogWriter } from './AuditLogWriter.js';
import type { DeviceRegistry } from './DeviceRegistry.js';
import type { OtpEngine, OtpVerification } from './OtpEngine.js';
import type { SecretService } from './SecretService.js';
import { logger } from '../infra/logger.js';

export interface RegisteredDevice {
  device: Device;
  /** Base32 secret, returned once and never retrievable again */
  secret: string;
  otpauthUri: string;
}

type Rejection = Exclude<VerificationResult['status'], 'accepted'>;

/**
 * DeviceAuthService - composes secret handling, the OTP engine, the registry
 * and the audit writer. Every register, verify and deactivate call writes
 * exactly one audit entry, whatever its outcome.
 */
export class DeviceAuthService {
  private readonly now: () => Date;

  constructor(
    private registry: DeviceRegistry,
    private secrets: SecretService,
    private engine: OtpEngine,
    private audit: AuditLogWriter,
    private options: {
      issuer: string;
      now?: () => Date;
      /** Verification attempts allowed per device within the window; 0 disables */
      maxAttempts?: number;
      attemptWindowSeconds?: number;
    }
  ) {
    this.now = options.now ?? (() => new Date());
  }

  registerDevice(deviceId: string, userId: string, provenance: Provenance = {}): RegisteredDevice {
    try {
      const { secret, hash } = this.secrets.derive(deviceId, userId);
      const device = this.registry.register({
        deviceId,
        userId,
        derivedKeyHash: hash,
        encryptedSecret: this.secrets.seal(deviceId, secret),
        at: this.now(),
      });

      this.audit.record(deviceId, 'register', true, provenance, { user_id: userId });

      return {
        device,
        secret: secret.base32,
        otpauthUri: this.provisioningUri(deviceId, secret),
      };
    } catch (error) {
      this.recordFailure(deviceId, 'register', provenance, error, { user_id: userId });
      throw error;
    }
  }

  verifyOtp(deviceId: string, submittedCode: string, provenance: Provenance = {}): VerificationResult {
    const at = this.now();

    let device: Device;
    try {
      device = this.registry.load(deviceId);
    } catch (error) {
      if (error instanceof DeviceNotFoundError) {
        return this.reject(deviceId, 'device_not_found', provenance);
      }
      this.recordFailure(deviceId, 'verify', provenance, error);
      throw error;
    }

    if (!device.isActive) {
      return this.reject(deviceId, 'device_inactive', provenance);
    }

    let outcome: OtpVerification;
    try {
      this.enforceAttemptLimit(deviceId, at);
      const secret = this.secrets.open(deviceId, device.encryptedSecret, device.derivedKeyHash);
      outcome = this.engine.verify(secret, submittedCode, {
        at,
        lastAcceptedStep: device.lastMovingFactor,
      });
    } catch (error) {
      this.recordFailure(deviceId, 'verify', provenance, error);
      throw error;
    }

    if (!outcome.accepted) {
      return this.reject(
        deviceId,
        outcome.reason,
        provenance,
        outcome.reason === 'replay_detected' ? { matched_offset: outcome.matchedOffset } : {}
      );
    }

    let updated: Device;
    try {
      updated = this.registry.recordSuccessfulVerification(deviceId, outcome.movingFactor, at);
    } catch (error) {
      // Lost a race against a concurrent acceptance or a deactivation
      if (error instanceof ReplayDetectedError) {
        return this.reject(deviceId, 'replay_detected', provenance, { concurrent: true });
      }
      if (error instanceof DeviceInactiveError) {
        return this.reject(deviceId, 'device_inactive', provenance, { concurrent: true });
      }
      this.recordFailure(deviceId, 'verify', provenance, error);
      throw error;
    }

    this.audit.record(deviceId, 'verify', true, provenance, {
      matched_offset: outcome.matchedOffset,
    });
    logger.info('OTP accepted', {
      deviceId,
      matchedOffset: outcome.matchedOffset,
      usageCount: updated.usageCount,
    });

    return { status: 'accepted', device: updated, matchedOffset: outcome.matchedOffset };
  }

  deactivateDevice(deviceId: string, provenance: Provenance = {}): Device {
    try {
      const device = this.registry.deactivate(deviceId, this.now());
      this.audit.record(deviceId, 'deactivate', true, provenance);
      return device;
    } catch (error) {
      this.recordFailure(deviceId, 'deactivate', provenance, error);
      throw error;
    }
  }

  getDevice(deviceId: string): Device {
    return this.registry.load(deviceId);
  }

  listUserDevices(userId: string, limit?: number): Device[] {
    return this.registry.listByUser(userId, limit);
  }

  /**
   * Current code for a base32 secret, as a device would compute it
   */
  generateCurrentCode(base32Secret: string): string {
    let secret: OTPAuth.Secret;
    try {
      secret = OTPAuth.Secret.fromBase32(base32Secret);
    } catch (error) {
      throw new ValidationError('secret must be base32 encoded', { error: String(error) });
    }
    return this.engine.computeExpected(secret, this.engine.stepAt(this.now()));
  }

  isHealthy(): boolean {
    return this.registry.isHealthy();
  }

  /**
   * Per-device throttle over the audit trail, so it holds across client IPs and processes
   */
  private enforceAttemptLimit(deviceId: string, at: Date): void {
    const { maxAttempts = 0, attemptWindowSeconds = 300 } = this.options;
    if (maxAttempts <= 0) return;

    const since = new Date(at.getTime() - attemptWindowSeconds * 1000);
    const attempts = this.audit.attemptsSince(deviceId, since);
    if (attempts >= maxAttempts) {
      logger.warn('Verification attempts exhausted', { deviceId, attempts, maxAttempts });
      throw new TooManyAttemptsError(deviceId, attemptWindowSeconds);
    }
  }

  private provisioningUri(deviceId: string, secret: OTPAuth.Secret): string {
    const { algorithm, digits, period } = this.engine.options;
    return new OTPAuth.TOTP({
      issuer: this.options.issuer,
      label: deviceId,
      algorithm,
      digits,
      period,
      secret,
    }).toString();
  }

  private reject(
    deviceId: string,
    status: Rejection,
    provenance: Provenance,
    details: Record<string, unknown> = {}
  ): VerificationResult {
    this.audit.record(deviceId, 'verify', false, provenance, { reason: status, ...details });
    logger.info('OTP rejected', { deviceId, reason: status });
    return { status, deviceId };
  }

  private recordFailure(
    deviceId: string,
    action: AuditAction,
    provenance: Provenance,
    error: unknown,
    details: Record<string, unknown> = {}
  ): void {
    const reason = isAppError(error) ? error.code.toLowerCase() : 'internal_error';
    this.audit.record(deviceId, action, false, provenance, { ...details, reason });
    if (!isAppError(error) || error.statusCode >= 500) {
      logger.error(`Device ${action} failed`, { deviceId, reason, error });
    }
  }
}
