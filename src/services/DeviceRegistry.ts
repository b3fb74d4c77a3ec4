import type { DeviceRepository } from '../infra/repositories/DeviceRepository.js';
import type { Device } from '../domain/entities/Device.js';
import { createDevice } from '../domain/entities/Device.js';
import {
  AlreadyInactiveError,
  DatabaseError,
  DeviceInactiveError,
  DeviceNotFoundError,
  DuplicateDeviceError,
  ReplayDetectedError,
  StorageUnavailableError,
} from '../domain/errors.js';
import { logger } from '../infra/logger.js';

/**
 * DeviceRegistry - owns device lifecycle: Unregistered -> Active -> Inactive.
 * All coordination goes through the store; nothing is cached between calls.
 * Only reads are retried on transient storage faults.
 */
export class DeviceRegistry {
  constructor(
    private deviceRepo: DeviceRepository,
    private options: { readRetries: number }
  ) {}

  register(params: {
    deviceId: string;
    userId: string;
    derivedKeyHash: string;
    encryptedSecret: string;
    at?: Date;
  }): Device {
    const device = createDevice({
      deviceId: params.deviceId,
      userId: params.userId,
      derivedKeyHash: params.derivedKeyHash,
      encryptedSecret: params.encryptedSecret,
      createdAt: params.at,
    });

    let inserted: boolean;
    try {
      inserted = this.deviceRepo.insertIfAbsent(device);
    } catch (error) {
      // A concurrent insert that slipped past the check still hits the primary key
      if (isPrimaryKeyViolation(error)) {
        throw new DuplicateDeviceError(params.deviceId);
      }
      throw error;
    }

    if (!inserted) {
      throw new DuplicateDeviceError(params.deviceId);
    }

    logger.info('Device registered', { deviceId: device.deviceId, userId: device.userId });
    return device;
  }

  load(deviceId: string): Device {
    const device = this.withReadRetry(() => this.deviceRepo.getById(deviceId));
    if (!device) {
      throw new DeviceNotFoundError(deviceId);
    }
    return device;
  }

  listByUser(userId: string, limit?: number): Device[] {
    return this.withReadRetry(() => this.deviceRepo.listByUser(userId, limit));
  }

  /**
   * Count one successful verification at `movingFactor`.
   * The update is conditional on the device still being active and the factor
   * being above the stored high-water mark, so of two concurrent acceptances
   * of the same code only one lands; the other is reported as a replay.
   * The committed row comes back from the update itself, so a read failing
   * afterwards cannot turn a counted success into an error.
   */
  recordSuccessfulVerification(deviceId: string, movingFactor: number, at = new Date()): Device {
    const updated = this.deviceRepo.recordUsageIfAdvancing({
      deviceId,
      movingFactor,
      usedAt: at,
    });
    if (updated) {
      return updated;
    }

    const current = this.load(deviceId);
    if (!current.isActive) {
      throw new DeviceInactiveError(deviceId);
    }
    logger.warn('Moving factor already consumed', {
      deviceId,
      movingFactor,
      highWaterMark: current.lastMovingFactor,
    });
    throw new ReplayDetectedError(deviceId);
  }

  deactivate(deviceId: string, at = new Date()): Device {
    const existing = this.load(deviceId);
    if (!existing.isActive) {
      throw new AlreadyInactiveError(deviceId);
    }

    const deactivated = this.deviceRepo.deactivateIfActive(deviceId, at);
    if (!deactivated) {
      // Lost the race to another deactivation
      throw new AlreadyInactiveError(deviceId);
    }

    logger.info('Device deactivated', { deviceId });
    return deactivated;
  }

  isHealthy(): boolean {
    try {
      return this.deviceRepo.ping();
    } catch (error) {
      logger.warn('Device store health check failed', { error });
      return false;
    }
  }

  private withReadRetry<T>(read: () => T): T {
    for (let attempt = 0; ; attempt++) {
      try {
        return read();
      } catch (error) {
        if (!(error instanceof StorageUnavailableError) || attempt >= this.options.readRetries) {
          throw error;
        }
        logger.warn('Retrying device read after transient storage error', {
          attempt: attempt + 1,
          maxRetries: this.options.readRetries,
        });
      }
    }
  }
}

function isPrimaryKeyViolation(error: unknown): boolean {
  return (
    error instanceof DatabaseError &&
    (error.sqliteCode === 'SQLITE_CONSTRAINT_PRIMARYKEY' ||
      error.sqliteCode === 'SQLITE_CONSTRAINT_UNIQUE')
  );
}
