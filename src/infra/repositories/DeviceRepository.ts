import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type { Device } from '../../domain/entities/Device.js';
import { logger } from '../logger.js';

type DeviceRow = {
  device_id: string;
  user_id: string;
  derived_key_hash: string;
  encrypted_secret: string;
  is_active: number;
  created_at: string;
  last_used: string | null;
  usage_count: number;
  last_moving_factor: number | null;
  deactivated_at: string | null;
};

/**
 * Repository for Device persistence
 * Conditional updates return whether a row changed; callers decide what a miss means
 */
export class DeviceRepository {
  constructor(private db: DatabaseAdapter) {}

  /**
   * Transactional check-then-insert
   * @returns false when the device id is already taken (active or not)
   */
  insertIfAbsent(device: Device): boolean {
    return this.db.transaction(() => {
      const existing = this.db.queryOne<{ device_id: string }>(
        'SELECT device_id FROM devices WHERE device_id = ?',
        [device.deviceId]
      );
      if (existing) {
        return false;
      }

      const sql = `
        INSERT INTO devices (
          device_id, user_id, derived_key_hash, encrypted_secret, is_active,
          created_at, last_used, usage_count, last_moving_factor, deactivated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `;

      this.db.execute(sql, [
        device.deviceId,
        device.userId,
        device.derivedKeyHash,
        device.encryptedSecret,
        device.isActive ? 1 : 0,
        device.createdAt.toISOString(),
        device.lastUsed ? device.lastUsed.toISOString() : null,
        device.usageCount,
        device.lastMovingFactor,
        device.deactivatedAt ? device.deactivatedAt.toISOString() : null,
      ]);

      logger.debug('Device row inserted', { deviceId: device.deviceId });
      return true;
    });
  }

  getById(deviceId: string): Device | null {
    const row = this.db.queryOne<DeviceRow>('SELECT * FROM devices WHERE device_id = ?', [
      deviceId,
    ]);
    return row ? this.mapRowToDevice(row) : null;
  }

  listByUser(userId: string, limit = 100): Device[] {
    const sql = `
      SELECT * FROM devices
      WHERE user_id = ?
      ORDER BY created_at DESC
      LIMIT ?
    `;

    const rows = this.db.query<DeviceRow>(sql, [userId, Math.min(limit, 500)]);
    return rows.map((row) => this.mapRowToDevice(row));
  }

  /**
   * Compare-and-update on the moving-factor high-water mark.
   * Only an active device whose stored high-water mark is below `movingFactor` changes.
   * @returns the updated device, read back in the same statement, or null when nothing changed
   */
  recordUsageIfAdvancing(params: {
    deviceId: string;
    movingFactor: number;
    usedAt: Date;
  }): Device | null {
    const usedAt = params.usedAt.toISOString();
    const sql = `
      UPDATE devices
      SET usage_count = usage_count + 1,
          last_used = CASE
            WHEN last_used IS NULL OR last_used < ? THEN ?
            ELSE last_used
          END,
          last_moving_factor = ?
      WHERE device_id = ?
        AND is_active = 1
        AND (last_moving_factor IS NULL OR last_moving_factor < ?)
      RETURNING *
    `;

    const row = this.db.queryOne<DeviceRow>(sql, [
      usedAt,
      usedAt,
      params.movingFactor,
      params.deviceId,
      params.movingFactor,
    ]);

    return row ? this.mapRowToDevice(row) : null;
  }

  /**
   * One-way transition to inactive; a device already inactive does not change
   */
  deactivateIfActive(deviceId: string, deactivatedAt: Date): Device | null {
    const sql = `
      UPDATE devices
      SET is_active = 0, deactivated_at = ?
      WHERE device_id = ? AND is_active = 1
      RETURNING *
    `;

    const row = this.db.queryOne<DeviceRow>(sql, [deactivatedAt.toISOString(), deviceId]);
    return row ? this.mapRowToDevice(row) : null;
  }

  ping(): boolean {
    return this.db.queryOne<{ ok: number }>('SELECT 1 AS ok')?.ok === 1;
  }

  private mapRowToDevice(row: DeviceRow): Device {
    return {
      deviceId: row.device_id,
      userId: row.user_id,
      derivedKeyHash: row.derived_key_hash,
      encryptedSecret: row.encrypted_secret,
      isActive: row.is_active === 1,
      createdAt: new Date(row.created_at),
      lastUsed: row.last_used ? new Date(row.last_used) : null,
      usageCount: row.usage_count,
      lastMovingFactor: row.last_moving_factor,
      deactivatedAt: row.deactivated_at ? new Date(row.deactivated_at) : null,
    };
  }
}
