import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type { AuditAction, AuditEntry } from '../../domain/entities/AuditEntry.js';

type AuditRow = {
  id: number;
  device_id: string;
  action: AuditAction;
  success: number;
  timestamp: string;
  ip_address: string | null;
  user_agent: string | null;
  additional_data: string | null;
};

/**
 * Repository for AuditEntry persistence
 * Append-only: there is no update or delete path, and the schema rejects both
 */
export class AuditRepository {
  constructor(private db: DatabaseAdapter) {}

  append(entry: Omit<AuditEntry, 'id'>): AuditEntry {
    const sql = `
      INSERT INTO audit_logs (
        device_id, action, success, timestamp, ip_address, user_agent, additional_data
      ) VALUES (?, ?, ?, ?, ?, ?, ?)
    `;

    const id = this.db.insert(sql, [
      entry.deviceId,
      entry.action,
      entry.success ? 1 : 0,
      entry.timestamp.toISOString(),
      entry.ipAddress,
      entry.userAgent,
      entry.additionalData ? JSON.stringify(entry.additionalData) : null,
    ]);

    return { ...entry, id };
  }

  /**
   * Get recent audit events
   */
  getRecent(limit = 100): AuditEntry[] {
    const sql = `
      SELECT * FROM audit_logs
      ORDER BY id DESC
      LIMIT ?
    `;

    const rows = this.db.query<AuditRow>(sql, [limit]);
    return rows.map((row) => this.mapRowToAuditEntry(row));
  }

  /**
   * Get audit events for a specific device, newest first
   */
  getByDevice(deviceId: string, limit = 100): AuditEntry[] {
    const sql = `
      SELECT * FROM audit_logs
      WHERE device_id = ?
      ORDER BY id DESC
      LIMIT ?
    `;

    const rows = this.db.query<AuditRow>(sql, [deviceId, limit]);
    return rows.map((row) => this.mapRowToAuditEntry(row));
  }

  countByDevice(deviceId: string, action?: AuditAction): number {
    const row = action
      ? this.db.queryOne<{ count: number }>(
          'SELECT COUNT(*) AS count FROM audit_logs WHERE device_id = ? AND action = ?',
          [deviceId, action]
        )
      : this.db.queryOne<{ count: number }>(
          'SELECT COUNT(*) AS count FROM audit_logs WHERE device_id = ?',
          [deviceId]
        );
    return row?.count ?? 0;
  }

  /**
   * Verification attempts for a device since `since`, leaving out the ones the
   * attempt throttle itself refused so a lockout does not extend itself
   */
  countAttemptsSince(deviceId: string, since: Date): number {
    const sql = `
      SELECT COUNT(*) AS count FROM audit_logs
      WHERE device_id = ?
        AND action = 'verify'
        AND timestamp > ?
        AND json_extract(additional_data, '$.reason') IS NOT 'rate_limited'
    `;

    return this.db.queryOne<{ count: number }>(sql, [deviceId, since.toISOString()])?.count ?? 0;
  }

  private mapRowToAuditEntry(row: AuditRow): AuditEntry {
    return {
      id: row.id,
      deviceId: row.device_id,
      action: row.action,
      success: row.success === 1,
      timestamp: new Date(row.timestamp),
      ipAddress: row.ip_address,
      userAgent: row.user_agent,
      additionalData: row.additional_data
        ? (JSON.parse(row.additional_data) as Record<string, unknown>)
        : null,
    };
  }
}
