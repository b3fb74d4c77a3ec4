import type { AuditRepository } from '../infra/repositories/AuditRepository.js';
import type { AuditAction, AuditEntry, Provenance } from '../domain/entities/AuditEntry.js';
import { createAuditEntry } from '../domain/entities/AuditEntry.js';
import { logger } from '../infra/logger.js';

export const MAX_AUDIT_PAGE = 500;

/**
 * AuditLogWriter - append-only recorder of authentication-relevant actions.
 * Writes happen outside the primary operation's transaction and never throw:
 * a failed write is escalated through the logger and the operation's outcome stands.
 */
export class AuditLogWriter {
  private readonly now: () => Date;

  constructor(
    private auditRepo: AuditRepository,
    options: { now?: () => Date } = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  record(
    deviceId: string,
    action: AuditAction,
    success: boolean,
    provenance: Provenance = {},
    details?: Record<string, unknown>
  ): AuditEntry | null {
    try {
      const entry = createAuditEntry({ deviceId, action, success, provenance, details });
      const stored = this.auditRepo.append({ ...entry, timestamp: this.now() });

      logger.debug('Audit event logged', { id: stored.id, deviceId, action, success });
      return stored;
    } catch (error) {
      logger.error('Failed to write audit event', { deviceId, action, success, details, error });
      return null;
    }
  }

  /**
   * Verification attempts recorded for a device since `since`.
   * Unlike `record`, a failed read propagates.
   */
  attemptsSince(deviceId: string, since: Date): number {
    return this.auditRepo.countAttemptsSince(deviceId, since);
  }

  history(deviceId: string, limit = 100): AuditEntry[] {
    return this.auditRepo.getByDevice(deviceId, clampLimit(limit));
  }

  recent(limit = 100): AuditEntry[] {
    return this.auditRepo.getRecent(clampLimit(limit));
  }
}

function clampLimit(limit: number): number {
  if (!Number.isFinite(limit)) return 100;
  return Math.min(Math.max(Math.trunc(limit), 1), MAX_AUDIT_PAGE);
}
