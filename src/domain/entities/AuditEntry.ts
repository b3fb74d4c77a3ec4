/**
 * AuditEntry entity - immutable record of one authentication-relevant action
 */
export interface AuditEntry {
  id: number; // Auto-increment from SQLite
  deviceId: string;
  action: AuditAction;
  success: boolean;
  timestamp: Date;
  ipAddress: string | null;
  userAgent: string | null;
  additionalData: Record<string, unknown> | null;
}

export type AuditAction = 'register' | 'verify' | 'deactivate';

/**
 * Request provenance captured by the transport layer
 */
export interface Provenance {
  ipAddress?: string | null;
  userAgent?: string | null;
}

/**
 * Factory function to create a new AuditEntry
 */
export function createAuditEntry(params: {
  deviceId: string;
  action: AuditAction;
  success: boolean;
  provenance?: Provenance;
  details?: Record<string, unknown>;
}): Omit<AuditEntry, 'id' | 'timestamp'> {
  return {
    deviceId: params.deviceId,
    action: params.action,
    success: params.success,
    ipAddress: params.provenance?.ipAddress ?? null,
    userAgent: params.provenance?.userAgent ?? null,
    additionalData:
      params.details && Object.keys(params.details).length > 0 ? params.details : null,
  };
}

export function toAuditEventView(entry: AuditEntry) {
  return {
    id: entry.id,
    device_id: entry.deviceId,
    action: entry.action,
    success: entry.success,
    timestamp: entry.timestamp.toISOString(),
    ip_address: entry.ipAddress,
    user_agent: entry.userAgent,
    additional_data: entry.additionalData,
  };
}
