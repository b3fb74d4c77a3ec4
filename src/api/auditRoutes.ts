import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { AuditLogWriter } from '../services/AuditLogWriter.js';
import { toAuditEventView } from '../domain/entities/AuditEntry.js';
import { parseLimit } from './requestContext.js';

/**
 * Audit route handler
 */
export function createAuditRouter(auditWriter: AuditLogWriter): Router {
  const router = Router();

  /**
   * GET /api/v1/audit - most recent audit events across all devices
   */
  router.get('/', (req: Request, res: Response, next: NextFunction) => {
    try {
      const events = auditWriter.recent(parseLimit(req.query.limit));
      res.json({ events: events.map(toAuditEventView) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
