import { Router } from 'express';
import { z } from 'zod';
import type { Request, Response, NextFunction } from 'express';
import type { DeviceAuthService } from '../services/DeviceAuthService.js';
import type { AuditLogWriter } from '../services/AuditLogWriter.js';
import { toDeviceView } from '../domain/entities/Device.js';
import { toAuditEventView } from '../domain/entities/AuditEntry.js';
import { parseBody, parseLimit, provenanceOf } from './requestContext.js';

// Shape only; identifier rules are enforced and audited by DeviceAuthService
const registerSchema = z.object({
  device_id: z.string(),
  user_id: z.string(),
});

/**
 * Device lifecycle routes
 * HTTP layer delegates to DeviceAuthService, which audits every call
 */
export function createDeviceRouter(
  authService: DeviceAuthService,
  auditWriter: AuditLogWriter
): Router {
  const router = Router();

  /**
   * POST /api/v1/devices/register - register a device and hand out its secret once
   */
  router.post('/register', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseBody(registerSchema, req.body);
      const registered = authService.registerDevice(
        body.device_id,
        body.user_id,
        provenanceOf(req)
      );

      res.status(201).json({
        device_id: registered.device.deviceId,
        user_id: registered.device.userId,
        secret: registered.secret,
        otpauth_uri: registered.otpauthUri,
        created_at: registered.device.createdAt.toISOString(),
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/v1/devices/:deviceId - device state, without secret material
   */
  router.get('/:deviceId', (req: Request, res: Response, next: NextFunction) => {
    try {
      const device = authService.getDevice(req.params.deviceId);
      res.json(toDeviceView(device));
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/v1/devices/:deviceId/deactivate - one-way transition to inactive
   */
  router.post('/:deviceId/deactivate', (req: Request, res: Response, next: NextFunction) => {
    try {
      const device = authService.deactivateDevice(req.params.deviceId, provenanceOf(req));
      res.json({ message: 'Device deactivated successfully', device: toDeviceView(device) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/v1/devices/:deviceId/audit - audit trail of one device, newest first
   */
  router.get('/:deviceId/audit', (req: Request, res: Response, next: NextFunction) => {
    try {
      const events = auditWriter.history(req.params.deviceId, parseLimit(req.query.limit));
      res.json({ events: events.map(toAuditEventView) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
