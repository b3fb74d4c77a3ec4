import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { DeviceAuthService } from '../services/DeviceAuthService.js';
import { toDeviceView } from '../domain/entities/Device.js';
import { parseLimit } from './requestContext.js';

export function createUserRouter(authService: DeviceAuthService): Router {
  const router = Router();

  /**
   * GET /api/v1/users/:userId/devices - devices owned by a user, newest first
   */
  router.get('/:userId/devices', (req: Request, res: Response, next: NextFunction) => {
    try {
      const devices = authService.listUserDevices(req.params.userId, parseLimit(req.query.limit));
      res.json({ devices: devices.map(toDeviceView) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
