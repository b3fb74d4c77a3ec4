import { Router } from 'express';
import { z } from 'zod';
import type { Request, Response, NextFunction } from 'express';
import type { DeviceAuthService } from '../services/DeviceAuthService.js';
import { parseBody } from './requestContext.js';

const generateSchema = z.object({
  secret: z.string().min(1).max(256),
});

/**
 * Device simulation helpers, mounted in development only
 */
export function createTestRouter(authService: DeviceAuthService): Router {
  const router = Router();

  /**
   * POST /api/v1/test/generate-otp - current code for a base32 secret
   */
  router.post('/generate-otp', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseBody(generateSchema, req.body);
      res.json({
        otp: authService.generateCurrentCode(body.secret),
        message: 'OTP generated for testing',
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
