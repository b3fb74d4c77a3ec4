import { Router } from 'express';
import { z } from 'zod';
import type { Request, Response, NextFunction } from 'express';
import type { DeviceAuthService } from '../services/DeviceAuthService.js';
import { REJECTION_RESPONSES } from '../domain/entities/VerificationResult.js';
import { parseBody, provenanceOf } from './requestContext.js';

const verifySchema = z.object({
  device_id: z.string(),
  otp: z.union([z.string().min(1).max(16), z.number().int().min(0).max(99_999_999)]),
});

/**
 * OTP verification route
 * Rejections are results, not errors: each maps to its own status and error code
 */
export function createOtpRouter(authService: DeviceAuthService, digits: number): Router {
  const router = Router();

  /**
   * POST /api/v1/otp/verify
   */
  router.post('/verify', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseBody(verifySchema, req.body);
      // Integer codes lose their leading zeros in JSON
      const code = typeof body.otp === 'number' ? String(body.otp).padStart(digits, '0') : body.otp;

      const result = authService.verifyOtp(body.device_id, code, provenanceOf(req));

      if (result.status === 'accepted') {
        res.json({
          valid: true,
          device_id: result.device.deviceId,
          usage_count: result.device.usageCount,
          last_used: result.device.lastUsed ? result.device.lastUsed.toISOString() : null,
        });
        return;
      }

      const rejection = REJECTION_RESPONSES[result.status];
      res.status(rejection.statusCode).json({
        valid: false,
        error: rejection.code,
        message: rejection.message,
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
