import { Router } from 'express';
import { createDeviceRouter } from './deviceRoutes.js';
import { createOtpRouter } from './otpRoutes.js';
import { createUserRouter } from './userRoutes.js';
import { createAuditRouter } from './auditRoutes.js';
import { createTestRouter } from './testRoutes.js';
import { requireApiKey } from './auth.js';
import { createRateLimiter } from './rateLimiter.js';
import type { DeviceAuthService } from '../services/DeviceAuthService.js';
import type { AuditLogWriter } from '../services/AuditLogWriter.js';
import type { Env } from '../infra/env.js';

/**
 * Main API router - composes all route handlers
 * Dependencies injected from app.ts
 */
export function createApiRouter(
  deps: {
    authService: DeviceAuthService;
    auditWriter: AuditLogWriter;
  },
  env: Pick<
    Env,
    'NODE_ENV' | 'API_KEY' | 'OTP_DIGITS' | 'RATE_LIMIT_WINDOW_MS' | 'RATE_LIMIT_MAX_REQUESTS'
  >
): Router {
  const router = Router();

  router.use(
    createRateLimiter({ windowMs: env.RATE_LIMIT_WINDOW_MS, max: env.RATE_LIMIT_MAX_REQUESTS })
  );
  router.use(requireApiKey(env.API_KEY));

  // Mount sub-routers
  router.use('/devices', createDeviceRouter(deps.authService, deps.auditWriter));
  router.use('/otp', createOtpRouter(deps.authService, env.OTP_DIGITS));
  router.use('/users', createUserRouter(deps.authService));
  router.use('/audit', createAuditRouter(deps.auditWriter));

  if (env.NODE_ENV === 'development') {
    router.use('/test', createTestRouter(deps.authService));
  }

  return router;
}
