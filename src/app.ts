import express from 'express';
import cors from 'cors';
import type { Request, Response, NextFunction, Express } from 'express';
import { createApiRouter } from './api/index.js';
import { createErrorHandler, notFoundHandler } from './api/errorHandler.js';
import { DatabaseAdapter } from './infra/DatabaseAdapter.js';
import { SecretCipher } from './infra/crypto/SecretCipher.js';
import { DeviceRepository } from './infra/repositories/DeviceRepository.js';
import { AuditRepository } from './infra/repositories/AuditRepository.js';
import { SecretService } from './services/SecretService.js';
import { OtpEngine } from './services/OtpEngine.js';
import { DeviceRegistry } from './services/DeviceRegistry.js';
import { AuditLogWriter } from './services/AuditLogWriter.js';
import { DeviceAuthService } from './services/DeviceAuthService.js';
import { logger } from './infra/logger.js';
import type { Env } from './infra/env.js';

export const SERVICE_VERSION = '1.0.0';

export interface Services {
  authService: DeviceAuthService;
  auditWriter: AuditLogWriter;
}

/**
 * Wire repositories and services over one database connection
 */
export function createServices(
  env: Env,
  db: DatabaseAdapter,
  options: { now?: () => Date } = {}
): Services {
  const deviceRepo = new DeviceRepository(db);
  const auditRepo = new AuditRepository(db);

  const secretService = new SecretService(new SecretCipher(env.MASTER_SECRET), {
    derivation: env.SECRET_DERIVATION,
    masterSecret: env.MASTER_SECRET,
  });
  const engine = new OtpEngine({
    digits: env.OTP_DIGITS,
    period: env.OTP_INTERVAL_SECONDS,
    window: env.OTP_WINDOW,
    algorithm: env.OTP_ALGORITHM,
  });
  const registry = new DeviceRegistry(deviceRepo, { readRetries: env.STORAGE_READ_RETRIES });
  const auditWriter = new AuditLogWriter(auditRepo, { now: options.now });
  const authService = new DeviceAuthService(registry, secretService, engine, auditWriter, {
    issuer: env.OTP_ISSUER,
    maxAttempts: env.OTP_MAX_ATTEMPTS,
    attemptWindowSeconds: env.OTP_ATTEMPT_WINDOW_SECONDS,
    now: options.now,
  });

  return { authService, auditWriter };
}

export function createApp(env: Env, services: Services): Express {
  const app = express();

  app.disable('x-powered-by');

  if (env.CORS_ORIGINS) {
    app.use(
      cors({
        origin: env.CORS_ORIGINS.split(',').map((origin) => origin.trim()),
        methods: ['GET', 'POST'],
      })
    );
  }
  app.use(express.json({ limit: '16kb' }));

  // Request logging middleware
  app.use((req: Request, _res: Response, next: NextFunction) => {
    logger.info('Incoming request', {
      method: req.method,
      path: req.path,
      ip: req.ip,
    });
    next();
  });

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    const healthy = services.authService.isHealthy();
    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      version: SERVICE_VERSION,
      database: healthy ? 'healthy' : 'unhealthy',
    });
  });

  app.use('/api/v1', createApiRouter(services, env));

  // 404 handler
  app.use(notFoundHandler);

  // Global error handler
  app.use(createErrorHandler(env));

  return app;
}
