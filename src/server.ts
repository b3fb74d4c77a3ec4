import dotenv from 'dotenv';
import { validateEnv } from './infra/env.js';
import { createLogger, setLogger } from './infra/logger.js';
import { DatabaseAdapter } from './infra/DatabaseAdapter.js';
import { runMigrations } from './infra/migrations.js';
import { createApp, createServices, SERVICE_VERSION } from './app.js';

// Load environment variables
dotenv.config();

// Validate environment (fail-fast)
const env = validateEnv();

// Initialize logger
const loggerInstance = createLogger(env);
setLogger(loggerInstance);

loggerInstance.info('Starting device OTP service', {
  version: SERVICE_VERSION,
  nodeEnv: env.NODE_ENV,
});

await runMigrations(env);

const db = new DatabaseAdapter(env);
const services = createServices(env, db);

if (!services.authService.isHealthy()) {
  loggerInstance.error('Database health check failed');
  process.exit(1);
}

const app = createApp(env, services);

// Start server
const server = app.listen(env.PORT, () => {
  loggerInstance.info('Server started', {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
  });
});

// Graceful shutdown
function shutdown(signal: string): void {
  loggerInstance.info(`${signal} received, shutting down gracefully`);
  server.close(() => {
    db.close();
    loggerInstance.info('Server closed');
    process.exit(0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

export { app };
