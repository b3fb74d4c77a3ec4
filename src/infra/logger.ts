import winston from 'winston';
import type { Env } from './env.js';

/**
 * Structured logger with secret redaction
 * Logs to console in development, file + console in production
 */

const SECRET_PATTERNS = [
  /password[=:]\s*["']?([^"'\s]+)/gi,
  /api[_-]?key[=:]\s*["']?([^"'\s]+)/gi,
  /token[=:]\s*["']?([^"'\s]+)/gi,
  /secret[=:]\s*["']?([^"'\s]+)/gi,
  /bearer\s+([^"'\s]+)/gi,
];

const SECRET_FIELDS = new Set([
  'password',
  'apiKey',
  'api_key',
  'token',
  'secret',
  'encryptedSecret',
  'encrypted_secret',
  'masterSecret',
  'otp',
  'authorization',
]);

/**
 * Redacts sensitive information from log messages and metadata
 */
export function redactSecrets(obj: unknown): unknown {
  if (typeof obj === 'string') {
    let redacted = obj;
    SECRET_PATTERNS.forEach((pattern) => {
      redacted = redacted.replace(pattern, (match: string, secret: string) =>
        match.replace(secret, '***REDACTED***')
      );
    });
    return redacted;
  }

  if (Array.isArray(obj)) {
    return obj.map(redactSecrets);
  }

  if (obj instanceof Error) {
    return { name: obj.name, message: redactSecrets(obj.message), stack: obj.stack };
  }

  if (obj && typeof obj === 'object') {
    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      redacted[key] = SECRET_FIELDS.has(key) ? '***REDACTED***' : redactSecrets(value);
    }
    return redacted;
  }

  return obj;
}

const redactFormat = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (key === 'level' || key === 'timestamp') continue;
    info[key] = SECRET_FIELDS.has(key) ? '***REDACTED***' : redactSecrets(info[key]);
  }
  return info;
})();

/**
 * Creates a Winston logger instance
 */
export function createLogger(
  env: Pick<Env, 'NODE_ENV' | 'LOG_LEVEL' | 'LOG_FILE'>
): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      silent: env.NODE_ENV === 'test',
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
          const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
          return `${String(timestamp)} [${level}]: ${String(message)}${metaStr}`;
        })
      ),
    }),
  ];

  // Add file transport in production
  if (env.NODE_ENV === 'production' && env.LOG_FILE) {
    transports.push(
      new winston.transports.File({
        filename: env.LOG_FILE,
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
      })
    );
  }

  return winston.createLogger({
    level: env.LOG_LEVEL,
    format: winston.format.combine(
      redactFormat,
      winston.format.errors({ stack: true }),
      winston.format.timestamp(),
      winston.format.json()
    ),
    transports,
    exitOnError: false,
  });
}

/**
 * Global logger instance (replaced in server.ts once the environment is known)
 */
export let logger: winston.Logger = createLogger({
  NODE_ENV: process.env.NODE_ENV === 'test' ? 'test' : 'development',
  LOG_LEVEL: 'info',
  LOG_FILE: undefined,
});

export function setLogger(instance: winston.Logger): void {
  logger = instance;
}
