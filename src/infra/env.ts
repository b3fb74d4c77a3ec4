import { z, ZodError } from 'zod';

/**
 * Environment variable schema with strict validation
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().default(8000),

  // Security
  API_KEY: z.string().min(16, { message: 'API_KEY must be at least 16 characters' }),
  MASTER_SECRET: z.string().min(32, { message: 'MASTER_SECRET must be at least 32 characters' }),
  SECRET_DERIVATION: z.enum(['random', 'hmac']).default('random'),

  // Data storage
  SQLITE_DB_PATH: z.string().default('./data/otp.db'),
  STORAGE_TIMEOUT_MS: z.coerce.number().int().min(1).default(5000),
  STORAGE_READ_RETRIES: z.coerce.number().int().min(0).max(5).default(2),

  // OTP algorithm
  OTP_DIGITS: z.coerce
    .number()
    .int()
    .refine((n) => n === 6 || n === 8, { message: 'OTP_DIGITS must be 6 or 8' })
    .default(6),
  OTP_INTERVAL_SECONDS: z.coerce.number().int().min(5).max(300).default(30),
  OTP_WINDOW: z.coerce
    .number()
    .int()
    .min(0)
    .max(2, { message: 'OTP_WINDOW must be at most 2 steps' })
    .default(1),
  OTP_ALGORITHM: z.enum(['SHA1', 'SHA256', 'SHA512']).default('SHA1'),
  OTP_ISSUER: z.string().min(1).default('Device OTP Service'),
  // Per-device verification throttle; 0 disables
  OTP_MAX_ATTEMPTS: z.coerce.number().int().min(0).default(10),
  OTP_ATTEMPT_WINDOW_SECONDS: z.coerce.number().int().min(1).default(300),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_FILE: z.string().optional(),

  // HTTP
  CORS_ORIGINS: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.string().optional()
  ),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().min(0).default(60000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().min(0).default(120),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: Record<string, string | undefined>): Env {
  return envSchema.parse(source);
}

/**
 * Validates and parses environment variables
 * Exits process with code 1 if validation fails (fail-fast principle)
 */
export function validateEnv(): Env {
  try {
    return parseEnv(process.env);
  } catch (error) {
    if (error instanceof ZodError) {
      console.error('❌ Environment validation failed:');
      error.issues.forEach((err) => {
        console.error(`  - ${err.path.join('.')}: ${err.message}`);
      });
      console.error('\nCheck .env.example for required variables');
      process.exit(1);
    }
    throw error;
  }
}
