/**
 * Application error types
 * Each error type maps to a stable error code and HTTP status code
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Database operation errors (500 Internal Server Error)
 * `sqliteCode` carries the driver code (e.g. SQLITE_CONSTRAINT_PRIMARYKEY) when known
 */
export class DatabaseError extends AppError {
  constructor(
    message: string,
    details?: unknown,
    public readonly sqliteCode?: string
  ) {
    super(message, 'DATABASE_ERROR', 500, details);
  }
}

/**
 * Store busy, locked or timed out (503 Service Unavailable)
 * Transient: a client may retry; mutating operations are not retried server-side
 */
export class StorageUnavailableError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'STORAGE_UNAVAILABLE', 503, details);
  }
}

/**
 * Validation errors from user input (400 Bad Request)
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

/**
 * Missing or wrong bearer credential (401 Unauthorized)
 */
export class UnauthorizedError extends AppError {
  constructor(message = 'Invalid API key') {
    super(message, 'UNAUTHORIZED', 401);
  }
}

export class DuplicateDeviceError extends AppError {
  constructor(deviceId: string) {
    super(`Device ${deviceId} is already registered`, 'DUPLICATE_DEVICE', 409, { deviceId });
  }
}

export class DeviceNotFoundError extends AppError {
  constructor(deviceId: string) {
    super(`Device ${deviceId} not found`, 'DEVICE_NOT_FOUND', 404, { deviceId });
  }
}

export class DeviceInactiveError extends AppError {
  constructor(deviceId: string) {
    super(`Device ${deviceId} is inactive`, 'DEVICE_INACTIVE', 403, { deviceId });
  }
}

export class AlreadyInactiveError extends AppError {
  constructor(deviceId: string) {
    super(`Device ${deviceId} is already inactive`, 'ALREADY_INACTIVE', 409, { deviceId });
  }
}

/**
 * OTP rejected because its time step was already consumed (401 Unauthorized)
 */
export class ReplayDetectedError extends AppError {
  constructor(deviceId: string) {
    super(`One-time password already used for device ${deviceId}`, 'REPLAY_DETECTED', 401, {
      deviceId,
    });
  }
}

/**
 * Too many verification attempts for one device within the attempt window (429)
 */
export class TooManyAttemptsError extends AppError {
  constructor(deviceId: string, windowSeconds: number) {
    super(`Too many verification attempts for device ${deviceId}`, 'RATE_LIMITED', 429, {
      deviceId,
      windowSeconds,
    });
  }
}

/**
 * Sealed secret cannot be opened or does not match the stored hash
 */
export class SecretIntegrityError extends AppError {
  constructor(deviceId: string) {
    super(`Stored secret for device ${deviceId} failed integrity check`, 'SECRET_INTEGRITY_ERROR', 500, {
      deviceId,
    });
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
