import type { Device } from './Device.js';

export type VerificationStatus =
  | 'accepted'
  | 'invalid_code'
  | 'replay_detected'
  | 'device_inactive'
  | 'device_not_found';

/**
 * Outcome of one OTP verification attempt
 * Rejections are values, not errors: each one is an expected, audited outcome
 */
export type VerificationResult =
  | { status: 'accepted'; device: Device; matchedOffset: number }
  | { status: 'invalid_code'; deviceId: string }
  | { status: 'replay_detected'; deviceId: string }
  | { status: 'device_inactive'; deviceId: string }
  | { status: 'device_not_found'; deviceId: string };

/**
 * Stable error code and HTTP status for each rejection
 */
export const REJECTION_RESPONSES: Record<
  Exclude<VerificationStatus, 'accepted'>,
  { code: string; statusCode: number; message: string }
> = {
  invalid_code: { code: 'INVALID_CODE', statusCode: 401, message: 'Invalid one-time password' },
  replay_detected: {
    code: 'REPLAY_DETECTED',
    statusCode: 401,
    message: 'One-time password already used',
  },
  device_inactive: { code: 'DEVICE_INACTIVE', statusCode: 403, message: 'Device is inactive' },
  device_not_found: { code: 'DEVICE_NOT_FOUND', statusCode: 404, message: 'Device not found' },
};
