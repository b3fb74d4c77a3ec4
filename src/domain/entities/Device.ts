import { ValidationError } from '../errors.js';

/**
 * Device entity - a registered OTP-generating client
 * Lifecycle: active on registration, inactive (terminal) after deactivation
 */
export interface Device {
  deviceId: string;
  userId: string;
  derivedKeyHash: string;
  encryptedSecret: string;
  isActive: boolean;
  createdAt: Date;
  lastUsed: Date | null;
  usageCount: number;
  lastMovingFactor: number | null;
  deactivatedAt: Date | null;
}

export const MAX_IDENTIFIER_LENGTH = 100;

const DEVICE_ID_PATTERN = /^[A-Za-z0-9._:@-]+$/;

export function isValidDeviceId(deviceId: string): boolean {
  return (
    deviceId.length > 0 &&
    deviceId.length <= MAX_IDENTIFIER_LENGTH &&
    DEVICE_ID_PATTERN.test(deviceId)
  );
}

export function assertValidIdentifiers(deviceId: string, userId: string): void {
  if (!isValidDeviceId(deviceId)) {
    throw new ValidationError(
      `device_id must be 1-${MAX_IDENTIFIER_LENGTH} characters of letters, digits or . _ : @ -`,
      { field: 'device_id' }
    );
  }

  const trimmedUser = userId.trim();
  if (trimmedUser.length === 0 || userId.length > MAX_IDENTIFIER_LENGTH) {
    throw new ValidationError(`user_id must be 1-${MAX_IDENTIFIER_LENGTH} characters`, {
      field: 'user_id',
    });
  }
}

/**
 * Factory function to create a newly registered Device
 */
export function createDevice(params: {
  deviceId: string;
  userId: string;
  derivedKeyHash: string;
  encryptedSecret: string;
  createdAt?: Date;
}): Device {
  assertValidIdentifiers(params.deviceId, params.userId);

  return {
    deviceId: params.deviceId,
    userId: params.userId,
    derivedKeyHash: params.derivedKeyHash,
    encryptedSecret: params.encryptedSecret,
    isActive: true,
    createdAt: params.createdAt ?? new Date(),
    lastUsed: null,
    usageCount: 0,
    lastMovingFactor: null,
    deactivatedAt: null,
  };
}

/**
 * Public projection of a device - never includes secret material
 */
export interface DeviceView {
  device_id: string;
  user_id: string;
  is_active: boolean;
  created_at: string;
  last_used: string | null;
  usage_count: number;
  deactivated_at: string | null;
}

export function toDeviceView(device: Device): DeviceView {
  return {
    device_id: device.deviceId,
    user_id: device.userId,
    is_active: device.isActive,
    created_at: device.createdAt.toISOString(),
    last_used: device.lastUsed ? device.lastUsed.toISOString() : null,
    usage_count: device.usageCount,
    deactivated_at: device.deactivatedAt ? device.deactivatedAt.toISOString() : null,
  };
}
