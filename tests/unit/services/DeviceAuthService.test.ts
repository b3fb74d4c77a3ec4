import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createHmac } from 'node:crypto';
import * as OTPAuth from 'otpauth';
import {
  AlreadyInactiveError,
  DeviceNotFoundError,
  DuplicateDeviceError,
  ReplayDetectedError,
  SecretIntegrityError,
  StorageUnavailableError,
  TooManyAttemptsError,
  ValidationError,
} from '../../../src/domain/errors.js';
import {
  STEP_T0,
  T0,
  TEST_MASTER_SECRET,
  buildServices,
  createTestDatabase,
  fixedClock,
  type Clock,
  type ServiceGraph,
  type TestDatabase,
} from '../../helpers/testDatabase.js';

const loggerMock = vi.hoisted(() => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

vi.mock('../../../src/infra/logger.js', () => loggerMock);

describe('DeviceAuthService', () => {
  let testDb: TestDatabase;
  let clock: Clock;
  let graph: ServiceGraph;

  /** Code a device holding `base32` would show at `stepOffset` from now */
  const codeFor = (base32: string, stepOffset = 0) =>
    graph.engine.computeExpected(
      OTPAuth.Secret.fromBase32(base32),
      graph.engine.stepAt(clock.now()) + stepOffset
    );

  const auditReasons = (deviceId: string) =>
    graph.auditWriter.history(deviceId).map((entry) => entry.additionalData?.reason);

  beforeEach(async () => {
    testDb = await createTestDatabase();
    clock = fixedClock();
    graph = buildServices(testDb.env, testDb.db, clock);
  });

  afterEach(() => {
    testDb.cleanup();
    vi.clearAllMocks();
  });

  describe('registerDevice', () => {
    it('should hand out the secret once with a provisioning uri', () => {
      const registered = graph.authService.registerDevice('D1', 'U1');

      expect(registered.device.isActive).toBe(true);
      expect(registered.device.createdAt).toEqual(T0);
      expect(registered.secret).toMatch(/^[A-Z2-7]+=*$/);
      expect(registered.otpauthUri.startsWith('otpauth://totp/')).toBe(true);
      expect(registered.otpauthUri).toContain(`secret=${registered.secret}`);
      expect(registered.otpauthUri).toContain('digits=6');
      expect(registered.otpauthUri).toContain('period=30');
    });

    it('should store only the hash and the sealed secret', () => {
      const registered = graph.authService.registerDevice('D1', 'U1');
      const stored = graph.registry.load('D1');

      expect(stored.derivedKeyHash).toMatch(/^[0-9a-f]{64}$/);
      expect(stored.encryptedSecret.startsWith('v1:')).toBe(true);
      expect(stored.encryptedSecret).not.toContain(registered.secret);
    });

    it('should audit the registration with the owning user', () => {
      graph.authService.registerDevice('D1', 'U1', { ipAddress: '10.0.0.5', userAgent: 'test-agent/1.0' });

      const [entry] = graph.auditWriter.history('D1');
      expect(entry).toMatchObject({
        action: 'register',
        success: true,
        ipAddress: '10.0.0.5',
        userAgent: 'test-agent/1.0',
        additionalData: { user_id: 'U1' },
      });
    });

    it('should reject and audit a duplicate registration', () => {
      graph.authService.registerDevice('D1', 'U1');

      expect(() => graph.authService.registerDevice('D1', 'U2')).toThrow(DuplicateDeviceError);

      const [latest] = graph.auditWriter.history('D1');
      expect(latest).toMatchObject({
        action: 'register',
        success: false,
        additionalData: { user_id: 'U2', reason: 'duplicate_device' },
      });
      expect(graph.auditRepo.countByDevice('D1', 'register')).toBe(2);
    });

    it('should reject and audit invalid identifiers', () => {
      expect(() => graph.authService.registerDevice('bad id', 'U1')).toThrow(ValidationError);
      expect(auditReasons('bad id')).toEqual(['validation_error']);
    });

    it('should derive secrets from the master secret in hmac mode', async () => {
      const hmacDb = await createTestDatabase({ SECRET_DERIVATION: 'hmac' });
      try {
        const hmacGraph = buildServices(hmacDb.env, hmacDb.db, clock);
        const registered = hmacGraph.authService.registerDevice('D1', 'U1');
        const expected = OTPAuth.Secret.fromHex(
          createHmac('sha256', TEST_MASTER_SECRET).update('D1').digest('hex')
        );

        expect(registered.secret).toBe(expected.base32);
      } finally {
        hmacDb.cleanup();
      }
    });
  });

  describe('verifyOtp', () => {
    let secret: string;

    beforeEach(() => {
      secret = graph.authService.registerDevice('D1', 'U1').secret;
    });

    it('should accept the current code and record usage', () => {
      const result = graph.authService.verifyOtp('D1', codeFor(secret));

      expect(result.status).toBe('accepted');
      if (result.status !== 'accepted') return;
      expect(result.matchedOffset).toBe(0);
      expect(result.device.usageCount).toBe(1);
      expect(result.device.lastUsed).toEqual(T0);
      expect(result.device.lastMovingFactor).toBe(STEP_T0);
    });

    it('should refuse the same code twice', () => {
      const code = codeFor(secret);
      graph.authService.verifyOtp('D1', code);

      expect(graph.authService.verifyOtp('D1', code)).toEqual({
        status: 'replay_detected',
        deviceId: 'D1',
      });
      expect(graph.registry.load('D1').usageCount).toBe(1);
    });

    it('should refuse an older code once a newer one was accepted', () => {
      expect(graph.authService.verifyOtp('D1', codeFor(secret, 1)).status).toBe('accepted');
      expect(graph.authService.verifyOtp('D1', codeFor(secret, 0)).status).toBe(
        'replay_detected'
      );
    });

    it('should refuse a code outside the window', () => {
      expect(graph.authService.verifyOtp('D1', codeFor(secret, 5))).toEqual({
        status: 'invalid_code',
        deviceId: 'D1',
      });
      expect(graph.registry.load('D1').usageCount).toBe(0);
    });

    it('should refuse malformed codes as invalid', () => {
      expect(graph.authService.verifyOtp('D1', 'abcdef').status).toBe('invalid_code');
    });

    it('should refuse a deactivated device even with a valid code', () => {
      graph.authService.deactivateDevice('D1');

      expect(graph.authService.verifyOtp('D1', codeFor(secret)).status).toBe('device_inactive');
    });

    it('should report unknown devices', () => {
      expect(graph.authService.verifyOtp('Dx', '123456')).toEqual({
        status: 'device_not_found',
        deviceId: 'Dx',
      });
      expect(auditReasons('Dx')).toEqual(['device_not_found']);
    });

    it('should count each distinct accepted step', () => {
      for (let i = 0; i < 3; i++) {
        clock.advanceSteps(1);
        expect(graph.authService.verifyOtp('D1', codeFor(secret)).status).toBe('accepted');
      }

      const device = graph.registry.load('D1');
      expect(device.usageCount).toBe(3);
      expect(device.lastUsed).toEqual(new Date(T0.getTime() + 90_000));
    });

    it('should write exactly one audit entry per call', () => {
      const code = codeFor(secret);
      graph.authService.verifyOtp('D1', code);
      graph.authService.verifyOtp('D1', code);
      graph.authService.verifyOtp('D1', codeFor(secret, 5));

      expect(graph.auditRepo.countByDevice('D1', 'verify')).toBe(3);
      expect(auditReasons('D1')).toEqual([
        'invalid_code',
        'replay_detected',
        undefined,
        undefined,
      ]);
      expect(graph.auditWriter.history('D1')[2]).toMatchObject({
        action: 'verify',
        success: true,
        additionalData: { matched_offset: 0 },
      });
    });

    it('should record provenance on verification entries', () => {
      graph.authService.verifyOtp('D1', codeFor(secret), {
        ipAddress: '10.0.0.5',
        userAgent: 'test-agent/1.0',
      });

      expect(graph.auditWriter.history('D1')[0]).toMatchObject({
        ipAddress: '10.0.0.5',
        userAgent: 'test-agent/1.0',
      });
    });

    it('should keep the outcome when the audit write fails', () => {
      vi.spyOn(graph.auditRepo, 'append').mockImplementation(() => {
        throw new StorageUnavailableError('busy');
      });

      expect(graph.authService.verifyOtp('D1', codeFor(secret)).status).toBe('accepted');
      expect(loggerMock.logger.error).toHaveBeenCalledWith(
        'Failed to write audit event',
        expect.objectContaining({ deviceId: 'D1', action: 'verify' })
      );
    });

    it('should report a lost race as a replay', () => {
      vi.spyOn(graph.registry, 'recordSuccessfulVerification').mockImplementation(() => {
        throw new ReplayDetectedError('D1');
      });

      expect(graph.authService.verifyOtp('D1', codeFor(secret)).status).toBe('replay_detected');
      expect(graph.auditWriter.history('D1')[0].additionalData).toEqual({
        reason: 'replay_detected',
        concurrent: true,
      });
    });

    it('should fail and audit when the stored secret does not authenticate', () => {
      graph.authService.registerDevice('D2', 'U1');
      testDb.db.execute('UPDATE devices SET encrypted_secret = ? WHERE device_id = ?', [
        graph.registry.load('D2').encryptedSecret,
        'D1',
      ]);

      expect(() => graph.authService.verifyOtp('D1', codeFor(secret))).toThrow(
        SecretIntegrityError
      );
      expect(auditReasons('D1')[0]).toBe('secret_integrity_error');
    });

    it('should audit success when storage fails after the usage was committed', () => {
      const readDevice = graph.deviceRepo.getById.bind(graph.deviceRepo);
      vi.spyOn(graph.deviceRepo, 'getById')
        .mockImplementationOnce(readDevice)
        .mockImplementation(() => {
          throw new StorageUnavailableError('busy');
        });

      const result = graph.authService.verifyOtp('D1', codeFor(secret));

      expect(result.status).toBe('accepted');
      expect(graph.auditWriter.history('D1')[0]).toMatchObject({
        action: 'verify',
        success: true,
      });
    });

    it('should fail and audit when storage is unavailable', () => {
      vi.spyOn(graph.registry, 'load').mockImplementation(() => {
        throw new StorageUnavailableError('busy');
      });

      expect(() => graph.authService.verifyOtp('D1', codeFor(secret))).toThrow(
        StorageUnavailableError
      );
      expect(auditReasons('D1')[0]).toBe('storage_unavailable');
    });
  });

  describe('per-device attempt limit', () => {
    let limited: TestDatabase;
    let limitedGraph: ServiceGraph;
    let secret: string;

    const limitedCode = (stepOffset = 0) =>
      limitedGraph.engine.computeExpected(
        OTPAuth.Secret.fromBase32(secret),
        limitedGraph.engine.stepAt(clock.now()) + stepOffset
      );

    beforeEach(async () => {
      limited = await createTestDatabase({
        OTP_MAX_ATTEMPTS: '3',
        OTP_ATTEMPT_WINDOW_SECONDS: '300',
      });
      limitedGraph = buildServices(limited.env, limited.db, clock);
      secret = limitedGraph.authService.registerDevice('D1', 'U1').secret;
      for (let i = 0; i < 3; i++) {
        limitedGraph.authService.verifyOtp('D1', limitedCode(5));
      }
    });

    afterEach(() => {
      limited.cleanup();
    });

    it('should refuse even a valid code once the attempts are used up', () => {
      expect(() => limitedGraph.authService.verifyOtp('D1', limitedCode())).toThrow(
        TooManyAttemptsError
      );
      expect(limitedGraph.registry.load('D1').usageCount).toBe(0);
      expect(limitedGraph.auditWriter.history('D1')[0]).toMatchObject({
        action: 'verify',
        success: false,
        additionalData: { reason: 'rate_limited' },
      });
    });

    it('should not count its own refusals as attempts', () => {
      expect(() => limitedGraph.authService.verifyOtp('D1', limitedCode())).toThrow(
        TooManyAttemptsError
      );
      expect(() => limitedGraph.authService.verifyOtp('D1', limitedCode())).toThrow(
        TooManyAttemptsError
      );

      expect(limitedGraph.auditWriter.attemptsSince('D1', new Date(0))).toBe(3);
    });

    it('should allow verification again once the window has passed', () => {
      clock.set(new Date(T0.getTime() + 301_000));

      expect(limitedGraph.authService.verifyOtp('D1', limitedCode()).status).toBe('accepted');
    });
  });

  describe('deactivateDevice', () => {
    it('should deactivate and audit', () => {
      graph.authService.registerDevice('D1', 'U1');

      const device = graph.authService.deactivateDevice('D1');

      expect(device.isActive).toBe(false);
      expect(device.deactivatedAt).toEqual(T0);
      expect(graph.auditWriter.history('D1')[0]).toMatchObject({
        action: 'deactivate',
        success: true,
        additionalData: null,
      });
    });

    it('should audit success when storage fails after the deactivation was committed', () => {
      graph.authService.registerDevice('D1', 'U1');
      const readDevice = graph.deviceRepo.getById.bind(graph.deviceRepo);
      vi.spyOn(graph.deviceRepo, 'getById')
        .mockImplementationOnce(readDevice)
        .mockImplementation(() => {
          throw new StorageUnavailableError('busy');
        });

      expect(graph.authService.deactivateDevice('D1').isActive).toBe(false);
      expect(graph.auditWriter.history('D1')[0]).toMatchObject({
        action: 'deactivate',
        success: true,
      });
    });

    it('should refuse and audit a second deactivation', () => {
      graph.authService.registerDevice('D1', 'U1');
      graph.authService.deactivateDevice('D1');

      expect(() => graph.authService.deactivateDevice('D1')).toThrow(AlreadyInactiveError);
      expect(auditReasons('D1')[0]).toBe('already_inactive');
    });

    it('should refuse and audit unknown devices', () => {
      expect(() => graph.authService.deactivateDevice('Dx')).toThrow(DeviceNotFoundError);
      expect(auditReasons('Dx')).toEqual(['device_not_found']);
    });
  });

  describe('queries', () => {
    it('should load devices and list them by user', () => {
      graph.authService.registerDevice('D1', 'U1');
      clock.advanceSteps(1);
      graph.authService.registerDevice('D2', 'U1');

      expect(graph.authService.getDevice('D1').userId).toBe('U1');
      expect(graph.authService.listUserDevices('U1').map((device) => device.deviceId)).toEqual([
        'D2',
        'D1',
      ]);
      expect(() => graph.authService.getDevice('Dx')).toThrow(DeviceNotFoundError);
    });

    it('should generate the current code for a base32 secret', () => {
      const { secret } = graph.authService.registerDevice('D1', 'U1');

      expect(graph.authService.generateCurrentCode(secret)).toBe(codeFor(secret));
    });

    it('should reject secrets that are not base32', () => {
      expect(() => graph.authService.generateCurrentCode('not base32!')).toThrow(ValidationError);
    });

    it('should report health of the store', () => {
      expect(graph.authService.isHealthy()).toBe(true);
    });
  });
});
