import { describe, it, expect, beforeEach } from 'vitest';
import type { FetchLike } from '../provider/http-client.js';
import { ProviderHttpClient } from '../provider/http-client.js';
import { createRetryPolicy } from '../provider/retry-policy.js';
import { DeviceCommandDispatcher } from '../services/device-dispatcher.js';
import { BridgeError } from '../errors/bridge-error.js';
import { setupTestContext, seedToken, type TestContext } from './test-setup.js';

const LAMP = { deviceId: '1000abcdef', name: 'Desk Lamp', online: true, switch: 'off' as const, model: 'BASICR2' };
const FAN = { deviceId: '1000fedcba', name: 'Fan', online: false, switch: 'on' as const };

async function rejection(promise: Promise<unknown>): Promise<BridgeError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof BridgeError) {
      return err;
    }
    throw err;
  }
  throw new Error('expected the call to fail');
}

describe('DeviceCommandDispatcher', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = setupTestContext({ fake: { devices: [LAMP, FAN] } });
  });

  describe('setState', () => {
    it('should send the command with the stored token', async () => {
      await seedToken(ctx.fake, ctx.services.credentialStore);

      await ctx.services.dispatcher.setState(LAMP.deviceId, 'on');

      expect(ctx.fake.commands).toEqual([{ deviceId: LAMP.deviceId, state: 'on' }]);
      expect(ctx.fake.devices.get(LAMP.deviceId)?.switch).toBe('on');
      expect(ctx.fake.calls[0]).toMatchObject({ region: 'eu', method: 'POST', path: '/v2/device/thing/status' });
    });

    it('should surface a provider error envelope as device_command_rejected', async () => {
      await seedToken(ctx.fake, ctx.services.credentialStore);
      ctx.fake.commandFailures.set(1, { error: 4002, msg: 'device is offline' });

      const error = await rejection(ctx.services.dispatcher.setState(LAMP.deviceId, 'on'));

      expect(error.code).toBe('device_command_rejected');
      expect(error.providerCode).toBe(4002);
      expect(error.providerMessage).toBe('device is offline');
      expect(error.description).toBe('Device command rejected (error 4002): device is offline');
    });

    it('should reject an unknown device', async () => {
      await seedToken(ctx.fake, ctx.services.credentialStore);

      const error = await rejection(ctx.services.dispatcher.setState('missing', 'on'));

      expect(error.code).toBe('device_command_rejected');
      expect(error.providerCode).toBe(405);
    });

    it('should reject an empty device id without calling the provider', async () => {
      await seedToken(ctx.fake, ctx.services.credentialStore);

      await expect(ctx.services.dispatcher.setState('  ', 'on')).rejects.toMatchObject({ code: 'invalid_request' });
      expect(ctx.fake.calls).toHaveLength(0);
    });

    it('should fail with region_mismatch before any request', async () => {
      await seedToken(ctx.fake, ctx.services.credentialStore, 'eu');

      const error = await rejection(ctx.services.dispatcher.setState(LAMP.deviceId, 'on', { region: 'us' }));

      expect(error.code).toBe('region_mismatch');
      expect(error.details).toEqual({ tokenRegion: 'eu', targetRegion: 'us' });
      expect(ctx.fake.calls).toHaveLength(0);
    });

    it('should fail unauthenticated when no token is stored', async () => {
      await expect(ctx.services.dispatcher.setState(LAMP.deviceId, 'on')).rejects.toMatchObject({
        code: 'unauthenticated',
      });
    });

    it('should refresh and retry once when the provider rejects the token', async () => {
      const seeded = await seedToken(ctx.fake, ctx.services.credentialStore);
      ctx.fake.expire(seeded.accessToken);

      await ctx.services.dispatcher.setState(LAMP.deviceId, 'on');

      expect(ctx.fake.calls.map((call) => call.path)).toEqual([
        '/v2/device/thing/status',
        '/v2/user/refresh',
        '/v2/device/thing/status',
      ]);
      expect(ctx.fake.commands).toHaveLength(1);
      expect((await ctx.services.credentialStore.current()).accessToken).toBe('at-2');
    });

    it('should not retry more than once', async () => {
      const seeded = await seedToken(ctx.fake, ctx.services.credentialStore);
      ctx.fake.expire(seeded.accessToken);
      // The first command is refused at the token check, so the retry is command 1
      ctx.fake.commandFailures.set(1, { error: 402, msg: 'token expired' });

      const error = await rejection(ctx.services.dispatcher.setState(LAMP.deviceId, 'on'));

      expect(error.code).toBe('token_expired');
      expect(ctx.fake.callsTo('/v2/user/refresh')).toHaveLength(1);
      expect(ctx.fake.callsTo('/v2/device/thing/status')).toHaveLength(2);
    });

    it('should refresh a token past its expiry before sending', async () => {
      await seedToken(ctx.fake, ctx.services.credentialStore, 'eu', {
        expiresAt: new Date(Date.now() - 1000),
      });

      await ctx.services.dispatcher.setState(LAMP.deviceId, 'off');

      expect(ctx.fake.calls.map((call) => call.path)).toEqual(['/v2/user/refresh', '/v2/device/thing/status']);
    });

    it('should fail token_expired when there is no refresh token', async () => {
      await seedToken(ctx.fake, ctx.services.credentialStore, 'eu', {
        refreshToken: undefined,
        expiresAt: new Date(Date.now() - 1000),
      });

      await expect(ctx.services.dispatcher.setState(LAMP.deviceId, 'on')).rejects.toMatchObject({
        code: 'token_expired',
      });
      expect(ctx.fake.calls).toHaveLength(0);
    });

    it('should map a non-JSON error reply to device_command_rejected', async () => {
      await seedToken(ctx.fake, ctx.services.credentialStore);
      ctx.fake.outage = { status: 502, body: 'bad gateway' };

      const error = await rejection(ctx.services.dispatcher.setState(LAMP.deviceId, 'on'));

      expect(error.code).toBe('device_command_rejected');
      expect(error.description).toBe('HTTP 502: bad gateway');
    });

    it('should map a non-JSON success reply to malformed_response', async () => {
      await seedToken(ctx.fake, ctx.services.credentialStore);
      ctx.fake.outage = { status: 200, body: 'hello' };

      await expect(ctx.services.dispatcher.setState(LAMP.deviceId, 'on')).rejects.toMatchObject({
        code: 'malformed_response',
      });
    });

    it('should retry network failures under the retry policy', async () => {
      await seedToken(ctx.fake, ctx.services.credentialStore);
      let failures = 1;
      const flaky: FetchLike = (input, init) => {
        if (failures > 0) {
          failures--;
          return Promise.reject(new TypeError('fetch failed'));
        }
        return ctx.fake.fetch(input, init);
      };
      const dispatcher = new DeviceCommandDispatcher({
        tokens: ctx.services.credentialStore,
        http: new ProviderHttpClient({ fetch: flaky }),
        retryPolicy: createRetryPolicy({ maxAttempts: 2, initialDelayMs: 0 }),
      });

      await dispatcher.setState(LAMP.deviceId, 'on');

      expect(ctx.fake.commands).toEqual([{ deviceId: LAMP.deviceId, state: 'on' }]);
    });

    it('should report network_unavailable without a retry policy', async () => {
      await seedToken(ctx.fake, ctx.services.credentialStore);
      const dispatcher = new DeviceCommandDispatcher({
        tokens: ctx.services.credentialStore,
        http: new ProviderHttpClient({ fetch: () => Promise.reject(new TypeError('fetch failed')) }),
      });

      await expect(dispatcher.setState(LAMP.deviceId, 'on')).rejects.toMatchObject({
        code: 'network_unavailable',
      });
    });
  });

  describe('getStatus', () => {
    it('should return the switch state and online flag', async () => {
      await seedToken(ctx.fake, ctx.services.credentialStore);

      const status = await ctx.services.dispatcher.getStatus(LAMP.deviceId);

      expect(status).toEqual({
        deviceId: LAMP.deviceId,
        online: true,
        switchState: 'off',
        updatedAt: '2026-01-02T03:04:05.000Z',
      });
    });
  });

  describe('listDevices', () => {
    it('should unwrap the thing list', async () => {
      await seedToken(ctx.fake, ctx.services.credentialStore);

      const devices = await ctx.services.dispatcher.listDevices();

      expect(devices).toEqual([
        { deviceId: LAMP.deviceId, name: 'Desk Lamp', online: true, params: { switch: 'off' }, model: 'BASICR2' },
        { deviceId: FAN.deviceId, name: 'Fan', online: false, params: { switch: 'on' } },
      ]);
    });

    it('should find a device by name ignoring case', async () => {
      await seedToken(ctx.fake, ctx.services.credentialStore);

      const device = await ctx.services.dispatcher.findDeviceByName('desk lamp');

      expect(device?.deviceId).toBe(LAMP.deviceId);
      expect(await ctx.services.dispatcher.findDeviceByName('garage')).toBeUndefined();
    });
  });

  describe('runSequence', () => {
    it('should send every step in order', async () => {
      await seedToken(ctx.fake, ctx.services.credentialStore);

      const result = await ctx.services.dispatcher.runSequence(LAMP.deviceId, ['on', 'off', 'on'], {
        stepDelayMs: 5,
      });

      expect(ctx.fake.commands.map((command) => command.state)).toEqual(['on', 'off', 'on']);
      expect(result.finalState).toBe('on');
      expect(result.steps).toEqual(['on', 'off', 'on']);
    });
  });
});
