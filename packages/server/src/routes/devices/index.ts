import { Hono } from 'hono';
import { z } from 'zod';
import { zValidator } from '@hono/zod-validator';
import type {
  BlinkResponse,
  DeviceListResponse,
  DeviceStatusResponse,
  SetStateResponse,
} from '@ewelink-bridge/shared';
import type { BridgeEnv } from '../../types/hono.js';
import type { DeviceCommandDispatcher } from '../../services/device-dispatcher.js';
import { throwOnInvalid } from '../validation.js';
import { BridgeError } from '../../errors/bridge-error.js';
import { blinkPattern } from '../../services/command-sequence.js';
import {
  DEFAULT_BLINK_CYCLES,
  DEFAULT_BLINK_STEP_DELAY_MS,
  MAX_BLINK_CYCLES,
  MAX_BLINK_STEP_DELAY_MS,
  REGION_IDS,
} from '../../config/constants.js';

export interface DeviceRouteOptions {
  dispatcher: DeviceCommandDispatcher;
  // Target of the `default` device id alias
  defaultDeviceId?: string;
  blink?: {
    cycles: number;
    stepDelayMs: number;
  };
}

const DEFAULT_DEVICE_ALIAS = 'default';

const regionQuerySchema = z.object({
  region: z.enum(REGION_IDS).optional(),
});

const deviceParamSchema = z.object({
  deviceId: z.string().trim().min(1, 'deviceId is required'),
});

const setStateSchema = z.object({
  state: z.enum(['on', 'off']),
});

const blinkSchema = z.object({
  cycles: z.number().int().min(1).max(MAX_BLINK_CYCLES).optional(),
  stepDelayMs: z.number().int().min(0).max(MAX_BLINK_STEP_DELAY_MS).optional(),
});

/**
 * Device listing, status and switching
 */
export function createDeviceRoutes(options: DeviceRouteOptions) {
  const { dispatcher, defaultDeviceId } = options;
  const blinkDefaults = options.blink ?? {
    cycles: DEFAULT_BLINK_CYCLES,
    stepDelayMs: DEFAULT_BLINK_STEP_DELAY_MS,
  };

  const resolveDeviceId = (deviceId: string): string => {
    if (deviceId !== DEFAULT_DEVICE_ALIAS) {
      return deviceId;
    }
    if (!defaultDeviceId) {
      throw BridgeError.invalidRequest('No default device is configured (DEFAULT_DEVICE_ID)');
    }
    return defaultDeviceId;
  };

  const router = new Hono<BridgeEnv>();

  // GET /devices
  router.get('/', zValidator('query', regionQuerySchema, throwOnInvalid), async (c) => {
    const { region } = c.req.valid('query');
    const body: DeviceListResponse = {
      devices: await dispatcher.listDevices({ region }),
    };
    return c.json(body);
  });

  // GET /devices/:deviceId
  router.get(
    '/:deviceId',
    zValidator('param', deviceParamSchema, throwOnInvalid),
    zValidator('query', regionQuerySchema, throwOnInvalid),
    async (c) => {
      const deviceId = resolveDeviceId(c.req.valid('param').deviceId);
      const { region } = c.req.valid('query');
      const body: DeviceStatusResponse = await dispatcher.getStatus(deviceId, { region });
      return c.json(body);
    }
  );

  // POST /devices/:deviceId/state
  router.post(
    '/:deviceId/state',
    zValidator('param', deviceParamSchema, throwOnInvalid),
    zValidator('query', regionQuerySchema, throwOnInvalid),
    zValidator('json', setStateSchema, throwOnInvalid),
    async (c) => {
      const deviceId = resolveDeviceId(c.req.valid('param').deviceId);
      const { region } = c.req.valid('query');
      const { state } = c.req.valid('json');

      await dispatcher.setState(deviceId, state, { region });

      const body: SetStateResponse = { deviceId, state };
      return c.json(body);
    }
  );

  // POST /devices/:deviceId/blink
  router.post(
    '/:deviceId/blink',
    zValidator('param', deviceParamSchema, throwOnInvalid),
    zValidator('query', regionQuerySchema, throwOnInvalid),
    zValidator('json', blinkSchema, throwOnInvalid),
    async (c) => {
      const deviceId = resolveDeviceId(c.req.valid('param').deviceId);
      const { region } = c.req.valid('query');
      const { cycles = blinkDefaults.cycles, stepDelayMs = blinkDefaults.stepDelayMs } = c.req.valid('json');

      const result = await dispatcher.runSequence(deviceId, blinkPattern(cycles), {
        region,
        stepDelayMs,
        // Stop between steps when the client goes away
        signal: c.req.raw.signal,
        logger: c.get('logger'),
      });

      const body: BlinkResponse = result;
      return c.json(body);
    }
  );

  return router;
}
