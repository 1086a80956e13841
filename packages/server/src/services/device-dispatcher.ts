import { z } from 'zod';
import type {
  DeviceState,
  DeviceStatus,
  DeviceSummary,
  RegionId,
  TokenSet,
} from '@ewelink-bridge/shared';
import type { ProviderHttpClient, ProviderReply } from '../provider/http-client.js';
import type { RetryPolicy } from '../provider/retry-policy.js';
import type { Logger } from '../logging/logger.js';
import type { SequenceOptions, SequenceResult } from './command-sequence.js';
import { snippet } from '../provider/http-client.js';
import { NO_RETRY, withRetry } from '../provider/retry-policy.js';
import { BridgeError } from '../errors/bridge-error.js';
import { ERROR_DEVICE_COMMAND_REJECTED, ERROR_TOKEN_EXPIRED } from '../errors/error-codes.js';
import { silentLogger } from '../logging/logger.js';
import { isTokenExpired } from './credential-store.js';
import { runCommandSequence } from './command-sequence.js';
import {
  AUTH_SCHEME_BEARER,
  CONTENT_TYPE_JSON,
  DEVICE_LIST_PAGE_SIZE,
  ENVELOPE_OK,
  HEADER_AUTHORIZATION,
  HEADER_CONTENT_TYPE,
  PATH_DEVICE_LIST,
  PATH_DEVICE_STATUS,
  THING_TYPE_DEVICE,
  TOKEN_EXPIRED_CODES,
} from '../config/constants.js';

/**
 * Where the dispatcher reads the current token from
 */
export interface TokenSource {
  current(): Promise<TokenSet>;
}

/**
 * Replaces an expired token; given the token that was found expired
 */
export interface TokenRefresher {
  refresh(stale: TokenSet): Promise<TokenSet>;
}

export interface CommandOptions {
  // Region the caller expects to reach; must match the token's
  region?: RegionId;
}

export interface DeviceCommandDispatcherOptions {
  tokens: TokenSource;
  http: ProviderHttpClient;
  refresher?: TokenRefresher;
  retryPolicy?: RetryPolicy;
  clock?: () => Date;
  logger?: Logger;
}

const deviceItemSchema = z.object({
  deviceid: z.string().min(1),
  name: z.string().default(''),
  online: z.boolean().default(false),
  productModel: z.string().optional(),
  params: z.record(z.string(), z.unknown()).default({}),
});

// Items are either flat or wrapped as { itemType, itemData }
const thingItemSchema = z.union([
  z.object({ itemData: deviceItemSchema }).transform((item) => item.itemData),
  deviceItemSchema,
]);

const deviceListSchema = z.object({
  thingList: z.array(z.unknown()).default([]),
  total: z.number().optional(),
});

const deviceStatusSchema = z.object({
  online: z.boolean().optional(),
  params: z.record(z.string(), z.unknown()).default({}),
  lastUpdateTime: z.union([z.string(), z.number()]).optional(),
});

/**
 * Sends device commands with the current token, on the token's region
 *
 * The token is read once per command. An expired token is refreshed and the
 * command retried exactly once.
 */
export class DeviceCommandDispatcher {
  private readonly tokens: TokenSource;
  private readonly http: ProviderHttpClient;
  private readonly refresher: TokenRefresher | undefined;
  private readonly retryPolicy: RetryPolicy;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(options: DeviceCommandDispatcherOptions) {
    this.tokens = options.tokens;
    this.http = options.http;
    this.refresher = options.refresher;
    this.retryPolicy = options.retryPolicy ?? NO_RETRY;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  async setState(deviceId: string, desiredState: DeviceState, options: CommandOptions = {}): Promise<void> {
    assertDeviceId(deviceId);

    await this.authorized(options, async (token) => {
      const reply = await this.http.send({
        method: 'POST',
        url: `${token.region.baseUrl}${PATH_DEVICE_STATUS}`,
        headers: bearerHeaders(token),
        body: JSON.stringify({
          type: THING_TYPE_DEVICE,
          id: deviceId,
          params: { switch: desiredState },
        }),
      });
      expectSuccess(reply);
    });

    this.logger.info('device state set', { deviceId, state: desiredState });
  }

  async getStatus(deviceId: string, options: CommandOptions = {}): Promise<DeviceStatus> {
    assertDeviceId(deviceId);

    return this.authorized(options, async (token) => {
      const query = new URLSearchParams({
        type: String(THING_TYPE_DEVICE),
        id: deviceId,
        params: 'switch|online',
      });
      const reply = await this.http.send({
        method: 'GET',
        url: `${token.region.baseUrl}${PATH_DEVICE_STATUS}?${query.toString()}`,
        headers: bearerHeaders(token),
      });

      const parsed = deviceStatusSchema.safeParse(expectSuccess(reply));
      if (!parsed.success) {
        throw BridgeError.malformedResponse(`Unexpected status payload for device ${deviceId}`);
      }

      const status: DeviceStatus = {
        deviceId,
        online: parsed.data.online ?? parsed.data.params['online'] === true,
        switchState: toSwitchState(parsed.data.params['switch']),
      };
      if (parsed.data.lastUpdateTime !== undefined) {
        status.updatedAt = new Date(parsed.data.lastUpdateTime).toISOString();
      }
      return status;
    });
  }

  async listDevices(options: CommandOptions = {}): Promise<DeviceSummary[]> {
    return this.authorized(options, async (token) => {
      const devices: DeviceSummary[] = [];

      for (let beginIndex = 0; ; ) {
        const query = new URLSearchParams({
          lang: 'en',
          num: String(DEVICE_LIST_PAGE_SIZE),
          beginIndex: String(beginIndex),
        });
        const reply = await this.http.send({
          method: 'GET',
          url: `${token.region.baseUrl}${PATH_DEVICE_LIST}?${query.toString()}`,
          headers: bearerHeaders(token),
        });

        const page = deviceListSchema.safeParse(expectSuccess(reply));
        if (!page.success) {
          throw BridgeError.malformedResponse('Unexpected device list payload');
        }

        for (const raw of page.data.thingList) {
          const item = thingItemSchema.safeParse(raw);
          // Groups and other non-device things carry no deviceid
          if (!item.success) {
            continue;
          }
          const summary: DeviceSummary = {
            deviceId: item.data.deviceid,
            name: item.data.name,
            online: item.data.online,
            params: item.data.params,
          };
          if (item.data.productModel) {
            summary.model = item.data.productModel;
          }
          devices.push(summary);
        }

        beginIndex += page.data.thingList.length;
        const total = page.data.total;
        if (page.data.thingList.length < DEVICE_LIST_PAGE_SIZE || (total !== undefined && beginIndex >= total)) {
          return devices;
        }
      }
    });
  }

  /**
   * Case-insensitive lookup by device name
   */
  async findDeviceByName(name: string, options: CommandOptions = {}): Promise<DeviceSummary | undefined> {
    const wanted = name.trim().toLowerCase();
    const devices = await this.listDevices(options);
    return devices.find((device) => device.name.toLowerCase() === wanted);
  }

  /**
   * Issue `steps` in order with at least `stepDelayMs` between them
   */
  async runSequence(
    deviceId: string,
    steps: readonly DeviceState[],
    options: SequenceOptions & CommandOptions = {}
  ): Promise<SequenceResult> {
    return runCommandSequence(
      { setState: (id, state) => this.setState(id, state, { region: options.region }) },
      deviceId,
      steps,
      { ...options, logger: options.logger ?? this.logger }
    );
  }

  private async authorized<T>(options: CommandOptions, call: (token: TokenSet) => Promise<T>): Promise<T> {
    let token = await this.tokens.current();
    assertRegion(token, options.region);

    if (isTokenExpired(token, this.clock())) {
      token = await this.refreshToken(token, options.region);
    }

    try {
      return await withRetry(this.retryPolicy, () => call(token));
    } catch (err) {
      if (!(err instanceof BridgeError) || err.code !== ERROR_TOKEN_EXPIRED || !this.refresher) {
        throw err;
      }
      this.logger.info('token rejected by provider, refreshing', { region: token.region.id });
      const refreshed = await this.refreshToken(token, options.region);
      return withRetry(this.retryPolicy, () => call(refreshed));
    }
  }

  private async refreshToken(stale: TokenSet, region: RegionId | undefined): Promise<TokenSet> {
    if (!this.refresher) {
      throw BridgeError.tokenExpired();
    }
    const refreshed = await this.refresher.refresh(stale);
    assertRegion(refreshed, region);
    return refreshed;
  }
}

function assertDeviceId(deviceId: string): void {
  if (!deviceId.trim()) {
    throw BridgeError.invalidRequest('deviceId is required');
  }
}

function assertRegion(token: TokenSet, region: RegionId | undefined): void {
  if (region && region !== token.region.id) {
    throw BridgeError.regionMismatch(token.region.id, region);
  }
}

function bearerHeaders(token: TokenSet): Record<string, string> {
  return {
    [HEADER_CONTENT_TYPE]: CONTENT_TYPE_JSON,
    [HEADER_AUTHORIZATION]: `${AUTH_SCHEME_BEARER} ${token.accessToken}`,
  };
}

/**
 * Return the envelope data of a successful reply, or throw the matching error
 */
function expectSuccess(reply: ProviderReply): unknown {
  const envelope = reply.envelope;

  if (reply.status === 401) {
    throw BridgeError.tokenExpired('Provider rejected the access token (HTTP 401)', {
      providerCode: envelope?.error,
      providerMessage: envelope?.msg,
    });
  }

  if (!envelope) {
    if (!reply.ok) {
      throw httpRejected(reply);
    }
    throw BridgeError.malformedResponse(`Non-JSON provider response: ${snippet(reply.text)}`);
  }

  if (TOKEN_EXPIRED_CODES.includes(envelope.error)) {
    throw BridgeError.tokenExpired(envelope.msg, {
      providerCode: envelope.error,
      providerMessage: envelope.msg,
    });
  }

  if (envelope.error !== ENVELOPE_OK) {
    throw BridgeError.deviceCommandRejected(envelope.error, envelope.msg);
  }

  if (!reply.ok) {
    throw httpRejected(reply);
  }

  return envelope.data;
}

function httpRejected(reply: ProviderReply): BridgeError {
  const body = snippet(reply.text);
  return new BridgeError(ERROR_DEVICE_COMMAND_REJECTED, `HTTP ${reply.status}: ${body}`, {
    providerMessage: body,
  });
}

function toSwitchState(value: unknown): DeviceState | 'unknown' {
  return value === 'on' || value === 'off' ? value : 'unknown';
}
