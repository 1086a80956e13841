import { Hono } from 'hono';
import type { Context } from 'hono';
import type { ApiErrorResponse, AppIdentity, RegionId, TokenSet } from '@ewelink-bridge/shared';
import type { SignatureStrategyName } from '../provider/signature-strategies.js';
import type { FetchLike } from '../provider/http-client.js';
import type { CredentialStore } from '../services/credential-store.js';
import type { BridgeServices } from '../bridge.js';
import { createBridgeServices } from '../bridge.js';
import { createBridgeServer } from '../app.js';
import { loadConfig, type Config } from '../config/index.js';
import { MemoryCredentialStorage } from '../storage/memory/index.js';
import { identityTimestampMessage, verifySignature } from '../crypto/signature.js';
import { REGION_ENDPOINTS, REGION_IDS } from '../config/constants.js';

/**
 * Test fixtures and helpers
 */

export const TEST_IDENTITY: AppIdentity = { appId: 'test-app-id', appSecret: 'test-secret' };
export const TEST_API_KEY = 'test-api-key';

export const SIGN_FAILURE = { error: 407, msg: 'sign verification failed' };
export const WRONG_REGION = { error: 10004, msg: 'user is not in this region' };
export const CODE_INVALID = { error: 10001, msg: 'authorization code is invalid or expired' };
export const TOKEN_INVALID = { error: 401, msg: 'token is invalid' };
export const DEVICE_MISSING = { error: 405, msg: 'device does not exist' };

export interface FakeDevice {
  deviceId: string;
  name: string;
  online: boolean;
  switch: 'on' | 'off';
  model?: string;
}

export interface RecordedCall {
  region: RegionId | undefined;
  method: string;
  path: string;
  strategy?: SignatureStrategyName | 'invalid';
}

export interface FakeProviderOptions {
  identity?: AppIdentity;
  accountRegion?: RegionId;
  acceptedStrategies?: SignatureStrategyName[];
  codes?: string[];
  account?: { email: string; password: string };
  devices?: FakeDevice[];
  tokenTtlMs?: number;
}

interface ProviderReply {
  error: number;
  msg?: string;
  data?: unknown;
}

/**
 * In-process stand-in for the provider's regional clusters
 *
 * Requests are routed by host, so every region answers from the same app
 * while knowing which region it is.
 */
export class FakeProvider {
  readonly app = new Hono();
  readonly calls: RecordedCall[] = [];
  readonly commands: Array<{ deviceId: string; state: string }> = [];
  // 1-based command number -> provider error
  readonly commandFailures = new Map<number, ProviderReply>();
  readonly devices = new Map<string, FakeDevice>();

  accountRegion: RegionId;
  acceptedStrategies: Set<SignatureStrategyName>;
  // Raw reply for every request while set
  outage: { status: 200 | 500 | 502 | 503; body: string } | undefined;

  private readonly identity: AppIdentity;
  private readonly codes: Set<string>;
  private readonly account: { email: string; password: string } | undefined;
  private readonly tokenTtlMs: number;
  private readonly accessTokens = new Map<string, { region: RegionId; valid: boolean }>();
  private readonly refreshTokens = new Map<string, RegionId>();
  private counter = 0;
  private commandCount = 0;

  readonly fetch: FetchLike = (input, init) => Promise.resolve(this.app.request(input, init));

  constructor(options: FakeProviderOptions = {}) {
    this.identity = options.identity ?? TEST_IDENTITY;
    this.accountRegion = options.accountRegion ?? 'eu';
    this.acceptedStrategies = new Set(
      options.acceptedStrategies ?? ['identity-timestamp', 'body-signing', 'unsigned']
    );
    this.codes = new Set(options.codes ?? []);
    this.account = options.account;
    this.tokenTtlMs = options.tokenTtlMs ?? 3600_000;
    for (const device of options.devices ?? []) {
      this.devices.set(device.deviceId, { ...device });
    }

    this.app.use('*', async (c, next) => {
      this.calls.push({ region: regionOf(c), method: c.req.method, path: c.req.path });
      if (this.outage) {
        return c.text(this.outage.body, this.outage.status);
      }
      return next();
    });

    this.app.post('/v2/user/oauth/token', async (c) => {
      const rejected = await this.checkAppRequest(c);
      if (rejected) return c.json(rejected);

      const body = await c.req.json<{ clientId?: string; code?: string; grantType?: string }>();
      if (body.clientId !== this.identity.appId || body.grantType !== 'authorization_code') {
        return c.json({ error: 400, msg: 'params incomplete' });
      }
      if (!body.code || !this.codes.has(body.code)) {
        return c.json(CODE_INVALID);
      }
      this.codes.delete(body.code);

      const tokens = this.issue(this.accountRegion);
      return c.json({
        error: 0,
        data: {
          accessToken: tokens.accessToken,
          refreshToken: tokens.refreshToken,
          atExpiredTime: tokens.expiresAt,
          user: { apikey: 'user-1', email: 'user@example.com' },
        },
      });
    });

    this.app.post('/v2/user/login', async (c) => {
      const rejected = await this.checkAppRequest(c);
      if (rejected) return c.json(rejected);

      const body = await c.req.json<{ email?: string; password?: string }>();
      if (!this.account || body.email !== this.account.email || body.password !== this.account.password) {
        return c.json({ error: 10001, msg: 'wrong account or password' });
      }

      const tokens = this.issue(this.accountRegion);
      return c.json({
        error: 0,
        data: {
          at: tokens.accessToken,
          rt: tokens.refreshToken,
          user: { apikey: 'user-1', email: this.account.email },
          region: this.accountRegion,
        },
      });
    });

    this.app.post('/v2/user/refresh', async (c) => {
      const rejected = await this.checkAppRequest(c);
      if (rejected) return c.json(rejected);

      const body = await c.req.json<{ refreshToken?: string }>();
      const region = body.refreshToken ? this.refreshTokens.get(body.refreshToken) : undefined;
      if (!body.refreshToken || !region) {
        return c.json({ error: 10001, msg: 'refresh token is invalid' });
      }
      this.refreshTokens.delete(body.refreshToken);

      const tokens = this.issue(region);
      return c.json({ error: 0, data: { at: tokens.accessToken, rt: tokens.refreshToken } });
    });

    this.app.get('/v2/device/thing', (c) => {
      const rejected = this.checkBearer(c);
      if (rejected) return c.json(rejected);

      const thingList = [...this.devices.values()].map((device) => ({
        itemType: 1,
        itemData: {
          deviceid: device.deviceId,
          name: device.name,
          online: device.online,
          productModel: device.model,
          params: { switch: device.switch },
        },
      }));
      return c.json({ error: 0, data: { thingList, total: thingList.length } });
    });

    this.app.get('/v2/device/thing/status', (c) => {
      const rejected = this.checkBearer(c);
      if (rejected) return c.json(rejected);

      const device = this.devices.get(c.req.query('id') ?? '');
      if (!device) return c.json(DEVICE_MISSING);

      return c.json({
        error: 0,
        data: {
          online: device.online,
          params: { switch: device.switch },
          lastUpdateTime: '2026-01-02T03:04:05.000Z',
        },
      });
    });

    this.app.post('/v2/device/thing/status', async (c) => {
      const rejected = this.checkBearer(c);
      if (rejected) return c.json(rejected);

      this.commandCount++;
      const failure = this.commandFailures.get(this.commandCount);
      if (failure) return c.json(failure);

      const body = await c.req.json<{ type?: number; id?: string; params?: { switch?: string } }>();
      const device = this.devices.get(body.id ?? '');
      if (!device) return c.json(DEVICE_MISSING);

      const state = body.params?.switch;
      if (state !== 'on' && state !== 'off') {
        return c.json({ error: 400, msg: 'params incomplete' });
      }
      device.switch = state;
      this.commands.push({ deviceId: device.deviceId, state });
      return c.json({ error: 0, data: {} });
    });
  }

  /**
   * Issue a token pair bound to a region
   */
  issue(region: RegionId): { accessToken: string; refreshToken: string; expiresAt: number } {
    this.counter++;
    const accessToken = `at-${this.counter}`;
    const refreshToken = `rt-${this.counter}`;
    this.accessTokens.set(accessToken, { region, valid: true });
    this.refreshTokens.set(refreshToken, region);
    return { accessToken, refreshToken, expiresAt: Date.now() + this.tokenTtlMs };
  }

  /**
   * Make the provider reject an access token as expired
   */
  expire(accessToken: string): void {
    const entry = this.accessTokens.get(accessToken);
    if (entry) {
      entry.valid = false;
    }
  }

  addCode(code: string): void {
    this.codes.add(code);
  }

  callsTo(path: string): RecordedCall[] {
    return this.calls.filter((call) => call.path === path);
  }

  private async checkAppRequest(c: Context): Promise<ProviderReply | undefined> {
    const call = this.calls[this.calls.length - 1];
    const strategy = this.strategyOf(c, await c.req.text());
    if (call) {
      call.strategy = strategy;
    }

    if (strategy === 'invalid' || !this.acceptedStrategies.has(strategy)) {
      return SIGN_FAILURE;
    }
    if (regionOf(c) !== this.accountRegion) {
      return WRONG_REGION;
    }
    return undefined;
  }

  private strategyOf(c: Context, rawBody: string): SignatureStrategyName | 'invalid' {
    if (c.req.header('X-CK-Appid') !== this.identity.appId) {
      return 'invalid';
    }

    const authorization = c.req.header('Authorization');
    if (!authorization) {
      return 'unsigned';
    }
    if (!authorization.startsWith('Sign ')) {
      return 'invalid';
    }

    const signature = authorization.slice('Sign '.length);
    const seq = c.req.header('X-CK-Seq');
    if (seq !== undefined) {
      const message = identityTimestampMessage(this.identity.appId, seq);
      return verifySignature(this.identity.appSecret, message, signature) ? 'identity-timestamp' : 'invalid';
    }
    return verifySignature(this.identity.appSecret, rawBody, signature) ? 'body-signing' : 'invalid';
  }

  private checkBearer(c: Context): ProviderReply | undefined {
    const authorization = c.req.header('Authorization') ?? '';
    const token = authorization.startsWith('Bearer ') ? authorization.slice('Bearer '.length) : '';
    const entry = this.accessTokens.get(token);
    if (!entry || !entry.valid || entry.region !== regionOf(c)) {
      return TOKEN_INVALID;
    }
    return undefined;
  }
}

function regionOf(c: Context): RegionId | undefined {
  const host = new URL(c.req.url).host;
  return REGION_IDS.find((id) => new URL(REGION_ENDPOINTS[id].baseUrl).host === host);
}

/**
 * Base URL host of a region, for routing in wrapped fetches
 */
export function regionHost(region: RegionId): string {
  return new URL(REGION_ENDPOINTS[region].baseUrl).host;
}

/**
 * Never settles until the request's signal aborts
 */
export function hangUntilAborted(init: RequestInit): Promise<Response> {
  return new Promise<Response>((_resolve, reject) => {
    const signal = init.signal;
    if (!signal) {
      reject(new Error('request has no abort signal'));
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

/**
 * Configuration for tests: memory storage, quiet logging
 */
export function createTestConfig(env: Record<string, string> = {}): Config {
  return loadConfig({
    EWELINK_APP_ID: TEST_IDENTITY.appId,
    EWELINK_APP_SECRET: TEST_IDENTITY.appSecret,
    CREDENTIALS_FILE: '',
    LOG_LEVEL: 'error',
    ...env,
  });
}

/**
 * Save a token issued by the fake provider as the current token
 */
export async function seedToken(
  fake: FakeProvider,
  store: CredentialStore,
  region: RegionId = fake.accountRegion,
  overrides: Partial<TokenSet> = {}
): Promise<TokenSet> {
  const issued = fake.issue(region);
  const tokenSet: TokenSet = {
    accessToken: issued.accessToken,
    refreshToken: issued.refreshToken,
    obtainedAt: new Date(),
    expiresAt: new Date(issued.expiresAt),
    region: REGION_ENDPOINTS[region],
    ...overrides,
  };
  await store.save(tokenSet);
  return tokenSet;
}

export interface TestContext {
  app: ReturnType<typeof createBridgeServer>;
  fake: FakeProvider;
  services: BridgeServices;
  storage: MemoryCredentialStorage;
  config: Config;
}

/**
 * Bridge wired to a fake provider and memory storage
 */
export function setupTestContext(
  options: {
    fake?: FakeProviderOptions;
    env?: Record<string, string>;
    // Wraps the fake provider's fetch, e.g. to fail one region
    wrapFetch?: (inner: FetchLike) => FetchLike;
  } = {}
): TestContext {
  const fake = new FakeProvider(options.fake);
  const config = createTestConfig(options.env);
  const storage = new MemoryCredentialStorage();
  const fetch = options.wrapFetch ? options.wrapFetch(fake.fetch) : fake.fetch;
  const services = createBridgeServices(config, { fetch, storage });

  const app = createBridgeServer({
    services,
    apiKey: TEST_API_KEY,
    rateLimit: config.rateLimit,
    blink: { cycles: 2, stepDelayMs: 20 },
    defaultDeviceId: config.ewelink.defaultDeviceId,
    enableCors: config.server.enableCors,
  });

  return { app, fake, services, storage, config };
}

/**
 * Headers carrying the bridge API key
 */
export function apiHeaders(extra: Record<string, string> = {}): Record<string, string> {
  return { 'x-api-key': TEST_API_KEY, ...extra };
}

export type ErrorResponse = ApiErrorResponse;
