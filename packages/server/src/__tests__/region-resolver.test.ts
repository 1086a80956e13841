import { describe, it, expect } from 'vitest';
import type { RegionEndpoint } from '@ewelink-bridge/shared';
import { RegionEndpointResolver } from '../provider/region-resolver.js';
import { BridgeError } from '../errors/bridge-error.js';
import { ProviderHttpClient } from '../provider/http-client.js';
import { hangUntilAborted, regionHost } from './test-setup.js';

describe('RegionEndpointResolver', () => {
  it('should list regions in configured order', () => {
    const resolver = new RegionEndpointResolver();
    expect(resolver.regions().map((region) => region.id)).toEqual(['us', 'eu', 'as', 'cn']);
    expect(resolver.regions()[3]?.baseUrl).toBe('https://cn-apia.coolkit.cn');
  });

  it('should put the preferred region first', () => {
    const resolver = new RegionEndpointResolver(['us', 'eu', 'as'], { preferred: 'as' });
    expect(resolver.regions().map((region) => region.id)).toEqual(['as', 'us', 'eu']);
  });

  it('should ignore a preferred region that is not configured', () => {
    const resolver = new RegionEndpointResolver(['us', 'eu']);
    resolver.prefer('cn');
    expect(resolver.preferredRegion()).toBeUndefined();
  });

  it('should reject an empty region list', () => {
    expect(() => new RegionEndpointResolver([])).toThrow(BridgeError);
  });

  it('should report one failure per region in the order tried', async () => {
    const resolver = new RegionEndpointResolver();
    const tried: string[] = [];

    const error = await resolver
      .tryEachRegion(
        async (region: RegionEndpoint) => {
          tried.push(region.id);
          throw BridgeError.networkUnavailable(`down: ${region.id}`);
        },
        { strategy: 'body-signing' }
      )
      .catch((err: unknown) => err);

    expect(tried).toEqual(['us', 'eu', 'as', 'cn']);
    expect(error).toBeInstanceOf(BridgeError);
    if (!(error instanceof BridgeError)) return;
    expect(error.code).toBe('regions_exhausted');
    expect(error.attempts).toEqual([
      { region: 'us', strategy: 'body-signing', code: 'network_unavailable', message: 'down: us' },
      { region: 'eu', strategy: 'body-signing', code: 'network_unavailable', message: 'down: eu' },
      { region: 'as', strategy: 'body-signing', code: 'network_unavailable', message: 'down: as' },
      { region: 'cn', strategy: 'body-signing', code: 'network_unavailable', message: 'down: cn' },
    ]);
  });

  it('should stop at the first success and remember it', async () => {
    const resolver = new RegionEndpointResolver();
    const tried: string[] = [];

    const { result, region } = await resolver.tryEachRegion(async (candidate) => {
      tried.push(candidate.id);
      if (candidate.id !== 'as') {
        throw BridgeError.malformedResponse('nope');
      }
      return 'ok';
    });

    expect(result).toBe('ok');
    expect(region.id).toBe('as');
    expect(tried).toEqual(['us', 'eu', 'as']);
    expect(resolver.preferredRegion()).toBe('as');
    expect(resolver.regions()[0]?.id).toBe('as');
  });

  it('should rethrow an error the caller marks as terminal', async () => {
    const resolver = new RegionEndpointResolver();
    const terminal = BridgeError.codeExhausted('spent');
    const tried: string[] = [];

    await expect(
      resolver.tryEachRegion(
        async (region) => {
          tried.push(region.id);
          throw region.id === 'eu' ? terminal : BridgeError.networkUnavailable();
        },
        { shouldAbort: (error) => error === terminal }
      )
    ).rejects.toBe(terminal);

    expect(tried).toEqual(['us', 'eu']);
  });

  it('should record a timed-out region as unreachable and move on', async () => {
    const resolver = new RegionEndpointResolver(['us', 'eu']);
    const hosts: string[] = [];
    const http = new ProviderHttpClient({
      timeoutMs: 50,
      fetch: (input, init) => {
        const host = new URL(input).host;
        hosts.push(host);
        if (host === regionHost('us')) {
          return hangUntilAborted(init);
        }
        return Promise.resolve(new Response(JSON.stringify({ error: 0, msg: '', data: {} })));
      },
    });
    const call = (region: RegionEndpoint) =>
      http.send({ method: 'GET', url: `${region.baseUrl}/v2/device/thing`, headers: {} });

    const { region, result } = await resolver.tryEachRegion(call);

    expect(region.id).toBe('eu');
    expect(result.status).toBe(200);
    expect(hosts).toEqual([regionHost('us'), regionHost('eu')]);
  });

  it('should report network_unavailable for every region that times out', async () => {
    const resolver = new RegionEndpointResolver(['us', 'eu']);
    let calls = 0;
    const http = new ProviderHttpClient({
      timeoutMs: 50,
      fetch: (_input, init) => {
        calls++;
        return hangUntilAborted(init);
      },
    });

    const error = await resolver
      .tryEachRegion((region) =>
        http.send({ method: 'GET', url: `${region.baseUrl}/v2/device/thing`, headers: {} })
      )
      .catch((err: unknown) => err);

    expect(calls).toBe(2);
    expect(error).toBeInstanceOf(BridgeError);
    if (!(error instanceof BridgeError)) return;
    expect(error.attempts.map((attempt) => [attempt.region, attempt.code])).toEqual([
      ['us', 'network_unavailable'],
      ['eu', 'network_unavailable'],
    ]);
    expect(error.attempts[0]?.message).toContain('within 50ms');
  });
});
