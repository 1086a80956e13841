import { describe, it, expect, beforeEach } from 'vitest';
import type { TokenSet } from '@ewelink-bridge/shared';
import { CredentialStore, isTokenExpired } from '../services/credential-store.js';
import { MemoryCredentialStorage } from '../storage/memory/index.js';
import { REGION_ENDPOINTS } from '../config/constants.js';
import { createLogger } from '../logging/logger.js';

function tokenSet(accessToken: string, obtainedAt: Date, region: 'us' | 'eu' = 'eu'): TokenSet {
  return {
    accessToken,
    refreshToken: `rt-for-${accessToken}`,
    obtainedAt,
    expiresAt: new Date(obtainedAt.getTime() + 3600_000),
    region: REGION_ENDPOINTS[region],
  };
}

describe('CredentialStore', () => {
  let storage: MemoryCredentialStorage;
  let store: CredentialStore;
  let lines: string[];

  beforeEach(() => {
    storage = new MemoryCredentialStorage();
    lines = [];
    store = new CredentialStore({
      identity: { appId: 'test-app-id' },
      storage,
      logger: createLogger({ level: 'debug', sink: (_level, line) => lines.push(line) }),
    });
  });

  it('should round-trip a token set', async () => {
    const saved = tokenSet('at-1', new Date('2026-03-01T10:00:00.000Z'));
    saved.user = { userId: 'user-1' };

    expect(await store.save(saved)).toBe(true);

    expect(await store.load()).toEqual(saved);
  });

  it('should store ISO dates and the region id', async () => {
    await store.save(tokenSet('at-1', new Date('2026-03-01T10:00:00.000Z'), 'us'));

    const record = await storage.find('test-app-id');
    expect(record).toMatchObject({
      appId: 'test-app-id',
      accessToken: 'at-1',
      obtainedAt: '2026-03-01T10:00:00.000Z',
      expiresAt: '2026-03-01T11:00:00.000Z',
      region: 'us',
      lastGoodRegion: 'us',
    });
  });

  it('should throw unauthenticated from current() when empty', async () => {
    await expect(store.current()).rejects.toMatchObject({ code: 'unauthenticated' });
  });

  it('should drop a write older than the stored token', async () => {
    await store.save(tokenSet('at-new', new Date('2026-03-01T10:00:00.000Z')));

    const written = await store.save(tokenSet('at-old', new Date('2026-03-01T09:00:00.000Z')));

    expect(written).toBe(false);
    expect((await store.current()).accessToken).toBe('at-new');
    expect(lines.some((line) => JSON.parse(line).msg === 'dropping stale token write')).toBe(true);
  });

  it('should never log token values', async () => {
    await store.save(tokenSet('at-secret-value', new Date()));

    expect(lines.join('\n')).not.toContain('at-secret-value');
  });

  it('should run exclusive sections one at a time', async () => {
    const events: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = store.exclusive(async () => {
      events.push('first:start');
      await gate;
      events.push('first:end');
    });
    const second = store.exclusive(async () => {
      events.push('second:start');
    });

    await Promise.resolve();
    events.push('released');
    release();
    await Promise.all([first, second]);

    expect(events).toEqual(['first:start', 'released', 'first:end', 'second:start']);
  });

  it('should keep the queue going after a failed section', async () => {
    await expect(
      store.exclusive(async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(store.exclusive(async () => 'next')).resolves.toBe('next');
  });

  it('should serialize concurrent saves so the newest wins', async () => {
    const older = tokenSet('at-older', new Date('2026-03-01T09:00:00.000Z'));
    const newer = tokenSet('at-newer', new Date('2026-03-01T10:00:00.000Z'));

    const results = await Promise.all([store.save(newer), store.save(older)]);

    expect(results).toEqual([true, false]);
    expect((await store.current()).accessToken).toBe('at-newer');
  });

  it('should report the last good region', async () => {
    expect(await store.lastGoodRegion()).toBeUndefined();
    await store.save(tokenSet('at-1', new Date(), 'us'));
    expect(await store.lastGoodRegion()).toBe('us');
  });

  it('should clear the stored token', async () => {
    await store.save(tokenSet('at-1', new Date()));
    await store.clear();
    expect(await store.load()).toBeNull();
  });
});

describe('isTokenExpired', () => {
  it('should compare expiresAt with now', () => {
    const token = tokenSet('at-1', new Date('2026-03-01T10:00:00.000Z'));
    expect(isTokenExpired(token, new Date('2026-03-01T10:59:59.000Z'))).toBe(false);
    expect(isTokenExpired(token, new Date('2026-03-01T11:00:00.000Z'))).toBe(true);
  });

  it('should treat a token without expiry as valid', () => {
    const token = { ...tokenSet('at-1', new Date()), expiresAt: undefined };
    expect(isTokenExpired(token)).toBe(false);
  });
});
