import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ProfileService } from '../src/services/profileService';
import { InMemoryStore } from '../src/store';

describe('user profile store contract', () => {
  const baseTime = new Date('2026-03-01T00:00:00.000Z').getTime();
  let store = new InMemoryStore();
  let profiles = new ProfileService(store, 'Asia/Seoul');

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(baseTime);
    store = new InMemoryStore();
    profiles = new ProfileService(store, 'Asia/Seoul');
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns undefined for an unknown user and is not delivery ready', async () => {
    expect(await profiles.get('1001')).toBeUndefined();
    expect(await profiles.isDeliveryReady('1001')).toBe(false);
    expect(await profiles.getTimezone('1001')).toBe('Asia/Seoul');
  });

  it('records a successful delivery', async () => {
    await profiles.recordDeliveryResult('1001', true);

    expect(await profiles.get('1001')).toEqual({
      userId: '1001',
      dmStatus: 'ok',
      dmLastError: null,
      dmOkAt: '2026-03-01T00:00:00.000Z',
      tz: null,
      updatedAt: '2026-03-01T00:00:00.000Z'
    });
    expect(await profiles.isDeliveryReady('1001')).toBe(true);
  });

  it('records a failure truncated to 800 characters and keeps the last success time', async () => {
    await profiles.recordDeliveryResult('1001', true);
    vi.setSystemTime(baseTime + 60_000);
    await profiles.recordDeliveryResult('1001', false, 'e'.repeat(2000));

    const profile = await profiles.get('1001');
    expect(profile?.dmStatus).toBe('fail');
    expect(profile?.dmLastError).toHaveLength(800);
    expect(profile?.dmOkAt).toBe('2026-03-01T00:00:00.000Z');
    expect(profile?.updatedAt).toBe('2026-03-01T00:01:00.000Z');
    expect(await profiles.isDeliveryReady('1001')).toBe(false);
  });

  it('clears the last error once a delivery succeeds again', async () => {
    await profiles.recordDeliveryResult('1001', false, '403 Cannot send messages to this user');
    await profiles.recordDeliveryResult('1001', true);

    const profile = await profiles.get('1001');
    expect(profile?.dmStatus).toBe('ok');
    expect(profile?.dmLastError).toBeNull();
  });

  it('creates the profile lazily on timezone submission', async () => {
    await profiles.setTimezone('1001', 'Europe/Berlin');

    const profile = await profiles.get('1001');
    expect(profile?.dmStatus).toBe('unknown');
    expect(profile?.tz).toBe('Europe/Berlin');
    expect(await profiles.getTimezone('1001')).toBe('Europe/Berlin');
  });

  it('keeps timezone and delivery status independent of each other', async () => {
    await profiles.setTimezone('1001', 'America/New_York');
    await profiles.recordDeliveryResult('1001', false, 'timeout');
    await profiles.setTimezone('1001', 'Europe/Paris');

    const profile = await profiles.get('1001');
    expect(profile?.tz).toBe('Europe/Paris');
    expect(profile?.dmStatus).toBe('fail');
    expect(profile?.dmLastError).toBe('timeout');
  });
});
