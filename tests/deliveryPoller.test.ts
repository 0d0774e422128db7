import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DeliveryError, TransportError } from '../src/errors';
import { DeliveryPoller } from '../src/services/deliveryPoller';
import { ProfileService } from '../src/services/profileService';
import { TimerService } from '../src/services/timerService';
import { InMemoryStore } from '../src/store';
import type { TimerKind, TimerRecord, TimerStatusPatch, UserProfile } from '../src/types';
import { FakeDiscord, silentLogger } from './helpers';

class FlakyStore extends InMemoryStore {
  failDueReads = 0;
  dueReads = 0;
  failStatusWritesFor = new Set<string>();
  failProfileReadsFor = new Set<string>();

  async getProfile(userId: string): Promise<UserProfile | undefined> {
    if (this.failProfileReadsFor.has(userId)) {
      throw new Error('profile read timed out');
    }
    return super.getProfile(userId);
  }

  async listDueTimers(nowIso: string, limit: number): Promise<TimerRecord[]> {
    this.dueReads += 1;
    if (this.failDueReads > 0) {
      this.failDueReads -= 1;
      throw new Error('database unavailable');
    }
    return super.listDueTimers(nowIso, limit);
  }

  async updateTimerStatus(
    userId: string,
    kind: TimerKind,
    patch: TimerStatusPatch
  ): Promise<void> {
    if (this.failStatusWritesFor.has(userId)) {
      throw new Error('write rejected');
    }
    return super.updateTimerStatus(userId, kind, patch);
  }
}

function setup(batchLimit = 50, intervalMs = 30_000) {
  const store = new FlakyStore();
  const discord = new FakeDiscord();
  const timers = new TimerService(store);
  const profiles = new ProfileService(store, 'Asia/Seoul');
  const poller = new DeliveryPoller(timers, profiles, discord, silentLogger(), {
    intervalMs,
    batchLimit
  });
  return { store, discord, timers, profiles, poller };
}

describe('delivery poller cycle', () => {
  const baseTime = new Date('2026-03-01T00:00:00.000Z').getTime();

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(baseTime);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('delivers a timer once its cooldown has elapsed', async () => {
    const { discord, timers, profiles, poller } = setup();
    await timers.arm('1001', 'rudolph');

    expect(await timers.fetchDue(50)).toEqual([]);
    expect(await poller.runCycle()).toEqual({ fetched: 0, sent: 0, failed: 0, errored: 0 });

    vi.setSystemTime(baseTime + 3 * 60 * 60 * 1000 + 1000);
    expect(await timers.fetchDue(50)).toHaveLength(1);

    const report = await poller.runCycle();
    expect(report).toEqual({ fetched: 1, sent: 1, failed: 0, errored: 0 });
    expect(discord.sent).toEqual([{ userId: '1001', text: '🦌 루돌프 코 쿨타임 끝! (03/01 12:00)' }]);

    const { rudolph } = await timers.getAll('1001');
    expect(rudolph?.status).toBe('sent');
    expect(rudolph?.failReason).toBeNull();
    expect((await profiles.get('1001'))?.dmStatus).toBe('ok');
  });

  it('records an upstream rejection on both the timer and the profile', async () => {
    const { discord, timers, profiles, poller } = setup();
    discord.failures.set('1001', new TransportError(403, 'Cannot send messages to this user'));
    await timers.arm('1001', 'rudolph');
    vi.setSystemTime(baseTime + 3 * 60 * 60 * 1000 + 1000);

    const report = await poller.runCycle();

    expect(report).toEqual({ fetched: 1, sent: 0, failed: 1, errored: 0 });
    const { rudolph } = await timers.getAll('1001');
    expect(rudolph?.status).toBe('canceled');
    expect(rudolph?.failReason).toBe('403 Cannot send messages to this user');
    const profile = await profiles.get('1001');
    expect(profile?.dmStatus).toBe('fail');
    expect(profile?.dmLastError).toBe('403 Cannot send messages to this user');
  });

  it('keeps processing the batch after one delivery fails', async () => {
    const { discord, timers, poller } = setup();
    await timers.upsert('u1', 'bandage', new Date(baseTime - 3_000));
    await timers.upsert('u2', 'bandage', new Date(baseTime - 2_000));
    await timers.upsert('u3', 'bandage', new Date(baseTime - 1_000));
    discord.failures.set('u2', new DeliveryError('socket hang up'));

    const report = await poller.runCycle();

    expect(report).toEqual({ fetched: 3, sent: 2, failed: 1, errored: 0 });
    expect(discord.sent.map((item) => item.userId)).toEqual(['u1', 'u3']);
    expect((await timers.getAll('u1')).bandage?.status).toBe('sent');
    expect((await timers.getAll('u2')).bandage).toMatchObject({
      status: 'canceled',
      failReason: 'socket hang up'
    });
    expect((await timers.getAll('u3')).bandage?.status).toBe('sent');
  });

  it('leaves no processed timer scheduled', async () => {
    const { discord, timers, poller } = setup();
    const users = ['a', 'b', 'c', 'd'];
    for (const user of users) {
      await timers.upsert(user, 'rudolph', new Date(baseTime - 1_000));
    }
    discord.failures.set('b', new TransportError(500, 'internal'));
    discord.failures.set('d', new Error('unexpected'));

    await poller.runCycle();

    for (const user of users) {
      const { rudolph } = await timers.getAll(user);
      expect(['sent', 'canceled']).toContain(rudolph?.status);
      if (rudolph?.status === 'canceled') {
        expect(rudolph.failReason).toBeTruthy();
      }
    }
    expect(await timers.fetchDue(50)).toEqual([]);
  });

  it('processes at most the batch limit per cycle', async () => {
    const { discord, timers, poller } = setup(2);
    await timers.upsert('u1', 'bandage', new Date(baseTime - 3_000));
    await timers.upsert('u2', 'bandage', new Date(baseTime - 2_000));
    await timers.upsert('u3', 'bandage', new Date(baseTime - 1_000));

    expect(await poller.runCycle()).toMatchObject({ fetched: 2, sent: 2 });
    expect((await timers.getAll('u3')).bandage?.status).toBe('scheduled');

    expect(await poller.runCycle()).toMatchObject({ fetched: 1, sent: 1 });
    expect(discord.sent.map((item) => item.userId)).toEqual(['u1', 'u2', 'u3']);
  });

  it('formats the due time in the user timezone', async () => {
    const { discord, timers, profiles, poller } = setup();
    await profiles.setTimezone('ny', 'America/New_York');
    await timers.arm('ny', 'bandage');
    vi.setSystemTime(baseTime + 60 * 60 * 1000);

    await poller.runCycle();

    expect(discord.sent).toEqual([{ userId: 'ny', text: '🩹 반창고 쿨타임 끝! (02/28 20:00)' }]);
  });

  it('falls back to the default timezone for an unknown zone', async () => {
    const { discord, timers, profiles, poller } = setup();
    await profiles.setTimezone('lost', 'Mars/Olympus_Mons');
    await timers.arm('lost', 'bandage');
    vi.setSystemTime(baseTime + 60 * 60 * 1000);

    const report = await poller.runCycle();

    expect(report.sent).toBe(1);
    expect(discord.sent).toEqual([{ userId: 'lost', text: '🩹 반창고 쿨타임 끝! (03/01 10:00)' }]);
  });

  it('abandons the cycle without changes when the batch cannot be read', async () => {
    const { store, discord, timers, poller } = setup();
    await timers.upsert('1001', 'rudolph', new Date(baseTime - 1_000));
    store.failDueReads = 1;

    await expect(poller.runCycle()).rejects.toThrow('database unavailable');

    expect(discord.sent).toEqual([]);
    expect((await timers.getAll('1001')).rudolph?.status).toBe('scheduled');
  });

  it('delivers with the default timezone when the profile cannot be read', async () => {
    const { store, discord, timers, profiles, poller } = setup();
    await profiles.setTimezone('1001', 'America/New_York');
    await timers.arm('1001', 'bandage');
    store.failProfileReadsFor.add('1001');
    vi.setSystemTime(baseTime + 60 * 60 * 1000);

    const report = await poller.runCycle();

    expect(report).toEqual({ fetched: 1, sent: 1, failed: 0, errored: 0 });
    expect(discord.sent).toEqual([{ userId: '1001', text: '🩹 반창고 쿨타임 끝! (03/01 10:00)' }]);
    expect((await timers.getAll('1001')).bandage?.status).toBe('sent');
    expect(store.profiles.get('1001')?.dmStatus).toBe('ok');
  });

  it('records the profile result even when the timer write throws', async () => {
    const { store, discord, timers, poller } = setup();
    discord.failures.set('u2', new TransportError(403, 'Cannot send messages to this user'));
    await timers.upsert('u1', 'bandage', new Date(baseTime - 2_000));
    await timers.upsert('u2', 'bandage', new Date(baseTime - 1_000));
    store.failStatusWritesFor.add('u1');
    store.failStatusWritesFor.add('u2');

    const report = await poller.runCycle();

    expect(report).toEqual({ fetched: 2, sent: 0, failed: 0, errored: 2 });
    expect(store.profiles.get('u1')?.dmStatus).toBe('ok');
    expect(store.profiles.get('u2')).toMatchObject({
      dmStatus: 'fail',
      dmLastError: '403 Cannot send messages to this user'
    });
  });

  it('counts a record whose store write throws and moves on', async () => {
    const { store, discord, timers, poller } = setup();
    await timers.upsert('u1', 'bandage', new Date(baseTime - 2_000));
    await timers.upsert('u2', 'bandage', new Date(baseTime - 1_000));
    store.failStatusWritesFor.add('u1');

    const report = await poller.runCycle();

    expect(report).toEqual({ fetched: 2, sent: 1, failed: 0, errored: 1 });
    expect(discord.sent.map((item) => item.userId)).toEqual(['u1', 'u2']);
    expect((await timers.getAll('u2')).bandage?.status).toBe('sent');
  });
});

describe('delivery poller loop', () => {
  it('keeps polling after a cycle fails', async () => {
    const { store, discord, timers, poller } = setup(50, 10);
    await timers.upsert('1001', 'rudolph', new Date(Date.now() - 1_000));
    store.failDueReads = 1;

    poller.start();
    expect(poller.isRunning).toBe(true);
    await vi.waitFor(() => {
      expect(discord.sent).toHaveLength(1);
    });
    await poller.stop();

    expect(poller.isRunning).toBe(false);
    expect(store.dueReads).toBeGreaterThanOrEqual(2);
    expect((await timers.getAll('1001')).rudolph?.status).toBe('sent');
  });

  it('stops scheduling cycles once stopped', async () => {
    const { store, poller } = setup(50, 10);

    poller.start();
    await vi.waitFor(() => {
      expect(store.dueReads).toBeGreaterThanOrEqual(1);
    });
    await poller.stop();
    const readsAtStop = store.dueReads;

    await new Promise((resolve) => setTimeout(resolve, 50));
    expect(store.dueReads).toBe(readsAtStop);
  });
});
