import type { DataStore } from '../store';
import type { UserProfile } from '../types';
import { now, toIso, truncate } from '../utils';

export const MAX_DM_ERROR_LENGTH = 800;

export class ProfileService {
  constructor(
    private readonly store: DataStore,
    private readonly defaultTimezone: string
  ) {}

  async get(userId: string): Promise<UserProfile | undefined> {
    return this.store.getProfile(userId);
  }

  async isDeliveryReady(userId: string): Promise<boolean> {
    const profile = await this.store.getProfile(userId);
    return profile?.dmStatus === 'ok';
  }

  async recordDeliveryResult(userId: string, ok: boolean, error?: string): Promise<void> {
    const current = toIso(now());
    if (ok) {
      await this.store.upsertDeliveryResult({
        userId,
        dmStatus: 'ok',
        dmLastError: null,
        dmOkAt: current,
        updatedAt: current
      });
      return;
    }
    await this.store.upsertDeliveryResult({
      userId,
      dmStatus: 'fail',
      dmLastError: truncate(error ?? '', MAX_DM_ERROR_LENGTH),
      updatedAt: current
    });
  }

  async setTimezone(userId: string, tz: string): Promise<void> {
    await this.store.upsertTimezone(userId, tz, toIso(now()));
  }

  async getTimezone(userId: string): Promise<string> {
    const profile = await this.store.getProfile(userId);
    return profile?.tz || this.defaultTimezone;
  }

  get fallbackTimezone(): string {
    return this.defaultTimezone;
  }
}
