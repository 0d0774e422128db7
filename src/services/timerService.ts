import type { DataStore } from '../store';
import { TIMER_KIND_TABLE } from '../timerKinds';
import type { TimerKind, TimerRecord } from '../types';
import { now, toIso, truncate } from '../utils';

export const MAX_FAIL_REASON_LENGTH = 400;

export class TimerService {
  constructor(private readonly store: DataStore) {}

  /** Schedules `kind` for `userId` at now + the kind's cooldown, replacing any earlier run. */
  async arm(userId: string, kind: TimerKind): Promise<TimerRecord> {
    const dueAt = new Date(now() + TIMER_KIND_TABLE[kind].durationMs);
    return this.upsert(userId, kind, dueAt);
  }

  async upsert(userId: string, kind: TimerKind, dueAt: Date): Promise<TimerRecord> {
    const current = toIso(now());
    const record: TimerRecord = {
      userId,
      kind,
      status: 'scheduled',
      dueAt: dueAt.toISOString(),
      lastSetAt: current,
      updatedAt: current,
      failReason: null
    };
    await this.store.upsertTimer(record);
    return record;
  }

  async cancel(userId: string, kind: TimerKind, reason = 'user_canceled'): Promise<void> {
    await this.store.updateTimerStatus(userId, kind, {
      status: 'canceled',
      failReason: reason,
      updatedAt: toIso(now())
    });
  }

  async getAll(userId: string): Promise<Partial<Record<TimerKind, TimerRecord>>> {
    const records = await this.store.listTimersByUser(userId);
    const byKind: Partial<Record<TimerKind, TimerRecord>> = {};
    records.forEach((record) => {
      byKind[record.kind] = record;
    });
    return byKind;
  }

  /** Scheduled timers due at or before now, oldest due first. */
  async fetchDue(limit: number): Promise<TimerRecord[]> {
    return this.store.listDueTimers(toIso(now()), limit);
  }

  async markSent(userId: string, kind: TimerKind): Promise<void> {
    await this.store.updateTimerStatus(userId, kind, {
      status: 'sent',
      failReason: null,
      updatedAt: toIso(now())
    });
  }

  /** Ends a timer whose delivery failed; the reason is what tells it apart from a user cancel. */
  async markFailed(userId: string, kind: TimerKind, reason: string): Promise<void> {
    await this.store.updateTimerStatus(userId, kind, {
      status: 'canceled',
      failReason: truncate(reason, MAX_FAIL_REASON_LENGTH),
      updatedAt: toIso(now())
    });
  }
}
