import type { Logger } from 'pino';
import { describeDeliveryError } from '../errors';
import { TIMER_KIND_TABLE } from '../timerKinds';
import type { TimerRecord } from '../types';
import { formatInTimezone } from '../utils';
import type { NotificationClient } from './discordClient';
import type { ProfileService } from './profileService';
import type { TimerService } from './timerService';

export interface DeliveryPollerOptions {
  intervalMs: number;
  batchLimit: number;
}

export interface CycleReport {
  fetched: number;
  sent: number;
  failed: number;
  errored: number;
}

type RecordOutcome = 'sent' | 'failed';

/**
 * Polls the timer table for due timers and delivers one DM per timer.
 *
 * Records of a cycle are handled one at a time. A failed delivery cancels the
 * timer with the error as its reason and never stops the rest of the batch; a
 * failure to read the batch abandons the cycle without touching any record.
 */
export class DeliveryPoller {
  private timer?: NodeJS.Timeout;
  private running = false;
  private inflight?: Promise<void>;

  constructor(
    private readonly timers: TimerService,
    private readonly profiles: ProfileService,
    private readonly notifier: NotificationClient,
    private readonly logger: Logger,
    private readonly options: DeliveryPollerOptions
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.logger.info(
      { intervalMs: this.options.intervalMs, batchLimit: this.options.batchLimit },
      'delivery poller started'
    );
    this.schedule(0);
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    await this.inflight;
    this.logger.info('delivery poller stopped');
  }

  async runCycle(): Promise<CycleReport> {
    const due = await this.timers.fetchDue(this.options.batchLimit);
    const report: CycleReport = { fetched: due.length, sent: 0, failed: 0, errored: 0 };

    for (const record of due) {
      try {
        const outcome = await this.deliver(record);
        report[outcome] += 1;
      } catch (err) {
        report.errored += 1;
        this.logger.error(
          { err, userId: record.userId, kind: record.kind },
          'timer processing failed'
        );
      }
    }

    if (report.fetched > 0) {
      this.logger.info(report, 'poll cycle finished');
    }
    return report;
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.inflight = this.tick();
    }, delayMs);
  }

  private async tick(): Promise<void> {
    try {
      await this.runCycle();
    } catch (err) {
      this.logger.error({ err }, 'poll cycle aborted');
    }
    if (this.running) {
      this.schedule(this.options.intervalMs);
    }
  }

  private async resolveTimezone(userId: string): Promise<string> {
    try {
      return await this.profiles.getTimezone(userId);
    } catch (err) {
      this.logger.warn({ err, userId }, 'profile read failed, using default timezone');
      return this.profiles.fallbackTimezone;
    }
  }

  private async deliver(record: TimerRecord): Promise<RecordOutcome> {
    const tz = await this.resolveTimezone(record.userId);
    const localDue = formatInTimezone(new Date(record.dueAt), tz, this.profiles.fallbackTimezone);
    const text = TIMER_KIND_TABLE[record.kind].notification(localDue);

    try {
      await this.notifier.sendDirectMessage(record.userId, text);
    } catch (err) {
      const reason = describeDeliveryError(err);
      this.logger.warn({ userId: record.userId, kind: record.kind, reason }, 'dm delivery failed');
      await this.persist(
        this.timers.markFailed(record.userId, record.kind, reason),
        this.profiles.recordDeliveryResult(record.userId, false, reason)
      );
      return 'failed';
    }

    await this.persist(
      this.timers.markSent(record.userId, record.kind),
      this.profiles.recordDeliveryResult(record.userId, true)
    );
    return 'sent';
  }

  // Both writes settle before the first rejection is rethrown.
  private async persist(timerWrite: Promise<void>, profileWrite: Promise<void>): Promise<void> {
    const results = await Promise.allSettled([timerWrite, profileWrite]);
    const rejected = results.find(
      (result): result is PromiseRejectedResult => result.status === 'rejected'
    );
    if (rejected) {
      throw rejected.reason;
    }
  }
}
