export type TimerKind = 'rudolph' | 'bandage';
export type TimerStatus = 'scheduled' | 'sent' | 'canceled';
export type DmStatus = 'ok' | 'fail' | 'unknown';

export const TIMER_KINDS: readonly TimerKind[] = ['rudolph', 'bandage'];

export interface TimerRecord {
  userId: string;
  kind: TimerKind;
  status: TimerStatus;
  dueAt: string;
  lastSetAt: string;
  updatedAt: string;
  failReason: string | null;
}

export interface TimerStatusPatch {
  status: TimerStatus;
  failReason: string | null;
  updatedAt: string;
}

export interface UserProfile {
  userId: string;
  dmStatus: DmStatus;
  dmLastError: string | null;
  dmOkAt: string | null;
  tz: string | null;
  updatedAt: string;
}

export interface DeliveryResultPatch {
  userId: string;
  dmStatus: Exclude<DmStatus, 'unknown'>;
  dmLastError: string | null;
  // undefined keeps the stored value
  dmOkAt?: string;
  updatedAt: string;
}

export interface Session {
  token: string;
  userId: string;
  tz: string | null;
  inviteClicked: boolean;
  createdAt: string;
}
