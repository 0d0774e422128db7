import type { TimerKind } from './types';
import { TIMER_KINDS } from './types';

interface TimerKindInfo {
  durationMs: number;
  label: string;
  notification: (localDue: string) => string;
}

const HOUR_MS = 60 * 60 * 1000;

export const TIMER_KIND_TABLE: Record<TimerKind, TimerKindInfo> = {
  rudolph: {
    durationMs: 3 * HOUR_MS,
    label: '루돌프 코(3시간)',
    notification: (localDue) => `🦌 루돌프 코 쿨타임 끝! (${localDue})`
  },
  bandage: {
    durationMs: 1 * HOUR_MS,
    label: '반창고(1시간)',
    notification: (localDue) => `🩹 반창고 쿨타임 끝! (${localDue})`
  }
};

export function isTimerKind(value: string): value is TimerKind {
  return TIMER_KINDS.some((kind) => kind === value);
}
