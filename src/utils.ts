import crypto from 'node:crypto';

export function now(): number {
  return Date.now();
}

export function toIso(ts: number): string {
  return new Date(ts).toISOString();
}

export function randomToken(prefix: string): string {
  return `${prefix}_${crypto.randomUUID()}_${crypto.randomBytes(8).toString('hex')}`;
}

export function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) : text;
}

export function isKnownTimezone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

function partsIn(date: Date, tz: string): Record<string, string> {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone: tz,
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23'
  });
  const parts: Record<string, string> = {};
  formatter.formatToParts(date).forEach((part) => {
    parts[part.type] = part.value;
  });
  return parts;
}

/**
 * Formats an instant as `MM/DD HH:mm` in the given IANA zone, falling back to
 * `fallbackTz` when the zone is unknown.
 */
export function formatInTimezone(date: Date, tz: string, fallbackTz: string): string {
  const zone = isKnownTimezone(tz) ? tz : fallbackTz;
  const parts = partsIn(date, zone);
  return `${parts.month}/${parts.day} ${parts.hour}:${parts.minute}`;
}

export function humanizeSeconds(sec: number): string {
  if (sec <= 0) {
    return '0분';
  }
  const minutes = Math.floor(sec / 60);
  const hours = Math.floor(minutes / 60);
  const rest = minutes % 60;
  return hours > 0 ? `${hours}시간 ${rest}분` : `${rest}분`;
}
