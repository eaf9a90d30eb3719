import { PUBLISH_TIMEZONE_OFFSET } from '../config.js';

const ISO_LOCAL =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3}))?)?(Z|[+-]\d{2}:?\d{2})?$/;

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function normalizeOffset(raw: string): string {
  if (raw === 'Z') return 'Z';
  return raw.includes(':') ? raw : `${raw.slice(0, 3)}:${raw.slice(3)}`;
}

function offsetMinutes(offset: string): number {
  const sign = offset.startsWith('-') ? -1 : 1;
  const [hh = '0', mm = '0'] = offset.slice(1).split(':');
  return sign * (parseInt(hh, 10) * 60 + parseInt(mm, 10));
}

/**
 * Parse an ISO-8601 publish time. A value without an offset is read in the
 * publishing timezone (Moscow). Returns null when the string is not a valid
 * calendar date-time.
 */
export function parseScheduledAt(input: string): Date | null {
  const m = ISO_LOCAL.exec(input.trim());
  if (!m) return null;

  const [, y, mo, d, h, mi, s = '00', frac = '0', rawOffset] = m;
  const year = Number(y), month = Number(mo), day = Number(d);
  const hour = Number(h), minute = Number(mi), second = Number(s);

  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  const offset = rawOffset ? normalizeOffset(rawOffset) : PUBLISH_TIMEZONE_OFFSET;
  const utcMs =
    Date.UTC(year, month - 1, day, hour, minute, second, Number(frac.padEnd(3, '0'))) -
    (offset === 'Z' ? 0 : offsetMinutes(offset)) * 60_000;

  return new Date(utcMs);
}

export const toUnixSeconds = (date: Date): number => Math.floor(date.getTime() / 1000);

/** "YYYY-MM-DD HH:mm:ss +03:00" in the publishing timezone, for logs and alerts. */
export function formatPublishTime(date: Date): string {
  const shifted = new Date(date.getTime() + offsetMinutes(PUBLISH_TIMEZONE_OFFSET) * 60_000);
  return `${shifted.toISOString().slice(0, 19).replace('T', ' ')} ${PUBLISH_TIMEZONE_OFFSET}`;
}
