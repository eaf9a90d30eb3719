import { describe, expect, it } from 'vitest';
import { formatPublishTime, parseScheduledAt, toUnixSeconds } from '../../src/utils/schedule-time.js';

describe('parseScheduledAt', () => {
  it('reads a time without offset as Moscow time', () => {
    expect(parseScheduledAt('2030-05-01T12:00')?.toISOString()).toBe('2030-05-01T09:00:00.000Z');
  });

  it('accepts a space instead of T, with seconds', () => {
    expect(parseScheduledAt('2030-05-01 12:30:15')?.toISOString()).toBe('2030-05-01T09:30:15.000Z');
  });

  it('honours an explicit offset', () => {
    expect(parseScheduledAt('2030-05-01T12:00:00Z')?.toISOString()).toBe('2030-05-01T12:00:00.000Z');
    expect(parseScheduledAt('2030-05-01T12:00:00+05:00')?.toISOString()).toBe('2030-05-01T07:00:00.000Z');
    expect(parseScheduledAt('2030-05-01T12:00:00-0130')?.toISOString()).toBe('2030-05-01T13:30:00.000Z');
  });

  it('keeps milliseconds', () => {
    expect(parseScheduledAt('2030-05-01T12:00:00.5Z')?.toISOString()).toBe('2030-05-01T12:00:00.500Z');
  });

  it('rejects impossible calendar values', () => {
    expect(parseScheduledAt('2030-02-30T10:00')).toBeNull();
    expect(parseScheduledAt('2030-13-01T10:00')).toBeNull();
    expect(parseScheduledAt('2030-01-01T24:00')).toBeNull();
  });

  it('rejects text that is not a date-time', () => {
    expect(parseScheduledAt('tomorrow')).toBeNull();
    expect(parseScheduledAt('2030-01-01')).toBeNull();
  });
});

describe('toUnixSeconds', () => {
  it('floors to whole seconds', () => {
    expect(toUnixSeconds(new Date('2030-01-01T00:00:00.999Z'))).toBe(1893456000);
  });
});

describe('formatPublishTime', () => {
  it('renders in Moscow time with the offset', () => {
    expect(formatPublishTime(new Date('2030-05-01T09:00:00Z'))).toBe('2030-05-01 12:00:00 +03:00');
  });
});
