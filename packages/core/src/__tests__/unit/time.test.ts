import { describe, it, expect } from 'vitest';
import { formatLogTimestamp, formatFileTimestamp, parseLogTimestamp } from '../../utils/time.js';

describe('time formatting', () => {
  const date = new Date(2026, 0, 5, 9, 3, 7);

  it('formats audit timestamps in local time', () => {
    expect(formatLogTimestamp(date)).toBe('2026-01-05 09:03:07');
  });

  it('formats file-name timestamps in local time', () => {
    expect(formatFileTimestamp(date)).toBe('20260105_090307');
  });

  it('parses audit timestamps back', () => {
    expect(parseLogTimestamp('2026-01-05 09:03:07')?.getTime()).toBe(date.getTime());
  });

  it('rejects other formats', () => {
    expect(parseLogTimestamp('2026-01-05T09:03:07Z')).toBeUndefined();
  });
});
