import { describe, expect, it } from 'vitest';

import { formatReportTimestamp, getLocalParts } from '@/lib/timezone';

describe('timezone', () => {
  it('getLocalParts returns local date and time in the given zone', () => {
    const now = new Date('2026-01-01T23:30:05.000Z');
    expect(getLocalParts(now, 'UTC')).toEqual({ localDate: '2026-01-01', hhmmss: '23:30:05' });
    expect(getLocalParts(now, 'Asia/Shanghai')).toEqual({ localDate: '2026-01-02', hhmmss: '07:30:05' });
  });

  it('formatReportTimestamp renders midnight as 00, not 24', () => {
    expect(formatReportTimestamp(new Date('2026-03-01T00:00:00.000Z'), 'UTC')).toBe('2026-03-01 00:00:00 (UTC)');
  });
});
