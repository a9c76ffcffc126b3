import { describe, expect, it } from 'vitest';

import { formatRelativeTime } from './relative-time.js';

const now = new Date('2024-03-20T12:00:00Z');

function ago(ms: number): Date {
  return new Date(now.getTime() - ms);
}

describe('formatRelativeTime', () => {
  it('reports very recent edits as just now', () => {
    expect(formatRelativeTime(ago(30_000), now)).toBe('Just now');
    expect(formatRelativeTime(ago(-5_000), now)).toBe('Just now');
  });

  it('uses minutes, hours and days with singular forms', () => {
    expect(formatRelativeTime(ago(60_000), now)).toBe('1 min ago');
    expect(formatRelativeTime(ago(45 * 60_000), now)).toBe('45 mins ago');
    expect(formatRelativeTime(ago(60 * 60_000), now)).toBe('1 hour ago');
    expect(formatRelativeTime(ago(5 * 60 * 60_000), now)).toBe('5 hours ago');
    expect(formatRelativeTime(ago(24 * 60 * 60_000), now)).toBe('1 day ago');
    expect(formatRelativeTime(ago(6 * 24 * 60 * 60_000), now)).toBe('6 days ago');
  });

  it('falls back to a calendar date after a week', () => {
    expect(formatRelativeTime(new Date('2024-01-05T08:30:00Z'), now)).toBe('Jan 05, 2024');
  });
});
