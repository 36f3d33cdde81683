import { describe, expect, it } from '@jest/globals';
import { isoDurationToSec, publishedWindow } from './time.util';

describe('isoDurationToSec', () => {
  it('sums hours, minutes and seconds', () => {
    expect(isoDurationToSec('PT1H2M3S')).toBe(3723);
    expect(isoDurationToSec('PT15M33S')).toBe(933);
    expect(isoDurationToSec('PT45M')).toBe(2700);
  });

  it('returns 0 for zero, empty and unparsable input', () => {
    expect(isoDurationToSec('PT0S')).toBe(0);
    expect(isoDurationToSec('')).toBe(0);
    expect(isoDurationToSec(undefined)).toBe(0);
    expect(isoDurationToSec(null)).toBe(0);
    expect(isoDurationToSec('five minutes')).toBe(0);
  });

  it('does not read day-designated durations', () => {
    expect(isoDurationToSec('P1DT2H')).toBe(0);
  });
});

describe('publishedWindow', () => {
  it('covers the whole UTC day daysAgo days back', () => {
    expect(publishedWindow(7, new Date('2026-10-19T10:30:00Z'))).toEqual({
      publishedAfter: '2026-10-12T00:00:00Z',
      publishedBefore: '2026-10-12T23:59:59Z',
    });
  });

  it('crosses month boundaries', () => {
    expect(publishedWindow(1, new Date('2026-03-01T00:00:00Z'))).toEqual({
      publishedAfter: '2026-02-28T00:00:00Z',
      publishedBefore: '2026-02-28T23:59:59Z',
    });
  });
});
