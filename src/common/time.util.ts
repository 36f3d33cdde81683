import { PublishedWindow } from '@/types/sample';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * `PT1H2M3S` -> 3723. Anything that does not start with a `PT` time part
 * (including day-designated durations) counts as 0.
 */
export function isoDurationToSec(duration?: string | null): number {
  if (!duration) return 0;
  const m = /^PT(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?/.exec(duration);
  if (!m) return 0;
  const [, h, min, s] = m;
  return Number(h ?? 0) * 3600 + Number(min ?? 0) * 60 + Number(s ?? 0);
}

/**
 * The UTC calendar day `daysAgo` days before `now`, start and end inclusive.
 */
export function publishedWindow(daysAgo: number, now: Date): PublishedWindow {
  const day = new Date(now.getTime() - daysAgo * DAY_MS)
    .toISOString()
    .slice(0, 10);
  return {
    publishedAfter: `${day}T00:00:00Z`,
    publishedBefore: `${day}T23:59:59Z`,
  };
}
