import { EligibilityThresholds, VideoRecord } from '@/types/sample';

export type ThresholdParams = Pick<
  EligibilityThresholds,
  'minSubscribers' | 'minViews' | 'minViewRatio'
>;

export function requiredViews(subscribers: number, p: ThresholdParams): number {
  return Math.max(p.minViews, Math.floor(subscribers * p.minViewRatio));
}

export function meetsThresholds(r: VideoRecord, p: ThresholdParams): boolean {
  return (
    r.channelSubscribers >= p.minSubscribers &&
    r.views >= requiredViews(r.channelSubscribers, p)
  );
}

/**
 * Keeps arrival order. An id is only remembered once its record is admitted,
 * so a later copy of a rejected record gets evaluated again on its own stats.
 */
export function dedupeAndFilter(
  records: VideoRecord[],
  params: ThresholdParams,
): VideoRecord[] {
  const seen = new Set<string>();
  const admitted: VideoRecord[] = [];
  for (const r of records) {
    if (seen.has(r.videoId)) continue;
    if (meetsThresholds(r, params)) {
      seen.add(r.videoId);
      admitted.push(r);
    }
  }
  return admitted;
}
