import { DurationBucket } from '@/types/youtube';

/** One sampled video, flattened for the dataset table. */
export interface VideoRecord {
  videoId: string;
  title: string;
  categoryId: string;
  categoryName: string;

  views: number;
  likes: number;
  comments: number;

  channelId: string;
  channelSubscribers: number;
  channelTotalViews: number;
  channelVideoCount: number;

  /** First 10 tags joined with `|` */
  tags: string;
  descriptionLen: number;
  durationSeconds: number;
  definition: string;
  language: string;

  publishedAt: string;
  capturedAt: string;
  videoUrl: string;
  thumbnailUrl: string;
}

/** A record stamped with the batch it is destined for. */
export interface DatasetRow extends VideoRecord {
  batchVersion: string;
}

export interface EligibilityThresholds {
  minSubscribers: number;
  minViews: number;
  minViewRatio: number;
  minDurationSeconds: number;
}

export interface FetchRequest extends EligibilityThresholds {
  daysAgo: number;
  videosPerCategory: number;
  /** `undefined` means every supported category */
  categories?: string[];
  /** Preset name (`US`, `EU`, `US_EU`) or a raw region code */
  region: string;
  videoDuration: DurationBucket;
  /** Fixes region and category visiting order when set */
  seed?: string;
}

export interface PublishedWindow {
  publishedAfter: string;
  publishedBefore: string;
}

export interface FetchReport {
  window: PublishedWindow;
  regionOrder: string[];
  perRegionLimit: number;
  regionsAttempted: string[];
  categoriesQueried: number;
  categoriesFailed: Array<{
    region: string;
    category: string;
    error: string;
  }>;
  quotaStop: { region: string; error: string } | null;
  itemsSeen: number;
  droppedByDuration: number;
  collected: number;
  admitted: number;
  quotaUnits: number;
}

export interface FetchResult {
  records: VideoRecord[];
  report: FetchReport;
}
