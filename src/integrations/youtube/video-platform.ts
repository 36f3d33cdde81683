import {
  ChannelStatisticsMap,
  DurationBucket,
  YoutubeVideo,
} from '@/types/youtube';
import { PublishedWindow } from '@/types/sample';

export const VIDEO_PLATFORM = Symbol('VIDEO_PLATFORM');

export interface SearchQuery {
  window: PublishedWindow;
  categoryId: string;
  regionCode: string;
  videoDuration: DurationBucket;
  maxResults: number;
}

/**
 * What the sampler needs from the video platform. Implementations throw
 * `YoutubeQuotaError` when the request volume is exhausted and any other
 * error for ordinary failures.
 */
export interface VideoPlatform {
  searchVideoIds(query: SearchQuery): Promise<string[]>;
  getVideoDetails(ids: string[]): Promise<YoutubeVideo[]>;
  getChannelStatistics(ids: string[]): Promise<ChannelStatisticsMap>;
  quotaUnitsUsed(): number;
}
