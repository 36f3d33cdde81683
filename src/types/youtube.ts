export interface YoutubeThumbnail {
  url: string;
  width?: number;
  height?: number;
}

export interface YoutubeThumbnails {
  default?: YoutubeThumbnail;
  medium?: YoutubeThumbnail;
  high?: YoutubeThumbnail;
  standard?: YoutubeThumbnail;
  maxres?: YoutubeThumbnail;
}

export interface YoutubeSnippet {
  title?: string;
  description?: string;
  publishedAt?: string;
  channelId?: string;
  channelTitle?: string;
  thumbnails?: YoutubeThumbnails;
  categoryId?: string;
  tags?: string[];
  defaultAudioLanguage?: string;
}

/** Video statistics arrive as decimal strings; any of them may be hidden. */
export interface YoutubeVideoStatistics {
  viewCount?: string;
  likeCount?: string;
  commentCount?: string;
}

export interface YoutubeChannelStatistics {
  viewCount?: string;
  subscriberCount?: string;
  hiddenSubscriberCount?: boolean;
  videoCount?: string;
}

export interface YoutubeContentDetails {
  duration?: string;
  definition?: string;
}

export interface YoutubeChannel {
  id: string;
  etag?: string;
  statistics?: YoutubeChannelStatistics;
}

export interface YoutubeVideo {
  id: string;
  snippet?: YoutubeSnippet;
  statistics?: YoutubeVideoStatistics;
  contentDetails?: YoutubeContentDetails;
  etag?: string;
}

export interface YoutubeSearchItem {
  id?: { kind?: string; videoId?: string };
}

export interface YoutubeApiResponse<T> {
  items?: T[];
  nextPageToken?: string;
  etag?: string;
}

export interface YoutubeErrorBody {
  error?: {
    code?: number;
    message?: string;
    errors?: Array<{ reason?: string; message?: string }>;
  };
}

/** Platform-side coarse duration filter of search.list */
export type DurationBucket = 'any' | 'short' | 'medium' | 'long';

export type ChannelStatisticsMap = Map<string, YoutubeChannelStatistics>;
