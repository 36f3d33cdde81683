import { isoDurationToSec } from '@/common/time.util';
import { VideoRecord } from '@/types/sample';
import {
  ChannelStatisticsMap,
  YoutubeThumbnails,
  YoutubeVideo,
} from '@/types/youtube';
import { categoryName } from './regions';

export const MAX_TAGS = 10;
export const TAG_SEPARATOR = '|';

function toCount(v?: string | number | null): number {
  const n = Number(v ?? 0);
  return Number.isFinite(n) && n > 0 ? Math.floor(n) : 0;
}

/** Prefer true maxres, then standard, high and medium. */
export function bestThumbnailUrl(thumbs?: YoutubeThumbnails): string {
  return (
    thumbs?.maxres?.url ||
    thumbs?.standard?.url ||
    thumbs?.high?.url ||
    thumbs?.medium?.url ||
    ''
  );
}

export function watchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

/** Maps one `/videos` item plus its channel's statistics onto a record. */
export function extractRecord(
  video: YoutubeVideo,
  channelStats: ChannelStatisticsMap,
  capturedAt: string,
): VideoRecord {
  const snippet = video.snippet ?? {};
  const stats = video.statistics ?? {};
  const content = video.contentDetails ?? {};
  const channelId = snippet.channelId ?? '';
  const channel = channelStats.get(channelId) ?? {};

  return {
    videoId: video.id,
    title: snippet.title ?? '',
    categoryId: snippet.categoryId ?? '',
    categoryName: categoryName(snippet.categoryId),

    views: toCount(stats.viewCount),
    likes: toCount(stats.likeCount),
    comments: toCount(stats.commentCount),

    channelId,
    channelSubscribers: toCount(channel.subscriberCount),
    channelTotalViews: toCount(channel.viewCount),
    channelVideoCount: toCount(channel.videoCount),

    tags: (snippet.tags ?? []).slice(0, MAX_TAGS).join(TAG_SEPARATOR),
    descriptionLen: (snippet.description ?? '').length,
    durationSeconds: isoDurationToSec(content.duration),
    definition: content.definition ?? 'sd',
    language: snippet.defaultAudioLanguage ?? 'en',

    publishedAt: snippet.publishedAt ?? '',
    capturedAt,
    videoUrl: watchUrl(video.id),
    thumbnailUrl: bestThumbnailUrl(snippet.thumbnails),
  };
}
