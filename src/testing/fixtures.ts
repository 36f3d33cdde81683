import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  SearchQuery,
  VideoPlatform,
} from '@/integrations/youtube/video-platform';
import { DatasetRow, FetchRequest, VideoRecord } from '@/types/sample';
import {
  ChannelStatisticsMap,
  YoutubeChannelStatistics,
  YoutubeVideo,
} from '@/types/youtube';

export function makeTempDir(prefix = 'sampler-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string) {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function makeRecord(
  videoId: string,
  overrides: Partial<VideoRecord> = {},
): VideoRecord {
  return {
    videoId,
    title: `Video ${videoId}`,
    categoryId: '20',
    categoryName: 'Gaming',
    views: 5000,
    likes: 50,
    comments: 5,
    channelId: `ch-${videoId}`,
    channelSubscribers: 20_000,
    channelTotalViews: 1_000_000,
    channelVideoCount: 120,
    tags: 'a|b',
    descriptionLen: 12,
    durationSeconds: 300,
    definition: 'hd',
    language: 'en',
    publishedAt: '2026-10-12T08:00:00Z',
    capturedAt: '2026-10-19T12:00:00.000Z',
    videoUrl: `https://www.youtube.com/watch?v=${videoId}`,
    thumbnailUrl: `https://img.test/${videoId}.jpg`,
    ...overrides,
  };
}

export function makeRow(
  videoId: string,
  batchVersion = 'batch_001',
  overrides: Partial<VideoRecord> = {},
): DatasetRow {
  return { ...makeRecord(videoId, overrides), batchVersion };
}

export function makeRequest(
  overrides: Partial<FetchRequest> = {},
): FetchRequest {
  return {
    daysAgo: 7,
    videosPerCategory: 5,
    categories: ['20'],
    region: 'US',
    minSubscribers: 1000,
    minViews: 10,
    minViewRatio: 0,
    minDurationSeconds: 60,
    videoDuration: 'medium',
    seed: 'test-seed',
    ...overrides,
  };
}

export type VideoOptions = {
  channelId?: string;
  views?: number;
  duration?: string;
  categoryId?: string;
};

export function makeVideo(id: string, opts: VideoOptions = {}): YoutubeVideo {
  return {
    id,
    snippet: {
      title: `Video ${id}`,
      description: 'desc',
      publishedAt: '2026-10-12T08:00:00Z',
      channelId: opts.channelId ?? `ch-${id}`,
      categoryId: opts.categoryId ?? '20',
      thumbnails: { high: { url: `https://img.test/${id}.jpg` } },
    },
    statistics: {
      viewCount: String(opts.views ?? 5000),
      likeCount: '10',
      commentCount: '1',
    },
    contentDetails: { duration: opts.duration ?? 'PT5M', definition: 'hd' },
  };
}

const DEFAULT_CHANNEL: YoutubeChannelStatistics = {
  subscriberCount: '50000',
  viewCount: '900000',
  videoCount: '80',
};

type FakePlatformOptions = {
  /** ids returned for a search; may throw. `call` is 1-based. */
  search: (query: SearchQuery, call: number) => string[];
  videos?: Record<string, YoutubeVideo>;
  channels?: Record<string, YoutubeChannelStatistics>;
};

/** In-memory platform charging the same units as the real client. */
export class FakePlatform implements VideoPlatform {
  readonly searches: SearchQuery[] = [];
  readonly detailCalls: string[][] = [];
  readonly channelCalls: string[][] = [];
  private units = 0;

  constructor(private readonly opts: FakePlatformOptions) {}

  async searchVideoIds(query: SearchQuery): Promise<string[]> {
    this.units += 100;
    this.searches.push(query);
    return this.opts.search(query, this.searches.length);
  }

  async getVideoDetails(ids: string[]): Promise<YoutubeVideo[]> {
    this.units += 1;
    this.detailCalls.push(ids);
    return ids.map((id) => this.opts.videos?.[id] ?? makeVideo(id));
  }

  async getChannelStatistics(ids: string[]): Promise<ChannelStatisticsMap> {
    this.units += 1;
    this.channelCalls.push(ids);
    const map: ChannelStatisticsMap = new Map();
    for (const id of ids) {
      map.set(id, this.opts.channels?.[id] ?? DEFAULT_CHANNEL);
    }
    return map;
  }

  quotaUnitsUsed(): number {
    return this.units;
  }
}
