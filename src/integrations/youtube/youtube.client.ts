import { readInt } from '@/config/collector.config';
import {
  ChannelStatisticsMap,
  YoutubeApiResponse,
  YoutubeChannel,
  YoutubeSearchItem,
  YoutubeVideo,
} from '@/types/youtube';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { SearchQuery, VideoPlatform } from './video-platform';
import { toYoutubeError } from './youtube.errors';

type QueryParams = Record<string, string | number | undefined>;

/** Units charged per call by the Data API */
const QUOTA_COSTS = {
  search: 100,
  videos: 1,
  channels: 1,
} as const;

const MAX_IDS_PER_CALL = 50;

function chunk<T>(items: T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}

/**
 * YouTube Data API v3 over axios. One request at a time, no retries: a
 * 403/429 surfaces as `YoutubeQuotaError` so the caller can stop.
 */
@Injectable()
export class YoutubeClient implements VideoPlatform {
  private readonly http: AxiosInstance;
  private readonly key: string;
  private readonly logger = new Logger(YoutubeClient.name);
  private quotaUnits = 0;

  constructor(cfg: ConfigService, http?: AxiosInstance) {
    this.key = cfg.get<string>('YOUTUBE_API_KEY', '');
    const timeout = readInt(cfg, 'YOUTUBE_TIMEOUT_MS', 20_000);
    this.http =
      http ??
      axios.create({
        baseURL: 'https://www.googleapis.com/youtube/v3',
        timeout,
      });
  }

  private async get<T>(
    url: string,
    params: QueryParams,
    cost: number,
  ): Promise<AxiosResponse<T>> {
    // charged even when the call fails
    this.quotaUnits += cost;
    try {
      return await this.http.get<T>(url, {
        params: { key: this.key, ...params },
      });
    } catch (err) {
      throw toYoutubeError(err, url);
    }
  }

  quotaUnitsUsed(): number {
    return this.quotaUnits;
  }

  async searchVideoIds(query: SearchQuery): Promise<string[]> {
    const res = await this.get<YoutubeApiResponse<YoutubeSearchItem>>(
      '/search',
      {
        part: 'id',
        type: 'video',
        order: 'date',
        publishedAfter: query.window.publishedAfter,
        publishedBefore: query.window.publishedBefore,
        videoCategoryId: query.categoryId,
        regionCode: query.regionCode,
        videoDuration: query.videoDuration,
        maxResults: Math.min(Math.max(query.maxResults, 1), MAX_IDS_PER_CALL),
      },
      QUOTA_COSTS.search,
    );
    const ids = (res.data?.items ?? [])
      .map((it) => it.id?.videoId)
      .filter((id): id is string => Boolean(id));
    this.logger.debug(
      `search ${query.regionCode}/${query.categoryId}: ${ids.length} ids`,
    );
    return ids;
  }

  async getVideoDetails(videoIds: string[]): Promise<YoutubeVideo[]> {
    const results: YoutubeVideo[] = [];
    for (const ids of chunk(videoIds, MAX_IDS_PER_CALL)) {
      const res = await this.get<YoutubeApiResponse<YoutubeVideo>>(
        '/videos',
        {
          part: 'snippet,statistics,contentDetails',
          id: ids.join(','),
          maxResults: MAX_IDS_PER_CALL,
        },
        QUOTA_COSTS.videos,
      );
      results.push(...(res.data?.items ?? []));
    }
    return results;
  }

  async getChannelStatistics(
    channelIds: string[],
  ): Promise<ChannelStatisticsMap> {
    const stats: ChannelStatisticsMap = new Map();
    for (const ids of chunk(channelIds, MAX_IDS_PER_CALL)) {
      const res = await this.get<YoutubeApiResponse<YoutubeChannel>>(
        '/channels',
        {
          part: 'statistics',
          id: ids.join(','),
          maxResults: MAX_IDS_PER_CALL,
        },
        QUOTA_COSTS.channels,
      );
      for (const c of res.data?.items ?? []) {
        stats.set(c.id, c.statistics ?? {});
      }
    }
    return stats;
  }
}
