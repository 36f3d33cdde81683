import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { CLOCK, Clock, systemClock } from '@/common/clock';
import {
  createRandomSource,
  RandomSource,
  shuffle,
} from '@/common/random.util';
import { publishedWindow } from '@/common/time.util';
import {
  VIDEO_PLATFORM,
  VideoPlatform,
} from '@/integrations/youtube/video-platform';
import { isQuotaError } from '@/integrations/youtube/youtube.errors';
import {
  FetchReport,
  FetchRequest,
  FetchResult,
  PublishedWindow,
  VideoRecord,
} from '@/types/sample';
import { ChannelStatisticsMap } from '@/types/youtube';
import { extractRecord } from './record.extractor';
import { resolveCategories, resolveRegions } from './regions';
import { dedupeAndFilter } from './sample.filter';

type RegionPass = {
  region: string;
  maxResults: number;
  window: PublishedWindow;
  request: FetchRequest;
  random: RandomSource;
  sink: VideoRecord[];
  report: FetchReport;
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Randomized multi-region, multi-category sampler.
 *
 * Regions are visited in a shuffled order and each region's categories are
 * shuffled again, so when the quota runs out part way through a run the
 * regions and categories that happen to come first are not favoured across
 * days. Calls are strictly sequential.
 *
 * A quota error inside a category aborts that region and then the whole
 * fetch; records gathered up to that point are kept. Any other category
 * error skips just that category.
 */
@Injectable()
export class SamplingService {
  private readonly logger = new Logger(SamplingService.name);
  private lastCaptureMs = 0;

  constructor(
    @Inject(VIDEO_PLATFORM) private readonly platform: VideoPlatform,
    @Optional() @Inject(CLOCK) private readonly clock: Clock = systemClock,
  ) {}

  async fetchBatch(request: FetchRequest): Promise<FetchResult> {
    const random = createRandomSource(request.seed);
    const regions = shuffle(resolveRegions(request.region), random);
    const perRegionLimit = Math.max(
      1,
      Math.floor(request.videosPerCategory / Math.max(regions.length, 1)),
    );
    const window = publishedWindow(request.daysAgo, this.clock());
    const unitsBefore = this.platform.quotaUnitsUsed();

    const report: FetchReport = {
      window,
      regionOrder: regions,
      perRegionLimit,
      regionsAttempted: [],
      categoriesQueried: 0,
      categoriesFailed: [],
      quotaStop: null,
      itemsSeen: 0,
      droppedByDuration: 0,
      collected: 0,
      admitted: 0,
      quotaUnits: 0,
    };

    this.logger.log(
      `Fetching batch (regions=${regions.length}, ` +
        `days_ago=${request.daysAgo}, ` +
        `window=${window.publishedAfter}..${window.publishedBefore}, ` +
        `per_region=${perRegionLimit})`,
    );

    const collected: VideoRecord[] = [];
    for (const region of regions) {
      report.regionsAttempted.push(region);
      try {
        await this.fetchRegion({
          region,
          maxResults: perRegionLimit,
          window,
          request,
          random,
          sink: collected,
          report,
        });
      } catch (err) {
        // other errors are already absorbed per category
        if (!isQuotaError(err)) throw err;
        this.logger.warn(
          `Quota exceeded or rate limit hit on region ${region}. ` +
            'Stopping batch.',
        );
        report.quotaStop = { region, error: err.message };
        break;
      }
    }

    const records = dedupeAndFilter(collected, request);
    report.collected = collected.length;
    report.admitted = records.length;
    report.quotaUnits = this.platform.quotaUnitsUsed() - unitsBefore;

    this.logger.log(
      `Fetched ${records.length} unique videos ` +
        `(${collected.length} collected, quota ${report.quotaUnits} units)`,
    );
    return { records, report };
  }

  private async fetchRegion(pass: RegionPass): Promise<void> {
    const { region, request, report } = pass;
    const categories = shuffle(
      resolveCategories(request.categories),
      pass.random,
    );

    for (const category of categories) {
      report.categoriesQueried++;
      try {
        await this.fetchCategory(pass, category);
      } catch (err) {
        // exhaustion is global: let the region loop stop the run
        if (isQuotaError(err)) throw err;
        this.logger.error(
          `Error in category ${category} (region ${region}): ` +
            errorMessage(err),
        );
        report.categoriesFailed.push({
          region,
          category,
          error: errorMessage(err),
        });
      }
    }
  }

  private async fetchCategory(
    pass: RegionPass,
    category: string,
  ): Promise<void> {
    const { request, report } = pass;

    const ids = await this.platform.searchVideoIds({
      window: pass.window,
      categoryId: category,
      regionCode: pass.region,
      videoDuration: request.videoDuration,
      maxResults: pass.maxResults,
    });
    if (!ids.length) return;

    const videos = await this.platform.getVideoDetails(ids);
    const channelIds = Array.from(
      new Set(
        videos
          .map((v) => v.snippet?.channelId)
          .filter((id): id is string => Boolean(id)),
      ),
    );
    const channelStats: ChannelStatisticsMap = channelIds.length
      ? await this.platform.getChannelStatistics(channelIds)
      : new Map();

    for (const video of videos) {
      report.itemsSeen++;
      const record = extractRecord(
        video,
        channelStats,
        this.captureTimestamp(),
      );
      // the platform's duration bucket is coarse; enforce exact seconds here
      if (record.durationSeconds >= request.minDurationSeconds) {
        pass.sink.push(record);
      } else {
        report.droppedByDuration++;
      }
    }
  }

  /** Never earlier than the previous capture, even if the clock steps back. */
  private captureTimestamp(): string {
    const ms = Math.max(this.clock().getTime(), this.lastCaptureMs);
    this.lastCaptureMs = ms;
    return new Date(ms).toISOString();
  }
}
