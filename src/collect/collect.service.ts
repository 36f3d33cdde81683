import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  CollectorSettings,
  loadCollectorSettings,
} from '@/config/collector.config';
import {
  currentPhase,
  evaluateRotation,
  targetBatchName,
} from '@/dataset/batch-rotation';
import { DatasetWorkspace } from '@/dataset/dataset.workspace';
import { SamplingService } from '@/sampling/sampling.service';
import {
  DownloadSummary,
  ThumbnailService,
} from '@/thumbnail/thumbnail.service';
import { EXPERIMENT_TRACKER, ExperimentTracker } from '@/tracking/tracker';
import { RotationPhase } from '@/types/dataset';
import { DatasetRow, FetchReport, FetchRequest } from '@/types/sample';

export type TrackingResult =
  | { ok: true; runId: string | null; prunedRuns: string[] }
  | { ok: false; error: string };

export interface CollectSummary {
  targetBatch: string;
  admitted: number;
  thumbnails: DownloadSummary | null;
  totalInWorkingSet: number;
  batchLimit: number;
  phase: RotationPhase;
  tracking: TrackingResult | null;
  fetch: FetchReport;
}

/** One daily collection run, from fetch to the rotation marker. */
@Injectable()
export class CollectService {
  private readonly logger = new Logger(CollectService.name);
  private readonly settings: CollectorSettings;

  constructor(
    cfg: ConfigService,
    private readonly workspace: DatasetWorkspace,
    private readonly sampling: SamplingService,
    private readonly thumbnails: ThumbnailService,
    @Inject(EXPERIMENT_TRACKER) private readonly tracker: ExperimentTracker,
  ) {
    this.settings = loadCollectorSettings(cfg);
  }

  async run(
    request: FetchRequest,
    opts: { batchLimit?: number } = {},
  ): Promise<CollectSummary> {
    const batchLimit = opts.batchLimit ?? this.settings.batchLimit;
    this.workspace.ensureLayout();

    const before = await this.workspace.loadState();
    const target = targetBatchName(before);
    this.logger.log(`Target version: ${target}`);

    const { records, report } = await this.sampling.fetchBatch(request);
    if (!records.length) {
      this.logger.log('No videos found today.');
      return {
        targetBatch: target,
        admitted: 0,
        thumbnails: null,
        totalInWorkingSet: before.recordCount,
        batchLimit,
        phase: currentPhase(before),
        tracking: null,
        fetch: report,
      };
    }

    const thumbnails = await this.thumbnails.downloadAll(
      records,
      this.workspace.currentDir,
    );

    const rows: DatasetRow[] = records.map((r) => ({
      ...r,
      batchVersion: target,
    }));
    await this.workspace.records.append(rows);
    this.logger.log(
      `Appended ${rows.length} videos to ${this.workspace.records.filePath}`,
    );

    const tracking = await this.track(rows, target);

    const after = await this.workspace.loadState();
    const decision = evaluateRotation(after, batchLimit);
    this.logger.log(
      `Total in current/: ${after.recordCount}/${batchLimit} samples`,
    );

    if (decision.phase === 'ROTATION_PENDING') {
      await this.workspace.writeMarker(decision.targetBatch);
      this.logger.log(
        `ROTATION NEEDED: marker ${this.workspace.markerPath} -> ` +
          decision.targetBatch,
      );
    } else {
      this.logger.log('Daily collection complete');
    }

    return {
      targetBatch: target,
      admitted: rows.length,
      thumbnails,
      totalInWorkingSet: after.recordCount,
      batchLimit,
      phase: decision.phase,
      tracking,
      fetch: report,
    };
  }

  /** Never throws: the dataset is already written when this runs. */
  private async track(
    rows: DatasetRow[],
    batchVersion: string,
  ): Promise<TrackingResult> {
    try {
      const run = await this.tracker.logBatch(
        rows,
        batchVersion,
        this.workspace.currentDir,
      );
      const prunedRuns = await this.tracker.pruneRuns(
        this.settings.maxTrackingRuns,
      );
      return { ok: true, runId: run?.runId ?? null, prunedRuns };
    } catch (e) {
      this.logger.error(`Tracking logging/pruning failed: ${String(e)}`);
      return { ok: false, error: String(e) };
    }
  }
}
