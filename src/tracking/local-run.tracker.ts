import { Logger } from '@nestjs/common';
import { randomBytes } from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { Clock, systemClock } from '@/common/clock';
import { ensureDir, pathExists, writeJsonl } from '@/common/fs.util';
import { rowToColumns } from '@/dataset/record.store';
import {
  Preview,
  thumbnailFileName,
  ThumbnailService,
} from '@/thumbnail/thumbnail.service';
import { DatasetRow } from '@/types/sample';
import { ExperimentTracker, LoggedRun } from './tracker';

export type RunMeta = {
  id: string;
  project: string;
  jobType: string;
  createdAt: string;
  tags: string[];
  config: { batch_version: string };
  rows: number;
};

function isRunMeta(v: unknown): v is RunMeta {
  if (typeof v !== 'object' || v === null) return false;
  return (
    'id' in v &&
    typeof v.id === 'string' &&
    'createdAt' in v &&
    typeof v.createdAt === 'string'
  );
}

/**
 * Keeps tracking runs on disk under `<dir>/<project>/<runId>/`:
 * `run.json`, `table.jsonl` and small `previews/` of each thumbnail.
 */
export class LocalRunTracker implements ExperimentTracker {
  private readonly logger = new Logger(LocalRunTracker.name);

  constructor(
    private readonly opts: { dir: string; project: string },
    private readonly thumbnails: ThumbnailService,
    private readonly clock: Clock = systemClock,
  ) {}

  get projectDir() {
    return path.resolve(this.opts.dir, this.opts.project);
  }

  /** A failed write leaves no partial run behind. */
  async logBatch(
    rows: DatasetRow[],
    batchVersion: string,
    imageDir: string,
  ): Promise<LoggedRun> {
    const createdAt = this.clock().toISOString();
    const stamp = createdAt.replace(/[-:.TZ]/g, '');
    const runId = `${stamp}-${randomBytes(3).toString('hex')}`;
    const runDir = path.join(this.projectDir, runId);

    let logged: number;
    try {
      logged = await this.writeRun(runDir, rows, imageDir, {
        id: runId,
        project: this.opts.project,
        jobType: 'daily_collection',
        createdAt,
        tags: ['production', 'daily', batchVersion],
        config: { batch_version: batchVersion },
      });
    } catch (e) {
      await fs.promises.rm(runDir, { recursive: true, force: true });
      throw e;
    }

    this.logger.log(`Logged ${logged} rows to run ${runId}`);
    return { runId, rows: logged };
  }

  private async writeRun(
    runDir: string,
    rows: DatasetRow[],
    imageDir: string,
    meta: Omit<RunMeta, 'rows'>,
  ): Promise<number> {
    ensureDir(path.join(runDir, 'previews'));

    const table: Array<Record<string, unknown>> = [];
    for (const row of rows) {
      const src = path.join(imageDir, thumbnailFileName(row.videoId));
      // rows without a downloaded image are not logged
      if (!(await pathExists(src))) continue;

      let preview: Preview;
      try {
        preview = await this.thumbnails.renderPreview(src);
      } catch (e) {
        this.logger.warn(`Skipping unreadable thumbnail ${src}: ${String(e)}`);
        continue;
      }
      const rel = path.posix.join('previews', thumbnailFileName(row.videoId));
      await fs.promises.writeFile(path.join(runDir, rel), preview.data);
      table.push({ thumbnail: rel, ...rowToColumns(row) });
    }

    await writeJsonl(path.join(runDir, 'table.jsonl'), table);
    const full: RunMeta = { ...meta, rows: table.length };
    await fs.promises.writeFile(
      path.join(runDir, 'run.json'),
      JSON.stringify(full, null, 2),
      'utf8',
    );
    return table.length;
  }

  async listRuns(): Promise<RunMeta[]> {
    if (!(await pathExists(this.projectDir))) return [];
    const runs: RunMeta[] = [];
    for (const entry of await fs.promises.readdir(this.projectDir)) {
      const metaPath = path.join(this.projectDir, entry, 'run.json');
      if (!(await pathExists(metaPath))) continue;
      try {
        const raw = await fs.promises.readFile(metaPath, 'utf8');
        const parsed: unknown = JSON.parse(raw);
        if (isRunMeta(parsed) && parsed.id === entry) runs.push(parsed);
      } catch (e) {
        this.logger.warn(`Ignoring unreadable run ${entry}: ${String(e)}`);
      }
    }
    return runs.sort(
      (a, b) =>
        a.createdAt.localeCompare(b.createdAt) || a.id.localeCompare(b.id),
    );
  }

  async pruneRuns(maxRuns: number): Promise<string[]> {
    const runs = await this.listRuns();
    if (runs.length <= maxRuns) return [];

    const doomed = runs.slice(0, runs.length - maxRuns);
    this.logger.log(
      `Pruning: found ${runs.length} runs. ` +
        `Deleting ${doomed.length} oldest...`,
    );
    for (const run of doomed) {
      this.logger.log(`   - Deleting run: ${run.id}`);
      await fs.promises.rm(path.join(this.projectDir, run.id), {
        recursive: true,
        force: true,
      });
    }
    return doomed.map((r) => r.id);
  }
}
