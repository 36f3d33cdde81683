import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import { loadCollectorSettings } from '@/config/collector.config';
import { RotationOutcome } from '@/types/dataset';
import { applySeal, formatBatchName } from './batch-rotation';
import { DatasetWorkspace } from './dataset.workspace';
import { planEviction } from './retention';
import { VERSION_TOOL, VersionTool } from './version-tool';

/**
 * Consumes the `.rotate` marker: seals the working set into the named batch,
 * evicts at most one old batch, then deletes the marker. The marker stays
 * until every step has succeeded, so a failed rotation is simply rerun.
 */
@Injectable()
export class RotationService {
  private readonly logger = new Logger(RotationService.name);
  private readonly maxBatches: number;
  private readonly githubOutput: string | null;

  constructor(
    cfg: ConfigService,
    private readonly workspace: DatasetWorkspace,
    @Inject(VERSION_TOOL) private readonly versionTool: VersionTool,
  ) {
    const settings = loadCollectorSettings(cfg);
    this.maxBatches = settings.maxBatches;
    this.githubOutput = settings.githubOutput;
  }

  async rotate(): Promise<RotationOutcome> {
    const before = await this.workspace.loadState();
    const batchName = before.pendingRotation;
    await this.writeCiOutput(batchName);

    if (!batchName) {
      this.logger.log('No rotation needed.');
      return {
        needsRotation: false,
        batchName: null,
        sealed: false,
        evicted: null,
        ledgerSize: before.sealedBatches.length,
      };
    }

    this.logger.log(`Rotation needed: ${batchName}`);
    let sealed = false;
    if (await this.workspace.isSealed(batchName)) {
      // an earlier attempt got past the move; only the move is skipped
      this.logger.warn(`${batchName} is already sealed, skipping the move`);
    } else {
      await this.versionTool.moveToBatch(batchName);
      sealed = true;
    }
    await this.versionTool.publish();

    const plan = planEviction(
      applySeal(before, batchName).sealedBatches,
      this.maxBatches,
    );
    let evicted: string | null = null;
    if (plan.evicted !== null) {
      evicted = formatBatchName(plan.evicted);
      this.logger.warn(
        `Limit reached (${plan.ledger.length + 1} > ${this.maxBatches}). ` +
          `Pruning oldest batch ${evicted}...`,
      );
      await this.versionTool.pruneBatch(evicted);
      this.logger.log(
        `${evicted} deleted from remote storage and local tracking`,
      );
    } else {
      this.logger.log(
        `Batch count: ${plan.ledger.length}/${this.maxBatches} ` +
          '(no cleanup needed)',
      );
    }

    await this.workspace.clearMarker();
    return {
      needsRotation: true,
      batchName,
      sealed,
      evicted,
      ledgerSize: plan.ledger.length,
    };
  }

  /** `needs_rotation` / `batch_name` step outputs for a CI workflow. */
  private async writeCiOutput(batchName: string | null): Promise<void> {
    if (!this.githubOutput) return;
    const lines = batchName
      ? `needs_rotation=true\nbatch_name=${batchName}\n`
      : 'needs_rotation=false\n';
    await fs.promises.appendFile(this.githubOutput, lines, 'utf8');
  }
}
