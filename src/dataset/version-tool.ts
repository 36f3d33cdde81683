import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ensureDir } from '@/common/fs.util';
import { runCommand } from '@/common/process.util';
import { DatasetWorkspace, POINTER_EXT } from './dataset.workspace';

export const VERSION_TOOL = Symbol('VERSION_TOOL');

/** Moves files between the working set and sealed batches. */
export interface VersionTool {
  /** Move `current/` into `batches/<name>` and leave an empty `current/`. */
  moveToBatch(batchName: string): Promise<void>;
  /**
   * Track the (now empty) `current/` and upload everything to remote
   * storage. Safe to repeat.
   */
  publish(): Promise<void>;
  /** Stop tracking `batches/<name>` and reclaim its remote storage. */
  pruneBatch(batchName: string): Promise<void>;
}

/** DVC-backed moves; every step is a separate, sequential process. */
@Injectable()
export class DvcVersionTool implements VersionTool {
  private readonly logger = new Logger(DvcVersionTool.name);
  private readonly bin: string;

  constructor(
    cfg: ConfigService,
    private readonly workspace: DatasetWorkspace,
  ) {
    this.bin = cfg.get<string>('VERSION_TOOL_BIN', 'dvc');
  }

  async moveToBatch(batchName: string): Promise<void> {
    const cwd = this.workspace.root;
    this.logger.log(`Rotating current/ to batches/${batchName}...`);
    ensureDir(this.workspace.batchesDir);

    await runCommand(
      this.bin,
      ['move', 'current', `batches/${batchName}`],
      { cwd },
    );
    ensureDir(this.workspace.currentDir);
  }

  async publish(): Promise<void> {
    const cwd = this.workspace.root;
    ensureDir(this.workspace.currentDir);
    await runCommand(this.bin, ['add', 'current/'], { cwd });
    await runCommand(this.bin, ['push'], { cwd });
  }

  async pruneBatch(batchName: string): Promise<void> {
    this.logger.log(`Removing ${batchName} from tracking...`);
    await runCommand(this.bin, ['remove', `${batchName}${POINTER_EXT}`], {
      cwd: this.workspace.batchesDir,
    });
    this.logger.log(
      'Running garbage collection to delete it from remote storage...',
    );
    await runCommand(this.bin, ['gc', '--workspace', '--cloud', '--force'], {
      cwd: this.workspace.root,
    });
  }
}
