import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import * as path from 'path';
import { ensureDir, pathExists } from '@/common/fs.util';
import { BatchState } from '@/types/dataset';
import { parseBatchNumber } from './batch-rotation';
import { CsvRecordStore } from './record.store';

export const MARKER_FILE = '.rotate';
export const METADATA_FILE = 'metadata.csv';
export const POINTER_EXT = '.dvc';

/**
 * The dataset checkout on disk: `current/` (working set), `batches/` (one
 * pointer file per sealed batch) and the `.rotate` marker. This is the only
 * owner of batch state; everything else gets a `BatchState` snapshot.
 */
@Injectable()
export class DatasetWorkspace {
  readonly root: string;
  readonly records: CsvRecordStore;

  constructor(cfg: ConfigService) {
    this.root = path.resolve(cfg.get<string>('DATASET_DIR', '.'));
    this.records = new CsvRecordStore(
      path.join(this.currentDir, METADATA_FILE),
    );
  }

  get currentDir() {
    return path.join(this.root, 'current');
  }
  get batchesDir() {
    return path.join(this.root, 'batches');
  }
  get markerPath() {
    return path.join(this.root, MARKER_FILE);
  }

  pointerPath(batchName: string) {
    return path.join(this.batchesDir, `${batchName}${POINTER_EXT}`);
  }

  ensureLayout() {
    ensureDir(this.currentDir);
    ensureDir(this.batchesDir);
  }

  /** Sealed batch numbers, ascending; files that don't parse are ignored. */
  async listSealedBatches(): Promise<number[]> {
    if (!(await pathExists(this.batchesDir))) return [];
    const entries = await fs.promises.readdir(this.batchesDir);
    return entries
      .filter((f) => f.endsWith(POINTER_EXT))
      .map((f) => parseBatchNumber(f.slice(0, -POINTER_EXT.length)))
      .filter((n): n is number => n !== null)
      .sort((a, b) => a - b);
  }

  isSealed(batchName: string): Promise<boolean> {
    return pathExists(this.pointerPath(batchName));
  }

  async readMarker(): Promise<string | null> {
    if (!(await pathExists(this.markerPath))) return null;
    const name = (await fs.promises.readFile(this.markerPath, 'utf8')).trim();
    return name || null;
  }

  async writeMarker(batchName: string): Promise<void> {
    await fs.promises.writeFile(this.markerPath, batchName, 'utf8');
  }

  async clearMarker(): Promise<void> {
    await fs.promises.rm(this.markerPath, { force: true });
  }

  async loadState(): Promise<BatchState> {
    const recordCount = await this.records.count();
    const sealedBatches = await this.listSealedBatches();
    const pendingRotation = await this.readMarker();
    return { recordCount, sealedBatches, pendingRotation };
  }
}
