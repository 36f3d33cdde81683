import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import * as path from 'path';
import { makeRow, makeTempDir, removeDir } from '@/testing/fixtures';
import { DatasetWorkspace } from './dataset.workspace';

describe('DatasetWorkspace', () => {
  let dir: string;
  let workspace: DatasetWorkspace;

  beforeEach(() => {
    dir = makeTempDir();
    workspace = new DatasetWorkspace(new ConfigService({ DATASET_DIR: dir }));
  });

  afterEach(() => removeDir(dir));

  it('starts empty', async () => {
    expect(await workspace.loadState()).toEqual({
      recordCount: 0,
      sealedBatches: [],
      pendingRotation: null,
    });
  });

  it('creates current/ and batches/', () => {
    workspace.ensureLayout();
    expect(fs.existsSync(path.join(dir, 'current'))).toBe(true);
    expect(fs.existsSync(path.join(dir, 'batches'))).toBe(true);
  });

  it('reads the ledger from pointer files only', async () => {
    workspace.ensureLayout();
    const files = [
      'batch_003.dvc',
      'batch_001.dvc',
      'batch_x.dvc',
      'notes.txt',
    ];
    for (const f of files) {
      fs.writeFileSync(path.join(dir, 'batches', f), '');
    }
    fs.mkdirSync(path.join(dir, 'batches', 'batch_001'));

    expect(await workspace.listSealedBatches()).toEqual([1, 3]);
    expect(await workspace.isSealed('batch_003')).toBe(true);
    expect(await workspace.isSealed('batch_002')).toBe(false);
  });

  it('round-trips the rotation marker', async () => {
    await workspace.writeMarker('batch_002');
    expect(await workspace.readMarker()).toBe('batch_002');

    fs.writeFileSync(workspace.markerPath, '  batch_005\n');
    expect(await workspace.readMarker()).toBe('batch_005');

    fs.writeFileSync(workspace.markerPath, '\n');
    expect(await workspace.readMarker()).toBeNull();

    await workspace.clearMarker();
    expect(fs.existsSync(workspace.markerPath)).toBe(false);
    await expect(workspace.clearMarker()).resolves.toBeUndefined();
  });

  it('counts the working set', async () => {
    await workspace.records.append([makeRow('a'), makeRow('b')]);
    await workspace.writeMarker('batch_001');
    expect(await workspace.loadState()).toEqual({
      recordCount: 2,
      sealedBatches: [],
      pendingRotation: 'batch_001',
    });
  });
});
