import { describe, expect, it } from '@jest/globals';
import { BatchState } from '@/types/dataset';
import {
  applySeal,
  currentPhase,
  evaluateRotation,
  formatBatchName,
  nextBatchNumber,
  parseBatchNumber,
  targetBatchName,
} from './batch-rotation';

describe('batch names', () => {
  it('pads to three digits', () => {
    expect(formatBatchName(1)).toBe('batch_001');
    expect(formatBatchName(42)).toBe('batch_042');
    expect(formatBatchName(1000)).toBe('batch_1000');
  });

  it('parses only batch names', () => {
    expect(parseBatchNumber('batch_007')).toBe(7);
    expect(parseBatchNumber('batch_x')).toBeNull();
    expect(parseBatchNumber('current')).toBeNull();
  });

  it('numbers the next batch after the highest sealed one', () => {
    expect(nextBatchNumber([])).toBe(1);
    expect(nextBatchNumber([1, 2, 5])).toBe(6);
  });
});

const state = (
  recordCount: number,
  sealedBatches: number[] = [],
  pendingRotation: string | null = null,
): BatchState => ({ recordCount, sealedBatches, pendingRotation });

describe('evaluateRotation', () => {
  const limit = 500;

  it('stays accumulating below the limit', () => {
    expect(evaluateRotation(state(limit - 1), limit)).toEqual({
      phase: 'ACCUMULATING',
      recordCount: limit - 1,
      batchLimit: limit,
    });
  });

  it('requests the first batch once the limit is reached', () => {
    expect(evaluateRotation(state(limit), limit)).toEqual({
      phase: 'ROTATION_PENDING',
      recordCount: limit,
      batchLimit: limit,
      targetBatch: 'batch_001',
    });
  });

  it('names the batch after the sealed ledger', () => {
    const decision = evaluateRotation(state(600, [1, 2, 3]), limit);
    expect(decision.phase === 'ROTATION_PENDING' && decision.targetBatch).toBe(
      'batch_004',
    );
  });

  it('keeps a pending marker name', () => {
    const pending = state(700, [1], 'batch_009');
    expect(targetBatchName(pending)).toBe('batch_009');
    expect(currentPhase(pending)).toBe('ROTATION_PENDING');
  });

  it('stays pending under the limit while a marker exists', () => {
    const pending = state(10, [], 'batch_001');
    expect(evaluateRotation(pending, limit).phase).toBe('ROTATION_PENDING');
  });
});

describe('applySeal', () => {
  it('empties the working set and records the batch', () => {
    const before = state(500, [2, 1], 'batch_003');
    expect(applySeal(before, 'batch_003')).toEqual({
      recordCount: 0,
      sealedBatches: [1, 2, 3],
      pendingRotation: null,
    });
  });

  it('does not record a batch twice', () => {
    const before = state(0, [1], 'batch_001');
    expect(applySeal(before, 'batch_001').sealedBatches).toEqual([1]);
  });
});
