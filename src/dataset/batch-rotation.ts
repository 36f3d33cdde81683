import { BatchState, RotationDecision, RotationPhase } from '@/types/dataset';

export const BATCH_PREFIX = 'batch_';

export function formatBatchName(n: number): string {
  return `${BATCH_PREFIX}${String(n).padStart(3, '0')}`;
}

/** `batch_007` -> 7; null for anything that is not a batch name. */
export function parseBatchNumber(name: string): number | null {
  const m = /^batch_(\d+)$/.exec(name.trim());
  if (!m) return null;
  const n = Number(m[1]);
  return Number.isSafeInteger(n) ? n : null;
}

/** max(sealed) + 1, or 1 for an empty ledger. */
export function nextBatchNumber(sealed: readonly number[]): number {
  return sealed.length ? Math.max(...sealed) + 1 : 1;
}

/**
 * Name of the batch the working set is currently filling. A pending marker
 * wins, so repeated runs before the move keep stamping the same name.
 */
export function targetBatchName(state: BatchState): string {
  return (
    state.pendingRotation ??
    formatBatchName(nextBatchNumber(state.sealedBatches))
  );
}

export function currentPhase(state: BatchState): RotationPhase {
  return state.pendingRotation ? 'ROTATION_PENDING' : 'ACCUMULATING';
}

/**
 * Compare the accumulated count with the batch limit after a collection run.
 * An existing marker stays pending whatever the count.
 */
export function evaluateRotation(
  state: BatchState,
  batchLimit: number,
): RotationDecision {
  if (state.pendingRotation || state.recordCount >= batchLimit) {
    return {
      phase: 'ROTATION_PENDING',
      recordCount: state.recordCount,
      batchLimit,
      targetBatch: targetBatchName(state),
    };
  }
  return { phase: 'ACCUMULATING', recordCount: state.recordCount, batchLimit };
}

/** Working set moved into `batchName`; the next state starts empty. */
export function applySeal(state: BatchState, batchName: string): BatchState {
  const n = parseBatchNumber(batchName);
  const sealed =
    n === null || state.sealedBatches.includes(n)
      ? [...state.sealedBatches]
      : [...state.sealedBatches, n];
  return {
    recordCount: 0,
    sealedBatches: sealed.sort((a, b) => a - b),
    pendingRotation: null,
  };
}
