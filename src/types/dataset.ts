export type RotationPhase = 'ACCUMULATING' | 'ROTATION_PENDING' | 'SEALED';

/**
 * Snapshot of the working set and the batch ledger as found on disk.
 * Owned by the workspace; the rotation functions only read it and return
 * a new value.
 */
export interface BatchState {
  recordCount: number;
  sealedBatches: number[];
  pendingRotation: string | null;
}

export type RotationDecision =
  | { phase: 'ACCUMULATING'; recordCount: number; batchLimit: number }
  | {
      phase: 'ROTATION_PENDING';
      recordCount: number;
      batchLimit: number;
      targetBatch: string;
    };

export interface EvictionPlan {
  evicted: number | null;
  ledger: number[];
}

export interface RotationOutcome {
  needsRotation: boolean;
  batchName: string | null;
  sealed: boolean;
  evicted: string | null;
  ledgerSize: number;
}
