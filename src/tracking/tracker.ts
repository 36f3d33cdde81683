import { DatasetRow } from '@/types/sample';

export const EXPERIMENT_TRACKER = Symbol('EXPERIMENT_TRACKER');

export type LoggedRun = { runId: string; rows: number };

/**
 * Best-effort visualization sink. Callers catch its failures; it never
 * decides anything about the dataset itself.
 */
export interface ExperimentTracker {
  logBatch(
    rows: DatasetRow[],
    batchVersion: string,
    imageDir: string,
  ): Promise<LoggedRun | null>;
  /**
   * Deletes the oldest runs until at most `maxRuns` remain; returns the
   * deleted ids.
   */
  pruneRuns(maxRuns: number): Promise<string[]>;
}

export class NoopTracker implements ExperimentTracker {
  async logBatch(): Promise<LoggedRun | null> {
    return null;
  }

  async pruneRuns(): Promise<string[]> {
    return [];
  }
}
