import { ConfigService } from '@nestjs/config';
import { ConfigurationError } from '@/common/errors';
import { FetchRequest } from '@/types/sample';

export interface CollectorSettings {
  batchLimit: number;
  maxBatches: number;
  trackingEnabled: boolean;
  trackingDir: string;
  trackingProject: string;
  maxTrackingRuns: number;
  githubOutput: string | null;
}

export type ProfileName = 'daily' | 'test';

export interface CollectionProfile {
  request: FetchRequest;
  /** Overrides BATCH_LIMIT when set */
  batchLimit?: number;
}

export const PROFILES: Readonly<Record<ProfileName, CollectionProfile>> = {
  daily: {
    request: {
      daysAgo: 7,
      videosPerCategory: 5,
      region: 'US_EU',
      minSubscribers: 10_000,
      minViews: 100,
      // 0.01% of subscribers: 27M subs -> 2700 views
      minViewRatio: 0.0001,
      minDurationSeconds: 60,
      videoDuration: 'medium',
    },
  },
  // low-quota smoke run: one region, one category, rotates after 3 rows
  test: {
    request: {
      daysAgo: 7,
      videosPerCategory: 2,
      categories: ['20'],
      region: 'US',
      minSubscribers: 100,
      minViews: 10,
      minViewRatio: 0,
      minDurationSeconds: 30,
      videoDuration: 'medium',
    },
    batchLimit: 3,
  },
};

export function readInt(
  cfg: ConfigService,
  key: string,
  fallback: number,
): number {
  const raw = cfg.get<string | number>(key);
  if (raw === undefined || raw === '') return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) {
    throw new ConfigurationError(
      `${key} must be a non-negative integer, got "${raw}"`,
    );
  }
  return n;
}

export function readBool(
  cfg: ConfigService,
  key: string,
  fallback: boolean,
): boolean {
  const raw = cfg.get<string | boolean>(key);
  if (raw === undefined || raw === '') return fallback;
  if (typeof raw === 'boolean') return raw;
  const v = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(v)) return true;
  if (['0', 'false', 'no', 'off'].includes(v)) return false;
  throw new ConfigurationError(`${key} must be a boolean, got "${raw}"`);
}

export function loadCollectorSettings(cfg: ConfigService): CollectorSettings {
  const batchLimit = readInt(cfg, 'BATCH_LIMIT', 500);
  if (batchLimit < 1) {
    throw new ConfigurationError('BATCH_LIMIT must be at least 1');
  }
  return {
    batchLimit,
    maxBatches: readInt(cfg, 'MAX_BATCHES', 150),
    trackingEnabled: readBool(cfg, 'TRACKING_ENABLED', true),
    trackingDir: cfg.get<string>('TRACKING_DIR', 'tracking'),
    trackingProject: cfg.get<string>(
      'TRACKING_PROJECT',
      'youtube-thumbnails-dataset',
    ),
    maxTrackingRuns: readInt(cfg, 'MAX_TRACKING_RUNS', 350),
    githubOutput: cfg.get<string>('GITHUB_OUTPUT') || null,
  };
}
