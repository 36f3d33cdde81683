import minimist from 'minimist';
import { ConfigurationError } from '@/common/errors';
import { PROFILES, ProfileName } from '@/config/collector.config';

export type CliMode = 'collect' | 'test' | 'rotate' | 'help';

export interface CliOptions {
  mode: CliMode;
  /** Unvalidated fetch request: profile defaults with flag overrides applied */
  request: Record<string, unknown>;
  batchLimit?: number;
}

/** flag -> fetch request field */
const OVERRIDES: ReadonlyArray<readonly [string, string]> = [
  ['days', 'daysAgo'],
  ['per-category', 'videosPerCategory'],
  ['region', 'region'],
  ['min-subscribers', 'minSubscribers'],
  ['min-views', 'minViews'],
  ['min-view-ratio', 'minViewRatio'],
  ['min-duration', 'minDurationSeconds'],
  ['duration', 'videoDuration'],
  ['seed', 'seed'],
];

export const USAGE = [
  'Usage: collect [--collect | --test | --rotate] [overrides]',
  '  --collect               daily collection (default)',
  '  --test                  low-quota test profile',
  '                          (one region, one category, batch limit 3)',
  '  --rotate                seal the working set if a rotation is pending',
  'Overrides:',
  '  --days N  --per-category N  --categories 20,10|all',
  '  --region US_EU|EU|US|<code>',
  '  --min-subscribers N  --min-views N  --min-view-ratio X',
  '  --min-duration SEC',
  '  --duration any|short|medium|long  --seed S  --batch-limit N',
].join('\n');

function toList(s: string): string[] {
  return s
    .split(',')
    .map((x) => x.trim())
    .filter(Boolean);
}

export function parseCliArgs(args: string[]): CliOptions {
  const argv = minimist(args, {
    string: ['region', 'categories', 'duration', 'seed'],
    boolean: ['collect', 'test', 'rotate', 'help'],
    alias: { h: 'help' },
  });

  if (argv.help) return { mode: 'help', request: {} };

  const modes = (['collect', 'test', 'rotate'] as const).filter(
    (m) => argv[m] === true,
  );
  if (modes.length > 1) {
    throw new ConfigurationError(`Pick one mode, got --${modes.join(' --')}`);
  }
  const mode: CliMode = modes[0] ?? 'collect';
  if (mode === 'rotate') return { mode, request: {} };

  const profileName: ProfileName = mode === 'test' ? 'test' : 'daily';
  const profile = PROFILES[profileName];
  const request: Record<string, unknown> = { ...profile.request };

  for (const [flag, field] of OVERRIDES) {
    const value: unknown = argv[flag];
    if (value !== undefined && value !== '') request[field] = value;
  }

  const categories: unknown = argv.categories;
  if (typeof categories === 'string' && categories !== '') {
    request.categories =
      categories.trim().toLowerCase() === 'all'
        ? undefined
        : toList(categories);
  }

  let batchLimit = profile.batchLimit;
  const rawLimit: unknown = argv['batch-limit'];
  if (rawLimit !== undefined) {
    const n = Number(rawLimit);
    if (!Number.isInteger(n) || n < 1) {
      throw new ConfigurationError(
        `--batch-limit must be a positive integer, got "${String(rawLimit)}"`,
      );
    }
    batchLimit = n;
  }

  return { mode, request, batchLimit };
}
