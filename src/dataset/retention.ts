import { EvictionPlan } from '@/types/dataset';

/**
 * Picks at most one batch to evict: the numerically smallest, and only when
 * the ledger is over `maxRetained`. A backlog of several over the limit
 * shrinks by one per rotation.
 */
export function planEviction(
  ledger: readonly number[],
  maxRetained: number,
): EvictionPlan {
  const sorted = [...ledger].sort((a, b) => a - b);
  if (sorted.length <= maxRetained) return { evicted: null, ledger: sorted };
  const [oldest, ...rest] = sorted;
  return { evicted: oldest, ledger: rest };
}
