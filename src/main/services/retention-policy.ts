/**
 * Retention policy: decides which entries survive a cleanup pass.
 *
 * Pinned entries always survive. Of the unpinned ones, only the
 * `maxUnpinned` most recent are kept. Recency is `createdAt` descending,
 * then `id` descending, so entries inserted within the same clock tick
 * still rank in insertion order.
 *
 * @module retention-policy
 */

import type { Entry } from '../../shared/types/clipboard';

export interface RetentionPlan {
  keep: Entry[];
  evict: Entry[];
}

type RecencyKey = Pick<Entry, 'id' | 'createdAt'>;

/** Newest first */
export function compareRecency(a: RecencyKey, b: RecencyKey): number {
  if (a.createdAt !== b.createdAt) {
    return a.createdAt < b.createdAt ? 1 : -1;
  }
  return b.id - a.id;
}

/** Pinned first, then newest first */
export function compareDisplayOrder(a: Entry, b: Entry): number {
  if (a.pinned !== b.pinned) {
    return a.pinned ? -1 : 1;
  }
  return compareRecency(a, b);
}

export function planRetention(entries: readonly Entry[], maxUnpinned: number): RetentionPlan {
  const ceiling = Number.isFinite(maxUnpinned) ? Math.max(0, Math.floor(maxUnpinned)) : 0;

  const pinned = entries.filter((e) => e.pinned);
  const unpinned = entries.filter((e) => !e.pinned).sort(compareRecency);

  return {
    keep: [...pinned, ...unpinned.slice(0, ceiling)],
    evict: unpinned.slice(ceiling),
  };
}
