import { describe, it, expect } from 'vitest';
import { compareDisplayOrder, compareRecency, planRetention } from '../src/main/services/retention-policy';
import type { Entry } from '../src/shared/types/clipboard';

function entry(id: number, createdAt: string, pinned = false): Entry {
  return { id, content: `item-${id}`, pinned, sensitive: false, alias: null, createdAt };
}

const T1 = '2024-01-01T10:00:00.000Z';
const T2 = '2024-01-01T10:00:01.000Z';
const T3 = '2024-01-01T10:00:02.000Z';
const T4 = '2024-01-01T10:00:03.000Z';

const ids = (entries: Entry[]) => entries.map((e) => e.id);

// =============================================================================
// Ordering
// =============================================================================
describe('compareRecency', () => {
  it('puts newer createdAt first', () => {
    const sorted = [entry(1, T1), entry(2, T3), entry(3, T2)].sort(compareRecency);
    expect(ids(sorted)).toEqual([2, 3, 1]);
  });

  it('breaks createdAt ties by higher id first', () => {
    const sorted = [entry(4, T1), entry(6, T1), entry(5, T1)].sort(compareRecency);
    expect(ids(sorted)).toEqual([6, 5, 4]);
  });
});

describe('compareDisplayOrder', () => {
  it('lists pinned entries before unpinned, each newest first', () => {
    const sorted = [entry(1, T1, true), entry(2, T2), entry(3, T3, true), entry(4, T4)].sort(compareDisplayOrder);
    expect(ids(sorted)).toEqual([3, 1, 4, 2]);
  });
});

// =============================================================================
// planRetention
// =============================================================================
describe('planRetention', () => {
  it('keeps everything when under the ceiling', () => {
    const plan = planRetention([entry(1, T1), entry(2, T2)], 5);
    expect(ids(plan.keep)).toEqual([2, 1]);
    expect(plan.evict).toEqual([]);
  });

  it('evicts the oldest unpinned entries beyond the ceiling', () => {
    const plan = planRetention([entry(1, T1), entry(2, T2), entry(3, T3)], 2);
    expect(ids(plan.keep)).toEqual([3, 2]);
    expect(ids(plan.evict)).toEqual([1]);
  });

  it('never evicts pinned entries and does not count them', () => {
    const plan = planRetention([entry(1, T1, true), entry(2, T2), entry(3, T3), entry(4, T4)], 2);
    expect(ids(plan.keep)).toEqual([1, 4, 3]);
    expect(ids(plan.evict)).toEqual([2]);
  });

  it('keeps pinned entries even when the ceiling is zero', () => {
    const plan = planRetention([entry(1, T1, true), entry(2, T2)], 0);
    expect(ids(plan.keep)).toEqual([1]);
    expect(ids(plan.evict)).toEqual([2]);
  });

  it('uses insertion order when timestamps collide', () => {
    const plan = planRetention([entry(1, T1), entry(2, T1), entry(3, T1)], 2);
    expect(ids(plan.keep)).toEqual([3, 2]);
    expect(ids(plan.evict)).toEqual([1]);
  });

  it('floors fractional ceilings and treats non-finite ones as zero', () => {
    const entries = [entry(1, T1), entry(2, T2), entry(3, T3)];
    expect(ids(planRetention(entries, 2.9).keep)).toEqual([3, 2]);
    expect(planRetention(entries, Number.NaN).keep).toEqual([]);
    expect(planRetention(entries, -3).evict).toHaveLength(3);
  });

  it('is idempotent: planning over the kept set evicts nothing', () => {
    const entries = [entry(1, T1), entry(2, T2, true), entry(3, T3), entry(4, T4)];
    const first = planRetention(entries, 1);
    const second = planRetention(first.keep, 1);
    expect(second.evict).toEqual([]);
    expect(ids(second.keep)).toEqual(ids(first.keep));
  });

  it('does not mutate its input', () => {
    const entries = [entry(1, T1), entry(2, T2)];
    planRetention(entries, 1);
    expect(ids(entries)).toEqual([1, 2]);
  });
});
