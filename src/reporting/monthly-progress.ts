import type { WorkItem } from '../pipeline/types.js';

export type MilestoneStatus = 'ANNOTATED' | 'VALIDATED' | 'PUBLISHED' | 'PUBLISH_FAILED';

export interface MonthlyProgress {
  /** `YYYY-MM`, UTC */
  month: string;
  counts: Record<MilestoneStatus, number>;
}

export function monthKey(date: Date): string {
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  return `${date.getUTCFullYear()}-${month}`;
}

function milestones(item: WorkItem): Array<[MilestoneStatus, Date | null]> {
  return [
    ['ANNOTATED', item.annotatedAt],
    ['VALIDATED', item.validatedAt],
    ['PUBLISHED', item.publishedAt],
    ['PUBLISH_FAILED', item.publishFailure?.at ?? null],
  ];
}

/**
 * Count, per calendar month, the items that reached each milestone in that
 * month. An item counts once per milestone it has a timestamp for, so one
 * item can appear under several statuses and months. Months ascend.
 *
 * PUBLISH_FAILED counts each item's latest failure. A later successful
 * publish leaves that failure in place; a later failure replaces it.
 */
export function monthlyProgress(items: Iterable<WorkItem>): MonthlyProgress[] {
  const buckets = new Map<string, Record<MilestoneStatus, number>>();

  for (const item of items) {
    for (const [status, at] of milestones(item)) {
      if (!at) continue;
      const key = monthKey(at);
      let counts = buckets.get(key);
      if (!counts) {
        counts = { ANNOTATED: 0, VALIDATED: 0, PUBLISHED: 0, PUBLISH_FAILED: 0 };
        buckets.set(key, counts);
      }
      counts[status]++;
    }
  }

  return Array.from(buckets.entries())
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([month, counts]) => ({ month, counts }));
}
