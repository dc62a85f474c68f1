/**
 * Status resolution - maps a group's per-status percentages to one label.
 *
 * Rules are evaluated in order and the first match wins. A nonzero publish
 * failure outranks everything, including a group that is otherwise fully
 * validated. A stage label requires the whole group (100%) to be in it;
 * anything mixed is WIP.
 */

import type { ResolvedStatus, StatusTotals } from './types.js';

/** Percentages that take part in resolution; LOADED does not */
export interface StatusPercentages {
  pending: number;
  annotated: number;
  validated: number;
  published: number;
  publishFailed: number;
}

export interface ResolutionRule {
  status: Exclude<ResolvedStatus, 'WIP'>;
  matches: (percentages: StatusPercentages) => boolean;
}

export const RESOLUTION_RULES: readonly ResolutionRule[] = [
  { status: 'PUBLISH_FAILED', matches: (p) => p.publishFailed > 0 },
  { status: 'PENDING', matches: (p) => p.pending === 100 },
  { status: 'ANNOTATED', matches: (p) => p.annotated === 100 },
  { status: 'VALIDATED', matches: (p) => p.validated === 100 },
  { status: 'PUBLISHED', matches: (p) => p.published === 100 },
];

/** Statuses from which a group may be published */
export const PUBLISHABLE_STATUSES: ReadonlySet<ResolvedStatus> = new Set<ResolvedStatus>([
  'VALIDATED',
  'PUBLISH_FAILED',
]);

export function resolveStatus(percentages: StatusPercentages): ResolvedStatus {
  const rule = RESOLUTION_RULES.find((candidate) => candidate.matches(percentages));
  return rule ? rule.status : 'WIP';
}

export function toStatusPercentages(percentages: StatusTotals): StatusPercentages {
  return {
    pending: percentages.PENDING,
    annotated: percentages.ANNOTATED,
    validated: percentages.VALIDATED,
    published: percentages.PUBLISHED,
    publishFailed: percentages.PUBLISH_FAILED,
  };
}

export function isPublishable(status: ResolvedStatus): boolean {
  return PUBLISHABLE_STATUSES.has(status);
}
