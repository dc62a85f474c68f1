/**
 * Pipeline Types - work items, derived groups and the publish ledger
 */

/** Item states, in the order an item normally moves through them */
export const ITEM_STATUSES = [
  'PENDING',
  'LOADED',
  'ANNOTATED',
  'VALIDATED',
  'PUBLISHED',
  'PUBLISH_FAILED',
] as const;

export type ItemStatus = (typeof ITEM_STATUSES)[number];

/** Roll-up label of a group; WIP covers every mixed group */
export type ResolvedStatus =
  | 'PENDING'
  | 'ANNOTATED'
  | 'VALIDATED'
  | 'PUBLISHED'
  | 'PUBLISH_FAILED'
  | 'WIP';

/** Ordered tuple of a track's group key field values */
export type GroupKey = readonly string[];

export interface PublishFailure {
  reason: string;
  at: Date;
}

/** One unit of review/translation work */
export interface WorkItem {
  id: string;
  groupKey: GroupKey;
  trackId: number;
  model?: string;
  /** Raw payload as stored; validated against the track's field list on read */
  payload: unknown;
  status: ItemStatus;
  createdAt: Date;
  annotatedAt: Date | null;
  validatedAt: Date | null;
  publishedAt: Date | null;
  /** Latest failed publish; kept after a later success */
  publishFailure: PublishFailure | null;
  annotatorId: string | null;
  validatorId: string | null;
}

/** Per-track field layout */
export interface TrackDefinition {
  id: number;
  name: string;
  /** Ordered payload field list */
  fields: readonly string[];
  /** The "high-level key" subset, in key order */
  groupKeyFields: readonly string[];
  /** Field whose text is tokenized for word counts */
  textField: string;
}

/** Read filter for the item store */
export interface ItemSelector {
  trackId: number;
  model?: string;
  groupKey?: GroupKey;
}

/** Identity of a group */
export interface GroupRef {
  trackId: number;
  groupKey: GroupKey;
}

export type StatusTotals = Record<ItemStatus, number>;

/** Derived roll-up bucket; recomputed on demand, never stored */
export interface Group extends GroupRef {
  itemCount: number;
  totalWordCount: number;
  wordCounts: StatusTotals;
  percentages: StatusTotals;
  lastInsertion: Date;
  lastAnnotation: Date | null;
  resolvedStatus: ResolvedStatus;
  /** Resolved status allows publishing; attempt state is applied by reporting */
  publishEligible: boolean;
}

/** Batch status write accepted by the item store */
export interface StatusWrite {
  ids: readonly string[];
  status: ItemStatus;
  at: Date;
  reason?: string;
  actorId?: string;
}

export type AttemptState = 'IN_FLIGHT' | 'SUCCEEDED' | 'FAILED' | 'UNCERTAIN';

/** Ledger entry of one external publish call */
export interface PublishAttempt extends GroupRef {
  state: AttemptState;
  startedAt: Date;
  finishedAt: Date | null;
  reason: string | null;
  itemIds: string[];
}
