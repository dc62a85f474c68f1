import type { ItemStatus, PublishFailure, TrackDefinition, WorkItem } from '../../src/pipeline/types.js';

export const TRACK: TrackDefinition = {
  id: 7,
  name: 'Docs EN-DE',
  fields: ['section', 'page', 'source', 'target'],
  groupKeyFields: ['section', 'page'],
  textField: 'source',
};

/** `count` distinct words */
export function words(count: number): string {
  return Array.from({ length: count }, (_, i) => `word${i}`).join(' ');
}

export interface ItemOverrides {
  groupKey?: string[];
  status?: ItemStatus;
  wordCount?: number;
  payload?: unknown;
  trackId?: number;
  model?: string;
  createdAt?: Date;
  annotatedAt?: Date | null;
  validatedAt?: Date | null;
  publishedAt?: Date | null;
  publishFailure?: PublishFailure | null;
}

export function makeItem(id: string, overrides: ItemOverrides = {}): WorkItem {
  const groupKey = overrides.groupKey ?? ['X'];
  return {
    id,
    groupKey,
    trackId: overrides.trackId ?? TRACK.id,
    model: overrides.model,
    payload: overrides.payload ?? { section: groupKey[0], source: words(overrides.wordCount ?? 10) },
    status: overrides.status ?? 'PENDING',
    createdAt: overrides.createdAt ?? new Date('2024-01-01T00:00:00.000Z'),
    annotatedAt: overrides.annotatedAt ?? null,
    validatedAt: overrides.validatedAt ?? null,
    publishedAt: overrides.publishedAt ?? null,
    publishFailure: overrides.publishFailure ?? null,
    annotatorId: null,
    validatorId: null,
  };
}
