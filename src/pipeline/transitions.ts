import { logger } from '../utils/logger.js';
import type { ItemStatus, WorkItem } from './types.js';
import type { ItemStore } from '../store/item-store.js';

/** Source states each reviewer transition accepts */
const ALLOWED_SOURCES: Record<'ANNOTATED' | 'VALIDATED', ReadonlySet<ItemStatus>> = {
  ANNOTATED: new Set<ItemStatus>(['PENDING', 'LOADED', 'ANNOTATED']),
  VALIDATED: new Set<ItemStatus>(['ANNOTATED', 'VALIDATED']),
};

export interface TransitionResult {
  updated: string[];
  skipped: Array<{ id: string; status: ItemStatus | null }>;
}

/**
 * Reviewer transitions on work items: annotation and validation. Items
 * not in an accepted source state are reported back, not moved.
 */
export class ItemTransitions {
  constructor(private readonly store: ItemStore) {}

  annotate(trackId: number, itemIds: readonly string[], annotatorId: string, at: Date = new Date()): Promise<TransitionResult> {
    return this.transition(trackId, itemIds, 'ANNOTATED', annotatorId, at);
  }

  validate(trackId: number, itemIds: readonly string[], validatorId: string, at: Date = new Date()): Promise<TransitionResult> {
    return this.transition(trackId, itemIds, 'VALIDATED', validatorId, at);
  }

  private async transition(
    trackId: number,
    itemIds: readonly string[],
    target: 'ANNOTATED' | 'VALIDATED',
    actorId: string,
    at: Date
  ): Promise<TransitionResult> {
    const wanted = new Set(itemIds);
    const items = new Map<string, WorkItem>();
    for (const item of await this.store.readItems({ trackId })) {
      if (wanted.has(item.id)) {
        items.set(item.id, item);
      }
    }

    const result: TransitionResult = { updated: [], skipped: [] };
    for (const id of wanted) {
      const item = items.get(id);
      if (item && ALLOWED_SOURCES[target].has(item.status)) {
        result.updated.push(id);
      } else {
        result.skipped.push({ id, status: item?.status ?? null });
      }
    }

    if (result.updated.length > 0) {
      await this.store.writeStatus({ ids: result.updated, status: target, at, actorId });
    }

    logger.info(`Items moved to ${target}`, {
      trackId,
      actorId,
      updated: result.updated.length,
      skipped: result.skipped.length,
    });

    return result;
  }
}
