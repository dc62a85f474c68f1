import type { ItemSelector, StatusWrite, WorkItem } from '../pipeline/types.js';

/** Read side of the item store, all the aggregator needs */
export interface ItemReader {
  /** Every item matching the selector, as one snapshot */
  readItems(selector: ItemSelector): Promise<WorkItem[]>;
  /** The same items in chunks of at most `chunkSize` */
  streamItems(selector: ItemSelector, chunkSize: number): AsyncIterable<WorkItem[]>;
}

export interface ItemStore extends ItemReader {
  /**
   * Move the listed items to `status` in one write. Returns how many items
   * were updated; unknown ids are ignored.
   */
  writeStatus(write: StatusWrite): Promise<number>;
}

export function matchesSelector(item: WorkItem, selector: ItemSelector): boolean {
  if (item.trackId !== selector.trackId) {
    return false;
  }
  if (selector.model !== undefined && item.model !== selector.model) {
    return false;
  }
  if (selector.groupKey) {
    const key = selector.groupKey;
    return item.groupKey.length === key.length && item.groupKey.every((value, i) => value === key[i]);
  }
  return true;
}

/**
 * Apply a status write to one item, stamping the field that belongs to the
 * target status.
 */
export function applyStatusWrite(item: WorkItem, write: StatusWrite): WorkItem {
  const next: WorkItem = { ...item, status: write.status };

  switch (write.status) {
    case 'ANNOTATED':
      next.annotatedAt = write.at;
      next.annotatorId = write.actorId ?? item.annotatorId;
      break;
    case 'VALIDATED':
      next.validatedAt = write.at;
      next.validatorId = write.actorId ?? item.validatorId;
      break;
    case 'PUBLISHED':
      next.publishedAt = write.at;
      break;
    case 'PUBLISH_FAILED':
      next.publishFailure = { reason: write.reason ?? 'unknown', at: write.at };
      break;
    case 'PENDING':
    case 'LOADED':
      break;
  }

  return next;
}

/**
 * Item store held in memory. Used when embedding the pipeline and in tests.
 */
export class InMemoryItemStore implements ItemStore {
  private items: Map<string, WorkItem> = new Map();
  private reads = 0;

  constructor(items: Iterable<WorkItem> = []) {
    for (const item of items) {
      this.items.set(item.id, item);
    }
  }

  async readItems(selector: ItemSelector): Promise<WorkItem[]> {
    this.reads++;
    return Array.from(this.items.values()).filter((item) => matchesSelector(item, selector));
  }

  async *streamItems(selector: ItemSelector, chunkSize: number): AsyncIterable<WorkItem[]> {
    this.reads++;
    let chunk: WorkItem[] = [];
    for (const item of this.items.values()) {
      if (!matchesSelector(item, selector)) continue;
      chunk.push(item);
      if (chunk.length >= chunkSize) {
        yield chunk;
        chunk = [];
      }
    }
    if (chunk.length > 0) {
      yield chunk;
    }
  }

  async writeStatus(write: StatusWrite): Promise<number> {
    let updated = 0;
    for (const id of write.ids) {
      const item = this.items.get(id);
      if (!item) continue;
      this.items.set(id, applyStatusWrite(item, write));
      updated++;
    }
    return updated;
  }

  getItem(id: string): WorkItem | undefined {
    return this.items.get(id);
  }

  /** Number of reads served so far */
  get readCount(): number {
    return this.reads;
  }
}
