/**
 * ProgressAggregator - word-weighted roll-up of work items into groups
 *
 * Features:
 * - One store read per selector, one accumulation pass per read
 * - Chunked variant whose memory is bounded by the number of groups
 * - Malformed items count with zero words instead of failing the run
 * - Cancellation via AbortSignal; nothing is written either way
 */

import { logger } from '../utils/logger.js';
import { AggregationAbortedError, UnknownTrackError } from './errors.js';
import { resolveStatus, toStatusPercentages, isPublishable } from './status-resolver.js';
import { measureItem } from './word-count.js';
import { ITEM_STATUSES } from './types.js';
import type { Group, GroupKey, GroupRef, ItemSelector, StatusTotals, TrackDefinition, WorkItem } from './types.js';
import type { ItemReader } from '../store/item-store.js';

/** How many items the synchronous pass handles between abort checks */
const ABORT_CHECK_INTERVAL = 1024;

export interface AggregateOptions {
  signal?: AbortSignal;
}

export interface StreamAggregateOptions extends AggregateOptions {
  chunkSize?: number;
}

interface Bucket {
  trackId: number;
  groupKey: GroupKey;
  itemCount: number;
  totalWordCount: number;
  wordCounts: StatusTotals;
  lastInsertion: Date;
  lastAnnotation: Date | null;
}

export function emptyTotals(): StatusTotals {
  return {
    PENDING: 0,
    LOADED: 0,
    ANNOTATED: 0,
    VALIDATED: 0,
    PUBLISHED: 0,
    PUBLISH_FAILED: 0,
  };
}

export function toPercentage(part: number, total: number): number {
  if (total === 0) {
    return 0;
  }
  return Math.round(((part * 100) / total) * 100) / 100;
}

export function compareGroupKeys(a: GroupKey, b: GroupKey): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) {
      return a[i] < b[i] ? -1 : 1;
    }
  }
  return a.length - b.length;
}

/** Stable string identity of a (trackId, groupKey) pair */
export function groupIdentity(ref: GroupRef): string {
  return JSON.stringify([ref.trackId, ...ref.groupKey]);
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new AggregationAbortedError({ cause: signal.reason });
  }
}

/**
 * Accumulates items into group buckets. Holds one bucket per group and
 * nothing per item, so it can be fed chunk by chunk.
 */
export class GroupAccumulator {
  private buckets: Map<string, Bucket> = new Map();
  private itemsSeen = 0;
  private issues = 0;

  constructor(private readonly track: TrackDefinition) {}

  add(item: WorkItem): void {
    const { wordCount, issue } = measureItem(this.track, item);
    if (issue) {
      this.issues++;
      logger.debug('Item counted with zero words', { itemId: item.id, error: issue.message });
    }

    const key = groupIdentity(item);
    let bucket = this.buckets.get(key);
    if (!bucket) {
      bucket = {
        trackId: item.trackId,
        groupKey: [...item.groupKey],
        itemCount: 0,
        totalWordCount: 0,
        wordCounts: emptyTotals(),
        lastInsertion: item.createdAt,
        lastAnnotation: null,
      };
      this.buckets.set(key, bucket);
    }

    bucket.itemCount++;
    bucket.totalWordCount += wordCount;
    bucket.wordCounts[item.status] += wordCount;
    if (item.createdAt > bucket.lastInsertion) {
      bucket.lastInsertion = item.createdAt;
    }
    if (item.annotatedAt && (!bucket.lastAnnotation || item.annotatedAt > bucket.lastAnnotation)) {
      bucket.lastAnnotation = item.annotatedAt;
    }
    this.itemsSeen++;
  }

  get itemCount(): number {
    return this.itemsSeen;
  }

  get issueCount(): number {
    return this.issues;
  }

  finish(): Group[] {
    if (this.issues > 0) {
      logger.warn('Items with unreadable payloads counted with zero words', {
        trackId: this.track.id,
        count: this.issues,
      });
    }

    const groups: Group[] = [];
    for (const bucket of this.buckets.values()) {
      const percentages = emptyTotals();
      for (const status of ITEM_STATUSES) {
        percentages[status] = toPercentage(bucket.wordCounts[status], bucket.totalWordCount);
      }
      const resolvedStatus = resolveStatus(toStatusPercentages(percentages));
      groups.push({
        ...bucket,
        percentages,
        resolvedStatus,
        publishEligible: isPublishable(resolvedStatus),
      });
    }

    return groups.sort((a, b) => compareGroupKeys(a.groupKey, b.groupKey) || a.trackId - b.trackId);
  }
}

/** Aggregate an in-memory snapshot */
export function aggregateItems(
  track: TrackDefinition,
  items: Iterable<WorkItem>,
  options: AggregateOptions = {}
): Group[] {
  throwIfAborted(options.signal);
  const accumulator = new GroupAccumulator(track);
  let sinceCheck = 0;
  for (const item of items) {
    accumulator.add(item);
    if (++sinceCheck === ABORT_CHECK_INTERVAL) {
      sinceCheck = 0;
      throwIfAborted(options.signal);
    }
  }
  throwIfAborted(options.signal);
  return accumulator.finish();
}

/** Aggregate a chunked source in one pass */
export async function aggregateChunks(
  track: TrackDefinition,
  chunks: AsyncIterable<readonly WorkItem[]>,
  options: AggregateOptions = {}
): Promise<Group[]> {
  throwIfAborted(options.signal);
  const accumulator = new GroupAccumulator(track);
  for await (const chunk of chunks) {
    throwIfAborted(options.signal);
    for (const item of chunk) {
      accumulator.add(item);
    }
  }
  throwIfAborted(options.signal);
  return accumulator.finish();
}

export class ProgressAggregator {
  private tracks: Map<number, TrackDefinition>;

  constructor(
    private readonly store: ItemReader,
    tracks: readonly TrackDefinition[],
    private readonly defaultChunkSize: number = 1000
  ) {
    this.tracks = new Map(tracks.map((track) => [track.id, track]));
  }

  getTrack(trackId: number): TrackDefinition {
    const track = this.tracks.get(trackId);
    if (!track) {
      throw new UnknownTrackError(trackId);
    }
    return track;
  }

  /**
   * Load the selector's items once and roll them up.
   */
  async aggregate(selector: ItemSelector, options: AggregateOptions = {}): Promise<Group[]> {
    const track = this.getTrack(selector.trackId);
    const startTime = Date.now();
    const items = await this.store.readItems(selector);
    const groups = aggregateItems(track, items, options);

    logger.debug('Aggregated track snapshot', {
      trackId: selector.trackId,
      model: selector.model,
      items: items.length,
      groups: groups.length,
      durationMs: Date.now() - startTime,
    });

    return groups;
  }

  /**
   * Roll up the selector's items chunk by chunk.
   */
  async aggregateStream(selector: ItemSelector, options: StreamAggregateOptions = {}): Promise<Group[]> {
    const track = this.getTrack(selector.trackId);
    const chunkSize = options.chunkSize ?? this.defaultChunkSize;
    const groups = await aggregateChunks(track, this.store.streamItems(selector, chunkSize), options);

    logger.debug('Aggregated track stream', {
      trackId: selector.trackId,
      chunkSize,
      groups: groups.length,
    });

    return groups;
  }

  /** Aggregate independent selectors concurrently, results in input order */
  async aggregateMany(selectors: readonly ItemSelector[], options: AggregateOptions = {}): Promise<Group[][]> {
    return Promise.all(selectors.map((selector) => this.aggregate(selector, options)));
  }

  /** Load and roll up a single group */
  async aggregateGroup(trackId: number, groupKey: GroupKey): Promise<Group | null> {
    const groups = await this.aggregate({ trackId, groupKey });
    return groups.find((group) => compareGroupKeys(group.groupKey, groupKey) === 0) ?? null;
  }
}
