/**
 * PublishOrchestrator - publishes eligible groups and moves their items
 *
 * One attempt per group at a time:
 * 1. Check eligibility from a fresh read (VALIDATED or PUBLISH_FAILED, no
 *    unresolved attempt)
 * 2. Take the group's lease, then check again under it
 * 3. Record the attempt as IN_FLIGHT, call the publisher with a timeout
 * 4. Success -> items PUBLISHED, failure -> items PUBLISH_FAILED,
 *    timeout or unknown outcome -> attempt UNCERTAIN, items untouched
 *
 * Nothing is retried here; FAILED and UNCERTAIN groups wait for a person.
 */

import { logger } from '../utils/logger.js';
import { aggregateItems, groupIdentity, type ProgressAggregator } from '../pipeline/aggregator.js';
import { LeaseUnavailableError, PublishAmbiguousOutcomeError, describeGroup } from '../pipeline/errors.js';
import { isPublishable } from '../pipeline/status-resolver.js';
import { publishActionToken } from '../pipeline/token.js';
import type { Group, GroupRef, PublishAttempt, ResolvedStatus, WorkItem } from '../pipeline/types.js';
import type { AttemptLedger } from '../store/attempt-ledger.js';
import type { ItemStore } from '../store/item-store.js';
import type { ContentionMode, Lease, LeaseManager } from './lease.js';
import type { Publisher, PublishOutcome, PublishPayload } from './publisher.js';

export type PublishRejection =
  | 'not-found'
  | 'ineligible'
  | 'attempt-unresolved'
  | 'lease-unavailable'
  | 'no-uncertain-attempt';

export type PublishResult =
  | { outcome: 'published'; ref: GroupRef; itemIds: string[]; publishedAt: Date; reference?: string }
  | { outcome: 'failed'; ref: GroupRef; itemIds: string[]; reason: string }
  | { outcome: 'uncertain'; ref: GroupRef; reason: string }
  | {
      outcome: 'rejected';
      ref: GroupRef;
      rejection: PublishRejection;
      resolvedStatus: ResolvedStatus | null;
      message: string;
    };

export interface PublishOrchestratorOptions {
  store: ItemStore;
  aggregator: ProgressAggregator;
  ledger: AttemptLedger;
  leases: LeaseManager;
  publisher: Publisher;
  timeoutMs?: number;
  contention?: ContentionMode;
  leaseWaitMs?: number;
  now?: () => Date;
}

type EligibilityCheck =
  | { eligible: true; group: Group; items: WorkItem[] }
  | { eligible: false; result: PublishResult };

function rejected(
  ref: GroupRef,
  rejection: PublishRejection,
  resolvedStatus: ResolvedStatus | null,
  message: string
): PublishResult {
  return { outcome: 'rejected', ref, rejection, resolvedStatus, message };
}

export function isUnresolved(attempt: PublishAttempt | null): boolean {
  return attempt !== null && (attempt.state === 'IN_FLIGHT' || attempt.state === 'UNCERTAIN');
}

export class PublishOrchestrator {
  private readonly store: ItemStore;
  private readonly aggregator: ProgressAggregator;
  private readonly ledger: AttemptLedger;
  private readonly leases: LeaseManager;
  private readonly publisher: Publisher;
  private readonly timeoutMs: number;
  private readonly contention: ContentionMode;
  private readonly leaseWaitMs: number;
  private readonly now: () => Date;

  constructor(options: PublishOrchestratorOptions) {
    this.store = options.store;
    this.aggregator = options.aggregator;
    this.ledger = options.ledger;
    this.leases = options.leases;
    this.publisher = options.publisher;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.contention = options.contention ?? 'wait';
    this.leaseWaitMs = options.leaseWaitMs ?? 60000;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Publish one group. Ineligible groups are rejected before any lease is
   * taken or any external call is made.
   */
  async publish(ref: GroupRef): Promise<PublishResult> {
    const label = describeGroup(ref.trackId, ref.groupKey);

    const precheck = await this.checkEligibility(ref);
    if (!precheck.eligible) {
      logger.info('Publish rejected', { group: label, result: precheck.result });
      return precheck.result;
    }

    return this.withLease(ref, async () => {
      // Another caller may have published while we waited
      const check = await this.checkEligibility(ref);
      if (!check.eligible) {
        logger.info('Publish rejected after acquiring lease', { group: label, result: check.result });
        return check.result;
      }
      return this.runAttempt(ref, check.group, check.items);
    });
  }

  /**
   * Record the verified outcome of an UNCERTAIN attempt and move the
   * attempt's items accordingly.
   */
  async resolveUncertain(ref: GroupRef, outcome: 'published' | 'failed', reason?: string): Promise<PublishResult> {
    return this.withLease(ref, async () => {
      const attempt = await this.ledger.get(ref);
      if (!attempt || attempt.state !== 'UNCERTAIN') {
        return rejected(ref, 'no-uncertain-attempt', null, 'Group has no uncertain publish attempt');
      }

      const at = this.now();
      const note = reason ?? 'confirmed manually';

      if (outcome === 'published') {
        await this.store.writeStatus({ ids: attempt.itemIds, status: 'PUBLISHED', at });
        await this.ledger.record({ ...attempt, state: 'SUCCEEDED', finishedAt: at, reason: note });
        logger.info('Uncertain publish resolved as published', { group: describeGroup(ref.trackId, ref.groupKey) });
        return { outcome: 'published', ref, itemIds: attempt.itemIds, publishedAt: at };
      }

      await this.store.writeStatus({ ids: attempt.itemIds, status: 'PUBLISH_FAILED', at, reason: note });
      await this.ledger.record({ ...attempt, state: 'FAILED', finishedAt: at, reason: note });
      logger.info('Uncertain publish resolved as failed', { group: describeGroup(ref.trackId, ref.groupKey) });
      return { outcome: 'failed', ref, itemIds: attempt.itemIds, reason: note };
    });
  }

  /**
   * Turn IN_FLIGHT attempts nobody holds a lease for into UNCERTAIN. Run at
   * start-up: such attempts belong to a process that stopped mid-call.
   */
  async recoverInFlight(): Promise<PublishAttempt[]> {
    const recovered: PublishAttempt[] = [];
    for (const attempt of await this.ledger.list({ state: 'IN_FLIGHT' })) {
      if (await this.leases.isHeld(groupIdentity(attempt))) {
        continue;
      }
      const updated: PublishAttempt = {
        ...attempt,
        state: 'UNCERTAIN',
        finishedAt: this.now(),
        reason: 'interrupted before the outcome was recorded',
      };
      await this.ledger.record(updated);
      recovered.push(updated);
    }

    if (recovered.length > 0) {
      logger.warn('Interrupted publish attempts marked uncertain', {
        groups: recovered.map((attempt) => describeGroup(attempt.trackId, attempt.groupKey)),
      });
    }
    return recovered;
  }

  getAttempt(ref: GroupRef): Promise<PublishAttempt | null> {
    return this.ledger.get(ref);
  }

  private async withLease(ref: GroupRef, work: () => Promise<PublishResult>): Promise<PublishResult> {
    const key = groupIdentity(ref);
    let lease: Lease;
    try {
      lease = await this.leases.acquire(key, { mode: this.contention, waitTimeoutMs: this.leaseWaitMs });
    } catch (err) {
      if (err instanceof LeaseUnavailableError) {
        return rejected(ref, 'lease-unavailable', null, err.message);
      }
      throw err;
    }

    try {
      return await work();
    } finally {
      await lease.release();
    }
  }

  private async checkEligibility(ref: GroupRef): Promise<EligibilityCheck> {
    const track = this.aggregator.getTrack(ref.trackId);
    const items = await this.store.readItems({ trackId: ref.trackId, groupKey: ref.groupKey });
    const [group] = aggregateItems(track, items);

    if (!group) {
      return { eligible: false, result: rejected(ref, 'not-found', null, 'Group has no items') };
    }

    if (!isPublishable(group.resolvedStatus)) {
      return {
        eligible: false,
        result: rejected(ref, 'ineligible', group.resolvedStatus, `Group is ${group.resolvedStatus}`),
      };
    }

    const attempt = await this.ledger.get(ref);
    if (isUnresolved(attempt)) {
      return {
        eligible: false,
        result: rejected(
          ref,
          'attempt-unresolved',
          group.resolvedStatus,
          'Previous publish attempt has an unknown outcome; resolve it before publishing again'
        ),
      };
    }

    return { eligible: true, group, items };
  }

  private async runAttempt(ref: GroupRef, group: Group, items: WorkItem[]): Promise<PublishResult> {
    const label = describeGroup(ref.trackId, ref.groupKey);
    const itemIds = items.map((item) => item.id);
    const attempt: PublishAttempt = {
      trackId: ref.trackId,
      groupKey: [...ref.groupKey],
      state: 'IN_FLIGHT',
      startedAt: this.now(),
      finishedAt: null,
      reason: null,
      itemIds,
    };
    await this.ledger.record(attempt);

    const payload: PublishPayload = {
      token: publishActionToken(group),
      trackId: ref.trackId,
      groupKey: ref.groupKey,
      items: items.map((item) => ({ id: item.id, payload: item.payload })),
    };

    logger.info('Publishing group', { group: label, items: itemIds.length, status: group.resolvedStatus });

    let outcome: PublishOutcome;
    try {
      outcome = await this.callWithTimeout(payload);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      if (err instanceof PublishAmbiguousOutcomeError) {
        await this.ledger.record({ ...attempt, state: 'UNCERTAIN', finishedAt: this.now(), reason });
        logger.warn('Publish outcome unknown; group needs manual verification', { group: label, reason });
        return { outcome: 'uncertain', ref, reason };
      }
      outcome = { ok: false, reason };
    }

    const finishedAt = this.now();

    if (!outcome.ok) {
      try {
        await this.store.writeStatus({ ids: itemIds, status: 'PUBLISH_FAILED', at: finishedAt, reason: outcome.reason });
      } catch (err) {
        // The group was not published, so it may be published again
        const reason = `${outcome.reason}; item statuses were not written: ${err instanceof Error ? err.message : String(err)}`;
        await this.ledger.record({ ...attempt, state: 'FAILED', finishedAt, reason });
        logger.error('Publish failed and status write failed', { group: label, error: reason });
        throw err;
      }
      await this.ledger.record({ ...attempt, state: 'FAILED', finishedAt, reason: outcome.reason });
      logger.error('Publish failed', { group: label, reason: outcome.reason });
      return { outcome: 'failed', ref, itemIds, reason: outcome.reason };
    }

    try {
      await this.store.writeStatus({ ids: itemIds, status: 'PUBLISHED', at: finishedAt });
    } catch (err) {
      const reason = `published, but item statuses were not written: ${err instanceof Error ? err.message : String(err)}`;
      await this.ledger.record({ ...attempt, state: 'UNCERTAIN', finishedAt, reason });
      logger.error('Publish succeeded but status write failed', { group: label, error: reason });
      throw err;
    }

    await this.ledger.record({ ...attempt, state: 'SUCCEEDED', finishedAt, reason: outcome.reference ?? null });
    logger.info('Group published', { group: label, items: itemIds.length, reference: outcome.reference });
    return { outcome: 'published', ref, itemIds, publishedAt: finishedAt, reference: outcome.reference };
  }

  private async callWithTimeout(payload: PublishPayload): Promise<PublishOutcome> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const call = this.publisher.publish(payload, { signal: controller.signal });
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new PublishAmbiguousOutcomeError(`Publish timed out after ${this.timeoutMs}ms`));
        controller.abort();
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([call, timeout]);
    } finally {
      clearTimeout(timer);
      if (controller.signal.aborted) {
        void call.then(
          (late) => logger.warn('Publish settled after timeout', { token: payload.token, outcome: late }),
          (err: unknown) => logger.warn('Publish settled after timeout', { token: payload.token, error: String(err) })
        );
      }
    }
  }
}
