import { describe, it, expect } from 'vitest';
import { ProgressAggregator } from '../../src/pipeline/aggregator.js';
import { PublishOrchestrator } from '../../src/publish/orchestrator.js';
import { InProcessLeaseManager, type LeaseManager } from '../../src/publish/lease.js';
import { InMemoryItemStore } from '../../src/store/item-store.js';
import { InMemoryAttemptLedger } from '../../src/store/attempt-ledger.js';
import { PublishTransportError } from '../../src/pipeline/errors.js';
import type { Publisher, PublishOutcome } from '../../src/publish/publisher.js';
import type { ItemStatus, StatusWrite } from '../../src/pipeline/types.js';
import { TRACK, makeItem } from '../helpers/fixtures.js';
import { ScriptedPublisher, hanging, rejecting, succeeding } from '../helpers/publishers.js';

const REF = { trackId: TRACK.id, groupKey: ['A', 'B'] };
const NOW = new Date('2024-09-01T12:00:00.000Z');

function groupItems(status: ItemStatus) {
  return [
    makeItem('g1', { groupKey: ['A', 'B'], status, wordCount: 4 }),
    makeItem('g2', { groupKey: ['A', 'B'], status, wordCount: 6 }),
    makeItem('other', { groupKey: ['Z'], status, wordCount: 3 }),
  ];
}

function setup(
  publisher: Publisher,
  options: { status?: ItemStatus; timeoutMs?: number; contention?: 'wait' | 'reject'; leases?: LeaseManager } = {}
) {
  const store = new InMemoryItemStore(groupItems(options.status ?? 'VALIDATED'));
  const ledger = new InMemoryAttemptLedger();
  const leases = options.leases ?? new InProcessLeaseManager();
  const orchestrator = new PublishOrchestrator({
    store,
    aggregator: new ProgressAggregator(store, [TRACK]),
    ledger,
    leases,
    publisher,
    timeoutMs: options.timeoutMs ?? 1000,
    contention: options.contention,
    now: () => NOW,
  });
  return { store, ledger, leases, orchestrator };
}

describe('PublishOrchestrator', () => {
  describe('eligibility', () => {
    it('should reject a group that is not validated without calling the publisher', async () => {
      const publisher = succeeding();
      const { orchestrator, store, ledger } = setup(publisher, { status: 'ANNOTATED' });

      const result = await orchestrator.publish(REF);

      expect(result).toEqual({
        outcome: 'rejected',
        ref: REF,
        rejection: 'ineligible',
        resolvedStatus: 'ANNOTATED',
        message: 'Group is ANNOTATED',
      });
      expect(publisher.calls).toHaveLength(0);
      expect(store.getItem('g1')?.status).toBe('ANNOTATED');
      expect(await ledger.get(REF)).toBeNull();
    });

    it('should reject a group with no items', async () => {
      const publisher = succeeding();
      const { orchestrator } = setup(publisher);

      const result = await orchestrator.publish({ trackId: TRACK.id, groupKey: ['missing'] });

      expect(result.outcome).toBe('rejected');
      expect(result.outcome === 'rejected' && result.rejection).toBe('not-found');
      expect(publisher.calls).toHaveLength(0);
    });

    it('should reject an already published group', async () => {
      const publisher = succeeding();
      const { orchestrator } = setup(publisher, { status: 'PUBLISHED' });

      const result = await orchestrator.publish(REF);

      expect(result.outcome === 'rejected' && result.rejection).toBe('ineligible');
      expect(publisher.calls).toHaveLength(0);
    });
  });

  describe('outcomes', () => {
    it('should mark every item of the group published on success', async () => {
      const publisher = succeeding('release-42');
      const { orchestrator, store, ledger } = setup(publisher);

      const result = await orchestrator.publish(REF);

      expect(result).toEqual({
        outcome: 'published',
        ref: REF,
        itemIds: ['g1', 'g2'],
        publishedAt: NOW,
        reference: 'release-42',
      });
      expect(store.getItem('g1')?.status).toBe('PUBLISHED');
      expect(store.getItem('g2')?.publishedAt).toEqual(NOW);
      expect(store.getItem('other')?.status).toBe('VALIDATED');
      expect((await ledger.get(REF))?.state).toBe('SUCCEEDED');
    });

    it('should send the token and item payloads', async () => {
      const publisher = succeeding();
      const { orchestrator } = setup(publisher);

      await orchestrator.publish(REF);

      expect(publisher.calls).toHaveLength(1);
      expect(publisher.calls[0].token).toBe('publishaction;A;B;7');
      expect(publisher.calls[0].items.map((item) => item.id)).toEqual(['g1', 'g2']);
    });

    it('should mark every item failed on an explicit rejection', async () => {
      const publisher = rejecting('HTTP 422: bad payload');
      const { orchestrator, store, ledger } = setup(publisher);

      const result = await orchestrator.publish(REF);

      expect(result).toEqual({ outcome: 'failed', ref: REF, itemIds: ['g1', 'g2'], reason: 'HTTP 422: bad payload' });
      expect(store.getItem('g1')?.status).toBe('PUBLISH_FAILED');
      expect(store.getItem('g2')?.publishFailure).toEqual({ reason: 'HTTP 422: bad payload', at: NOW });
      expect((await ledger.get(REF))?.state).toBe('FAILED');
    });

    it('should treat a transport error as a failure', async () => {
      const publisher = new ScriptedPublisher(async () => {
        throw new PublishTransportError('connection refused');
      });
      const { orchestrator, store } = setup(publisher);

      const result = await orchestrator.publish(REF);

      expect(result).toEqual({ outcome: 'failed', ref: REF, itemIds: ['g1', 'g2'], reason: 'connection refused' });
      expect(store.getItem('g1')?.status).toBe('PUBLISH_FAILED');
    });

    it('should allow a failed group to be published again', async () => {
      let attempts = 0;
      const publisher = new ScriptedPublisher(
        async (): Promise<PublishOutcome> => (++attempts === 1 ? { ok: false, reason: 'busy' } : { ok: true })
      );
      const { orchestrator, store } = setup(publisher);

      expect((await orchestrator.publish(REF)).outcome).toBe('failed');
      expect((await orchestrator.publish(REF)).outcome).toBe('published');
      expect(store.getItem('g1')?.status).toBe('PUBLISHED');
      expect(store.getItem('g1')?.publishFailure).toEqual({ reason: 'busy', at: NOW });
    });
  });

  describe('uncertain outcomes', () => {
    it('should leave items untouched and record UNCERTAIN on timeout', async () => {
      const publisher = hanging();
      const { orchestrator, store, ledger } = setup(publisher, { timeoutMs: 20 });

      const result = await orchestrator.publish(REF);

      expect(result).toEqual({ outcome: 'uncertain', ref: REF, reason: 'Publish timed out after 20ms' });
      expect(store.getItem('g1')?.status).toBe('VALIDATED');
      expect(await ledger.get(REF)).toMatchObject({ state: 'UNCERTAIN', reason: 'Publish timed out after 20ms' });
    });

    it('should block further publishes until the outcome is resolved', async () => {
      const publisher = hanging();
      const { orchestrator } = setup(publisher, { timeoutMs: 20 });
      await orchestrator.publish(REF);

      const result = await orchestrator.publish(REF);

      expect(result.outcome === 'rejected' && result.rejection).toBe('attempt-unresolved');
      expect(publisher.calls).toHaveLength(1);
    });

    it('should resolve an uncertain attempt as published', async () => {
      const { orchestrator, store, ledger } = setup(hanging(), { timeoutMs: 20 });
      await orchestrator.publish(REF);

      const result = await orchestrator.resolveUncertain(REF, 'published');

      expect(result).toEqual({ outcome: 'published', ref: REF, itemIds: ['g1', 'g2'], publishedAt: NOW });
      expect(store.getItem('g2')?.status).toBe('PUBLISHED');
      expect(await ledger.get(REF)).toMatchObject({ state: 'SUCCEEDED', reason: 'confirmed manually' });
    });

    it('should resolve an uncertain attempt as failed and allow a new publish', async () => {
      let calls = 0;
      const timeoutThenSucceed = new ScriptedPublisher((payload, signal) =>
        ++calls === 1 ? hanging().publish(payload, { signal }) : Promise.resolve<PublishOutcome>({ ok: true })
      );
      const { orchestrator, store } = setup(timeoutThenSucceed, { timeoutMs: 20 });
      await orchestrator.publish(REF);

      const resolved = await orchestrator.resolveUncertain(REF, 'failed', 'not found downstream');
      expect(resolved).toEqual({ outcome: 'failed', ref: REF, itemIds: ['g1', 'g2'], reason: 'not found downstream' });
      expect(store.getItem('g1')?.status).toBe('PUBLISH_FAILED');

      expect((await orchestrator.publish(REF)).outcome).toBe('published');
    });

    it('should refuse to resolve a group without an uncertain attempt', async () => {
      const { orchestrator } = setup(succeeding());

      const result = await orchestrator.resolveUncertain(REF, 'published');

      expect(result.outcome === 'rejected' && result.rejection).toBe('no-uncertain-attempt');
    });

    it('should mark a success whose status write fails as uncertain', async () => {
      const { orchestrator, store, ledger } = setup(succeeding());
      const write = store.writeStatus.bind(store);
      store.writeStatus = async (request: StatusWrite) => {
        if (request.status === 'PUBLISHED') {
          throw new Error('disk full');
        }
        return write(request);
      };

      await expect(orchestrator.publish(REF)).rejects.toThrow('disk full');
      expect(await ledger.get(REF)).toMatchObject({
        state: 'UNCERTAIN',
        reason: 'published, but item statuses were not written: disk full',
      });
    });

    it('should close a failed attempt whose status write fails', async () => {
      const publisher = rejecting('HTTP 422: bad payload');
      const { orchestrator, store, ledger } = setup(publisher);
      const write = store.writeStatus.bind(store);
      store.writeStatus = async (request: StatusWrite) => {
        if (request.status === 'PUBLISH_FAILED') {
          throw new Error('disk full');
        }
        return write(request);
      };

      await expect(orchestrator.publish(REF)).rejects.toThrow('disk full');
      expect(await ledger.get(REF)).toMatchObject({
        state: 'FAILED',
        finishedAt: NOW,
        reason: 'HTTP 422: bad payload; item statuses were not written: disk full',
      });
      expect(store.getItem('g1')?.status).toBe('VALIDATED');

      store.writeStatus = write;
      const retry = await orchestrator.publish(REF);
      expect(retry.outcome).toBe('failed');
      expect(publisher.calls).toHaveLength(2);
      expect(store.getItem('g1')?.status).toBe('PUBLISH_FAILED');
    });
  });

  describe('recoverInFlight', () => {
    it('should mark abandoned in-flight attempts uncertain', async () => {
      const { orchestrator, ledger } = setup(succeeding());
      await ledger.record({
        ...REF,
        state: 'IN_FLIGHT',
        startedAt: new Date('2024-09-01T11:00:00.000Z'),
        finishedAt: null,
        reason: null,
        itemIds: ['g1', 'g2'],
      });

      const recovered = await orchestrator.recoverInFlight();

      expect(recovered).toHaveLength(1);
      expect(await ledger.get(REF)).toMatchObject({
        state: 'UNCERTAIN',
        finishedAt: NOW,
        reason: 'interrupted before the outcome was recorded',
      });
    });

    it('should leave attempts whose lease is held', async () => {
      const { orchestrator, ledger, leases } = setup(succeeding());
      await ledger.record({
        ...REF,
        state: 'IN_FLIGHT',
        startedAt: NOW,
        finishedAt: null,
        reason: null,
        itemIds: ['g1'],
      });
      await leases.acquire(JSON.stringify([REF.trackId, ...REF.groupKey]));

      expect(await orchestrator.recoverInFlight()).toEqual([]);
      expect((await ledger.get(REF))?.state).toBe('IN_FLIGHT');
    });
  });

  describe('concurrency', () => {
    it('should call the publisher once for simultaneous requests', async () => {
      const publisher = succeeding(undefined, 20);
      const { orchestrator, store } = setup(publisher);

      const results = await Promise.all([orchestrator.publish(REF), orchestrator.publish(REF)]);

      expect(publisher.calls).toHaveLength(1);
      expect(results.map((result) => result.outcome).sort()).toEqual(['published', 'rejected']);
      const loser = results.find((result) => result.outcome === 'rejected');
      expect(loser?.outcome === 'rejected' && loser.rejection).toBe('ineligible');
      expect(store.getItem('g1')?.status).toBe('PUBLISHED');
    });

    it('should reject the second caller in reject mode', async () => {
      const publisher = succeeding(undefined, 20);
      const { orchestrator } = setup(publisher, { contention: 'reject' });

      const results = await Promise.all([orchestrator.publish(REF), orchestrator.publish(REF)]);

      expect(publisher.calls).toHaveLength(1);
      const loser = results.find((result) => result.outcome === 'rejected');
      expect(loser?.outcome === 'rejected' && loser.rejection).toBe('lease-unavailable');
    });
  });
});
