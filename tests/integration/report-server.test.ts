import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ReportServer } from '../../src/server.js';
import { ProgressAggregator } from '../../src/pipeline/aggregator.js';
import { ProgressReporter } from '../../src/reporting/group-report.js';
import { PublishOrchestrator } from '../../src/publish/orchestrator.js';
import { InProcessLeaseManager } from '../../src/publish/lease.js';
import { InMemoryItemStore } from '../../src/store/item-store.js';
import { InMemoryAttemptLedger } from '../../src/store/attempt-ledger.js';
import { TRACK, makeItem } from '../helpers/fixtures.js';
import { succeeding, type ScriptedPublisher } from '../helpers/publishers.js';

// Real HTTP requests against an OS-assigned port

describe('ReportServer', () => {
  let server: ReportServer;
  let store: InMemoryItemStore;
  let publisher: ScriptedPublisher;
  let baseUrl: string;

  beforeEach(async () => {
    store = new InMemoryItemStore([
      makeItem('v1', { groupKey: ['A', 'B'], status: 'VALIDATED', wordCount: 5 }),
      makeItem('v2', { groupKey: ['A', 'B'], status: 'VALIDATED', wordCount: 5 }),
      makeItem('n1', {
        groupKey: ['C'],
        status: 'ANNOTATED',
        wordCount: 5,
        annotatedAt: new Date('2024-04-02T00:00:00.000Z'),
      }),
    ]);
    const ledger = new InMemoryAttemptLedger();
    const aggregator = new ProgressAggregator(store, [TRACK]);
    publisher = succeeding('release-1');
    const orchestrator = new PublishOrchestrator({
      store,
      aggregator,
      ledger,
      leases: new InProcessLeaseManager(),
      publisher,
    });

    server = new ReportServer(0, { reporter: new ProgressReporter(store, aggregator, ledger), orchestrator });
    await server.start();
    baseUrl = `http://localhost:${server.getPort()}`;
  });

  afterEach(async () => {
    await server.stop();
  });

  async function readBody(response: Response) {
    return JSON.parse(await response.text());
  }

  function post(path: string, body: unknown): Promise<Response> {
    return fetch(`${baseUrl}${path}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  describe('health check', () => {
    it('should respond with healthy status', async () => {
      const response = await fetch(`${baseUrl}/health`);
      const data = await readBody(response);

      expect(response.status).toBe(200);
      expect(data.status).toBe('healthy');
    });
  });

  describe('reporting', () => {
    it('should list groups with their publish action', async () => {
      const response = await fetch(`${baseUrl}/tracks/7/groups`);
      const data = await readBody(response);

      expect(response.status).toBe(200);
      expect(data.groups).toHaveLength(2);
      expect(data.groups[0]).toMatchObject({
        groupKey: ['A', 'B'],
        itemCount: 2,
        totalWordCount: 10,
        resolvedStatus: 'VALIDATED',
        publishEligible: true,
        publishAction: 'publishaction;A;B;7',
      });
      expect(data.groups[1].publishAction).toBe('');
    });

    it('should return monthly counts', async () => {
      const response = await fetch(`${baseUrl}/tracks/7/progress/monthly`);
      const data = await readBody(response);

      expect(data.months).toEqual([
        { month: '2024-04', counts: { ANNOTATED: 1, VALIDATED: 0, PUBLISHED: 0, PUBLISH_FAILED: 0 } },
      ]);
    });

    it('should return 404 for an unknown track', async () => {
      const response = await fetch(`${baseUrl}/tracks/99/groups`);

      expect(response.status).toBe(404);
      expect(await readBody(response)).toEqual({ error: 'Unknown track: 99' });
    });

    it('should return 400 for a non-numeric track id', async () => {
      const response = await fetch(`${baseUrl}/tracks/docs/groups`);

      expect(response.status).toBe(400);
      expect(await readBody(response)).toEqual({ error: 'Invalid track id: docs' });
    });
  });

  describe('publishing', () => {
    it('should publish a validated group', async () => {
      const response = await post('/publish', { token: 'publishaction;A;B;7' });
      const data = await readBody(response);

      expect(response.status).toBe(200);
      expect(data).toMatchObject({ outcome: 'published', itemIds: ['v1', 'v2'], reference: 'release-1' });
      expect(store.getItem('v1')?.status).toBe('PUBLISHED');
    });

    it('should answer 409 for a group that is not publishable', async () => {
      const response = await post('/publish', { token: 'publishaction;C;7' });
      const data = await readBody(response);

      expect(response.status).toBe(409);
      expect(data).toMatchObject({ outcome: 'rejected', rejection: 'ineligible', resolvedStatus: 'ANNOTATED' });
      expect(publisher.calls).toHaveLength(0);
    });

    it('should reject a malformed token', async () => {
      const response = await post('/publish', { token: 'publish;C;7' });

      expect(response.status).toBe(400);
      expect(await readBody(response)).toEqual({ error: 'Not a publish-action token: publish;C;7' });
    });

    it('should reject a body without a token', async () => {
      const response = await post('/publish', {});

      expect(response.status).toBe(400);
    });

    it('should answer 404 when there is nothing to resolve', async () => {
      const response = await post('/publish/resolve', { token: 'publishaction;A;B;7', outcome: 'published' });
      const data = await readBody(response);

      expect(response.status).toBe(404);
      expect(data.rejection).toBe('no-uncertain-attempt');
    });

    it('should validate the resolve outcome', async () => {
      const response = await post('/publish/resolve', { token: 'publishaction;A;B;7', outcome: 'maybe' });

      expect(response.status).toBe(400);
    });
  });
});
