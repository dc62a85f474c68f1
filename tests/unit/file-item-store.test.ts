import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { FileItemStore, ITEMS_FILE } from '../../src/store/file-item-store.js';
import { STORE_LOCK_DIRECTORY } from '../../src/store/store-lock.js';
import { TRACK, makeItem } from '../helpers/fixtures.js';

describe('FileItemStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'item-store-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should read nothing when the file does not exist', async () => {
    const store = new FileItemStore(dir, [TRACK]);
    expect(await store.readItems({ trackId: TRACK.id })).toEqual([]);
  });

  it('should round-trip items through the file', async () => {
    const store = new FileItemStore(dir, [TRACK]);
    const item = makeItem('one', {
      groupKey: ['A', 'B'],
      status: 'ANNOTATED',
      annotatedAt: new Date('2024-06-01T08:00:00.000Z'),
    });
    await store.replaceAll([item]);

    expect(await store.readItems({ trackId: TRACK.id })).toEqual([item]);
  });

  it('should derive a missing group key and skip bad lines', async () => {
    const lines = [
      JSON.stringify({
        id: 'derived',
        trackId: 7,
        payload: { section: 'intro', page: 'p2', source: 'a b c' },
        status: 'PENDING',
        createdAt: '2024-01-01T00:00:00.000Z',
      }),
      '{not json',
      JSON.stringify({ id: 'no-status', trackId: 7, payload: {}, createdAt: '2024-01-01T00:00:00.000Z' }),
      '',
    ];
    await writeFile(join(dir, ITEMS_FILE), lines.join('\n'));
    const store = new FileItemStore(dir, [TRACK]);

    const items = await store.readItems({ trackId: TRACK.id });

    expect(items).toHaveLength(1);
    expect(items[0].id).toBe('derived');
    expect(items[0].groupKey).toEqual(['intro', 'p2']);
    expect(items[0].annotatedAt).toBeNull();
    expect(items[0].publishFailure).toBeNull();
  });

  it('should keep unreadable lines and unknown fields when rewriting', async () => {
    const badDate = JSON.stringify({
      id: 'bad-date',
      trackId: 7,
      payload: { section: 'intro', source: 'x' },
      status: 'VALIDATED',
      createdAt: '2024-01-01 00:00:00',
    });
    const lines = [
      JSON.stringify({
        id: 'keep',
        trackId: 7,
        payload: { section: 'intro', page: 'p1', source: 'a b' },
        status: 'PENDING',
        createdAt: '2024-01-01T00:00:00.000Z',
        note: 'imported by hand',
      }),
      badDate,
      '{not json',
    ];
    await writeFile(join(dir, ITEMS_FILE), lines.join('\n'));
    const store = new FileItemStore(dir, [TRACK]);
    const at = new Date('2024-07-03T00:00:00.000Z');

    expect(await store.writeStatus({ ids: ['keep', 'bad-date'], status: 'ANNOTATED', at, actorId: 'r1' })).toBe(1);

    const written = (await readFile(store.getFilePath(), 'utf-8')).split('\n');
    expect(written).toHaveLength(4);
    const updated = JSON.parse(written[0]);
    expect(updated.note).toBe('imported by hand');
    expect(updated.status).toBe('ANNOTATED');
    expect(updated.annotatedAt).toBe('2024-07-03T00:00:00.000Z');
    expect(updated.groupKey).toEqual(['intro', 'p1']);
    expect(written[1]).toBe(badDate);
    expect(written[2]).toBe('{not json');
    expect(written[3]).toBe('');
  });

  it('should write statuses in one batch and persist them', async () => {
    const store = new FileItemStore(dir, [TRACK]);
    await store.replaceAll([
      makeItem('v1', { groupKey: ['G'], status: 'VALIDATED' }),
      makeItem('v2', { groupKey: ['G'], status: 'VALIDATED' }),
      makeItem('o', { groupKey: ['H'], status: 'PENDING' }),
    ]);
    const at = new Date('2024-07-01T00:00:00.000Z');

    const updated = await store.writeStatus({ ids: ['v1', 'v2', 'missing'], status: 'PUBLISH_FAILED', at, reason: 'HTTP 500' });

    expect(updated).toBe(2);
    const reread = new FileItemStore(dir, [TRACK]);
    const items = await reread.readItems({ trackId: TRACK.id, groupKey: ['G'] });
    expect(items.map((item) => [item.id, item.status, item.publishFailure?.reason])).toEqual([
      ['v1', 'PUBLISH_FAILED', 'HTTP 500'],
      ['v2', 'PUBLISH_FAILED', 'HTTP 500'],
    ]);
    expect(items[0].publishFailure?.at).toEqual(at);
  });

  it('should serialize concurrent writes', async () => {
    const store = new FileItemStore(dir, [TRACK]);
    await store.replaceAll([makeItem('x', { status: 'PENDING' }), makeItem('y', { status: 'ANNOTATED' })]);
    const at = new Date('2024-07-02T00:00:00.000Z');

    await Promise.all([
      store.writeStatus({ ids: ['x'], status: 'ANNOTATED', at, actorId: 'r1' }),
      store.writeStatus({ ids: ['y'], status: 'VALIDATED', at, actorId: 'r2' }),
    ]);

    const items = await store.readItems({ trackId: TRACK.id });
    expect(items.map((item) => [item.id, item.status])).toEqual([
      ['x', 'ANNOTATED'],
      ['y', 'VALIDATED'],
    ]);
  });

  it('should keep writes from two stores on the same directory', async () => {
    await new FileItemStore(dir, [TRACK]).replaceAll([
      makeItem('x', { status: 'VALIDATED' }),
      makeItem('y', { status: 'VALIDATED' }),
    ]);
    const first = new FileItemStore(dir, [TRACK]);
    const second = new FileItemStore(dir, [TRACK]);
    const at = new Date('2024-07-04T00:00:00.000Z');

    await Promise.all([
      first.writeStatus({ ids: ['x'], status: 'PUBLISHED', at }),
      second.writeStatus({ ids: ['y'], status: 'PUBLISHED', at }),
    ]);

    const items = await new FileItemStore(dir, [TRACK]).readItems({ trackId: TRACK.id });
    expect(items.map((item) => [item.id, item.status])).toEqual([
      ['x', 'PUBLISHED'],
      ['y', 'PUBLISHED'],
    ]);
    expect(await readdir(join(dir, STORE_LOCK_DIRECTORY))).toEqual([]);
    expect((await readdir(dir)).filter((name) => name.endsWith('.tmp'))).toEqual([]);
  });

  it('should keep an earlier publish failure when the item is published', async () => {
    const failure = { reason: 'HTTP 503', at: new Date('2024-03-10T00:00:00.000Z') };
    const store = new FileItemStore(dir, [TRACK]);
    await store.replaceAll([makeItem('f', { status: 'PUBLISH_FAILED', publishFailure: failure })]);

    await store.writeStatus({ ids: ['f'], status: 'PUBLISHED', at: new Date('2024-04-02T00:00:00.000Z') });

    const [item] = await store.readItems({ trackId: TRACK.id });
    expect(item.status).toBe('PUBLISHED');
    expect(item.publishedAt?.toISOString()).toBe('2024-04-02T00:00:00.000Z');
    expect(item.publishFailure).toEqual(failure);
  });

  it('should stream in chunks of the requested size', async () => {
    const store = new FileItemStore(dir, [TRACK]);
    await store.replaceAll(['1', '2', '3', '4', '5'].map((id) => makeItem(id)));

    const sizes: number[] = [];
    for await (const chunk of store.streamItems({ trackId: TRACK.id }, 2)) {
      sizes.push(chunk.length);
    }

    expect(sizes).toEqual([2, 2, 1]);
  });

  it('should write one JSON record per line', async () => {
    const store = new FileItemStore(dir, [TRACK]);
    await store.replaceAll([makeItem('a'), makeItem('b')]);

    const content = await readFile(store.getFilePath(), 'utf-8');
    const lines = content.split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe('');
    expect(JSON.parse(lines[0]).id).toBe('a');
  });
});
