import { once } from 'events';
import { createReadStream } from 'fs';
import { randomUUID } from 'crypto';
import { mkdir, rename, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { createInterface } from 'readline';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { DataIntegrityError } from '../pipeline/errors.js';
import { deriveGroupKey } from '../pipeline/word-count.js';
import { ITEM_STATUSES } from '../pipeline/types.js';
import type { ItemSelector, StatusWrite, TrackDefinition, WorkItem } from '../pipeline/types.js';
import { applyStatusWrite, matchesSelector, type ItemStore } from './item-store.js';
import { storeLock, withLock } from './store-lock.js';
import type { LeaseManager } from '../publish/lease.js';

export const ITEMS_FILE = 'items.jsonl';

const isoDate = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

const WorkItemRecordSchema = z.object({
  id: z.string().min(1),
  trackId: z.number().int(),
  groupKey: z.array(z.string()).optional(),
  model: z.string().optional(),
  payload: z.unknown(),
  status: z.enum(ITEM_STATUSES),
  createdAt: isoDate,
  annotatedAt: isoDate.nullable().default(null),
  validatedAt: isoDate.nullable().default(null),
  publishedAt: isoDate.nullable().default(null),
  publishFailure: z.object({ reason: z.string(), at: isoDate }).nullable().default(null),
  annotatorId: z.string().nullable().default(null),
  validatorId: z.string().nullable().default(null),
});

const JsonObjectSchema = z.record(z.string(), z.unknown());

function toRecord(item: WorkItem): Record<string, unknown> {
  return {
    ...item,
    groupKey: [...item.groupKey],
    createdAt: item.createdAt.toISOString(),
    annotatedAt: item.annotatedAt?.toISOString() ?? null,
    validatedAt: item.validatedAt?.toISOString() ?? null,
    publishedAt: item.publishedAt?.toISOString() ?? null,
    publishFailure: item.publishFailure
      ? { reason: item.publishFailure.reason, at: item.publishFailure.at.toISOString() }
      : null,
  };
}

/** One line of the item file */
interface StoredLine {
  /** Text as read; written back unchanged unless the item is updated */
  text: string;
  /** Every field of the record, including ones the item type does not model */
  fields: Record<string, unknown> | null;
  item: WorkItem | null;
}

/**
 * Item store backed by a JSON-lines file, one item per line.
 *
 * Lines that are not valid JSON or fail the record schema are hidden from
 * readers with a warning, and kept verbatim when the file is rewritten.
 * Records without a `groupKey` get one derived from the track's key fields.
 * Writes take a lock shared by every process using the directory, then
 * rewrite the file through a temp file.
 */
export class FileItemStore implements ItemStore {
  private readonly filePath: string;
  private readonly tracks: Map<number, TrackDefinition>;
  private readonly lock: LeaseManager;
  private writeChain: Promise<unknown> = Promise.resolve();

  constructor(directory: string, tracks: readonly TrackDefinition[], options: { lock?: LeaseManager } = {}) {
    this.filePath = join(directory, ITEMS_FILE);
    this.tracks = new Map(tracks.map((track) => [track.id, track]));
    this.lock = options.lock ?? storeLock(directory);
  }

  getFilePath(): string {
    return this.filePath;
  }

  async readItems(selector: ItemSelector): Promise<WorkItem[]> {
    const items: WorkItem[] = [];
    for await (const item of this.readAll()) {
      if (matchesSelector(item, selector)) {
        items.push(item);
      }
    }
    return items;
  }

  async *streamItems(selector: ItemSelector, chunkSize: number): AsyncIterable<WorkItem[]> {
    let chunk: WorkItem[] = [];
    for await (const item of this.readAll()) {
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

  writeStatus(write: StatusWrite): Promise<number> {
    const run = this.writeChain.then(() => withLock(this.lock, ITEMS_FILE, () => this.rewrite(write)));
    this.writeChain = run.catch(() => undefined);
    return run;
  }

  /** Replace the file's contents; used by tests and seeding scripts */
  async replaceAll(items: readonly WorkItem[]): Promise<void> {
    await withLock(this.lock, ITEMS_FILE, () => this.persist(items.map((item) => JSON.stringify(toRecord(item)))));
  }

  private async rewrite(write: StatusWrite): Promise<number> {
    const ids = new Set(write.ids);
    const lines: string[] = [];
    let updated = 0;

    for await (const line of this.readLines()) {
      if (line.item && ids.has(line.item.id)) {
        const next = applyStatusWrite(line.item, write);
        lines.push(JSON.stringify({ ...line.fields, ...toRecord(next) }));
        updated++;
      } else {
        lines.push(line.text);
      }
    }

    await this.persist(lines);
    logger.debug('Item statuses written', { status: write.status, requested: ids.size, updated });
    return updated;
  }

  private async persist(lines: readonly string[]): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${randomUUID()}.tmp`;
    await writeFile(tempPath, lines.length > 0 ? `${lines.join('\n')}\n` : '');
    await rename(tempPath, this.filePath);
  }

  private async *readAll(): AsyncGenerator<WorkItem> {
    for await (const line of this.readLines()) {
      if (line.item) {
        yield line.item;
      }
    }
  }

  private async *readLines(): AsyncGenerator<StoredLine> {
    const stream = createReadStream(this.filePath, { encoding: 'utf-8' });
    try {
      await once(stream, 'open');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return;
      }
      throw err;
    }

    const lines = createInterface({ input: stream, crlfDelay: Infinity });
    let lineNumber = 0;
    for await (const text of lines) {
      lineNumber++;
      if (text.trim().length === 0) continue;
      yield this.parseLine(text, lineNumber);
    }
  }

  private parseLine(text: string, lineNumber: number): StoredLine {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      logger.warn('Skipping unparseable item line', { file: this.filePath, line: lineNumber });
      return { text, fields: null, item: null };
    }

    const fields = JsonObjectSchema.safeParse(raw);
    const parsed = WorkItemRecordSchema.safeParse(raw);
    if (!fields.success || !parsed.success) {
      const detail = parsed.success ? 'not an object' : (parsed.error.issues[0]?.message ?? 'invalid record');
      const error = new DataIntegrityError(`line ${lineNumber}`, detail);
      logger.warn('Skipping invalid item record', { file: this.filePath, error: error.message });
      return { text, fields: null, item: null };
    }

    const record = parsed.data;
    let groupKey = record.groupKey;
    if (!groupKey) {
      const track = this.tracks.get(record.trackId);
      groupKey = track ? [...deriveGroupKey(track, record.payload)] : [];
    }

    return { text, fields: fields.data, item: { ...record, payload: record.payload, groupKey } };
  }
}
