import { randomUUID } from 'crypto';
import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { groupIdentity } from '../pipeline/aggregator.js';
import type { AttemptState, GroupRef, PublishAttempt } from '../pipeline/types.js';
import type { LeaseManager } from '../publish/lease.js';
import { storeLock, withLock } from './store-lock.js';

export const ATTEMPTS_FILE = 'publish-attempts.json';

/** Latest publish attempt per group */
export interface AttemptLedger {
  get(ref: GroupRef): Promise<PublishAttempt | null>;
  record(attempt: PublishAttempt): Promise<void>;
  list(filter?: { trackId?: number; state?: AttemptState }): Promise<PublishAttempt[]>;
}

function matchesFilter(attempt: PublishAttempt, filter: { trackId?: number; state?: AttemptState }): boolean {
  if (filter.trackId !== undefined && attempt.trackId !== filter.trackId) {
    return false;
  }
  return filter.state === undefined || attempt.state === filter.state;
}

function cloneAttempt(attempt: PublishAttempt): PublishAttempt {
  return { ...attempt, groupKey: [...attempt.groupKey], itemIds: [...attempt.itemIds] };
}

export class InMemoryAttemptLedger implements AttemptLedger {
  private attempts: Map<string, PublishAttempt> = new Map();

  async get(ref: GroupRef): Promise<PublishAttempt | null> {
    const attempt = this.attempts.get(groupIdentity(ref));
    return attempt ? cloneAttempt(attempt) : null;
  }

  async record(attempt: PublishAttempt): Promise<void> {
    this.attempts.set(groupIdentity(attempt), cloneAttempt(attempt));
  }

  async list(filter: { trackId?: number; state?: AttemptState } = {}): Promise<PublishAttempt[]> {
    return Array.from(this.attempts.values())
      .filter((attempt) => matchesFilter(attempt, filter))
      .map(cloneAttempt);
  }
}

const isoDate = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

const AttemptRecordSchema = z.object({
  trackId: z.number().int(),
  groupKey: z.array(z.string()),
  state: z.enum(['IN_FLIGHT', 'SUCCEEDED', 'FAILED', 'UNCERTAIN']),
  startedAt: isoDate,
  finishedAt: isoDate.nullable(),
  reason: z.string().nullable(),
  itemIds: z.array(z.string()),
});

const AttemptFileSchema = z.object({
  attempts: z.array(AttemptRecordSchema),
});

/**
 * Ledger persisted as one JSON document beside the item file. Every
 * record call takes the directory's store lock and rewrites the document
 * through a temp file.
 */
export class FileAttemptLedger implements AttemptLedger {
  private readonly filePath: string;
  private readonly lock: LeaseManager;
  private writeChain: Promise<unknown> = Promise.resolve();

  constructor(directory: string, options: { lock?: LeaseManager } = {}) {
    this.filePath = join(directory, ATTEMPTS_FILE);
    this.lock = options.lock ?? storeLock(directory);
  }

  async get(ref: GroupRef): Promise<PublishAttempt | null> {
    const attempts = await this.load();
    return attempts.get(groupIdentity(ref)) ?? null;
  }

  record(attempt: PublishAttempt): Promise<void> {
    const run = this.writeChain.then(() =>
      withLock(this.lock, ATTEMPTS_FILE, async () => {
        const attempts = await this.load();
        attempts.set(groupIdentity(attempt), cloneAttempt(attempt));
        await this.save(attempts);
      })
    );
    this.writeChain = run.catch(() => undefined);
    return run;
  }

  async list(filter: { trackId?: number; state?: AttemptState } = {}): Promise<PublishAttempt[]> {
    const attempts = await this.load();
    return Array.from(attempts.values()).filter((attempt) => matchesFilter(attempt, filter));
  }

  private async load(): Promise<Map<string, PublishAttempt>> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return new Map();
      }
      throw err;
    }

    const parsed = AttemptFileSchema.parse(JSON.parse(raw));
    return new Map(parsed.attempts.map((attempt) => [groupIdentity(attempt), attempt]));
  }

  private async save(attempts: Map<string, PublishAttempt>): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    const document = {
      attempts: Array.from(attempts.values()).map((attempt) => ({
        ...attempt,
        groupKey: [...attempt.groupKey],
        startedAt: attempt.startedAt.toISOString(),
        finishedAt: attempt.finishedAt?.toISOString() ?? null,
      })),
    };
    const tempPath = `${this.filePath}.${randomUUID()}.tmp`;
    await writeFile(tempPath, JSON.stringify(document, null, 2));
    await rename(tempPath, this.filePath);
    logger.debug('Publish attempts saved', { path: this.filePath, count: attempts.size });
  }
}
