import { createHash, randomUUID } from 'crypto';
import { link, mkdir, readFile, rename, stat, unlink, writeFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { LeaseUnavailableError } from '../pipeline/errors.js';
import type { AcquireOptions, Lease, LeaseManager } from './lease.js';

const DEFAULT_TTL_MS = 10 * 60 * 1000;
const DEFAULT_POLL_MS = 250;

const LockFileSchema = z.object({
  key: z.string(),
  token: z.string(),
  pid: z.number(),
  acquiredAt: z.number(),
});

type LockFile = z.infer<typeof LockFileSchema>;

function isErrnoError(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

/**
 * Lease manager shared by every process that sees the same directory.
 *
 * A lease is a lock file created with O_EXCL. Lock files older than the
 * TTL belong to a holder that died and are taken over.
 */
export class FileLeaseManager implements LeaseManager {
  private readonly ttlMs: number;
  private readonly pollIntervalMs: number;
  private readonly defaultWaitTimeoutMs: number;

  constructor(
    private readonly directory: string,
    options: { ttlMs?: number; pollIntervalMs?: number; waitTimeoutMs?: number } = {}
  ) {
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_MS;
    this.defaultWaitTimeoutMs = options.waitTimeoutMs ?? 60000;
  }

  lockPath(key: string): string {
    const digest = createHash('sha256').update(key).digest('hex').slice(0, 32);
    return join(this.directory, `${digest}.lock`);
  }

  async acquire(key: string, options: AcquireOptions = {}): Promise<Lease> {
    const mode = options.mode ?? 'wait';
    const waitTimeoutMs = options.waitTimeoutMs ?? this.defaultWaitTimeoutMs;
    const deadline = Date.now() + waitTimeoutMs;
    const path = this.lockPath(key);

    await mkdir(this.directory, { recursive: true });

    for (;;) {
      const lock: LockFile = { key, token: randomUUID(), pid: process.pid, acquiredAt: Date.now() };
      try {
        await writeFile(path, JSON.stringify(lock), { flag: 'wx' });
        logger.debug('File lease acquired', { key, path });
        return this.toLease(path, lock);
      } catch (err) {
        if (!isErrnoError(err, 'EEXIST')) {
          throw err;
        }
      }

      if (await this.removeIfStale(path)) {
        continue;
      }

      if (mode === 'reject') {
        throw new LeaseUnavailableError(key, `Lease for ${key} is held`);
      }
      if (Date.now() >= deadline) {
        throw new LeaseUnavailableError(key, `Timed out after ${waitTimeoutMs}ms waiting for lease ${key}`);
      }

      await this.delay(Math.min(this.pollIntervalMs, Math.max(0, deadline - Date.now())));
    }
  }

  async isHeld(key: string): Promise<boolean> {
    const lock = await this.readLock(this.lockPath(key));
    return lock !== null && !this.isStale(lock);
  }

  private toLease(path: string, lock: LockFile): Lease {
    let released = false;
    return {
      key: lock.key,
      token: lock.token,
      acquiredAt: lock.acquiredAt,
      release: async () => {
        if (released) return;
        released = true;
        const current = await this.readLock(path);
        if (current?.token !== lock.token) {
          logger.warn('File lease was taken over before release', { key: lock.key });
          return;
        }
        await this.unlinkQuietly(path);
      },
    };
  }

  private isStale(lock: LockFile): boolean {
    return Date.now() - lock.acquiredAt > this.ttlMs;
  }

  /**
   * A lock whose holder is past the TTL is stale. A file that cannot be
   * parsed (still being written, or corrupt) is judged by its mtime.
   */
  private async lockState(path: string): Promise<'missing' | 'fresh' | 'stale'> {
    const lock = await this.readLock(path);
    if (lock) {
      return this.isStale(lock) ? 'stale' : 'fresh';
    }
    const modifiedAt = await this.modifiedAt(path);
    if (modifiedAt === null) {
      return 'missing';
    }
    return Date.now() - modifiedAt > this.ttlMs ? 'stale' : 'fresh';
  }

  /**
   * Remove a stale lock file. Returns true when the caller may try again at
   * once.
   *
   * The file is first renamed to a private name and judged again there:
   * another process may have taken the stale lock over and written a fresh
   * one in between, and that one is put back.
   */
  private async removeIfStale(path: string): Promise<boolean> {
    const state = await this.lockState(path);
    if (state !== 'stale') {
      return state === 'missing';
    }

    const moved = `${path}.${randomUUID()}.stale`;
    try {
      await rename(path, moved);
    } catch (err) {
      if (isErrnoError(err, 'ENOENT')) {
        return true;
      }
      throw err;
    }

    if ((await this.lockState(moved)) === 'fresh') {
      try {
        await link(moved, path);
      } catch (err) {
        if (!isErrnoError(err, 'EEXIST')) {
          throw err;
        }
      }
      await this.unlinkQuietly(moved);
      return false;
    }

    logger.warn('Removing stale lease file', { path });
    await this.unlinkQuietly(moved);
    return true;
  }

  private async modifiedAt(path: string): Promise<number | null> {
    try {
      return (await stat(path)).mtimeMs;
    } catch (err) {
      if (isErrnoError(err, 'ENOENT')) {
        return null;
      }
      throw err;
    }
  }

  private async readLock(path: string): Promise<LockFile | null> {
    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (err) {
      if (isErrnoError(err, 'ENOENT')) {
        return null;
      }
      throw err;
    }

    try {
      const parsed = LockFileSchema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : null;
    } catch {
      return null;
    }
  }

  private async unlinkQuietly(path: string): Promise<void> {
    try {
      await unlink(path);
    } catch (err) {
      if (!isErrnoError(err, 'ENOENT')) {
        throw err;
      }
    }
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
