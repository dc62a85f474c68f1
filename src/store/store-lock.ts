import { join } from 'path';
import { FileLeaseManager } from '../publish/file-lease.js';
import type { LeaseManager } from '../publish/lease.js';

export const STORE_LOCK_DIRECTORY = '.locks';

/**
 * Lock guarding whole-file rewrites in a store directory. Every process
 * that opens the directory sees the same lock files.
 */
export function storeLock(directory: string): LeaseManager {
  return new FileLeaseManager(join(directory, STORE_LOCK_DIRECTORY), {
    ttlMs: 60 * 1000,
    pollIntervalMs: 20,
  });
}

export async function withLock<T>(leases: LeaseManager, key: string, work: () => Promise<T>): Promise<T> {
  const lease = await leases.acquire(key, { mode: 'wait' });
  try {
    return await work();
  } finally {
    await lease.release();
  }
}
