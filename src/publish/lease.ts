import { randomUUID } from 'crypto';
import { logger } from '../utils/logger.js';
import { LeaseUnavailableError } from '../pipeline/errors.js';

/** What a caller does when the key is already leased */
export type ContentionMode = 'wait' | 'reject';

export interface AcquireOptions {
  mode?: ContentionMode;
  /** Upper bound on the wait in `wait` mode */
  waitTimeoutMs?: number;
}

export interface Lease {
  key: string;
  token: string;
  acquiredAt: number;
  release(): Promise<void>;
}

/** Exclusive, releasable claims on string keys */
export interface LeaseManager {
  acquire(key: string, options?: AcquireOptions): Promise<Lease>;
  isHeld(key: string): Promise<boolean>;
}

export interface LeaseStats {
  held: number;
  waiting: number;
  totalGranted: number;
  totalRejected: number;
  totalTimedOut: number;
  avgWaitMs: number;
}

interface Waiter {
  createdAt: number;
  resolve: (lease: Lease) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout> | null;
}

interface HeldLease {
  token: string;
  waiters: Waiter[];
}

/**
 * Serializes work per key within one process.
 *
 * A key has at most one holder; in `wait` mode later callers queue FIFO
 * and are handed the lease as the holder releases it.
 */
export class InProcessLeaseManager implements LeaseManager {
  private leases: Map<string, HeldLease> = new Map();
  private stats = {
    totalGranted: 0,
    totalRejected: 0,
    totalTimedOut: 0,
    totalWaitMs: 0,
  };

  private readonly maxWaiters: number;
  private readonly defaultWaitTimeoutMs: number;

  constructor(options: { maxWaiters?: number; waitTimeoutMs?: number } = {}) {
    this.maxWaiters = options.maxWaiters ?? 100;
    this.defaultWaitTimeoutMs = options.waitTimeoutMs ?? 60000;
  }

  async acquire(key: string, options: AcquireOptions = {}): Promise<Lease> {
    const mode = options.mode ?? 'wait';
    const held = this.leases.get(key);

    if (!held) {
      const token = randomUUID();
      this.leases.set(key, { token, waiters: [] });
      return this.grant(key, token, 0);
    }

    if (mode === 'reject') {
      this.stats.totalRejected++;
      logger.debug('Lease held, rejecting caller', { key });
      throw new LeaseUnavailableError(key, `Lease for ${key} is held`);
    }

    if (held.waiters.length >= this.maxWaiters) {
      this.stats.totalRejected++;
      throw new LeaseUnavailableError(key, `Lease queue for ${key} is full (max ${this.maxWaiters})`);
    }

    const waitTimeoutMs = options.waitTimeoutMs ?? this.defaultWaitTimeoutMs;

    return new Promise<Lease>((resolve, reject) => {
      const waiter: Waiter = { createdAt: Date.now(), resolve, reject, timer: null };

      waiter.timer = setTimeout(() => {
        const index = held.waiters.indexOf(waiter);
        if (index >= 0) {
          held.waiters.splice(index, 1);
        }
        this.stats.totalTimedOut++;
        logger.warn('Timed out waiting for lease', { key, waitTimeoutMs });
        reject(new LeaseUnavailableError(key, `Timed out after ${waitTimeoutMs}ms waiting for lease ${key}`));
      }, waitTimeoutMs);

      held.waiters.push(waiter);
      logger.debug('Waiting for lease', { key, position: held.waiters.length });
    });
  }

  async isHeld(key: string): Promise<boolean> {
    return this.leases.has(key);
  }

  getStats(): LeaseStats {
    const granted = this.stats.totalGranted || 1;
    let waiting = 0;
    for (const held of this.leases.values()) {
      waiting += held.waiters.length;
    }
    return {
      held: this.leases.size,
      waiting,
      totalGranted: this.stats.totalGranted,
      totalRejected: this.stats.totalRejected,
      totalTimedOut: this.stats.totalTimedOut,
      avgWaitMs: Math.round(this.stats.totalWaitMs / granted),
    };
  }

  private grant(key: string, token: string, waitMs: number): Lease {
    this.stats.totalGranted++;
    this.stats.totalWaitMs += waitMs;
    let released = false;

    return {
      key,
      token,
      acquiredAt: Date.now(),
      release: async () => {
        if (released) return;
        released = true;
        this.handOver(key, token);
      },
    };
  }

  private handOver(key: string, token: string): void {
    const held = this.leases.get(key);
    if (!held || held.token !== token) {
      return;
    }

    const next = held.waiters.shift();
    if (!next) {
      this.leases.delete(key);
      return;
    }

    if (next.timer) {
      clearTimeout(next.timer);
    }
    held.token = randomUUID();
    next.resolve(this.grant(key, held.token, Date.now() - next.createdAt));
  }
}
