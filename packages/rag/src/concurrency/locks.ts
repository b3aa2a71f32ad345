/**
 * Collection Lock Registry
 *
 * One ingestion run per collection. A lease has an owner and an expiry so a
 * run that died without releasing does not block its collection forever.
 * Injected wherever runs are started (coordinator, scheduler) rather than
 * held in module state.
 *
 * @module @docpilot/rag/concurrency/locks
 */

export interface CollectionLease {
  collection: string;
  owner: string;
  acquiredAt: Date;
  expiresAt: Date;
}

export interface LockRegistryConfig {
  ttlMs: number;
  now: () => number;
}

const DEFAULT_CONFIG: LockRegistryConfig = {
  ttlMs: 6 * 60 * 60 * 1000,
  now: () => Date.now(),
};

export class CollectionLockRegistry {
  private config: LockRegistryConfig;
  private leases = new Map<string, CollectionLease>();

  constructor(config: Partial<LockRegistryConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Take the lock for `collection`. Returns null while another live lease holds it.
   */
  tryAcquire(collection: string, owner: string): CollectionLease | null {
    const current = this.holder(collection);
    if (current) return null;

    const now = this.config.now();
    const lease: CollectionLease = {
      collection,
      owner,
      acquiredAt: new Date(now),
      expiresAt: new Date(now + this.config.ttlMs),
    };
    this.leases.set(collection, lease);
    return lease;
  }

  /**
   * Release a lease. A stale lease (expired and re-acquired by someone else) is ignored.
   */
  release(lease: CollectionLease): boolean {
    const current = this.leases.get(lease.collection);
    if (current !== lease) return false;
    this.leases.delete(lease.collection);
    return true;
  }

  holder(collection: string): CollectionLease | null {
    const lease = this.leases.get(collection);
    if (!lease) return null;

    if (lease.expiresAt.getTime() <= this.config.now()) {
      console.warn(
        `[locks] Lease on "${collection}" held by ${lease.owner} expired at ${lease.expiresAt.toISOString()}`
      );
      this.leases.delete(collection);
      return null;
    }
    return lease;
  }

  isLocked(collection: string): boolean {
    return this.holder(collection) !== null;
  }

  list(): CollectionLease[] {
    return [...this.leases.keys()]
      .map((collection) => this.holder(collection))
      .filter((lease): lease is CollectionLease => lease !== null);
  }
}
