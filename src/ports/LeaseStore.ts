import type { Lease, LeaseKey } from "../core/leases/Lease";

/**
 * Persistence for leases. Every method is a single atomic conditional write, so
 * concurrent callers on different replicas can never both win.
 * `ttlMs = null` means a durable lease without expiry.
 */
export interface LeaseStore {
  /** Returns the new lease, or null when another holder has a live lease on the key. */
  tryAcquire(key: LeaseKey, holderId: string, ttlMs: number | null): Promise<Lease | null>;
  /** Returns the extended lease, or null when `holderId` is not the recorded holder. */
  extend(key: LeaseKey, holderId: string, ttlMs: number | null): Promise<Lease | null>;
  /** Returns true when a lease held by `holderId` was deleted. */
  remove(key: LeaseKey, holderId: string): Promise<boolean>;
}
