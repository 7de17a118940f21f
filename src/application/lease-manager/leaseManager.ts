import type { AcquireResult, Lease, LeaseKey } from "../../core/leases/Lease";
import { InvalidLeaseArgumentError, NotHolderError } from "../../core/leases/Lease";
import type { LeaseStore } from "../../ports/LeaseStore";

const assertNonEmpty = (name: string, value: string) => {
  if (typeof value !== "string" || value.trim() === "") {
    throw new InvalidLeaseArgumentError(`${name} must be a non-empty string`);
  }
};

const assertTtl = (ttlMs: number | null) => {
  if (ttlMs === null) return;
  if (!Number.isInteger(ttlMs) || ttlMs < 1) {
    throw new InvalidLeaseArgumentError(`ttlMs=${String(ttlMs)} must be a positive integer or null`);
  }
};

const toKey = (resourceId: string, tenantId: string): LeaseKey => {
  assertNonEmpty("resourceId", resourceId);
  assertNonEmpty("tenantId", tenantId);
  return { resourceId, tenantId };
};

/**
 * Acquire/renew/release on top of a LeaseStore. Mutual exclusion comes only from the
 * store's conditional writes; this class adds argument checks and the result shapes.
 */
export class LeaseManager {
  constructor(private readonly store: LeaseStore) {}

  async acquire(resourceId: string, tenantId: string, holderId: string, ttlMs: number | null): Promise<AcquireResult> {
    const key = toKey(resourceId, tenantId);
    assertNonEmpty("holderId", holderId);
    assertTtl(ttlMs);

    const lease = await this.store.tryAcquire(key, holderId, ttlMs);
    return lease ? { kind: "acquired", lease } : { kind: "conflict" };
  }

  async renew(resourceId: string, tenantId: string, holderId: string, ttlMs: number | null): Promise<Lease> {
    const key = toKey(resourceId, tenantId);
    assertNonEmpty("holderId", holderId);
    assertTtl(ttlMs);

    const lease = await this.store.extend(key, holderId, ttlMs);
    if (!lease) {
      throw new NotHolderError(key, holderId);
    }
    return lease;
  }

  // Releasing a lease the caller does not hold is a no-op.
  async release(resourceId: string, tenantId: string, holderId: string): Promise<void> {
    const key = toKey(resourceId, tenantId);
    assertNonEmpty("holderId", holderId);
    await this.store.remove(key, holderId);
  }
}
