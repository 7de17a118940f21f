export type LeaseKey = {
  resourceId: string;
  tenantId: string;
};

/**
 * Exclusive claim on a resource. `expiresAt` is null for durable leases, which are
 * kept until their holder releases them.
 */
export type Lease = LeaseKey & {
  holderId: string;
  acquiredAt: Date;
  expiresAt: Date | null;
};

export type AcquireResult =
  | { kind: "acquired"; lease: Lease }
  | { kind: "conflict" };

export class NotHolderError extends Error {
  readonly code = "not_holder";
  readonly context: LeaseKey & { holderId: string };

  constructor(key: LeaseKey, holderId: string) {
    super(`Lease ${key.tenantId}/${key.resourceId} is not held by ${holderId}`);
    this.name = "NotHolderError";
    this.context = { ...key, holderId };
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A lease call made with a malformed key, holder or TTL; nothing was written. */
export class InvalidLeaseArgumentError extends Error {
  readonly code = "invalid_lease_argument";

  constructor(message: string) {
    super(message);
    this.name = "InvalidLeaseArgumentError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const isLeaseLive = (lease: Lease, now: Date): boolean =>
  lease.expiresAt == null || lease.expiresAt.getTime() > now.getTime();
