import { cursorAfter, MigrationBatcher } from "../../src/application/migrate-definitions/migrationBatcher";
import type { MigrationTargetRepository } from "../../src/ports/MigrationTargetRepository";
import { InMemoryLeaseStore, InMemoryMigrationTargets, TestClock } from "../support/inMemoryStores";

describe("MigrationBatcher", () => {
  const setup = () => {
    const leaseStore = new InMemoryLeaseStore(new TestClock());
    const targets = new InMemoryMigrationTargets(leaseStore, "PENDING");
    return { leaseStore, targets, batcher: new MigrationBatcher(targets) };
  };

  it("defaults to batches of five", async () => {
    const { targets, batcher } = setup();
    for (let i = 0; i < 8; i += 1) targets.seed({ id: `d${i}`, payload: "PENDING" });

    expect(await batcher.nextBatch()).toHaveLength(5);
  });

  const ids = ["a", "b", "c", "d", "e", "f", "g"];

  it.each([1, 2, 7, 8, 100])("enumerates every eligible row exactly once with batchSize=%i", async (batchSize) => {
    const { targets, batcher } = setup();
    ids.forEach((id) => targets.seed({ id, payload: "PENDING" }));
    targets.seed({ id: "done", payload: "migrated" });

    const seen: string[] = [];
    let cursor: string | null = null;
    for (;;) {
      const batch = await batcher.nextBatch({ batchSize, cursorAfterId: cursor });
      if (batch.length === 0) break;
      seen.push(...batch.map((row) => row.id));
      cursor = cursorAfter(batch, cursor);
    }

    expect(seen).toEqual(ids);
  });

  it.each([1, 2, 7, 8, 100])("reaches every row when each batch is migrated before the next (batchSize=%i)", async (batchSize) => {
    const { targets, batcher } = setup();
    ids.forEach((id) => targets.seed({ id, payload: "PENDING" }));

    const seen: string[] = [];
    let cursor: string | null = null;
    for (;;) {
      const batch = await batcher.nextBatch({ batchSize, cursorAfterId: cursor });
      if (batch.length === 0) break;
      for (const row of batch) {
        await targets.saveMigrated(row, { definition: row.definition, payload: "migrated" });
      }
      seen.push(...batch.map((row) => row.id));
      cursor = cursorAfter(batch, cursor);
    }

    expect(seen).toEqual(ids);
    expect(await batcher.nextBatch({ batchSize: 100 })).toEqual([]);
  });

  it("excludes rows leased by other holders but not by the allowed holder", async () => {
    const { leaseStore, targets, batcher } = setup();
    ["a", "b", "c"].forEach((id) => targets.seed({ id, payload: "PENDING" }));
    await leaseStore.tryAcquire({ resourceId: "a", tenantId: "tenant-a" }, "other", null);
    await leaseStore.tryAcquire({ resourceId: "b", tenantId: "tenant-a" }, "me", null);

    const anonymous = await batcher.nextBatch({});
    const mine = await batcher.nextBatch({ allowedHolderId: "me" });

    expect(anonymous.map((row) => row.id)).toEqual(["c"]);
    expect(mine.map((row) => row.id)).toEqual(["b", "c"]);
  });

  it("passes defaults for omitted parameters and trims oversized results", async () => {
    const rows = Array.from({ length: 4 }, (_, i) => ({ id: `d${i}`, tenantId: "t", name: "", definition: {}, payload: "" }));
    const repo: MigrationTargetRepository = {
      nextBatch: jest.fn().mockResolvedValue(rows),
      backup: jest.fn(),
      saveMigrated: jest.fn()
    };

    const batch = await new MigrationBatcher(repo).nextBatch({ batchSize: 2, targetTenantId: "t" });

    expect(batch.map((row) => row.id)).toEqual(["d0", "d1"]);
    expect(repo.nextBatch).toHaveBeenCalledWith({ batchSize: 2, cursorAfterId: null, targetTenantId: "t", allowedHolderId: null });
  });

  it.each([0, -1, 1.5])("rejects batchSize=%p", async (batchSize) => {
    const { batcher } = setup();
    await expect(batcher.nextBatch({ batchSize })).rejects.toThrow(`batchSize=${batchSize} must be a positive integer`);
  });
});
