import type { WorkItem } from "../../src/core/work-items/workItem.types";
import type { NewWorkItemSpec } from "../../src/core/work-items/workItem.types";
import { WorkItemFatalError } from "../../src/application/process-work-items/dispatch.error-handler";
import { buildReplica, loggedEvents, silenceLogs } from "../support/workerHarness";

const toProcessing = async (replica: ReturnType<typeof buildReplica>, id: string): Promise<WorkItem> => {
  const claimed = await replica.claim(replica.workItems.seed({ id }));
  const processing = await replica.workItems.applyTransition(
    claimed,
    { from: "CLAIMED", to: "PROCESSING", attemptCount: claimed.attemptCount, lastError: null, retryEligibleAt: null },
    replica.config.holderId
  );
  if (!processing) throw new Error("start transition failed");
  return processing;
};

describe("StateTransitioner", () => {
  let logs: ReturnType<typeof silenceLogs>;

  beforeEach(() => {
    logs = silenceLogs();
  });

  afterEach(() => {
    logs.restore();
  });

  it("fans out exactly once per DONE transition", async () => {
    const onItemDone = jest.fn(async (): Promise<NewWorkItemSpec[]> => [
      { id: "next-1", activityName: "approve", draft: { kind: "form", formValues: {} } },
      { id: "next-2", activityName: "notify", consumer: "mailer", draft: { kind: "notify" } }
    ]);
    const replica = buildReplica({ fanOut: { onItemDone } });
    const item = await toProcessing(replica, "item-1");

    const report = await replica.transitioner.apply(item, { kind: "success", result: { approved: true } });
    const again = await replica.transitioner.fanOutOnce(item);

    expect(report.outcome).toBe("done");
    expect(again).toBeNull();
    expect(onItemDone).toHaveBeenCalledTimes(1);
    expect(replica.workItems.get("next-1")).toMatchObject({ status: "SUBMITTED", activityName: "approve", procInstId: "proc-1" });
    expect(replica.workItems.get("next-2")).toMatchObject({ status: "SUBMITTED", consumer: "mailer" });
  });

  it("lets only one of two concurrent fan-outs call the collaborator", async () => {
    const onItemDone = jest.fn(async (): Promise<NewWorkItemSpec[]> => []);
    const replica = buildReplica({ fanOut: { onItemDone } });
    replica.workItems.seed({ id: "item-1", status: "DONE" });

    const results = await Promise.all([
      replica.transitioner.fanOutOnce({ id: "item-1", tenantId: "tenant-a" }),
      replica.transitioner.fanOutOnce({ id: "item-1", tenantId: "tenant-a" })
    ]);

    expect(results.sort()).toEqual([0, null]);
    expect(onItemDone).toHaveBeenCalledTimes(1);
  });

  it("leaves fan-out pending when the collaborator fails", async () => {
    const onItemDone = jest.fn(async (): Promise<NewWorkItemSpec[]> => {
      throw new Error("engine unavailable");
    });
    const replica = buildReplica({ fanOut: { onItemDone } });
    const item = await toProcessing(replica, "item-1");

    const report = await replica.transitioner.apply(item, { kind: "success", result: {} });

    expect(report.outcome).toBe("done");
    expect(replica.workItems.get("item-1")?.fannedOutAt).toBeUndefined();
    expect(await replica.workItems.findPendingFanOut({ limit: 10 })).toHaveLength(1);
    expect(loggedEvents(logs.error)).toContainEqual({
      event: "fan_out.failed",
      workItemId: "item-1",
      tenantId: "tenant-a",
      reason: "engine unavailable"
    });
  });

  it("does not fan out for failures", async () => {
    const onItemDone = jest.fn(async (): Promise<NewWorkItemSpec[]> => []);
    const replica = buildReplica({ fanOut: { onItemDone }, config: { backoffBaseMs: 500, backoffMaxMs: 500 } });
    const item = await toProcessing(replica, "item-1");

    const report = await replica.transitioner.apply(item, { kind: "failure", error: "busy", retryable: true });

    expect(report).toEqual({ workItemId: "item-1", tenantId: "tenant-a", outcome: "retry_pending", attemptCount: 1, error: "busy" });
    expect(onItemDone).not.toHaveBeenCalled();
    expect(replica.workItems.get("item-1")?.retryEligibleAt).toEqual(new Date("2026-01-01T00:00:00.500Z"));
  });

  it("logs dead-lettered items as warnings", async () => {
    const replica = buildReplica({ config: { maxAttempts: 1 } });
    const item = await toProcessing(replica, "item-1");

    const report = await replica.transitioner.apply(item, { kind: "failure", error: "boom", retryable: true });

    expect(report.outcome).toBe("dead_letter");
    expect(loggedEvents(logs.warn)).toContainEqual({
      event: "dispatch.completed",
      workItemId: "item-1",
      tenantId: "tenant-a",
      outcome: "dead_letter",
      attemptCount: 1,
      error: "boom"
    });
  });

  it("keeps the lease and throws when the outcome cannot be written", async () => {
    const replica = buildReplica();
    const item = await toProcessing(replica, "item-1");
    jest.spyOn(replica.workItems, "applyTransition").mockRejectedValueOnce(new Error("deadlock detected"));

    const attempt = replica.transitioner.apply(item, { kind: "success", result: {} });

    await expect(attempt).rejects.toBeInstanceOf(WorkItemFatalError);
    await expect(attempt).rejects.toMatchObject({ code: "store_write_failed", context: { phase: "complete" } });
    expect(replica.leaseStore.liveHolder("item-1", "tenant-a")).toBe("replica-a");
  });

  it("logs instead of throwing when a lease release fails", async () => {
    const replica = buildReplica();
    jest.spyOn(replica.leases, "release").mockRejectedValueOnce(new Error("timeout"));

    await expect(replica.transitioner.releaseLease({ id: "item-1", tenantId: "tenant-a" })).resolves.toBeUndefined();
    expect(loggedEvents(logs.warn)).toContainEqual({
      event: "lease.release_failed",
      workItemId: "item-1",
      tenantId: "tenant-a",
      reason: "timeout"
    });
  });
});
