import { HttpDownstreamFanOut } from "../../src/infrastructure/http/HttpDownstreamFanOut";
import { HttpJsonClient } from "../../src/infrastructure/http/httpJsonClient";
import { HttpWorkItemProcessor } from "../../src/infrastructure/http/HttpWorkItemProcessor";
import { createInMemoryStores } from "../support/inMemoryStores";
import { sendJson, startServer, type TestServer } from "../support/testServer";
import { buildReplica, silenceLogs } from "../support/workerHarness";

// One local server plays both the agent-execution service and the process engine.
const routeRequest = (url: string): { status: number; body: unknown } => {
  const processMatch = /^\/work-items\/([^/]+)\/process$/.exec(url);
  if (processMatch) {
    return { status: 200, body: { status: "success", result: { handledBy: "agent", item: decodeURIComponent(processMatch[1]) } } };
  }
  const completeMatch = /^\/process-instances\/[^/]+\/activities\/([^/]+)\/complete$/.exec(url);
  if (completeMatch) {
    const next = completeMatch[1] === "review" ? [{ activityName: "approve", draft: { kind: "form", formValues: {} } }] : [];
    return { status: 200, body: { next } };
  }
  return { status: 404, body: { message: "not found" } };
};

describe("two replicas over shared stores (e2e)", () => {
  let server: TestServer;
  let logs: ReturnType<typeof silenceLogs>;

  beforeAll(async () => {
    server = await startServer((req, res) => {
      const routed = routeRequest(req.url ?? "/");
      sendJson(res, routed.status, routed.body);
    });
  });

  afterAll(async () => {
    await server.close();
  });

  beforeEach(() => {
    logs = silenceLogs();
  });

  afterEach(() => {
    logs.restore();
  });

  it("processes every item and every follow-up exactly once", async () => {
    const stores = createInMemoryStores();
    const replicas = ["replica-a", "replica-b"].map((holderId) => {
      const client = new HttpJsonClient(server.baseUrl, 5000, { retries: 0, minDelayMs: 1, maxDelayMs: 1 });
      return buildReplica({
        stores,
        holderId,
        processor: new HttpWorkItemProcessor(client),
        fanOut: new HttpDownstreamFanOut(client),
        config: { batchSize: 2, maxInFlight: 2 }
      });
    });
    for (let i = 1; i <= 6; i += 1) {
      stores.workItems.seed({ id: `review-${i}`, procInstId: `proc-${i}`, activityName: "review" });
    }

    for (let round = 0; round < 30; round += 1) {
      await Promise.all(replicas.map((replica) => replica.poller.runCycle()));
      await Promise.all(replicas.map((replica) => replica.poller.drain()));
      const items = stores.workItems.withStatus("DONE");
      if (items.length === 12 && items.every((item) => item.fannedOutAt !== undefined)) break;
    }

    const done = stores.workItems.withStatus("DONE");
    expect(done).toHaveLength(12);
    expect(done.filter((item) => item.activityName === "approve").map((item) => item.procInstId).sort()).toEqual(
      ["proc-1", "proc-2", "proc-3", "proc-4", "proc-5", "proc-6"]
    );

    const processCalls = server.requests.filter((request) => request.url?.endsWith("/process"));
    const completeCalls = server.requests.filter((request) => request.url?.endsWith("/complete"));
    expect(processCalls).toHaveLength(12);
    expect(new Set(processCalls.map((request) => request.url)).size).toBe(12);
    expect(completeCalls).toHaveLength(12);
    expect(done.map((item) => item.consumer).every((consumer) => consumer === "replica-a" || consumer === "replica-b")).toBe(true);
    expect(stores.leaseStore.rows.size).toBe(0);
  });
});
