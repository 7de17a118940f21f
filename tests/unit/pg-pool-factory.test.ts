import { createPgPool, ensureSchema } from "../../src/infrastructure/postgres/PgPoolFactory";
import { schemaStatements } from "../../src/infrastructure/postgres/postgres.schema";
import { createFakePool } from "../support/fakePg";
import { loggedEvents, silenceLogs } from "../support/workerHarness";

describe("createPgPool", () => {
  let logs: ReturnType<typeof silenceLogs>;

  beforeEach(() => {
    logs = silenceLogs();
  });

  afterEach(() => {
    logs.restore();
  });

  it("logs idle client errors instead of crashing the process", async () => {
    const pool = createPgPool("postgres://localhost:5432/workitems_test", 2);

    expect(pool.listenerCount("error")).toBe(1);
    expect(() => pool.emit("error", new Error("terminating connection due to administrator command"))).not.toThrow();
    expect(loggedEvents(logs.warn)).toEqual([
      { event: "db.pool_error", reason: "terminating connection due to administrator command" }
    ]);

    await pool.end();
  });

  it("creates the schema statement by statement", async () => {
    const { pool, calls } = createFakePool();

    await ensureSchema(pool);

    expect(calls.map((call) => call.text)).toEqual(schemaStatements);
    expect(calls.map((call) => call.text)).toContain(
      "CREATE UNIQUE INDEX IF NOT EXISTS idx_process_definitions_id ON process_definitions (id)"
    );
  });
});
