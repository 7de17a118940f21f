import { Pool, type PoolClient } from "pg";
import { logWarn, toErrorMessage } from "../../shared/logging/log";
import { schemaStatements } from "./postgres.schema";

export const createPgPool = (connectionString: string, max = 10): Pool => {
  const pool = new Pool({ connectionString, max });
  // Emitted when an idle client loses its connection; the pool replaces it on the next checkout.
  pool.on("error", (err) => {
    logWarn({ event: "db.pool_error", reason: toErrorMessage(err) });
  });
  return pool;
};

// Idempotent; safe to run on every replica start.
export const ensureSchema = async (pool: Pool): Promise<void> => {
  for (const statement of schemaStatements) {
    await pool.query(statement);
  }
};

export const withTransaction = async <T>(pool: Pool, fn: (client: PoolClient) => Promise<T>): Promise<T> => {
  const client = await pool.connect();
  try {
    await client.query("BEGIN");
    const result = await fn(client);
    await client.query("COMMIT");
    return result;
  } catch (err) {
    try {
      await client.query("ROLLBACK");
    } catch (rollbackErr) {
      logWarn({ event: "db.rollback_failed", reason: toErrorMessage(rollbackErr) });
    }
    throw err;
  } finally {
    client.release();
  }
};
