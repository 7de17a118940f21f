import { hostname } from "os";

export type Env = {
  DATABASE_URL: string;
  WORKER_ID: string;
  PROCESSOR_BASE_URL: string;
  PROCESS_ENGINE_BASE_URL: string;
  HEALTH_PORT: number;
};

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

const validateDatabaseUrl = (value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error("DATABASE_URL must be a valid postgres:// connection string");
  }
  if (parsed.protocol !== "postgres:" && parsed.protocol !== "postgresql:") {
    throw new Error(`DATABASE_URL must use postgres or postgresql scheme. Received: ${parsed.protocol}`);
  }
  return value;
};

const parsePort = (raw: string | undefined, fallback: number): number => {
  if (raw == null || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0 || value > 65535) {
    throw new Error(`HEALTH_PORT=${raw} is out of allowed range [0..65535]`);
  }
  return value;
};

// Host name alone is not unique when several replicas share a host.
export const defaultWorkerId = (): string => `${hostname()}:${process.pid}`;

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const DATABASE_URL = validateDatabaseUrl(env.DATABASE_URL ?? "postgres://localhost:5432/workitems");
  const WORKER_ID = env.WORKER_ID?.trim() || defaultWorkerId();
  const PROCESSOR_BASE_URL = validateHttpUrl("PROCESSOR_BASE_URL", env.PROCESSOR_BASE_URL ?? "http://localhost:8000");
  const PROCESS_ENGINE_BASE_URL = validateHttpUrl(
    "PROCESS_ENGINE_BASE_URL",
    env.PROCESS_ENGINE_BASE_URL ?? "http://localhost:8000"
  );
  const HEALTH_PORT = parsePort(env.HEALTH_PORT, 8000);

  return { DATABASE_URL, WORKER_ID, PROCESSOR_BASE_URL, PROCESS_ENGINE_BASE_URL, HEALTH_PORT };
};
