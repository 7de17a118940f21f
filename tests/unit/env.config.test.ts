import { hostname } from "os";
import { loadEnv } from "../../src/shared/config/env";

describe("loadEnv", () => {
  it("uses defaults for every variable", () => {
    expect(loadEnv({})).toEqual({
      DATABASE_URL: "postgres://localhost:5432/workitems",
      WORKER_ID: `${hostname()}:${process.pid}`,
      PROCESSOR_BASE_URL: "http://localhost:8000",
      PROCESS_ENGINE_BASE_URL: "http://localhost:8000",
      HEALTH_PORT: 8000
    });
  });

  it("trims WORKER_ID and falls back when it is blank", () => {
    expect(loadEnv({ WORKER_ID: "  replica-7 " }).WORKER_ID).toBe("replica-7");
    expect(loadEnv({ WORKER_ID: "   " }).WORKER_ID).toBe(`${hostname()}:${process.pid}`);
  });

  it.each(["http://localhost:3999", "https://agents.internal.example/v1"])(
    "accepts http/https service URLs: %s",
    (baseUrl) => {
      const env = loadEnv({ PROCESSOR_BASE_URL: baseUrl, PROCESS_ENGINE_BASE_URL: baseUrl });
      expect(env.PROCESSOR_BASE_URL).toBe(baseUrl);
      expect(env.PROCESS_ENGINE_BASE_URL).toBe(baseUrl);
    }
  );

  it("rejects non-absolute service URLs", () => {
    expect(() => loadEnv({ PROCESSOR_BASE_URL: "/work-items" })).toThrow(
      "PROCESSOR_BASE_URL must be a valid absolute http/https URL. Received: /work-items"
    );
  });

  it("rejects unsupported service URL schemes", () => {
    expect(() => loadEnv({ PROCESS_ENGINE_BASE_URL: "ftp://example.com" })).toThrow(
      "PROCESS_ENGINE_BASE_URL must use http or https scheme. Received: ftp://example.com"
    );
  });

  it("accepts postgresql:// and rejects other database schemes", () => {
    expect(loadEnv({ DATABASE_URL: "postgresql://db:5432/app" }).DATABASE_URL).toBe("postgresql://db:5432/app");
    expect(() => loadEnv({ DATABASE_URL: "mysql://db:3306/app" })).toThrow(
      "DATABASE_URL must use postgres or postgresql scheme. Received: mysql:"
    );
    expect(() => loadEnv({ DATABASE_URL: "not a url" })).toThrow("DATABASE_URL must be a valid postgres:// connection string");
  });

  it("validates HEALTH_PORT", () => {
    expect(loadEnv({ HEALTH_PORT: "0" }).HEALTH_PORT).toBe(0);
    expect(() => loadEnv({ HEALTH_PORT: "70000" })).toThrow("HEALTH_PORT=70000 is out of allowed range [0..65535]");
  });
});
