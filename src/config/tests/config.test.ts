import { describe, expect, it } from "vitest";
import { loadConfig } from "../config";

describe("loadConfig", () => {
  it("should fall back to defaults for an empty environment", () => {
    const config = loadConfig({});

    expect(config.database).toEqual({
      url: "pglite://./data",
      poolSize: 10,
      connectTimeoutMs: 5000,
    });
    expect(config.rest).toEqual({
      baseUrl: "",
      host: "0.0.0.0",
      port: 8000,
      allowedOrigins: ["http://localhost:3000", "http://127.0.0.1:3000"],
      enableDocs: true,
      diagnostics: false,
    });
    expect(config.logging).toEqual({ level: "info", destination: undefined });
    expect(config.pagination).toEqual({ defaultLimit: 100, maxLimit: 1000 });
    expect(config.serverName).toBe("task-tracker");
  });

  it("should read and coerce every variable", () => {
    const config = loadConfig({
      DATABASE_URL: "postgres://app:test-secret@db:5432/tasks",
      DATABASE_POOL_SIZE: "4",
      API_PORT: "9000",
      API_BASE_PATH: "/api/v1/",
      CORS_ORIGINS: "https://a.test, https://b.test ,",
      LOG_LEVEL: "DEBUG",
      LOG_FILE: "./logs/app.log",
      DEFAULT_PAGE_SIZE: "20",
      MAX_PAGE_SIZE: "50",
      ENABLE_DOCS: "0",
      DIAGNOSTICS: "true",
    });

    expect(config.database.poolSize).toBe(4);
    expect(config.rest.port).toBe(9000);
    expect(config.rest.baseUrl).toBe("/api/v1");
    expect(config.rest.allowedOrigins).toEqual([
      "https://a.test",
      "https://b.test",
    ]);
    expect(config.rest.enableDocs).toBe(false);
    expect(config.logging).toEqual({
      level: "debug",
      destination: "./logs/app.log",
    });
    expect(config.pagination).toEqual({ defaultLimit: 20, maxLimit: 50 });
    expect(config.diagnostics).toBe(true);
  });

  it("should treat empty strings as unset", () => {
    const config = loadConfig({ API_PORT: "", LOG_LEVEL: "" });

    expect(config.rest.port).toBe(8000);
    expect(config.logging.level).toBe("info");
  });

  it("should list every invalid variable in one error", () => {
    expect(() =>
      loadConfig({ API_PORT: "70000", LOG_LEVEL: "verbose" })
    ).toThrow(
      "Invalid configuration: API_PORT: must be between 1 and 65535; LOG_LEVEL: must be one of debug, info, warn, error, silent"
    );
  });

  it("should reject a default page size above the max", () => {
    expect(() =>
      loadConfig({ DEFAULT_PAGE_SIZE: "200", MAX_PAGE_SIZE: "100" })
    ).toThrow("DEFAULT_PAGE_SIZE: DEFAULT_PAGE_SIZE must not exceed MAX_PAGE_SIZE");
  });
});
