import { describe, expect, it } from "vitest";
import { createMemorySink } from "@/testing";
import { createLogger } from "./index";

describe("createLogger", () => {
  it("should write one JSON line per call with the bound app name", () => {
    const sink = createMemorySink();
    const logger = createLogger("tasks-api", { destination: sink.stream });

    logger.info({
      atFunction: "bootServer",
      message: "Server ready",
      data: { port: 8000 },
    });

    const [record] = sink.records();
    expect(sink.lines).toHaveLength(1);
    expect(record?.app).toBe("tasks-api");
    expect(record?.level).toBe("info");
    expect(record?.atFunction).toBe("bootServer");
    expect(record?.message).toBe("Server ready");
    expect(record?.data).toEqual({ port: 8000 });
    expect(typeof record?.time).toBe("string");
  });

  it("should return the generated log id and write it to the record", () => {
    const sink = createMemorySink();
    const logger = createLogger("tasks-api", { destination: sink.stream });

    const logId = logger.error({ atFunction: "fn", message: "boom" });

    expect(logId).toHaveLength(6);
    expect(sink.records()[0]?.log_id).toBe(logId);
  });

  it("should reuse a provided log id", () => {
    const sink = createMemorySink();
    const logger = createLogger("tasks-api", { destination: sink.stream });

    const logId = logger.warn({
      atFunction: "fn",
      message: "retrying",
      log_id: "abc123",
    });

    expect(logId).toBe("abc123");
    expect(sink.records()[0]?.log_id).toBe("abc123");
  });

  it("should store null when no data is given", () => {
    const sink = createMemorySink();
    const logger = createLogger("tasks-api", { destination: sink.stream });

    logger.info({ atFunction: "fn", message: "no data" });

    expect(sink.records()[0]?.data).toBeNull();
  });

  it("should drop entries below the configured level", () => {
    const sink = createMemorySink();
    const logger = createLogger("tasks-api", {
      level: "warn",
      destination: sink.stream,
    });

    logger.debug({ atFunction: "fn", message: "hidden debug" });
    logger.info({ atFunction: "fn", message: "hidden info" });
    logger.warn({ atFunction: "fn", message: "shown warn" });
    logger.error({ atFunction: "fn", message: "shown error" });

    const messages = sink.records().map((r) => r.message);
    expect(messages).toEqual(["shown warn", "shown error"]);
  });

  it("should write nothing when silent but still return ids", () => {
    const sink = createMemorySink();
    const logger = createLogger("tasks-api", {
      level: "silent",
      destination: sink.stream,
    });

    const logId = logger.error({ atFunction: "fn", message: "muted" });

    expect(sink.lines).toEqual([]);
    expect(logId).toHaveLength(6);
  });

  it("should flatten Error instances in data", () => {
    const sink = createMemorySink();
    const logger = createLogger("tasks-api", { destination: sink.stream });

    logger.error({
      atFunction: "fn",
      message: "query failed",
      data: { id: 4, error: new TypeError("connection refused") },
    });

    expect(sink.records()[0]?.data).toEqual({
      id: 4,
      error: { name: "TypeError", message: "connection refused" },
    });
  });

  it("should flatten an Error passed directly as data", () => {
    const sink = createMemorySink();
    const logger = createLogger("tasks-api", { destination: sink.stream });

    logger.error({
      atFunction: "fn",
      message: "query failed",
      data: new Error("timeout"),
    });

    expect(sink.records()[0]?.data).toEqual({
      name: "Error",
      message: "timeout",
    });
  });
});
