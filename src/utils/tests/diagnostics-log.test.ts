import { describe, expect, it } from "vitest";
import { createTestLogger } from "@/testing";
import { createDiagnosticsLog } from "../diagnostics-log";

describe("createDiagnosticsLog", () => {
  it("should write prefixed messages at info when diagnostics are on", () => {
    const { logger, sink } = createTestLogger();
    const log = createDiagnosticsLog("REST", { diagnostics: true, logger });

    log("Routes ready", { baseUrl: "/api" });

    const [record] = sink.records();
    expect(record?.level).toBe("info");
    expect(record?.atFunction).toBe("REST");
    expect(record?.message).toBe("[REST] Routes ready");
    expect(record?.data).toEqual({ baseUrl: "/api" });
  });

  it("should write at debug when diagnostics are off", () => {
    const { logger, sink } = createTestLogger();
    const log = createDiagnosticsLog("TaskServer", { logger });

    log("Store opened");

    expect(sink.records()[0]?.level).toBe("debug");
  });

  it("should be silent at debug when the logger level is info", () => {
    const { logger, sink } = createTestLogger({ level: "info" });
    const log = createDiagnosticsLog("TaskServer", {
      diagnostics: false,
      logger,
    });

    log("Store opened");

    expect(sink.lines).toEqual([]);
  });
});
