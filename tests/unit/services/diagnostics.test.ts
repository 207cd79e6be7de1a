import { describe, it, expect, vi } from "vitest";

import { pipelineLogger } from "../../../src/logger.js";
import { DiagnosticsCollector } from "../../../src/services/diagnostics.js";

describe("services/diagnostics", () => {
  it("should format unmapped values", () => {
    const diagnostics = new DiagnosticsCollector();
    diagnostics.missingValue("ds", "sector", "Logistics");

    expect(diagnostics.list()).toEqual([
      {
        kind: "missing_value",
        identifier: "ds",
        text: "sector Logistics could not be mapped",
      },
    ]);
  });

  it("should deduplicate identical messages", () => {
    const diagnostics = new DiagnosticsCollector();
    diagnostics.warning("ds", "same");
    diagnostics.warning("ds", "same");
    diagnostics.warning("other", "same");

    expect(diagnostics.list("warning")).toHaveLength(2);
  });

  it("should sort by kind, identifier and text", () => {
    const diagnostics = new DiagnosticsCollector();
    diagnostics.warning("b", "w");
    diagnostics.error("b", "z");
    diagnostics.error("a", "y");
    diagnostics.info("a", "i");

    expect(diagnostics.list().map((d) => `${d.kind}:${d.identifier}:${d.text}`)).toEqual([
      "error:a:y",
      "error:b:z",
      "info:a:i",
      "warning:b:w",
    ]);
  });

  it("should count messages by kind", () => {
    const diagnostics = new DiagnosticsCollector();
    diagnostics.error("ds", "broken");
    diagnostics.missingValue("ds", "org type", "Spy");

    expect(diagnostics.counts()).toEqual({
      info: 0,
      missing_value: 1,
      warning: 0,
      error: 1,
    });
  });

  it("should log errors at error level", () => {
    const error = vi.spyOn(pipelineLogger, "error").mockImplementation(() => undefined);
    const warn = vi.spyOn(pipelineLogger, "warn").mockImplementation(() => undefined);

    const diagnostics = new DiagnosticsCollector();
    diagnostics.error("ds", "broken");
    diagnostics.warning("ds", "odd");
    diagnostics.logAll();

    expect(error).toHaveBeenCalledWith({ kind: "error", identifier: "ds" }, "broken");
    expect(warn).toHaveBeenCalledWith({ kind: "warning", identifier: "ds" }, "odd");

    error.mockRestore();
    warn.mockRestore();
  });
});
