import { describe, it, expect } from "vitest";
import { ENV_MAP, loadExtractionConfig, parseExtractionConfig } from "../config.js";
import { ValidationError } from "../errors.js";

describe("parseExtractionConfig", () => {
  it("fills in defaults", () => {
    expect(parseExtractionConfig()).toEqual({
      concurrency: "sequential",
      logLevel: "info",
    });
  });

  it("keeps explicit values", () => {
    const config = parseExtractionConfig({ concurrency: "parallel", timeoutMs: 250, logLevel: "debug" });
    expect(config).toEqual({ concurrency: "parallel", timeoutMs: 250, logLevel: "debug" });
  });

  it("rejects a non-positive timeout", () => {
    expect(() => parseExtractionConfig({ timeoutMs: 0 })).toThrow(ValidationError);
  });

  it("names the offending field", () => {
    try {
      parseExtractionConfig({ timeoutMs: -1 });
      expect.unreachable();
    } catch (error) {
      expect(error instanceof ValidationError && error.field).toBe("timeoutMs");
    }
  });
});

describe("loadExtractionConfig", () => {
  it("reads and coerces environment variables", () => {
    const config = loadExtractionConfig({
      [ENV_MAP.concurrency]: "parallel",
      [ENV_MAP.timeoutMs]: "1500",
      [ENV_MAP.logLevel]: " warn ",
    });
    expect(config).toEqual({ concurrency: "parallel", timeoutMs: 1500, logLevel: "warn" });
  });

  it("ignores unset and empty variables", () => {
    expect(loadExtractionConfig({ EXTRACTION_TIMEOUT_MS: "", EXTRACTION_LOG_LEVEL: "   " })).toEqual(parseExtractionConfig());
  });

  it("rejects an unknown concurrency mode", () => {
    expect(() => loadExtractionConfig({ EXTRACTION_CONCURRENCY: "threads" })).toThrow('Invalid "concurrency"');
  });
});
