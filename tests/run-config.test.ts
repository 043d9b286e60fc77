import { describe, it, expect } from "vitest";
import {
  DEFAULT_MAX_RUNS,
  parseMaxRuns,
  parseSdMode,
  parseSigmaOverride,
} from "../src/shared/run_config.js";

describe("parseSdMode", () => {
  it("defaults to empirical when no args", () => {
    expect(parseSdMode()).toBe("empirical");
  });

  it("CLI arg takes priority over env var", () => {
    expect(parseSdMode("cvh", "empirical")).toBe("cvh");
  });

  it("falls back to env var when no CLI arg", () => {
    expect(parseSdMode(undefined, "cvh")).toBe("cvh");
  });

  it("handles uppercase and the short alias", () => {
    expect(parseSdMode("CVH")).toBe("cvh");
    expect(parseSdMode("cv")).toBe("cvh");
  });

  it("unknown values fall back to empirical", () => {
    expect(parseSdMode("bogus")).toBe("empirical");
  });
});

describe("parseSigmaOverride", () => {
  it("returns undefined when nothing is given", () => {
    expect(parseSigmaOverride()).toBeUndefined();
    expect(parseSigmaOverride("  ")).toBeUndefined();
  });

  it("parses numeric input, CLI first", () => {
    expect(parseSigmaOverride("5.2", "3")).toBe(5.2);
    expect(parseSigmaOverride(undefined, "3")).toBe(3);
  });

  it("ignores non-numeric input", () => {
    expect(parseSigmaOverride("six")).toBeUndefined();
  });
});

describe("parseMaxRuns", () => {
  it("defaults when absent or invalid", () => {
    expect(parseMaxRuns()).toBe(DEFAULT_MAX_RUNS);
    expect(parseMaxRuns("0")).toBe(DEFAULT_MAX_RUNS);
    expect(parseMaxRuns("2.5")).toBe(DEFAULT_MAX_RUNS);
  });

  it("accepts a positive integer", () => {
    expect(parseMaxRuns("120")).toBe(120);
    expect(parseMaxRuns(undefined, "40")).toBe(40);
  });
});
