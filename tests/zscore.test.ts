import { describe, it, expect } from "vitest";
import { computeZScore, parseMeasurement, referenceSd, round } from "../src/analytics/stats.js";
import { buildZMatrix, resolveReferenceSds, validateZMatrix } from "../src/analytics/matrix.js";
import { QcConfigurationError } from "../src/shared/errors.js";
import type { ZMatrix } from "../src/shared/types.js";

describe("parseMeasurement", () => {
  it("accepts numbers and numeric strings", () => {
    expect(parseMeasurement(5.2)).toBe(5.2);
    expect(parseMeasurement(" 4.75 ")).toBe(4.75);
  });

  it("maps empty, absent and non-numeric values to null", () => {
    expect(parseMeasurement("")).toBeNull();
    expect(parseMeasurement("   ")).toBeNull();
    expect(parseMeasurement(null)).toBeNull();
    expect(parseMeasurement(undefined)).toBeNull();
    expect(parseMeasurement("n/a")).toBeNull();
    expect(parseMeasurement(NaN)).toBeNull();
  });
});

describe("computeZScore", () => {
  it("standardizes against mean and SD", () => {
    expect(computeZScore(12, 10, 2)).toBe(1);
    expect(computeZScore("7", 10, 2)).toBe(-1.5);
  });

  it("does not clamp", () => {
    expect(computeZScore(30, 10, 2)).toBe(10);
  });

  it("is missing for a missing value", () => {
    expect(computeZScore("", 10, 2)).toBeNull();
    expect(computeZScore(null, 10, 2)).toBeNull();
  });

  it("is missing when SD cannot standardize", () => {
    expect(computeZScore(12, 10, 0)).toBeNull();
    expect(computeZScore(12, 10, -2)).toBeNull();
    expect(computeZScore(12, 10, NaN)).toBeNull();
    expect(computeZScore(12, 10, null)).toBeNull();
    expect(computeZScore(12, 10, undefined)).toBeNull();
  });

  it("is missing without a mean", () => {
    expect(computeZScore(12, null, 2)).toBeNull();
    expect(computeZScore(12, NaN, 2)).toBeNull();
  });
});

describe("referenceSd", () => {
  const stats = { level: 1, mean: 200, sdEmpirical: 5, cvTargetPct: 3 };

  it("empirical mode uses the baseline SD", () => {
    expect(referenceSd(stats, "empirical")).toBe(5);
  });

  it("cvh mode derives SD from mean and target CV%", () => {
    expect(referenceSd(stats, "cvh")).toBe(6);
  });

  it("cvh mode is missing without a target CV%", () => {
    expect(referenceSd({ level: 1, mean: 200, sdEmpirical: 5 }, "cvh")).toBeNull();
  });

  it("empirical mode is missing without a baseline SD", () => {
    expect(referenceSd({ level: 1, mean: 200, sdEmpirical: null }, "empirical")).toBeNull();
  });
});

describe("round", () => {
  it("rounds to the requested decimals", () => {
    expect(round(3.14159, 2)).toBe(3.14);
    expect(round(3.14159)).toBe(3.1416);
  });
});

describe("resolveReferenceSds", () => {
  it("returns one entry per level, nulls where stats are missing", () => {
    const resolved = resolveReferenceSds([{ level: 2, mean: 50, sdEmpirical: 2 }], 3, "empirical");
    expect(resolved).toEqual([
      { level: 1, mean: null, sd: null },
      { level: 2, mean: 50, sd: 2 },
      { level: 3, mean: null, sd: null },
    ]);
  });
});

describe("buildZMatrix", () => {
  const reference = [
    { level: 1, mean: 10, sd: 2 },
    { level: 2, mean: 100, sd: 10 },
  ];

  it("standardizes rows in order and keeps labels", () => {
    const matrix = buildZMatrix(
      [
        { label: "D1", values: [12, "80"] },
        { label: "D2", values: ["", 100] },
      ],
      reference,
      2
    );
    expect(matrix).toEqual({
      levelCount: 2,
      runs: [
        { label: "D1", z: [1, -2] },
        { label: "D2", z: [null, 0] },
      ],
    });
  });

  it("levels without reference stats give missing z-scores", () => {
    const matrix = buildZMatrix(
      [{ label: "1", values: [12, 110] }],
      [reference[0], { level: 2, mean: null, sd: null }],
      2
    );
    expect(matrix.runs[0].z).toEqual([1, null]);
  });

  it("rejects an empty series", () => {
    expect(() => buildZMatrix([], reference, 2)).toThrow(QcConfigurationError);
  });

  it("rejects rows with the wrong number of levels", () => {
    try {
      buildZMatrix([{ label: "7", values: [1, 2, 3] }], reference, 2);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(QcConfigurationError);
      if (err instanceof QcConfigurationError) {
        expect(err.code).toBe("LEVEL_COUNT_MISMATCH");
        expect(err.message).toBe("Run 7 (row 1) has 3 level column(s), expected 2");
      }
    }
  });

  it("enforces the run limit when given", () => {
    const rows = [
      { label: "1", values: [10, 100] },
      { label: "2", values: [10, 100] },
    ];
    expect(() => buildZMatrix(rows, reference, 2, 1)).toThrow(/exceeds the limit of 1/);
  });
});

describe("validateZMatrix", () => {
  it("rejects an unsupported level count", () => {
    const bogus: ZMatrix = JSON.parse('{"levelCount":4,"runs":[{"label":"1","z":[0,0,0,0]}]}');
    expect(() => validateZMatrix(bogus)).toThrow(/Level count must be 2 or 3, got 4/);
  });

  it("accepts a well-formed matrix", () => {
    expect(() =>
      validateZMatrix({ levelCount: 3, runs: [{ label: "1", z: [0, null, 1] }] })
    ).not.toThrow();
  });
});
