import { describe, it, expect } from "vitest";
import { aggregateHits, extractRuleShort } from "../src/analytics/aggregate.js";
import { buildLeveyJenningsRows } from "../src/analytics/levey_jennings.js";
import { detectViolations } from "../src/analytics/westgard.js";
import type { RejectionRuleCode, RuleSet, ZMatrix } from "../src/shared/types.js";

function rulesOf(...codes: RejectionRuleCode[]): RuleSet {
  return new Set(codes);
}

const R4S = "R_4s (run 1, Ctrl 1, Ctrl 2 range ≥4SD)";

// run 1: R_4s plus two warnings, run 2: one warning, run 3: clean
const matrix: ZMatrix = {
  levelCount: 2,
  runs: [
    { label: "1", z: [2.5, -2.2] },
    { label: "2", z: [0.3, 2.1] },
    { label: "3", z: [0.1, -0.1] },
  ],
};
const hits = detectViolations(matrix, rulesOf("1_3s", "R_4s"));

describe("Run verdicts", () => {
  const { runVerdicts } = aggregateHits(hits, matrix.runs, 2);

  it("rejection outranks warnings", () => {
    expect(runVerdicts[0]).toEqual({
      run: 0,
      label: "1",
      status: "Reject",
      rejectionMessages: [R4S],
      warningMessages: ["1_2s (Ctrl 1, z=2.50)", "1_2s (Ctrl 2, z=-2.20)"],
      summary: `${R4S}; 1_2s (Ctrl 1, z=2.50); 1_2s (Ctrl 2, z=-2.20)`,
    });
  });

  it("1_2s alone only warns", () => {
    expect(runVerdicts[1].status).toBe("Warning");
    expect(runVerdicts[1].rejectionMessages).toEqual([]);
    expect(runVerdicts[1].warningMessages).toEqual(["1_2s (Ctrl 2, z=2.10)"]);
  });

  it("a run without hits passes with an empty summary", () => {
    expect(runVerdicts[2]).toEqual({
      run: 2,
      label: "3",
      status: "Pass",
      rejectionMessages: [],
      warningMessages: [],
      summary: "",
    });
  });
});

describe("Point verdicts", () => {
  const { pointVerdicts } = aggregateHits(hits, matrix.runs, 2);

  it("one verdict per cell, run-major with 1-based levels", () => {
    expect(pointVerdicts.map((p) => [p.run, p.level])).toEqual([
      [0, 1],
      [0, 2],
      [1, 1],
      [1, 2],
      [2, 1],
      [2, 2],
    ]);
  });

  it("a cross-level hit reaches every level it names", () => {
    expect(pointVerdicts[0].status).toBe("Reject");
    expect(pointVerdicts[0].ruleCodes).toEqual(["R_4s", "1_2s"]);
    expect(pointVerdicts[0].warningMessages).toEqual(["1_2s (Ctrl 1, z=2.50)"]);
    expect(pointVerdicts[1].status).toBe("Reject");
    expect(pointVerdicts[1].warningMessages).toEqual(["1_2s (Ctrl 2, z=-2.20)"]);
  });

  it("a single-level hit stays on its own point", () => {
    expect(pointVerdicts[2].status).toBe("Pass");
    expect(pointVerdicts[2].ruleCodes).toEqual([]);
    expect(pointVerdicts[3].status).toBe("Warning");
    expect(pointVerdicts[3].ruleCodes).toEqual(["1_2s"]);
  });

  it("1_3s marks only the offending point", () => {
    const m: ZMatrix = { levelCount: 2, runs: [{ label: "A", z: [3.4, 0.2] }] };
    const { pointVerdicts: points } = aggregateHits(detectViolations(m, rulesOf("1_3s")), m.runs, 2);
    expect(points.map((p) => p.status)).toEqual(["Reject", "Pass"]);
    expect(points[0].summary).toBe("1_3s (Ctrl 1, z=3.40)");
  });
});

describe("Aggregation is order independent", () => {
  it("reversed hits give the same verdicts", () => {
    expect(aggregateHits([...hits].reverse(), matrix.runs, 2)).toEqual(
      aggregateHits(hits, matrix.runs, 2)
    );
  });

  it("duplicate hits collapse to one message", () => {
    expect(aggregateHits([...hits, ...hits], matrix.runs, 2)).toEqual(
      aggregateHits(hits, matrix.runs, 2)
    );
  });

  it("overlapping windows on the same run report both messages once", () => {
    // 4_1s fires at run 5 from runs 2–5; the run 4 window covers runs 1–4
    const m: ZMatrix = {
      levelCount: 2,
      runs: [1.5, 1.5, 1.5, 1.5, 1.5].map((z, i) => ({ label: String(i + 1), z: [z, 0] })),
    };
    const { runVerdicts } = aggregateHits(detectViolations(m, rulesOf("1_3s", "4_1s")), m.runs, 2);
    expect(runVerdicts.map((v) => v.status)).toEqual(["Pass", "Pass", "Pass", "Reject", "Reject"]);
    expect(runVerdicts[3].rejectionMessages).toEqual(["4_1s (Ctrl 1, runs 1–4)"]);
    expect(runVerdicts[4].rejectionMessages).toEqual(["4_1s (Ctrl 1, runs 2–5)"]);
  });
});

describe("extractRuleShort", () => {
  it("keeps the first token of each message, de-duplicated", () => {
    expect(
      extractRuleShort("1_3s (Ctrl 1, z=3.10); 2_2s (Ctrl 1, runs 1–2); 1_3s (Ctrl 2, z=-3.30)")
    ).toBe("1_3s, 2_2s");
  });

  it("empty input gives an empty string", () => {
    expect(extractRuleShort("")).toBe("");
    expect(extractRuleShort("   ")).toBe("");
    expect(extractRuleShort(null)).toBe("");
    expect(extractRuleShort(undefined)).toBe("");
  });
});

describe("Levey–Jennings rows", () => {
  it("carry the point verdict and short codes", () => {
    const { pointVerdicts } = aggregateHits(hits, matrix.runs, 2);
    const rows = buildLeveyJenningsRows(matrix, pointVerdicts);
    expect(rows).toHaveLength(6);
    expect(rows[0]).toEqual({
      run: 0,
      label: "1",
      control: "Ctrl 1",
      z: 2.5,
      zPlotted: 2.5,
      marker: "circle",
      status: "Reject",
      messages: `${R4S}; 1_2s (Ctrl 1, z=2.50)`,
      ruleShort: "R_4s, 1_2s",
    });
  });

  it("clip beyond ±3, draw a square and skip missing points", () => {
    const m: ZMatrix = {
      levelCount: 2,
      runs: [
        { label: "1", z: [3.6, null] },
        { label: "2", z: [-4.2, 0.5] },
      ],
    };
    const { pointVerdicts } = aggregateHits(detectViolations(m, rulesOf("1_3s")), m.runs, 2);
    const rows = buildLeveyJenningsRows(m, pointVerdicts);
    expect(rows.map((r) => [r.label, r.control, r.zPlotted, r.marker])).toEqual([
      ["1", "Ctrl 1", 3, "square"],
      ["2", "Ctrl 1", -3, "square"],
      ["2", "Ctrl 2", 0.5, "circle"],
    ]);
    expect(rows[0].z).toBe(3.6);
    expect(rows[0].ruleShort).toBe("1_3s");
    expect(rows[2].status).toBe("Pass");
  });

  it("points without a verdict default to Pass", () => {
    const rows = buildLeveyJenningsRows(matrix, []);
    expect(rows.every((r) => r.status === "Pass" && r.messages === "" && r.ruleShort === "")).toBe(true);
  });
});
