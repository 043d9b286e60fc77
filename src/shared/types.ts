/** Number of QC concentration levels measured together in each run */
export type LevelCount = 2 | 3;

/** Sigma-metric bucket that selects the rejection rule set */
export type SigmaCategory = "<4" | "4" | "5" | "6";

/** Westgard rule codes */
export type RuleCode =
  | "1_2s"
  | "1_3s"
  | "2_2s"
  | "2of3_2s"
  | "R_4s"
  | "3_1s"
  | "4_1s"
  | "9x"
  | "10x";

/** Every code except 1_2s, which only ever warns */
export type RejectionRuleCode = Exclude<RuleCode, "1_2s">;

export type RuleSet = ReadonlySet<RejectionRuleCode>;

/** Run / point outcome */
export type QcStatus = "Pass" | "Warning" | "Reject";

/** How the SD used for z-scores is obtained */
export type SdMode = "empirical" | "cvh";

/** A z-score, or null when the measurement or reference stats are missing */
export type ZCell = number | null;

export interface ZRun {
  /** Caller-supplied label, used only for output */
  label: string;
  /** One cell per control level, index 0 = Ctrl 1 */
  z: readonly ZCell[];
}

export interface ZMatrix {
  levelCount: LevelCount;
  runs: readonly ZRun[];
}

// ── Rule hits ────────────────────────────────────────────────────────

interface PointFinding {
  run: number;
  level: number;
  z: number;
}

interface RunWindowFinding {
  /** Last run of the window; the hit is attached here */
  run: number;
  /** First run of the window */
  fromRun: number;
  level: number;
}

interface SameRunFinding {
  run: number;
  levels: readonly number[];
}

interface BlockFinding {
  run: number;
  fromRun: number;
}

/**
 * One detection pattern per tag. The `code` literal on each variant is the
 * Westgard rule the pattern reports under.
 */
export type RuleFinding =
  | ({ pattern: "1_2s"; code: "1_2s" } & PointFinding)
  | ({ pattern: "1_3s"; code: "1_3s" } & PointFinding)
  | ({ pattern: "2_2s_across_levels"; code: "2_2s" } & SameRunFinding)
  | ({ pattern: "2_2s_across_runs"; code: "2_2s" } & RunWindowFinding)
  | ({ pattern: "2of3_2s_across_runs"; code: "2of3_2s" } & RunWindowFinding)
  | ({ pattern: "2of3_2s_across_levels"; code: "2of3_2s" } & SameRunFinding)
  | ({ pattern: "R_4s"; code: "R_4s" } & SameRunFinding)
  | ({ pattern: "3_1s_across_runs"; code: "3_1s" } & RunWindowFinding)
  | ({ pattern: "3_1s_across_levels"; code: "3_1s" } & SameRunFinding)
  | ({ pattern: "4_1s_across_runs"; code: "4_1s" } & RunWindowFinding)
  | ({ pattern: "4_1s_block"; code: "4_1s" } & BlockFinding)
  | ({ pattern: "9x_across_runs"; code: "9x" } & RunWindowFinding)
  | ({ pattern: "9x_block"; code: "9x" } & BlockFinding)
  | ({ pattern: "10x_across_runs"; code: "10x" } & RunWindowFinding)
  | ({ pattern: "10x_block"; code: "10x" } & BlockFinding);

export type RulePattern = RuleFinding["pattern"];

/** A detected violation with the levels (0-based) it implicates and its message */
export type RuleHit = RuleFinding & {
  levels: readonly number[];
  message: string;
};

// ── Verdicts ─────────────────────────────────────────────────────────

export interface RunVerdict {
  run: number;
  label: string;
  status: QcStatus;
  rejectionMessages: string[];
  warningMessages: string[];
  /** Rejection then warning messages, joined with "; " */
  summary: string;
}

export interface PointVerdict {
  run: number;
  label: string;
  /** 1-based control level */
  level: number;
  status: QcStatus;
  rejectionMessages: string[];
  warningMessages: string[];
  /** Distinct codes that fired at this point, in rule order */
  ruleCodes: RuleCode[];
  summary: string;
}

// ── Reference statistics ─────────────────────────────────────────────

export interface ReferenceStats {
  /** 1-based control level */
  level: number;
  mean: number | null;
  /** Sample SD from the baseline series */
  sdEmpirical: number | null;
  /** Target CV% ("CVh"), used when SD is derived from it */
  cvTargetPct?: number | null;
}

export type MeasurementValue = number | string | null | undefined;

export interface MeasurementRow {
  label: string;
  /** One raw value per level, index 0 = Ctrl 1 */
  values: readonly MeasurementValue[];
}
