import type {
  RejectionRuleCode,
  RuleFinding,
  RuleHit,
  RuleSet,
  ZCell,
  ZMatrix,
} from "../shared/types.js";
import { validateZMatrix } from "./matrix.js";

/**
 * Westgard multi-rules over a run × level z matrix.
 *
 * 1_2s:    one point with 2 <= |z| < 3 (warning only).
 * 1_3s:    one point with |z| >= 3.
 * 2_2s:    two points in the 2–3 SD band on the same side, across levels in one
 *          run or across two consecutive runs at one level.
 * 2of3_2s: two of three points beyond 2 SD on the same side, across three
 *          consecutive runs at one level or across levels in one run.
 * R_4s:    levels in one run spread >= 4 SD with one >= +2 and one <= -2.
 * 3_1s / 4_1s: consecutive points beyond 1 SD on the same side.
 * 9x / 10x:    consecutive points on the same side of the mean.
 *
 * Multi-run windows attach their hit to the last run of the window. A window
 * with a missing cell it needs is skipped; NaN and ±Infinity count as missing.
 * A z of exactly 0 is on neither side.
 */

const WARNING_LIMIT = 2;
const REJECTION_LIMIT = 3;
const RANGE_LIMIT = 4;

const SIDES = [1, -1] as const;

type Side = (typeof SIDES)[number];

interface WindowMatch {
  run: number;
  fromRun: number;
}

interface LevelWindowMatch extends WindowMatch {
  level: number;
}

function cell(matrix: ZMatrix, run: number, level: number): ZCell {
  return matrix.runs[run].z[level];
}

/** Null and non-finite z values are missing. */
export function isPresent(z: ZCell): z is number {
  return z !== null && Number.isFinite(z);
}

function allPresent(values: readonly ZCell[]): values is readonly number[] {
  return values.every(isPresent);
}

function onSide(z: number, side: Side, minAbs: number): boolean {
  return Math.sign(z) === side && Math.abs(z) >= minAbs;
}

function inWarningBand(z: number): boolean {
  const abs = Math.abs(z);
  return abs >= WARNING_LIMIT && abs < REJECTION_LIMIT;
}

function levelWindow(
  matrix: ZMatrix,
  level: number,
  end: number,
  size: number
): readonly ZCell[] {
  const values: ZCell[] = [];
  for (let i = end - size + 1; i <= end; i++) values.push(cell(matrix, i, level));
  return values;
}

function blockWindow(matrix: ZMatrix, end: number, runCount: number): readonly ZCell[] {
  const values: ZCell[] = [];
  for (let i = end - runCount + 1; i <= end; i++) values.push(...matrix.runs[i].z);
  return values;
}

/**
 * `size` consecutive runs at one level, all present, all on one side with
 * |z| >= minAbs.
 */
function sameSideAcrossRuns(matrix: ZMatrix, size: number, minAbs: number): LevelWindowMatch[] {
  const matches: LevelWindowMatch[] = [];
  for (let level = 0; level < matrix.levelCount; level++) {
    for (let i = size - 1; i < matrix.runs.length; i++) {
      const values = levelWindow(matrix, level, i, size);
      if (!allPresent(values)) continue;
      for (const side of SIDES) {
        if (values.every((v) => onSide(v, side, minAbs))) {
          matches.push({ run: i, fromRun: i - size + 1, level });
          break;
        }
      }
    }
  }
  return matches;
}

/**
 * `runCount` consecutive runs × every level, all present, all on one side
 * with |z| >= minAbs.
 */
function sameSideBlock(matrix: ZMatrix, runCount: number, minAbs: number): WindowMatch[] {
  const matches: WindowMatch[] = [];
  for (let i = runCount - 1; i < matrix.runs.length; i++) {
    const values = blockWindow(matrix, i, runCount);
    if (!allPresent(values)) continue;
    for (const side of SIDES) {
      if (values.every((v) => onSide(v, side, minAbs))) {
        matches.push({ run: i, fromRun: i - runCount + 1 });
        break;
      }
    }
  }
  return matches;
}

// ── Single-point rules ───────────────────────────────────────────────

export function detect1_2s(matrix: ZMatrix): RuleFinding[] {
  const findings: RuleFinding[] = [];
  for (let i = 0; i < matrix.runs.length; i++) {
    for (let level = 0; level < matrix.levelCount; level++) {
      const z = cell(matrix, i, level);
      if (isPresent(z) && inWarningBand(z)) {
        findings.push({ pattern: "1_2s", code: "1_2s", run: i, level, z });
      }
    }
  }
  return findings;
}

export function detect1_3s(matrix: ZMatrix): Extract<RuleFinding, { pattern: "1_3s" }>[] {
  const findings: Extract<RuleFinding, { pattern: "1_3s" }>[] = [];
  for (let i = 0; i < matrix.runs.length; i++) {
    for (let level = 0; level < matrix.levelCount; level++) {
      const z = cell(matrix, i, level);
      if (isPresent(z) && Math.abs(z) >= REJECTION_LIMIT) {
        findings.push({ pattern: "1_3s", code: "1_3s", run: i, level, z });
      }
    }
  }
  return findings;
}

// ── 2_2s ─────────────────────────────────────────────────────────────

export function detect2_2sAcrossLevels(matrix: ZMatrix): RuleFinding[] {
  const findings: RuleFinding[] = [];
  matrix.runs.forEach((run, i) => {
    for (const side of SIDES) {
      const levels: number[] = [];
      run.z.forEach((z, level) => {
        if (isPresent(z) && inWarningBand(z) && Math.sign(z) === side) levels.push(level);
      });
      if (levels.length >= 2) {
        findings.push({ pattern: "2_2s_across_levels", code: "2_2s", run: i, levels });
      }
    }
  });
  return findings;
}

export function detect2_2sAcrossRuns(matrix: ZMatrix): RuleFinding[] {
  const findings: RuleFinding[] = [];
  for (let level = 0; level < matrix.levelCount; level++) {
    for (let i = 1; i < matrix.runs.length; i++) {
      const prev = cell(matrix, i - 1, level);
      const cur = cell(matrix, i, level);
      if (!isPresent(prev) || !isPresent(cur)) continue;
      if (inWarningBand(prev) && inWarningBand(cur) && Math.sign(prev) === Math.sign(cur)) {
        findings.push({ pattern: "2_2s_across_runs", code: "2_2s", run: i, fromRun: i - 1, level });
      }
    }
  }
  return findings;
}

// ── 2of3_2s ──────────────────────────────────────────────────────────

/**
 * Missing cells never count toward the two; only a window with no data at
 * all is skipped outright.
 */
export function detect2of3_2sAcrossRuns(matrix: ZMatrix): RuleFinding[] {
  const findings: RuleFinding[] = [];
  for (let level = 0; level < matrix.levelCount; level++) {
    for (let i = 2; i < matrix.runs.length; i++) {
      const values = levelWindow(matrix, level, i, 3);
      if (!values.some(isPresent)) continue;
      for (const side of SIDES) {
        const count = values.filter((v) => isPresent(v) && onSide(v, side, WARNING_LIMIT)).length;
        if (count >= 2) {
          findings.push({
            pattern: "2of3_2s_across_runs",
            code: "2of3_2s",
            run: i,
            fromRun: i - 2,
            level,
          });
          break;
        }
      }
    }
  }
  return findings;
}

export function detect2of3_2sAcrossLevels(matrix: ZMatrix): RuleFinding[] {
  const findings: RuleFinding[] = [];
  matrix.runs.forEach((run, i) => {
    for (const side of SIDES) {
      const levels: number[] = [];
      run.z.forEach((z, level) => {
        if (isPresent(z) && onSide(z, side, WARNING_LIMIT)) levels.push(level);
      });
      if (levels.length >= 2) {
        findings.push({ pattern: "2of3_2s_across_levels", code: "2of3_2s", run: i, levels });
        break;
      }
    }
  });
  return findings;
}

// ── R_4s ─────────────────────────────────────────────────────────────

export function detectR_4s(matrix: ZMatrix): RuleFinding[] {
  const findings: RuleFinding[] = [];
  matrix.runs.forEach((run, i) => {
    const present = run.z.filter(isPresent);
    if (present.length < 2) return;
    const max = Math.max(...present);
    const min = Math.min(...present);
    if (max - min < RANGE_LIMIT || max < WARNING_LIMIT || min > -WARNING_LIMIT) return;

    const levels: number[] = [];
    run.z.forEach((z, level) => {
      if (isPresent(z) && (z === max || z === min)) levels.push(level);
    });
    findings.push({ pattern: "R_4s", code: "R_4s", run: i, levels });
  });
  return findings;
}

// ── 3_1s ─────────────────────────────────────────────────────────────

export function detect3_1sAcrossRuns(matrix: ZMatrix): RuleFinding[] {
  return sameSideAcrossRuns(matrix, 3, 1).map((m): RuleFinding => ({
    pattern: "3_1s_across_runs",
    code: "3_1s",
    ...m,
  }));
}

/** Only meaningful with three levels; needs every level present. */
export function detect3_1sAcrossLevels(matrix: ZMatrix): RuleFinding[] {
  if (matrix.levelCount < 3) return [];
  const findings: RuleFinding[] = [];
  matrix.runs.forEach((run, i) => {
    if (!allPresent(run.z)) return;
    for (const side of SIDES) {
      const levels: number[] = [];
      run.z.forEach((z, level) => {
        if (isPresent(z) && onSide(z, side, 1)) levels.push(level);
      });
      if (levels.length >= 3) {
        findings.push({ pattern: "3_1s_across_levels", code: "3_1s", run: i, levels });
        break;
      }
    }
  });
  return findings;
}

// ── 4_1s ─────────────────────────────────────────────────────────────

export function detect4_1sAcrossRuns(matrix: ZMatrix): RuleFinding[] {
  return sameSideAcrossRuns(matrix, 4, 1).map((m): RuleFinding => ({
    pattern: "4_1s_across_runs",
    code: "4_1s",
    ...m,
  }));
}

/** 2 runs × 2 levels; two-level series only. */
export function detect4_1sBlock(matrix: ZMatrix): RuleFinding[] {
  if (matrix.levelCount !== 2) return [];
  return sameSideBlock(matrix, 2, 1).map((m): RuleFinding => ({ pattern: "4_1s_block", code: "4_1s", ...m }));
}

// ── 9x / 10x ─────────────────────────────────────────────────────────

export function detect9xAcrossRuns(matrix: ZMatrix): RuleFinding[] {
  return sameSideAcrossRuns(matrix, 9, 0).map((m): RuleFinding => ({
    pattern: "9x_across_runs",
    code: "9x",
    ...m,
  }));
}

/** 3 runs × 3 levels; three-level series only. */
export function detect9xBlock(matrix: ZMatrix): RuleFinding[] {
  if (matrix.levelCount !== 3) return [];
  return sameSideBlock(matrix, 3, 0).map((m): RuleFinding => ({ pattern: "9x_block", code: "9x", ...m }));
}

export function detect10xAcrossRuns(matrix: ZMatrix): RuleFinding[] {
  if (matrix.levelCount !== 2) return [];
  return sameSideAcrossRuns(matrix, 10, 0).map((m): RuleFinding => ({
    pattern: "10x_across_runs",
    code: "10x",
    ...m,
  }));
}

/** 5 runs × 2 levels; two-level series only. */
export function detect10xBlock(matrix: ZMatrix): RuleFinding[] {
  if (matrix.levelCount !== 2) return [];
  return sameSideBlock(matrix, 5, 0).map((m): RuleFinding => ({ pattern: "10x_block", code: "10x", ...m }));
}

// ── Engine ───────────────────────────────────────────────────────────

const REJECTION_DETECTORS: ReadonlyArray<{
  code: RejectionRuleCode;
  detectors: ReadonlyArray<(matrix: ZMatrix) => RuleFinding[]>;
}> = [
  { code: "1_3s", detectors: [detect1_3s] },
  { code: "2_2s", detectors: [detect2_2sAcrossLevels, detect2_2sAcrossRuns] },
  { code: "2of3_2s", detectors: [detect2of3_2sAcrossRuns, detect2of3_2sAcrossLevels] },
  { code: "R_4s", detectors: [detectR_4s] },
  { code: "3_1s", detectors: [detect3_1sAcrossRuns, detect3_1sAcrossLevels] },
  { code: "4_1s", detectors: [detect4_1sAcrossRuns, detect4_1sBlock] },
  { code: "9x", detectors: [detect9xAcrossRuns, detect9xBlock] },
  { code: "10x", detectors: [detect10xAcrossRuns, detect10xBlock] },
];

function assertNever(value: never): never {
  throw new Error(`Unhandled rule pattern: ${JSON.stringify(value)}`);
}

function ctrl(level: number): string {
  return `Ctrl ${level + 1}`;
}

function allLevels(matrix: ZMatrix): number[] {
  return Array.from({ length: matrix.levelCount }, (_, l) => l);
}

/**
 * Human-readable message for a finding; labels come from the matrix.
 */
export function describeFinding(finding: RuleFinding, matrix: ZMatrix): string {
  const label = (run: number) => matrix.runs[run].label;
  switch (finding.pattern) {
    case "1_2s":
    case "1_3s":
      return `${finding.code} (${ctrl(finding.level)}, z=${finding.z.toFixed(2)})`;
    case "2_2s_across_runs":
    case "2of3_2s_across_runs":
    case "3_1s_across_runs":
    case "4_1s_across_runs":
      return `${finding.code} (${ctrl(finding.level)}, runs ${label(finding.fromRun)}–${label(finding.run)})`;
    case "9x_across_runs":
    case "10x_across_runs":
      return `${finding.code} (${ctrl(finding.level)}, runs ${label(finding.fromRun)}–${label(finding.run)} same side)`;
    case "2_2s_across_levels":
      return `2_2s (run ${label(finding.run)}, ${finding.levels.map(ctrl).join(", ")} same side 2–3SD)`;
    case "2of3_2s_across_levels":
      return `2of3_2s (run ${label(finding.run)}, ${finding.levels.map(ctrl).join(", ")} same side ≥2SD)`;
    case "R_4s":
      return `R_4s (run ${label(finding.run)}, ${finding.levels.map(ctrl).join(", ")} range ≥4SD)`;
    case "3_1s_across_levels":
      return `3_1s (run ${label(finding.run)}, ${finding.levels.map(ctrl).join(", ")} same side ≥1SD)`;
    case "4_1s_block":
      return `4_1s (runs ${label(finding.fromRun)}–${label(finding.run)} × ${matrix.levelCount} levels, all same side ≥1SD)`;
    case "9x_block":
    case "10x_block":
      return `${finding.code} (runs ${label(finding.fromRun)}–${label(finding.run)} × ${matrix.levelCount} levels, all same side)`;
    default:
      return assertNever(finding);
  }
}

function findingLevels(finding: RuleFinding, matrix: ZMatrix): readonly number[] {
  switch (finding.pattern) {
    case "1_2s":
    case "1_3s":
    case "2_2s_across_runs":
    case "2of3_2s_across_runs":
    case "3_1s_across_runs":
    case "4_1s_across_runs":
    case "9x_across_runs":
    case "10x_across_runs":
      return [finding.level];
    case "2_2s_across_levels":
    case "2of3_2s_across_levels":
    case "R_4s":
    case "3_1s_across_levels":
      return finding.levels;
    case "4_1s_block":
    case "9x_block":
    case "10x_block":
      return allLevels(matrix);
    default:
      return assertNever(finding);
  }
}

export function toRuleHit(finding: RuleFinding, matrix: ZMatrix): RuleHit {
  return { ...finding, levels: findingLevels(finding, matrix), message: describeFinding(finding, matrix) };
}

/**
 * Detect every violation in the matrix. 1_2s is always evaluated as a
 * warning; every other rule only when its code is in the active set.
 * Output order is rule order, then each detector's scan order.
 */
export function detectViolations(matrix: ZMatrix, rules: RuleSet): RuleHit[] {
  validateZMatrix(matrix);

  const findings: RuleFinding[] = detect1_2s(matrix);
  for (const { code, detectors } of REJECTION_DETECTORS) {
    if (!rules.has(code)) continue;
    for (const detect of detectors) findings.push(...detect(matrix));
  }
  return findings.map((f) => toRuleHit(f, matrix));
}
