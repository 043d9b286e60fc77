import { QcConfigurationError } from "../shared/errors.js";
import type {
  LevelCount,
  MeasurementRow,
  ReferenceStats,
  SdMode,
  ZMatrix,
  ZRun,
} from "../shared/types.js";
import { computeZScore, referenceSd } from "./stats.js";

export interface ReferenceSd {
  /** 1-based control level */
  level: number;
  mean: number | null;
  sd: number | null;
}

/**
 * Guard the structural invariants every evaluation relies on: a supported
 * level count, at least one run, and exactly `levelCount` cells per run.
 */
export function validateZMatrix(matrix: ZMatrix, maxRuns?: number): void {
  const levelCount: number = matrix.levelCount;
  if (levelCount !== 2 && levelCount !== 3) {
    throw new QcConfigurationError(
      "UNSUPPORTED_LEVEL_COUNT",
      `Level count must be 2 or 3, got ${levelCount}`
    );
  }
  if (matrix.runs.length === 0) {
    throw new QcConfigurationError("EMPTY_MATRIX", "No runs to evaluate");
  }
  if (maxRuns !== undefined && matrix.runs.length > maxRuns) {
    throw new QcConfigurationError(
      "MATRIX_TOO_LARGE",
      `${matrix.runs.length} runs exceeds the limit of ${maxRuns}`
    );
  }
  matrix.runs.forEach((run, i) => {
    if (run.z.length !== levelCount) {
      throw new QcConfigurationError(
        "LEVEL_COUNT_MISMATCH",
        `Run ${run.label} (row ${i + 1}) has ${run.z.length} level column(s), expected ${levelCount}`
      );
    }
  });
}

/**
 * Mean/SD per level (1..levelCount) under the chosen SD mode. Levels with no
 * reference entry come back with nulls.
 */
export function resolveReferenceSds(
  reference: readonly ReferenceStats[],
  levelCount: LevelCount,
  sdMode: SdMode
): ReferenceSd[] {
  const byLevel = new Map(reference.map((r) => [r.level, r]));
  const resolved: ReferenceSd[] = [];
  for (let level = 1; level <= levelCount; level++) {
    const stats = byLevel.get(level);
    resolved.push({
      level,
      mean: stats?.mean ?? null,
      sd: stats ? referenceSd(stats, sdMode) : null,
    });
  }
  return resolved;
}

/**
 * Standardize raw measurement rows into a z matrix. Row order is kept as-is.
 */
export function buildZMatrix(
  rows: readonly MeasurementRow[],
  reference: readonly ReferenceSd[],
  levelCount: LevelCount,
  maxRuns?: number
): ZMatrix {
  const runs: ZRun[] = rows.map((row) => ({
    label: row.label,
    z: row.values.map((value, l) => {
      const ref = reference[l];
      return ref ? computeZScore(value, ref.mean, ref.sd) : null;
    }),
  }));

  const matrix: ZMatrix = { levelCount, runs };
  validateZMatrix(matrix, maxRuns);
  return matrix;
}
