import type { MeasurementValue, ReferenceStats, SdMode } from "../shared/types.js";

/**
 * Coerce a raw measurement to a number. Empty, absent and non-numeric
 * values become null.
 */
export function parseMeasurement(value: MeasurementValue): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  const trimmed = value.trim();
  if (trimmed === "") return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

function usable(x: number | null | undefined): x is number {
  return x !== null && x !== undefined && Number.isFinite(x);
}

/**
 * Standardized deviation of a measurement: (value - mean) / sd.
 * Returns null when the value is missing or the reference stats cannot
 * standardize it (missing mean, missing or non-positive SD). No clamping.
 */
export function computeZScore(
  value: MeasurementValue,
  mean: number | null | undefined,
  sd: number | null | undefined
): number | null {
  const v = parseMeasurement(value);
  if (v === null) return null;
  if (!usable(sd) || sd <= 0) return null;
  if (!usable(mean)) return null;
  return (v - mean) / sd;
}

/**
 * SD used for z-scores under the given mode.
 * "cvh" derives it from the target CV%: mean * CVh / 100.
 */
export function referenceSd(stats: ReferenceStats, mode: SdMode): number | null {
  if (mode === "empirical") {
    return usable(stats.sdEmpirical) ? stats.sdEmpirical : null;
  }
  if (!usable(stats.mean) || !usable(stats.cvTargetPct)) return null;
  return (stats.mean * stats.cvTargetPct) / 100;
}

/**
 * Round to specified decimal places.
 */
export function round(value: number, decimals: number = 4): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
