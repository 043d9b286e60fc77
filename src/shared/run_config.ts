/**
 * Run Configuration Module
 *
 * Settings that shape one IQC evaluation:
 * - sigma:     method sigma metric; selects the rejection rule set.
 * - levelCount: 2 or 3 QC levels per run.
 * - sdMode:    "empirical" uses the baseline SD, "cvh" derives SD from the target CV%.
 * - maxRuns:   operational ceiling on the number of runs in one call.
 */

import type { LevelCount, SdMode } from "./types.js";

export const DEFAULT_MAX_RUNS = 500;

export interface RunConfig {
  sigma: number | null | undefined;
  levelCount: LevelCount;
  sdMode: SdMode;
  maxRuns: number;
}

/**
 * Parse SD mode from CLI argument and/or environment variable.
 * CLI argument takes priority over environment variable.
 * Defaults to "empirical" when neither is provided or the value is unknown.
 */
export function parseSdMode(cliArg?: string, envVar?: string): SdMode {
  const raw = (cliArg ?? envVar ?? "empirical").trim().toLowerCase();
  if (raw === "cvh" || raw === "cv") return "cvh";
  return "empirical";
}

/**
 * Parse a sigma override. Returns undefined when nothing usable is given so
 * the dataset's own sigma applies.
 */
export function parseSigmaOverride(cliArg?: string, envVar?: string): number | undefined {
  const raw = cliArg ?? envVar;
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

export function parseMaxRuns(cliArg?: string, envVar?: string): number {
  const raw = cliArg ?? envVar;
  if (raw === undefined) return DEFAULT_MAX_RUNS;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) return DEFAULT_MAX_RUNS;
  return value;
}
