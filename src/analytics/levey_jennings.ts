import type { PointVerdict, QcStatus, ZMatrix } from "../shared/types.js";
import { extractRuleShort } from "./aggregate.js";
import { isPresent } from "./westgard.js";

/** Plot range of a Levey–Jennings chart in SD units */
export const LJ_DISPLAY_LIMIT = 3;

export type LjMarker = "circle" | "square";

export interface LeveyJenningsRow {
  run: number;
  label: string;
  control: string;
  z: number;
  /** z clipped to ±3 for plotting; `z` keeps the real value */
  zPlotted: number;
  /** Points beyond ±3 are drawn as squares on the limit line */
  marker: LjMarker;
  status: QcStatus;
  messages: string;
  ruleShort: string;
}

/**
 * Long-form rows for a Levey–Jennings chart, one per measured point. Missing
 * points are left out. Verdicts default to Pass when none matches a point.
 */
export function buildLeveyJenningsRows(
  matrix: ZMatrix,
  pointVerdicts: readonly PointVerdict[]
): LeveyJenningsRow[] {
  const verdicts = new Map(pointVerdicts.map((p) => [`${p.run}:${p.level}`, p]));
  const rows: LeveyJenningsRow[] = [];

  matrix.runs.forEach((run, i) => {
    run.z.forEach((z, l) => {
      if (!isPresent(z)) return;
      const verdict = verdicts.get(`${i}:${l + 1}`);
      const messages = verdict?.summary ?? "";
      rows.push({
        run: i,
        label: run.label,
        control: `Ctrl ${l + 1}`,
        z,
        zPlotted: Math.max(-LJ_DISPLAY_LIMIT, Math.min(LJ_DISPLAY_LIMIT, z)),
        marker: Math.abs(z) > LJ_DISPLAY_LIMIT ? "square" : "circle",
        status: verdict?.status ?? "Pass",
        messages,
        ruleShort: extractRuleShort(messages),
      });
    });
  });

  return rows;
}
