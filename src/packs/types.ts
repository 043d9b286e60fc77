/**
 * Dataset Types: IQC dataset configuration and measurement row schemas.
 */
import { z } from "zod";

// ── Dataset Config ───────────────────────────────────────────────────

export const AnalyteInfoSchema = z.object({
  testName: z.string().min(1),
  unit: z.string().optional(),
  device: z.string().optional(),
  method: z.string().optional(),
  qcName: z.string().optional(),
  qcLot: z.string().optional(),
  qcExpiry: z.string().optional(),
});

export const ReferenceStatsSchema = z.object({
  level: z.number().int().min(1).max(3),
  mean: z.number().nullable(),
  sdEmpirical: z.number().positive().nullable().default(null),
  cvTargetPct: z.number().nonnegative().nullable().optional(),
});

export const DatasetConfigSchema = z
  .object({
    analyte: AnalyteInfoSchema,
    levelCount: z.union([z.literal(2), z.literal(3)]),
    sigma: z.number().nullable().optional(),
    sdMode: z.enum(["empirical", "cvh"]).default("empirical"),
    reference: z.array(ReferenceStatsSchema).min(1),
  })
  .refine((cfg) => cfg.reference.every((r) => r.level <= cfg.levelCount), {
    message: "reference levels must not exceed levelCount",
    path: ["reference"],
  });

export type AnalyteInfo = z.infer<typeof AnalyteInfoSchema>;
export type DatasetConfig = z.infer<typeof DatasetConfigSchema>;

// ── Measurements CSV ─────────────────────────────────────────────────

/** Column holding the run label */
export const RUN_COLUMN = "run";

export function levelColumn(level: number): string {
  return `Ctrl ${level}`;
}

export const CsvRowsSchema = z.array(z.record(z.string()));
