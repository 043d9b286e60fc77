import type { IqcEvaluation } from "../analytics/evaluation.js";
import { buildLeveyJenningsRows } from "../analytics/levey_jennings.js";
import type { LeveyJenningsRow } from "../analytics/levey_jennings.js";
import { round } from "../analytics/stats.js";
import type {
  QcStatus,
  RejectionRuleCode,
  RuleCode,
  SdMode,
  SigmaCategory,
} from "../shared/types.js";
import type { AnalyteInfo } from "./types.js";

export interface RunTableRow {
  runLabel: string;
  z: Array<number | null>;
  status: QcStatus;
  rejectionMessages: string[];
  warningMessages: string[];
  violations: string;
}

export interface PointTableRow {
  runLabel: string;
  level: number;
  status: QcStatus;
  ruleCodes: RuleCode[];
  messages: string;
}

/** Everything export and chart collaborators consume, as plain JSON. */
export interface EvaluationReport {
  reportId: string;
  generatedAt: string;
  inputFingerprint: string;
  analyte: AnalyteInfo;
  header: {
    sigma: number | null;
    sigmaCategory: SigmaCategory;
    activeRules: RejectionRuleCode[];
    ruleSetDescription: string;
    sdMode: SdMode;
    reference: Array<{ level: number; mean: number | null; sd: number | null }>;
  };
  runs: RunTableRow[];
  points: PointTableRow[];
  leveyJennings: LeveyJenningsRow[];
  warnings: string[];
}

export interface ReportInput {
  reportId: string;
  generatedAt: string;
  analyte: AnalyteInfo;
  sdMode: SdMode;
  sigma: number | null;
  evaluation: IqcEvaluation;
  warnings: string[];
}

/**
 * Flatten an evaluation into run and point tables. z-scores are rounded to
 * 4 decimals for the table; verdicts were computed on the unrounded values.
 */
export function buildEvaluationReport(input: ReportInput): EvaluationReport {
  const { evaluation } = input;

  const runs: RunTableRow[] = evaluation.runVerdicts.map((v) => ({
    runLabel: v.label,
    z: evaluation.zMatrix.runs[v.run].z.map((z) => (z === null ? null : round(z))),
    status: v.status,
    rejectionMessages: v.rejectionMessages,
    warningMessages: v.warningMessages,
    violations: v.summary,
  }));

  const points: PointTableRow[] = evaluation.pointVerdicts.map((p) => ({
    runLabel: p.label,
    level: p.level,
    status: p.status,
    ruleCodes: p.ruleCodes,
    messages: p.summary,
  }));

  return {
    reportId: input.reportId,
    generatedAt: input.generatedAt,
    inputFingerprint: evaluation.inputFingerprint,
    analyte: input.analyte,
    header: {
      sigma: input.sigma,
      sigmaCategory: evaluation.sigmaCategory,
      activeRules: evaluation.activeRules,
      ruleSetDescription: evaluation.ruleSetDescription,
      sdMode: input.sdMode,
      reference: evaluation.referenceUsed,
    },
    runs,
    points,
    leveyJennings: buildLeveyJenningsRows(evaluation.zMatrix, evaluation.pointVerdicts),
    warnings: input.warnings,
  };
}
