import type {
  LevelCount,
  MeasurementRow,
  PointVerdict,
  ReferenceStats,
  RejectionRuleCode,
  RuleHit,
  RunVerdict,
  SdMode,
  SigmaCategory,
  ZMatrix,
} from "../shared/types.js";
import { fingerprint } from "../shared/hash.js";
import { aggregateHits } from "./aggregate.js";
import { buildZMatrix, resolveReferenceSds, validateZMatrix } from "./matrix.js";
import type { ReferenceSd } from "./matrix.js";
import { describeRuleSet, resolveRuleSet, sortedRuleCodes } from "./sigma.js";
import { detectViolations } from "./westgard.js";

export interface ZMatrixEvaluation {
  sigmaCategory: SigmaCategory;
  activeRules: RejectionRuleCode[];
  ruleSetDescription: string;
  hits: RuleHit[];
  runVerdicts: RunVerdict[];
  pointVerdicts: PointVerdict[];
}

export interface IqcEvaluationInput {
  sigma: number | null | undefined;
  levelCount: LevelCount;
  sdMode: SdMode;
  reference: ReferenceStats[];
  measurements: MeasurementRow[];
  maxRuns?: number;
}

export interface IqcEvaluation extends ZMatrixEvaluation {
  /** SHA-256 of the canonical input */
  inputFingerprint: string;
  referenceUsed: ReferenceSd[];
  zMatrix: ZMatrix;
}

/**
 * Evaluate an already standardized matrix: resolve the sigma rule set,
 * detect violations, aggregate verdicts.
 */
export function evaluateZMatrix(
  matrix: ZMatrix,
  sigma: number | null | undefined,
  maxRuns?: number
): ZMatrixEvaluation {
  validateZMatrix(matrix, maxRuns);

  const { category, rules } = resolveRuleSet(sigma, matrix.levelCount);
  const hits = detectViolations(matrix, rules);
  const { runVerdicts, pointVerdicts } = aggregateHits(hits, matrix.runs, matrix.levelCount);

  return {
    sigmaCategory: category,
    activeRules: sortedRuleCodes(rules),
    ruleSetDescription: describeRuleSet(category, rules),
    hits,
    runVerdicts,
    pointVerdicts,
  };
}

/**
 * Full evaluation from raw measurements: reference SDs → z matrix →
 * rule engine → verdicts.
 */
export function evaluateIqc(input: IqcEvaluationInput): IqcEvaluation {
  const referenceUsed = resolveReferenceSds(input.reference, input.levelCount, input.sdMode);
  const zMatrix = buildZMatrix(input.measurements, referenceUsed, input.levelCount, input.maxRuns);

  return {
    ...evaluateZMatrix(zMatrix, input.sigma),
    inputFingerprint: fingerprint({
      sigma: input.sigma ?? null,
      levelCount: input.levelCount,
      sdMode: input.sdMode,
      reference: input.reference,
      measurements: input.measurements,
    }),
    referenceUsed,
    zMatrix,
  };
}
