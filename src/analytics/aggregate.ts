import type {
  PointVerdict,
  QcStatus,
  RuleCode,
  RuleHit,
  RunVerdict,
  ZRun,
} from "../shared/types.js";

/** Canonical rule order used for per-point code lists */
export const RULE_ORDER: readonly RuleCode[] = [
  "1_3s",
  "2_2s",
  "2of3_2s",
  "R_4s",
  "3_1s",
  "4_1s",
  "9x",
  "10x",
  "1_2s",
];

interface Bucket {
  rejections: Set<string>;
  warnings: Set<string>;
  codes: Set<RuleCode>;
}

function emptyBucket(): Bucket {
  return { rejections: new Set(), warnings: new Set(), codes: new Set() };
}

function isWarning(hit: RuleHit): boolean {
  return hit.code === "1_2s";
}

function addHit(bucket: Bucket, hit: RuleHit): void {
  (isWarning(hit) ? bucket.warnings : bucket.rejections).add(hit.message);
  bucket.codes.add(hit.code);
}

function statusOf(rejections: readonly string[], warnings: readonly string[]): QcStatus {
  if (rejections.length > 0) return "Reject";
  if (warnings.length > 0) return "Warning";
  return "Pass";
}

function settle(bucket: Bucket) {
  const rejectionMessages = [...bucket.rejections].sort();
  const warningMessages = [...bucket.warnings].sort();
  return {
    status: statusOf(rejectionMessages, warningMessages),
    rejectionMessages,
    warningMessages,
    summary: [...rejectionMessages, ...warningMessages].join("; "),
  };
}

export interface AggregatedVerdicts {
  runVerdicts: RunVerdict[];
  pointVerdicts: PointVerdict[];
}

/**
 * Fold rule hits into per-run and per-point verdicts.
 *
 * 1_2s hits are warnings; every other hit rejects. Messages are de-duplicated
 * and sorted, so the result does not depend on hit order. Point verdicts come
 * run-major, level-minor, with 1-based levels.
 */
export function aggregateHits(
  hits: readonly RuleHit[],
  runs: readonly ZRun[],
  levelCount: number
): AggregatedVerdicts {
  const byRun = runs.map(() => emptyBucket());
  const byPoint = runs.map(() => Array.from({ length: levelCount }, () => emptyBucket()));

  for (const hit of hits) {
    const runBucket = byRun[hit.run];
    if (!runBucket) continue;
    addHit(runBucket, hit);
    for (const level of hit.levels) {
      const pointBucket = byPoint[hit.run][level];
      if (pointBucket) addHit(pointBucket, hit);
    }
  }

  const runVerdicts: RunVerdict[] = runs.map((run, i) => ({
    run: i,
    label: run.label,
    ...settle(byRun[i]),
  }));

  const pointVerdicts: PointVerdict[] = [];
  runs.forEach((run, i) => {
    byPoint[i].forEach((bucket, level) => {
      pointVerdicts.push({
        run: i,
        label: run.label,
        level: level + 1,
        ...settle(bucket),
        ruleCodes: RULE_ORDER.filter((code) => bucket.codes.has(code)),
      });
    });
  });

  return { runVerdicts, pointVerdicts };
}

/**
 * Short codes from a "; "-joined message string: the first token of each
 * message, de-duplicated in order of appearance.
 */
export function extractRuleShort(text: string | null | undefined): string {
  if (!text || !text.trim()) return "";
  const codes: string[] = [];
  for (const part of text.split(";")) {
    const token = part.trim().split(/\s+/)[0];
    if (token && !codes.includes(token)) codes.push(token);
  }
  return codes.join(", ");
}
