import type { LevelCount, RejectionRuleCode, RuleSet, SigmaCategory } from "../shared/types.js";

export interface SigmaRuleSet {
  category: SigmaCategory;
  rules: RuleSet;
}

/**
 * Rejection rules added on top of 1_3s, per sigma category and level count.
 * Lower sigma means a larger, more sensitive rule set.
 */
const EXTRA_RULES: Record<LevelCount, Record<SigmaCategory, RejectionRuleCode[]>> = {
  2: {
    "6": [],
    "5": ["R_4s", "2_2s"],
    "4": ["R_4s", "2_2s", "4_1s"],
    "<4": ["R_4s", "2_2s", "4_1s", "10x"],
  },
  3: {
    "6": [],
    "5": ["R_4s", "2of3_2s"],
    "4": ["R_4s", "2of3_2s", "3_1s"],
    "<4": ["R_4s", "2of3_2s", "3_1s", "9x"],
  },
};

/**
 * Bucket a sigma metric. Missing, NaN and zero are treated as unknown and
 * fall into the most conservative category.
 */
export function sigmaCategory(sigma: number | null | undefined): SigmaCategory {
  if (sigma === null || sigma === undefined || Number.isNaN(sigma) || sigma === 0) {
    return "<4";
  }
  if (sigma >= 6) return "6";
  if (sigma >= 5) return "5";
  if (sigma >= 4) return "4";
  return "<4";
}

export function resolveRuleSet(
  sigma: number | null | undefined,
  levelCount: LevelCount
): SigmaRuleSet {
  const category = sigmaCategory(sigma);
  const rules = new Set<RejectionRuleCode>(["1_3s", ...EXTRA_RULES[levelCount][category]]);
  return { category, rules };
}

/** Rule codes in display order (plain string sort, e.g. "10x" before "1_3s"). */
export function sortedRuleCodes(rules: RuleSet): RejectionRuleCode[] {
  return [...rules].sort();
}

/**
 * One-line description for report headers.
 */
export function describeRuleSet(category: SigmaCategory, rules: RuleSet): string {
  return `Sigma ${category} → rejection rules: ${sortedRuleCodes(rules).join(", ")} (1_2s always warns)`;
}
