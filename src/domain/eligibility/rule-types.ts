export type RuleVerdict = "PASS" | "FAIL" | "SKIPPED";

export type EligibilityRuleName =
  | "age_min"
  | "age_max"
  | "gender"
  | "states"
  | "occupations"
  | "categories"
  | "income_max"
  | "bpl_required"
  | "disability_required"
  | "land_required"
  | "marital_status";

export interface RuleCheckResult {
  rule: EligibilityRuleName;
  verdict: RuleVerdict;
  detail: string;
}

export interface EligibilityResult {
  all_passed: boolean;
  checks: RuleCheckResult[];
  blocking_rule?: EligibilityRuleName;
}
