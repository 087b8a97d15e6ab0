import type { CitizenProfile } from "../profile/types.js";
import type { EligibilityRules } from "../schemes/types.js";
import type { EligibilityResult, RuleCheckResult } from "./rule-types.js";
import {
  checkAgeMin,
  checkAgeMax,
  checkGender,
  checkState,
  checkOccupation,
  checkCategory,
  checkIncome,
  checkBpl,
  checkDisability,
  checkLand,
  checkMaritalStatus,
} from "./rule-checks.js";

type RuleCheck = (
  profile: CitizenProfile,
  rules: EligibilityRules,
) => RuleCheckResult;

const RULE_CHECKS: readonly RuleCheck[] = [
  checkAgeMin,
  checkAgeMax,
  checkGender,
  checkState,
  checkOccupation,
  checkCategory,
  checkIncome,
  checkBpl,
  checkDisability,
  checkLand,
  checkMaritalStatus,
];

/**
 * Run every rule check against a scheme's eligibility set.
 *
 * All checks always run so the result can be shown as an audit trail.
 * `blocking_rule` reports the first rule that failed.
 */
export function evaluateEligibility(
  profile: CitizenProfile,
  rules: EligibilityRules,
): EligibilityResult {
  const checks = RULE_CHECKS.map((check) => check(profile, rules));
  const firstFailure = checks.find((c) => c.verdict === "FAIL");

  return {
    all_passed: !firstFailure,
    checks,
    blocking_rule: firstFailure?.rule,
  };
}

export function hasRules(rules: EligibilityRules): boolean {
  return Object.keys(rules).length > 0;
}

/** True when no known profile field contradicts a rule the scheme sets. */
export function passes(
  profile: CitizenProfile,
  rules: EligibilityRules,
): boolean {
  if (!hasRules(rules)) return true;
  return RULE_CHECKS.every((check) => check(profile, rules).verdict !== "FAIL");
}
