import type { CitizenProfile } from "../profile/types.js";
import type { EligibilityRules } from "../schemes/types.js";
import type {
  EligibilityRuleName,
  RuleCheckResult,
} from "./rule-types.js";

/**
 * One check per rule kind. A rule is SKIPPED when the scheme does not set
 * it or when the matching profile field is unknown: a missing fact never
 * disqualifies.
 */

function skipped(rule: EligibilityRuleName, detail: string): RuleCheckResult {
  return { rule, verdict: "SKIPPED", detail };
}

function verdict(
  rule: EligibilityRuleName,
  passed: boolean,
  passDetail: string,
  failDetail: string,
): RuleCheckResult {
  return {
    rule,
    verdict: passed ? "PASS" : "FAIL",
    detail: passed ? passDetail : failDetail,
  };
}

function listRule(
  rule: EligibilityRuleName,
  allowed: string[] | undefined,
  value: string | null,
  label: string,
  normalize: (s: string) => string = (s) => s,
): RuleCheckResult {
  if (allowed === undefined) return skipped(rule, `No ${label} restriction`);
  if (value === null) return skipped(rule, `${label} unknown`);

  const wanted = normalize(value);
  const ok = allowed.some((a) => normalize(a) === wanted);
  return verdict(
    rule,
    ok,
    `${label} "${value}" is eligible`,
    `${label} "${value}" not in [${allowed.join(", ")}]`,
  );
}

function requiredFlag(
  rule: EligibilityRuleName,
  required: boolean,
  value: boolean | null,
  label: string,
): RuleCheckResult {
  if (!required) return skipped(rule, `${label} not required`);
  if (value === null) return skipped(rule, `${label} unknown`);
  return verdict(rule, value, `${label} confirmed`, `${label} required`);
}

export function checkAgeMin(
  profile: CitizenProfile,
  rules: EligibilityRules,
): RuleCheckResult {
  if (rules.age_min === undefined) return skipped("age_min", "No minimum age");
  if (profile.age === null) return skipped("age_min", "Age unknown");
  return verdict(
    "age_min",
    profile.age >= rules.age_min,
    `Age ${profile.age} meets minimum ${rules.age_min}`,
    `Age ${profile.age} is below minimum ${rules.age_min}`,
  );
}

export function checkAgeMax(
  profile: CitizenProfile,
  rules: EligibilityRules,
): RuleCheckResult {
  if (rules.age_max === undefined) return skipped("age_max", "No maximum age");
  if (profile.age === null) return skipped("age_max", "Age unknown");
  return verdict(
    "age_max",
    profile.age <= rules.age_max,
    `Age ${profile.age} within maximum ${rules.age_max}`,
    `Age ${profile.age} exceeds maximum ${rules.age_max}`,
  );
}

export function checkGender(
  profile: CitizenProfile,
  rules: EligibilityRules,
): RuleCheckResult {
  return listRule("gender", rules.gender, profile.gender, "Gender");
}

export function checkState(
  profile: CitizenProfile,
  rules: EligibilityRules,
): RuleCheckResult {
  return listRule("states", rules.states, profile.state, "State", (s) =>
    s.toLowerCase(),
  );
}

export function checkOccupation(
  profile: CitizenProfile,
  rules: EligibilityRules,
): RuleCheckResult {
  return listRule(
    "occupations",
    rules.occupations,
    profile.occupation,
    "Occupation",
  );
}

export function checkCategory(
  profile: CitizenProfile,
  rules: EligibilityRules,
): RuleCheckResult {
  return listRule("categories", rules.categories, profile.category, "Category");
}

export function checkIncome(
  profile: CitizenProfile,
  rules: EligibilityRules,
): RuleCheckResult {
  if (rules.income_max === undefined) {
    return skipped("income_max", "No income ceiling");
  }
  if (profile.annual_income === null) {
    return skipped("income_max", "Income unknown");
  }
  return verdict(
    "income_max",
    profile.annual_income <= rules.income_max,
    `Income ₹${profile.annual_income} within ceiling ₹${rules.income_max}`,
    `Income ₹${profile.annual_income} exceeds ceiling ₹${rules.income_max}`,
  );
}

export function checkBpl(
  profile: CitizenProfile,
  rules: EligibilityRules,
): RuleCheckResult {
  return requiredFlag(
    "bpl_required",
    rules.bpl_required === true,
    profile.bpl_status,
    "BPL status",
  );
}

export function checkDisability(
  profile: CitizenProfile,
  rules: EligibilityRules,
): RuleCheckResult {
  return requiredFlag(
    "disability_required",
    rules.disability_required === true || rules.disability === true,
    profile.disability,
    "Disability",
  );
}

export function checkLand(
  profile: CitizenProfile,
  rules: EligibilityRules,
): RuleCheckResult {
  return requiredFlag(
    "land_required",
    rules.land_required === true,
    profile.land_ownership,
    "Land ownership",
  );
}

export function checkMaritalStatus(
  profile: CitizenProfile,
  rules: EligibilityRules,
): RuleCheckResult {
  return listRule(
    "marital_status",
    rules.marital_status,
    profile.marital_status,
    "Marital status",
  );
}
