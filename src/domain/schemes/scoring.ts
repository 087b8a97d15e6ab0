import type { CitizenProfile } from "../profile/types.js";
import type { Scheme } from "./types.js";

// ============================================================================
// Relevance Scoring
//
// Applies only to schemes that already passed the eligibility filter, so
// every score starts from the base. Bonuses reward a positive, known match
// on a rule the scheme actually sets.
// ============================================================================

export const BASE_SCORE = 50;
export const MAX_SCORE = 100;

export const SCORE_BONUSES = {
  occupation: 15,
  category: 10,
  gender: 10,
  bpl: 10,
  high_value_benefit: 5,
} as const;

export type BonusName = keyof typeof SCORE_BONUSES;

export interface ScoreBonus {
  name: BonusName;
  points: number;
}

export interface ScoreBreakdown {
  base: number;
  bonuses: ScoreBonus[];
  score: number;
}

// Matches the catalog's free-text benefit wording, e.g. "Up to ₹5 lakh".
const HIGH_VALUE_LITERAL = "₹5,00,000";

export function isHighValueBenefit(benefitAmount: string): boolean {
  return (
    benefitAmount.toLowerCase().includes("lakh") ||
    benefitAmount.includes(HIGH_VALUE_LITERAL)
  );
}

function listed(allowed: string[] | undefined, value: string | null): boolean {
  return allowed !== undefined && value !== null && allowed.includes(value);
}

export function scoreBreakdown(
  profile: CitizenProfile,
  scheme: Scheme,
): ScoreBreakdown {
  const rules = scheme.eligibility;
  const bonuses: ScoreBonus[] = [];
  const add = (name: BonusName) =>
    bonuses.push({ name, points: SCORE_BONUSES[name] });

  if (listed(rules.occupations, profile.occupation)) add("occupation");
  if (listed(rules.categories, profile.category)) add("category");
  if (listed(rules.gender, profile.gender)) add("gender");
  if (rules.bpl_required === true && profile.bpl_status === true) add("bpl");
  if (isHighValueBenefit(scheme.benefit_amount)) add("high_value_benefit");

  const raw = bonuses.reduce((sum, b) => sum + b.points, BASE_SCORE);
  return {
    base: BASE_SCORE,
    bonuses,
    score: Math.min(raw, MAX_SCORE),
  };
}

/** Relevance score in [50, 100] for a scheme the profile is eligible for. */
export function scoreScheme(profile: CitizenProfile, scheme: Scheme): number {
  return scoreBreakdown(profile, scheme).score;
}
