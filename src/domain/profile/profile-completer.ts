import type { CitizenProfile, ProfileField } from "./types.js";
import { completenessScore } from "./profile.js";

/**
 * Progressive profiling: one question per turn, in a fixed priority order.
 *
 * Completeness is measured over six critical fields but the scan covers
 * eight, so marital status and BPL can still be pending once the profile
 * counts as complete enough to match. The gap is intentional.
 */

export type QuestionId =
  | "age"
  | "gender"
  | "state"
  | "occupation"
  | "category"
  | "income"
  | "marital_status"
  | "bpl";

export const QUESTION_ORDER: readonly QuestionId[] = [
  "age",
  "gender",
  "state",
  "occupation",
  "category",
  "income",
  "marital_status",
  "bpl",
];

export const QUESTION_FIELDS: Record<QuestionId, ProfileField> = {
  age: "age",
  gender: "gender",
  state: "state",
  occupation: "occupation",
  category: "category",
  income: "annual_income",
  marital_status: "marital_status",
  bpl: "bpl_status",
};

export interface ProfilingPolicy {
  /** Below this completeness the dialogue keeps asking before matching. */
  matchThreshold: number;
  /** At or above this completeness no further question is pending. */
  completeThreshold: number;
}

export const DEFAULT_PROFILING_POLICY: ProfilingPolicy = {
  matchThreshold: 0.5,
  completeThreshold: 0.8,
};

/**
 * Next question to ask, or null when the profile is complete.
 */
export function nextQuestion(
  profile: CitizenProfile,
  policy: ProfilingPolicy = DEFAULT_PROFILING_POLICY,
): QuestionId | null {
  if (completenessScore(profile) >= policy.completeThreshold) {
    return null;
  }

  const pending = QUESTION_ORDER.find(
    (q) => profile[QUESTION_FIELDS[q]] === null,
  );
  return pending ?? null;
}

export type ProfilingStep =
  | { kind: "ask"; question: QuestionId; completeness: number }
  | { kind: "match"; completeness: number };

/**
 * Dialogue policy on top of nextQuestion(): ask while a question is pending
 * and completeness is under the match threshold, otherwise run matching.
 */
export function profilingStep(
  profile: CitizenProfile,
  policy: ProfilingPolicy = DEFAULT_PROFILING_POLICY,
): ProfilingStep {
  const completeness = completenessScore(profile);
  const question = nextQuestion(profile, policy);

  if (question !== null && completeness < policy.matchThreshold) {
    return { kind: "ask", question, completeness };
  }
  return { kind: "match", completeness };
}
