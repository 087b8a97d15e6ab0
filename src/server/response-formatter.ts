import type { CitizenProfile } from "../domain/profile/types.js";
import type { Scheme, SchemeMatch } from "../domain/schemes/types.js";
import type { Session } from "../domain/conversation/session.js";
import type { EligibilityResult } from "../domain/eligibility/rule-types.js";
import { completenessScore, profileToRecord } from "../domain/profile/profile.js";
import { scoreBreakdown, type ScoreBonus } from "../domain/schemes/scoring.js";
import { evaluateEligibility } from "../domain/eligibility/eligibility-filter.js";

/**
 * Match as returned by match_schemes: the decision-relevant scheme fields
 * plus how the score was reached.
 */
export interface CompactMatch {
  scheme_id: string;
  name: string;
  name_hi: string;
  benefit: string;
  ministry: string;
  apply_url: string;
  documents: string[];
  score: number;
  bonuses: ScoreBonus[];
}

export function compactMatch(match: SchemeMatch, profile: CitizenProfile): CompactMatch {
  const s = match.scheme;
  return {
    scheme_id: s.scheme_id,
    name: s.name,
    name_hi: s.name_hi,
    benefit: s.benefit_amount,
    ministry: s.ministry,
    apply_url: s.apply_url,
    documents: [...s.documents],
    score: match.score,
    bonuses: scoreBreakdown(profile, s).bonuses,
  };
}

export interface EligibilityAudit extends EligibilityResult {
  scheme_id: string;
  name: string;
  /** Relevance score, present only when eligible. */
  score: number | null;
}

export function eligibilityAudit(
  scheme: Scheme,
  profile: CitizenProfile,
): EligibilityAudit {
  const result = evaluateEligibility(profile, scheme.eligibility);
  return {
    scheme_id: scheme.scheme_id,
    name: scheme.name,
    ...result,
    score: result.all_passed ? scoreBreakdown(profile, scheme).score : null,
  };
}

/** Session as exposed to clients; history stays as stored. */
export function sessionView(session: Session) {
  return {
    session_id: session.session_id,
    language: session.language,
    current_pillar: session.current_pillar,
    profile: profileToRecord(session.profile),
    profile_completeness: completenessScore(session.profile),
    matched_schemes: session.matched_schemes,
    message_count: session.conversation_history.length,
    conversation_history: session.conversation_history,
    created_at: new Date(session.created_at * 1000).toISOString(),
    updated_at: new Date(session.updated_at * 1000).toISOString(),
  };
}
