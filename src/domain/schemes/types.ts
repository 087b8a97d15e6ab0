// Scheme Catalog Types

/**
 * Hard constraints a citizen must meet. Every key is optional; an empty
 * object means the scheme is open to everyone. Keys not listed here are
 * carried through untouched and never disqualify.
 */
export interface EligibilityRules {
  age_min?: number;
  age_max?: number;
  gender?: string[];
  states?: string[];
  occupations?: string[];
  categories?: string[];
  income_max?: number;
  bpl_required?: boolean;
  disability_required?: boolean;
  disability?: boolean; // alias of disability_required
  land_required?: boolean;
  marital_status?: string[];
}

export interface Scheme {
  scheme_id: string;
  name: string;
  name_hi: string;
  ministry: string;
  description: string;
  benefit_amount: string;
  benefit_type: string;
  eligibility: EligibilityRules;
  how_to_apply: string;
  apply_url: string;
  documents: string[];
}

export interface SchemeMatch {
  scheme: Scheme;
  score: number;
}

/** Compact projection stored on the session and listed by tools. */
export interface MatchedSchemeSummary {
  name: string;
  benefit: string;
  score: number;
}

export interface SchemeListing {
  id: string;
  name: string;
  name_hi: string;
  benefit: string;
  ministry: string;
  type: string;
  apply_url: string;
}
