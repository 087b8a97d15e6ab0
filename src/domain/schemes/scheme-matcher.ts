import type { CitizenProfile } from "../profile/types.js";
import type { SchemeCatalog } from "../../data-sources/scheme-catalog.js";
import type { MatchedSchemeSummary, SchemeMatch } from "./types.js";
import { hasRules, passes } from "../eligibility/eligibility-filter.js";
import { scoreScheme } from "./scoring.js";

export const DEFAULT_MAX_RESULTS = 7;

export interface SchemeMatcherOptions {
  maxResults?: number;
}

/**
 * Filters the catalog against a profile, scores the survivors and returns
 * the best matches. Pure over its inputs; the catalog is immutable.
 */
export class SchemeMatcher {
  private catalog: SchemeCatalog;
  private defaultMaxResults: number;

  constructor(catalog: SchemeCatalog, options: SchemeMatcherOptions = {}) {
    this.catalog = catalog;
    this.defaultMaxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
  }

  /**
   * Ranked matches, highest score first. Equal scores keep catalog order
   * (Array.prototype.sort is stable). May return fewer than maxResults,
   * including none.
   */
  match(profile: CitizenProfile, maxResults?: number): SchemeMatch[] {
    const limit = Math.max(0, Math.floor(maxResults ?? this.defaultMaxResults));
    const matches: SchemeMatch[] = [];

    for (const scheme of this.catalog.all()) {
      const rules = scheme.eligibility;
      if (!hasRules(rules) || passes(profile, rules)) {
        matches.push({ scheme, score: scoreScheme(profile, scheme) });
      }
    }

    matches.sort((a, b) => b.score - a.score);
    return matches.slice(0, limit);
  }
}

export function summarizeMatches(matches: SchemeMatch[]): MatchedSchemeSummary[] {
  return matches.map((m) => ({
    name: m.scheme.name,
    benefit: m.scheme.benefit_amount,
    score: m.score,
  }));
}
