import { vi } from "vitest";
import path from "path";
import { fileURLToPath } from "url";
import type { CitizenProfile } from "../src/domain/profile/types.js";
import type { Scheme } from "../src/domain/schemes/types.js";
import type { CompletionRequest, TextGenerator } from "../src/llm/text-generator.js";
import { emptyProfile } from "../src/domain/profile/profile.js";
import { SchemeCatalog } from "../src/data-sources/scheme-catalog.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** Bundled data directory, for tests that load the real JSON files. */
export const DATA_DIR = path.resolve(__dirname, "../data");

export function makeProfile(overrides: Partial<CitizenProfile> = {}): CitizenProfile {
  return { ...emptyProfile(), ...overrides };
}

/** Profile with all six critical fields known (completeness 1.0). */
export function makeFullProfile(overrides: Partial<CitizenProfile> = {}): CitizenProfile {
  return makeProfile({
    age: 35,
    gender: "female",
    state: "Bihar",
    occupation: "farmer",
    category: "obc",
    annual_income: 80_000,
    ...overrides,
  });
}

export function makeScheme(overrides: Partial<Scheme> = {}): Scheme {
  return {
    scheme_id: "test-scheme",
    name: "Test Scheme",
    name_hi: "परीक्षण योजना",
    ministry: "Ministry of Testing",
    description: "A scheme used in tests.",
    benefit_amount: "₹1,000 per month",
    benefit_type: "cash_transfer",
    eligibility: {},
    how_to_apply: "Apply at the block office.",
    apply_url: "https://example.gov.in",
    documents: ["Aadhaar card"],
    ...overrides,
  };
}

export function makeCatalog(schemes: Scheme[]): SchemeCatalog {
  return SchemeCatalog.fromRecords(schemes);
}

/**
 * Stub text generator. Replies are handed out in order; once they run out
 * every call resolves to `fallback`.
 */
export function makeGenerator(replies: string[] = [], fallback = "") {
  const complete = vi.fn<(request: CompletionRequest) => Promise<string>>();
  for (const reply of replies) complete.mockResolvedValueOnce(reply);
  complete.mockResolvedValue(fallback);
  const generator: TextGenerator = { complete };
  return { generator, complete };
}

/** JSON reply as the intent classifier would send it. */
export function intentReply(
  intent: string,
  profileUpdates: Record<string, unknown> = {},
  language = "en",
): string {
  return JSON.stringify({
    intent,
    profile_updates: profileUpdates,
    language_detected: language,
  });
}
