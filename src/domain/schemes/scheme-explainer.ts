import type { CitizenProfile } from "../profile/types.js";
import type { SchemeMatch } from "./types.js";
import type { TextGenerator } from "../../llm/text-generator.js";
import { profileToRecord } from "../profile/profile.js";
import { noMatchesMessage } from "../conversation/messages.js";

export const DEFAULT_EXPLAIN_TOP_N = 5;

function describeMatch(match: SchemeMatch, position: number): string {
  const s = match.scheme;
  const title = s.name_hi ? `${s.name} (${s.name_hi})` : s.name;
  return [
    `${position}. ${title}`,
    `   Benefit: ${s.benefit_amount}`,
    `   Documents: ${s.documents.join(", ") || "none listed"}`,
    `   How to apply: ${s.how_to_apply}`,
  ].join("\n");
}

export function buildExplanationPrompt(
  matches: SchemeMatch[],
  profile: CitizenProfile,
  topN: number = DEFAULT_EXPLAIN_TOP_N,
): string {
  const ranked = matches
    .slice(0, Math.max(1, topN))
    .map((m, i) => describeMatch(m, i + 1))
    .join("\n\n");

  return `You are Sahayak, a friendly assistant helping Indian citizens find government schemes.

CITIZEN PROFILE:
${JSON.stringify(profileToRecord(profile))}

MATCHED SCHEMES (best first):
${ranked}

HOW TO ANSWER:
1. Explain the schemes above in plain everyday words a fifth-grader would follow.
2. For each scheme say what the person gets, why they qualify, which documents to keep ready and where to apply.
3. Quote rupee amounts as given.
4. Be encouraging and conversational, not formal.
5. Answer in the user's language.
6. Close by offering more detail on any scheme, and mention that you can also help with RTI applications and money questions.`;
}

/**
 * Friendly explanation of the top matches. With no matches the fixed
 * localized message is returned and the model is not called.
 */
export async function explainSchemes(
  generator: TextGenerator,
  matches: SchemeMatch[],
  profile: CitizenProfile,
  language: string,
  topN: number = DEFAULT_EXPLAIN_TOP_N,
): Promise<string> {
  if (matches.length === 0) {
    return noMatchesMessage(language);
  }

  return generator.complete({
    systemPrompt: buildExplanationPrompt(matches, profile, topN),
    userMessage: `Please explain the schemes I am eligible for. My language is: ${language}`,
  });
}
