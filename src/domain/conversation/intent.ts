import type { ChatTurn, TextGenerator } from "../../llm/text-generator.js";
import { parseJsonReply } from "../../llm/text-generator.js";
import { logDebug, logWarn } from "../../core/logging.js";

export const INTENTS = [
  "greeting",
  "scheme_discovery",
  "rti",
  "financial",
  "profile_update",
] as const;

export type Intent = (typeof INTENTS)[number] | "unknown";

export interface IntentResult {
  intent: Intent;
  /** Raw field → value pairs; validated later by applyProfileUpdates(). */
  profile_updates: Record<string, unknown>;
  language_detected: string | null;
}

export const FALLBACK_INTENT: IntentResult = {
  intent: "greeting",
  profile_updates: {},
  language_detected: null,
};

const INTENT_PROMPT = `You classify messages sent to Sahayak, an assistant for Indian citizens. Read the user's message and answer with JSON only.

INTENTS:
- "greeting": says hello, asks what the service does, or opens the conversation
- "scheme_discovery": wants to find government schemes they are eligible for
- "rti": wants to file an RTI application, grievance or complaint against a government office
- "financial": asks about loans, interest rates, savings, scams or money advice
- "profile_update": shares personal details (age, work, location and so on)

PROFILE FIELDS (include only what the message states):
- age (integer)
- gender ("male" | "female" | "other")
- state (Indian state, English name)
- district (string)
- occupation ("farmer" | "labourer" | "vendor" | "student" | "homemaker" | "unemployed" | "other")
- category ("general" | "sc" | "st" | "obc" | "minority")
- annual_income (integer, rupees)
- bpl_status (boolean)
- disability (boolean)
- marital_status ("married" | "widowed" | "single" | "divorced")
- land_ownership (boolean)
- education_level ("none" | "primary" | "secondary" | "graduate")
- family_members (integer)
- children_count (integer)

The user may write in Hindi, another Indian language, or any of these transliterated into Latin script.

Reply with exactly one JSON object and nothing else:
{"intent": "...", "profile_updates": {...}, "language_detected": "<ISO 639-1 code>"}`;

function isIntent(value: unknown): value is (typeof INTENTS)[number] {
  return INTENTS.some((i) => i === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Normalize a parsed classifier reply. A missing intent reads as greeting;
 * an intent outside the known set reads as unknown.
 */
export function toIntentResult(parsed: Record<string, unknown>): IntentResult {
  const rawIntent = parsed.intent;
  let intent: Intent;
  if (rawIntent === undefined || rawIntent === null) {
    intent = "greeting";
  } else if (isIntent(rawIntent)) {
    intent = rawIntent;
  } else {
    intent = "unknown";
  }

  const language = parsed.language_detected;
  return {
    intent,
    profile_updates: isRecord(parsed.profile_updates)
      ? { ...parsed.profile_updates }
      : {},
    language_detected:
      typeof language === "string" && language.trim() !== ""
        ? language.trim().toLowerCase()
        : null,
  };
}

export async function detectIntent(
  generator: TextGenerator,
  message: string,
  history: ChatTurn[] = [],
): Promise<IntentResult> {
  const reply = await generator.complete({
    systemPrompt: INTENT_PROMPT,
    userMessage: message,
    history,
  });

  const parsed = parseJsonReply(reply);
  if (!parsed) {
    logWarn("Intent classifier returned non-JSON; treating as greeting");
    return { ...FALLBACK_INTENT, profile_updates: {} };
  }

  const result = toIntentResult(parsed);
  logDebug(
    `Intent ${result.intent}, ${Object.keys(result.profile_updates).length} profile update(s)`,
  );
  return result;
}
