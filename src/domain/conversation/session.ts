import { randomUUID } from "crypto";
import type { CitizenProfile } from "../profile/types.js";
import type { MatchedSchemeSummary } from "../schemes/types.js";
import type { ChatRole, ChatTurn } from "../../llm/text-generator.js";
import { emptyProfile, profileFromRecord, profileToRecord } from "../profile/profile.js";

export const PILLARS = ["greeting", "scheme_discovery", "rti", "financial"] as const;
export type Pillar = (typeof PILLARS)[number];

export interface ConversationMessage extends ChatTurn {
  timestamp: number; // epoch seconds
}

export interface Session {
  session_id: string;
  user_id: string | null;
  language: string;
  current_pillar: Pillar;
  profile: CitizenProfile;
  conversation_history: ConversationMessage[];
  matched_schemes: MatchedSchemeSummary[];
  created_at: number; // epoch seconds
  updated_at: number;
}

/** JSON shape persisted by the session store. */
export interface SessionRecord {
  session_id: string;
  user_id: string | null;
  language: string;
  current_pillar: Pillar;
  profile: Record<string, unknown>;
  conversation_history: ConversationMessage[];
  matched_schemes: MatchedSchemeSummary[];
  created_at: number;
  updated_at: number;
}

export const DEFAULT_HISTORY_LIMIT = 20;

function nowSeconds(): number {
  return Date.now() / 1000;
}

export function createSession(
  sessionId: string = randomUUID(),
  language = "hi",
  now: number = nowSeconds(),
): Session {
  return {
    session_id: sessionId,
    user_id: null,
    language,
    current_pillar: "greeting",
    profile: emptyProfile(),
    conversation_history: [],
    matched_schemes: [],
    created_at: now,
    updated_at: now,
  };
}

export function addMessage(
  session: Session,
  role: ChatRole,
  content: string,
  now: number = nowSeconds(),
): void {
  session.conversation_history.push({ role, content, timestamp: now });
  session.updated_at = now;
}

/** Last `n` messages, oldest first, without timestamps. */
export function recentHistory(session: Session, n = 10): ChatTurn[] {
  if (n <= 0) return [];
  return session.conversation_history
    .slice(-n)
    .map(({ role, content }) => ({ role, content }));
}

export function sessionToRecord(
  session: Session,
  historyLimit = DEFAULT_HISTORY_LIMIT,
): SessionRecord {
  return {
    session_id: session.session_id,
    user_id: session.user_id,
    language: session.language,
    current_pillar: session.current_pillar,
    profile: profileToRecord(session.profile),
    conversation_history: session.conversation_history.slice(-historyLimit),
    matched_schemes: session.matched_schemes,
    created_at: Math.floor(session.created_at),
    updated_at: Math.floor(session.updated_at),
  };
}

// ============================================================================
// Tolerant decoding of persisted records
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isPillar(value: unknown): value is Pillar {
  return PILLARS.some((p) => p === value);
}

function decodeMessage(raw: unknown): ConversationMessage | null {
  if (!isRecord(raw)) return null;
  const { role, content, timestamp } = raw;
  if ((role !== "user" && role !== "assistant") || typeof content !== "string") {
    return null;
  }
  return {
    role,
    content,
    timestamp: typeof timestamp === "number" ? timestamp : 0,
  };
}

function decodeSummary(raw: unknown): MatchedSchemeSummary | null {
  if (!isRecord(raw)) return null;
  const { name, benefit, score } = raw;
  if (typeof name !== "string" || typeof benefit !== "string" || typeof score !== "number") {
    return null;
  }
  return { name, benefit, score };
}

function compact<T>(values: Array<T | null>): T[] {
  return values.filter((v): v is T => v !== null);
}

/**
 * Rebuild a session from stored JSON. Missing or malformed fields fall back
 * to fresh-session defaults; the profile is re-validated field by field.
 */
export function sessionFromRecord(
  raw: unknown,
  fallbackId: string,
  now: number = nowSeconds(),
): Session {
  const data = isRecord(raw) ? raw : {};
  const history = Array.isArray(data.conversation_history)
    ? compact(data.conversation_history.map(decodeMessage))
    : [];
  const matched = Array.isArray(data.matched_schemes)
    ? compact(data.matched_schemes.map(decodeSummary))
    : [];

  return {
    session_id:
      typeof data.session_id === "string" ? data.session_id : fallbackId,
    user_id: typeof data.user_id === "string" ? data.user_id : null,
    language: typeof data.language === "string" ? data.language : "hi",
    current_pillar: isPillar(data.current_pillar)
      ? data.current_pillar
      : "greeting",
    profile: isRecord(data.profile)
      ? profileFromRecord(data.profile).profile
      : emptyProfile(),
    conversation_history: history,
    matched_schemes: matched,
    created_at: typeof data.created_at === "number" ? data.created_at : now,
    updated_at: typeof data.updated_at === "number" ? data.updated_at : now,
  };
}
